export type PanelErrorCode = 'NO_DEFAULT_CONTROLLER' | 'INVALID_SCRIPT';

/**
 * Raised only outside the lifecycle path (default-instance access, scenario
 * parsing). Lifecycle operations report through the logger instead.
 */
export class PanelError extends Error {
  readonly code: PanelErrorCode;

  constructor(code: PanelErrorCode, message: string) {
    super(message);
    this.name = 'PanelError';
    this.code = code;
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

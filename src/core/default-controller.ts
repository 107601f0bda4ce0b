import { PanelError } from '../shared/errors.js';
import type { PanelController } from './controller.js';

let defaultController: PanelController | null = null;

/** Installs the process-wide controller for call sites that cannot take one by injection. */
export function setDefaultController(controller: PanelController | null): void {
  defaultController = controller;
}

export function hasDefaultController(): boolean {
  return defaultController !== null;
}

export function getDefaultController(): PanelController {
  if (!defaultController) {
    throw new PanelError('NO_DEFAULT_CONTROLLER', 'No default panel controller installed. Call setDefaultController() first.');
  }
  return defaultController;
}

import type { PanelIdentity } from '../shared/types.js';

export const KEY_SEPARATOR = '_';

const ESCAPE = '\\';

// Escaping keeps the mapping injective even when kinds or ids contain the
// separator; plain identifiers come out unchanged.
function escapeFragment(fragment: string): string {
  let out = '';
  for (const ch of fragment) {
    out += ch === ESCAPE || ch === KEY_SEPARATOR ? ESCAPE + ch : ch;
  }
  return out;
}

export function canonicalKey(kind: string, instanceId: string = ''): string {
  const head = escapeFragment(kind);
  return instanceId === '' ? head : `${head}${KEY_SEPARATOR}${escapeFragment(instanceId)}`;
}

export function identityOf<K extends string>(kind: K, instanceId?: string): PanelIdentity<K> {
  return { kind, instanceId: instanceId ?? '' };
}

export function keyOf(identity: PanelIdentity): string {
  return canonicalKey(identity.kind, identity.instanceId);
}

export function sameIdentity(a: PanelIdentity, b: PanelIdentity): boolean {
  return keyOf(a) === keyOf(b);
}

/**
 * Capabilities a worker can be granted through its manifest. Anything not granted is denied when the
 * guest asks for it, never inferred at call time.
 */
export const CAPABILITIES = ['clock', 'random', 'env', 'kv', 'log'] as const;

export type Capability = (typeof CAPABILITIES)[number];

export function isCapability(value: string): value is Capability {
  return (CAPABILITIES as readonly string[]).includes(value);
}

export function hasCapability(granted: readonly Capability[], capability: Capability): boolean {
  return granted.includes(capability);
}

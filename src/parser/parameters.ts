import type { ParameterBindings } from "../types/audit.js";

const SIGILS = ["@", ":", "$"] as const;

export type ParameterLookup = { found: true; value: unknown } | { found: false };

/**
 * Drop a leading `@`, `:` or `$`
 */
export function stripSigil(name: string): string {
  return SIGILS.some((sigil) => name.startsWith(sigil)) ? name.slice(1) : name;
}

/**
 * Look up a placeholder in the caller's bindings, tolerating either sigil
 * convention (`{ "@id": 1 }`, `{ id: 1 }`, `{ ":id": 1 }`; `$1` also matches `"1"`).
 * A key bound to `undefined` counts as unbound.
 */
export function resolveParameter(bindings: ParameterBindings, name: string): ParameterLookup {
  const bare = stripSigil(name);
  const candidates = [name, bare, ...SIGILS.map((sigil) => `${sigil}${bare}`)];

  for (const key of candidates) {
    if (Object.prototype.hasOwnProperty.call(bindings, key) && bindings[key] !== undefined) {
      return { found: true, value: bindings[key] };
    }
  }

  return { found: false };
}

/**
 * Bindings keyed by bare name, for images reconstructed from parameters
 */
export function bareBindings(bindings: ParameterBindings): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(bindings)) {
    if (value === undefined) continue;
    result[stripSigil(key)] = value;
  }
  return result;
}

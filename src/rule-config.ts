/**
 * Rule Config - Typed per-rule configuration merged over named defaults
 */

/**
 * Overlay the defined overrides on the defaults and freeze the result.
 * Undefined overrides keep the default.
 */
export function withDefaults<T extends object>(defaults: T, overrides: Partial<T>): Readonly<T> {
  const merged = { ...defaults };
  for (const key in overrides) {
    const value = overrides[key];
    if (value !== undefined) {
      merged[key] = value;
    }
  }
  return Object.freeze(merged);
}

/**
 * Case-insensitive membership, used by allow-lists that ignore case
 */
export function includesIgnoreCase(list: readonly string[], value: string): boolean {
  const lower = value.toLowerCase();
  return list.some(item => item.toLowerCase() === lower);
}

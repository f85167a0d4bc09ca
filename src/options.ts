/**
 * Merge caller options over defaults. Keys the caller sets to undefined keep
 * their default.
 */
export function withDefaults<T extends object>(defaults: T, overrides: Partial<T> = {}): T {
  const result: T = { ...defaults };
  for (const key in overrides) {
    const value = overrides[key];
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

export const TAG_NAME_MAX_LENGTH = 50;

export function normalizeTagName(value: string): string {
  return value.trim().toLowerCase();
}

/** Trims, lowercases and de-duplicates, dropping blanks; first occurrence wins the order. */
export function normalizeTagNames(values: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const value of values) {
    const name = normalizeTagName(value);
    if (name.length > 0) {
      seen.add(name);
    }
  }
  return [...seen];
}

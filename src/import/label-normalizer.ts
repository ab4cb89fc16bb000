/**
 * Label identity used for option, store label and attribute set matching:
 * trimmed, whitespace runs collapsed, lower-cased.
 */

export function normalizeLabel(text: string): string {
  return text.trim().replace(/\s+/gu, ' ').toLowerCase();
}

/** Drop blank labels and later duplicates, keeping the first literal spelling */
export function dedupeLabels(labels: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const label of labels) {
    const key = normalizeLabel(label);
    if (key === '' || seen.has(key)) continue;
    seen.add(key);
    result.push(label);
  }
  return result;
}

/** Normalized labels that occur more than once, in order of first repeat */
export function findDuplicateLabels(labels: readonly string[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const label of labels) {
    const key = normalizeLabel(label);
    if (key === '') continue;
    if (seen.has(key)) {
      duplicates.add(key);
    } else {
      seen.add(key);
    }
  }
  return [...duplicates];
}

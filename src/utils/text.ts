/**
 * Lower-case, strip accents and collapse whitespace so that
 * "Cardiología" and " cardiologia " compare equal.
 */
export function normalizeText(value: string): string {
  return value
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .trim();
}

/** Append items not already present (by normalised form), keeping first-seen order. */
export function unionInOrder(base: readonly string[], additions: readonly string[]): string[] {
  const seen = new Set(base.map(normalizeText));
  const result = [...base];
  for (const item of additions) {
    const trimmed = item.trim();
    const key = normalizeText(trimmed);
    if (key.length === 0 || seen.has(key)) continue;
    seen.add(key);
    result.push(trimmed);
  }
  return result;
}

/**
 * Trim and collapse whitespace runs (including NBSP) to a single space.
 * Returns null when nothing is left.
 */
export function cleanText(rawValue: string | null | undefined): string | null {
  if (!rawValue || typeof rawValue !== 'string') {
    return null;
  }

  const cleaned = rawValue.replace(/\s+/g, ' ').trim();
  return cleaned.length > 0 ? cleaned : null;
}

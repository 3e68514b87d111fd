const LIST_MARKER = /^\d+[.)]$/;

/** Prose words only: markdown markers such as `#`, `-`, `|---|` or `1.` are skipped. */
export function countWords(text: string): number {
  const trimmed = text.trim();
  if (!trimmed) return 0;
  return trimmed
    .split(/\s+/)
    .filter(token => /[\p{L}\p{N}]/u.test(token) && !LIST_MARKER.test(token))
    .length;
}

/** "renewable energy policy" -> "Renewable Energy Policy" */
export function titleCase(text: string): string {
  return text
    .trim()
    .split(/\s+/)
    .filter(Boolean)
    .map(word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}

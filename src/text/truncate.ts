// pattern: Functional Core

/**
 * Cuts text to at most `maxChars` code points, so a surrogate pair is never
 * split. Returns the input unchanged when it already fits.
 */
export function truncateText(text: string, maxChars: number): string {
  const limit = Math.max(0, maxChars);
  // UTF-16 length is an upper bound on the code point count
  if (text.length <= limit) {
    return text;
  }
  const codePoints = Array.from(text);
  if (codePoints.length <= limit) {
    return text;
  }
  return codePoints.slice(0, limit).join("");
}

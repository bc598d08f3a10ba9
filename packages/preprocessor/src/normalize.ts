/**
 * Whitespace and line-break normalization. Paragraph breaks (blank lines)
 * survive; runs of spaces, tabs and blank lines collapse.
 */
export function normalizeWhitespace(text: string): string {
  return text
    .replace(/\r\n?/g, "\n")
    .replace(/[ \t\f\v\u00a0\u2000-\u200a\u202f\u205f\u3000]+/g, " ")
    .split("\n")
    .map((line) => line.trim())
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

/** Case-insensitive, whitespace-normalized identity of a fragment. */
export function fragmentKey(fragment: string): string {
  return fragment.toLowerCase().replace(/\s+/g, " ").trim();
}

/**
 * Drops empty fragments and exact duplicates under `fragmentKey`, keeping
 * the first occurrence in source order.
 */
export function dedupeFragments(fragments: string[]): { kept: string[]; dropped: number } {
  const seen = new Set<string>();
  const kept: string[] = [];
  let dropped = 0;
  for (const fragment of fragments) {
    const key = fragmentKey(fragment);
    if (key.length === 0) continue;
    if (seen.has(key)) {
      dropped += 1;
      continue;
    }
    seen.add(key);
    kept.push(fragment);
  }
  return { kept, dropped };
}

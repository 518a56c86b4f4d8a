/**
 * Canonical form of a text before it is embedded. The same text must always
 * produce the same input to the embedding model.
 */
export function normalizeText(text: string): string {
  // one trailing punctuation character, checked before trimming; a single
  // final newline still counts as the end
  const stripped = text.replace(/[^\p{L}\p{N}_\s](?=\n?$)/u, "");
  return stripped.trim().toLowerCase();
}

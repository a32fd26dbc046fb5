/** Escapes every character that has a meaning inside a RegExp. */
export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Splits on runs of whitespace, dropping empty tokens. */
export function splitWords(text: string): string[] {
  return text.split(/\s+/).filter((token) => token.length > 0);
}

/**
 * Whitespace tokenizer for sketching.
 *
 * Documents arrive already normalized; the only work left is splitting on
 * runs of spaces, tabs, carriage returns and line feeds.
 */

const WHITESPACE = /[ \t\r\n]+/;

export function tokenize(text: string): string[] {
  if (!text) {
    return [];
  }

  return text.split(WHITESPACE).filter(token => token.length > 0);
}

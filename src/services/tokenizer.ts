import type { DictionaryLookup, MandarinSentence, Token } from '../types/index.js';

/**
 * Split a row into tokens: one per dictionary word found by the segmenter,
 * plus one per character the segmenter skipped over.
 *
 * Concatenating the token texts always gives back `raw`.
 *
 * Example: "很*時尚*" -> ["很", "*", "時尚", "*"]
 */
export function tokenize(raw: string, dictionary: DictionaryLookup): Token[] {
  const tokens: Token[] = [];
  let cursor = 0;

  for (const word of dictionary.segment(raw)) {
    const index = raw.indexOf(word, cursor);
    if (index === -1) {
      throw new Error(`Segment "${word}" not found in "${raw}" after position ${cursor}`);
    }

    pushCharacters(tokens, raw.slice(cursor, index));
    tokens.push({ text: word, entries: dictionary.lookup(word) });
    cursor = index + word.length;
  }

  pushCharacters(tokens, raw.slice(cursor));
  return tokens;
}

/**
 * Emit each character (code point) as its own token with no dictionary data
 */
function pushCharacters(tokens: Token[], text: string): void {
  for (const char of text) {
    tokens.push({ text: char, entries: null });
  }
}

export function buildSentence(raw: string, dictionary: DictionaryLookup): MandarinSentence {
  return Object.freeze({
    rawText: raw,
    tokens: Object.freeze(tokenize(raw, dictionary)),
  });
}

/**
 * True when at least one token matched a dictionary entry
 */
export function hasDictionaryMatch(tokens: readonly Token[]): boolean {
  return tokens.some(token => token.entries !== null && token.entries.length > 0);
}

import type { Token } from '../types/index.js';

/** Marker users put around the part of a sentence to highlight */
export const EMPHASIS_DELIMITER = '*';

export const EMPHASIS_OPEN = '<span class=starred>';
export const EMPHASIS_CLOSE = '</span>';

/**
 * Walk the pieces, replacing each delimiter with `replace(opening)`.
 * Delimiters toggle: the 1st, 3rd, ... open, the 2nd, 4th, ... close.
 * An odd number of delimiters leaves the last span open.
 */
function toggleEmphasis(pieces: Iterable<string>, replace: (opening: boolean) => string): string {
  let emphasized = false;
  let output = '';

  for (const piece of pieces) {
    if (piece === EMPHASIS_DELIMITER) {
      output += replace(!emphasized);
      emphasized = !emphasized;
    } else {
      output += piece;
    }
  }

  return output;
}

function markup(opening: boolean): string {
  return opening ? EMPHASIS_OPEN : EMPHASIS_CLOSE;
}

/**
 * Sentence text for the card, with emphasized spans wrapped in markup
 */
export function renderMarked(tokens: readonly Token[]): string {
  return toggleEmphasis(tokens.map(token => token.text), markup);
}

/**
 * Sentence text with the delimiters removed, for translation and speech
 */
export function renderPlain(tokens: readonly Token[]): string {
  return toggleEmphasis(tokens.map(token => token.text), () => '');
}

/**
 * Reading string (pinyin or zhuyin) with emphasized spans wrapped in markup
 */
export function renderMarkedReading(reading: string): string {
  return toggleEmphasis(reading, markup);
}

export function countDelimiters(tokens: readonly Token[]): number {
  return tokens.filter(token => token.text === EMPHASIS_DELIMITER).length;
}

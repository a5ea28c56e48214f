/**
 * Pinyin helpers for tone numbers and tone marks.
 *
 * CC-CEDICT stores readings as tone numbers ("ni3 hao3", "lu:4"),
 * the transliteration service returns tone marks ("nǐ hǎo", "lǜ").
 */

// Accented vowels mapping
const VOWEL_MAP: Record<string, Record<number, string>> = {
  a: { 1: '\u0101', 2: '\u00e1', 3: '\u01ce', 4: '\u00e0' },
  o: { 1: '\u014d', 2: '\u00f3', 3: '\u01d2', 4: '\u00f2' },
  e: { 1: '\u0113', 2: '\u00e9', 3: '\u011b', 4: '\u00e8' },
  i: { 1: '\u012b', 2: '\u00ed', 3: '\u01d0', 4: '\u00ec' },
  u: { 1: '\u016b', 2: '\u00fa', 3: '\u01d4', 4: '\u00f9' },
  '\u00fc': { 1: '\u01d6', 2: '\u01d8', 3: '\u01da', 4: '\u01dc' },
};

/**
 * Accented vowel -> base letter and tone number (ü is spelled v)
 */
export const TONE_MARKS: Record<string, { base: string; tone: number }> = {
  // Tone 1 (macron)
  'ā': { base: 'a', tone: 1 }, 'ē': { base: 'e', tone: 1 }, 'ī': { base: 'i', tone: 1 },
  'ō': { base: 'o', tone: 1 }, 'ū': { base: 'u', tone: 1 }, 'ǖ': { base: 'v', tone: 1 },
  // Tone 2 (acute)
  'á': { base: 'a', tone: 2 }, 'é': { base: 'e', tone: 2 }, 'í': { base: 'i', tone: 2 },
  'ó': { base: 'o', tone: 2 }, 'ú': { base: 'u', tone: 2 }, 'ǘ': { base: 'v', tone: 2 },
  // Tone 3 (caron)
  'ǎ': { base: 'a', tone: 3 }, 'ě': { base: 'e', tone: 3 }, 'ǐ': { base: 'i', tone: 3 },
  'ǒ': { base: 'o', tone: 3 }, 'ǔ': { base: 'u', tone: 3 }, 'ǚ': { base: 'v', tone: 3 },
  // Tone 4 (grave)
  'à': { base: 'a', tone: 4 }, 'è': { base: 'e', tone: 4 }, 'ì': { base: 'i', tone: 4 },
  'ò': { base: 'o', tone: 4 }, 'ù': { base: 'u', tone: 4 }, 'ǜ': { base: 'v', tone: 4 },
};

export interface NumberedSyllable {
  /** Lowercase letters with ü spelled v, e.g. "lv" */
  letters: string;
  /** 1-4, or 5 for the neutral tone */
  tone: number;
}

/**
 * Split a tone-numbered syllable into letters and tone.
 * Accepts "ni3", "lu:4", "lv4", "lü4", "Zhong1", "ma5", "ma0" and "ma".
 * Returns null for anything that is not letters plus an optional tone digit.
 */
export function parseNumberedSyllable(syllable: string): NumberedSyllable | null {
  const match = syllable.trim().match(/^([a-zA-Z:üÜ]+?)([0-5])?$/);
  if (!match) return null;

  const letters = match[1]
    .toLowerCase()
    .replace(/u:/g, 'v')
    .replace(/ü/g, 'v');

  if (!/^[a-z]+$/.test(letters)) return null;

  const tone = match[2] === undefined || match[2] === '0' ? 5 : parseInt(match[2], 10);
  return { letters, tone };
}

/**
 * Convert a single pinyin syllable with tone number to accented pinyin
 * e.g., "ni3" -> "nǐ", "lu:4" -> "lǜ"
 */
export function numberedSyllableToMarked(syllable: string): string {
  const match = syllable.match(/^(.*?)([0-5])?$/);
  if (!match || !match[1]) return syllable;

  // Handle u: and v -> u with umlaut
  const letters = match[1].replace(/u:/g, '\u00fc').replace(/v/g, '\u00fc');
  const tone = match[2] ? parseInt(match[2], 10) : 5;

  // Neutral tone - no accent needed
  if (tone === 5 || tone === 0) return letters;

  // Find which vowel to accent (rules: a/e/o first, then last of i/u/ü)
  const lettersArr = letters.split('');
  let accentIndex = -1;
  const priority = ['a', 'o', 'e'];

  for (let i = 0; i < lettersArr.length; i++) {
    const c = lettersArr[i].toLowerCase();
    if (priority.includes(c)) {
      if (accentIndex === -1) {
        accentIndex = i;
      } else if (priority.indexOf(c) < priority.indexOf(lettersArr[accentIndex].toLowerCase())) {
        accentIndex = i;
      }
    }
  }

  if (accentIndex === -1) {
    for (let i = lettersArr.length - 1; i >= 0; i--) {
      const c = lettersArr[i].toLowerCase();
      if (['i', 'u', '\u00fc'].includes(c)) {
        accentIndex = i;
        break;
      }
    }
  }

  if (accentIndex !== -1) {
    const original = lettersArr[accentIndex];
    const accented = VOWEL_MAP[original.toLowerCase()]?.[tone];
    if (accented) {
      lettersArr[accentIndex] = original === original.toLowerCase() ? accented : accented.toUpperCase();
    }
  }

  return lettersArr.join('');
}

/**
 * Convert space-separated tone-numbered pinyin to tone marks
 * e.g., "ni3 hao3" -> "nǐ hǎo"
 */
export function numberedToMarked(pinyinNumbers: string): string {
  return pinyinNumbers
    .split(/\s+/)
    .filter(Boolean)
    .map(numberedSyllableToMarked)
    .join(' ');
}

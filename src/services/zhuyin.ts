/**
 * Pinyin -> zhuyin (bopomofo) conversion.
 *
 * Two entry points:
 * - `deriveZhuyin` for CC-CEDICT readings, one tone-numbered syllable at a time
 * - `convertPinyinToZhuyin` for tone-marked prose from the transliteration
 *   service, which first has to be split into syllables
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import { PhoneticConversionError } from '../lib/errors.js';
import { parseNumberedSyllable, TONE_MARKS } from './pinyin.js';

// Toneless syllable (ü spelled v) -> zhuyin, e.g. "lve" -> "ㄌㄩㄝ"
const ZHUYIN_TABLE: Readonly<Record<string, string>> = z
  .record(z.string())
  .parse(JSON.parse(readFileSync(new URL('../../data/zhuyin.json', import.meta.url), 'utf-8')));

const LONGEST_SYLLABLE = Math.max(...Object.keys(ZHUYIN_TABLE).map(s => s.length));

const TONE_SUFFIX: Record<number, string> = { 1: '', 2: 'ˊ', 3: 'ˇ', 4: 'ˋ' };
const NEUTRAL_TONE = '˙';

// Erhua suffix, e.g. "diǎnr" -> "ㄉㄧㄢˇㄦ"
const ERHUA = 'ㄦ';

// A syllable starting with one of these must be preceded by an apostrophe
const VOWEL_INITIALS = new Set(['a', 'e', 'o']);

const APOSTROPHES = new Set(["'", '’']);

function withTone(zhuyin: string, tone: number): string {
  return tone === 5 ? NEUTRAL_TONE + zhuyin : zhuyin + (TONE_SUFFIX[tone] ?? '');
}

/**
 * Convert one tone-numbered syllable to zhuyin
 * e.g., "ni3" -> "ㄋㄧˇ", "ma5" -> "˙ㄇㄚ"
 *
 * @returns null when the syllable has no zhuyin equivalent
 */
export function encodeZhuyin(syllable: string): string | null {
  const parsed = parseNumberedSyllable(syllable);
  if (!parsed) return null;

  const zhuyin = ZHUYIN_TABLE[parsed.letters];
  return zhuyin === undefined ? null : withTone(zhuyin, parsed.tone);
}

/**
 * Convert a CC-CEDICT reading to comma-separated zhuyin.
 * Syllables without an equivalent are passed through unchanged.
 *
 * e.g., "ni3 hao3" -> "ㄋㄧˇ,ㄏㄠˇ", "san1 C" -> "ㄙㄢ,C"
 */
export function deriveZhuyin(pinyinNumbers: string): string {
  return pinyinNumbers
    .split(/\s+/)
    .filter(Boolean)
    .map(syllable => encodeZhuyin(syllable) ?? syllable)
    .join(',');
}

interface PinyinLetter {
  base: string;
  /** Tone carried by this letter's mark, 0 when unmarked */
  tone: number;
}

function toPinyinLetter(char: string): PinyinLetter | null {
  const lower = char.toLowerCase();
  const marked = TONE_MARKS[lower];
  if (marked) return { base: marked.base, tone: marked.tone };
  if (lower === 'ü') return { base: 'v', tone: 0 };
  if (/^[a-z]$/.test(lower)) return { base: lower, tone: 0 };
  return null;
}

/**
 * An unmarked "r" closing a syllable, not followed by a vowel-initial syllable
 */
function isErhua(letters: PinyinLetter[], index: number): boolean {
  const letter = letters[index];
  if (letter === undefined || letter.base !== 'r' || letter.tone !== 0) return false;
  const next = letters[index + 1];
  return next === undefined || !VOWEL_INITIALS.has(next.base);
}

/**
 * Split a run of pinyin letters into syllables, longest match first,
 * backtracking when the remainder cannot be split.
 *
 * @returns zhuyin for each syllable, or null if no split exists
 */
function splitRun(letters: PinyinLetter[]): string[] | null {
  const memo = new Map<number, string[] | null>();

  const splitFrom = (start: number): string[] | null => {
    if (start === letters.length) return [];
    const known = memo.get(start);
    if (known !== undefined) return known;

    let result: string[] | null = null;
    for (let len = Math.min(LONGEST_SYLLABLE, letters.length - start); len >= 1 && !result; len--) {
      const end = start + len;
      if (end < letters.length && VOWEL_INITIALS.has(letters[end].base)) continue;

      const slice = letters.slice(start, end);
      const zhuyin = ZHUYIN_TABLE[slice.map(l => l.base).join('')];
      if (zhuyin === undefined) continue;

      const tones = slice.filter(l => l.tone !== 0);
      if (tones.length > 1) continue;

      const syllable = withTone(zhuyin, tones[0]?.tone ?? 5);
      const rest = splitFrom(end);
      if (rest) {
        result = [syllable, ...rest];
      } else if (isErhua(letters, end)) {
        const afterErhua = splitFrom(end + 1);
        if (afterErhua) {
          result = [syllable + ERHUA, ...afterErhua];
        }
      }
    }

    memo.set(start, result);
    return result;
  };

  return splitFrom(0);
}

/**
 * Convert tone-marked pinyin prose to zhuyin, keeping every character
 * that is not part of a syllable (punctuation, commas, emphasis markers).
 * An apostrophe between letters only marks a syllable boundary.
 *
 * @throws PhoneticConversionError when a run of letters is not valid pinyin
 */
export function parsePinyinStream(text: string): string {
  const chars = Array.from(text);
  let output = '';
  let run: PinyinLetter[] = [];
  let runText = '';

  const flush = (): void => {
    if (run.length === 0) return;
    const syllables = splitRun(run);
    if (!syllables) {
      throw new PhoneticConversionError(text, `Cannot split "${runText}" into pinyin syllables`);
    }
    output += syllables.join('');
    run = [];
    runText = '';
  };

  chars.forEach((char, index) => {
    const letter = toPinyinLetter(char);
    if (letter) {
      run.push(letter);
      runText += char;
      return;
    }

    const next = chars[index + 1];
    if (APOSTROPHES.has(char) && run.length > 0 && next !== undefined && toPinyinLetter(next)) {
      flush();
      return;
    }

    flush();
    output += char;
  });

  flush();
  return output;
}

/**
 * Convert the transliteration service's pinyin for a whole sentence to zhuyin.
 * Spaces become commas, and a full-width comma followed by one collapses.
 *
 * e.g., "nǐ hǎo，wǒ" -> "ㄋㄧˇ,ㄏㄠˇ，ㄨㄛˇ"
 */
export function convertPinyinToZhuyin(reading: string): string {
  return parsePinyinStream(reading.replace(/ /g, ',').replace(/，,/g, '，'));
}

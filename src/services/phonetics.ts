import { pinyin } from 'pinyin-pro';
import { PhoneticConversionError } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import type {
  DictionaryEntry,
  DictionaryLookup,
  MandarinReading,
  Token,
  Transliterator,
} from '../types/index.js';
import type { CorrectionPrompt } from './correction.js';
import { numberedToMarked } from './pinyin.js';
import { convertPinyinToZhuyin, deriveZhuyin } from './zhuyin.js';

function charCount(text: string): number {
  return Array.from(text).length;
}

/**
 * Produces card readings in the configured notation.
 *
 * Word readings come from CC-CEDICT; sentence readings come from the
 * transliteration service, converted to zhuyin when that is the notation.
 */
export class PhoneticReconciler {
  constructor(
    private readonly notation: MandarinReading,
    private readonly dictionary: DictionaryLookup,
    private readonly transliterator: Transliterator,
    private readonly correct: CorrectionPrompt,
    private readonly logger: Logger
  ) {}

  /**
   * Reading of a single dictionary entry
   * e.g., zhuyin "ㄋㄧˇ,ㄏㄠˇ" or pinyin "nǐ hǎo"
   */
  entryReading(entry: DictionaryEntry): string {
    return this.fromNumbered(entry.pinyin);
  }

  /**
   * Reading of a word token, one per matched entry
   * e.g., 好 -> "ㄏㄠˇ,ㄏㄠˋ" (zhuyin) or "hǎo, hào" (pinyin)
   *
   * @throws Error if the token has no dictionary entries
   */
  tokenReading(token: Token): string {
    if (!token.entries || token.entries.length === 0) {
      throw new Error(`Token "${token.text}" has no dictionary entries to read from`);
    }

    const separator = this.notation === 'zhuyin' ? ',' : ', ';
    return token.entries.map(entry => this.entryReading(entry)).join(separator);
  }

  /**
   * Reading for a related word. Uses the dictionary match directly when it
   * covers the whole word, otherwise joins the readings of the word's parts.
   * Characters missing from the dictionary are read with pinyin-pro.
   */
  relatedWordReading(word: string): string {
    const direct = this.dictionary.lookup(word)[0];
    if (direct && charCount(direct.traditional) === charCount(word)) {
      return this.entryReading(direct);
    }

    const separator = this.notation === 'zhuyin' ? ',' : ' ';
    return this.dictionary
      .segment(word)
      .map(part => {
        const entry = this.dictionary.lookup(part)[0];
        return entry ? this.entryReading(entry) : this.fallbackReading(part);
      })
      .join(separator);
  }

  /**
   * Reading of a whole sentence (emphasis delimiters included) from the
   * transliteration service.
   *
   * When zhuyin conversion fails the pinyin goes to the correction prompt
   * and the corrected text is converted once more; a second failure throws.
   */
  async sentenceReading(rawText: string): Promise<string> {
    const pinyinReading = await this.transliterator.transliterate(rawText);
    this.logger.debug(`Pinyin reading from transliteration: ${pinyinReading}`);

    if (this.notation === 'pinyin') {
      return pinyinReading;
    }

    try {
      const zhuyinReading = convertPinyinToZhuyin(pinyinReading);
      this.logger.debug(`Zhuyin reading from pinyin: ${zhuyinReading}`);
      return zhuyinReading;
    } catch (error) {
      if (!(error instanceof PhoneticConversionError)) {
        throw error;
      }
      this.logger.warn(`${error.message}; asking for a correction of "${pinyinReading}"`);
    }

    const corrected = await this.correct(pinyinReading);
    this.logger.debug(`Corrected pinyin: ${corrected}`);
    return convertPinyinToZhuyin(corrected);
  }

  private fromNumbered(pinyinNumbers: string): string {
    return this.notation === 'zhuyin' ? deriveZhuyin(pinyinNumbers) : numberedToMarked(pinyinNumbers);
  }

  private fallbackReading(text: string): string {
    const syllables = pinyin(text, { toneType: 'num', type: 'array' });
    return this.fromNumbered(syllables.join(' '));
  }
}

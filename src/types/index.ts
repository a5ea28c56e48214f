/**
 * A single dictionary entry from CC-CEDICT
 */
export interface DictionaryEntry {
  id: number;
  simplified: string;
  traditional: string;
  /** Tone-numbered pinyin, space separated (e.g. "ni3 hao3") */
  pinyin: string;
  definitions: string[];
}

/**
 * Raw database row (definitions stored as JSON string)
 */
export interface DictionaryRow {
  id: number;
  simplified: string;
  traditional: string;
  pinyin: string;
  definitions: string;
}

export type ScriptClassification = 'mandarin' | 'other';

/**
 * Read-only view of the dictionary used by the tokenizer and the card builders.
 */
export interface DictionaryLookup {
  lookup(text: string): readonly DictionaryEntry[];
  segment(text: string): string[];
  classifyScript(text: string): ScriptClassification;
}

/**
 * One piece of a tokenized row.
 *
 * `entries` is null for characters the segmenter skipped (punctuation,
 * emphasis markers, Latin text) and an empty array for a Mandarin segment
 * the dictionary has no entry for.
 */
export interface Token {
  text: string;
  entries: readonly DictionaryEntry[] | null;
}

export interface MandarinSentence {
  rawText: string;
  tokens: readonly Token[];
}

/**
 * A related word suggested by the LLM
 */
export interface SimilarWord {
  word: string;
  translation: string;
}

export type MandarinScript = 'traditional' | 'simplified';

export type MandarinReading = 'zhuyin' | 'pinyin';

export interface Translator {
  translate(text: string): Promise<string>;
}

export interface Transliterator {
  /** Returns tone-marked pinyin for the whole text */
  transliterate(text: string): Promise<string>;
}

export interface SpeechSynthesizer {
  synthesize(text: string): Promise<Buffer>;
}

export interface RelatedWordSource {
  suggest(word: string): Promise<SimilarWord[]>;
}

/**
 * An audio file written for a note, bundled into the package as media
 */
export interface AudioFile {
  path: string;
  fileName: string;
}

/** timestamp, Hanzi, Definition, Audio, Reading, Similar Words */
export type WordFields = readonly [string, string, string, string, string, string];

/** timestamp, Hanzi, Meaning, Audio, Reading */
export type SentenceFields = readonly [string, string, string, string, string];

export type Card =
  | { kind: 'word'; fields: WordFields; audio: AudioFile }
  | { kind: 'sentence'; fields: SentenceFields; audio: AudioFile };

/**
 * A row of the input CSV
 */
export interface InputRow {
  hanzi: string;
  /** Definition override; absent when the column is missing or blank */
  definition?: string;
}

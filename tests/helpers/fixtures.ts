import Database from 'better-sqlite3';
import { readFileSync } from 'fs';
import { parseCedict, populateDatabase } from '../../scripts/import-cedict.js';
import type { AppConfig } from '../../src/config/index.js';
import { CedictDictionary } from '../../src/services/dictionary.js';
import type { Transliterator } from '../../src/types/index.js';

export const SAMPLE_CEDICT = readFileSync(new URL('../fixtures/cedict-sample.u8', import.meta.url), 'utf-8');

/**
 * Dictionary over an in-memory database loaded from the sample file
 */
export function sampleDictionary(): CedictDictionary {
  const db = new Database(':memory:');
  populateDatabase(db, parseCedict(SAMPLE_CEDICT).entries);
  return new CedictDictionary(db, 100);
}

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    anki: {
      deckId: 2059400110,
      deckName: 'Test Deck',
      deckDescription: 'Deck for tests',
      wordModelId: 1607392319,
      sentenceModelId: 1607392320,
    },
    azure: {
      region: 'testregion',
      translatorKey: 'test-translator-key',
      speech: { key: 'test-speech-key', voiceName: 'zh-TW-YunJheNeural', locale: 'zh-TW' },
    },
    openrouter: {
      apiKey: 'test-secret',
      model: 'test/model',
      baseUrl: 'https://llm.test/api/v1',
    },
    mandarin: { script: 'traditional', reading: 'zhuyin' },
    dictionary: { path: ':memory:', cacheSize: 100 },
    retry: { maxRetries: 2, baseDelayMs: 10, maxDelayMs: 100 },
    ...overrides,
  };
}

/**
 * Transliterator answering from a fixed table
 */
export class FakeTransliterator implements Transliterator {
  readonly requests: string[] = [];

  constructor(private readonly readings: Record<string, string>) {}

  async transliterate(text: string): Promise<string> {
    this.requests.push(text);
    const reading = this.readings[text];
    if (reading === undefined) {
      throw new Error(`No reading for ${text}`);
    }
    return reading;
  }
}

import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { InputError } from '../src/lib/errors.js';
import { silentLogger } from '../src/lib/logger.js';
import { parseInputRows, processRows, readInputRows, type BatchContext } from '../src/services/batch.js';
import type { CedictDictionary } from '../src/services/dictionary.js';
import type { Card, MandarinSentence, Token } from '../src/types/index.js';
import { sampleDictionary } from './helpers/fixtures.js';

const AUDIO = { path: '/tmp/x.mp3', fileName: 'x.mp3' };

function wordCard(text: string): Card {
  return { kind: 'word', fields: ['1', text, '', '', '', ''], audio: AUDIO };
}

function sentenceCard(text: string): Card {
  return { kind: 'sentence', fields: ['1', text, '', '', ''], audio: AUDIO };
}

describe('parseInputRows', () => {
  it('reads the Mandarin text and an optional definition', () => {
    const content = [
      '你好',
      '你今天看起來很*時尚*,You look fashionable today',
      '',
      '基金會 , foundation ',
      '我很好,',
    ].join('\n');

    expect(parseInputRows(content)).toEqual([
      { hanzi: '你好' },
      { hanzi: '你今天看起來很*時尚*', definition: 'You look fashionable today' },
      { hanzi: '基金會', definition: 'foundation' },
      { hanzi: '我很好' },
    ]);
  });

  it('drops a byte order mark before the first row', () => {
    expect(parseInputRows('\uFEFF你好\n朋友,friend\n')).toEqual([
      { hanzi: '你好' },
      { hanzi: '朋友', definition: 'friend' },
    ]);
  });

  it('keeps quoted commas inside the definition', () => {
    expect(parseInputRows('好,"good, well"\n')).toEqual([{ hanzi: '好', definition: 'good, well' }]);
  });
});

describe('readInputRows', () => {
  it('reads rows from a file', async () => {
    const directory = await mkdtemp(join(tmpdir(), 'batch-test-'));
    try {
      const path = join(directory, 'input.csv');
      await writeFile(path, '朋友,friend\n');
      await expect(readInputRows(path)).resolves.toEqual([{ hanzi: '朋友', definition: 'friend' }]);
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });

  it('fails with an InputError for a missing file', async () => {
    await expect(readInputRows(join(tmpdir(), 'no-such-input.csv'))).rejects.toBeInstanceOf(InputError);
  });
});

describe('processRows', () => {
  let dictionary: CedictDictionary;

  beforeAll(() => {
    dictionary = sampleDictionary();
  });

  afterAll(() => {
    dictionary.close();
  });

  function context(builder: BatchContext['builder']): BatchContext {
    return { dictionary, builder, logger: silentLogger() };
  }

  it('sends single words and sentences to the matching builder', async () => {
    const buildWordCard = vi.fn(async (token: Token, _definition?: string) => wordCard(token.text));
    const buildSentenceCard = vi.fn(async (sentence: MandarinSentence, _definition?: string) =>
      sentenceCard(sentence.rawText)
    );

    const cards = await processRows(
      [{ hanzi: '基金會', definition: 'foundation' }, { hanzi: '我很好' }],
      context({ buildWordCard, buildSentenceCard })
    );

    expect(cards.map(card => card.kind)).toEqual(['word', 'sentence']);
    expect(buildWordCard).toHaveBeenCalledWith({ text: '基金會', entries: dictionary.lookup('基金會') }, 'foundation');
    expect(buildSentenceCard.mock.calls[0][0].rawText).toBe('我很好');
    expect(buildSentenceCard.mock.calls[0][1]).toBeUndefined();
  });

  it('skips empty rows without calling a builder', async () => {
    const buildWordCard = vi.fn(async (token: Token) => wordCard(token.text));
    const buildSentenceCard = vi.fn(async (sentence: MandarinSentence) => sentenceCard(sentence.rawText));

    const cards = await processRows([{ hanzi: '' }], context({ buildWordCard, buildSentenceCard }));

    expect(cards).toEqual([]);
    expect(buildWordCard).not.toHaveBeenCalled();
    expect(buildSentenceCard).not.toHaveBeenCalled();
  });

  it('returns cards in input order whatever order they finish in', async () => {
    const delays: Record<string, number> = { 你好: 30, 朋友: 0, 媽媽: 10 };
    const buildWordCard = async (token: Token): Promise<Card> => {
      await new Promise(resolve => setTimeout(resolve, delays[token.text]));
      return wordCard(token.text);
    };

    const cards = await processRows(
      [{ hanzi: '你好' }, { hanzi: '朋友' }, { hanzi: '媽媽' }],
      context({ buildWordCard, buildSentenceCard: async () => null })
    );

    expect(cards.map(card => card.fields[1])).toEqual(['你好', '朋友', '媽媽']);
  });

  it('leaves out rows that fail or produce no card', async () => {
    const logger = silentLogger();
    const errors: string[] = [];
    vi.spyOn(logger, 'error').mockImplementation((message: string) => {
      errors.push(message);
    });

    const buildWordCard = async (token: Token): Promise<Card | null> => {
      if (token.text === '朋友') throw new Error('speech unavailable');
      if (token.text === '他') return null;
      return wordCard(token.text);
    };

    const cards = await processRows([{ hanzi: '你好' }, { hanzi: '朋友' }, { hanzi: '他' }, { hanzi: '媽媽' }], {
      dictionary,
      builder: { buildWordCard, buildSentenceCard: async () => null },
      logger,
    });

    expect(cards.map(card => card.fields[1])).toEqual(['你好', '媽媽']);
    expect(errors).toEqual(['Failed to build a card for "朋友": speech unavailable']);
  });
});

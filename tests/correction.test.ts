import { describe, it, expect } from 'vitest';
import { serializePrompt, type CorrectionPrompt } from '../src/services/correction.js';

describe('serializePrompt', () => {
  it('runs one prompt at a time in call order', async () => {
    const events: string[] = [];
    const prompt: CorrectionPrompt = async (candidate) => {
      events.push(`start ${candidate}`);
      await new Promise(resolve => setTimeout(resolve, candidate === 'a' ? 20 : 0));
      events.push(`end ${candidate}`);
      return candidate.toUpperCase();
    };

    const serialized = serializePrompt(prompt);
    const answers = await Promise.all([serialized('a'), serialized('b')]);

    expect(answers).toEqual(['A', 'B']);
    expect(events).toEqual(['start a', 'end a', 'start b', 'end b']);
  });

  it('keeps going after a failed prompt', async () => {
    const serialized = serializePrompt(async (candidate) => {
      if (candidate === 'bad') throw new Error('closed');
      return candidate;
    });

    const first = serialized('bad');
    const second = serialized('good');

    await expect(first).rejects.toThrow('closed');
    await expect(second).resolves.toBe('good');
  });
});

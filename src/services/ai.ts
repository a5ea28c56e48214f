import { z } from 'zod';
import { scriptName, type AppConfig } from '../config/index.js';
import { requestOk, readJson, type FetchLike } from '../lib/http.js';
import type { Logger } from '../lib/logger.js';
import type { DictionaryLookup, RelatedWordSource, SimilarWord } from '../types/index.js';
import type { ClientOptions } from './azure.js';
import { withRetry } from './retry.js';

const SYSTEM_PROMPT = 'You are a Taiwanese Mandarin Study Assistant generating study material';

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string() }),
      })
    )
    .min(1),
});

export function buildUserPrompt(word: string, script: string): string {
  return [
    `Generate 5 words closely related to ${word} which are used commonly in Taiwanese Mandarin.`,
    `You should provide the words in ${script} and the English Translation in CSV format with two columns.`,
  ].join('\n');
}

/**
 * Pull related words out of the model's CSV-ish reply.
 * Keeps rows with at least two columns whose first column is Mandarin;
 * anything after the first comma is the translation.
 *
 * e.g., "朋友, friend\nWord, Translation" -> [{ word: "朋友", translation: "friend" }]
 */
export function parseSimilarWords(content: string, dictionary: DictionaryLookup): SimilarWord[] {
  const similarWords: SimilarWord[] = [];

  for (const line of content.split('\n')) {
    const columns = line.split(',');
    if (columns.length < 2 || dictionary.classifyScript(columns[0]) !== 'mandarin') {
      continue;
    }

    similarWords.push({
      word: columns[0].trim(),
      translation: columns.slice(1).join(',').trim(),
    });
  }

  return similarWords;
}

/**
 * Related-word suggestions from an OpenAI-compatible chat completions API
 */
export class OpenRouterRelatedWords implements RelatedWordSource {
  private readonly fetchFn: FetchLike;

  constructor(
    private readonly config: AppConfig,
    private readonly dictionary: DictionaryLookup,
    private readonly logger: Logger,
    private readonly options: ClientOptions = {}
  ) {
    this.fetchFn = options.fetch ?? fetch;
  }

  async suggest(word: string): Promise<SimilarWord[]> {
    const { apiKey, baseUrl, model } = this.config.openrouter;

    const body = await withRetry(
      async () => {
        const response = await requestOk('OpenRouter', this.fetchFn, `${baseUrl}/chat/completions`, {
          method: 'POST',
          headers: {
            'Authorization': `Bearer ${apiKey}`,
            'Content-Type': 'application/json',
            'X-Title': 'mandarin-anki',
          },
          body: JSON.stringify({
            model,
            messages: [
              {
                role: 'system',
                content: SYSTEM_PROMPT,
              },
              {
                role: 'user',
                content: buildUserPrompt(word, scriptName(this.config.mandarin.script)),
              },
            ],
          }),
        });
        return readJson('OpenRouter', response, ChatCompletionSchema);
      },
      this.config.retry,
      { label: 'similar words', logger: this.logger, sleep: this.options.sleep, random: this.options.random }
    );
    this.logger.trace(`Chat completion response: ${JSON.stringify(body)}`);

    const similarWords = parseSimilarWords(body.choices[0].message.content, this.dictionary);
    this.logger.debug(`Similar words parsed: ${JSON.stringify(similarWords)}`);
    return similarWords;
  }
}

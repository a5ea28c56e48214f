import { z } from 'zod';
import { scriptCode, scriptLanguage, type AppConfig } from '../config/index.js';
import { requestOk, readJson, type FetchLike } from '../lib/http.js';
import type { Logger } from '../lib/logger.js';
import type { SpeechSynthesizer, Translator, Transliterator } from '../types/index.js';
import { withRetry, type RetryOptions } from './retry.js';

const TRANSLATOR_BASE_URL = 'https://api.cognitive.microsofttranslator.com';
const SPEECH_OUTPUT_FORMAT = 'audio-48khz-192kbitrate-mono-mp3';

const TranslateResponseSchema = z
  .array(
    z.object({
      translations: z.array(z.object({ text: z.string() })).min(1),
    })
  )
  .min(1);

const TransliterateResponseSchema = z
  .array(
    z.object({
      text: z.string(),
      script: z.string().optional(),
    })
  )
  .min(1);

export interface ClientOptions {
  fetch?: FetchLike;
  sleep?: RetryOptions['sleep'];
  random?: RetryOptions['random'];
}

function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/**
 * Build the SSML document sent to the speech service
 */
export function buildSsml(text: string, voiceName: string, locale: string): string {
  return [
    `<speak version='1.0' xml:lang='${locale}'>`,
    `<voice xml:lang='${locale}' name='${voiceName}'>`,
    escapeXml(text),
    '</voice>',
    '</speak>',
  ].join('');
}

/**
 * Azure Translator (translate + transliterate) and Azure Speech (TTS).
 * Every call runs under the retry policy.
 */
export class AzureClient implements Translator, Transliterator, SpeechSynthesizer {
  private readonly fetchFn: FetchLike;

  constructor(
    private readonly config: AppConfig,
    private readonly logger: Logger,
    private readonly options: ClientOptions = {}
  ) {
    this.fetchFn = options.fetch ?? fetch;
  }

  /**
   * Translate Mandarin text to English
   */
  async translate(text: string): Promise<string> {
    const url = `${TRANSLATOR_BASE_URL}/translate?api-version=3.0&to=en`;

    const body = await this.retry('translate', async () => {
      const response = await requestOk('Azure Translator', this.fetchFn, url, {
        method: 'POST',
        headers: this.translatorHeaders(),
        body: JSON.stringify([{ text }]),
      });
      return readJson('Azure Translator', response, TranslateResponseSchema);
    });
    this.logger.trace(`Translation response: ${JSON.stringify(body)}`);

    const english = body[0].translations[0].text;
    this.logger.debug(`English text from translation: ${english}`);
    return english;
  }

  /**
   * Romanize Mandarin text to tone-marked pinyin
   */
  async transliterate(text: string): Promise<string> {
    const { script } = this.config.mandarin;
    const params = new URLSearchParams({
      'api-version': '3.0',
      language: scriptLanguage(script),
      fromScript: scriptCode(script),
      toScript: 'Latn',
    });
    const url = `${TRANSLATOR_BASE_URL}/transliterate?${params.toString()}`;

    const body = await this.retry('transliterate', async () => {
      const response = await requestOk('Azure Transliterator', this.fetchFn, url, {
        method: 'POST',
        headers: this.translatorHeaders(),
        body: JSON.stringify([{ text }]),
      });
      return readJson('Azure Transliterator', response, TransliterateResponseSchema);
    });
    this.logger.trace(`Transliteration response: ${JSON.stringify(body)}`);

    return body[0].text;
  }

  /**
   * Synthesize speech for the text, returning MP3 bytes
   */
  async synthesize(text: string): Promise<Buffer> {
    const { region, speech } = this.config.azure;
    const url = `https://${region}.tts.speech.microsoft.com/cognitiveservices/v1`;

    const audio = await this.retry('synthesize', async () => {
      const response = await requestOk('Azure Speech', this.fetchFn, url, {
        method: 'POST',
        headers: {
          'Ocp-Apim-Subscription-Key': speech.key,
          'Content-Type': 'application/ssml+xml',
          'X-Microsoft-OutputFormat': SPEECH_OUTPUT_FORMAT,
          'User-Agent': 'mandarin-anki',
        },
        body: buildSsml(text, speech.voiceName, speech.locale),
      });
      return Buffer.from(await response.arrayBuffer());
    });
    this.logger.trace(`Speech response: ${audio.length} bytes for "${text}"`);

    return audio;
  }

  private translatorHeaders(): Record<string, string> {
    return {
      'Ocp-Apim-Subscription-Key': this.config.azure.translatorKey,
      'Ocp-Apim-Subscription-Region': this.config.azure.region,
      'Content-Type': 'application/json; charset=UTF-8',
    };
  }

  private retry<T>(label: string, operation: () => Promise<T>): Promise<T> {
    return withRetry(operation, this.config.retry, {
      label,
      logger: this.logger,
      sleep: this.options.sleep,
      random: this.options.random,
    });
  }
}

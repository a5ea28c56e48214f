import 'dotenv/config';
import { ConfigError } from '../lib/errors.js';
import type { MandarinReading, MandarinScript } from '../types/index.js';
import type { RetryPolicy } from '../services/retry.js';

export interface AnkiConfig {
  deckId: number;
  deckName: string;
  deckDescription: string;
  wordModelId: number;
  sentenceModelId: number;
}

export interface AzureConfig {
  region: string;
  translatorKey: string;
  speech: {
    key: string;
    voiceName: string;
    locale: string;
  };
}

export interface OpenRouterConfig {
  apiKey: string;
  model: string;
  baseUrl: string;
}

export interface AppConfig {
  anki: AnkiConfig;
  azure: AzureConfig;
  openrouter: OpenRouterConfig;
  mandarin: {
    script: MandarinScript;
    reading: MandarinReading;
  };
  dictionary: {
    path: string;
    cacheSize: number;
  };
  retry: RetryPolicy;
}

type Env = Record<string, string | undefined>;

function parseInteger(env: Env, name: string, fallback: number | null, problems: string[]): number {
  const raw = env[name]?.trim();
  if (!raw) {
    if (fallback === null) {
      problems.push(`${name} is required`);
      return 0;
    }
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value < 0) {
    problems.push(`${name} must be a non-negative integer (got "${raw}")`);
    return 0;
  }
  return value;
}

function parseChoice<T extends string>(
  env: Env,
  name: string,
  choices: readonly T[],
  fallback: T,
  problems: string[]
): T {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) {
    return fallback;
  }

  const match = choices.find(choice => choice === raw);
  if (match === undefined) {
    problems.push(`${name} must be one of ${choices.join(', ')} (got "${raw}")`);
    return fallback;
  }
  return match;
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (child !== null && typeof child === 'object') {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

/**
 * Validate required settings.
 * Returns the list of problems; empty when the configuration is usable.
 */
export function validateConfig(config: AppConfig): string[] {
  const errors: string[] = [];

  if (!config.azure.region) errors.push('AZURE_REGION is required');
  if (!config.azure.translatorKey) errors.push('AZURE_TRANSLATOR_KEY is required');
  if (!config.azure.speech.key) errors.push('AZURE_SPEECH_KEY is required');
  if (!config.openrouter.apiKey) errors.push('OPENROUTER_API_KEY is required');
  if (!config.openrouter.model) errors.push('OPENROUTER_MODEL is required');

  if (config.anki.wordModelId !== 0 && config.anki.wordModelId === config.anki.sentenceModelId) {
    errors.push('ANKI_WORD_MODEL_ID and ANKI_SENTENCE_MODEL_ID must differ');
  }

  if (config.retry.baseDelayMs > config.retry.maxDelayMs) {
    errors.push('RETRY_BASE_DELAY_MS must not exceed RETRY_MAX_DELAY_MS');
  }

  return errors;
}

/**
 * Read the configuration from the environment (and .env).
 * Throws a ConfigError listing every problem found.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const problems: string[] = [];

  const config: AppConfig = {
    anki: {
      deckId: parseInteger(env, 'ANKI_DECK_ID', null, problems),
      deckName: env.ANKI_DECK_NAME?.trim() || 'Generated Mandarin Flashcards',
      deckDescription: 'Mandarin words and sentences with readings, translations and audio',
      wordModelId: parseInteger(env, 'ANKI_WORD_MODEL_ID', null, problems),
      sentenceModelId: parseInteger(env, 'ANKI_SENTENCE_MODEL_ID', null, problems),
    },

    azure: {
      region: env.AZURE_REGION?.trim() || '',
      translatorKey: env.AZURE_TRANSLATOR_KEY?.trim() || '',
      speech: {
        key: env.AZURE_SPEECH_KEY?.trim() || '',
        voiceName: env.AZURE_SPEECH_VOICE?.trim() || 'zh-TW-YunJheNeural',
        locale: env.AZURE_SPEECH_LOCALE?.trim() || 'zh-TW',
      },
    },

    // Any OpenAI-compatible chat completions endpoint works here
    openrouter: {
      apiKey: env.OPENROUTER_API_KEY?.trim() || '',
      model: env.OPENROUTER_MODEL?.trim() || '',
      baseUrl: (env.OPENROUTER_BASE_URL?.trim() || 'https://openrouter.ai/api/v1').replace(/\/+$/, ''),
    },

    mandarin: {
      script: parseChoice(env, 'MANDARIN_SCRIPT', ['traditional', 'simplified'] as const, 'traditional', problems),
      reading: parseChoice(env, 'MANDARIN_READING', ['zhuyin', 'pinyin'] as const, 'zhuyin', problems),
    },

    dictionary: {
      path: env.CEDICT_DB_PATH?.trim() || 'data/cedict.sqlite',
      cacheSize: 5000,
    },

    retry: {
      maxRetries: parseInteger(env, 'RETRY_MAX_RETRIES', 5, problems),
      baseDelayMs: parseInteger(env, 'RETRY_BASE_DELAY_MS', 1000, problems),
      maxDelayMs: parseInteger(env, 'RETRY_MAX_DELAY_MS', 120_000, problems),
    },
  };

  problems.push(...validateConfig(config));
  if (problems.length > 0) {
    throw new ConfigError(problems);
  }

  return deepFreeze(config);
}

/**
 * Azure language tag for the configured script
 */
export function scriptLanguage(script: MandarinScript): string {
  return script === 'traditional' ? 'zh-Hant' : 'zh-Hans';
}

/**
 * ISO 15924 code for the configured script
 */
export function scriptCode(script: MandarinScript): string {
  return script === 'traditional' ? 'Hant' : 'Hans';
}

export function scriptName(script: MandarinScript): string {
  return script === 'traditional' ? 'Traditional Chinese' : 'Simplified Chinese';
}

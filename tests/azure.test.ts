import { describe, it, expect } from 'vitest';
import { ServiceError } from '../src/lib/errors.js';
import { silentLogger } from '../src/lib/logger.js';
import { AzureClient, buildSsml } from '../src/services/azure.js';
import { fakeFetch, header, jsonResponse } from './helpers/fetch.js';
import { testConfig } from './helpers/fixtures.js';

const noSleep = async (): Promise<void> => {};

describe('buildSsml', () => {
  it('wraps the text in a voice element', () => {
    expect(buildSsml('你好', 'zh-TW-YunJheNeural', 'zh-TW')).toBe(
      "<speak version='1.0' xml:lang='zh-TW'><voice xml:lang='zh-TW' name='zh-TW-YunJheNeural'>你好</voice></speak>"
    );
  });

  it('escapes XML special characters', () => {
    expect(buildSsml('A&B <c>', 'v', 'zh-TW')).toContain('>A&amp;B &lt;c&gt;<');
  });
});

describe('AzureClient', () => {
  describe('translate', () => {
    it('posts the text and returns the English translation', async () => {
      const { fetch, requests } = fakeFetch(jsonResponse([{ translations: [{ text: 'Hello', to: 'en' }] }]));
      const client = new AzureClient(testConfig(), silentLogger(), { fetch });

      await expect(client.translate('你好')).resolves.toBe('Hello');

      expect(requests).toHaveLength(1);
      expect(requests[0].url).toBe('https://api.cognitive.microsofttranslator.com/translate?api-version=3.0&to=en');
      expect(requests[0].init.method).toBe('POST');
      expect(requests[0].init.body).toBe('[{"text":"你好"}]');
      expect(header(requests[0], 'Ocp-Apim-Subscription-Key')).toBe('test-translator-key');
      expect(header(requests[0], 'Ocp-Apim-Subscription-Region')).toBe('testregion');
    });

    it('retries a failed request', async () => {
      const { fetch, requests } = fakeFetch(
        new Response('busy', { status: 429 }),
        new TypeError('fetch failed'),
        jsonResponse([{ translations: [{ text: 'Hello' }] }])
      );
      const client = new AzureClient(testConfig(), silentLogger(), { fetch, sleep: noSleep });

      await expect(client.translate('你好')).resolves.toBe('Hello');
      expect(requests).toHaveLength(3);
    });

    it('fails with a ServiceError once retries are used up', async () => {
      const { fetch, requests } = fakeFetch(
        new Response('denied', { status: 401 }),
        new Response('denied', { status: 401 }),
        new Response('denied', { status: 401 })
      );
      const client = new AzureClient(testConfig(), silentLogger(), { fetch, sleep: noSleep });

      const error = await client.translate('你好').catch((e: unknown) => e);
      expect(error).toBeInstanceOf(ServiceError);
      expect(error instanceof ServiceError && error.status).toBe(401);
      expect(error instanceof ServiceError && error.message).toBe('Azure Translator API error (401): denied');
      expect(requests).toHaveLength(3);
    });

    it('rejects a reply of the wrong shape', async () => {
      const bad = () => jsonResponse([{ translations: [] }]);
      const { fetch } = fakeFetch(bad(), bad(), bad());
      const client = new AzureClient(testConfig(), silentLogger(), { fetch, sleep: noSleep });

      await expect(client.translate('你好')).rejects.toBeInstanceOf(ServiceError);
    });
  });

  describe('transliterate', () => {
    it('requests Latin script for the configured Mandarin script', async () => {
      const { fetch, requests } = fakeFetch(jsonResponse([{ text: 'nǐ hǎo', script: 'Latn' }]));
      const client = new AzureClient(testConfig(), silentLogger(), { fetch });

      await expect(client.transliterate('你好')).resolves.toBe('nǐ hǎo');
      expect(requests[0].url).toBe(
        'https://api.cognitive.microsofttranslator.com/transliterate?api-version=3.0&language=zh-Hant&fromScript=Hant&toScript=Latn'
      );
    });

    it('uses Hans for simplified text', async () => {
      const { fetch, requests } = fakeFetch(jsonResponse([{ text: 'nǐ hǎo' }]));
      const config = testConfig({ mandarin: { script: 'simplified', reading: 'pinyin' } });
      const client = new AzureClient(config, silentLogger(), { fetch });

      await client.transliterate('你好');
      expect(requests[0].url).toContain('language=zh-Hans&fromScript=Hans');
    });
  });

  describe('synthesize', () => {
    it('posts SSML to the regional endpoint and returns the audio', async () => {
      const { fetch, requests } = fakeFetch(new Response(new Uint8Array([1, 2, 3])));
      const client = new AzureClient(testConfig(), silentLogger(), { fetch });

      const audio = await client.synthesize('你好');

      expect([...audio]).toEqual([1, 2, 3]);
      expect(requests[0].url).toBe('https://testregion.tts.speech.microsoft.com/cognitiveservices/v1');
      expect(requests[0].init.body).toBe(
        "<speak version='1.0' xml:lang='zh-TW'><voice xml:lang='zh-TW' name='zh-TW-YunJheNeural'>你好</voice></speak>"
      );
      expect(header(requests[0], 'Ocp-Apim-Subscription-Key')).toBe('test-speech-key');
      expect(header(requests[0], 'Content-Type')).toBe('application/ssml+xml');
      expect(header(requests[0], 'X-Microsoft-OutputFormat')).toBe('audio-48khz-192kbitrate-mono-mp3');
    });
  });
});

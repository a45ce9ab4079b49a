import { ProviderError } from '../../src/errors';
import { AnthropicTranslator } from '../../src/translators/anthropic';
import { BaiduTranslator, fromBaiduCode, signBaiduRequest, toBaiduCode } from '../../src/translators/baidu';
import { HttpClient, HttpRequestInit } from '../../src/translators/base';
import { GoogleTranslateTranslator } from '../../src/translators/google';
import { OllamaTranslator } from '../../src/translators/ollama';
import { OpenAITranslator } from '../../src/translators/openai';

interface FakeReply {
  status?: number;
  body: unknown;
}

interface RecordedCall {
  url: string;
  init: HttpRequestInit;
}

function fakeHttp(...replies: FakeReply[]): { http: HttpClient; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const http: HttpClient = async (url, init) => {
    calls.push({ url, init });
    const reply = replies.shift() ?? { status: 500, body: 'no reply queued' };
    const status = reply.status ?? 200;
    return {
      ok: status >= 200 && status < 300,
      status,
      json: async () => reply.body,
      text: async () => (typeof reply.body === 'string' ? reply.body : JSON.stringify(reply.body)),
    };
  };
  return { http, calls };
}

function jsonBody(call: RecordedCall): unknown {
  return JSON.parse(call.init.body ?? '');
}

describe('Translators', () => {
  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('OpenAITranslator', () => {
    it('should post a chat completion and shape the result', async () => {
      const { http, calls } = fakeHttp({
        body: {
          choices: [{ message: { content: ' Bonjour le monde ' } }],
          usage: { prompt_tokens: 10, completion_tokens: 4, total_tokens: 14 },
        },
      });
      const translator = new OpenAITranslator({ apiKey: 'test-secret', http });

      const result = await translator.translate('Hello world', 'en', 'fr', { style: 'formal' });

      expect(result).toEqual({
        providerId: 'openai',
        model: 'gpt-4o-mini',
        translatedText: 'Bonjour le monde',
        resolvedSourceLang: 'en',
        targetLang: 'fr',
        confidenceScore: 0.9,
        processingTimeMs: expect.any(Number),
        wordCount: 2,
        characterCount: 11,
        metadata: {
          style: 'formal',
          usage: { prompt_tokens: 10, completion_tokens: 4, total_tokens: 14 },
        },
      });
      expect(calls[0].url).toBe('https://api.openai.com/v1/chat/completions');
      expect(calls[0].init.headers.Authorization).toBe('Bearer test-secret');

      const body = jsonBody(calls[0]);
      expect(body).toMatchObject({ model: 'gpt-4o-mini', temperature: 0.3 });
      expect(JSON.stringify(body)).toContain('Translate the following English text into French. The translation should be formal and rigorous');
    });

    it('should send the model override', async () => {
      const { http, calls } = fakeHttp({ body: { choices: [{ message: { content: 'Hola' } }] } });
      const translator = new OpenAITranslator({ apiKey: 'test-secret', http });

      const result = await translator.translate('Hello', 'en', 'es', { model: 'gpt-4o' });

      expect(result.model).toBe('gpt-4o');
      expect(jsonBody(calls[0])).toMatchObject({ model: 'gpt-4o' });
    });

    it('should wrap API errors', async () => {
      const { http } = fakeHttp({ status: 429, body: 'slow down' });
      const translator = new OpenAITranslator({ apiKey: 'test-secret', http });

      const attempt = translator.translate('Hello', 'en', 'fr');
      await expect(attempt).rejects.toBeInstanceOf(ProviderError);
      await expect(attempt).rejects.toThrow('openai translation failed: OpenAI API error: 429 - slow down');
    });

    it('should reject an empty translation', async () => {
      const { http } = fakeHttp({ body: { choices: [{ message: { content: '   ' } }] } });
      const translator = new OpenAITranslator({ apiKey: 'test-secret', http });

      await expect(translator.translate('Hello world', 'en', 'fr')).rejects.toThrow(
        'openai translation failed: Empty translation for input "Hello world"'
      );
    });

    it('should warn when a multi-word input comes back unchanged', async () => {
      const { http } = fakeHttp({ body: { choices: [{ message: { content: 'Hello world' } }] } });
      const translator = new OpenAITranslator({ apiKey: 'test-secret', http });

      const result = await translator.translate('Hello world', 'en', 'fr');

      expect(result.translatedText).toBe('Hello world');
      expect(console.warn).toHaveBeenCalledWith(expect.stringContaining('OpenAI returned the input unchanged'));
    });
  });

  describe('AnthropicTranslator', () => {
    it('should join text blocks and map usage', async () => {
      const { http, calls } = fakeHttp({
        body: {
          content: [{ type: 'text', text: 'Hola ' }, { type: 'tool_use' }, { type: 'text', text: 'mundo' }],
          usage: { input_tokens: 12, output_tokens: 3 },
        },
      });
      const translator = new AnthropicTranslator({ apiKey: 'test-secret', http });

      const result = await translator.translate('Hello world', 'en', 'es');

      expect(result.translatedText).toBe('Hola mundo');
      expect(result.confidenceScore).toBe(0.88);
      expect(result.metadata).toEqual({ style: 'natural', usage: { inputTokens: 12, outputTokens: 3 } });
      expect(calls[0].url).toBe('https://api.anthropic.com/v1/messages');
      expect(calls[0].init.headers['x-api-key']).toBe('test-secret');
      expect(calls[0].init.headers['anthropic-version']).toBe('2023-06-01');
    });
  });

  describe('GoogleTranslateTranslator', () => {
    it('should let the service detect the source for auto', async () => {
      const { http, calls } = fakeHttp({
        body: { data: { translations: [{ translatedText: 'Hello', detectedSourceLanguage: 'de' }] } },
      });
      const translator = new GoogleTranslateTranslator({ apiKey: 'test-secret', http });

      const result = await translator.translate('Hallo', 'auto', 'en');

      expect(calls[0].url).toBe('https://translation.googleapis.com/language/translate/v2?key=test-secret');
      expect(jsonBody(calls[0])).toEqual({ q: 'Hallo', target: 'en', format: 'text' });
      expect(result.resolvedSourceLang).toBe('de');
      expect(result.metadata).toEqual({ detectedLanguage: 'de' });
      expect(result.model).toBe('translate-v2');
    });

    it('should pass an explicit source language', async () => {
      const { http, calls } = fakeHttp({ body: { data: { translations: [{ translatedText: 'Bonjour' }] } } });
      const translator = new GoogleTranslateTranslator({ apiKey: 'test-secret', http });

      const result = await translator.translate('Hello', 'en', 'fr');

      expect(jsonBody(calls[0])).toEqual({ q: 'Hello', target: 'fr', format: 'text', source: 'en' });
      expect(result.resolvedSourceLang).toBe('en');
      expect(result.metadata).toEqual({});
    });

    it('should report service errors', async () => {
      const { http } = fakeHttp({ status: 403, body: { error: { code: 403, message: 'API key not valid' } } });
      const translator = new GoogleTranslateTranslator({ apiKey: 'test-secret', http });

      await expect(translator.translate('Hello', 'en', 'fr')).rejects.toThrow(
        'google translation failed: Google Translate API error: 403 - API key not valid'
      );
    });
  });

  describe('BaiduTranslator', () => {
    it('should map language codes both ways', () => {
      expect(toBaiduCode('ja')).toBe('jp');
      expect(toBaiduCode('zh')).toBe('zh');
      expect(fromBaiduCode('fra')).toBe('fr');
      expect(fromBaiduCode('en')).toBe('en');
    });

    it('should sign the form request', async () => {
      const { http, calls } = fakeHttp({
        body: { from: 'en', to: 'jp', trans_result: [{ src: 'Hello', dst: 'こんにちは' }] },
      });
      const translator = new BaiduTranslator({ appId: 'test-app', secretKey: 'test-secret', http, salt: () => '12345' });

      const result = await translator.translate('Hello', 'en', 'ja');

      const params = new URLSearchParams(calls[0].init.body);
      expect(calls[0].init.headers['Content-Type']).toBe('application/x-www-form-urlencoded');
      expect(params.get('q')).toBe('Hello');
      expect(params.get('from')).toBe('en');
      expect(params.get('to')).toBe('jp');
      expect(params.get('appid')).toBe('test-app');
      expect(params.get('salt')).toBe('12345');
      expect(params.get('sign')).toBe(signBaiduRequest('test-app', 'Hello', '12345', 'test-secret'));
      expect(params.get('sign')).toMatch(/^[0-9a-f]{32}$/);
      expect(result.translatedText).toBe('こんにちは');
      expect(result.confidenceScore).toBe(0.82);
    });

    it('should join one result per line and report the detected source', async () => {
      const { http } = fakeHttp({
        body: { from: 'kor', to: 'zh', trans_result: [{ src: 'a', dst: '第一行' }, { src: 'b', dst: '第二行' }] },
      });
      const translator = new BaiduTranslator({ appId: 'test-app', secretKey: 'test-secret', http });

      const result = await translator.translate('안녕\n잘 가', 'auto', 'zh');

      expect(result.translatedText).toBe('第一行\n第二行');
      expect(result.resolvedSourceLang).toBe('ko');
    });

    it('should surface API error codes', async () => {
      const { http } = fakeHttp({ body: { error_code: '54001', error_msg: 'Invalid Sign' } });
      const translator = new BaiduTranslator({ appId: 'test-app', secretKey: 'test-secret', http });

      await expect(translator.translate('Hello', 'en', 'zh')).rejects.toThrow(
        'baidu translation failed: Baidu API error: 54001 - Invalid Sign'
      );
    });
  });

  describe('OllamaTranslator', () => {
    it('should strip reasoning blocks from the reply', async () => {
      const { http, calls } = fakeHttp({
        body: { response: '<think>weighing options</think>\nHallo Welt', prompt_eval_count: 30, eval_count: 5 },
      });
      const translator = new OllamaTranslator({ http });

      const result = await translator.translate('Hello world', 'en', 'de');

      expect(calls[0].url).toBe('http://localhost:11434/api/generate');
      expect(jsonBody(calls[0])).toMatchObject({ model: 'llama3.1:8b', stream: false });
      expect(result.translatedText).toBe('Hallo Welt');
      expect(result.confidenceScore).toBe(0.75);
      expect(result.metadata).toEqual({ style: 'natural', usage: { inputTokens: 30, outputTokens: 5 } });
    });

    it('should retry failed attempts', async () => {
      const { http, calls } = fakeHttp({ status: 500, body: 'busy' }, { body: { response: 'Hallo' } });
      const translator = new OllamaTranslator({ http, retryDelayMs: 0 });

      const result = await translator.translate('Hello', 'en', 'de');

      expect(calls).toHaveLength(2);
      expect(result.translatedText).toBe('Hallo');
    });

    it('should give up after the configured attempts', async () => {
      const { http, calls } = fakeHttp({ status: 500, body: 'busy' }, { status: 500, body: 'busy' });
      const translator = new OllamaTranslator({ http, maxRetries: 2, retryDelayMs: 0 });

      await expect(translator.translate('Hello', 'en', 'de')).rejects.toThrow(
        'ollama translation failed: Translation failed after 2 attempts: Ollama API error: 500'
      );
      expect(calls).toHaveLength(2);
    });

    it('should check that the configured model is installed', async () => {
      const { http, calls } = fakeHttp({ body: { models: [{ name: 'llama3.1:8b' }, { name: 'qwen2.5:7b' }] } });
      const translator = new OllamaTranslator({ baseUrl: 'http://ollama.test:11434', http });

      await expect(translator.isAvailable()).resolves.toBe(true);
      expect(calls[0].url).toBe('http://ollama.test:11434/api/tags');
      expect(calls[0].init.method).toBe('GET');
      expect(calls[0].init.body).toBeUndefined();
    });

    it('should report unavailable when the server cannot be reached', async () => {
      const http: HttpClient = () => Promise.reject(new Error('connect ECONNREFUSED'));
      const translator = new OllamaTranslator({ http });

      await expect(translator.isAvailable()).resolves.toBe(false);
    });
  });
});

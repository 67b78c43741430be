/**
 * Tests for the HTTP translation engines
 *
 * Requests are answered in process by a fake fetch; nothing leaves the machine.
 */

import { Response } from 'node-fetch';
import type { RequestInit } from 'node-fetch';
import { OpenAIEngine, DeepLEngine, createEngine, FetchLike } from '../engines';
import { toDeepLMarkup, fromDeepLMarkup } from '../engines/deepl';
import { postJson } from '../engines/http';
import { buildTranslationPrompt } from '../translate/prompts';
import { TranslationServiceError } from '../core/errors';
import { Settings } from '../config/settings';

interface RecordedRequest {
  url: string;
  init?: RequestInit;
}

/**
 * Fake fetch answering every request with the same response
 */
function fakeFetch(
  body: unknown,
  init: { status?: number; statusText?: string } = {}
): { fetch: FetchLike; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  const fetch: FetchLike = async (url, requestInit) => {
    requests.push({ url, init: requestInit });
    const text = typeof body === 'string' ? body : JSON.stringify(body);
    return new Response(text, { status: init.status ?? 200, statusText: init.statusText });
  };
  return { fetch, requests };
}

function sentBody(request: RecordedRequest): unknown {
  return JSON.parse(String(request.init?.body));
}

const chatReply = (content: string) => ({
  id: 'chatcmpl-test',
  choices: [{ index: 0, message: { role: 'assistant', content } }],
});

const baseOptions = { apiKey: 'test-key', apiUrl: 'http://test.local/v1', timeoutMs: 1000 };

describe('postJson', () => {
  it('should include status and body of failed responses', async () => {
    const { fetch } = fakeFetch('{"error":"bad key"}', { status: 401, statusText: 'Unauthorized' });

    const promise = postJson('http://test.local/x', {}, { timeoutMs: 1000, fetch });

    await expect(promise).rejects.toBeInstanceOf(TranslationServiceError);
    await expect(promise).rejects.toMatchObject({ status: 401, message: 'API error 401: {"error":"bad key"}' });
  });

  it('should fall back to the status text for empty error bodies', async () => {
    const { fetch } = fakeFetch('', { status: 503, statusText: 'Service Unavailable' });

    await expect(postJson('http://test.local/x', {}, { timeoutMs: 1000, fetch }))
      .rejects.toThrow('API error 503: Service Unavailable');
  });

  it('should reject bodies that are not JSON', async () => {
    const { fetch } = fakeFetch('<html>oops</html>');

    await expect(postJson('http://test.local/x', {}, { timeoutMs: 1000, fetch }))
      .rejects.toThrow('Invalid JSON in response from http://test.local/x');
  });

  it('should wrap network errors', async () => {
    const fetch: FetchLike = async () => {
      throw new Error('connect ECONNREFUSED');
    };

    await expect(postJson('http://test.local/x', {}, { timeoutMs: 1000, fetch }))
      .rejects.toThrow('Network error calling http://test.local/x: connect ECONNREFUSED');
  });
});

describe('OpenAIEngine', () => {
  it('should send a chat completion request', async () => {
    const { fetch, requests } = fakeFetch(chatReply('["Hola", "Adiós"]'));
    const engine = new OpenAIEngine({ ...baseOptions, model: 'test-model', fetch });

    await engine.translateBatch(['Hello', 'Goodbye'], { targetLanguage: 'es', sourceLanguage: 'en' });

    const prompt = buildTranslationPrompt(['Hello', 'Goodbye'], 'es', 'en');
    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe('http://test.local/v1/chat/completions');
    expect(requests[0].init?.method).toBe('POST');
    expect(requests[0].init?.headers).toEqual({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-key',
    });
    expect(sentBody(requests[0])).toEqual({
      model: 'test-model',
      temperature: 0,
      messages: [
        { role: 'system', content: prompt.system },
        { role: 'user', content: prompt.user },
      ],
    });
  });

  it('should read translations from a fenced reply', async () => {
    const { fetch } = fakeFetch(chatReply('```json\n["Hola", "Adiós"]\n```'));
    const engine = new OpenAIEngine({ ...baseOptions, model: 'test-model', fetch });

    await expect(engine.translateBatch(['Hello', 'Goodbye'], { targetLanguage: 'es' }))
      .resolves.toEqual(['Hola', 'Adiós']);
  });

  it('should reject a reply with the wrong number of translations', async () => {
    const { fetch } = fakeFetch(chatReply('["Hola"]'));
    const engine = new OpenAIEngine({ ...baseOptions, model: 'test-model', fetch });

    await expect(engine.translateBatch(['Hello', 'Goodbye'], { targetLanguage: 'es' }))
      .rejects.toThrow('Expected 2 translations, got 1');
  });

  it('should reject a reply that is not a list', async () => {
    const { fetch } = fakeFetch(chatReply('Hola, Adiós'));
    const engine = new OpenAIEngine({ ...baseOptions, model: 'test-model', fetch });

    await expect(engine.translateBatch(['Hello', 'Goodbye'], { targetLanguage: 'es' }))
      .rejects.toThrow('Chat completion reply is not a JSON array of strings');
  });

  it('should reject a response without choices', async () => {
    const { fetch } = fakeFetch({ choices: [] });
    const engine = new OpenAIEngine({ ...baseOptions, model: 'test-model', fetch });

    await expect(engine.translateBatch(['Hello'], { targetLanguage: 'es' }))
      .rejects.toThrow('Chat completion response has no message content');
  });

  it('should not call the API without texts', async () => {
    const { fetch, requests } = fakeFetch(chatReply('[]'));
    const engine = new OpenAIEngine({ ...baseOptions, model: 'test-model', fetch });

    await expect(engine.translateBatch([], { targetLanguage: 'es' })).resolves.toEqual([]);
    expect(requests).toHaveLength(0);
  });
});

describe('DeepLEngine', () => {
  const deeplOptions = { ...baseOptions, apiUrl: 'http://test.local' };

  it('should turn placeholders into XML tags and back', () => {
    expect(toDeepLMarkup('Open {{0}}file{{1}} & more')).toBe('Open <x i="0"/>file<x i="1"/> &amp; more');
    expect(fromDeepLMarkup('Ouvrir <x i="0"/>fichier<x i="1" /> &amp; plus')).toBe('Ouvrir {{0}}fichier{{1}} & plus');
  });

  it('should send texts with XML tag handling', async () => {
    const { fetch, requests } = fakeFetch({
      translations: [{ detected_source_language: 'EN', text: 'Ouvrir <x i="0"/>fichier<x i="1"/>' }],
    });
    const engine = new DeepLEngine({ ...deeplOptions, fetch });

    const result = await engine.translateBatch(['Open {{0}}file{{1}}'], { targetLanguage: 'pt-BR', sourceLanguage: 'en-US' });

    expect(result).toEqual(['Ouvrir {{0}}fichier{{1}}']);
    expect(requests[0].url).toBe('http://test.local/v2/translate');
    expect(requests[0].init?.headers).toEqual({
      'Content-Type': 'application/json',
      Authorization: 'DeepL-Auth-Key test-key',
    });
    expect(sentBody(requests[0])).toEqual({
      text: ['Open <x i="0"/>file<x i="1"/>'],
      target_lang: 'PT-BR',
      tag_handling: 'xml',
      source_lang: 'EN',
    });
  });

  it('should omit the source language when unknown', async () => {
    const { fetch, requests } = fakeFetch({ translations: [{ text: 'Hallo' }] });
    const engine = new DeepLEngine({ ...deeplOptions, fetch });

    await engine.translateBatch(['Hello'], { targetLanguage: 'de' });

    expect(sentBody(requests[0])).toEqual({ text: ['Hello'], target_lang: 'DE', tag_handling: 'xml' });
  });

  it('should reject malformed responses', async () => {
    const { fetch } = fakeFetch({ message: 'nope' });
    const engine = new DeepLEngine({ ...deeplOptions, fetch });

    await expect(engine.translateBatch(['Hello'], { targetLanguage: 'de' }))
      .rejects.toThrow('DeepL response has no translations array');
  });

  it('should reject a response with the wrong number of translations', async () => {
    const { fetch } = fakeFetch({ translations: [{ text: 'Hallo' }] });
    const engine = new DeepLEngine({ ...deeplOptions, fetch });

    await expect(engine.translateBatch(['Hello', 'Bye'], { targetLanguage: 'de' }))
      .rejects.toThrow('Expected 2 translations, got 1');
  });
});

describe('createEngine', () => {
  const settings: Settings = {
    engine: 'openai',
    apiKey: 'test-key',
    apiUrl: 'http://test.local/v1',
    model: 'test-model',
    batchSize: 40,
    batchMaxChars: 8000,
    timeoutMs: 1000,
    logFile: null,
  };

  it('should create the engine named in settings', () => {
    expect(createEngine(settings)).toBeInstanceOf(OpenAIEngine);
    expect(createEngine({ ...settings, engine: 'deepl' })).toBeInstanceOf(DeepLEngine);
  });
});

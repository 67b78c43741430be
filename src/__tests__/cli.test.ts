/**
 * Tests for the command line entry point
 *
 * The DeepL engine is selected through a config file and answered by a fake fetch.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Response } from 'node-fetch';
import type { RequestInit } from 'node-fetch';
import { main, formatSummary } from '../index';
import { FetchLike } from '../engines';
import { isRecord } from '../engines/http';
import { RunResult } from '../pipeline';

const FIXTURES = path.join(__dirname, 'fixtures');

const ENV_KEYS = [
  'XLF_TRANSLATE_ENGINE',
  'XLF_TRANSLATE_API_KEY',
  'XLF_TRANSLATE_API_URL',
  'XLF_TRANSLATE_MODEL',
  'XLF_TRANSLATE_SOURCE_LANGUAGE',
  'XLF_TRANSLATE_BATCH_SIZE',
  'XLF_TRANSLATE_LOG_FILE',
  'OPENAI_API_KEY',
  'DEEPL_API_KEY',
];

function sentTexts(init?: RequestInit): string[] {
  const body: unknown = JSON.parse(String(init?.body));
  return isRecord(body) && Array.isArray(body.text) ? body.text.map(String) : [];
}

describe('CLI', () => {
  let tempDir: string;
  let configPath: string;
  let fetchCalls: number;
  let logSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  /** Echoes each text back prefixed with ES: */
  const deeplFetch: FetchLike = async (_url, init) => {
    fetchCalls++;
    const translations = sentTexts(init).map(text => ({ detected_source_language: 'EN', text: `ES:${text}` }));
    return new Response(JSON.stringify({ translations }), { status: 200 });
  };

  const unavailableFetch: FetchLike = async () => {
    fetchCalls++;
    return new Response('', { status: 503, statusText: 'Service Unavailable' });
  };

  const copyFixture = (name: string, as: string = name): string => {
    const target = path.join(tempDir, as);
    fs.copyFileSync(path.join(FIXTURES, name), target);
    return target;
  };

  const run = (args: string[], fetch: FetchLike = deeplFetch): Promise<number> =>
    main(['node', 'xlf-translate', ...args, '--config', configPath], { fetch, cwd: tempDir });

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      delete process.env[key];
    }
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'xlf-cli-'));
    configPath = path.join(tempDir, 'config.json');
    fs.writeFileSync(configPath, JSON.stringify({ engine: 'deepl', apiKey: 'test-key', apiUrl: 'http://test.local' }));
    fetchCalls = 0;
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
    errorSpy.mockRestore();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should translate a file and exit 0', async () => {
    const input = copyFixture('messages.es.xlf');

    const code = await run([input]);

    expect(code).toBe(0);
    expect(fetchCalls).toBe(1);
    const output = fs.readFileSync(path.join(tempDir, 'messages.es.translated.xlf'), 'utf-8');
    expect(output).toContain('<target>ES:Goodbye</target>');
    expect(output).toContain('<target state="translated">ES:Welcome, <x id="INTERPOLATION" equiv-text="{{ name }}"/>!</target>');
    expect(logSpy).toHaveBeenCalledWith(expect.stringContaining('Translated 2 of 2 units to es'));
  });

  it('should write in place with --inline', async () => {
    const input = copyFixture('messages.es.xlf');

    const code = await run([input, '--inline']);

    expect(code).toBe(0);
    expect(fs.readFileSync(input, 'utf-8')).toContain('<target>ES:Goodbye</target>');
  });

  it('should take the language from --language', async () => {
    const input = copyFixture('messages.es.xlf', 'messages.xlf');

    const code = await run([input, '-l', 'es', '-o', path.join(tempDir, 'out.xlf')]);

    expect(code).toBe(0);
    expect(fs.existsSync(path.join(tempDir, 'out.xlf'))).toBe(true);
  });

  it('should not call the API for a fully translated file', async () => {
    const input = copyFixture('translated.es.xlf');
    const raw = fs.readFileSync(input, 'utf-8');

    const code = await run([input, '--inline']);

    expect(code).toBe(0);
    expect(fetchCalls).toBe(0);
    expect(fs.readFileSync(input, 'utf-8')).toBe(raw);
  });

  it('should only overwrite an earlier output with --replace', async () => {
    const input = copyFixture('messages.es.xlf');

    expect(await run([input])).toBe(0);
    expect(await run([input])).toBe(2);
    expect(await run([input, '--replace'])).toBe(0);
    expect(fetchCalls).toBe(2);
  });

  it('should exit 4 when the service fails', async () => {
    const input = copyFixture('messages.es.xlf');

    const code = await run([input], unavailableFetch);

    expect(code).toBe(4);
    expect(errorSpy).toHaveBeenCalledWith(
      expect.stringContaining('2 of 2 units could not be translated: API error 503: Service Unavailable')
    );
  });

  it('should exit 2 without a target language', async () => {
    const input = copyFixture('messages.es.xlf', 'messages.xlf');

    const code = await run([input]);

    expect(code).toBe(2);
    expect(fetchCalls).toBe(0);
  });

  it('should exit 2 without an API key', async () => {
    fs.writeFileSync(configPath, JSON.stringify({ engine: 'deepl' }));
    const input = copyFixture('messages.es.xlf');

    expect(await run([input])).toBe(2);
  });

  it('should exit 3 for malformed input', async () => {
    const input = path.join(tempDir, 'broken.es.xlf');
    fs.writeFileSync(input, '<xliff version="1.2"><file>');

    expect(await run([input])).toBe(3);
  });

  it('should exit 5 for a missing input file', async () => {
    expect(await run([path.join(tempDir, 'none.es.xlf')])).toBe(5);
  });
});

describe('formatSummary', () => {
  it('should describe the run', () => {
    const result: RunResult = {
      inputPath: 'messages.es.xlf',
      outputPath: 'messages.es.translated.xlf',
      targetLanguage: 'es',
      stats: { total: 5, alreadyTranslated: 2, skipped: 1, pending: 2, translated: 1, failed: 1 },
      written: true,
      failedIds: ['b'],
      errors: [],
    };

    expect(formatSummary(result)).toEqual([
      'Translated 1 of 2 units to es',
      '  total: 5, already translated: 2, skipped: 1, failed: 1',
      '  output: messages.es.translated.xlf',
    ]);
  });

  it('should say when nothing was written', () => {
    const result: RunResult = {
      inputPath: 'messages.es.xlf',
      outputPath: 'messages.es.xlf',
      targetLanguage: 'es',
      stats: { total: 1, alreadyTranslated: 1, skipped: 0, pending: 0, translated: 0, failed: 0 },
      written: false,
      failedIds: [],
      errors: [],
    };

    expect(formatSummary(result)[2]).toBe('  output: unchanged');
  });
});

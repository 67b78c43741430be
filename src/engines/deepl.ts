/**
 * DeepL engine.
 *
 * Placeholders are sent as `<x i="n"/>` tags with XML tag handling so DeepL moves them
 * with the sentence instead of translating or dropping them.
 */

import { TranslationServiceError } from '../core/errors';
import { escapeXml, decodeEntities } from '../xliff/content';
import { postJson, isRecord } from './http';
import { EngineOptions, TranslateRequest, TranslationEngine } from './types';

const PLACEHOLDER_REGEX = /\{\{(\d+)\}\}/g;
const TAG_REGEX = /<x i="(\d+)"\s*\/>/g;

/**
 * Placeholder text → DeepL XML
 */
export function toDeepLMarkup(text: string): string {
  return escapeXml(text).replace(PLACEHOLDER_REGEX, '<x i="$1"/>');
}

/**
 * DeepL XML → placeholder text
 */
export function fromDeepLMarkup(markup: string): string {
  return decodeEntities(markup.replace(TAG_REGEX, '{{$1}}'));
}

/**
 * DeepL language codes are upper case: PT-BR, ZH-HANS
 */
export function toDeepLLanguage(code: string): string {
  return code.toUpperCase();
}

function translationTexts(response: unknown): string[] | null {
  if (!isRecord(response) || !Array.isArray(response.translations)) {
    return null;
  }

  const texts: string[] = [];
  for (const item of response.translations) {
    if (!isRecord(item) || typeof item.text !== 'string') {
      return null;
    }
    texts.push(item.text);
  }
  return texts;
}

export class DeepLEngine implements TranslationEngine {
  readonly name = 'deepl' as const;

  constructor(private readonly options: EngineOptions) {}

  async translateBatch(texts: string[], request: TranslateRequest): Promise<string[]> {
    if (texts.length === 0) {
      return [];
    }

    const body: Record<string, unknown> = {
      text: texts.map(toDeepLMarkup),
      target_lang: toDeepLLanguage(request.targetLanguage),
      tag_handling: 'xml',
    };
    if (request.sourceLanguage) {
      // Source languages are given without region
      body.source_lang = toDeepLLanguage(request.sourceLanguage.split('-')[0]);
    }

    const response = await postJson(`${this.options.apiUrl}/v2/translate`, body, {
      headers: { Authorization: `DeepL-Auth-Key ${this.options.apiKey}` },
      timeoutMs: this.options.timeoutMs,
      fetch: this.options.fetch,
    });

    const translated = translationTexts(response);
    if (translated === null) {
      throw new TranslationServiceError('DeepL response has no translations array');
    }

    if (translated.length !== texts.length) {
      throw new TranslationServiceError(
        `Expected ${texts.length} translations, got ${translated.length}`
      );
    }

    return translated.map(fromDeepLMarkup);
  }
}

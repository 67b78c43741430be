/**
 * OpenAI-compatible chat completions engine.
 *
 * Works against any server exposing `POST {apiUrl}/chat/completions` with bearer auth.
 */

import { TranslationServiceError } from '../core/errors';
import { log } from '../util/log';
import { buildTranslationPrompt } from '../translate/prompts';
import { parseTranslationList } from '../translate/json';
import { postJson, isRecord } from './http';
import { EngineOptions, TranslateRequest, TranslationEngine } from './types';

export interface OpenAIEngineOptions extends EngineOptions {
  model: string;
}

/**
 * Message content of the first choice, null when the response has another shape
 */
function firstChoiceContent(response: unknown): string | null {
  if (!isRecord(response) || !Array.isArray(response.choices)) {
    return null;
  }
  const [choice] = response.choices;
  if (!isRecord(choice) || !isRecord(choice.message)) {
    return null;
  }
  const content = choice.message.content;
  return typeof content === 'string' ? content : null;
}

export class OpenAIEngine implements TranslationEngine {
  readonly name = 'openai' as const;

  constructor(private readonly options: OpenAIEngineOptions) {}

  async translateBatch(texts: string[], request: TranslateRequest): Promise<string[]> {
    if (texts.length === 0) {
      return [];
    }

    const prompt = buildTranslationPrompt(texts, request.targetLanguage, request.sourceLanguage);

    const response = await postJson(
      `${this.options.apiUrl}/chat/completions`,
      {
        model: this.options.model,
        temperature: 0,
        messages: [
          { role: 'system', content: prompt.system },
          { role: 'user', content: prompt.user },
        ],
      },
      {
        headers: { Authorization: `Bearer ${this.options.apiKey}` },
        timeoutMs: this.options.timeoutMs,
        fetch: this.options.fetch,
      }
    );

    const content = firstChoiceContent(response);
    if (content === null) {
      throw new TranslationServiceError('Chat completion response has no message content');
    }

    const translations = parseTranslationList(content);
    if (translations === null) {
      log(`[OpenAI] Unparsable reply: ${content.substring(0, 500)}`);
      throw new TranslationServiceError('Chat completion reply is not a JSON array of strings');
    }

    if (translations.length !== texts.length) {
      throw new TranslationServiceError(
        `Expected ${texts.length} translations, got ${translations.length}`
      );
    }

    return translations;
  }
}

/**
 * Mock translation engine
 *
 * Deterministic translations without network access. Records every call so tests can
 * assert exactly what was sent, and can be told to fail chosen calls.
 */

import { TranslationServiceError } from '../core/errors';
import { TranslateRequest, TranslationEngine } from '../engines/types';

export type MockTranslateFn = (text: string, request: TranslateRequest) => string;

/** Default: prefix the text with the target language */
export const prefixTranslation: MockTranslateFn = (text, request) => `[${request.targetLanguage}] ${text}`;

export class MockEngine implements TranslationEngine {
  readonly name = 'openai' as const;

  /** Track calls for assertions */
  readonly calls: Array<{ texts: string[]; request: TranslateRequest }> = [];

  private failures = new Map<number, Error>();
  private failAll: Error | null = null;

  constructor(private translateFn: MockTranslateFn = prefixTranslation) {}

  /**
   * Fail the n-th call (1-based)
   */
  failOnCall(callNumber: number, error: Error = new TranslationServiceError('API error 503: Service unavailable', 503)): this {
    this.failures.set(callNumber, error);
    return this;
  }

  /**
   * Fail every call
   */
  failAlways(error: Error = new TranslationServiceError('API error 503: Service unavailable', 503)): this {
    this.failAll = error;
    return this;
  }

  /**
   * Replace the translation function, e.g. to return broken output
   */
  respondWith(translateFn: MockTranslateFn): this {
    this.translateFn = translateFn;
    return this;
  }

  /** All texts sent, across calls */
  get sentTexts(): string[] {
    return this.calls.flatMap(call => call.texts);
  }

  async translateBatch(texts: string[], request: TranslateRequest): Promise<string[]> {
    this.calls.push({ texts, request });

    const error = this.failAll ?? this.failures.get(this.calls.length);
    if (error) {
      throw error;
    }

    return texts.map(text => this.translateFn(text, request));
  }
}

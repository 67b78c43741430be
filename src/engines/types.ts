import type { RequestInit, Response } from 'node-fetch';
import { LanguageCode } from '../core/types';
import { EngineName } from '../config/settings';

/**
 * fetch as provided by node-fetch; injectable so tests can answer requests in process
 */
export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface TranslateRequest {
  targetLanguage: LanguageCode;
  sourceLanguage?: LanguageCode;
}

/**
 * A remote translation service.
 *
 * One call is one HTTP request. The result has one string per input text, in input order;
 * anything else is a TranslationServiceError.
 */
export interface TranslationEngine {
  readonly name: EngineName;
  translateBatch(texts: string[], request: TranslateRequest): Promise<string[]>;
}

export interface EngineOptions {
  apiKey: string;
  apiUrl: string;
  timeoutMs: number;
  fetch?: FetchLike;
}

import fetch, { Response } from 'node-fetch';
import { TranslationServiceError, errorMessage } from '../core/errors';
import { log } from '../util/log';
import { FetchLike } from './types';

export interface PostJsonOptions {
  headers?: Record<string, string>;
  timeoutMs: number;
  fetch?: FetchLike;
}

/** Longest slice of an error body kept in messages */
const MAX_ERROR_BODY = 500;

/**
 * POST a JSON body and return the parsed JSON response.
 *
 * Single attempt, no retry.
 *
 * @throws TranslationServiceError on network failure, non-2xx status or a body that isn't JSON
 */
export async function postJson(url: string, body: unknown, options: PostJsonOptions): Promise<unknown> {
  const fetchFn: FetchLike = options.fetch ?? fetch;

  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
    ...(options.headers ?? {}),
  };

  let response: Response;
  try {
    response = await fetchFn(url, {
      method: 'POST',
      headers,
      body: JSON.stringify(body),
      timeout: options.timeoutMs,
    });
  } catch (error) {
    throw new TranslationServiceError(`Network error calling ${url}: ${errorMessage(error)}`, undefined, { cause: error });
  }

  const text = await response.text();

  if (!response.ok) {
    log(`[HTTP] ${url} answered ${response.status}`);
    throw new TranslationServiceError(
      `API error ${response.status}: ${text.substring(0, MAX_ERROR_BODY) || response.statusText}`,
      response.status
    );
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw new TranslationServiceError(`Invalid JSON in response from ${url}: ${errorMessage(error)}`, response.status, { cause: error });
  }
}

/**
 * Narrow an unknown value to a plain object
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

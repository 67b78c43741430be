/**
 * Translation engines, selected by name from settings
 */

import { Settings } from '../config/settings';
import { DeepLEngine } from './deepl';
import { OpenAIEngine } from './openai';
import { FetchLike, TranslationEngine } from './types';

export type { FetchLike, TranslateRequest, TranslationEngine, EngineOptions } from './types';
export { OpenAIEngine } from './openai';
export { DeepLEngine } from './deepl';

/**
 * Create the engine named in settings
 */
export function createEngine(settings: Settings, fetch?: FetchLike): TranslationEngine {
  const options = {
    apiKey: settings.apiKey,
    apiUrl: settings.apiUrl,
    timeoutMs: settings.timeoutMs,
    fetch,
  };

  switch (settings.engine) {
    case 'openai':
      return new OpenAIEngine({ ...options, model: settings.model });
    case 'deepl':
      return new DeepLEngine(options);
  }
}

/**
 * Batch translation of units.
 *
 * Batches run one after another in document order. A failed batch leaves its units
 * untranslated and the run moves on; failures are returned, never dropped.
 */

import { LanguageCode, TranslationUnit } from '../core/types';
import { TranslationServiceError, errorMessage } from '../core/errors';
import { TranslationEngine } from '../engines/types';
import { hasMatchingPlaceholders, isWellFormedContent, renderContent } from '../xliff/content';
import { log } from '../util/log';
import { createBatches, BatchLimits } from './batcher';

/** Progress callback for translation batching */
export type TranslationProgressCallback = (info: {
  batchNum: number;
  totalBatches: number;
  batchSize: number;
  status: 'processing' | 'failed' | 'complete';
}) => void;

export interface TranslateUnitsOptions extends BatchLimits {
  targetLanguage: LanguageCode;
  sourceLanguage?: LanguageCode;
  onProgress?: TranslationProgressCallback;
}

export interface TranslationOutcome {
  /** Translated text keyed by unit id */
  translations: Map<string, string>;
  /** Units left untranslated, in document order */
  failedIds: string[];
  /** One entry per failed batch */
  errors: TranslationServiceError[];
}

/**
 * Check a single returned translation against its unit
 *
 * @returns why it was rejected, null when it is usable
 */
function rejectionReason(unit: TranslationUnit, translated: string): string | null {
  if (translated.trim().length === 0) {
    return 'empty translation';
  }
  if (!hasMatchingPlaceholders(translated, unit.source.placeholders.length)) {
    return 'markup placeholders changed';
  }
  if (!isWellFormedContent(renderContent(translated, unit.source.placeholders, false))) {
    return 'markup placeholders out of order';
  }
  return null;
}

/**
 * Translate units through an engine.
 *
 * @param units - Units to translate, in document order
 * @param engine - Engine receiving one request per batch
 * @returns Translations by unit id plus the ids and errors of what failed
 */
export async function translateUnits(
  units: TranslationUnit[],
  engine: TranslationEngine,
  options: TranslateUnitsOptions
): Promise<TranslationOutcome> {
  const outcome: TranslationOutcome = {
    translations: new Map(),
    failedIds: [],
    errors: [],
  };

  if (units.length === 0) {
    return outcome;
  }

  const batches = createBatches(units, options);
  const { onProgress } = options;

  log(`[Translator] Translating ${units.length} units → ${options.targetLanguage} with ${engine.name} in ${batches.length} batches`);

  for (let i = 0; i < batches.length; i++) {
    const batch = batches[i];
    const batchNum = i + 1;
    const progress = { batchNum, totalBatches: batches.length, batchSize: batch.length };

    log(`[Translator] Processing batch ${batchNum}/${batches.length} (${batch.length} units)`);
    onProgress?.({ ...progress, status: 'processing' });

    let translated: string[];
    try {
      translated = await engine.translateBatch(
        batch.map(unit => unit.source.text),
        { targetLanguage: options.targetLanguage, sourceLanguage: options.sourceLanguage }
      );
      if (translated.length !== batch.length) {
        throw new TranslationServiceError(`Expected ${batch.length} translations, got ${translated.length}`);
      }
    } catch (error) {
      const serviceError = error instanceof TranslationServiceError
        ? error
        : new TranslationServiceError(errorMessage(error), undefined, { cause: error });

      log(`[Translator] Batch ${batchNum} failed: ${serviceError.message}`);
      onProgress?.({ ...progress, status: 'failed' });

      outcome.errors.push(serviceError);
      outcome.failedIds.push(...batch.map(unit => unit.id));
      continue;
    }

    batch.forEach((unit, j) => {
      const reason = rejectionReason(unit, translated[j]);
      if (reason) {
        log(`[Translator] Rejected translation of "${unit.id}": ${reason}`);
        outcome.failedIds.push(unit.id);
        return;
      }
      outcome.translations.set(unit.id, translated[j]);
    });

    onProgress?.({ ...progress, status: 'complete' });
  }

  log(`[Translator] Completed: ${outcome.translations.size} translated, ${outcome.failedIds.length} failed`);
  return outcome;
}

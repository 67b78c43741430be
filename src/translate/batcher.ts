import { TranslationUnit } from '../core/types';

export interface BatchLimits {
  /** Most units per request */
  maxItems: number;
  /** Most source characters per request */
  maxChars: number;
}

/**
 * Group units into batches respecting both count and character limits.
 *
 * Document order is kept inside and across batches. A unit larger than maxChars
 * gets a batch of its own.
 */
export function createBatches(units: TranslationUnit[], limits: BatchLimits): TranslationUnit[][] {
  const batches: TranslationUnit[][] = [];
  let currentBatch: TranslationUnit[] = [];
  let currentBatchChars = 0;

  for (const unit of units) {
    const length = unit.source.text.length;

    if (
      currentBatch.length >= limits.maxItems ||
      currentBatchChars + length > limits.maxChars
    ) {
      if (currentBatch.length > 0) {
        batches.push(currentBatch);
      }
      currentBatch = [];
      currentBatchChars = 0;
    }

    currentBatch.push(unit);
    currentBatchChars += length;
  }

  if (currentBatch.length > 0) {
    batches.push(currentBatch);
  }

  return batches;
}

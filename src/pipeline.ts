/**
 * One run over one file: read → parse → find gaps → translate → merge → write.
 */

import * as fs from 'fs';
import * as path from 'path';
import { LanguageCode, TranslationStats } from './core/types';
import { ConfigurationError, TranslationServiceError } from './core/errors';
import { resolveTargetLanguage } from './config/language';
import { TranslationEngine } from './engines/types';
import { parseXliff, pendingUnits } from './xliff/extractor';
import { isBlank } from './xliff/content';
import { mergeTranslations, readDocumentFile, serializeXliff, writeDocumentFile } from './xliff/writer';
import { translateUnits, TranslationProgressCallback } from './translate/translator';
import { log } from './util/log';

export interface RunOptions {
  inputPath: string;
  /** Explicit target language, otherwise taken from the file name */
  language?: string;
  /** Overwrite the input file */
  inline?: boolean;
  /** Write here instead of next to the input */
  outputPath?: string;
  /** Retranslate units that already have a target */
  force?: boolean;
  /** Overwrite an existing output file */
  replace?: boolean;
  /** Overrides the document's declared source language */
  sourceLanguage?: LanguageCode;
  batchSize: number;
  batchMaxChars: number;
}

export interface RunDependencies {
  engine: TranslationEngine;
  onProgress?: TranslationProgressCallback;
}

export interface RunResult {
  inputPath: string;
  outputPath: string;
  targetLanguage: LanguageCode;
  stats: TranslationStats;
  /** False when in-place mode had nothing to change */
  written: boolean;
  failedIds: string[];
  errors: TranslationServiceError[];
}

/**
 * `messages.es.xlf` → `messages.es.translated.xlf` in the same directory
 */
export function defaultOutputPath(inputPath: string): string {
  const ext = path.extname(inputPath);
  const base = path.basename(inputPath, ext);
  return path.join(path.dirname(inputPath), `${base}.translated${ext}`);
}

function outputPathFor(options: RunOptions): string {
  if (options.inline) {
    return options.inputPath;
  }
  return options.outputPath ?? defaultOutputPath(options.inputPath);
}

/**
 * Translate the untranslated units of one XLIFF file.
 *
 * The output is written once, after every batch has been attempted. Batch failures do not
 * stop the run; they are returned in the result for the caller to report.
 *
 * @throws ConfigurationError (including an existing output file without `replace`), IOError or
 * FormatError before anything is written
 */
export async function runTranslation(options: RunOptions, deps: RunDependencies): Promise<RunResult> {
  if (options.inline && options.outputPath) {
    throw new ConfigurationError('--inline and --output cannot be used together');
  }

  const targetLanguage = resolveTargetLanguage(options.inputPath, options.language);
  const outputPath = outputPathFor(options);

  if (!options.inline && !options.replace && fs.existsSync(outputPath)) {
    throw new ConfigurationError(`Output file ${outputPath} already exists. Use --replace to overwrite it.`);
  }

  const raw = readDocumentFile(options.inputPath);
  const doc = parseXliff(raw, { force: options.force });

  if (doc.targetLanguage && doc.targetLanguage !== targetLanguage) {
    log(`[Pipeline] Document declares target language ${doc.targetLanguage}, translating to ${targetLanguage}`);
  }

  const pending = pendingUnits(doc);
  const stats: TranslationStats = {
    total: doc.units.length,
    alreadyTranslated: doc.units.filter(unit => unit.state === 'translated').length,
    skipped: doc.units.filter(unit =>
      unit.state === 'locked' || (unit.state === 'needs-translation' && isBlank(unit.source))
    ).length,
    pending: pending.length,
    translated: 0,
    failed: 0,
  };

  const outcome = await translateUnits(pending, deps.engine, {
    targetLanguage,
    sourceLanguage: options.sourceLanguage ?? doc.sourceLanguage,
    maxItems: options.batchSize,
    maxChars: options.batchMaxChars,
    onProgress: deps.onProgress,
  });

  const { applied } = mergeTranslations(doc, outcome.translations);
  stats.translated = applied;
  stats.failed = outcome.failedIds.length;

  const written = !(options.inline && applied === 0);

  if (written) {
    writeDocumentFile(outputPath, serializeXliff(doc));
  } else {
    log('[Pipeline] Nothing translated, leaving input file untouched');
  }

  return {
    inputPath: options.inputPath,
    outputPath,
    targetLanguage,
    stats,
    written,
    failedIds: outcome.failedIds,
    errors: outcome.errors,
  };
}

/**
 * Raise the run's failures as one error
 *
 * @throws TranslationServiceError when any unit could not be translated
 */
export function assertComplete(result: RunResult): void {
  if (result.failedIds.length === 0) {
    return;
  }

  const reasons = [...new Set(result.errors.map(error => error.message))];
  const detail = reasons.length > 0 ? `: ${reasons.join('; ')}` : '';
  throw new TranslationServiceError(
    `${result.failedIds.length} of ${result.stats.pending} units could not be translated${detail}`,
    result.errors[0]?.status
  );
}

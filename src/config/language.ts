import * as path from 'path';
import { LanguageCode } from '../core/types';
import { ConfigurationError } from '../core/errors';
import { log } from '../util/log';
import LANGUAGE_NAMES from '../data/languages.json';

const KNOWN_LANGUAGES: Record<string, string> = LANGUAGE_NAMES;

/** Script (Hans), region (BR) or UN M.49 area (419) */
const SUBTAG_REGEX = /^(?:[A-Za-z]{2}|[A-Za-z]{4}|\d{3})$/;

const XLIFF_EXTENSION_REGEX = /\.(xlf|xliff)$/i;

/**
 * Normalize a language tag: `pt_br` → `pt-BR`, `zh-hans` → `zh-Hans`
 */
export function normalizeLanguageCode(code: string): LanguageCode {
  const [primary, ...subtags] = code.trim().split(/[-_]/);
  const normalized = subtags.map(subtag => {
    if (/^[A-Za-z]{2}$/.test(subtag)) return subtag.toUpperCase();
    if (/^[A-Za-z]{4}$/.test(subtag)) return subtag[0].toUpperCase() + subtag.slice(1).toLowerCase();
    return subtag;
  });
  return [primary.toLowerCase(), ...normalized].join('-');
}

function isKnownLanguage(primary: string): boolean {
  return Object.prototype.hasOwnProperty.call(KNOWN_LANGUAGES, primary.toLowerCase());
}

/**
 * Find a language code embedded in a file name.
 *
 * Recognizes `messages.es.xlf`, `messages.pt-BR.xlf`, `messages_fr.xlf`, `de.xlf` and similar.
 * Only known primary language codes count, so `messages.xlf` or `app.xlf` yield null.
 */
export function languageFromFilename(filePath: string): LanguageCode | null {
  const base = path.basename(filePath);
  const name = XLIFF_EXTENSION_REGEX.test(base)
    ? base.replace(XLIFF_EXTENSION_REGEX, '')
    : base.slice(0, base.length - path.extname(base).length);

  const tokens = name.split(/[._-]/).filter(token => token.length > 0);
  if (tokens.length === 0) {
    return null;
  }

  const last = tokens[tokens.length - 1];

  // primary + script/region, e.g. pt-BR
  if (tokens.length >= 2) {
    const primary = tokens[tokens.length - 2];
    if (isKnownLanguage(primary) && SUBTAG_REGEX.test(last)) {
      return normalizeLanguageCode(`${primary}-${last}`);
    }
  }

  if (isKnownLanguage(last)) {
    return normalizeLanguageCode(last);
  }

  return null;
}

/**
 * Determine the target language from an explicit value or from the input file name.
 *
 * @throws ConfigurationError when neither gives a language
 */
export function resolveTargetLanguage(inputPath: string, explicit?: string): LanguageCode {
  if (explicit !== undefined) {
    if (explicit.trim().length === 0) {
      throw new ConfigurationError('Target language must not be empty');
    }
    return normalizeLanguageCode(explicit);
  }

  const fromName = languageFromFilename(inputPath);
  if (fromName) {
    log(`[Language] Resolved target language "${fromName}" from file name ${path.basename(inputPath)}`);
    return fromName;
  }

  throw new ConfigurationError(
    `Cannot determine the target language of ${path.basename(inputPath)}. ` +
    'Pass --language <code> or include the code in the file name (e.g. messages.es.xlf).'
  );
}

/**
 * Display name of a language for prompts, e.g. `Portuguese (BR)`
 */
export function getLanguageName(code: LanguageCode): string {
  const [primary, ...subtags] = normalizeLanguageCode(code).split('-');
  const name = KNOWN_LANGUAGES[primary];
  if (!name) {
    return code.toUpperCase();
  }
  return subtags.length > 0 ? `${name} (${subtags.join('-')})` : name;
}

/**
 * Translation prompts for chat completion engines.
 *
 * Texts go out as a JSON array and must come back as a JSON array of the same
 * length and order, so results map back to units positionally.
 */

import { LanguageCode } from '../core/types';
import { getLanguageName } from '../config/language';

export interface TranslationPrompt {
  system: string;
  user: string;
}

/**
 * Build the prompt for translating a batch of localization strings.
 *
 * Rules embedded in the prompt:
 * - `{{n}}` placeholders stand for markup and must be kept exactly once each
 * - ICU message syntax keeps its keywords and variable names
 * - Leading and trailing whitespace is kept
 *
 * @param texts - Source strings, placeholders included
 * @param targetLang - Target language code
 * @param sourceLang - Source language code, when the document declares one
 */
export function buildTranslationPrompt(
  texts: string[],
  targetLang: LanguageCode,
  sourceLang?: LanguageCode
): TranslationPrompt {
  const targetLanguage = getLanguageName(targetLang);
  const from = sourceLang ? `from ${getLanguageName(sourceLang)} ` : '';

  const system = `You are a professional software localization translator.

Translate user interface strings ${from}to ${targetLanguage}.

IMPORTANT - OUTPUT FORMAT:
Return ONLY a JSON array of strings, one translation per input string, in the same order.
The array MUST have exactly ${texts.length} element${texts.length === 1 ? '' : 's'}.
Do not add explanations, notes or markdown.

TRANSLATION RULES:
- Tokens like {{0}}, {{1}} stand for markup. Copy every token exactly once, unchanged,
  and move it to wherever the grammar of ${targetLanguage} needs it
- Keep ICU message syntax intact: translate only the human readable text inside
  plural/select branches, never the keywords (plural, select, other, one, =0) or variable names
- Keep leading and trailing whitespace and line breaks
- Keep brand names, product names and code identifiers untranslated
- Match the tone and length of the original as closely as ${targetLanguage} allows`;

  const user = `Translate these ${texts.length} strings:
${JSON.stringify(texts, null, 2)}`;

  return { system, user };
}

import { XMLValidator } from 'fast-xml-parser';
import { CdataPadding, TextContent } from '../core/types';
import { FormatError } from '../core/errors';

/**
 * Text handling for element content.
 *
 * Translatable text is kept with markup swapped out for `{{n}}` tokens so engines never see
 * (or break) inline tags, comments or entity references the XML parser can't resolve.
 */

const PREDEFINED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
};

const ENTITY_REGEX = /&(#x[0-9a-fA-F]+|#[0-9]+|[A-Za-z_][\w.-]*);/g;

// CDATA, comment, processing instruction, tag or entity reference
const CONTENT_TOKEN_REGEX =
  /<!\[CDATA\[([\s\S]*?)\]\]>|<!--[\s\S]*?-->|<\?[\s\S]*?\?>|<\/?[^\s/>!?]+(?:\s+[^\s=/>]+\s*=\s*(?:"[^"]*"|'[^']*'))*\s*\/?>|&(#x[0-9a-fA-F]+|#[0-9]+|[A-Za-z_][\w.-]*);/g;

const SINGLE_CDATA_REGEX = /^(\s*)<!\[CDATA\[([\s\S]*?)\]\]>(\s*)$/;

const PLACEHOLDER_REGEX = /\{\{(\d+)\}\}/g;

/** XML `Char` production */
function isXmlChar(codePoint: number): boolean {
  return codePoint === 0x9 || codePoint === 0xa || codePoint === 0xd ||
    (codePoint >= 0x20 && codePoint <= 0xd7ff) ||
    (codePoint >= 0xe000 && codePoint <= 0xfffd) ||
    (codePoint >= 0x10000 && codePoint <= 0x10ffff);
}

/**
 * Resolve a single entity name (without `&` and `;`), undefined when it isn't predefined or numeric
 *
 * @throws FormatError for a character reference to something that isn't an XML character
 */
function resolveEntity(name: string): string | undefined {
  if (!name.startsWith('#')) {
    return PREDEFINED_ENTITIES[name];
  }

  const codePoint = name.startsWith('#x')
    ? parseInt(name.slice(2), 16)
    : parseInt(name.slice(1), 10);
  if (!isXmlChar(codePoint)) {
    throw new FormatError(`Invalid character reference &${name};`);
  }
  return String.fromCodePoint(codePoint);
}

/**
 * Decode predefined and numeric character references, leave others as written
 */
export function decodeEntities(text: string): string {
  return text.replace(ENTITY_REGEX, (match, name: string) => resolveEntity(name) ?? match);
}

/**
 * Escape text for use as element content
 */
export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}

/**
 * Wrap text in CDATA, splitting any `]]>` it contains across two sections
 */
export function wrapCdata(text: string): string {
  return `<![CDATA[${text.replace(/\]\]>/g, ']]]]><![CDATA[>')}]]>`;
}

/**
 * Convert raw element content into translatable text.
 */
export function readContent(inner: string): TextContent {
  const single = inner.match(SINGLE_CDATA_REGEX);
  if (single && !single[2].includes(']]>')) {
    const [, before, text, after] = single;
    return before || after
      ? { text, placeholders: [], cdata: true, cdataPadding: { before, after } }
      : { text, placeholders: [], cdata: true };
  }

  const placeholders: string[] = [];
  let text = '';
  let lastIndex = 0;
  let match: RegExpExecArray | null;

  CONTENT_TOKEN_REGEX.lastIndex = 0;

  while ((match = CONTENT_TOKEN_REGEX.exec(inner)) !== null) {
    text += inner.slice(lastIndex, match.index);
    lastIndex = CONTENT_TOKEN_REGEX.lastIndex;

    const [token, cdataText, entityName] = match;
    if (cdataText !== undefined) {
      text += cdataText;
      continue;
    }

    const resolved = entityName !== undefined ? resolveEntity(entityName) : undefined;
    if (resolved !== undefined) {
      text += resolved;
      continue;
    }

    text += `{{${placeholders.length}}}`;
    placeholders.push(token);
  }

  text += inner.slice(lastIndex);

  return { text, placeholders, cdata: false };
}

/**
 * Turn translated text back into element content.
 * Markup placeholders force escaped output since tags can't live inside CDATA.
 */
export function renderContent(
  text: string,
  placeholders: string[],
  cdata: boolean,
  padding?: CdataPadding
): string {
  if (cdata && placeholders.length === 0) {
    return `${padding?.before ?? ''}${wrapCdata(text)}${padding?.after ?? ''}`;
  }

  let output = '';
  let lastIndex = 0;
  let match: RegExpExecArray | null;

  PLACEHOLDER_REGEX.lastIndex = 0;

  while ((match = PLACEHOLDER_REGEX.exec(text)) !== null) {
    const index = parseInt(match[1], 10);
    if (index >= placeholders.length) {
      continue;
    }
    output += escapeXml(text.slice(lastIndex, match.index)) + placeholders[index];
    lastIndex = PLACEHOLDER_REGEX.lastIndex;
  }

  return output + escapeXml(text.slice(lastIndex));
}

/**
 * Check that every placeholder of the source appears exactly once in a translation
 */
export function hasMatchingPlaceholders(translation: string, placeholderCount: number): boolean {
  const seen = new Array<number>(placeholderCount).fill(0);
  let match: RegExpExecArray | null;

  PLACEHOLDER_REGEX.lastIndex = 0;

  while ((match = PLACEHOLDER_REGEX.exec(translation)) !== null) {
    const index = parseInt(match[1], 10);
    if (index < placeholderCount) {
      seen[index]++;
    }
  }

  return seen.every(count => count === 1);
}

/**
 * Whether rendered content can stand as the body of an element
 */
export function isWellFormedContent(content: string): boolean {
  return XMLValidator.validate(`<content>${content}</content>`) === true;
}

/**
 * Content with nothing to translate
 */
export function isBlank(content: TextContent | null): boolean {
  return content === null || content.text.trim().length === 0;
}

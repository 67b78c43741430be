import { XmlElement } from '../core/types';
import { FormatError } from '../core/errors';
import { decodeEntities } from './content';

// Comment, CDATA, processing instruction, doctype, end tag (1) or start tag (2 name, 3 attributes, 4 self-closing)
const TOKEN_REGEX =
  /<!--[\s\S]*?-->|<!\[CDATA\[[\s\S]*?\]\]>|<\?[\s\S]*?\?>|<!DOCTYPE(?:[^>[]|\[[\s\S]*?\])*>|<\/([^\s>]+)\s*>|<([^\s/>!?]+)((?:\s+[^\s=/>]+\s*=\s*(?:"[^"]*"|'[^']*'))*)\s*(\/?)>/g;

const ATTRIBUTE_REGEX = /([^\s=]+)\s*=\s*(?:"([^"]*)"|'([^']*)')/g;

function localNameOf(name: string): string {
  const colon = name.indexOf(':');
  return colon === -1 ? name : name.slice(colon + 1);
}

function parseAttributes(raw: string): Record<string, string> {
  const attributes: Record<string, string> = {};
  let match: RegExpExecArray | null;

  ATTRIBUTE_REGEX.lastIndex = 0;

  while ((match = ATTRIBUTE_REGEX.exec(raw)) !== null) {
    attributes[match[1]] = decodeEntities(match[2] ?? match[3] ?? '');
  }

  return attributes;
}

/**
 * Scan well-formed XML into a flat element arena in document order.
 * Elements reference their parent and children by index into the returned array.
 */
export function scanElements(xml: string): XmlElement[] {
  const elements: XmlElement[] = [];
  const stack: number[] = [];
  let match: RegExpExecArray | null;

  TOKEN_REGEX.lastIndex = 0;

  while ((match = TOKEN_REGEX.exec(xml)) !== null) {
    const [token, closeName, openName, rawAttributes, selfClosing] = match;

    if (closeName !== undefined) {
      const index = stack.pop();
      if (index === undefined || elements[index].name !== closeName) {
        throw new FormatError(`Unexpected closing tag </${closeName}>`);
      }
      elements[index].contentEnd = match.index;
      elements[index].end = match.index + token.length;
      continue;
    }

    if (openName === undefined) {
      // Comment, CDATA, processing instruction or doctype
      continue;
    }

    const parent = stack.length > 0 ? stack[stack.length - 1] : null;
    const end = match.index + token.length;
    const element: XmlElement = {
      name: openName,
      localName: localNameOf(openName),
      attributes: parseAttributes(rawAttributes ?? ''),
      start: match.index,
      contentStart: end,
      contentEnd: end,
      end,
      selfClosing: selfClosing === '/',
      parent,
      children: [],
    };

    const index = elements.push(element) - 1;
    if (parent !== null) {
      elements[parent].children.push(index);
    }
    if (!element.selfClosing) {
      stack.push(index);
    }
  }

  if (stack.length > 0) {
    throw new FormatError(`Unclosed element <${elements[stack[stack.length - 1]].name}>`);
  }

  return elements;
}

/**
 * Direct children of an element with the given local name
 */
export function childrenNamed(elements: XmlElement[], parent: number, localName: string): number[] {
  return elements[parent].children.filter(child => elements[child].localName === localName);
}

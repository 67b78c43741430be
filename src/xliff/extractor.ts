import { XMLValidator } from 'fast-xml-parser';
import { TranslationUnit, XliffDocument, XliffVersion, XmlElement } from '../core/types';
import { FormatError } from '../core/errors';
import { log } from '../util/log';
import { scanElements, childrenNamed } from './scanner';
import { readContent, isBlank } from './content';

export interface ParseOptions {
  /** Treat every unit as needing translation */
  force?: boolean;
}

/**
 * Check well-formedness, throwing a FormatError with the parser's position on failure
 */
export function assertWellFormed(xml: string, what: string = 'Input'): void {
  const result = XMLValidator.validate(xml, { allowBooleanAttributes: false });
  if (result !== true) {
    throw new FormatError(`${what} is not well-formed XML: ${result.err.msg}`, result.err.line, result.err.col);
  }
}

function innerOf(xml: string, element: XmlElement): string {
  return xml.slice(element.contentStart, element.contentEnd);
}

function detectVersion(root: XmlElement): { version: XliffVersion; versionString: string } {
  const versionString = root.attributes['version'];
  if (!versionString) {
    throw new FormatError('<xliff> element has no version attribute');
  }

  const major = versionString.split('.')[0];
  if (major !== '1' && major !== '2') {
    throw new FormatError(`Unsupported XLIFF version ${versionString}`);
  }

  return { version: major, versionString };
}

/**
 * Whether `translate="no"` applies to an element, set on it or inherited from the nearest
 * ancestor that carries the attribute
 */
function isLocked(elements: XmlElement[], index: number): boolean {
  for (let current: number | null = index; current !== null; current = elements[current].parent) {
    const translate = elements[current].attributes['translate'];
    if (translate !== undefined) {
      return translate.trim() === 'no';
    }
  }
  return false;
}

/**
 * Unit elements paired with their ids: trans-units for 1.x, segments of units for 2.x
 */
function findUnitElements(elements: XmlElement[], version: XliffVersion): Array<{ id: string; element: number }> {
  const found: Array<{ id: string; element: number }> = [];

  elements.forEach((element, index) => {
    if (version === '1' && element.localName === 'trans-unit') {
      const id = element.attributes['id'];
      if (id === undefined) {
        throw new FormatError(`<${element.name}> without id attribute at offset ${element.start}`);
      }
      found.push({ id, element: index });
      return;
    }

    if (version === '2' && element.localName === 'unit') {
      const id = element.attributes['id'];
      if (id === undefined) {
        throw new FormatError(`<${element.name}> without id attribute at offset ${element.start}`);
      }

      const segments = childrenNamed(elements, index, 'segment');
      if (segments.length === 1) {
        found.push({ id, element: segments[0] });
        return;
      }

      segments.forEach((segment, n) => {
        const segmentId = elements[segment].attributes['id'] ?? String(n + 1);
        found.push({ id: `${id}#${segmentId}`, element: segment });
      });
    }
  });

  return found;
}

/**
 * Parse an XLIFF file into a document with its translation units.
 *
 * The raw text is kept as-is; units only record where their source and target live,
 * so writing back touches nothing but the targets that change.
 *
 * @throws FormatError when the text is not well-formed XML or not an XLIFF document
 */
export function parseXliff(xml: string, options: ParseOptions = {}): XliffDocument {
  assertWellFormed(xml);

  const elements = scanElements(xml);
  const root = elements.find(element => element.parent === null);

  if (!root || root.localName !== 'xliff') {
    throw new FormatError(`Root element is <${root?.name ?? 'none'}>, expected <xliff>`);
  }

  const { version, versionString } = detectVersion(root);

  const files = elements.filter(element => element.localName === 'file');
  if (files.length === 0) {
    throw new FormatError('XLIFF document contains no <file> element');
  }

  const sourceLanguage = version === '1'
    ? files[0].attributes['source-language']
    : root.attributes['srcLang'];
  const targetLanguage = version === '1'
    ? files[0].attributes['target-language']
    : root.attributes['trgLang'];

  const units: TranslationUnit[] = [];
  const seenIds = new Set<string>();

  for (const { id, element } of findUnitElements(elements, version)) {
    if (seenIds.has(id)) {
      throw new FormatError(`Duplicate unit id "${id}"`);
    }
    seenIds.add(id);

    const [sourceElement] = childrenNamed(elements, element, 'source');
    if (sourceElement === undefined) {
      throw new FormatError(`Unit "${id}" has no <source> element`);
    }

    const [targetElement] = childrenNamed(elements, element, 'target');
    const target = targetElement === undefined
      ? null
      : readContent(innerOf(xml, elements[targetElement]));

    units.push({
      id,
      index: units.length,
      element,
      sourceElement,
      targetElement: targetElement ?? null,
      source: readContent(innerOf(xml, elements[sourceElement])),
      target,
      state: isLocked(elements, element)
        ? 'locked'
        : options.force || isBlank(target) ? 'needs-translation' : 'translated',
    });
  }

  log(`[Extractor] Parsed XLIFF ${versionString}: ${units.length} units, ${units.filter(u => u.state === 'translated').length} translated`);

  return {
    raw: xml,
    version,
    versionString,
    sourceLanguage,
    targetLanguage,
    elements,
    units,
  };
}

/**
 * Units that should be sent for translation: untranslated (or forced) with a non-blank source.
 * Locked units never are.
 */
export function pendingUnits(doc: XliffDocument): TranslationUnit[] {
  return doc.units.filter(unit => unit.state === 'needs-translation' && !isBlank(unit.source));
}

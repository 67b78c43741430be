import * as fs from 'fs';
import * as path from 'path';
import { TranslationUnit, XliffDocument } from '../core/types';
import { IOError, errorMessage } from '../core/errors';
import { log } from '../util/log';
import { assertWellFormed } from './extractor';
import { renderContent } from './content';

/** A replacement of the raw text range [start, end) */
interface Edit {
  start: number;
  end: number;
  text: string;
}

const STATE_ATTRIBUTE_REGEX = /(\sstate\s*=\s*)(["'])[^"']*\2/;

/**
 * Apply translations to the document's units, keyed by unit id.
 *
 * @returns Number of units updated and ids that matched no unit
 */
export function mergeTranslations(
  doc: XliffDocument,
  translations: Map<string, string>
): { applied: number; unknownIds: string[] } {
  const byId = new Map(doc.units.map(unit => [unit.id, unit]));
  const unknownIds: string[] = [];
  let applied = 0;

  for (const [id, text] of translations) {
    const unit = byId.get(id);
    if (!unit) {
      unknownIds.push(id);
      continue;
    }
    unit.translation = text;
    unit.state = 'translated';
    applied++;
  }

  if (unknownIds.length > 0) {
    log(`[Writer] Ignored ${unknownIds.length} translations for unknown unit ids`, unknownIds);
  }

  return { applied, unknownIds };
}

/**
 * Whitespace (newline plus indentation) in front of an element, empty when it shares its line
 */
function leadingWhitespace(raw: string, offset: number): string {
  let lineStart = offset;
  while (lineStart > 0 && (raw[lineStart - 1] === ' ' || raw[lineStart - 1] === '\t')) {
    lineStart--;
  }

  if (raw[lineStart - 1] !== '\n') {
    return '';
  }

  const newline = raw[lineStart - 2] === '\r' ? '\r\n' : '\n';
  return newline + raw.slice(lineStart, offset);
}

function targetContent(unit: TranslationUnit, translation: string): string {
  // The old target decides the encoding unless it was blank
  const model = unit.target && unit.target.text.trim().length > 0 ? unit.target : unit.source;
  return renderContent(translation, unit.source.placeholders, model.cdata, model.cdataPadding);
}

/**
 * Build the edit that writes a unit's translation into the raw text
 */
function editFor(doc: XliffDocument, unit: TranslationUnit, translation: string): Edit {
  const { raw, elements } = doc;
  const content = targetContent(unit, translation);

  if (unit.targetElement === null) {
    const source = elements[unit.sourceElement];
    const name = source.name.slice(0, source.name.length - source.localName.length) + 'target';
    const attributes = doc.version === '1' ? ' state="translated"' : '';

    return {
      start: source.end,
      end: source.end,
      text: `${leadingWhitespace(raw, source.start)}<${name}${attributes}>${content}</${name}>`,
    };
  }

  const target = elements[unit.targetElement];
  let openTag = target.selfClosing
    ? raw.slice(target.start, target.end).replace(/\s*\/>$/, '>')
    : raw.slice(target.start, target.contentStart);
  const closeTag = target.selfClosing
    ? `</${target.name}>`
    : raw.slice(target.contentEnd, target.end);

  if (doc.version === '1') {
    openTag = openTag.replace(STATE_ATTRIBUTE_REGEX, '$1$2translated$2');
  }

  return {
    start: target.start,
    end: target.end,
    text: `${openTag}${content}${closeTag}`,
  };
}

/**
 * Serialize the document back to XLIFF text.
 *
 * Only targets of units translated in this run are rewritten; every other byte comes
 * from the original file.
 *
 * @throws FormatError if the result is not well-formed
 */
export function serializeXliff(doc: XliffDocument): string {
  const edits = doc.units
    .filter((unit): unit is TranslationUnit & { translation: string } => unit.translation !== undefined)
    .map(unit => editFor(doc, unit, unit.translation))
    .sort((a, b) => a.start - b.start);

  if (edits.length === 0) {
    return doc.raw;
  }

  let output = '';
  let cursor = 0;
  for (const edit of edits) {
    output += doc.raw.slice(cursor, edit.start) + edit.text;
    cursor = edit.end;
  }
  output += doc.raw.slice(cursor);

  assertWellFormed(output, 'Translated document');
  log(`[Writer] Serialized document with ${edits.length} updated targets`);

  return output;
}

/**
 * Write the document text, replacing the destination only once the full content is on disk.
 *
 * @throws IOError when the destination can't be written
 */
export function writeDocumentFile(filePath: string, content: string): void {
  const tempPath = path.join(
    path.dirname(filePath),
    `.${path.basename(filePath)}.${process.pid}.tmp`
  );

  try {
    fs.writeFileSync(tempPath, content, 'utf-8');
    fs.renameSync(tempPath, filePath);
  } catch (error) {
    if (fs.existsSync(tempPath)) {
      fs.rmSync(tempPath, { force: true });
    }
    throw new IOError(`Cannot write ${filePath}: ${errorMessage(error)}`, filePath, { cause: error });
  }

  log(`[Writer] Wrote ${content.length} characters to ${filePath}`);
}

/**
 * Read an input document
 *
 * @throws IOError when the file can't be read
 */
export function readDocumentFile(filePath: string): string {
  try {
    return fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new IOError(`Cannot read ${filePath}: ${errorMessage(error)}`, filePath, { cause: error });
  }
}

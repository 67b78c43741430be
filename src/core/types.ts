/**
 * Language codes are BCP 47 style tags such as `es`, `pt-BR` or `zh-Hans`
 */
export type LanguageCode = string;

/**
 * XLIFF major version family, decides which elements count as units
 */
export type XliffVersion = '1' | '2';

/**
 * Translation state of a single unit. `locked` units are marked `translate="no"`
 * on the unit or an enclosing element.
 */
export type UnitState = 'translated' | 'needs-translation' | 'locked';

/**
 * One element of the document arena.
 * Offsets point into the raw document text.
 */
export interface XmlElement {
  /** Qualified name as written, e.g. `target` or `x:target` */
  name: string;
  /** Name without namespace prefix */
  localName: string;
  attributes: Record<string, string>;
  /** Offset of `<` of the start tag */
  start: number;
  /** Offset just past the start tag */
  contentStart: number;
  /** Offset of `<` of the end tag (equals contentStart when self-closing) */
  contentEnd: number;
  /** Offset just past the end tag */
  end: number;
  selfClosing: boolean;
  parent: number | null;
  children: number[];
}

/**
 * Element content reduced to translatable text.
 * Inline markup is replaced by `{{n}}` tokens, `placeholders[n]` holds the raw markup.
 */
/** Whitespace around a CDATA section in pretty-printed content */
export interface CdataPadding {
  before: string;
  after: string;
}

export interface TextContent {
  text: string;
  placeholders: string[];
  /** Content is exactly one CDATA section, optionally surrounded by whitespace */
  cdata: boolean;
  cdataPadding?: CdataPadding;
}

/**
 * A localizable string inside the document
 */
export interface TranslationUnit {
  id: string;
  /** Position in document order */
  index: number;
  /** Arena index of the trans-unit (1.x) or segment (2.x) element */
  element: number;
  sourceElement: number;
  /** Arena index of the target element, null when there is none */
  targetElement: number | null;
  source: TextContent;
  target: TextContent | null;
  state: UnitState;
  /** Translated text (with placeholder tokens) merged in this run */
  translation?: string;
}

/**
 * Parsed XLIFF file. The raw text is the skeleton everything is written back into.
 */
export interface XliffDocument {
  raw: string;
  version: XliffVersion;
  /** Version attribute as written, e.g. `1.2` */
  versionString: string;
  sourceLanguage?: LanguageCode;
  targetLanguage?: LanguageCode;
  elements: XmlElement[];
  units: TranslationUnit[];
}

/**
 * Counters reported at the end of a run
 */
export interface TranslationStats {
  total: number;
  alreadyTranslated: number;
  /** Locked units and units with a blank source */
  skipped: number;
  pending: number;
  translated: number;
  failed: number;
}

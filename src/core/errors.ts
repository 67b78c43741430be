/**
 * Error kinds surfaced to the user. Each maps to its own process exit code.
 */
export class XlfTranslateError extends Error {
  readonly exitCode: number = 1;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Input is not well-formed XML or not an XLIFF document */
export class FormatError extends XlfTranslateError {
  override readonly exitCode = 3;

  constructor(
    message: string,
    readonly line?: number,
    readonly column?: number
  ) {
    super(line !== undefined ? `${message} (line ${line}, column ${column ?? 0})` : message);
  }
}

/** Missing API key, unknown engine or undeterminable target language */
export class ConfigurationError extends XlfTranslateError {
  override readonly exitCode = 2;
}

/** Network or API failure while translating */
export class TranslationServiceError extends XlfTranslateError {
  override readonly exitCode = 4;

  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** Input unreadable or output unwritable */
export class IOError extends XlfTranslateError {
  override readonly exitCode = 5;

  constructor(
    message: string,
    readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Message of anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

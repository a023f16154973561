/**
 * Error type raised by the loading collaborators (booking files, term sheets)
 */

export type ErrorCode =
  | 'NOT_FOUND'
  | 'PERMISSION_DENIED'
  | 'READ_FAILED'
  | 'SCHEMA_MISMATCH'
  | 'VALIDATION_ERROR'
  | 'CONFIGURATION_ERROR'
  | 'UNSUPPORTED_FORMAT'
  | 'UNKNOWN';

/** Hint used when the raiser gives none */
const DEFAULT_SUGGESTIONS: Readonly<Partial<Record<ErrorCode, string>>> = {
  NOT_FOUND: 'Check that the file path is correct and the file exists.',
  PERMISSION_DENIED: 'Check the file permissions.',
  UNSUPPORTED_FORMAT: 'Use a .csv, .json or .xlsx booking file.',
};

export interface ConnectorErrorDetails {
  code: ErrorCode;
  message: string;
  /** File path or source id the error refers to */
  source?: string;
  suggestion?: string;
  cause?: Error;
  context?: Record<string, unknown>;
}

export class ConnectorError extends Error {
  readonly code: ErrorCode;
  readonly source?: string;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: ConnectorErrorDetails) {
    super(details.message);
    this.name = 'ConnectorError';
    this.code = details.code;
    this.source = details.source;
    this.suggestion = details.suggestion ?? DEFAULT_SUGGESTIONS[details.code];
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }
  }

  /**
   * `[CODE] source: message`, with the hint on a second line when there is one
   */
  toActionableMessage(): string {
    const where = this.source ? `${this.source}: ` : '';
    const head = `[${this.code}] ${where}${this.message}`;
    return this.suggestion ? `${head}\nHint: ${this.suggestion}` : head;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.source === undefined ? {} : { source: this.source }),
      ...(this.suggestion === undefined ? {} : { suggestion: this.suggestion }),
      ...(this.context === undefined ? {} : { context: this.context }),
    };
  }
}

function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Turn whatever a file read threw into a ConnectorError.
 *
 * ENOENT and EACCES/EPERM map to NOT_FOUND and PERMISSION_DENIED; any other
 * failure gets `fallbackCode`. ConnectorErrors pass through unchanged.
 */
export function wrapError(
  error: unknown,
  source?: string,
  fallbackCode: ErrorCode = 'READ_FAILED'
): ConnectorError {
  if (error instanceof ConnectorError) {
    return error;
  }

  const cause = error instanceof Error ? error : undefined;
  const errno = errnoCode(error);

  if (errno === 'ENOENT') {
    return new ConnectorError({
      code: 'NOT_FOUND',
      message: source ? `File not found: ${source}` : 'File not found',
      source,
      cause,
    });
  }

  if (errno === 'EACCES' || errno === 'EPERM') {
    return new ConnectorError({
      code: 'PERMISSION_DENIED',
      message: source ? `Cannot read file: ${source}` : 'Cannot read file',
      source,
      cause,
    });
  }

  return new ConnectorError({
    code: fallbackCode,
    message: cause ? cause.message : String(error),
    source,
    cause,
  });
}

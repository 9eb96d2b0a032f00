export type SmapsErrorKind =
  | 'io'
  | 'malformed-header'
  | 'malformed-usage'
  | 'unrecognized-key'
  | 'unrecognized-flag'
  | 'unrecognized-unit'
  | 'spent-state';

export class SmapsError extends Error {
  readonly kind: SmapsErrorKind;

  constructor(kind: SmapsErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SmapsError';
    this.kind = kind;
  }
}

/** The line source could not produce the next line. */
export class SmapsIoError extends SmapsError {
  readonly path?: string;
  readonly code?: string;

  constructor(message: string, details: { path?: string; code?: string; cause?: unknown } = {}) {
    super('io', message, { cause: details.cause });
    this.name = 'SmapsIoError';
    this.path = details.path;
    this.code = details.code;
  }
}

/** A header or detail line that does not follow the documented grammar. */
export class SmapsParseError extends SmapsError {
  readonly line: string;
  readonly lineNumber: number;

  constructor(kind: 'malformed-header' | 'malformed-usage', line: string, lineNumber: number) {
    const what = kind === 'malformed-header' ? 'mapping header' : 'usage line';
    super(kind, `Malformed ${what} at line ${lineNumber}: ${JSON.stringify(line)}`);
    this.name = 'SmapsParseError';
    this.line = line;
    this.lineNumber = lineNumber;
  }
}

/**
 * The input names a key, unit or VM flag outside the known vocabulary: the
 * kernel format has moved past what this parser understands.
 */
export class SmapsFormatError extends SmapsError {
  readonly token: string;

  constructor(kind: 'unrecognized-key' | 'unrecognized-flag' | 'unrecognized-unit', token: string) {
    const what = {
      'unrecognized-key': 'key',
      'unrecognized-flag': 'VM flag',
      'unrecognized-unit': 'unit',
    }[kind];
    super(kind, `Unrecognized ${what}: ${token}`);
    this.name = 'SmapsFormatError';
    this.token = token;
  }
}

/** A parser state object was advanced more than once. */
export class SmapsStateError extends SmapsError {
  constructor(stateName: string) {
    super('spent-state', `${stateName} has already been advanced; continue from the state it returned`);
    this.name = 'SmapsStateError';
  }
}

export const isSmapsError = (error: unknown): error is SmapsError => error instanceof SmapsError;

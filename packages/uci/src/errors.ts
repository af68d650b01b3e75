/**
 * Error thrown when a command line cannot be parsed
 *
 * Parsers never recover: the first violation is thrown as one of the three
 * concrete kinds below, each carrying the context needed to report it.
 */
export abstract class ParsingError extends Error {
  abstract readonly kind: ParsingErrorKind;

  constructor(message: string) {
    super(message);
    this.name = 'ParsingError';
  }
}

export type ParsingErrorKind = 'InvalidCommandType' | 'InvalidLength' | 'UnknownToken';

/**
 * Upper bound used by parsers that accept any number of trailing tokens
 */
export const UNBOUNDED_LENGTH = Number.MAX_SAFE_INTEGER;

/**
 * The first token does not match the literal the parser requires
 */
export class InvalidCommandTypeError extends ParsingError {
  override readonly kind = 'InvalidCommandType' as const;

  constructor(
    public readonly expected: string,
    public readonly got: string,
  ) {
    super(`Invalid command type. Expected ${expected}, got ${got}`);
    this.name = 'InvalidCommandTypeError';
  }
}

/**
 * The token count is outside the bounds the parser accepts
 */
export class InvalidLengthError extends ParsingError {
  override readonly kind = 'InvalidLength' as const;

  constructor(
    public readonly min: number,
    public readonly max: number,
    public readonly got: number,
  ) {
    super(`Invalid length. Expected between ${min} and ${max}, got ${got}`);
    this.name = 'InvalidLengthError';
  }
}

/**
 * A keyword, argument, move or FEN failed its local grammar
 */
export class UnknownTokenError extends ParsingError {
  override readonly kind = 'UnknownToken' as const;

  constructor(public readonly token: string) {
    super(`Unknown token '${token}'`);
    this.name = 'UnknownTokenError';
  }
}

export type AnyParsingError = InvalidCommandTypeError | InvalidLengthError | UnknownTokenError;

/**
 * Type guard for the codec's parsing errors
 */
export function isParsingError(error: unknown): error is AnyParsingError {
  return (
    error instanceof InvalidCommandTypeError ||
    error instanceof InvalidLengthError ||
    error instanceof UnknownTokenError
  );
}

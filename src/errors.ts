import type { LanguageId } from './parser/types.js';

/**
 * Failure categories for a single source file. Every one of them is
 * contained at the file boundary and recorded on the file node.
 */
export enum ProcessingErrorCode {
  /** A grammar required for the file could not be loaded */
  PARSER_UNAVAILABLE = 'PARSER_UNAVAILABLE',
  /** File bytes are not valid text for a parser that needs strict UTF-8 */
  DECODE_FAILED = 'DECODE_FAILED',
  /** Parsing or the definitions traversal blew up */
  EXTRACTION_FAILED = 'EXTRACTION_FAILED',
  /** File could not be read */
  READ_FAILED = 'READ_FAILED',
}

export class SourceProcessingError extends Error {
  constructor(
    message: string,
    public readonly code: ProcessingErrorCode,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'SourceProcessingError';
  }
}

export class ParserUnavailableError extends SourceProcessingError {
  constructor(
    public readonly language: LanguageId,
    reason: string
  ) {
    super(`Parser for '${language}' is unavailable: ${reason}`, ProcessingErrorCode.PARSER_UNAVAILABLE);
    this.name = 'ParserUnavailableError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

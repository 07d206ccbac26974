import type { DiagnosticSource } from './diagnostics.js';

/** Stable machine-readable codes for fatal import failures. */
export type DecodeErrorCode =
  | 'CORRUPT_ARCHIVE'
  | 'UNSUPPORTED_COMPRESSION'
  | 'UNSUPPORTED_FORMAT'
  | 'MALFORMED_DOCUMENT'
  | 'OUT_OF_RANGE_VALUE'
  | 'ENTRY_NOT_FOUND';

/** Where in the input a failure was detected. */
export interface DecodeErrorContext {
  /** Byte offset into binary input. */
  offset?: number;
  /** Archive entry or XML element the failure concerns. */
  element?: string;
  source?: DiagnosticSource;
}

/** Base class for every failure raised while decoding a music file. */
export class DecodeError extends Error {
  readonly code: DecodeErrorCode;
  readonly offset?: number;
  readonly element?: string;
  readonly source?: DiagnosticSource;

  constructor(code: DecodeErrorCode, message: string, context: DecodeErrorContext = {}) {
    super(message);
    this.name = 'DecodeError';
    this.code = code;
    this.offset = context.offset;
    this.element = context.element;
    this.source = context.source;
  }
}

/** Archive structure is damaged: missing signatures, truncated records, CRC or length mismatch. */
export class CorruptArchiveError extends DecodeError {
  constructor(message: string, context: DecodeErrorContext = {}) {
    super('CORRUPT_ARCHIVE', message, context);
    this.name = 'CorruptArchiveError';
  }
}

/** Archive entry uses a compression method (or encryption) this reader does not implement. */
export class UnsupportedCompressionError extends DecodeError {
  readonly method: number;

  constructor(method: number, message: string, context: DecodeErrorContext = {}) {
    super('UNSUPPORTED_COMPRESSION', message, context);
    this.name = 'UnsupportedCompressionError';
    this.method = method;
  }
}

/** Input is a recognized format variant that is not handled (SMPTE timing, ZIP64). */
export class UnsupportedFormatError extends DecodeError {
  constructor(message: string, context: DecodeErrorContext = {}) {
    super('UNSUPPORTED_FORMAT', message, context);
    this.name = 'UnsupportedFormatError';
  }
}

/** Required structure is missing or the document cannot be tokenized. */
export class MalformedDocumentError extends DecodeError {
  constructor(message: string, context: DecodeErrorContext = {}) {
    super('MALFORMED_DOCUMENT', message, context);
    this.name = 'MalformedDocumentError';
  }
}

/** A pitch, velocity, channel or other bounded value falls outside its legal range. */
export class OutOfRangeValueError extends DecodeError {
  readonly field: string;
  readonly value: number;

  /** `expected` describes the legal range, e.g. `[0, 127]` or `> 0`. */
  constructor(field: string, value: number, expected: string) {
    super('OUT_OF_RANGE_VALUE', `${field} ${value} is out of range (expected ${expected}).`, { element: field });
    this.name = 'OutOfRangeValueError';
    this.field = field;
    this.value = value;
  }
}

/** The requested archive entry does not exist. */
export class EntryNotFoundError extends DecodeError {
  constructor(name: string) {
    super('ENTRY_NOT_FOUND', `Archive entry '${name}' not found.`, { element: name });
    this.name = 'EntryNotFoundError';
  }
}

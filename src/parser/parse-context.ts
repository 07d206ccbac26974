import type { Diagnostic, DiagnosticSeverity } from '../core/diagnostics.js';
import { MalformedDocumentError } from '../core/errors.js';
import type { Score } from '../core/score.js';
import type { XmlElement, XmlLocation } from './xml-stream.js';

/** Supported decoder strictness modes. */
export type ParserMode = 'strict' | 'lenient';

/** Options shared by every decoder entry point. */
export interface DecodeOptions {
  sourceName?: string;
  mode?: ParserMode;
}

/** Decoder return envelope: a complete score plus the warnings recorded on the way. */
export interface DecodeResult {
  score: Score;
  diagnostics: Diagnostic[];
}

/** Mutable decoder state shared by helper passes. */
export interface ParseContext {
  mode: ParserMode;
  sourceName?: string;
  diagnostics: Diagnostic[];
  validationFailure: boolean;
  /** Codes already reported through {@link addDiagnosticOnce}. */
  reported: Set<string>;
}

/** Where a diagnostic points: an XML element, a raw location, or a byte offset. */
export interface DiagnosticAnchor {
  element?: XmlElement;
  source?: XmlLocation;
  offset?: number;
}

/** Create a context for one decode invocation. */
export function createParseContext(mode: ParserMode, sourceName?: string): ParseContext {
  return {
    mode,
    sourceName,
    diagnostics: [],
    validationFailure: false,
    reported: new Set<string>()
  };
}

/** Record a diagnostic entry, escalating warnings to errors in strict mode. */
export function addDiagnostic(
  ctx: ParseContext,
  code: string,
  severity: DiagnosticSeverity,
  message: string,
  anchor: DiagnosticAnchor = {}
): void {
  let actualSeverity = severity;
  if (ctx.mode === 'strict' && severity === 'warning') {
    actualSeverity = 'error';
  }

  if (actualSeverity === 'error') {
    ctx.validationFailure = true;
  }

  const location = anchor.source ?? anchor.element?.location;
  ctx.diagnostics.push({
    code,
    severity: actualSeverity,
    message,
    source: location ? { name: ctx.sourceName, ...location } : undefined,
    xmlPath: anchor.element?.path,
    offset: anchor.offset
  });
}

/** Like {@link addDiagnostic}, but only the first report for `key` is kept. */
export function addDiagnosticOnce(
  ctx: ParseContext,
  key: string,
  code: string,
  severity: DiagnosticSeverity,
  message: string,
  anchor: DiagnosticAnchor = {}
): void {
  if (ctx.reported.has(key)) {
    return;
  }

  ctx.reported.add(key);
  addDiagnostic(ctx, code, severity, message, anchor);
}

/** Seal a decode. In strict mode any recorded error voids the whole result. */
export function finishDecode(ctx: ParseContext, score: Score): DecodeResult {
  if (ctx.mode === 'strict' && ctx.validationFailure) {
    const first = ctx.diagnostics.find((diagnostic) => diagnostic.severity === 'error');
    throw new MalformedDocumentError(
      `Strict decode rejected the document: ${first ? `${first.code}: ${first.message}` : 'validation failed'}`,
      { offset: first?.offset, source: first?.source }
    );
  }

  return { score, diagnostics: ctx.diagnostics };
}

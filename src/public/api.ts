import { readFile } from 'node:fs/promises';
import path from 'node:path';

import type { Diagnostic } from '../core/diagnostics.js';
import { DecodeError } from '../core/errors.js';
import type { Score } from '../core/score.js';
import { decodeMidi } from '../parser/midi.js';
import { decodeMusicXml } from '../parser/musicxml.js';
import { extractNotationDocument } from '../parser/mxl.js';
import type { DecodeOptions, ParserMode } from '../parser/parse-context.js';

/** Input formats accepted by {@link importScore}; `auto` sniffs the bytes. */
export type ImportFormat = 'auto' | 'mxl' | 'musicxml' | 'midi';

/** Import configuration shared by the byte and file entry points. */
export interface ImportOptions extends DecodeOptions {
  /** Title for MIDI files without a sequence name. */
  title?: string;
}

/** Import input supporting text and binary payloads. */
export interface ImportInput {
  data: string | Uint8Array;
  format?: ImportFormat;
}

/** Standard import return envelope with diagnostics-first reporting. */
export interface ImportResult {
  score?: Score;
  diagnostics: Diagnostic[];
}

const EXTENSION_FORMATS: Readonly<Record<string, ImportFormat>> = {
  '.mxl': 'mxl',
  '.mscz': 'mxl',
  '.musicxml': 'musicxml',
  '.xml': 'musicxml',
  '.mid': 'midi',
  '.midi': 'midi'
};

/**
 * Decode a notation archive, MusicXML document or Standard MIDI File.
 * Fatal decode failures come back as a single `error` diagnostic carrying the failure code, with no score.
 */
export function importScore(input: ImportInput, options: ImportOptions = {}): ImportResult {
  const format = resolveFormat(input);
  try {
    return decodeAs(format, input.data, options);
  } catch (error) {
    if (error instanceof DecodeError) {
      return { diagnostics: [diagnosticFromError(error)] };
    }
    throw error;
  }
}

/** Read `filePath` and import it, choosing the format from the extension. */
export async function importScoreFile(filePath: string, options: ImportOptions = {}): Promise<ImportResult> {
  const data = new Uint8Array(await readFile(filePath));
  const extension = path.extname(filePath).toLowerCase();
  const baseName = path.basename(filePath, path.extname(filePath));

  return importScore(
    { data, format: EXTENSION_FORMATS[extension] ?? 'auto' },
    {
      ...options,
      sourceName: options.sourceName ?? path.basename(filePath),
      title: options.title ?? baseName
    }
  );
}

/** Detect the payload format from leading magic bytes. */
export function sniffFormat(data: string | Uint8Array): Exclude<ImportFormat, 'auto'> {
  if (typeof data === 'string') {
    return 'musicxml';
  }

  if (data.length >= 2 && data[0] === 0x50 && data[1] === 0x4b) {
    return 'mxl';
  }

  if (data.length >= 4 && data[0] === 0x4d && data[1] === 0x54 && data[2] === 0x68 && data[3] === 0x64) {
    return 'midi';
  }

  return 'musicxml';
}

function resolveFormat(input: ImportInput): Exclude<ImportFormat, 'auto'> {
  const format = input.format ?? 'auto';
  return format === 'auto' ? sniffFormat(input.data) : format;
}

function decodeAs(format: Exclude<ImportFormat, 'auto'>, data: string | Uint8Array, options: ImportOptions): ImportResult {
  switch (format) {
    case 'musicxml':
      return decodeMusicXml(data, options);
    case 'midi':
      if (typeof data === 'string') {
        return binaryRequired('MIDI');
      }
      return decodeMidi(data, options);
    case 'mxl': {
      if (typeof data === 'string') {
        return binaryRequired('Notation archive');
      }

      const document = extractNotationDocument(data);
      const extractionDiagnostics = normalizeDiagnosticsForMode(document.diagnostics, options.mode ?? 'lenient');
      if (extractionDiagnostics.some((diagnostic) => diagnostic.severity === 'error')) {
        return { diagnostics: extractionDiagnostics };
      }

      const decoded = decodeMusicXml(document.xml, {
        ...options,
        sourceName: options.sourceName ?? document.entryName,
        sourceFormat: 'mxl'
      });
      return { score: decoded.score, diagnostics: [...extractionDiagnostics, ...decoded.diagnostics] };
    }
  }
}

function binaryRequired(label: string): ImportResult {
  return {
    diagnostics: [
      {
        code: 'UNSUPPORTED_FORMAT',
        severity: 'error',
        message: `${label} decoding requires binary data, not text.`
      }
    ]
  };
}

function diagnosticFromError(error: DecodeError): Diagnostic {
  return {
    code: error.code,
    severity: 'error',
    message: error.message,
    source: error.source,
    offset: error.offset
  };
}

/** Align archive-level diagnostics with strict/lenient decode semantics. */
function normalizeDiagnosticsForMode(diagnostics: Diagnostic[], mode: ParserMode): Diagnostic[] {
  if (mode !== 'strict') {
    return diagnostics;
  }

  return diagnostics.map((diagnostic) =>
    diagnostic.severity === 'warning'
      ? {
          ...diagnostic,
          severity: 'error' as const
        }
      : diagnostic
  );
}

import type { Diagnostic } from '../core/diagnostics.js';
import { MalformedDocumentError } from '../core/errors.js';
import { findEntry, listEntries, normalizeEntryPath, readEntryPayload, type ArchiveEntry } from '../archive/zip.js';
import { streamXml, XmlParseError } from './xml-stream.js';

/** Archive path of the OCF-style container manifest. */
export const CONTAINER_PATH = 'META-INF/container.xml';

/** Which archive entry holds the notation document, and how it was chosen. */
export interface NotationEntryResolution {
  entry: ArchiveEntry;
  diagnostics: Diagnostic[];
}

/** Result envelope for notation archive extraction. */
export interface NotationDocument {
  /** Raw bytes of the MusicXML document. */
  xml: Uint8Array;
  entryName: string;
  diagnostics: Diagnostic[];
}

/**
 * Pick the notation document inside an archive.
 * This resolves `META-INF/container.xml` when present and falls back to the first score-like XML entry.
 */
export function resolveNotationEntry(data: Uint8Array, entries: readonly ArchiveEntry[]): NotationEntryResolution {
  const diagnostics: Diagnostic[] = [];
  const containerEntry = findEntry(entries, CONTAINER_PATH);

  let rootPath: string | undefined;
  if (!containerEntry) {
    diagnostics.push({
      code: 'MXL_CONTAINER_MISSING',
      severity: 'warning',
      message: `${CONTAINER_PATH} not found; falling back to first score XML entry.`
    });
  } else {
    rootPath = readRootFilePath(readEntryPayload(data, containerEntry), diagnostics);
  }

  if (rootPath) {
    const entry = findEntry(entries, rootPath);
    if (entry) {
      return { entry, diagnostics };
    }

    diagnostics.push({
      code: 'MXL_ROOTFILE_NOT_FOUND',
      severity: 'warning',
      message: `Rootfile '${rootPath}' not found in archive; falling back to first score XML entry.`
    });
  }

  const fallback = findFallbackEntry(entries);
  if (!fallback) {
    throw new MalformedDocumentError('No MusicXML document found in archive.', { element: CONTAINER_PATH });
  }

  return { entry: fallback, diagnostics };
}

/** List, resolve and extract the MusicXML document of a notation archive (`.mxl`, `.mscz`). */
export function extractNotationDocument(data: Uint8Array): NotationDocument {
  const entries = listEntries(data);
  const { entry, diagnostics } = resolveNotationEntry(data, entries);
  return {
    xml: readEntryPayload(data, entry),
    entryName: entry.name,
    diagnostics
  };
}

/**
 * Return the preferred rootfile path from container.xml: the first `full-path` naming an XML
 * document, else the first one listed.
 */
function readRootFilePath(containerBytes: Uint8Array, diagnostics: Diagnostic[]): string | undefined {
  const rootPaths: string[] = [];
  try {
    streamXml(
      new TextDecoder().decode(containerBytes),
      {
        onOpen(element) {
          const fullPath = element.attributes['full-path'];
          if (element.name === 'rootfile' && fullPath) {
            rootPaths.push(normalizeEntryPath(fullPath));
          }
        }
      },
      CONTAINER_PATH
    );
  } catch (error) {
    if (!(error instanceof XmlParseError)) {
      throw error;
    }
    diagnostics.push({
      code: 'MXL_CONTAINER_INVALID',
      severity: 'warning',
      message: `container.xml is malformed (${error.message}); using fallback score lookup.`,
      source: error.source ? { name: CONTAINER_PATH, ...error.source } : undefined
    });
    return undefined;
  }

  if (rootPaths.length === 0) {
    diagnostics.push({
      code: 'MXL_CONTAINER_INVALID',
      severity: 'warning',
      message: 'container.xml is missing rootfile full-path; using fallback score lookup.'
    });
    return undefined;
  }

  return rootPaths.find(isXmlDocumentPath) ?? rootPaths[0];
}

/** Prefer `.musicxml` entries, then any `.xml`, ignoring the container manifest and META-INF. */
function findFallbackEntry(entries: readonly ArchiveEntry[]): ArchiveEntry | undefined {
  const candidates = entries.filter((entry) => !entry.name.toLowerCase().startsWith('meta-inf/'));
  return (
    candidates.find((entry) => entry.name.toLowerCase().endsWith('.musicxml')) ??
    candidates.find((entry) => entry.name.toLowerCase().endsWith('.xml'))
  );
}

function isXmlDocumentPath(value: string): boolean {
  const lower = value.toLowerCase();
  return lower.endsWith('.musicxml') || lower.endsWith('.xml');
}

import { access, readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

/** Expected decode outcome declared by a fixture sidecar. */
const FixtureExpectationSchema = z
  .object({
    parts: z.number().int().nonnegative().optional(),
    notes: z.number().int().nonnegative().optional(),
    title: z.string().optional(),
    tempo: z.number().positive().optional(),
    total_beats: z.number().nonnegative().optional(),
    error_code: z.string().optional(),
    diagnostic_codes: z.array(z.string()).optional()
  })
  .strict();

/** Metadata contract for one corpus fixture sidecar file. */
export const FixtureMetaSchema = z
  .object({
    id: z.string().trim().min(1),
    source: z.string().trim().min(1),
    category: z.string().trim().min(1),
    expected: z.enum(['pass', 'fail']),
    status: z.enum(['active', 'skip']),
    parse_mode: z.enum(['strict', 'lenient']).optional(),
    notes: z.string().optional(),
    expect: FixtureExpectationSchema.optional()
  })
  .strict();

export type FixtureMeta = z.infer<typeof FixtureMetaSchema>;
export type FixtureExpectation = z.infer<typeof FixtureExpectationSchema>;

/** Resolved fixture record including metadata and score file paths. */
export interface FixtureRecord {
  metaPath: string;
  scorePath: string;
  meta: FixtureMeta;
}

/** Validation error for malformed fixture metadata. */
export class FixtureMetadataError extends Error {
  readonly filePath: string;

  constructor(filePath: string, message: string) {
    super(`Metadata error in ${filePath}: ${message}`);
    this.name = 'FixtureMetadataError';
    this.filePath = filePath;
  }
}

/** Accepted metadata filename suffixes. */
const META_SUFFIXES = ['.meta.yaml', '.meta.yml'];
/** Score extensions probed when resolving a fixture payload from metadata. */
const SCORE_EXTENSIONS = ['.musicxml', '.xml', '.mxl', '.mscz', '.mid', '.midi'];

/** Load and validate all fixture records under `rootDir`, sorted by id. */
export async function loadFixtures(rootDir: string): Promise<FixtureRecord[]> {
  const metaFiles = await findMetadataFiles(rootDir);
  const records: FixtureRecord[] = [];

  for (const metaPath of metaFiles) {
    const raw = await readFile(metaPath, 'utf8');
    const meta = parseFixtureMeta(metaPath, raw);
    const scorePath = await resolveScorePath(metaPath);
    records.push({ metaPath, scorePath, meta });
  }

  records.sort((left, right) => left.meta.id.localeCompare(right.meta.id));
  return records;
}

/** Parse YAML sidecar text into validated fixture metadata. */
export function parseFixtureMeta(filePath: string, yamlText: string): FixtureMeta {
  let input: unknown;
  try {
    input = parseYaml(yamlText);
  } catch (error) {
    throw new FixtureMetadataError(filePath, error instanceof Error ? error.message : 'YAML is not parseable');
  }

  const result = FixtureMetaSchema.safeParse(input);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `'${issue.path.join('.') || 'root'}' ${issue.message}`)
      .join('; ');
    throw new FixtureMetadataError(filePath, detail);
  }

  return result.data;
}

/** Recursively discover metadata files from the corpus root. */
async function findMetadataFiles(rootDir: string): Promise<string[]> {
  const matches: string[] = [];

  async function walk(dir: string): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(fullPath);
        continue;
      }

      if (META_SUFFIXES.some((suffix) => entry.name.endsWith(suffix))) {
        matches.push(fullPath);
      }
    }
  }

  await walk(rootDir);
  return matches;
}

/** Resolve the score file that belongs to one metadata file. */
async function resolveScorePath(metaPath: string): Promise<string> {
  const base = stripMetaSuffix(metaPath);

  for (const extension of SCORE_EXTENSIONS) {
    const candidate = `${base}${extension}`;
    if (await exists(candidate)) {
      return candidate;
    }
  }

  throw new FixtureMetadataError(metaPath, 'no matching score file found for metadata');
}

/** Remove `.meta.yaml`/`.meta.yml` from a metadata file path. */
function stripMetaSuffix(filePath: string): string {
  for (const suffix of META_SUFFIXES) {
    if (filePath.endsWith(suffix)) {
      return filePath.slice(0, -suffix.length);
    }
  }

  return filePath;
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

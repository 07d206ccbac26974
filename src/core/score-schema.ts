import { z } from 'zod';

import { MalformedDocumentError } from './errors.js';
import type { Score } from './score.js';

// ─── Schemas ────────────────────────────────────────────────────────────────

export const NoteSchema = z
  .object({
    pitch: z.number().int().min(0).max(127),
    velocity: z.number().int().min(0).max(127),
    startTime: z.number().finite().min(0),
    duration: z.number().finite().positive(),
    channel: z.number().int().min(0).max(15)
  })
  .strict();

export const PartSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    instrument: z.string(),
    midiChannel: z.number().int().min(0).max(15),
    midiProgram: z.number().int().min(0).max(127),
    transpose: z.number().int(),
    volume: z.number().min(0).max(1),
    pan: z.number().min(-1).max(1),
    muted: z.boolean(),
    solo: z.boolean(),
    notes: z.array(NoteSchema)
  })
  .strict()
  .refine((part) => part.notes.every((note) => note.channel === part.midiChannel), {
    message: 'note channel must match the owning part channel'
  });

export const ScoreSchema = z
  .object({
    id: z.string(),
    title: z.string(),
    composer: z.string(),
    arranger: z.string().optional(),
    copyright: z.string().optional(),
    keySignature: z.string().optional(),
    timeSignature: z.string().optional(),
    tempo: z.number().finite().positive().optional(),
    source: z
      .object({
        name: z.string().optional(),
        format: z.enum(['musicxml', 'mxl', 'midi'])
      })
      .strict()
      .optional(),
    parts: z.array(PartSchema)
  })
  .strict();

// ─── Serialization ──────────────────────────────────────────────────────────

/** Serialize a score field-for-field to JSON text. */
export function serializeScore(score: Score, space?: number): string {
  return JSON.stringify(score, null, space);
}

/** Parse and validate JSON produced by {@link serializeScore}. */
export function deserializeScore(text: string): Score {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new MalformedDocumentError(
      `Score JSON is not parseable: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const result = ScoreSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`)
      .join('; ');
    throw new MalformedDocumentError(`Score JSON failed validation: ${issues}`);
  }

  return result.data;
}

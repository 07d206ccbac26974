import { OutOfRangeValueError } from './errors.js';
import { DEFAULT_TEMPO, type Note, type Part, type Score, type ScoreSource } from './score.js';

/** Velocity used when a source does not specify one. */
export const DEFAULT_VELOCITY = 64;

/** Fields accepted by {@link createScore}; everything is optional. */
export interface ScoreInit {
  id?: string;
  title?: string;
  composer?: string;
  arranger?: string;
  copyright?: string;
  keySignature?: string;
  timeSignature?: string;
  tempo?: number;
  source?: ScoreSource;
}

/** Fields accepted by {@link createPart}. */
export interface PartInit {
  id: string;
  name?: string;
  instrument?: string;
  midiChannel?: number;
  midiProgram?: number;
  transpose?: number;
  volume?: number;
  pan?: number;
  muted?: boolean;
  solo?: boolean;
}

/** Fields accepted by {@link createNote}. */
export interface NoteInit {
  pitch: number;
  velocity?: number;
  startTime: number;
  duration: number;
}

/** Create an empty score, rejecting a non-positive tempo. */
export function createScore(init: ScoreInit = {}): Score {
  if (init.tempo !== undefined && !(Number.isFinite(init.tempo) && init.tempo > 0)) {
    throw new OutOfRangeValueError('tempo', init.tempo, '> 0');
  }

  return {
    id: init.id ?? 'score-1',
    title: init.title ?? 'Untitled',
    composer: init.composer ?? 'Unknown',
    arranger: init.arranger,
    copyright: init.copyright,
    keySignature: init.keySignature,
    timeSignature: init.timeSignature,
    tempo: init.tempo,
    source: init.source,
    parts: []
  };
}

/** Create an empty part with validated routing and mix settings. */
export function createPart(init: PartInit): Part {
  const midiChannel = init.midiChannel ?? 0;
  const midiProgram = init.midiProgram ?? 0;
  const transpose = init.transpose ?? 0;
  const volume = init.volume ?? 1;
  const pan = init.pan ?? 0;

  requireInteger('midiChannel', midiChannel, 0, 15);
  requireInteger('midiProgram', midiProgram, 0, 127);
  if (!Number.isInteger(transpose)) {
    throw new OutOfRangeValueError('transpose', transpose, 'an integer');
  }
  requireRange('volume', volume, 0, 1);
  requireRange('pan', pan, -1, 1);

  return {
    id: init.id,
    name: init.name ?? init.id,
    instrument: init.instrument ?? init.name ?? init.id,
    midiChannel,
    midiProgram,
    transpose,
    volume,
    pan,
    muted: init.muted ?? false,
    solo: init.solo ?? false,
    notes: []
  };
}

/** Build a note for `channel`; out-of-range input throws instead of wrapping. */
export function createNote(init: NoteInit, channel: number): Note {
  const velocity = init.velocity ?? DEFAULT_VELOCITY;

  requireInteger('pitch', init.pitch, 0, 127);
  requireInteger('velocity', velocity, 0, 127);
  requireInteger('channel', channel, 0, 15);
  if (!Number.isFinite(init.startTime) || init.startTime < 0) {
    throw new OutOfRangeValueError('startTime', init.startTime, 'a finite value >= 0');
  }
  if (!Number.isFinite(init.duration) || init.duration <= 0) {
    throw new OutOfRangeValueError('duration', init.duration, 'a finite value > 0');
  }
  if (!Number.isFinite(init.startTime + init.duration)) {
    throw new OutOfRangeValueError('endTime', init.startTime + init.duration, 'a finite value');
  }

  return {
    pitch: init.pitch,
    velocity,
    startTime: init.startTime,
    duration: init.duration,
    channel
  };
}

/** Validate and append a note to `part`, returning the stored note. */
export function addNote(part: Part, init: NoteInit): Note {
  const note = createNote(init, part.midiChannel);
  part.notes.push(note);
  return note;
}

/** Effective tempo of a score in BPM. */
export function scoreTempo(score: Score): number {
  return score.tempo ?? DEFAULT_TEMPO;
}

/** Latest note end across all parts, in beats. */
export function totalBeats(score: Score): number {
  let max = 0;
  for (const part of score.parts) {
    for (const note of part.notes) {
      max = Math.max(max, note.startTime + note.duration);
    }
  }
  return max;
}

/** Length of the score in seconds at `tempo` (defaults to the score's own tempo). */
export function totalDuration(score: Score, tempo: number = scoreTempo(score)): number {
  return beatsToSeconds(totalBeats(score), tempo);
}

/** Convert a beat position to seconds at `tempo` BPM. */
export function beatsToSeconds(beats: number, tempo: number): number {
  return (beats * 60) / tempo;
}

/** Convert seconds to a beat position at `tempo` BPM. */
export function secondsToBeats(seconds: number, tempo: number): number {
  return (seconds * tempo) / 60;
}

function requireInteger(field: string, value: number, min: number, max: number): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new OutOfRangeValueError(field, value, `an integer in [${min}, ${max}]`);
  }
}

function requireRange(field: string, value: number, min: number, max: number): void {
  if (!Number.isFinite(value) || value < min || value > max) {
    throw new OutOfRangeValueError(field, value, `[${min}, ${max}]`);
  }
}

/** Input container a score was decoded from. */
export type ScoreSourceFormat = 'musicxml' | 'mxl' | 'midi';

/** Canonical score root produced by every decoder and consumed by the scheduler. */
export interface Score {
  id: string;
  title: string;
  composer: string;
  arranger?: string;
  copyright?: string;
  /** Human-readable key, e.g. `G major`. */
  keySignature?: string;
  /** Numerator/denominator, e.g. `3/4`. */
  timeSignature?: string;
  /** Beats per minute; absent means {@link DEFAULT_TEMPO}. */
  tempo?: number;
  source?: ScoreSource;
  parts: Part[];
}

/** Provenance of a decoded score. */
export interface ScoreSource {
  name?: string;
  format: ScoreSourceFormat;
}

/** One instrument voice routed to a single MIDI channel. */
export interface Part {
  id: string;
  name: string;
  instrument: string;
  /** 0-15. */
  midiChannel: number;
  /** 0-127. */
  midiProgram: number;
  /** Semitone offset applied at playback. */
  transpose: number;
  /** 0.0-1.0. */
  volume: number;
  /** -1.0 (left) to 1.0 (right). */
  pan: number;
  muted: boolean;
  solo: boolean;
  notes: Note[];
}

/** A sounding note; times are in beats (quarter notes). */
export interface Note {
  pitch: number;
  velocity: number;
  startTime: number;
  duration: number;
  /** Cached copy of the owning part's channel. */
  channel: number;
}

/** Tempo assumed when a score carries none. */
export const DEFAULT_TEMPO = 120;

export * from './api.js';

export type { Diagnostic, DiagnosticSeverity, DiagnosticSource } from '../core/diagnostics.js';
export * from '../core/errors.js';
export type { Note, Part, Score, ScoreSource, ScoreSourceFormat } from '../core/score.js';
export { DEFAULT_TEMPO } from '../core/score.js';
export * from '../core/score-builder.js';
export { noteNameToPitch, pitchFromStep, pitchToNoteName } from '../core/pitch.js';
export { deserializeScore, serializeScore, ScoreSchema } from '../core/score-schema.js';

export { extractEntry, extractEntryToFile, listEntries, type ArchiveEntry } from '../archive/zip.js';
export { crc32 } from '../archive/crc32.js';
export { extractNotationDocument, resolveNotationEntry, type NotationDocument } from '../parser/mxl.js';
export { decodeMusicXml, type MusicXmlDecodeOptions } from '../parser/musicxml.js';
export { decodeMidi, type MidiDecodeOptions } from '../parser/midi.js';
export type { DecodeOptions, DecodeResult, ParserMode } from '../parser/parse-context.js';

export { EventScheduler, MAX_TEMPO, MIN_TEMPO, type PlaybackState, type SchedulerOptions } from '../playback/scheduler.js';
export { audibleParts, compileTimeline, type NoteCommand, type TimedCommand } from '../playback/timeline.js';
export type { ScoreSink } from '../playback/sink.js';
export type { Clock, TimerHost } from '../playback/clock.js';

export {
  ConfigError,
  loadPlaybackConfig,
  parsePlaybackConfig,
  toSchedulerOptions,
  type PlaybackConfig
} from '../config/playback-config.js';

import type { NoteCommand } from './timeline.js';

/**
 * Receiver of scheduled commands: a synthesizer, a MIDI port or a test recorder.
 * Calls arrive in timeline order from the scheduler's single writer.
 */
export interface ScoreSink {
  send(command: NoteCommand): void;
  /** Master volume in 0..1. */
  setVolume?(volume: number): void;
  /** Select a General MIDI program (0..127) on a channel (0..15). */
  setProgram?(channel: number, program: number): void;
}

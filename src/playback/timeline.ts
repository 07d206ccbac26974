import type { Diagnostic } from '../core/diagnostics.js';
import { beatsToSeconds } from '../core/score-builder.js';
import type { Part, Score } from '../core/score.js';

export type CommandKind = 'noteOn' | 'noteOff';

/** A MIDI-style note message addressed to the sink. */
export interface NoteCommand {
  kind: CommandKind;
  channel: number;
  pitch: number;
  /** 0 for `noteOff`. */
  velocity: number;
}

/** A note command placed on the playback timeline. */
export interface TimedCommand extends NoteCommand {
  /** Seconds from the start of the score at the compiled tempo. */
  time: number;
  /** Beat position; unchanged by tempo. */
  beat: number;
  /** Encounter index, used as the final sort key. */
  order: number;
}

export interface CompiledTimeline {
  commands: TimedCommand[];
  diagnostics: Diagnostic[];
}

/** Parts that sound: muted parts are dropped and, when any part is solo, only solo parts remain. */
export function audibleParts(score: Score): Part[] {
  const unmuted = score.parts.filter((part) => !part.muted);
  const soloed = unmuted.filter((part) => part.solo);
  return soloed.length > 0 ? soloed : unmuted;
}

/**
 * Flatten a score into NoteOn/NoteOff commands at `tempo` BPM.
 *
 * Commands are ordered by beat, then NoteOff before NoteOn, then encounter order. The ordering
 * never depends on tempo, so a cursor index into one compilation stays valid in the next.
 */
export function compileTimeline(score: Score, tempo: number): CompiledTimeline {
  const commands: TimedCommand[] = [];
  const diagnostics: Diagnostic[] = [];
  let order = 0;

  for (const part of audibleParts(score)) {
    for (const note of part.notes) {
      const pitch = note.pitch + part.transpose;
      if (pitch < 0 || pitch > 127) {
        diagnostics.push({
          code: 'TRANSPOSED_PITCH_OUT_OF_RANGE',
          severity: 'warning',
          message: `Part '${part.id}': pitch ${note.pitch} transposed by ${part.transpose} leaves the MIDI range; note skipped.`
        });
        continue;
      }

      const velocity = Math.round(note.velocity * part.volume);
      const endBeat = note.startTime + note.duration;
      commands.push({
        kind: 'noteOn',
        channel: note.channel,
        pitch,
        velocity,
        beat: note.startTime,
        time: beatsToSeconds(note.startTime, tempo),
        order: order++
      });
      commands.push({
        kind: 'noteOff',
        channel: note.channel,
        pitch,
        velocity: 0,
        beat: endBeat,
        time: beatsToSeconds(endBeat, tempo),
        order: order++
      });
    }
  }

  commands.sort(compareCommands);
  return { commands, diagnostics };
}

/** Re-time an already ordered timeline for a new tempo. */
export function retimeTimeline(commands: readonly TimedCommand[], tempo: number): TimedCommand[] {
  return commands.map((command) => ({ ...command, time: beatsToSeconds(command.beat, tempo) }));
}

function compareCommands(left: TimedCommand, right: TimedCommand): number {
  return left.beat - right.beat || kindRank(left.kind) - kindRank(right.kind) || left.order - right.order;
}

function kindRank(kind: CommandKind): number {
  return kind === 'noteOff' ? 0 : 1;
}

import type { Clock, TimerHost } from '../../src/playback/clock.js';
import type { ScoreSink } from '../../src/playback/sink.js';
import type { NoteCommand } from '../../src/playback/timeline.js';

/** Clock that only moves when told to. */
export class ManualClock implements Clock {
  time = 0;

  now(): number {
    return this.time;
  }

  advance(seconds: number): void {
    this.time += seconds;
  }
}

/** Timer host that records registrations without ever firing on its own. */
export class ManualTimers implements TimerHost {
  readonly intervals: number[] = [];
  active = 0;

  every(intervalMs: number): () => void {
    this.intervals.push(intervalMs);
    this.active += 1;
    let cancelled = false;
    return () => {
      if (!cancelled) {
        cancelled = true;
        this.active -= 1;
      }
    };
  }
}

/** Sink that keeps every call as a compact string, e.g. `on:0:60:100` or `off:0:60`. */
export class RecordingSink implements ScoreSink {
  readonly sent: string[] = [];
  readonly programs: string[] = [];
  readonly volumes: number[] = [];
  onSend?: (command: NoteCommand) => void;

  send(command: NoteCommand): void {
    this.sent.push(
      command.kind === 'noteOn'
        ? `on:${command.channel}:${command.pitch}:${command.velocity}`
        : `off:${command.channel}:${command.pitch}`
    );
    this.onSend?.(command);
  }

  setProgram(channel: number, program: number): void {
    this.programs.push(`${channel}:${program}`);
  }

  setVolume(volume: number): void {
    this.volumes.push(volume);
  }
}

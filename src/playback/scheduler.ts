import type { Diagnostic } from '../core/diagnostics.js';
import { OutOfRangeValueError } from '../core/errors.js';
import { beatsToSeconds, scoreTempo, secondsToBeats, totalDuration } from '../core/score-builder.js';
import { DEFAULT_TEMPO, type Score } from '../core/score.js';
import { intervalTimers, performanceClock, type CancelTimer, type Clock, type TimerHost } from './clock.js';
import type { ScoreSink } from './sink.js';
import { compileTimeline, retimeTimeline, type NoteCommand, type TimedCommand } from './timeline.js';

export type PlaybackState = 'stopped' | 'playing' | 'paused';

export const MIN_TEMPO = 30;
export const MAX_TEMPO = 300;
export const DEFAULT_TICK_INTERVAL_MS = 10;

export interface SchedulerOptions {
  /** Tempo applied on every load instead of the score's own tempo. */
  tempo?: number;
  /** Master volume in 0..1; default 1. */
  volume?: number;
  loop?: boolean;
  tickIntervalMs?: number;
  clock?: Clock;
  timers?: TimerHost;
}

/**
 * Dispatches a compiled score to a {@link ScoreSink} against a monotonic clock.
 *
 * Every control call and every timer tick runs through one exclusive queue. A call made while
 * another is running (for example from inside `sink.send`) is queued and runs once the current
 * one returns, so state is only ever touched by one writer.
 */
export class EventScheduler {
  loop: boolean;

  private readonly sink: ScoreSink;
  private readonly clock: Clock;
  private readonly timers: TimerHost;
  private readonly tickIntervalMs: number;
  private readonly tempoOverride?: number;

  private currentState: PlaybackState = 'stopped';
  private currentTempo: number;
  private currentVolume: number;
  private loadedScore?: Score;
  private commands: TimedCommand[] = [];
  private duration = 0;
  private cursor = 0;
  /** Clock reading that corresponds to score time 0 while playing. */
  private referenceStart = 0;
  /** Score position held while paused or stopped. */
  private heldOffset = 0;
  private cancelTimer?: CancelTimer;
  private readonly sounding = new Map<number, number>();
  private readonly recorded: Diagnostic[] = [];
  /** Sink operations that have already reported a failure since the last load. */
  private readonly failedSinkOperations = new Set<string>();

  private readonly pending: Array<() => void> = [];
  private draining = false;

  constructor(sink: ScoreSink, options: SchedulerOptions = {}) {
    this.sink = sink;
    this.clock = options.clock ?? performanceClock;
    this.timers = options.timers ?? intervalTimers;
    this.loop = options.loop ?? false;

    const tickIntervalMs = options.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS;
    if (!Number.isFinite(tickIntervalMs) || tickIntervalMs <= 0) {
      throw new OutOfRangeValueError('tickIntervalMs', tickIntervalMs, '> 0');
    }
    this.tickIntervalMs = tickIntervalMs;

    if (options.tempo !== undefined) {
      this.tempoOverride = clampTempo(requireFinite('tempo', options.tempo));
    }
    this.currentTempo = this.tempoOverride ?? DEFAULT_TEMPO;
    this.currentVolume = clamp(requireFinite('volume', options.volume ?? 1), 0, 1);
  }

  get state(): PlaybackState {
    return this.currentState;
  }

  get tempo(): number {
    return this.currentTempo;
  }

  get volume(): number {
    return this.currentVolume;
  }

  get score(): Score | undefined {
    return this.loadedScore;
  }

  get timeline(): readonly TimedCommand[] {
    return this.commands;
  }

  /** Length of the loaded score in seconds at the current tempo; 0 when nothing is loaded. */
  get totalDuration(): number {
    return this.duration;
  }

  /** Playback position in seconds, within [0, totalDuration]. */
  get currentTime(): number {
    if (this.currentState === 'playing') {
      return clamp(this.clock.now() - this.referenceStart, 0, this.duration);
    }
    return this.heldOffset;
  }

  /** Timeline compilation warnings and the first failure of each sink operation since the last load. */
  get diagnostics(): readonly Diagnostic[] {
    return this.recorded;
  }

  load(score: Score): void {
    this.exclusive(() => {
      this.stopNow();
      this.recorded.length = 0;
      this.failedSinkOperations.clear();
      this.loadedScore = score;
      this.currentTempo = this.tempoOverride ?? clampTempo(scoreTempo(score));
      this.compile();

      for (const part of score.parts) {
        this.callSink('setProgram', () => this.sink.setProgram?.(part.midiChannel, part.midiProgram));
      }
      this.callSink('setVolume', () => this.sink.setVolume?.(this.currentVolume));
    });
  }

  unload(): void {
    this.exclusive(() => {
      this.stopNow();
      this.loadedScore = undefined;
      this.commands = [];
      this.duration = 0;
    });
  }

  play(): void {
    this.exclusive(() => this.playNow());
  }

  pause(): void {
    this.exclusive(() => {
      if (this.currentState !== 'playing') {
        return;
      }

      this.heldOffset = clamp(this.clock.now() - this.referenceStart, 0, this.duration);
      this.stopTimer();
      this.currentState = 'paused';
    });
  }

  stop(): void {
    this.exclusive(() => this.stopNow());
  }

  /** Move to `seconds`, clamped to the score; sounding notes are released. */
  seek(seconds: number): void {
    requireFinite('seek position', seconds);
    this.exclusive(() => {
      const target = clamp(seconds, 0, this.duration);
      this.releaseSounding();
      this.cursor = target === 0 ? 0 : this.firstIndexAfter(target);
      this.moveTo(target);
    });
  }

  /** Change tempo (clamped to 30..300 BPM) while keeping the current beat position. */
  setTempo(bpm: number): void {
    requireFinite('tempo', bpm);
    this.exclusive(() => {
      const beat = secondsToBeats(this.currentTime, this.currentTempo);
      this.currentTempo = clampTempo(bpm);
      if (!this.loadedScore) {
        return;
      }

      this.commands = retimeTimeline(this.commands, this.currentTempo);
      this.duration = totalDuration(this.loadedScore, this.currentTempo);
      this.moveTo(clamp(beatsToSeconds(beat, this.currentTempo), 0, this.duration));
    });
  }

  setVolume(volume: number): void {
    requireFinite('volume', volume);
    this.exclusive(() => {
      this.currentVolume = clamp(volume, 0, 1);
      this.callSink('setVolume', () => this.sink.setVolume?.(this.currentVolume));
    });
  }

  /** One dispatch pass; the interval timer calls this, tests may call it directly. */
  tick(): void {
    this.exclusive(() => this.dispatch());
  }

  private exclusive(task: () => void): void {
    this.pending.push(task);
    if (this.draining) {
      return;
    }

    this.draining = true;
    try {
      for (let next = this.pending.shift(); next; next = this.pending.shift()) {
        next();
      }
    } finally {
      this.draining = false;
    }
  }

  private compile(): void {
    if (!this.loadedScore) {
      return;
    }

    const compiled = compileTimeline(this.loadedScore, this.currentTempo);
    this.commands = compiled.commands;
    this.recorded.push(...compiled.diagnostics);
    this.duration = totalDuration(this.loadedScore, this.currentTempo);
  }

  private playNow(): void {
    if (this.currentState === 'playing' || !this.loadedScore || this.commands.length === 0) {
      return;
    }

    this.referenceStart = this.clock.now() - this.heldOffset;
    this.currentState = 'playing';
    this.cancelTimer = this.timers.every(this.tickIntervalMs, () => this.tick());
    this.dispatch();
  }

  private stopNow(): void {
    this.stopTimer();
    this.releaseSounding();
    this.cursor = 0;
    this.heldOffset = 0;
    this.currentState = 'stopped';
  }

  private dispatch(): void {
    if (this.currentState !== 'playing') {
      return;
    }

    const elapsed = this.clock.now() - this.referenceStart;
    let command = this.commands[this.cursor];
    while (command && command.time <= elapsed) {
      this.emit(command);
      this.cursor += 1;
      command = this.commands[this.cursor];
    }

    if (this.cursor >= this.commands.length && elapsed >= this.duration) {
      this.stopNow();
      if (this.loop) {
        this.playNow();
      }
    }
  }

  /** Re-anchor the clock (or the held offset) so the current position becomes `seconds`. */
  private moveTo(seconds: number): void {
    if (this.currentState === 'playing') {
      this.referenceStart = this.clock.now() - seconds;
    } else {
      this.heldOffset = seconds;
    }
  }

  private firstIndexAfter(seconds: number): number {
    const index = this.commands.findIndex((command) => command.time > seconds);
    return index === -1 ? this.commands.length : index;
  }

  private emit(command: NoteCommand): void {
    const key = soundingKey(command.channel, command.pitch);
    const count = this.sounding.get(key) ?? 0;

    if (command.kind === 'noteOn') {
      this.sounding.set(key, count + 1);
    } else if (count === 0) {
      return;
    } else if (count === 1) {
      this.sounding.delete(key);
    } else {
      this.sounding.set(key, count - 1);
    }

    this.callSink('send', () => this.sink.send(command));
  }

  private releaseSounding(): void {
    const keys = [...this.sounding.keys()];
    this.sounding.clear();
    for (const key of keys) {
      const command: NoteCommand = { kind: 'noteOff', channel: Math.floor(key / 128), pitch: key % 128, velocity: 0 };
      this.callSink('send', () => this.sink.send(command));
    }
  }

  private stopTimer(): void {
    this.cancelTimer?.();
    this.cancelTimer = undefined;
  }

  private callSink(operation: string, call: () => void): void {
    try {
      call();
    } catch (error) {
      if (this.failedSinkOperations.has(operation)) {
        return;
      }
      this.failedSinkOperations.add(operation);
      this.recorded.push({
        code: 'SINK_ERROR',
        severity: 'warning',
        message: `Sink ${operation} failed: ${error instanceof Error ? error.message : String(error)}`
      });
    }
  }
}

function soundingKey(channel: number, pitch: number): number {
  return channel * 128 + pitch;
}

function clampTempo(bpm: number): number {
  return clamp(bpm, MIN_TEMPO, MAX_TEMPO);
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function requireFinite(field: string, value: number): number {
  if (!Number.isFinite(value)) {
    throw new OutOfRangeValueError(field, value, 'a finite number');
  }
  return value;
}

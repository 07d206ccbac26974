import { MalformedDocumentError, OutOfRangeValueError, UnsupportedFormatError } from '../core/errors.js';
import { keySignatureName } from '../core/pitch.js';
import { addNote, createPart, createScore } from '../core/score-builder.js';
import type { Part, Score } from '../core/score.js';
import { gmInstrumentName, PERCUSSION_CHANNEL, PERCUSSION_INSTRUMENT } from './gm-instruments.js';
import { MidiByteReader } from './midi-reader.js';
import {
  addDiagnostic,
  addDiagnosticOnce,
  createParseContext,
  finishDecode,
  type DecodeOptions,
  type DecodeResult,
  type ParseContext
} from './parse-context.js';

/** SMF decoder options. */
export interface MidiDecodeOptions extends DecodeOptions {
  /** Title used when the file carries no sequence name (typically the file's base name). */
  title?: string;
}

/** Parsed `MThd` chunk. */
export interface MidiHeader {
  format: number;
  trackCount: number;
  ticksPerQuarter: number;
}

const HEADER_CHUNK = 'MThd';
const TRACK_CHUNK = 'MTrk';
const MIN_HEADER_LENGTH = 6;
const MICROSECONDS_PER_MINUTE = 60_000_000;

const META_TEXT_COPYRIGHT = 0x02;
const META_TRACK_NAME = 0x03;
const META_END_OF_TRACK = 0x2f;
const META_SET_TEMPO = 0x51;
const META_TIME_SIGNATURE = 0x58;
const META_KEY_SIGNATURE = 0x59;

const CONTROLLER_VOLUME = 7;
const CONTROLLER_PAN = 10;

/** A note-on waiting for its note-off. */
interface PendingNote {
  startTick: number;
  velocity: number;
  sequence: number;
}

/** A note with both ends resolved, in ticks. */
interface ResolvedNote {
  pitch: number;
  velocity: number;
  startTick: number;
  endTick: number;
  sequence: number;
}

/** Everything observed on one MIDI channel across all tracks. */
interface ChannelState {
  channel: number;
  trackName?: string;
  program?: number;
  volume?: number;
  pan?: number;
  notes: ResolvedNote[];
}

/** Decode a Standard MIDI File into the canonical score model. */
export function decodeMidi(data: Uint8Array, options: MidiDecodeOptions = {}): DecodeResult {
  const ctx = createParseContext(options.mode ?? 'lenient', options.sourceName);
  const decoder = new MidiDecoder(data, ctx);
  const score = decoder.decode(options);
  return finishDecode(ctx, score);
}

/** Parse and validate the `MThd` header chunk at the start of `data`. */
export function readMidiHeader(data: Uint8Array): MidiHeader & { chunkEnd: number } {
  const reader = new MidiByteReader(data);
  if (data.length < 8 + MIN_HEADER_LENGTH || reader.readAscii(4) !== HEADER_CHUNK) {
    throw new MalformedDocumentError('Missing MThd header chunk signature.', { offset: 0, element: HEADER_CHUNK });
  }

  const headerLength = reader.readUInt32BE();
  if (headerLength < MIN_HEADER_LENGTH || 8 + headerLength > data.length) {
    throw new MalformedDocumentError(`MThd declares ${headerLength} bytes, inconsistent with the file size.`, {
      offset: 4,
      element: HEADER_CHUNK
    });
  }

  const format = reader.readUInt16BE();
  const trackCount = reader.readUInt16BE();
  const divisionOffset = reader.offset;
  const division = reader.readUInt16BE();

  if (format > 2) {
    throw new UnsupportedFormatError(`SMF format ${format} is not defined.`, { offset: 8, element: HEADER_CHUNK });
  }
  if (division & 0x8000) {
    throw new UnsupportedFormatError('SMPTE time division is not supported; only ticks per quarter note.', {
      offset: divisionOffset,
      element: HEADER_CHUNK
    });
  }
  if (division === 0) {
    throw new MalformedDocumentError('Ticks per quarter note must be positive.', {
      offset: divisionOffset,
      element: HEADER_CHUNK
    });
  }

  return { format, trackCount, ticksPerQuarter: division, chunkEnd: 8 + headerLength };
}

/** One-shot SMF decoder; create a new instance per file. */
class MidiDecoder {
  private readonly channels = new Map<number, ChannelState>();
  private header?: MidiHeader;
  private tempo?: number;
  private title?: string;
  private copyright?: string;
  private timeSignature?: string;
  private keySignature?: string;
  private sequence = 0;

  constructor(
    private readonly data: Uint8Array,
    private readonly ctx: ParseContext
  ) {}

  decode(options: MidiDecodeOptions): Score {
    const header = readMidiHeader(this.data);
    this.header = header;

    let offset = header.chunkEnd;
    let tracksRead = 0;
    while (offset < this.data.length) {
      if (this.data.length - offset < 8) {
        addDiagnostic(this.ctx, 'TRAILING_DATA', 'warning', `${this.data.length - offset} trailing bytes ignored.`, {
          offset
        });
        break;
      }

      const reader = new MidiByteReader(this.data, offset);
      const chunkType = reader.readAscii(4);
      const chunkLength = reader.readUInt32BE();
      const bodyStart = reader.offset;
      if (bodyStart + chunkLength > this.data.length) {
        throw new MalformedDocumentError(
          `Chunk '${chunkType}' declares ${chunkLength} bytes but only ${this.data.length - bodyStart} remain.`,
          { offset, element: chunkType }
        );
      }

      if (chunkType === TRACK_CHUNK) {
        this.readTrack(new MidiByteReader(this.data, bodyStart, bodyStart + chunkLength), tracksRead);
        tracksRead += 1;
      } else {
        addDiagnostic(this.ctx, 'UNKNOWN_CHUNK', 'info', `Skipping unknown chunk '${chunkType}'.`, { offset });
      }

      offset = bodyStart + chunkLength;
    }

    if (tracksRead !== header.trackCount) {
      addDiagnostic(
        this.ctx,
        'TRACK_COUNT_MISMATCH',
        'warning',
        `Header declares ${header.trackCount} tracks but ${tracksRead} were found.`,
        { offset: 10 }
      );
    }

    return this.buildScore(options);
  }

  private readTrack(reader: MidiByteReader, trackIndex: number): void {
    const pending = new Map<number, PendingNote[]>();
    let trackName: string | undefined;
    let tick = 0;
    let runningStatus: number | undefined;
    let ended = false;

    while (reader.remaining > 0) {
      tick += reader.readVarLen();
      const eventOffset = reader.offset;

      let status = reader.peekUInt8();
      if (status & 0x80) {
        reader.skip(1);
      } else if (runningStatus === undefined) {
        throw new MalformedDocumentError('Data byte found with no running status in effect.', {
          offset: eventOffset,
          element: TRACK_CHUNK
        });
      } else {
        status = runningStatus;
      }

      if (status === 0xff) {
        runningStatus = undefined;
        const type = reader.readUInt8();
        const payload = reader.readBytes(reader.readVarLen());
        if (type === META_END_OF_TRACK) {
          ended = true;
          break;
        }
        if (type === META_TRACK_NAME) {
          trackName ??= decodeText(payload);
        }
        this.applyMeta(type, payload, trackIndex, eventOffset);
        continue;
      }

      if (status === 0xf0 || status === 0xf7) {
        runningStatus = undefined;
        reader.skip(reader.readVarLen());
        continue;
      }

      if (status > 0xf0) {
        throw new MalformedDocumentError(`System message 0x${status.toString(16)} is not valid inside a track.`, {
          offset: eventOffset,
          element: TRACK_CHUNK
        });
      }

      runningStatus = status;
      const kind = status >> 4;
      const channel = status & 0x0f;
      const data1 = reader.readDataByte();
      const data2 = kind === 0xc || kind === 0xd ? 0 : reader.readDataByte();

      switch (kind) {
        case 0x9:
          if (data2 > 0) {
            this.channelState(channel, trackIndex, trackName);
            const key = noteKey(channel, data1);
            const queue = pending.get(key) ?? [];
            queue.push({ startTick: tick, velocity: data2, sequence: this.sequence++ });
            pending.set(key, queue);
            break;
          }
          this.closeNote(pending, channel, data1, tick, eventOffset);
          break;
        case 0x8:
          this.closeNote(pending, channel, data1, tick, eventOffset);
          break;
        case 0xb:
          this.applyController(this.channelState(channel, trackIndex, trackName), data1, data2);
          break;
        case 0xc:
          this.applyProgram(this.channelState(channel, trackIndex, trackName), data1, eventOffset);
          break;
        default:
          break;
      }
    }

    if (!ended) {
      addDiagnostic(this.ctx, 'MISSING_END_OF_TRACK', 'info', `Track ${trackIndex + 1} has no end-of-track event.`, {
        offset: reader.end
      });
    }

    this.flushPending(pending, tick, trackIndex);
  }

  private applyMeta(type: number, payload: Uint8Array, trackIndex: number, offset: number): void {
    switch (type) {
      case META_SET_TEMPO: {
        if (payload.length < 3) {
          addDiagnostic(this.ctx, 'INVALID_TEMPO', 'warning', 'Tempo meta-event shorter than 3 bytes.', { offset });
          return;
        }
        const usPerQuarter = (payload[0]! << 16) | (payload[1]! << 8) | payload[2]!;
        if (usPerQuarter === 0) {
          addDiagnostic(this.ctx, 'INVALID_TEMPO', 'warning', 'Tempo meta-event of 0 µs per quarter ignored.', {
            offset
          });
          return;
        }
        const bpm = MICROSECONDS_PER_MINUTE / usPerQuarter;
        if (this.tempo === undefined) {
          this.tempo = bpm;
        } else if (bpm !== this.tempo) {
          addDiagnosticOnce(
            this.ctx,
            'tempo-change',
            'TEMPO_CHANGE_IGNORED',
            'warning',
            `Tempo change to ${bpm.toFixed(2)} BPM ignored; the score keeps ${this.tempo.toFixed(2)} BPM.`,
            { offset }
          );
        }
        return;
      }
      case META_TIME_SIGNATURE:
        if (payload.length >= 2 && this.timeSignature === undefined) {
          this.timeSignature = `${payload[0]!}/${2 ** payload[1]!}`;
        }
        return;
      case META_KEY_SIGNATURE:
        if (payload.length >= 2 && this.keySignature === undefined) {
          const fifths = payload[0]! > 127 ? payload[0]! - 256 : payload[0]!;
          this.keySignature = keySignatureName(fifths, payload[1] === 1 ? 'minor' : 'major');
        }
        return;
      case META_TRACK_NAME:
        if (trackIndex === 0) {
          this.title ??= decodeText(payload);
        }
        return;
      case META_TEXT_COPYRIGHT:
        this.copyright ??= decodeText(payload);
        return;
      default:
        return;
    }
  }

  private channelState(channel: number, trackIndex: number, trackName: string | undefined): ChannelState {
    let state = this.channels.get(channel);
    if (!state) {
      // Format 0 puts the sequence name on the only track; it is not a part name there.
      const useTrackName = this.header?.format !== 0 && trackIndex > 0;
      state = { channel, trackName: useTrackName ? trackName : undefined, notes: [] };
      this.channels.set(channel, state);
    }
    return state;
  }

  private applyController(state: ChannelState, controller: number, value: number): void {
    if (controller === CONTROLLER_VOLUME) {
      state.volume ??= value / 127;
    } else if (controller === CONTROLLER_PAN) {
      state.pan ??= Math.max(-1, Math.min(1, (value - 64) / 63));
    }
  }

  private applyProgram(state: ChannelState, program: number, offset: number): void {
    if (state.program === undefined) {
      state.program = program;
      return;
    }

    if (state.program !== program) {
      addDiagnosticOnce(
        this.ctx,
        `program:${state.channel}`,
        'PROGRAM_CHANGE_IGNORED',
        'info',
        `Channel ${state.channel + 1} changes program mid-stream; keeping program ${state.program + 1}.`,
        { offset }
      );
    }
  }

  private closeNote(
    pending: Map<number, PendingNote[]>,
    channel: number,
    pitch: number,
    tick: number,
    offset: number
  ): void {
    const opened = pending.get(noteKey(channel, pitch))?.shift();
    if (!opened) {
      addDiagnosticOnce(
        this.ctx,
        'unmatched-note-off',
        'UNMATCHED_NOTE_OFF',
        'info',
        'Note-off without a sounding note-on ignored.',
        { offset }
      );
      return;
    }

    this.resolveNote(channel, pitch, opened, tick, offset);
  }

  private flushPending(pending: Map<number, PendingNote[]>, endTick: number, trackIndex: number): void {
    for (const [key, queue] of pending) {
      for (const opened of queue) {
        const channel = Math.floor(key / 128);
        const pitch = key % 128;
        addDiagnostic(
          this.ctx,
          'UNTERMINATED_NOTE',
          'warning',
          `Track ${trackIndex + 1}: note ${pitch} on channel ${channel + 1} never ends; closing at end of track.`
        );
        this.resolveNote(channel, pitch, opened, endTick);
      }
    }
  }

  private resolveNote(channel: number, pitch: number, opened: PendingNote, endTick: number, offset?: number): void {
    if (endTick <= opened.startTick) {
      addDiagnostic(this.ctx, 'ZERO_LENGTH_NOTE', 'warning', `Zero-length note ${pitch} dropped.`, { offset });
      return;
    }

    const state = this.channels.get(channel);
    state?.notes.push({
      pitch,
      velocity: opened.velocity,
      startTick: opened.startTick,
      endTick,
      sequence: opened.sequence
    });
  }

  private buildScore(options: MidiDecodeOptions): Score {
    const ticksPerQuarter = this.header?.ticksPerQuarter ?? 1;
    const score = createScore({
      id: options.sourceName ?? 'score-1',
      title: this.title ?? options.title,
      copyright: this.copyright,
      keySignature: this.keySignature,
      timeSignature: this.timeSignature,
      tempo: this.tempo,
      source: { name: options.sourceName, format: 'midi' }
    });

    for (const state of this.channels.values()) {
      const part = this.buildPart(state);
      if (!part) {
        continue;
      }

      const ordered = [...state.notes].sort(
        (left, right) => left.startTick - right.startTick || left.sequence - right.sequence
      );
      for (const note of ordered) {
        try {
          addNote(part, {
            pitch: note.pitch,
            velocity: note.velocity,
            startTime: note.startTick / ticksPerQuarter,
            duration: (note.endTick - note.startTick) / ticksPerQuarter
          });
        } catch (error) {
          if (!(error instanceof OutOfRangeValueError)) {
            throw error;
          }
          addDiagnostic(this.ctx, 'OUT_OF_RANGE_VALUE', 'warning', `Note dropped: ${error.message}`);
        }
      }

      score.parts.push(part);
    }

    return score;
  }

  private buildPart(state: ChannelState): Part | undefined {
    const program = state.program ?? 0;
    try {
      return createPart({
        id: `channel-${state.channel + 1}`,
        name: state.trackName ?? `Channel ${state.channel + 1}`,
        instrument: state.channel === PERCUSSION_CHANNEL ? PERCUSSION_INSTRUMENT : gmInstrumentName(program),
        midiChannel: state.channel,
        midiProgram: program,
        volume: state.volume,
        pan: state.pan
      });
    } catch (error) {
      if (!(error instanceof OutOfRangeValueError)) {
        throw error;
      }
      addDiagnostic(this.ctx, 'OUT_OF_RANGE_VALUE', 'warning', `Channel ${state.channel + 1} dropped: ${error.message}`);
      return undefined;
    }
  }
}

function noteKey(channel: number, pitch: number): number {
  return channel * 128 + pitch;
}

/** SMF text is nominally ASCII; decode as UTF-8 and drop padding NULs. */
function decodeText(payload: Uint8Array): string {
  return new TextDecoder().decode(payload).replace(/\0+$/, '').trim();
}

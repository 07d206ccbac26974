import { describe, expect, it } from 'vitest';

import { MalformedDocumentError, UnsupportedFormatError } from '../../src/core/errors.js';
import { totalDuration } from '../../src/core/score-builder.js';
import { decodeMidi, readMidiHeader } from '../../src/parser/midi.js';
import { chunk, header, meta, smf, tempo, text, track } from '../helpers/midi-builder.js';

const TRACK_NAME = 0x03;

describe('decodeMidi', () => {
  it('decodes a format 1 file into one part per channel', () => {
    const data = smf(
      header(1, 3, 480),
      track([
        { delta: 0, bytes: text(TRACK_NAME, 'Conductor') },
        { delta: 0, bytes: tempo(500_000) },
        { delta: 0, bytes: meta(0x58, [3, 2, 24, 8]) },
        { delta: 0, bytes: meta(0x59, [0xff, 1]) }
      ]),
      track([
        { delta: 0, bytes: text(TRACK_NAME, 'Right Hand') },
        { delta: 0, bytes: [0xc0, 40] },
        { delta: 0, bytes: [0x90, 60, 100] },
        { delta: 480, bytes: [0x80, 60, 64] },
        { delta: 0, bytes: [0x90, 64, 80] },
        { delta: 240, bytes: [0x80, 64, 0] }
      ]),
      track([
        { delta: 0, bytes: text(TRACK_NAME, 'Left Hand') },
        { delta: 0, bytes: [0xc1, 32] },
        { delta: 0, bytes: [0x91, 36, 90] },
        { delta: 960, bytes: [0x81, 36, 0] }
      ])
    );

    const { score, diagnostics } = decodeMidi(data, { sourceName: 'hands.mid', mode: 'strict' });

    expect(diagnostics).toEqual([]);
    expect(score).toMatchObject({
      id: 'hands.mid',
      title: 'Conductor',
      tempo: 120,
      timeSignature: '3/4',
      keySignature: 'D minor',
      source: { name: 'hands.mid', format: 'midi' }
    });
    expect(score.parts.map((part) => [part.id, part.name, part.instrument, part.midiChannel, part.midiProgram])).toEqual([
      ['channel-1', 'Right Hand', 'Violin', 0, 40],
      ['channel-2', 'Left Hand', 'Acoustic Bass', 1, 32]
    ]);
    expect(score.parts[0]?.notes).toEqual([
      { pitch: 60, velocity: 100, startTime: 0, duration: 1, channel: 0 },
      { pitch: 64, velocity: 80, startTime: 1, duration: 0.5, channel: 0 }
    ]);
    expect(score.parts[1]?.notes).toEqual([{ pitch: 36, velocity: 90, startTime: 0, duration: 2, channel: 1 }]);
    expect(totalDuration(score)).toBe(1);
  });

  it('follows running status and treats note-on velocity 0 as note-off', () => {
    const data = smf(
      header(0, 1, 96),
      track([
        { delta: 0, bytes: text(TRACK_NAME, 'Tune') },
        { delta: 0, bytes: [0x90, 60, 100] },
        { delta: 96, bytes: [60, 0] },
        { delta: 0, bytes: [62, 100] },
        { delta: 96, bytes: [62, 0] }
      ])
    );

    const { score } = decodeMidi(data);

    expect(score.title).toBe('Tune');
    expect(score.parts.map((part) => [part.id, part.name, part.instrument])).toEqual([
      ['channel-1', 'Channel 1', 'Acoustic Grand Piano']
    ]);
    expect(score.parts[0]?.notes.map((note) => [note.pitch, note.startTime, note.duration])).toEqual([
      [60, 0, 1],
      [62, 1, 1]
    ]);
  });

  it('pairs repeated pitches first-in first-out', () => {
    const data = smf(
      header(0, 1, 4),
      track([
        { delta: 0, bytes: [0x90, 67, 100] },
        { delta: 2, bytes: [0x90, 67, 50] },
        { delta: 2, bytes: [0x80, 67, 0] },
        { delta: 4, bytes: [0x80, 67, 0] }
      ])
    );

    const notes = decodeMidi(data).score.parts[0]?.notes.map((note) => [note.velocity, note.startTime, note.duration]);
    expect(notes).toEqual([
      [100, 0, 1],
      [50, 0.5, 1.5]
    ]);
  });

  it('ignores a note-off without a sounding note', () => {
    const data = smf(
      header(0, 1, 96),
      track([
        { delta: 0, bytes: [0x80, 60, 0] },
        { delta: 0, bytes: [0x80, 61, 0] },
        { delta: 0, bytes: [0x90, 62, 100] },
        { delta: 96, bytes: [0x80, 62, 0] }
      ])
    );

    const { score, diagnostics } = decodeMidi(data, { mode: 'strict' });
    expect(score.parts[0]?.notes.map((note) => note.pitch)).toEqual([62]);
    expect(diagnostics.map((d) => [d.code, d.severity, d.offset])).toEqual([['UNMATCHED_NOTE_OFF', 'info', 23]]);
  });

  it('closes notes left open at the end of the track', () => {
    const data = smf(
      header(0, 1, 480),
      track(
        [
          { delta: 0, bytes: [0x90, 60, 100] },
          { delta: 480, bytes: meta(0x2f, []) }
        ],
        false
      )
    );

    const { score, diagnostics } = decodeMidi(data);
    expect(score.parts[0]?.notes).toEqual([{ pitch: 60, velocity: 100, startTime: 0, duration: 1, channel: 0 }]);
    expect(diagnostics.map((d) => d.code)).toEqual(['UNTERMINATED_NOTE']);
  });

  it('drops zero-length notes', () => {
    const data = smf(
      header(0, 1, 96),
      track([
        { delta: 0, bytes: [0x90, 60, 100] },
        { delta: 0, bytes: [0x80, 60, 0] }
      ])
    );

    const { score, diagnostics } = decodeMidi(data);
    expect(score.parts[0]?.notes).toEqual([]);
    expect(diagnostics.map((d) => d.code)).toEqual(['ZERO_LENGTH_NOTE']);
  });

  it('keeps the first tempo and reports later changes once', () => {
    const data = smf(
      header(0, 1, 96),
      track([
        { delta: 0, bytes: tempo(600_000) },
        { delta: 0, bytes: tempo(600_000) },
        { delta: 96, bytes: tempo(300_000) },
        { delta: 96, bytes: tempo(250_000) }
      ])
    );

    const { score, diagnostics } = decodeMidi(data);
    expect(score.tempo).toBe(100);
    expect(diagnostics.map((d) => d.code)).toEqual(['TEMPO_CHANGE_IGNORED']);
  });

  it('converts 500000 microseconds per quarter to 120 BPM', () => {
    const data = smf(header(0, 1, 96), track([{ delta: 0, bytes: tempo(500_000) }]));
    expect(decodeMidi(data).score.tempo).toBe(120);
  });

  it('maps volume and pan controllers and names the percussion channel', () => {
    const data = smf(
      header(0, 1, 96),
      track([
        { delta: 0, bytes: [0xb9, 7, 127] },
        { delta: 0, bytes: [0xb9, 10, 0] },
        { delta: 0, bytes: [0x99, 36, 110] },
        { delta: 0, bytes: [0xb2, 10, 127] },
        { delta: 0, bytes: [0xb2, 7, 64] },
        { delta: 0, bytes: [0xe2, 0, 64] },
        { delta: 0, bytes: [0xd2, 20] },
        { delta: 0, bytes: [0x92, 48, 70] },
        { delta: 48, bytes: [0x89, 36, 0] },
        { delta: 0, bytes: [0x82, 48, 0] }
      ])
    );

    const { score } = decodeMidi(data);
    const [drums, keys] = score.parts;
    expect(drums).toMatchObject({ id: 'channel-10', instrument: 'Drum Kit', midiChannel: 9, volume: 1, pan: -1 });
    expect(keys).toMatchObject({ id: 'channel-3', instrument: 'Acoustic Grand Piano', midiChannel: 2, pan: 1 });
    expect(keys?.volume).toBeCloseTo(64 / 127, 10);
    expect(keys?.notes.map((note) => [note.pitch, note.duration])).toEqual([[48, 0.5]]);
  });

  it('skips unknown chunks and SysEx messages', () => {
    const data = smf(
      header(0, 1, 96),
      chunk('XFIH', [1, 2, 3]),
      track([
        { delta: 0, bytes: [0xf0, 3, 0x7e, 0x09, 0xf7] },
        { delta: 0, bytes: [0x90, 60, 100] },
        { delta: 96, bytes: [0x80, 60, 0] }
      ])
    );

    const { score, diagnostics } = decodeMidi(data);
    expect(score.parts[0]?.notes).toHaveLength(1);
    expect(diagnostics.map((d) => [d.code, d.message])).toEqual([['UNKNOWN_CHUNK', "Skipping unknown chunk 'XFIH'."]]);
  });

  it('warns when the header track count disagrees with the file', () => {
    const data = smf(header(1, 2, 96), track([{ delta: 0, bytes: tempo(500_000) }]));

    const { diagnostics } = decodeMidi(data);
    expect(diagnostics.map((d) => [d.code, d.severity])).toEqual([['TRACK_COUNT_MISMATCH', 'warning']]);
    expect(() => decodeMidi(data, { mode: 'strict' })).toThrow(MalformedDocumentError);
  });

  it('falls back to the provided title and then to Untitled', () => {
    const data = smf(header(0, 1, 96), track([]));
    expect(decodeMidi(data, { title: 'my-song' }).score.title).toBe('my-song');
    expect(decodeMidi(data).score.title).toBe('Untitled');
    expect(decodeMidi(data).score.parts).toEqual([]);
  });
});

describe('decodeMidi failures', () => {
  it('rejects a missing header signature', () => {
    const data = smf([...'RIFF'].map((char) => char.charCodeAt(0)), [0, 0, 0, 6, 0, 0, 0, 1, 0, 96]);
    expect(() => decodeMidi(data)).toThrow('Missing MThd header chunk signature.');
  });

  it('rejects SMPTE time division', () => {
    const data = smf(header(0, 1, 0xe728), track([]));
    expect(() => decodeMidi(data)).toThrow(UnsupportedFormatError);
    expect(() => readMidiHeader(data)).toThrow('SMPTE time division is not supported; only ticks per quarter note.');
  });

  it('rejects undefined formats and zero division', () => {
    expect(() => decodeMidi(smf(header(3, 1, 96), track([])))).toThrow(UnsupportedFormatError);
    expect(() => decodeMidi(smf(header(0, 1, 0), track([])))).toThrow('Ticks per quarter note must be positive.');
  });

  it('rejects a chunk that runs past the end of the file', () => {
    const data = smf(header(0, 1, 96), [...'MTrk'].map((char) => char.charCodeAt(0)), [0, 0, 0, 100, 0x00]);
    expect(() => decodeMidi(data)).toThrow("Chunk 'MTrk' declares 100 bytes but only 1 remain.");
  });

  it('rejects a data byte with no running status', () => {
    const data = smf(header(0, 1, 96), track([{ delta: 0, bytes: [60, 100] }]));

    let caught: unknown;
    try {
      decodeMidi(data);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(MalformedDocumentError);
    if (caught instanceof MalformedDocumentError) {
      expect(caught.message).toBe('Data byte found with no running status in effect.');
      expect(caught.offset).toBe(23);
    }
  });

  it('rejects a variable-length quantity longer than four bytes', () => {
    const data = smf(header(0, 1, 96), chunk('MTrk', [0x81, 0x81, 0x81, 0x81, 0x01, 0x90, 60, 100]));
    expect(() => decodeMidi(data)).toThrow('Variable-length quantity exceeds four bytes.');
  });
});

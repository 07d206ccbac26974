import { describe, expect, it } from 'vitest';

import { addNote, createPart, createScore } from '../../src/core/score-builder.js';
import type { Score } from '../../src/core/score.js';
import { audibleParts, compileTimeline, retimeTimeline } from '../../src/playback/timeline.js';

function chordScore(): Score {
  const score = createScore({ tempo: 120 });
  const part = createPart({ id: 'P1' });
  addNote(part, { pitch: 60, velocity: 100, startTime: 0, duration: 1 });
  addNote(part, { pitch: 64, velocity: 100, startTime: 0, duration: 2 });
  score.parts.push(part);
  return score;
}

describe('compileTimeline', () => {
  it('converts beats to seconds at the given tempo', () => {
    const { commands } = compileTimeline(chordScore(), 120);

    expect(commands.map((command) => command.time)).toEqual([0, 0, 0.5, 1]);
    expect(commands.map((command) => `${command.kind}:${command.pitch}`)).toEqual([
      'noteOn:60',
      'noteOn:64',
      'noteOff:60',
      'noteOff:64'
    ]);
  });

  it('halves every time when the tempo doubles', () => {
    const { commands } = compileTimeline(chordScore(), 240);
    expect(commands.map((command) => command.time)).toEqual([0, 0, 0.25, 0.5]);
    expect(retimeTimeline(compileTimeline(chordScore(), 120).commands, 240)).toEqual(commands);
  });

  it('orders note-off before note-on at the same instant regardless of encounter order', () => {
    const score = createScore();
    const upper = createPart({ id: 'P1' });
    const lower = createPart({ id: 'P2', midiChannel: 1 });
    addNote(upper, { pitch: 62, startTime: 1, duration: 1 });
    addNote(lower, { pitch: 60, startTime: 0, duration: 1 });
    score.parts.push(upper, lower);

    const { commands } = compileTimeline(score, 60);
    expect(commands.map((command) => [command.time, command.kind, command.channel, command.pitch])).toEqual([
      [0, 'noteOn', 1, 60],
      [1, 'noteOff', 1, 60],
      [1, 'noteOn', 0, 62],
      [2, 'noteOff', 0, 62]
    ]);
  });

  it('applies transpose and part volume', () => {
    const score = createScore();
    const part = createPart({ id: 'P1', transpose: -12, volume: 0.5 });
    addNote(part, { pitch: 72, velocity: 101, startTime: 0, duration: 1 });
    addNote(part, { pitch: 5, startTime: 1, duration: 1 });
    score.parts.push(part);

    const { commands, diagnostics } = compileTimeline(score, 120);
    expect(commands.map((command) => [command.kind, command.pitch, command.velocity])).toEqual([
      ['noteOn', 60, 51],
      ['noteOff', 60, 0]
    ]);
    expect(diagnostics.map((d) => d.code)).toEqual(['TRANSPOSED_PITCH_OUT_OF_RANGE']);
  });

  it('skips muted parts and honours solo', () => {
    const score = createScore();
    const first = createPart({ id: 'A', midiChannel: 0 });
    const second = createPart({ id: 'B', midiChannel: 1 });
    const third = createPart({ id: 'C', midiChannel: 2 });
    addNote(first, { pitch: 60, startTime: 0, duration: 1 });
    addNote(second, { pitch: 61, startTime: 0, duration: 1 });
    addNote(third, { pitch: 62, startTime: 0, duration: 1 });
    score.parts.push(first, second, third);

    first.muted = true;
    expect(audibleParts(score).map((part) => part.id)).toEqual(['B', 'C']);

    third.solo = true;
    expect(audibleParts(score).map((part) => part.id)).toEqual(['C']);
    expect(compileTimeline(score, 120).commands.map((command) => command.pitch)).toEqual([62, 62]);
  });

  it('is empty for a score without notes', () => {
    expect(compileTimeline(createScore(), 120)).toEqual({ commands: [], diagnostics: [] });
  });
});

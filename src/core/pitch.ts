/** Diatonic step letters used by MusicXML `<step>`. */
export type Step = 'A' | 'B' | 'C' | 'D' | 'E' | 'F' | 'G';

/** Semitone offset of each natural step above C. */
export const STEP_SEMITONES: Readonly<Record<Step, number>> = {
  C: 0,
  D: 2,
  E: 4,
  F: 5,
  G: 7,
  A: 9,
  B: 11
};

const SHARP_NAMES = ['C', 'C#', 'D', 'D#', 'E', 'F', 'F#', 'G', 'G#', 'A', 'A#', 'B'] as const;

/** Narrow arbitrary text to a step letter. */
export function isStep(value: string): value is Step {
  return Object.hasOwn(STEP_SEMITONES, value);
}

/**
 * MIDI pitch for a notated step, integer alteration and octave.
 * Middle C (`C4`) is 60. The result is not range-checked.
 */
export function pitchFromStep(step: Step, alter: number, octave: number): number {
  return STEP_SEMITONES[step] + alter + (octave + 1) * 12;
}

/** Sharp-spelled name for a MIDI pitch, e.g. `60` → `C4`. */
export function pitchToNoteName(pitch: number): string {
  const octave = Math.floor(pitch / 12) - 1;
  const name = SHARP_NAMES[((pitch % 12) + 12) % 12] ?? 'C';
  return `${name}${octave}`;
}

/** Parse names like `C4`, `F#5`, `Bb-1`; `undefined` when unparseable or out of MIDI range. */
export function noteNameToPitch(noteName: string): number | undefined {
  const match = /^([A-G])([#b]?)(-?\d+)$/.exec(noteName.trim());
  if (!match) {
    return undefined;
  }

  const [, letter = '', accidental = '', octaveText = ''] = match;
  if (!isStep(letter)) {
    return undefined;
  }

  const alter = accidental === '#' ? 1 : accidental === 'b' ? -1 : 0;
  const pitch = pitchFromStep(letter, alter, Number.parseInt(octaveText, 10));
  return pitch >= 0 && pitch <= 127 ? pitch : undefined;
}

/** Major-key tonic for each key-signature fifths value from -7 to 7. */
const MAJOR_TONICS = ['Cb', 'Gb', 'Db', 'Ab', 'Eb', 'Bb', 'F', 'C', 'G', 'D', 'A', 'E', 'B', 'F#', 'C#'] as const;
/** Minor-key tonic for each key-signature fifths value from -7 to 7. */
const MINOR_TONICS = ['Ab', 'Eb', 'Bb', 'F', 'C', 'G', 'D', 'A', 'E', 'B', 'F#', 'C#', 'G#', 'D#', 'A#'] as const;

/**
 * Human-readable key from a fifths count and mode, e.g. `(1, 'major')` → `G major`.
 * Returns `undefined` for fifths outside -7..7.
 */
export function keySignatureName(fifths: number, mode: string | undefined): string | undefined {
  const index = fifths + 7;
  const normalizedMode = mode && mode.length > 0 ? mode : 'major';
  const tonic = normalizedMode === 'minor' ? MINOR_TONICS[index] : MAJOR_TONICS[index];
  return tonic ? `${tonic} ${normalizedMode}` : undefined;
}

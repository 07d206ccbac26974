import { readFileSync } from 'node:fs';

import { z } from 'zod';

/** Program names live beside the package root so both `src/` and `dist/` resolve the same file. */
const GM_INSTRUMENTS_URL = new URL('../../data/gm-instruments.json', import.meta.url);

const GmInstrumentsSchema = z.array(z.string().min(1)).length(128);

/** General MIDI percussion channel (channel 10, zero-based 9). */
export const PERCUSSION_CHANNEL = 9;
/** Instrument label for parts on {@link PERCUSSION_CHANNEL}. */
export const PERCUSSION_INSTRUMENT = 'Drum Kit';

let instrumentNames: readonly string[] | undefined;

/** General MIDI program name for a zero-based program number. */
export function gmInstrumentName(program: number): string {
  instrumentNames ??= loadInstrumentNames();
  return instrumentNames[program] ?? `Program ${program + 1}`;
}

function loadInstrumentNames(): readonly string[] {
  const raw: unknown = JSON.parse(readFileSync(GM_INSTRUMENTS_URL, 'utf8'));
  return GmInstrumentsSchema.parse(raw);
}

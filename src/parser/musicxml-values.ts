/** Velocity MusicXML treats as 100% dynamics (forte). */
const DYNAMICS_REFERENCE_VELOCITY = 90;

/** Convert a MusicXML dynamics percentage to a MIDI velocity, clamped to 0..127. */
export function dynamicsToVelocity(percent: number): number {
  return Math.min(127, Math.max(0, Math.round((percent * DYNAMICS_REFERENCE_VELOCITY) / 100)));
}

/** `<midi-instrument><volume>` is 0..100; the score model uses 0..1. */
export function midiVolumeToGain(volume: number): number {
  return volume / 100;
}

/**
 * `<midi-instrument><pan>` is in degrees (-180..180, 90 is hard right); the score model uses -1..1.
 * Positions behind the listener fold onto their frontal mirror.
 */
export function midiPanToBalance(degrees: number): number {
  let folded = degrees;
  if (folded > 90) {
    folded = 180 - folded;
  } else if (folded < -90) {
    folded = -180 - folded;
  }
  return folded / 90;
}

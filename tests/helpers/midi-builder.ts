/** One SMF track event: delta ticks plus the raw event bytes (status included unless running status is meant). */
export interface TrackEvent {
  delta: number;
  bytes: number[];
}

export function vlq(value: number): number[] {
  const out = [value & 0x7f];
  let rest = value >>> 7;
  while (rest > 0) {
    out.unshift((rest & 0x7f) | 0x80);
    rest >>>= 7;
  }
  return out;
}

export function header(format: number, trackCount: number, division: number): number[] {
  return [...ascii('MThd'), ...u32(6), ...u16(format), ...u16(trackCount), ...u16(division)];
}

export function chunk(type: string, body: number[]): number[] {
  return [...ascii(type), ...u32(body.length), ...body];
}

/** An `MTrk` chunk; an end-of-track meta event is appended unless `terminate` is false. */
export function track(events: TrackEvent[], terminate = true): number[] {
  const body = events.flatMap((event) => [...vlq(event.delta), ...event.bytes]);
  if (terminate) {
    body.push(0x00, 0xff, 0x2f, 0x00);
  }
  return chunk('MTrk', body);
}

export function meta(type: number, payload: number[]): number[] {
  return [0xff, type, ...vlq(payload.length), ...payload];
}

export function tempo(microsecondsPerQuarter: number): number[] {
  return meta(0x51, [
    (microsecondsPerQuarter >>> 16) & 0xff,
    (microsecondsPerQuarter >>> 8) & 0xff,
    microsecondsPerQuarter & 0xff
  ]);
}

export function text(type: number, value: string): number[] {
  return meta(type, ascii(value));
}

export function smf(...parts: number[][]): Uint8Array {
  return Uint8Array.from(parts.flat());
}

function ascii(value: string): number[] {
  return [...value].map((char) => char.charCodeAt(0));
}

function u16(value: number): number[] {
  return [(value >>> 8) & 0xff, value & 0xff];
}

function u32(value: number): number[] {
  return [(value >>> 24) & 0xff, (value >>> 16) & 0xff, (value >>> 8) & 0xff, value & 0xff];
}

import { MalformedDocumentError } from '../core/errors.js';

/** A variable-length quantity is at most four bytes (28 bits). */
const MAX_VLQ_BYTES = 4;

/**
 * Big-endian cursor over an SMF byte window.
 * Every read is bounds-checked against `end` and failures report the absolute offset.
 */
export class MidiByteReader {
  offset: number;

  constructor(
    private readonly data: Uint8Array,
    offset = 0,
    readonly end: number = data.length
  ) {
    this.offset = offset;
  }

  get remaining(): number {
    return this.end - this.offset;
  }

  /** Next byte without consuming it. */
  peekUInt8(): number {
    this.ensure(1, 'byte');
    return this.data[this.offset]!;
  }

  readUInt8(): number {
    this.ensure(1, 'byte');
    const value = this.data[this.offset]!;
    this.offset += 1;
    return value;
  }

  readUInt16BE(): number {
    this.ensure(2, 'u16');
    const value = (this.data[this.offset]! << 8) | this.data[this.offset + 1]!;
    this.offset += 2;
    return value;
  }

  readUInt32BE(): number {
    this.ensure(4, 'u32');
    const value =
      ((this.data[this.offset]! << 24) |
        (this.data[this.offset + 1]! << 16) |
        (this.data[this.offset + 2]! << 8) |
        this.data[this.offset + 3]!) >>>
      0;
    this.offset += 4;
    return value;
  }

  /** Read a MIDI variable-length quantity (7 bits per byte, high bit = continuation). */
  readVarLen(): number {
    const start = this.offset;
    let value = 0;
    for (let count = 0; count < MAX_VLQ_BYTES; count += 1) {
      const byte = this.readUInt8();
      value = (value << 7) | (byte & 0x7f);
      if ((byte & 0x80) === 0) {
        return value;
      }
    }

    throw new MalformedDocumentError('Variable-length quantity exceeds four bytes.', { offset: start });
  }

  /** Read a 7-bit MIDI data byte; a set high bit means the stream is out of sync. */
  readDataByte(): number {
    const offset = this.offset;
    const value = this.readUInt8();
    if (value & 0x80) {
      throw new MalformedDocumentError(`Expected a data byte but found status 0x${value.toString(16)}.`, { offset });
    }
    return value;
  }

  readBytes(length: number): Uint8Array {
    this.ensure(length, 'block');
    const bytes = this.data.subarray(this.offset, this.offset + length);
    this.offset += length;
    return bytes;
  }

  readAscii(length: number): string {
    return String.fromCharCode(...this.readBytes(length));
  }

  skip(length: number): void {
    this.ensure(length, 'block');
    this.offset += length;
  }

  private ensure(length: number, label: string): void {
    if (length < 0 || this.offset + length > this.end) {
      throw new MalformedDocumentError(`Unexpected end of data reading ${label}.`, { offset: this.offset });
    }
  }
}

// UMP variable-length integer
//
// The byte width is the number of leading set bits of the first byte, capped
// at 4, plus one:
//   0xxxxxxx → 1B  (7-bit value,  max 127)
//   10xxxxxx → 2B  (6 + 8 bits,   max 16 383)
//   110xxxxx → 3B  (5 + 16 bits,  max 2 097 151)
//   1110xxxx → 4B  (4 + 24 bits,  max 268 435 455)
//   1111xxxx → 5B  (low nibble unused, value is the next 4 bytes)
//
// The low bits of the first byte are the least significant part of the value;
// the following bytes are little-endian and shifted above them.

import { TruncatedInputError } from "./errors.js";

export type VarintSize = 1 | 2 | 3 | 4 | 5;

export const VARINT_MAX = 0xffff_ffff;

// Largest value representable at each width (index = size).
const MAX_FOR_SIZE = [0, 0x7f, 0x3fff, 0x1f_ffff, 0x0fff_ffff, VARINT_MAX];

export class Varint {
  readonly value: number;

  constructor(value: number) {
    if (!Number.isInteger(value) || value < 0 || value > VARINT_MAX) {
      throw new RangeError(`Varint must be an unsigned 32-bit integer, got ${value}`);
    }
    this.value = value;
  }

  /** Width in bytes announced by a varint's first byte. */
  static sizeOf(firstByte: number): VarintSize {
    if (firstByte < 0x80) return 1;
    if (firstByte < 0xc0) return 2;
    if (firstByte < 0xe0) return 3;
    if (firstByte < 0xf0) return 4;
    return 5;
  }

  /** Smallest width able to hold the value. Never picks 5 unless it has to. */
  static minimalSize(value: number): VarintSize {
    if (value <= MAX_FOR_SIZE[1]) return 1;
    if (value <= MAX_FOR_SIZE[2]) return 2;
    if (value <= MAX_FOR_SIZE[3]) return 3;
    if (value <= MAX_FOR_SIZE[4]) return 4;
    return 5;
  }

  // ── Encode ──────────────────────────────────────────────────────────────────

  toBytes(size: VarintSize = Varint.minimalSize(this.value)): Uint8Array {
    const v = this.value;
    if (v > MAX_FOR_SIZE[size]) {
      throw new RangeError(`Varint ${v} does not fit in ${size} bytes`);
    }
    switch (size) {
      case 1:
        return new Uint8Array([v]);
      case 2:
        return new Uint8Array([0x80 | (v & 0x3f), v >>> 6]);
      case 3:
        return new Uint8Array([0xc0 | (v & 0x1f), (v >>> 5) & 0xff, v >>> 13]);
      case 4:
        return new Uint8Array([0xe0 | (v & 0x0f), (v >>> 4) & 0xff, (v >>> 12) & 0xff, v >>> 20]);
      case 5: {
        const buf = new Uint8Array(5);
        buf[0] = 0xf0;
        new DataView(buf.buffer).setUint32(1, v, true);
        return buf;
      }
    }
  }

  // ── Decode ──────────────────────────────────────────────────────────────────

  static fromBytes(buf: Uint8Array, offset = 0): { varint: Varint; bytesRead: VarintSize } {
    if (offset >= buf.byteLength) {
      throw new TruncatedInputError(`varint: no bytes at offset ${offset}`);
    }
    const first = buf[offset];
    const size = Varint.sizeOf(first);
    if (buf.byteLength - offset < size) {
      throw new TruncatedInputError(`varint: need ${size} bytes at offset ${offset}, have ${buf.byteLength - offset}`);
    }

    let value: number;
    switch (size) {
      case 1:
        value = first;
        break;
      case 2:
        value = (first & 0x3f) + buf[offset + 1] * 0x40;
        break;
      case 3:
        value = (first & 0x1f) + (buf[offset + 1] + buf[offset + 2] * 0x100) * 0x20;
        break;
      case 4:
        value = (first & 0x0f) + (buf[offset + 1] + buf[offset + 2] * 0x100 + buf[offset + 3] * 0x1_0000) * 0x10;
        break;
      case 5:
        value = new DataView(buf.buffer, buf.byteOffset + offset + 1, 4).getUint32(0, true);
        break;
    }
    return { varint: new Varint(value), bytesRead: size };
  }
}

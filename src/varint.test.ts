import { describe, it, expect } from "vitest";
import { Varint, VARINT_MAX } from "./varint.js";
import { TruncatedInputError } from "./errors.js";

const bytes = (...b: number[]): Uint8Array => new Uint8Array(b);

function leadingOnes(b: number): number {
  let n = 0;
  for (let bit = 7; bit >= 0 && (b >> bit) & 1; bit--) n++;
  return n;
}

describe("Varint", () => {
  describe("size from first byte", () => {
    it("is leading ones capped at 4, plus one, for every byte value", () => {
      for (let b = 0; b < 256; b++) {
        const expected = Math.min(leadingOnes(b), 4) + 1;
        expect(Varint.sizeOf(b), `byte 0x${b.toString(16)}`).toBe(expected);
        expect(Varint.fromBytes(bytes(b, 0, 0, 0, 0)).bytesRead, `byte 0x${b.toString(16)}`).toBe(expected);
      }
    });
  });

  describe("1B (7-bit, max 127)", () => {
    it("encodes 0", () => expect(new Varint(0).toBytes()).toEqual(bytes(0x00)));
    it("encodes 127", () => expect(new Varint(127).toBytes()).toEqual(bytes(0x7f)));
    it("decodes 22", () => expect(Varint.fromBytes(bytes(22)).varint.value).toBe(22));
  });

  describe("2B (max 16 383)", () => {
    it("encodes 128", () => expect(new Varint(128).toBytes()).toEqual(bytes(0x80, 0x02)));
    it("encodes 16383", () => expect(new Varint(16_383).toBytes()).toEqual(bytes(0xbf, 0xff)));
    it("decodes low bits of the first byte as least significant", () => {
      expect(Varint.fromBytes(bytes(0x81, 0x02)).varint.value).toBe(129);
    });
  });

  describe("3B (max 2 097 151)", () => {
    it("encodes 16384", () => expect(new Varint(16_384).toBytes()).toEqual(bytes(0xc0, 0x00, 0x02)));
    it("encodes 2097151", () => expect(new Varint(2_097_151).toBytes()).toEqual(bytes(0xdf, 0xff, 0xff)));
  });

  describe("4B (max 268 435 455)", () => {
    it("encodes 2097152", () => expect(new Varint(2_097_152).toBytes()).toEqual(bytes(0xe0, 0x00, 0x00, 0x02)));
    it("encodes 268435455", () => expect(new Varint(268_435_455).toBytes()).toEqual(bytes(0xef, 0xff, 0xff, 0xff)));
  });

  describe("5B (full 32-bit)", () => {
    it("decodes 0xF0 + little-endian 0x00000042 as 66 over 5 bytes", () => {
      const { varint, bytesRead } = Varint.fromBytes(bytes(0xf0, 0x42, 0x00, 0x00, 0x00));
      expect(varint.value).toBe(66);
      expect(bytesRead).toBe(5);
    });

    it("ignores the low nibble of the first byte", () => {
      expect(Varint.fromBytes(bytes(0xff, 0x42, 0x00, 0x00, 0x00)).varint.value).toBe(66);
    });

    it("encodes 268435456 minimally in 5 bytes", () => {
      expect(new Varint(268_435_456).toBytes()).toEqual(bytes(0xf0, 0x00, 0x00, 0x00, 0x10));
    });

    it("encodes the maximum", () => {
      expect(new Varint(VARINT_MAX).toBytes()).toEqual(bytes(0xf0, 0xff, 0xff, 0xff, 0xff));
    });

    it("forces the 5-byte form for a small value", () => {
      expect(new Varint(66).toBytes(5)).toEqual(bytes(0xf0, 0x42, 0x00, 0x00, 0x00));
    });
  });

  describe("roundtrip at width boundaries", () => {
    for (const v of [0, 127, 128, 16_383, 16_384, 2_097_151, 2_097_152, 268_435_455, 268_435_456, VARINT_MAX]) {
      it(`roundtrips ${v}`, () => {
        const encoded = new Varint(v).toBytes();
        const { varint, bytesRead } = Varint.fromBytes(encoded);
        expect(varint.value).toBe(v);
        expect(bytesRead).toBe(encoded.byteLength);
      });
    }
  });

  describe("minimalSize", () => {
    it("never picks 5 for values that fit in 4 bytes", () => {
      expect(Varint.minimalSize(268_435_455)).toBe(4);
      expect(Varint.minimalSize(268_435_456)).toBe(5);
    });
  });

  describe("guards", () => {
    it("rejects negative", () => expect(() => new Varint(-1)).toThrow(RangeError));
    it("rejects values above 32 bits", () => expect(() => new Varint(VARINT_MAX + 1)).toThrow(RangeError));
    it("rejects fractions", () => expect(() => new Varint(1.5)).toThrow(RangeError));
    it("rejects a width too small for the value", () => expect(() => new Varint(200).toBytes(1)).toThrow(RangeError));
    it("throws TruncatedInputError when fewer bytes than the declared size remain", () => {
      expect(() => Varint.fromBytes(bytes(0xe0, 0x01))).toThrow(TruncatedInputError);
    });
    it("throws TruncatedInputError on an empty buffer", () => {
      expect(() => Varint.fromBytes(new Uint8Array(0))).toThrow(TruncatedInputError);
    });
  });

  describe("offset", () => {
    it("reads at offset inside a larger buffer", () => {
      const buf = bytes(0xde, 0xad, 0x80, 0x02);
      const { varint, bytesRead } = Varint.fromBytes(buf, 2);
      expect(varint.value).toBe(128);
      expect(bytesRead).toBe(2);
    });

    it("reads from a subarray view", () => {
      const backing = bytes(0xff, 0xff, 0xf0, 0x01, 0x00, 0x00, 0x00);
      expect(Varint.fromBytes(backing.subarray(2)).varint.value).toBe(1);
    });
  });
});

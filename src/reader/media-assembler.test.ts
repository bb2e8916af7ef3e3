import { describe, it, expect } from "vitest";
import { createCipheriv } from "node:crypto";
import { MockLogger, stream2uint8array } from "@adviser/cement";
import { MediaAssembler } from "./media-assembler.js";
import { encodeMediaPayload } from "../part.js";
import { EMPTY, concatBytes } from "../bytes.js";
import { gzip } from "../onesie/compression.js";
import { CompressionType, type MediaHeader } from "../schema.js";
import {
  DecompressionFailedError,
  InvalidKeyLengthError,
  MissingCryptoParamsError,
  ProtocolViolationError,
  UnknownHeaderIdError,
} from "../errors.js";

// ── Helpers ───────────────────────────────────────────────────────────────────

const mediaKey = Uint8Array.from({ length: 16 }, (_, i) => 0xa0 + i);

function pattern(length: number, seed = 0): Uint8Array {
  const out = new Uint8Array(length);
  for (let i = 0; i < length; i++) out[i] = (i * 7 + seed) % 256;
  return out;
}

function begin(asm: MediaAssembler, header: MediaHeader): ReadableStream<Uint8Array> {
  const evt = asm.onMediaHeader(header);
  if (evt.type !== "media.begin") throw new Error(`expected media.begin, got ${evt.type}`);
  return evt.stream;
}

// AES-128-CTR from a zero counter block, computed independently of CtrKeystream.
function ctrEncrypt(plaintext: Uint8Array): Uint8Array {
  const cipher = createCipheriv("aes-128-ctr", mediaKey, new Uint8Array(16));
  return concatBytes(cipher.update(plaintext), cipher.final());
}

// ── Tests ─────────────────────────────────────────────────────────────────────

describe("MediaAssembler", () => {
  it("keeps interleaved header ids apart and in order", async () => {
    const asm = new MediaAssembler();
    const one = begin(asm, { headerId: 1 });
    const two = begin(asm, { headerId: 2 });

    asm.onMedia(encodeMediaPayload(1, new Uint8Array([1, 1])));
    asm.onMedia(encodeMediaPayload(2, new Uint8Array([2])));
    asm.onMedia(encodeMediaPayload(1, new Uint8Array([1, 2, 3])));
    expect(asm.onMediaEnd(encodeMediaPayload(2))).toEqual({ type: "media.end", headerId: 2, byteLength: 1, complete: true });
    expect(asm.onMediaEnd(encodeMediaPayload(1))).toEqual({ type: "media.end", headerId: 1, byteLength: 5, complete: true });

    expect(await stream2uint8array(one)).toEqual(new Uint8Array([1, 1, 1, 2, 3]));
    expect(await stream2uint8array(two)).toEqual(new Uint8Array([2]));
    expect(asm.openHeaderIds()).toEqual([]);
  });

  it("reports chunk sizes without the header id varint", () => {
    const asm = new MediaAssembler();
    begin(asm, { headerId: 200 });
    expect(asm.onMedia(encodeMediaPayload(200, pattern(10)))).toEqual({
      type: "media.chunk",
      headerId: 200,
      byteLength: 10,
      encrypted: false,
    });
  });

  it("treats a repeated MEDIA_HEADER for an open id as a restatement", () => {
    const asm = new MediaAssembler();
    begin(asm, { headerId: 3, itag: 140 });
    expect(asm.onMediaHeader({ headerId: 3, itag: 140, sequenceNumber: 2 })).toEqual({
      type: "media.header",
      headerId: 3,
      header: { headerId: 3, itag: 140, sequenceNumber: 2 },
    });
    expect(asm.openHeaderIds()).toEqual([3]);
  });

  it("rejects media for an unknown header id", () => {
    const asm = new MediaAssembler();
    expect(() => asm.onMedia(encodeMediaPayload(9, pattern(3)))).toThrow(UnknownHeaderIdError);
    expect(() => asm.onMediaEnd(encodeMediaPayload(9))).toThrow(UnknownHeaderIdError);
  });

  it("drops media for an unknown header id in lenient mode", () => {
    const { logger } = MockLogger();
    const asm = new MediaAssembler({ strict: false, logger });
    expect(asm.onMedia(encodeMediaPayload(9, pattern(3)))).toBeUndefined();
  });

  it("rejects media for a finalized header id and reopens it on a new MEDIA_HEADER", async () => {
    const asm = new MediaAssembler();
    begin(asm, { headerId: 1 });
    asm.onMediaEnd(encodeMediaPayload(1));

    expect(() => asm.onMedia(encodeMediaPayload(1, pattern(2)))).toThrow(ProtocolViolationError);
    expect(() => asm.onMedia(encodeMediaPayload(1, pattern(2)))).toThrow("MEDIA for finalized header id 1");

    const again = begin(asm, { headerId: 1 });
    asm.onMedia(encodeMediaPayload(1, new Uint8Array([5])));
    asm.onMediaEnd(encodeMediaPayload(1));
    expect(await stream2uint8array(again)).toEqual(new Uint8Array([5]));
  });

  it("decrypts encrypted media with one running keystream per id", async () => {
    const plaintext = pattern(45, 3);
    const ciphertext = ctrEncrypt(plaintext);
    const asm = new MediaAssembler();
    await asm.setDecryptionKey(mediaKey);
    const stream = begin(asm, { headerId: 4 });

    for (const [from, to] of [
      [0, 5],
      [5, 25],
      [25, 32],
      [32, 45],
    ]) {
      expect(await asm.onEncryptedMedia(encodeMediaPayload(4, ciphertext.subarray(from, to)))).toEqual({
        type: "media.chunk",
        headerId: 4,
        byteLength: to - from,
        encrypted: true,
      });
    }
    asm.onMediaEnd(encodeMediaPayload(4));
    expect(await stream2uint8array(stream)).toEqual(plaintext);
  });

  it("holds encrypted media until the key arrives", async () => {
    const plaintext = pattern(30);
    const ciphertext = ctrEncrypt(plaintext);
    const asm = new MediaAssembler();
    const stream = begin(asm, { headerId: 1 });

    await asm.onEncryptedMedia(encodeMediaPayload(1, ciphertext.subarray(0, 20)));
    await asm.setDecryptionKey(mediaKey);
    await asm.onEncryptedMedia(encodeMediaPayload(1, ciphertext.subarray(20)));
    asm.onMediaEnd(encodeMediaPayload(1));

    expect(await stream2uint8array(stream)).toEqual(plaintext);
  });

  it("refuses to finalize a stream whose ciphertext was never decrypted", async () => {
    const asm = new MediaAssembler();
    begin(asm, { headerId: 1 });
    await asm.onEncryptedMedia(encodeMediaPayload(1, pattern(8)));
    expect(() => asm.onMediaEnd(encodeMediaPayload(1))).toThrow(MissingCryptoParamsError);
  });

  it("rejects a media key of the wrong length", async () => {
    await expect(new MediaAssembler().setDecryptionKey(new Uint8Array(10))).rejects.toThrow(InvalidKeyLengthError);
  });

  it("gunzips a gzip-compressed stream across chunks", async () => {
    const original = new TextEncoder().encode("media bytes ".repeat(50));
    const compressed = await gzip(original);
    const asm = new MediaAssembler();
    const stream = begin(asm, { headerId: 7, compression: CompressionType.GZIP });

    asm.onMedia(encodeMediaPayload(7, compressed.subarray(0, 9)));
    asm.onMedia(encodeMediaPayload(7, compressed.subarray(9)));
    expect(asm.onMediaEnd(encodeMediaPayload(7))?.byteLength).toBe(compressed.byteLength);

    expect(await stream2uint8array(stream)).toEqual(original);
  });

  it("fails only the stream whose gzip data is corrupt", async () => {
    const asm = new MediaAssembler();
    const bad = begin(asm, { headerId: 1, compression: CompressionType.GZIP });
    const good = begin(asm, { headerId: 2 });

    asm.onMedia(encodeMediaPayload(1, new Uint8Array([1, 2, 3, 4])));
    asm.onMedia(encodeMediaPayload(2, new Uint8Array([9])));
    asm.onMediaEnd(encodeMediaPayload(1));
    asm.onMediaEnd(encodeMediaPayload(2));

    await expect(stream2uint8array(bad)).rejects.toThrow(DecompressionFailedError);
    expect(await stream2uint8array(good)).toEqual(new Uint8Array([9]));
  });

  it("closes open streams as incomplete at end of input", async () => {
    const { logger } = MockLogger();
    const asm = new MediaAssembler({ logger });
    const stream = begin(asm, { headerId: 5 });
    asm.onMedia(encodeMediaPayload(5, new Uint8Array([1, 2])));

    expect(asm.finish()).toEqual([{ type: "media.end", headerId: 5, byteLength: 2, complete: false }]);
    expect(await stream2uint8array(stream)).toEqual(new Uint8Array([1, 2]));
  });

  it("errors open streams on abort", async () => {
    const asm = new MediaAssembler();
    const stream = begin(asm, { headerId: 5 });
    const err = new Error("input failed");
    asm.abort(err);
    await expect(stream2uint8array(stream)).rejects.toBe(err);
  });

  it("errors a gzip stream on abort with the same error", async () => {
    const asm = new MediaAssembler();
    const stream = begin(asm, { headerId: 6, compression: CompressionType.GZIP });
    asm.onMedia(encodeMediaPayload(6, (await gzip(pattern(20))).subarray(0, 5)));
    const err = new Error("input failed");
    asm.abort(err);
    await expect(stream2uint8array(stream)).rejects.toBe(err);
  });

  it("rejects a media payload without a header id", () => {
    const asm = new MediaAssembler();
    expect(() => asm.onMediaEnd(EMPTY)).toThrow(ProtocolViolationError);
    expect(() => asm.onMedia(EMPTY)).toThrow("MEDIA payload lacks a header id");
  });

  it("drops a media payload without a header id in lenient mode", async () => {
    const { logger } = MockLogger();
    const asm = new MediaAssembler({ strict: false, logger });
    expect(asm.onMediaEnd(EMPTY)).toBeUndefined();
    expect(await asm.onEncryptedMedia(EMPTY)).toBeUndefined();
  });

  it("remembers only the most recent finalized header ids", () => {
    const asm = new MediaAssembler({ finalizedHistory: 2 });
    for (const id of [1, 2, 3]) {
      begin(asm, { headerId: id });
      asm.onMediaEnd(encodeMediaPayload(id));
    }
    expect(() => asm.onMedia(encodeMediaPayload(1, pattern(1)))).toThrow("MEDIA for unknown header id 1");
    expect(() => asm.onMedia(encodeMediaPayload(2, pattern(1)))).toThrow("MEDIA for finalized header id 2");
    expect(() => asm.onMedia(encodeMediaPayload(3, pattern(1)))).toThrow("MEDIA for finalized header id 3");
  });

  it("keeps accepting chunks for a stream the consumer cancelled", async () => {
    const asm = new MediaAssembler();
    const stream = begin(asm, { headerId: 1 });
    await stream.cancel();

    expect(asm.onMedia(encodeMediaPayload(1, pattern(4)))?.byteLength).toBe(4);
    expect(asm.onMediaEnd(encodeMediaPayload(1))).toEqual({ type: "media.end", headerId: 1, byteLength: 4, complete: true });
  });
});

// Compression used inside the onesie envelope and by media streams.
//
// gzip goes through CompressionStream / DecompressionStream. Brotli only ever
// appears on whole onesie payloads and has no web-stream codec on Node 20, so
// it goes through zlib.

import { brotliDecompressSync } from "node:zlib";
import { stream2uint8array, uint8array2stream } from "@adviser/cement";
import { CompressionType } from "../schema.js";
import { DecompressionFailedError } from "../errors.js";

export function gzipEncode(): TransformStream<Uint8Array, Uint8Array> {
  return new CompressionStream("gzip") as TransformStream<Uint8Array, Uint8Array>;
}

export function gzipDecode(): TransformStream<Uint8Array, Uint8Array> {
  return new DecompressionStream("gzip") as TransformStream<Uint8Array, Uint8Array>;
}

export function gzip(data: Uint8Array): Promise<Uint8Array> {
  return stream2uint8array(uint8array2stream(data).pipeThrough(gzipEncode()));
}

export async function gunzip(data: Uint8Array): Promise<Uint8Array> {
  try {
    return await stream2uint8array(uint8array2stream(data).pipeThrough(gzipDecode()));
  } catch (e) {
    throw new DecompressionFailedError("gzip", e);
  }
}

export function brotliDecode(data: Uint8Array): Uint8Array {
  try {
    return new Uint8Array(brotliDecompressSync(data));
  } catch (e) {
    throw new DecompressionFailedError("brotli", e);
  }
}

/**
 * Decompresses an onesie payload: BROTLI → Brotli, every other value → gzip.
 */
export async function decompress(data: Uint8Array, compressionType: number): Promise<Uint8Array> {
  if (compressionType === CompressionType.BROTLI) return brotliDecode(data);
  return gunzip(data);
}

/**
 * Streaming decoder for a media stream's declared compression, or undefined
 * when the bytes are stored as is.
 */
export function mediaDecoder(compression: number | undefined): TransformStream<Uint8Array, Uint8Array> | undefined {
  return compression === CompressionType.GZIP ? gzipDecode() : undefined;
}

// Events emitted by UmpReader, one per completed part (plus media.end for
// streams still open at end of input). Every event carries a string `type`
// tag; the is*() guards check only that tag.

import { type } from "arktype";
import type { MediaHeader, OnesieHeader, OnesieInnertubeResponse } from "../schema.js";
import type { DecompressionFailedError, UpstreamError } from "../errors.js";

/** Pass-through for every part type the reader does not interpret. */
export interface UmpPartEvt {
  type: "ump.part";
  partType: number;
  name: string;
  payload: Uint8Array;
}

export interface OnesieHeaderEvt {
  type: "onesie.header";
  header: OnesieHeader;
}

export interface OnesiePlayerResponseEvt {
  type: "onesie.player_response";
  header: OnesieHeader;
  response: OnesieInnertubeResponse;
}

/** Non-OK PLAYER_RESPONSE. Decoding carries on after it. */
export interface OnesieUpstreamErrorEvt {
  type: "onesie.upstream_error";
  header: OnesieHeader;
  error: UpstreamError;
}

/** Onesie payload that authenticated but did not decompress. Decoding carries on after it. */
export interface OnesieDecompressionErrorEvt {
  type: "onesie.decompression_error";
  header: OnesieHeader;
  error: DecompressionFailedError;
}

export interface OnesieInnertubePartEvt {
  type: "onesie.innertube_part";
  header: OnesieHeader;
  data: Uint8Array;
}

// The key itself is kept inside the reader.
export interface OnesieMediaKeyEvt {
  type: "onesie.media_key";
  header: OnesieHeader;
  keyLength: number;
}

export interface OnesieDataEvt {
  type: "onesie.data";
  header: OnesieHeader;
  payload: Uint8Array;
}

/**
 * First MEDIA_HEADER for a header id. `stream` yields the id's media bytes,
 * decrypted and decompressed, and closes at its MEDIA_END. Cancelling it
 * drops the rest of this id without holding up the reader.
 */
export interface MediaBeginEvt {
  type: "media.begin";
  headerId: number;
  header: MediaHeader;
  stream: ReadableStream<Uint8Array>;
}

/** MEDIA_HEADER restated for an id that is already open. */
export interface MediaHeaderEvt {
  type: "media.header";
  headerId: number;
  header: MediaHeader;
}

export interface MediaChunkEvt {
  type: "media.chunk";
  headerId: number;
  // bytes as carried on the wire, before decryption and decompression
  byteLength: number;
  encrypted: boolean;
}

export interface MediaEndEvt {
  type: "media.end";
  headerId: number;
  byteLength: number;
  // false when the input ended before MEDIA_END
  complete: boolean;
}

export type OnesieEvt =
  | OnesieHeaderEvt
  | OnesiePlayerResponseEvt
  | OnesieUpstreamErrorEvt
  | OnesieDecompressionErrorEvt
  | OnesieInnertubePartEvt
  | OnesieMediaKeyEvt
  | OnesieDataEvt;

export type MediaEvt = MediaBeginEvt | MediaHeaderEvt | MediaChunkEvt | MediaEndEvt;

export type UmpEvt = UmpPartEvt | OnesieEvt | MediaEvt;

const MediaBeginMarker = type({ type: '"media.begin"', stream: "object" });
const MediaEndMarker = type({ type: '"media.end"', headerId: "number" });
const OnesieMarker = type({ type: /^onesie\./ });
const UmpPartMarker = type({ type: '"ump.part"' });

export function isMediaBegin(e: unknown): e is MediaBeginEvt {
  return !(MediaBeginMarker(e) instanceof type.errors);
}

export function isMediaEnd(e: unknown): e is MediaEndEvt {
  return !(MediaEndMarker(e) instanceof type.errors);
}

export function isOnesieEvt(e: unknown): e is OnesieEvt {
  return !(OnesieMarker(e) instanceof type.errors);
}

export function isUmpPart(e: unknown): e is UmpPartEvt {
  return !(UmpPartMarker(e) instanceof type.errors);
}

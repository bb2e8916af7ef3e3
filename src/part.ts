// UMP part format
//
// Each part:
//   [type: varint][payload_length: varint][payload: bytes]
//
// MEDIA, ONESIE_ENCRYPTED_MEDIA and MEDIA_END payloads additionally start with
// a varint header id that ties them to the MEDIA_HEADER that opened the stream.
//
// Part types handled by the decoder:
//   10  ONESIE_HEADER           — envelope metadata for the next ONESIE_DATA
//   11  ONESIE_DATA             — encrypted/compressed envelope body
//   12  ONESIE_ENCRYPTED_MEDIA  — [header_id][AES-CTR ciphertext]
//   20  MEDIA_HEADER            — opens a media stream
//   21  MEDIA                   — [header_id][media bytes]
//   22  MEDIA_END               — [header_id], closes a media stream
//
// Every other type, named below or not, is forwarded as an opaque payload.

import { Varint } from "./varint.js";
import { concatBytes } from "./bytes.js";
import { TruncatedInputError } from "./errors.js";

export const PartType = {
  ONESIE_HEADER: 10,
  ONESIE_DATA: 11,
  ONESIE_ENCRYPTED_MEDIA: 12,
  MEDIA_HEADER: 20,
  MEDIA: 21,
  MEDIA_END: 22,
  LIVE_METADATA: 31,
  HOSTNAME_CHANGE_HINT: 32,
  LIVE_METADATA_PROMISE: 33,
  LIVE_METADATA_PROMISE_CANCELLATION: 34,
  NEXT_REQUEST_POLICY: 35,
  USTREAMER_VIDEO_AND_FORMAT_DATA: 36,
  FORMAT_SELECTION_CONFIG: 37,
  USTREAMER_SELECTED_MEDIA_STREAM: 38,
  FORMAT_INITIALIZATION_METADATA: 42,
  SABR_REDIRECT: 43,
  SABR_ERROR: 44,
  SABR_SEEK: 45,
  RELOAD_PLAYER_RESPONSE: 46,
  PLAYBACK_START_POLICY: 47,
  ALLOWED_CACHED_FORMATS: 48,
  START_BANDWIDTH_ESTIMATE: 49,
  REQUEST_IDENTIFIER: 50,
  REQUEST_CANCELLATION_POLICY: 51,
  ONESIE_PREFETCH_REJECTION: 52,
  TIMELINE_CONTEXT: 53,
  REQUEST_PIPELINING: 54,
  SABR_CONTEXT_UPDATE: 55,
  STREAM_PROTECTION_STATUS: 56,
  SABR_CONTEXT_SENDING_POLICY: 57,
  LAWNMOWER_POLICY: 58,
  SABR_ACK: 59,
  END_OF_TRACK: 60,
  CACHE_LOAD_POLICY: 61,
  LAWNMOWER_MESSAGING_POLICY: 62,
  PREWARM_CONNECTION: 63,
  PLAYBACK_DEBUG_INFO: 64,
  SNACKBAR_MESSAGE: 65,
} as const;

export type PartTypeValue = (typeof PartType)[keyof typeof PartType];

const partNames = new Map<number, string>(Object.entries(PartType).map(([name, value]): [number, string] => [value, name]));

/** Name of a documented part type, or `UNKNOWN_<n>`. */
export function partTypeName(type: number): string {
  return partNames.get(type) ?? `UNKNOWN_${type}`;
}

export function isKnownPartType(type: number): type is PartTypeValue {
  return partNames.has(type);
}

/**
 * A framed part. `type` is a plain number: values outside {@link PartType}
 * are legal and travel as opaque payloads.
 */
export interface UmpPart {
  readonly type: number;
  readonly payload: Uint8Array;
}

// ── Encode ────────────────────────────────────────────────────────────────────

export function encodePart(part: UmpPart): Uint8Array {
  return concatBytes(new Varint(part.type).toBytes(), new Varint(part.payload.byteLength).toBytes(), part.payload);
}

/** Payload of MEDIA, ONESIE_ENCRYPTED_MEDIA and MEDIA_END: `[header_id varint][bytes]`. */
export function encodeMediaPayload(headerId: number, bytes: Uint8Array = new Uint8Array(0)): Uint8Array {
  return concatBytes(new Varint(headerId).toBytes(), bytes);
}

// ── Decode ────────────────────────────────────────────────────────────────────

export interface PartHeader {
  readonly type: number;
  readonly length: number;
  /** Bytes taken by the two varints. */
  readonly size: number;
}

/**
 * Decodes the type and length varints at `offset`. Returns undefined when the
 * buffer ends before both varints are complete.
 */
export function readPartHeader(buf: Uint8Array, offset = 0): PartHeader | undefined {
  if (offset >= buf.byteLength) return undefined;
  const typeSize = Varint.sizeOf(buf[offset]);
  if (offset + typeSize >= buf.byteLength) return undefined;
  const lengthSize = Varint.sizeOf(buf[offset + typeSize]);
  if (offset + typeSize + lengthSize > buf.byteLength) return undefined;
  const { varint: type } = Varint.fromBytes(buf, offset);
  const { varint: length } = Varint.fromBytes(buf, offset + typeSize);
  return { type: type.value, length: length.value, size: typeSize + lengthSize };
}

export interface DecodePartResult {
  readonly part: UmpPart;
  readonly bytesConsumed: number;
}

export function decodePart(buf: Uint8Array, offset = 0): DecodePartResult {
  const header = readPartHeader(buf, offset);
  if (!header) throw new TruncatedInputError(`part: incomplete header at offset ${offset}`);
  const start = offset + header.size;
  if (start + header.length > buf.byteLength) {
    throw new TruncatedInputError(
      `part: type ${header.type} declares ${header.length} bytes, ${buf.byteLength - start} available`,
    );
  }
  return {
    part: { type: header.type, payload: buf.slice(start, start + header.length) },
    bytesConsumed: header.size + header.length,
  };
}

export function* iterParts(buf: Uint8Array): Generator<{ part: UmpPart; offset: number }> {
  let offset = 0;
  while (offset < buf.byteLength) {
    const { part, bytesConsumed } = decodePart(buf, offset);
    yield { part, offset };
    offset += bytesConsumed;
  }
}

/** Splits a MEDIA / ONESIE_ENCRYPTED_MEDIA / MEDIA_END payload into its header id and body. */
export function splitMediaPayload(payload: Uint8Array): { headerId: number; body: Uint8Array } {
  const { varint, bytesRead } = Varint.fromBytes(payload);
  return { headerId: varint.value, body: payload.subarray(bytesRead) };
}

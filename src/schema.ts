// Inner payload records.
//
// The framing layer never interprets part payloads itself; ONESIE_HEADER,
// MEDIA_HEADER and the decrypted onesie response wrapper are handed to a
// PartSchema. jsonPartSchema reads them as UTF-8 JSON, validated with arktype,
// with byte fields carried as base64 strings. A deployment talking to the real
// service plugs in its own PartSchema backed by the binary message definitions.

import { type } from "arktype";
import { fromBase64 } from "./bytes.js";
import { ProtocolViolationError } from "./errors.js";

export const CompressionType = {
  UNSPECIFIED: 0,
  GZIP: 1,
  BROTLI: 2,
} as const;

export const OnesieHeaderType = {
  PLAYER_RESPONSE: 0,
  MEDIA_DECRYPTION_KEY: 2,
  ENCRYPTED_INNERTUBE_RESPONSE_PART: 25,
} as const;

// Header types that are never followed by an ONESIE_DATA part.
export const HEADER_TYPES_WITHOUT_DATA: ReadonlySet<number> = new Set([6, 14, 16]);

export const ProxyStatus = {
  OK: 1,
} as const;

// ── Decoded records ──────────────────────────────────────────────────────────

export interface OnesieCryptoParams {
  readonly hmac?: Uint8Array;
  readonly iv?: Uint8Array;
  readonly compressionType?: number;
}

export interface OnesieHeader {
  readonly type: number;
  readonly videoId?: string;
  readonly itag?: number;
  readonly lastModified?: number;
  readonly xtags?: string;
  readonly expectedMediaSizeBytes?: number;
  readonly cryptoParams?: OnesieCryptoParams;
}

export interface MediaHeader {
  readonly headerId: number;
  readonly videoId?: string;
  readonly itag?: number;
  readonly lastModified?: number;
  readonly xtags?: string;
  readonly startDataRange?: number;
  readonly isInitSegment?: boolean;
  readonly sequenceNumber?: number;
  readonly startMs?: number;
  readonly durationMs?: number;
  readonly contentLength?: number;
  readonly compression?: number;
}

export interface OnesieInnertubeResponse {
  readonly proxyStatus: number;
  readonly status: number;
  readonly headers: readonly { readonly name: string; readonly value: string }[];
  readonly body: Uint8Array;
}

/** Decodes the structured payloads the dispatcher needs to look inside. */
export interface PartSchema {
  onesieHeader(payload: Uint8Array): OnesieHeader;
  mediaHeader(payload: Uint8Array): MediaHeader;
  onesieInnertubeResponse(plaintext: Uint8Array): OnesieInnertubeResponse;
}

// ── JSON wire shapes ─────────────────────────────────────────────────────────

export const OnesieHeaderJson = type({
  type: "number",
  "videoId?": "string",
  "itag?": "number",
  "lastModified?": "number",
  "xtags?": "string",
  "expectedMediaSizeBytes?": "number",
  "cryptoParams?": {
    "hmac?": "string",
    "iv?": "string",
    "compressionType?": "number",
  },
});
export type OnesieHeaderJson = typeof OnesieHeaderJson.infer;

export const MediaHeaderJson = type({
  headerId: "number",
  "videoId?": "string",
  "itag?": "number",
  "lastModified?": "number",
  "xtags?": "string",
  "startDataRange?": "number",
  "isInitSegment?": "boolean",
  "sequenceNumber?": "number",
  "startMs?": "number",
  "durationMs?": "number",
  "contentLength?": "number",
  "compression?": "number",
});
export type MediaHeaderJson = typeof MediaHeaderJson.infer;

export const OnesieInnertubeResponseJson = type({
  proxyStatus: "number",
  status: "number",
  "headers?": type({ name: "string", value: "string" }).array(),
  "body?": "string",
});
export type OnesieInnertubeResponseJson = typeof OnesieInnertubeResponseJson.infer;

function parseJson(what: string, payload: Uint8Array): unknown {
  try {
    return JSON.parse(new TextDecoder().decode(payload));
  } catch (e) {
    throw new ProtocolViolationError(`malformed ${what}: ${e instanceof Error ? e.message : String(e)}`);
  }
}

function decodeBase64(what: string, b64: string): Uint8Array {
  try {
    return fromBase64(b64);
  } catch {
    throw new ProtocolViolationError(`malformed ${what}: invalid base64`);
  }
}

export const jsonPartSchema: PartSchema = {
  onesieHeader(payload): OnesieHeader {
    const rec = OnesieHeaderJson(parseJson("ONESIE_HEADER", payload));
    if (rec instanceof type.errors) throw new ProtocolViolationError(`malformed ONESIE_HEADER: ${rec.summary}`);
    const { cryptoParams, ...rest } = rec;
    if (!cryptoParams) return rest;
    return {
      ...rest,
      cryptoParams: {
        ...(cryptoParams.hmac !== undefined ? { hmac: decodeBase64("ONESIE_HEADER.hmac", cryptoParams.hmac) } : {}),
        ...(cryptoParams.iv !== undefined ? { iv: decodeBase64("ONESIE_HEADER.iv", cryptoParams.iv) } : {}),
        ...(cryptoParams.compressionType !== undefined ? { compressionType: cryptoParams.compressionType } : {}),
      },
    };
  },

  mediaHeader(payload): MediaHeader {
    const rec = MediaHeaderJson(parseJson("MEDIA_HEADER", payload));
    if (rec instanceof type.errors) throw new ProtocolViolationError(`malformed MEDIA_HEADER: ${rec.summary}`);
    return rec;
  },

  onesieInnertubeResponse(plaintext): OnesieInnertubeResponse {
    const rec = OnesieInnertubeResponseJson(parseJson("onesie response", plaintext));
    if (rec instanceof type.errors) throw new ProtocolViolationError(`malformed onesie response: ${rec.summary}`);
    return {
      proxyStatus: rec.proxyStatus,
      status: rec.status,
      headers: rec.headers ?? [],
      body: rec.body === undefined ? new Uint8Array(0) : decodeBase64("onesie response body", rec.body),
    };
  },
};

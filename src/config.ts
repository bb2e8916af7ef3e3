// Reader options, their defaults, and validation.
//
// continuation
//   "stream"     input buffers are arbitrary transport chunks (default)
//   "segmented"  every buffer after an unfinished part restarts with a
//                MEDIA_HEADER and a continuation header for that part
// strict
//   true   protocol violations are thrown (default)
//   false  they are logged and decoding carries on

import { type } from "arktype";
import type { Logger } from "@adviser/cement";
import { jsonPartSchema, type PartSchema } from "./schema.js";
import { InvalidKeyLengthError } from "./errors.js";
import { ONESIE_KEY_LENGTH } from "./onesie/envelope.js";

export const ContinuationMode = type('"stream" | "segmented"');
export type ContinuationMode = typeof ContinuationMode.infer;

export interface UmpReaderOptions {
  continuation?: ContinuationMode;
  strict?: boolean;
  /** 32 raw bytes: AES key followed by HMAC key. Required for ONESIE_DATA. */
  onesieKey?: Uint8Array;
  schema?: PartSchema;
  logger?: Logger;
}

export interface UmpReaderConfig {
  readonly continuation: ContinuationMode;
  readonly strict: boolean;
  readonly onesieKey?: Uint8Array;
  readonly schema: PartSchema;
  readonly logger?: Logger;
}

export function parseContinuationMode(value: unknown): ContinuationMode {
  const mode = ContinuationMode(value);
  if (mode instanceof type.errors) throw new TypeError(`continuation ${mode.summary}`);
  return mode;
}

export function resolveReaderConfig(opts?: UmpReaderOptions): UmpReaderConfig {
  if (opts?.onesieKey && opts.onesieKey.byteLength !== ONESIE_KEY_LENGTH) {
    throw new InvalidKeyLengthError([ONESIE_KEY_LENGTH], opts.onesieKey.byteLength);
  }
  return {
    continuation: parseContinuationMode(opts?.continuation ?? "stream"),
    strict: opts?.strict ?? true,
    schema: opts?.schema ?? jsonPartSchema,
    ...(opts?.onesieKey ? { onesieKey: opts.onesieKey } : {}),
    ...(opts?.logger ? { logger: opts.logger } : {}),
  };
}

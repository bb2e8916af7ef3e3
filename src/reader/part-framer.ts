// Stage 1 of the read pipeline: raw byte buffers → complete UmpParts.
//
// PartFramer.push(buffer) → UmpPart[]
// PartFramer.end()        → throws TruncatedInputError if anything is held
// partFramer(opts)        → TransformStream<Uint8Array, UmpPart>
//
// Two states:
//   idle                   — next bytes start a part header
//   awaiting-continuation  — a part declared more bytes than its buffer held;
//                            its bytes so far sit in the continuation record
//
// A part header (two varints) cut by a buffer boundary is carried over and
// completed with the next buffer. In "segmented" mode a buffer that follows an
// unfinished part must first restate the stream: a full MEDIA_HEADER part, then
// a header of the unfinished part's type declaring exactly the bytes still owed.

import type { Logger } from "@adviser/cement";
import { PartType, partTypeName, readPartHeader, type UmpPart } from "../part.js";
import { EMPTY, concatBytes } from "../bytes.js";
import { ProtocolViolationError, TruncatedInputError } from "../errors.js";
import { ensureModuleLogger } from "../logger.js";
import type { ContinuationMode } from "../config.js";

export type PartFramerState = "idle" | "awaiting-continuation";

export interface PartFramerOptions {
  continuation?: ContinuationMode;
  strict?: boolean;
  logger?: Logger;
}

/** Snapshot of an unfinished part. */
export interface ContinuationInfo {
  readonly expectedType: number;
  readonly remainingBytes: number;
  readonly accumulatedBytes: number;
}

interface Continuation {
  readonly type: number;
  remaining: number;
  accumulated: number;
  readonly chunks: Uint8Array[];
  // segmented mode: the next bytes must be MEDIA_HEADER + continuation header
  restate: boolean;
}

export class PartFramer {
  readonly #segmented: boolean;
  readonly #strict: boolean;
  readonly #logger: Logger;
  #carry: Uint8Array = EMPTY;
  #continuation?: Continuation;

  constructor(opts?: PartFramerOptions) {
    this.#segmented = (opts?.continuation ?? "stream") === "segmented";
    this.#strict = opts?.strict ?? true;
    this.#logger = ensureModuleLogger("PartFramer", opts?.logger);
  }

  get state(): PartFramerState {
    return this.#continuation ? "awaiting-continuation" : "idle";
  }

  get continuation(): ContinuationInfo | undefined {
    const c = this.#continuation;
    if (!c) return undefined;
    return { expectedType: c.type, remainingBytes: c.remaining, accumulatedBytes: c.accumulated };
  }

  push(chunk: Uint8Array): UmpPart[] {
    const parts: UmpPart[] = [];
    const buf = this.#carry.byteLength > 0 ? concatBytes(this.#carry, chunk) : chunk;
    this.#carry = EMPTY;
    let offset = 0;

    while (offset < buf.byteLength) {
      const cont = this.#continuation;

      if (cont?.restate) {
        const consumed = this.#restate(buf, offset, cont, parts);
        if (consumed === undefined) {
          this.#carry = buf.slice(offset);
          return parts;
        }
        offset += consumed;
        continue;
      }

      if (cont) {
        const take = Math.min(cont.remaining, buf.byteLength - offset);
        cont.chunks.push(buf.slice(offset, offset + take));
        cont.remaining -= take;
        cont.accumulated += take;
        offset += take;
        if (cont.remaining === 0) {
          parts.push({ type: cont.type, payload: concatBytes(...cont.chunks) });
          this.#continuation = undefined;
        }
        continue;
      }

      const header = readPartHeader(buf, offset);
      if (!header) {
        this.#carry = buf.slice(offset);
        return parts;
      }
      offset += header.size;
      const available = buf.byteLength - offset;

      if (header.length <= available) {
        parts.push({ type: header.type, payload: buf.slice(offset, offset + header.length) });
        offset += header.length;
        continue;
      }

      this.#continuation = {
        type: header.type,
        remaining: header.length - available,
        accumulated: available,
        chunks: available > 0 ? [buf.slice(offset)] : [],
        restate: false,
      };
      offset = buf.byteLength;
    }

    if (this.#continuation && this.#segmented) this.#continuation.restate = true;
    return parts;
  }

  end(): void {
    const cont = this.#continuation;
    if (cont) {
      throw new TruncatedInputError(
        `input ended inside ${partTypeName(cont.type)}: ${cont.remaining} of ${cont.remaining + cont.accumulated} bytes missing`,
      );
    }
    if (this.#carry.byteLength > 0) {
      throw new TruncatedInputError(`input ended inside a part header (${this.#carry.byteLength} bytes held)`);
    }
  }

  // Consumes the MEDIA_HEADER + continuation header that open a segment.
  // Returns the bytes consumed, or undefined when the buffer ends first.
  #restate(buf: Uint8Array, offset: number, cont: Continuation, parts: UmpPart[]): number | undefined {
    const head = readPartHeader(buf, offset);
    if (!head) return undefined;

    if (head.type !== PartType.MEDIA_HEADER) {
      this.#violation(
        `segment continuing ${partTypeName(cont.type)} starts with ${partTypeName(head.type)} instead of MEDIA_HEADER`,
      );
      cont.restate = false;
      return 0;
    }

    const headerEnd = offset + head.size + head.length;
    if (headerEnd > buf.byteLength) return undefined;
    const next = readPartHeader(buf, headerEnd);
    if (!next) return undefined;

    parts.push({ type: PartType.MEDIA_HEADER, payload: buf.slice(offset + head.size, headerEnd) });

    if (next.type !== cont.type) {
      this.#violation(`continuation declares ${partTypeName(next.type)}, expected ${partTypeName(cont.type)}`);
    } else if (next.length !== cont.remaining) {
      this.#violation(`continuation of ${partTypeName(cont.type)} declares ${next.length} bytes, ${cont.remaining} owed`);
    }
    cont.restate = false;
    return headerEnd + next.size - offset;
  }

  #violation(msg: string): void {
    if (this.#strict) throw new ProtocolViolationError(msg);
    this.#logger.Warn().Msg(`${msg}; continuing leniently`);
  }
}

export function partFramer(opts?: PartFramerOptions): TransformStream<Uint8Array, UmpPart> {
  const framer = new PartFramer(opts);
  return new TransformStream({
    transform(chunk, ctrl): void {
      for (const part of framer.push(chunk)) ctrl.enqueue(part);
    },
    flush(): void {
      framer.end();
    },
  });
}

import { exception2Result, stream2uint8array, type Result } from "@adviser/cement";
import type { MediaHeader } from "../schema.js";
import { isMediaBegin, isMediaEnd, type UmpEvt } from "./events.js";

export interface FinalizedMedia {
  headerId: number;
  header: MediaHeader;
  bytes: Uint8Array;
  // false when the input ended before MEDIA_END
  complete: boolean;
}

/**
 * Buffers every media stream of a {@link UmpReader} event stream and emits
 * each one whole when its `media.end` arrives. Other events are consumed and
 * dropped. A media stream that fails (e.g. bad gzip) errors the output.
 */
export function collectMedia(events: ReadableStream<UmpEvt>): ReadableStream<FinalizedMedia> {
  const reader = events.getReader();
  // Each stream is drained from its media.begin on; the Result keeps a
  // failure from surfacing before its media.end is reached.
  const open = new Map<number, { header: MediaHeader; bytes: Promise<Result<Uint8Array>> }>();

  return new ReadableStream<FinalizedMedia>({
    async pull(ctrl): Promise<void> {
      while (true) {
        const { done, value } = await reader.read();
        if (done) {
          ctrl.close();
          return;
        }
        if (isMediaBegin(value)) {
          const stream = value.stream;
          open.set(value.headerId, { header: value.header, bytes: exception2Result(() => stream2uint8array(stream)) });
          continue;
        }
        if (!isMediaEnd(value)) continue;
        const entry = open.get(value.headerId);
        if (!entry) continue;
        open.delete(value.headerId);
        const bytes = await entry.bytes;
        if (bytes.isErr()) throw bytes.Err();
        ctrl.enqueue({ headerId: value.headerId, header: entry.header, bytes: bytes.Ok(), complete: value.complete });
        return;
      }
    },
    cancel(reason): Promise<void> {
      return reader.cancel(reason);
    },
  });
}

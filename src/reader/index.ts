// UmpReader — decodes a UMP response body into a stream of events.
//
//   PartFramer      → input buffers into complete parts
//   Dispatcher      → one UmpEvt per part (onesie envelope, media assembly,
//                     opaque pass-through)
//
// Output: ReadableStream<UmpEvt>
//   media.begin carries a live ReadableStream per header id; media.end closes it.
//   collectMedia() turns the events into whole per-id blobs instead.

import { resolveReaderConfig, type UmpReaderOptions } from "../config.js";
import { PartFramer } from "./part-framer.js";
import { Dispatcher } from "./dispatcher.js";
import type { UmpEvt } from "./events.js";

export * from "./events.js";
export { collectMedia, type FinalizedMedia } from "./collect-media.js";
export { PartFramer, partFramer, type PartFramerState, type ContinuationInfo } from "./part-framer.js";
export { Dispatcher } from "./dispatcher.js";
export { MediaAssembler } from "./media-assembler.js";

/**
 * Reads a UMP byte stream and emits one {@link UmpEvt} per completed part,
 * followed by an incomplete `media.end` for every media stream the input
 * left open.
 *
 * Fatal errors (truncation, protocol violations in strict mode, crypto
 * failures) error the returned stream and every open media stream. Cancelling
 * the returned stream cancels `input`, lets the parts of the buffer already
 * read reach their media streams, then closes those streams.
 *
 * @param input Response body, in buffers of any size (`continuation: "stream"`)
 *   or as whole segments (`continuation: "segmented"`).
 * @param opts See {@link UmpReaderOptions}.
 */
export function UmpReader(input: ReadableStream<Uint8Array>, opts?: UmpReaderOptions): ReadableStream<UmpEvt> {
  const cfg = resolveReaderConfig(opts);
  const framer = new PartFramer(cfg);
  const dispatcher = new Dispatcher(cfg);
  const reader = input.getReader();
  let cancelled = false;
  // the pull in progress; cancel() lets it dispatch the rest of its buffer
  let inflight: Promise<void> | undefined;

  async function fill(ctrl: ReadableStreamDefaultController<UmpEvt>): Promise<void> {
    // keep reading until this pull has produced something
    while (!cancelled) {
      const { done, value } = await reader.read();
      if (cancelled) return;
      if (done) {
        framer.end();
        for (const evt of dispatcher.finish()) ctrl.enqueue(evt);
        ctrl.close();
        return;
      }
      const parts = framer.push(value);
      for (const part of parts) {
        const evt = await dispatcher.dispatch(part);
        if (!cancelled) ctrl.enqueue(evt);
      }
      if (parts.length > 0) return;
    }
  }

  return new ReadableStream<UmpEvt>({
    pull(ctrl): Promise<void> {
      inflight = fill(ctrl).catch((e: unknown) => {
        dispatcher.abort(e);
        throw e;
      });
      return inflight;
    },
    async cancel(reason): Promise<void> {
      cancelled = true;
      await reader.cancel(reason);
      try {
        await inflight;
      } finally {
        dispatcher.close();
      }
    },
  });
}

// Media stream reassembly, keyed by header id.
//
// MEDIA_HEADER(id)            → opens a stream: emits media.begin with a live
//                               ReadableStream, or media.header when the id is
//                               already open (segmented responses restate it).
// MEDIA(id, bytes)            → bytes enqueued on the stream for id.
// ONESIE_ENCRYPTED_MEDIA(id)  → decrypted with the id's running AES-CTR
//                               keystream, then enqueued like MEDIA.
// MEDIA_END(id)               → stream closed, media.end emitted.
//
// Ids are independent; chunks of one id keep arrival order. Encrypted chunks
// that arrive before any MEDIA_DECRYPTION_KEY are held for their id and
// decrypted once a key is set. Each id binds to the key in effect when its
// first chunk is decrypted and never resets its keystream.
//
// The live streams never apply backpressure to the reader: a consumer that
// stops reading lets its queue grow, and one that cancels has later chunks for
// that id dropped.
//
// Finalized ids are remembered so late data for them reads as a violation
// rather than an unknown id; only the most recent `finalizedHistory` are kept.

import type { Logger } from "@adviser/cement";
import { PartType, partTypeName, splitMediaPayload } from "../part.js";
import { CtrKeystream, importAesCtrKey } from "../onesie/keystream.js";
import { mediaDecoder } from "../onesie/compression.js";
import type { MediaHeader } from "../schema.js";
import {
  DecompressionFailedError,
  MissingCryptoParamsError,
  ProtocolViolationError,
  TruncatedInputError,
  UnknownHeaderIdError,
} from "../errors.js";
import { ensureModuleLogger } from "../logger.js";
import type { MediaBeginEvt, MediaChunkEvt, MediaEndEvt, MediaHeaderEvt } from "./events.js";

interface MediaStreamState {
  readonly headerId: number;
  header: MediaHeader;
  readonly ctrl: ReadableStreamDefaultController<Uint8Array>;
  keystream?: CtrKeystream;
  // ciphertext waiting for a decryption key
  readonly held: Uint8Array[];
  byteLength: number;
  cancelled: boolean;
  // set by abort(); the decoded stream fails with this reason as is
  aborted?: { reason: unknown };
}

export interface MediaAssemblerOptions {
  strict?: boolean;
  logger?: Logger;
  /** How many finalized header ids to remember (default 1024). */
  finalizedHistory?: number;
}

export const DEFAULT_FINALIZED_HISTORY = 1024;

// Maps the decoder's failure onto DecompressionFailedError for this stream
// only. An abort reaches the consumer unwrapped.
function withDecompressionErrors(
  src: ReadableStream<Uint8Array>,
  codec: string,
  state: MediaStreamState,
): ReadableStream<Uint8Array> {
  const reader = src.getReader();
  return new ReadableStream<Uint8Array>({
    async pull(ctrl): Promise<void> {
      try {
        const { done, value } = await reader.read();
        if (done) ctrl.close();
        else ctrl.enqueue(value);
      } catch (e) {
        ctrl.error(state.aborted ? state.aborted.reason : new DecompressionFailedError(codec, e));
      }
    },
    cancel(reason): Promise<void> {
      return reader.cancel(reason);
    },
  });
}

export class MediaAssembler {
  readonly #strict: boolean;
  readonly #logger: Logger;
  readonly #streams = new Map<number, MediaStreamState>();
  readonly #finalized = new Set<number>();
  readonly #finalizedHistory: number;
  #decryptionKey?: CryptoKey;

  constructor(opts?: MediaAssemblerOptions) {
    this.#strict = opts?.strict ?? true;
    this.#finalizedHistory = opts?.finalizedHistory ?? DEFAULT_FINALIZED_HISTORY;
    this.#logger = ensureModuleLogger("MediaAssembler", opts?.logger);
  }

  /** Header ids with an open stream, in opening order. */
  openHeaderIds(): number[] {
    return [...this.#streams.keys()];
  }

  onMediaHeader(header: MediaHeader): MediaBeginEvt | MediaHeaderEvt {
    const { headerId } = header;
    const open = this.#streams.get(headerId);
    if (open) {
      open.header = header;
      return { type: "media.header", headerId, header };
    }

    this.#finalized.delete(headerId);
    let streamCtrl!: ReadableStreamDefaultController<Uint8Array>;
    const raw = new ReadableStream<Uint8Array>({
      start(c): void {
        streamCtrl = c;
      },
      cancel(): void {
        state.cancelled = true;
      },
    });
    const state: MediaStreamState = { headerId, header, ctrl: streamCtrl, held: [], byteLength: 0, cancelled: false };
    this.#streams.set(headerId, state);
    this.#logger.Debug().Uint64("headerId", headerId).Any("compression", header.compression).Msg("media stream opened");

    const decoder = mediaDecoder(header.compression);
    const stream = decoder ? withDecompressionErrors(raw.pipeThrough(decoder), "gzip", state) : raw;
    return { type: "media.begin", headerId, header, stream };
  }

  onMedia(payload: Uint8Array): MediaChunkEvt | undefined {
    const split = this.#split(payload, PartType.MEDIA);
    if (!split) return undefined;
    const { headerId, body } = split;
    const state = this.#lookup(headerId, PartType.MEDIA);
    if (!state) return undefined;
    this.#enqueue(state, body);
    return { type: "media.chunk", headerId, byteLength: body.byteLength, encrypted: false };
  }

  async onEncryptedMedia(payload: Uint8Array): Promise<MediaChunkEvt | undefined> {
    const split = this.#split(payload, PartType.ONESIE_ENCRYPTED_MEDIA);
    if (!split) return undefined;
    const { headerId, body } = split;
    const state = this.#lookup(headerId, PartType.ONESIE_ENCRYPTED_MEDIA);
    if (!state) return undefined;
    state.held.push(body.slice());
    await this.#drainHeld(state);
    return { type: "media.chunk", headerId, byteLength: body.byteLength, encrypted: true };
  }

  /** Sets the key for ONESIE_ENCRYPTED_MEDIA and decrypts anything held for want of one. */
  async setDecryptionKey(rawKey: Uint8Array): Promise<void> {
    this.#decryptionKey = await importAesCtrKey(rawKey);
    for (const state of this.#streams.values()) await this.#drainHeld(state);
  }

  onMediaEnd(payload: Uint8Array): MediaEndEvt | undefined {
    const split = this.#split(payload, PartType.MEDIA_END);
    if (!split) return undefined;
    const { headerId } = split;
    const state = this.#lookup(headerId, PartType.MEDIA_END);
    if (!state) return undefined;
    if (state.held.length > 0) {
      throw new MissingCryptoParamsError(
        `MEDIA_END for header id ${headerId} with ${state.held.length} encrypted chunks and no decryption key`,
      );
    }
    this.#close(state);
    this.#markFinalized(headerId);
    return { type: "media.end", headerId, byteLength: state.byteLength, complete: true };
  }

  /** End of input: closes every open stream and reports it incomplete. */
  finish(): MediaEndEvt[] {
    return [...this.#streams.values()].map((state) => {
      this.#logger
        .Warn()
        .Uint64("headerId", state.headerId)
        .Uint64("held", state.held.length)
        .Msg("input ended before MEDIA_END");
      this.#close(state);
      return { type: "media.end", headerId: state.headerId, byteLength: state.byteLength, complete: false };
    });
  }

  /** Reader cancelled: closes every open stream without reporting it. */
  close(): void {
    for (const state of [...this.#streams.values()]) this.#close(state);
  }

  /** Fatal error upstream: errors every open stream with it. */
  abort(reason: unknown): void {
    for (const state of this.#streams.values()) {
      state.aborted = { reason };
      if (!state.cancelled) state.ctrl.error(reason);
    }
    this.#streams.clear();
  }

  #split(payload: Uint8Array, partType: number): { headerId: number; body: Uint8Array } | undefined {
    try {
      return splitMediaPayload(payload);
    } catch (e) {
      if (!(e instanceof TruncatedInputError)) throw e;
      return this.#violation(new ProtocolViolationError(`${partTypeName(partType)} payload lacks a header id`, { cause: e }));
    }
  }

  #lookup(headerId: number, partType: number): MediaStreamState | undefined {
    const state = this.#streams.get(headerId);
    if (state) return state;
    return this.#violation(
      this.#finalized.has(headerId)
        ? new ProtocolViolationError(`${partTypeName(partType)} for finalized header id ${headerId}`)
        : new UnknownHeaderIdError(headerId, partTypeName(partType)),
    );
  }

  #violation(err: ProtocolViolationError): undefined {
    if (this.#strict) throw err;
    this.#logger.Warn().Err(err).Msg("dropping part");
    return undefined;
  }

  #markFinalized(headerId: number): void {
    this.#finalized.add(headerId);
    for (const oldest of this.#finalized) {
      if (this.#finalized.size <= this.#finalizedHistory) break;
      this.#finalized.delete(oldest);
    }
  }

  async #drainHeld(state: MediaStreamState): Promise<void> {
    if (state.held.length === 0) return;
    let keystream = state.keystream;
    if (!keystream) {
      if (!this.#decryptionKey) return;
      keystream = state.keystream = new CtrKeystream(this.#decryptionKey);
    }
    const chunks = state.held.splice(0);
    for (const chunk of chunks) this.#enqueue(state, await keystream.update(chunk));
  }

  #enqueue(state: MediaStreamState, bytes: Uint8Array): void {
    state.byteLength += bytes.byteLength;
    if (state.cancelled || bytes.byteLength === 0) return;
    state.ctrl.enqueue(bytes);
  }

  #close(state: MediaStreamState): void {
    if (!state.cancelled) state.ctrl.close();
    this.#streams.delete(state.headerId);
    this.#logger.Debug().Uint64("headerId", state.headerId).Uint64("bytes", state.byteLength).Msg("media stream closed");
  }
}

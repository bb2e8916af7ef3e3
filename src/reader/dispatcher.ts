// Routes completed parts to their handlers and turns each into one UmpEvt.
//
// ONESIE_HEADER   → decoded, parked in the pending slot unless its type never
//                   carries data
// ONESIE_DATA     → paired with the pending header and handled by its type:
//                     PLAYER_RESPONSE                    opened, unwrapped, status checked
//                     ENCRYPTED_INNERTUBE_RESPONSE_PART  opened
//                   a payload that fails to decompress becomes
//                   onesie.decompression_error; decoding carries on
//                     MEDIA_DECRYPTION_KEY               handed to the assembler
//                     anything else                      passed on with its header
// MEDIA_HEADER, MEDIA, ONESIE_ENCRYPTED_MEDIA, MEDIA_END → MediaAssembler
// anything else   → ump.part, payload untouched

import type { Logger } from "@adviser/cement";
import { PartType, partTypeName, type UmpPart } from "../part.js";
import { HEADER_TYPES_WITHOUT_DATA, OnesieHeaderType, ProxyStatus, type OnesieHeader, type PartSchema } from "../schema.js";
import { OnesieEnvelope } from "../onesie/envelope.js";
import { DecompressionFailedError, MissingCryptoParamsError, ProtocolViolationError, UpstreamError } from "../errors.js";
import { ensureModuleLogger } from "../logger.js";
import type { UmpReaderConfig } from "../config.js";
import { MediaAssembler } from "./media-assembler.js";
import type { MediaEndEvt, OnesieEvt, UmpEvt, UmpPartEvt } from "./events.js";

export type DispatcherConfig = Pick<UmpReaderConfig, "strict" | "schema" | "onesieKey" | "logger">;

function opaque(part: UmpPart): UmpPartEvt {
  return { type: "ump.part", partType: part.type, name: partTypeName(part.type), payload: part.payload };
}

export class Dispatcher {
  readonly #strict: boolean;
  readonly #schema: PartSchema;
  readonly #onesieKey?: Uint8Array;
  readonly #logger: Logger;
  readonly #media: MediaAssembler;
  #envelope?: OnesieEnvelope;
  #pendingHeader?: OnesieHeader;

  constructor(cfg: DispatcherConfig) {
    this.#strict = cfg.strict;
    this.#schema = cfg.schema;
    this.#onesieKey = cfg.onesieKey;
    this.#logger = ensureModuleLogger("Dispatcher", cfg.logger);
    this.#media = new MediaAssembler({ strict: cfg.strict, logger: cfg.logger });
  }

  /** ONESIE_HEADER waiting for its ONESIE_DATA, if any. */
  get pendingHeader(): OnesieHeader | undefined {
    return this.#pendingHeader;
  }

  async dispatch(part: UmpPart): Promise<UmpEvt> {
    switch (part.type) {
      case PartType.ONESIE_HEADER:
        return this.#onOnesieHeader(part);
      case PartType.ONESIE_DATA:
        return this.#onOnesieData(part);
      case PartType.MEDIA_HEADER:
        return this.#media.onMediaHeader(this.#schema.mediaHeader(part.payload));
      case PartType.MEDIA:
        return this.#media.onMedia(part.payload) ?? opaque(part);
      case PartType.ONESIE_ENCRYPTED_MEDIA:
        return (await this.#media.onEncryptedMedia(part.payload)) ?? opaque(part);
      case PartType.MEDIA_END:
        return this.#media.onMediaEnd(part.payload) ?? opaque(part);
      default:
        return opaque(part);
    }
  }

  /** End of input. Media streams still open come back as incomplete. */
  finish(): MediaEndEvt[] {
    if (this.#pendingHeader) {
      this.#logger.Warn().Any("headerType", this.#pendingHeader.type).Msg("input ended with an ONESIE_HEADER still pending");
      this.#pendingHeader = undefined;
    }
    return this.#media.finish();
  }

  close(): void {
    this.#media.close();
  }

  abort(reason: unknown): void {
    this.#media.abort(reason);
  }

  #violation(err: ProtocolViolationError): void {
    if (this.#strict) throw err;
    this.#logger.Warn().Err(err).Msg("protocol violation");
  }

  #onOnesieHeader(part: UmpPart): OnesieEvt {
    const header = this.#schema.onesieHeader(part.payload);
    if (this.#pendingHeader) {
      this.#violation(
        new ProtocolViolationError(`ONESIE_HEADER type ${header.type} while type ${this.#pendingHeader.type} is still pending`),
      );
    }
    this.#pendingHeader = HEADER_TYPES_WITHOUT_DATA.has(header.type) ? undefined : header;
    return { type: "onesie.header", header };
  }

  async #onOnesieData(part: UmpPart): Promise<UmpEvt> {
    const header = this.#pendingHeader;
    if (!header) {
      this.#violation(new ProtocolViolationError("ONESIE_DATA without a preceding ONESIE_HEADER"));
      return opaque(part);
    }
    this.#pendingHeader = undefined;

    switch (header.type) {
      case OnesieHeaderType.PLAYER_RESPONSE: {
        const plaintext = await this.#openPayload(header, part.payload);
        if (plaintext instanceof DecompressionFailedError) {
          return { type: "onesie.decompression_error", header, error: plaintext };
        }
        const response = this.#schema.onesieInnertubeResponse(plaintext);
        if (response.proxyStatus !== ProxyStatus.OK || response.status !== 200) {
          const error = new UpstreamError(response.proxyStatus, response.status, response.body);
          this.#logger.Warn().Err(error).Msg("upstream error");
          return { type: "onesie.upstream_error", header, error };
        }
        return { type: "onesie.player_response", header, response };
      }
      case OnesieHeaderType.ENCRYPTED_INNERTUBE_RESPONSE_PART: {
        const data = await this.#openPayload(header, part.payload);
        if (data instanceof DecompressionFailedError) {
          return { type: "onesie.decompression_error", header, error: data };
        }
        return { type: "onesie.innertube_part", header, data };
      }
      case OnesieHeaderType.MEDIA_DECRYPTION_KEY:
        await this.#media.setDecryptionKey(part.payload);
        return { type: "onesie.media_key", header, keyLength: part.payload.byteLength };
      default:
        return { type: "onesie.data", header, payload: part.payload };
    }
  }

  // Decompression failures stay with their part; every other failure is fatal.
  async #openPayload(header: OnesieHeader, ciphertext: Uint8Array): Promise<Uint8Array | DecompressionFailedError> {
    const envelope = await this.#envelopeFor(header);
    try {
      return await envelope.openPayload(ciphertext, header.cryptoParams);
    } catch (e) {
      if (!(e instanceof DecompressionFailedError)) throw e;
      this.#logger.Warn().Err(e).Any("headerType", header.type).Msg("onesie payload did not decompress");
      return e;
    }
  }

  async #envelopeFor(header: OnesieHeader): Promise<OnesieEnvelope> {
    if (!this.#onesieKey) {
      throw new MissingCryptoParamsError(`no onesie key configured for ONESIE_DATA of header type ${header.type}`);
    }
    this.#envelope ??= await OnesieEnvelope.create(this.#onesieKey);
    return this.#envelope;
  }
}

// Onesie request/response envelope.
//
// Key material: 32 bytes, [aes_key: 16][hmac_key: 16].
//
//   seal(plaintext) → { ciphertext, iv, hmac }
//     iv         = 16 random bytes
//     ciphertext = AES-128-CTR(aes_key, iv, plaintext)
//     hmac       = HMAC-SHA256(hmac_key, ciphertext || iv)
//
//   open(ciphertext, iv, hmac) verifies the HMAC in constant time before any
//   byte is decrypted. The three values travel as separate fields.
//
// Response payloads (PLAYER_RESPONSE, ENCRYPTED_INNERTUBE_RESPONSE_PART) are
// compressed before they are sealed; openPayload() opens and decompresses them
// using the crypto params of the ONESIE_HEADER that announced them.

import { hmac } from "@noble/hashes/hmac.js";
import { sha256 } from "@noble/hashes/sha2.js";
import { AES_BLOCK_SIZE, CtrKeystream, importAesCtrKey } from "./keystream.js";
import { decompress, gzip } from "./compression.js";
import { concatBytes } from "../bytes.js";
import { AuthenticationFailedError, InvalidKeyLengthError, MissingCryptoParamsError } from "../errors.js";
import type { OnesieCryptoParams } from "../schema.js";

export const ONESIE_KEY_LENGTH = 32;

export interface SealedEnvelope {
  readonly ciphertext: Uint8Array;
  readonly iv: Uint8Array;
  readonly hmac: Uint8Array;
}

export interface SealOptions {
  /** gzip the plaintext before sealing. */
  compress?: boolean;
}

export function splitOnesieKey(key: Uint8Array): { aesKey: Uint8Array; hmacKey: Uint8Array } {
  if (key.byteLength !== ONESIE_KEY_LENGTH) throw new InvalidKeyLengthError([ONESIE_KEY_LENGTH], key.byteLength);
  return { aesKey: key.slice(0, 16), hmacKey: key.slice(16, 32) };
}

// Length is not secret; content comparison does not exit early.
export function timingSafeEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.byteLength !== b.byteLength) return false;
  let diff = 0;
  for (let i = 0; i < a.byteLength; i++) diff |= a[i] ^ b[i];
  return diff === 0;
}

export class OnesieEnvelope {
  readonly #aesKey: CryptoKey;
  readonly #hmacKey: Uint8Array;

  static async create(key: Uint8Array): Promise<OnesieEnvelope> {
    const { aesKey, hmacKey } = splitOnesieKey(key);
    return new OnesieEnvelope(await importAesCtrKey(aesKey), hmacKey);
  }

  constructor(aesKey: CryptoKey, hmacKey: Uint8Array) {
    this.#aesKey = aesKey;
    this.#hmacKey = hmacKey;
  }

  mac(ciphertext: Uint8Array, iv: Uint8Array): Uint8Array {
    return hmac(sha256, this.#hmacKey, concatBytes(ciphertext, iv));
  }

  async seal(plaintext: Uint8Array, opts?: SealOptions): Promise<SealedEnvelope> {
    const body = opts?.compress ? await gzip(plaintext) : plaintext;
    const iv = crypto.getRandomValues(new Uint8Array(AES_BLOCK_SIZE));
    const ciphertext = await new CtrKeystream(this.#aesKey, iv).update(body);
    return { ciphertext, iv, hmac: this.mac(ciphertext, iv) };
  }

  async open(ciphertext: Uint8Array, iv: Uint8Array, mac: Uint8Array): Promise<Uint8Array> {
    if (!timingSafeEqual(this.mac(ciphertext, iv), mac)) throw new AuthenticationFailedError();
    if (iv.byteLength !== AES_BLOCK_SIZE) {
      throw new MissingCryptoParamsError(`onesie iv must be ${AES_BLOCK_SIZE} bytes, got ${iv.byteLength}`);
    }
    return new CtrKeystream(this.#aesKey, iv).update(ciphertext);
  }

  async openPayload(ciphertext: Uint8Array, params: OnesieCryptoParams | undefined): Promise<Uint8Array> {
    if (!params) throw new MissingCryptoParamsError("ONESIE_HEADER carries no crypto params");
    const { hmac: mac, iv, compressionType } = params;
    if (!mac) throw new MissingCryptoParamsError("ONESIE_HEADER crypto params lack hmac");
    if (!iv) throw new MissingCryptoParamsError("ONESIE_HEADER crypto params lack iv");
    if (compressionType === undefined) throw new MissingCryptoParamsError("ONESIE_HEADER crypto params lack compression type");
    return decompress(await this.open(ciphertext, iv, mac), compressionType);
  }
}

export async function seal(key: Uint8Array, plaintext: Uint8Array, opts?: SealOptions): Promise<SealedEnvelope> {
  return (await OnesieEnvelope.create(key)).seal(plaintext, opts);
}

export async function open(key: Uint8Array, ciphertext: Uint8Array, iv: Uint8Array, mac: Uint8Array): Promise<Uint8Array> {
  return (await OnesieEnvelope.create(key)).open(ciphertext, iv, mac);
}

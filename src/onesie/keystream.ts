// Resumable AES-CTR keystream.
//
// WebCrypto's AES-CTR is one-shot: each call starts at the counter block it is
// given. CtrKeystream remembers how many bytes it has produced and, for the
// next chunk, advances the counter by whole blocks and pads the front with the
// bytes already used from a partly consumed block, so any chunking yields the
// same output as a single call over the concatenation.
//
// The counter is the full 128-bit block, incremented big-endian.

import { InvalidKeyLengthError } from "../errors.js";

export const AES_BLOCK_SIZE = 16;
export const AES_KEY_LENGTHS: readonly number[] = [16, 24, 32];
export const ZERO_IV = new Uint8Array(AES_BLOCK_SIZE);

/** `iv + block` as a 128-bit big-endian integer. */
export function counterAt(iv: Uint8Array, block: number): Uint8Array<ArrayBuffer> {
  const ctr = new Uint8Array(iv);
  let carry = block;
  for (let i = AES_BLOCK_SIZE - 1; i >= 0 && carry > 0; i--) {
    const sum = ctr[i] + (carry % 256);
    ctr[i] = sum & 0xff;
    carry = Math.floor(carry / 256) + (sum >> 8);
  }
  return ctr;
}

export async function importAesCtrKey(raw: Uint8Array): Promise<CryptoKey> {
  if (!AES_KEY_LENGTHS.includes(raw.byteLength)) {
    throw new InvalidKeyLengthError(AES_KEY_LENGTHS, raw.byteLength);
  }
  return crypto.subtle.importKey("raw", new Uint8Array(raw), { name: "AES-CTR" }, false, ["encrypt", "decrypt"]);
}

export class CtrKeystream {
  readonly #key: CryptoKey;
  readonly #iv: Uint8Array;
  #position = 0;

  static async create(rawKey: Uint8Array, iv: Uint8Array = ZERO_IV): Promise<CtrKeystream> {
    return new CtrKeystream(await importAesCtrKey(rawKey), iv);
  }

  constructor(key: CryptoKey, iv: Uint8Array = ZERO_IV) {
    if (iv.byteLength !== AES_BLOCK_SIZE) throw new RangeError(`AES-CTR iv must be ${AES_BLOCK_SIZE} bytes, got ${iv.byteLength}`);
    this.#key = key;
    this.#iv = new Uint8Array(iv);
  }

  /** Bytes of keystream consumed so far. */
  get position(): number {
    return this.#position;
  }

  // Encrypts or decrypts the next chunk. The position advances before the
  // await, so calls issued back to back still line up in call order.
  update(chunk: Uint8Array): Promise<Uint8Array> {
    if (chunk.byteLength === 0) return Promise.resolve(new Uint8Array(0));
    const skip = this.#position % AES_BLOCK_SIZE;
    const counter = counterAt(this.#iv, Math.floor(this.#position / AES_BLOCK_SIZE));
    this.#position += chunk.byteLength;

    const input = new Uint8Array(skip + chunk.byteLength);
    input.set(chunk, skip);
    return crypto.subtle
      .encrypt({ name: "AES-CTR", counter, length: 128 }, this.#key, input)
      .then((out) => new Uint8Array(out, skip));
  }
}

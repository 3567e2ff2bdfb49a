import { ValidationError } from "../errors.js";

export interface Rc4Cipher {
  /** XORs the next keystream bytes into a copy of `data`. */
  readonly applyKeystream: (data: Uint8Array) => Uint8Array;
}

export function createRc4(key: Uint8Array): Rc4Cipher {
  if (key.length === 0 || key.length > 256) {
    throw new ValidationError(`RC4 key must be 1-256 bytes, got ${key.length}`);
  }

  const s = new Uint8Array(256);
  for (let i = 0; i < 256; i++) {
    s[i] = i;
  }

  let j = 0;
  for (let i = 0; i < 256; i++) {
    j = (j + s[i] + key[i % key.length]) & 0xff;
    [s[i], s[j]] = [s[j], s[i]];
  }

  let x = 0;
  let y = 0;

  return {
    applyKeystream(data: Uint8Array): Uint8Array {
      const out = new Uint8Array(data.length);
      for (let n = 0; n < data.length; n++) {
        x = (x + 1) & 0xff;
        y = (y + s[x]) & 0xff;
        [s[x], s[y]] = [s[y], s[x]];
        out[n] = data[n] ^ s[(s[x] + s[y]) & 0xff];
      }
      return out;
    },
  };
}

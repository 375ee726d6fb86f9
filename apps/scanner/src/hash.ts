import { createHash } from "node:crypto";

const C1 = 0xcc9e2d51;
const C2 = 0x1b873593;

/** MurmurHash3 x86 32-bit, returned as a signed integer like the common favicon fingerprints. */
export function murmurhash3(input: Buffer | string, seed = 0): number {
  const data = typeof input === "string" ? Buffer.from(input, "utf8") : input;
  const blocks = Math.floor(data.length / 4);
  let h1 = seed >>> 0;

  for (let index = 0; index < blocks; index += 1) {
    let k1 = data.readUInt32LE(index * 4);
    k1 = Math.imul(k1, C1);
    k1 = (k1 << 15) | (k1 >>> 17);
    k1 = Math.imul(k1, C2);

    h1 ^= k1;
    h1 = (h1 << 13) | (h1 >>> 19);
    h1 = (Math.imul(h1, 5) + 0xe6546b64) | 0;
  }

  const tail = blocks * 4;
  let k1 = 0;
  switch (data.length & 3) {
    case 3:
      k1 ^= data[tail + 2] << 16;
    // falls through
    case 2:
      k1 ^= data[tail + 1] << 8;
    // falls through
    case 1:
      k1 ^= data[tail];
      k1 = Math.imul(k1, C1);
      k1 = (k1 << 15) | (k1 >>> 17);
      k1 = Math.imul(k1, C2);
      h1 ^= k1;
      break;
    default:
      break;
  }

  h1 ^= data.length;
  h1 ^= h1 >>> 16;
  h1 = Math.imul(h1, 0x85ebca6b);
  h1 ^= h1 >>> 13;
  h1 = Math.imul(h1, 0xc2b2ae35);
  h1 ^= h1 >>> 16;

  return h1 | 0;
}

/** Base64 with a newline every 76 characters and a trailing newline (MIME line wrapping). */
export function encodeBase64Lines(data: Buffer): string {
  const encoded = data.toString("base64");
  const lines = encoded.match(/.{1,76}/g) ?? [];
  return lines.map((line) => `${line}\n`).join("");
}

export function faviconHash(data: Buffer): number {
  return murmurhash3(encodeBase64Lines(data));
}

export function md5Hex(data: Buffer): string {
  return createHash("md5").update(data).digest("hex");
}

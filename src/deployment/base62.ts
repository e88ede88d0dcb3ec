/**
 * Block base62 encoding (alphabet 0-9A-Za-z). Every 32 input bytes map to 43
 * output characters; a shorter tail uses ceil(bits / log2(62)) characters, so
 * leading zero bytes survive as leading "0" characters.
 */

const ALPHABET = "0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz";
const BASE = ALPHABET.length;
const BYTE_BLOCK_LEN = 32;
const CHAR_BLOCK_LEN = 43;
const BASE62_LOG2 = Math.log2(BASE);

function encodedLength(byteLength: number): number {
  if (byteLength === BYTE_BLOCK_LEN) return CHAR_BLOCK_LEN;
  const blocks = Math.floor(byteLength / BYTE_BLOCK_LEN);
  const rem = byteLength % BYTE_BLOCK_LEN;
  let out = blocks * CHAR_BLOCK_LEN;
  if (rem > 0) out += Math.ceil((rem * 8) / BASE62_LOG2);
  return out;
}

export function encodeBase62(bytes: Uint8Array): string {
  if (bytes.length === 0) return "";

  const cap = encodedLength(bytes.length);
  const digits = new Array<number>(cap).fill(0);
  let reach = 0;

  for (const byte of bytes) {
    let carry = byte;
    let touched = 0;
    for (let j = cap - 1; j >= 0; j--) {
      if (carry === 0 && touched >= reach) break;
      carry += 256 * (digits[j] ?? 0);
      digits[j] = carry % BASE;
      carry = Math.floor(carry / BASE);
      touched++;
    }
    reach = touched;
  }

  return digits.map((d) => ALPHABET.charAt(d)).join("");
}

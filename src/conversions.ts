// NOTE: Binary strings hold one octet per UTF-16 code unit (0x00-0xFF), the same mapping as
// ISO-8859-1. `TextDecoder('latin1')` can't be used here since it decodes as windows-1252,
// which remaps 0x80-0x9F
const CHUNK_SIZE = 0x8000;

const encoder = new TextEncoder();

/** Converts bytes into a binary string with exactly one character per byte */
export function bytesToBinaryString(bytes: Uint8Array): string {
  let output = '';
  for (let idx = 0; idx < bytes.byteLength; idx += CHUNK_SIZE)
    output += String.fromCharCode(...bytes.subarray(idx, idx + CHUNK_SIZE));
  return output;
}

/** Converts a binary string back into the bytes it was created from
 * @throws `TypeError` if a character is outside of the 0x00-0xFF range
 */
export function binaryStringToBytes(input: string): Uint8Array<ArrayBuffer> {
  const bytes = new Uint8Array(input.length);
  for (let idx = 0; idx < input.length; idx++) {
    const code = input.charCodeAt(idx);
    if (code > 0xff) {
      throw new TypeError(
        `Binary strings may only contain characters up to U+00FF (found U+${code
          .toString(16)
          .toUpperCase()
          .padStart(4, '0')} at index ${idx})`
      );
    }
    bytes[idx] = code;
  }
  return bytes;
}

/** Encodes text as UTF-8 and returns its octets as a binary string */
export function utf8ToBinaryString(input: string): string {
  return bytesToBinaryString(encoder.encode(input));
}

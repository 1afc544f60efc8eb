// src/utils/utils.ts

const HEX_TABLE = '0123456789abcdef';

/**
 * Создание Uint8Array из чисел
 * @param bytes - переменное число байтов
 */
export function fromBytes(...bytes: number[]): Uint8Array {
  return Uint8Array.from(bytes);
}

/**
 * Concatenates an array of Uint8Arrays into a single Uint8Array.
 */
export function concatUint8Arrays(arrays: Uint8Array[]): Uint8Array {
  const totalLength: number = arrays.reduce((sum: number, arr: Uint8Array) => sum + arr.length, 0);
  const result: Uint8Array = new Uint8Array(totalLength);
  let offset: number = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}

/**
 * Reads a Big Endian 16-bit unsigned integer, or null when the two bytes at
 * `offset` are not both present.
 */
export function bytesToUint16BE(buf: Uint8Array, offset: number = 0): number | null {
  const hi = buf[offset];
  const lo = buf[offset + 1];
  if (hi === undefined || lo === undefined) {
    return null;
  }
  return (hi << 8) | lo;
}

/**
 * Zero-copy view of a range of `arr` (shares its buffer).
 */
export function sliceUint8Array(arr: Uint8Array, start: number, end?: number): Uint8Array {
  return arr.subarray(start, end);
}

/**
 * Converts a Uint8Array to a hex string (lookup table).
 */
export function toHex(uint8arr: Uint8Array): string {
  let hex = '';
  for (const b of uint8arr) {
    hex += HEX_TABLE.charAt((b >> 4) & 0xf) + HEX_TABLE.charAt(b & 0xf);
  }
  return hex;
}

/**
 * Converts a Little Endian byte pair to a number.
 */
export function fromBytesLE(lo: number, hi: number): number {
  return (hi << 8) | lo;
}

// src/utils/bit-pack.ts

import { COILS_PER_BYTE } from '../constants/constants.js';

/**
 * Number of bytes needed to store `coils` coil values.
 */
export function bytesNeeded(coils: number): number {
  if (!Number.isInteger(coils) || coils < 0) {
    throw new RangeError(`Coil count must be a non-negative integer, got ${coils}`);
  }
  return Math.ceil(coils / COILS_PER_BYTE);
}

/**
 * Packs coil values into bytes, least significant bit first: coil i lands in
 * bit i % 8 of byte i / 8.
 *
 * Only the first `bytesNeeded(coils.length)` bytes of `bytes` are written; the
 * unused high bits of the last written byte are cleared and any later bytes
 * are left as they were.
 *
 * @throws RangeError if `bytes` is shorter than `bytesNeeded(coils.length)`
 */
export function packCoils(coils: readonly boolean[], bytes: Uint8Array): void {
  const byteCount = bytesNeeded(coils.length);
  if (bytes.length < byteCount) {
    throw new RangeError(
      `Destination too small: ${coils.length} coils need ${byteCount} bytes, got ${bytes.length}`
    );
  }

  bytes.fill(0, 0, byteCount);

  coils.forEach((coil, coilIndex) => {
    if (coil) {
      const byteIndex = Math.floor(coilIndex / COILS_PER_BYTE);
      bytes[byteIndex] = (bytes[byteIndex] ?? 0) | (1 << coilIndex % COILS_PER_BYTE);
    }
  });
}

/**
 * Unpacks bytes into `coils`. The length of `coils` decides how many values are
 * decoded.
 *
 * @throws RangeError if `bytes` is shorter than `bytesNeeded(coils.length)`
 */
export function unpackCoils(bytes: Uint8Array, coils: boolean[]): void {
  const byteCount = bytesNeeded(coils.length);
  if (bytes.length < byteCount) {
    throw new RangeError(
      `Source too small: ${coils.length} coils need ${byteCount} bytes, got ${bytes.length}`
    );
  }

  for (let coilIndex = 0; coilIndex < coils.length; coilIndex++) {
    const byte = bytes[Math.floor(coilIndex / COILS_PER_BYTE)] ?? 0;
    coils[coilIndex] = (byte & (1 << coilIndex % COILS_PER_BYTE)) !== 0;
  }
}

import { describe, expect, it } from 'vitest';
import { bytesNeeded, packCoils, unpackCoils } from '../src/utils/bit-pack.js';
import { fromBytes } from '../src/utils/utils.js';

describe('bytesNeeded', () => {
  it('rounds up to whole bytes', () => {
    expect(bytesNeeded(0)).toBe(0);
    expect(bytesNeeded(1)).toBe(1);
    expect(bytesNeeded(7)).toBe(1);
    expect(bytesNeeded(8)).toBe(1);
    expect(bytesNeeded(9)).toBe(2);
    expect(bytesNeeded(16)).toBe(2);
    expect(bytesNeeded(17)).toBe(3);
    expect(bytesNeeded(2000)).toBe(250);
  });

  it('accepts counts beyond the 32-bit signed range', () => {
    expect(bytesNeeded(2 ** 31)).toBe(2 ** 28);
    expect(bytesNeeded(2 ** 32 + 1)).toBe(2 ** 29 + 1);
  });

  it('rejects negative and fractional counts', () => {
    expect(() => bytesNeeded(-1)).toThrow(RangeError);
    expect(() => bytesNeeded(1.5)).toThrow(RangeError);
  });
});

describe('packCoils', () => {
  it('leaves the destination alone for zero coils', () => {
    const bytes = fromBytes(0xaa);
    packCoils([], bytes);
    expect(bytes).toEqual(fromBytes(0xaa));
  });

  it('packs the first coil into the least significant bit', () => {
    const bytes = fromBytes(0xaa);
    packCoils([true], bytes);
    expect(bytes).toEqual(fromBytes(0x01));

    packCoils([false], bytes);
    expect(bytes).toEqual(fromBytes(0x00));
  });

  it('packs a full byte', () => {
    const bytes = new Uint8Array(1);
    packCoils([true, false, true, false, false, true, false, true], bytes);
    expect(bytes).toEqual(fromBytes(0b10100101));
  });

  it('clears stale bits in the last byte and leaves later bytes untouched', () => {
    const bytes = fromBytes(0xff, 0xff, 0xff);
    packCoils([false, true, true, false, true, false, false, false, true, true], bytes);
    expect(bytes).toEqual(fromBytes(0x16, 0x03, 0xff));
  });

  it('throws when the destination is too small', () => {
    const coils = new Array<boolean>(9).fill(true);
    expect(() => packCoils(coils, new Uint8Array(1))).toThrow(RangeError);
  });
});

describe('unpackCoils', () => {
  it('unpacks a single coil', () => {
    const coils = [true];
    unpackCoils(fromBytes(0x00), coils);
    expect(coils).toEqual([false]);

    unpackCoils(fromBytes(0x01), coils);
    expect(coils).toEqual([true]);
  });

  it('unpacks bits least significant first', () => {
    const coils = new Array<boolean>(8).fill(false);
    unpackCoils(fromBytes(0b01110010), coils);
    expect(coils).toEqual([false, true, false, false, true, true, true, false]);
  });

  it('decodes only as many coils as the destination holds', () => {
    const coils = new Array<boolean>(10).fill(false);
    unpackCoils(fromBytes(0b00011100, 0b11111110, 0xff), coils);
    expect(coils).toEqual([false, false, true, true, true, false, false, false, false, true]);
  });

  it('throws when the source is too small', () => {
    const coils = new Array<boolean>(9).fill(false);
    expect(() => unpackCoils(fromBytes(0xff), coils)).toThrow(RangeError);
  });
});

describe('pack then unpack', () => {
  it('restores the original coils for assorted lengths', () => {
    for (const count of [1, 5, 8, 13, 64, 2000]) {
      const coils = Array.from({ length: count }, (_, i) => (i * 7) % 3 === 0);
      const bytes = new Uint8Array(bytesNeeded(count));
      packCoils(coils, bytes);

      const restored = new Array<boolean>(count).fill(false);
      unpackCoils(bytes, restored);
      expect(restored).toEqual(coils);
    }
  });
});

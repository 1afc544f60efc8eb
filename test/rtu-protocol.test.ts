import { describe, expect, it } from 'vitest';
import { RtuProtocol } from '../src/framers/rtu-protocol.js';
import {
  ModbusBadErrorCheckError,
  ModbusBadFuncCodeError,
  ModbusBadLengthError,
  ModbusConfigError,
  ModbusNotEnoughDataError,
} from '../src/errors.js';
import { fromBytes } from '../src/utils/utils.js';
import { RTU_READ, RTU_WRITE, TEST_RTU_RULES, captureError, sumCheck } from './fixtures/adus.js';

const rtu = new RtuProtocol(TEST_RTU_RULES);

describe('RtuProtocol.length', () => {
  it('defers to the integrator rule', () => {
    expect(() => rtu.length(fromBytes(0x11))).toThrow(ModbusNotEnoughDataError);
    expect(rtu.length(fromBytes(0x11, 0x06))).toBe(8);
    expect(rtu.length(RTU_READ.subarray(0, 3))).toBe(7);
    expect(() => rtu.length(fromBytes(0x11, 0x2b))).toThrow(ModbusBadFuncCodeError);
  });

  it('caps the length at 256 bytes', () => {
    expect(rtu.length(fromBytes(0x01, 0x03, 249))).toBe(254);
    expect(rtu.length(fromBytes(0x01, 0x03, 251))).toBe(256);
    expect(() => rtu.length(fromBytes(0x01, 0x03, 252))).toThrow(ModbusBadLengthError);
  });

  it('rejects rules that leave no room for address and check value', () => {
    const tiny = new RtuProtocol({ aduLength: () => 2, checksum: sumCheck });
    expect(() => tiny.length(fromBytes(0x01, 0x02))).toThrow(ModbusBadLengthError);
  });

  it('rejects a fractional length from the rule', () => {
    const fractional = new RtuProtocol({ aduLength: () => 7.5, checksum: sumCheck });
    expect(() => fractional.length(fromBytes(0x01, 0x02))).toThrow(ModbusBadLengthError);
  });
});

describe('RtuProtocol.header', () => {
  it('reads the address and the trailing check value low byte first', () => {
    expect(rtu.header(RTU_WRITE)).toEqual({ address: 0x11, check: 0x001b });

    const highCheck = new RtuProtocol({
      aduLength: () => 4,
      checksum: () => fromBytes(0x34, 0x12),
    });
    expect(highCheck.header(fromBytes(0x05, 0x08, 0x34, 0x12))).toEqual({
      address: 0x05,
      check: 0x1234,
    });
  });

  it('needs the whole frame', () => {
    expect(() => rtu.header(RTU_WRITE.subarray(0, 7))).toThrow(ModbusNotEnoughDataError);
  });
});

describe('RtuProtocol.validate', () => {
  it('accepts a matching check value', () => {
    expect(() => rtu.validate(RTU_WRITE)).not.toThrow();
    expect(() => rtu.validate(RTU_READ)).not.toThrow();
  });

  it('rejects a mismatching check value', () => {
    const corrupted = Uint8Array.from(RTU_READ);
    corrupted[4] = 0x2b;
    const err = captureError(() => rtu.validate(corrupted));
    expect(err).toBeInstanceOf(ModbusBadErrorCheckError);
    if (err instanceof ModbusBadErrorCheckError) {
      expect(err.receivedCheck).toEqual(fromBytes(0x30, 0x00));
      expect(err.calculatedCheck).toEqual(fromBytes(0x31, 0x00));
    }
  });

  it('rejects a checksum function returning the wrong size', () => {
    const broken = new RtuProtocol({
      aduLength: TEST_RTU_RULES.aduLength,
      checksum: () => fromBytes(0x00),
    });
    expect(() => broken.validate(RTU_WRITE)).toThrow(ModbusConfigError);
  });
});

describe('RtuProtocol.payload', () => {
  it('strips address and check value', () => {
    expect(rtu.payload(RTU_WRITE)).toEqual(fromBytes(0x06, 0x00, 0x01, 0x00, 0x03));
    expect(rtu.payload(RTU_READ)).toEqual(fromBytes(0x03, 0x02, 0x00, 0x2a));
  });

  it('validates first', () => {
    const corrupted = Uint8Array.from(RTU_WRITE);
    corrupted[7] = 0x01;
    expect(() => rtu.payload(corrupted)).toThrow(ModbusBadErrorCheckError);
  });
});

describe('RtuProtocol.buildAdu', () => {
  it('appends the check value', () => {
    expect(rtu.buildAdu({ address: 0x11 }, fromBytes(0x06, 0x00, 0x01, 0x00, 0x03))).toEqual(
      RTU_WRITE
    );
    expect(rtu.buildAdu({ address: 0x01 }, fromBytes(0x03, 0x02, 0x00, 0x2a))).toEqual(RTU_READ);
  });

  it('rejects PDUs that do not fit in 256 bytes', () => {
    expect(() => rtu.buildAdu({ address: 1 }, new Uint8Array(254))).toThrow(ModbusBadLengthError);
  });
});

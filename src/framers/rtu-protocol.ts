// src/framers/rtu-protocol.ts

import type { ModbusProtocol } from './modbus-protocol.js';
import type { RtuAduOptions, RtuHeader } from '../types/modbus-types.js';
import {
  RTU_ADDRESS_LENGTH,
  RTU_ADU_MAX_LENGTH,
  RTU_CHECK_LENGTH,
} from '../constants/constants.js';
import {
  ModbusBadErrorCheckError,
  ModbusBadLengthError,
  ModbusConfigError,
  ModbusNotEnoughDataError,
} from '../errors.js';
import { concatUint8Arrays, fromBytesLE, sliceUint8Array } from '../utils/utils.js';

/**
 * What an RTU integrator has to provide. The serial line has no length field,
 * so where a frame ends (function-code tables, inter-character timing, ...)
 * and which check value protects it are up to the deployment.
 */
export interface RtuFrameRules {
  /**
   * Total ADU length (address + PDU + check value) of the frame starting at
   * `window[0]`. Throw ModbusNotEnoughDataError when more bytes are needed and
   * ModbusBadFuncCodeError for a function code the rule does not know.
   */
  aduLength(window: Uint8Array): number;

  /**
   * Check value over address + PDU, exactly RTU_CHECK_LENGTH bytes in the
   * order they travel on the wire.
   */
  checksum(data: Uint8Array): Uint8Array;
}

const MIN_ADU_LENGTH = RTU_ADDRESS_LENGTH + RTU_CHECK_LENGTH;

/**
 * Modbus RTU framing: 1-byte station address, PDU, 2-byte trailing check value.
 */
export class RtuProtocol implements ModbusProtocol<RtuHeader, RtuAduOptions> {
  public readonly name = 'rtu';
  public readonly aduMaxLength = RTU_ADU_MAX_LENGTH;

  constructor(private readonly rules: RtuFrameRules) {}

  public length(window: Uint8Array): number {
    const aduLength = this.rules.aduLength(window);

    if (!Number.isInteger(aduLength) || aduLength > this.aduMaxLength) {
      throw new ModbusBadLengthError(aduLength, this.aduMaxLength);
    }
    if (aduLength < MIN_ADU_LENGTH) {
      throw new ModbusBadLengthError(
        aduLength,
        this.aduMaxLength,
        `Bad ADU length: ${aduLength} bytes is shorter than address and check value`
      );
    }
    return aduLength;
  }

  /**
   * The header of an RTU frame is split: the address leads, the check value
   * trails. Both are read from a window holding exactly one ADU.
   */
  public header(window: Uint8Array): RtuHeader {
    if (window.length < MIN_ADU_LENGTH) {
      throw new ModbusNotEnoughDataError(window.length, MIN_ADU_LENGTH);
    }
    const aduLength = this.length(window);
    if (window.length < aduLength) {
      throw new ModbusNotEnoughDataError(window.length, aduLength);
    }

    return {
      address: window[0]!,
      check: fromBytesLE(window[aduLength - 2]!, window[aduLength - 1]!),
    };
  }

  public validate(window: Uint8Array): void {
    const aduLength = this.length(window);
    if (window.length < aduLength) {
      throw new ModbusNotEnoughDataError(window.length, aduLength);
    }

    const received = sliceUint8Array(window, aduLength - RTU_CHECK_LENGTH, aduLength);
    const calculated = this.computeCheck(sliceUint8Array(window, 0, aduLength - RTU_CHECK_LENGTH));

    if (received[0] !== calculated[0] || received[1] !== calculated[1]) {
      throw new ModbusBadErrorCheckError(received, calculated);
    }
  }

  public payload(window: Uint8Array): Uint8Array {
    this.validate(window);
    return sliceUint8Array(window, RTU_ADDRESS_LENGTH, this.length(window) - RTU_CHECK_LENGTH);
  }

  public buildAdu(options: RtuAduOptions, pdu: Uint8Array): Uint8Array {
    const aduLength = RTU_ADDRESS_LENGTH + pdu.length + RTU_CHECK_LENGTH;
    if (aduLength > this.aduMaxLength) {
      throw new ModbusBadLengthError(aduLength, this.aduMaxLength);
    }
    const aduWithoutCheck = concatUint8Arrays([new Uint8Array([options.address]), pdu]);
    return concatUint8Arrays([aduWithoutCheck, this.computeCheck(aduWithoutCheck)]);
  }

  private computeCheck(data: Uint8Array): Uint8Array {
    const check = this.rules.checksum(data);
    if (check.length !== RTU_CHECK_LENGTH) {
      throw new ModbusConfigError(
        `RTU checksum must return ${RTU_CHECK_LENGTH} bytes, got ${check.length}`
      );
    }
    return check;
  }
}

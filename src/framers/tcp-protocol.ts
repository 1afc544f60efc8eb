// src/framers/tcp-protocol.ts

import type { ModbusProtocol } from './modbus-protocol.js';
import type { TcpAduOptions, TcpHeader } from '../types/modbus-types.js';
import {
  MBAP_EXCLUDED_LENGTH,
  MBAP_LENGTH,
  TCP_ADU_MAX_LENGTH,
  TCP_PDU_MAX_LENGTH,
} from '../constants/constants.js';
import { ModbusBadLengthError, ModbusNotEnoughDataError } from '../errors.js';
import { buildMbapHeader } from '../utils/tcp-utils.js';
import { bytesToUint16BE, concatUint8Arrays, sliceUint8Array } from '../utils/utils.js';

/**
 * Modbus TCP framing.
 *
 * The MBAP header is 7 bytes: transaction id (2), protocol id (2), length (2)
 * and unit id (1), big-endian. The length field counts everything after
 * itself, i.e. the unit id plus the PDU, so the whole ADU is `length + 6`
 * bytes. The PDU starts at offset 7, right after the unit id.
 *
 * There is no checksum; TCP already guarantees integrity.
 */
export class TcpProtocol implements ModbusProtocol<TcpHeader, TcpAduOptions> {
  public readonly name = 'tcp';
  public readonly aduMaxLength = TCP_ADU_MAX_LENGTH;

  public length(window: Uint8Array): number {
    const lengthField = bytesToUint16BE(window, 4);
    if (lengthField === null) {
      throw new ModbusNotEnoughDataError(window.length, MBAP_EXCLUDED_LENGTH);
    }

    const aduLength = lengthField + MBAP_EXCLUDED_LENGTH;
    if (aduLength > this.aduMaxLength) {
      throw new ModbusBadLengthError(aduLength, this.aduMaxLength);
    }
    return aduLength;
  }

  public header(window: Uint8Array): TcpHeader {
    if (window.length < MBAP_LENGTH) {
      throw new ModbusNotEnoughDataError(window.length, MBAP_LENGTH);
    }

    const view = new DataView(window.buffer, window.byteOffset, MBAP_LENGTH);
    return {
      transactionId: view.getUint16(0, false),
      protocolId: view.getUint16(2, false),
      length: view.getUint16(4, false),
      unitId: view.getUint8(6),
    };
  }

  /**
   * Only checks that the window holds the whole ADU
   */
  public validate(window: Uint8Array): void {
    const aduLength = this.length(window);
    if (window.length < aduLength) {
      throw new ModbusNotEnoughDataError(window.length, aduLength);
    }
  }

  public payload(window: Uint8Array): Uint8Array {
    this.validate(window);

    // A length field of 0 leaves no room for the unit id
    const aduLength = this.length(window);
    if (aduLength < MBAP_LENGTH) {
      throw new ModbusBadLengthError(
        aduLength,
        this.aduMaxLength,
        `Bad ADU length: ${aduLength} bytes is shorter than the ${MBAP_LENGTH}-byte MBAP header`
      );
    }
    return sliceUint8Array(window, MBAP_LENGTH, aduLength);
  }

  public buildAdu(options: TcpAduOptions, pdu: Uint8Array): Uint8Array {
    if (pdu.length > TCP_PDU_MAX_LENGTH) {
      throw new ModbusBadLengthError(pdu.length + MBAP_LENGTH, this.aduMaxLength);
    }
    const mbap = buildMbapHeader(
      options.transactionId,
      options.unitId,
      pdu.length,
      options.protocolId
    );
    return concatUint8Arrays([mbap, pdu]);
  }
}

// src/utils/tcp-utils.ts

import { MBAP_LENGTH, TCP_PROTOCOL_ID } from '../constants/constants.js';
import { ModbusConfigError } from '../errors.js';

/**
 * Hands out MBAP transaction ids 0-65535, wrapping after 65535.
 * Start from the last id seen on a connection to continue its sequence.
 */
export class TransactionCounter {
  private _currentId: number;

  constructor(lastId: number = 0) {
    if (!Number.isInteger(lastId) || lastId < 0 || lastId > 0xffff) {
      throw new ModbusConfigError(`Transaction id must be 0-65535, got ${lastId}`);
    }
    this._currentId = lastId;
  }

  next(): number {
    this._currentId = (this._currentId + 1) % 65536;
    return this._currentId;
  }

  get current(): number {
    return this._currentId;
  }
}

/**
 * Формирует MBAP заголовок (7 байт)
 * @param transactionId - ID транзакции (2 байта)
 * @param unitId - ID устройства (1 байт)
 * @param pduLength - Длина PDU
 * @param protocolId - 0 for Modbus
 */
export function buildMbapHeader(
  transactionId: number,
  unitId: number,
  pduLength: number,
  protocolId: number = TCP_PROTOCOL_ID
): Uint8Array {
  const header = new Uint8Array(MBAP_LENGTH);
  const view = new DataView(header.buffer);

  view.setUint16(0, transactionId, false); // Transaction ID (BE)
  view.setUint16(2, protocolId, false); // Protocol ID (BE)
  view.setUint16(4, pduLength + 1, false); // Length: PDU + 1 байт UnitID (BE)
  view.setUint8(6, unitId); // Unit ID

  return header;
}

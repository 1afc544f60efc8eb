// src/index.ts

export * from './constants/constants.js';
export * from './errors.js';
export type * from './types/modbus-types.js';
export type { ModbusProtocol } from './framers/modbus-protocol.js';
export { TcpProtocol } from './framers/tcp-protocol.js';
export { RtuProtocol } from './framers/rtu-protocol.js';
export type { RtuFrameRules } from './framers/rtu-protocol.js';
export { StreamFramer } from './framers/stream-framer.js';
export { FrameReader } from './frame-reader.js';
export { bytesNeeded, packCoils, unpackCoils } from './utils/bit-pack.js';
export { TransactionCounter, buildMbapHeader } from './utils/tcp-utils.js';
export { toHex, fromBytes, concatUint8Arrays } from './utils/utils.js';
export { default as Logger } from './logger.js';

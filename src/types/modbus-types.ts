// src/types/modbus-types.ts

import type { ModbusFramingError } from '../errors.js';

// !=============================================================================
// ! Transport headers
// !=============================================================================

/** Modbus TCP header (MBAP), all fields decoded from big-endian */
export interface TcpHeader {
  transactionId: number;
  protocolId: number;
  /** Raw value of the length field: unit id + PDU bytes */
  length: number;
  unitId: number;
}

/** Fields a caller chooses when wrapping a PDU into a TCP ADU */
export interface TcpAduOptions {
  transactionId: number;
  unitId: number;
  protocolId?: number;
}

/** Modbus RTU header */
export interface RtuHeader {
  address: number;
  /** Trailing check value, read low byte first as it travels on the wire */
  check: number;
}

export interface RtuAduOptions {
  address: number;
}

// !=============================================================================
// ! Framer
// !=============================================================================

/**
 * One decoded ADU. `payload` is a view into the framer's buffer and is only
 * meaningful until the next call into that framer; see StreamFramer.isCurrent.
 */
export interface Packet<THeader> {
  header: THeader;
  payload: Uint8Array;
  generation: number;
}

/** A packet whose payload owns its bytes */
export interface DetachedPacket<THeader> {
  header: THeader;
  payload: Uint8Array;
}

export interface ProcessResult<THeader> {
  packet: Packet<THeader>;
  /** Unconsumed tail of the chunk passed to process(); feed it back in */
  leftover: Uint8Array;
}

export interface StreamFramerOptions {
  logger?: LoggerInstance;
}

// !=============================================================================
// ! Frame reader
// !=============================================================================

export interface FrameReaderOptions {
  logger?: LoggerInstance;
  logLevel?: LogLevel;
}

export type FrameEvent<THeader> =
  | { type: 'frame'; frame: DetachedPacket<THeader> }
  | { type: 'error'; error: ModbusFramingError };

export interface FrameReaderResult<THeader> {
  frames: DetachedPacket<THeader>[];
  /** Set when the chunk hit corrupt data; buffered bytes were discarded */
  error?: ModbusFramingError;
}

export interface FrameReaderStats {
  framesDecoded: number;
  bytesReceived: number;
  bytesDiscarded: number;
  errorsByKind: Record<string, number>;
}

// !=============================================================================
// ! Logger
// !=============================================================================

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

/** Контекст для логирования */
export interface LogContext {
  logger?: string;
  transport?: string;
  unitId?: number;
  transactionId?: number;
  bytes?: number;
  errorKind?: string;
  [key: string]: string | number | boolean | undefined;
}

export interface LoggerInstance {
  trace(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  setLevel(lvl: LogLevel): void;
  pause(): void;
  resume(): void;
}

export interface LogRecord {
  level: LogLevel;
  args: unknown[];
  context: LogContext;
}

// src/errors.ts

import { FramingErrorKind, FRAMING_ERROR_MESSAGES } from './constants/constants.js';
import { toHex } from './utils/utils.js';

/**
 * Base class for all Modbus errors
 */
export class ModbusError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ModbusError';
  }
}

/**
 * Base class for errors raised while locating ADU boundaries in a byte stream.
 * The framer only distinguishes NotEnoughData (keep buffered bytes) from every
 * other kind (discard and resynchronize).
 */
export class ModbusFramingError extends ModbusError {
  readonly kind: FramingErrorKind;

  constructor(kind: FramingErrorKind, message: string = FRAMING_ERROR_MESSAGES[kind]) {
    super(message);
    this.name = 'ModbusFramingError';
    this.kind = kind;
  }
}

/**
 * Error class for an incomplete ADU. Not fatal: feed more bytes.
 */
export class ModbusNotEnoughDataError extends ModbusFramingError {
  readonly received: number;
  readonly required: number | null;

  constructor(received: number, required: number | null = null) {
    super(
      FramingErrorKind.NOT_ENOUGH_DATA,
      required === null
        ? `Not enough data: ${received} bytes buffered`
        : `Not enough data: ${received} bytes buffered, ${required} bytes required`
    );
    this.name = 'ModbusNotEnoughDataError';
    this.received = received;
    this.required = required;
  }
}

/**
 * Error class for a declared or derived ADU length outside the transport's limits
 */
export class ModbusBadLengthError extends ModbusFramingError {
  readonly length: number;
  readonly max: number;

  constructor(length: number, max: number, message?: string) {
    super(
      FramingErrorKind.BAD_LENGTH,
      message ?? `Bad ADU length: ${length} bytes exceeds maximum ${max} bytes`
    );
    this.name = 'ModbusBadLengthError';
    this.length = length;
    this.max = max;
  }
}

/**
 * Error class for an ADU whose trailing check value does not match its contents
 */
export class ModbusBadErrorCheckError extends ModbusFramingError {
  readonly receivedCheck: Uint8Array;
  readonly calculatedCheck: Uint8Array;

  constructor(received: Uint8Array, calculated: Uint8Array) {
    super(
      FramingErrorKind.BAD_ERROR_CHECK,
      `Error check mismatch: received ${toHex(received)}, calculated ${toHex(calculated)}`
    );
    this.name = 'ModbusBadErrorCheckError';
    this.receivedCheck = Uint8Array.from(received);
    this.calculatedCheck = Uint8Array.from(calculated);
  }
}

/**
 * Error class for a function code the length rule does not know
 */
export class ModbusBadFuncCodeError extends ModbusFramingError {
  readonly functionCode: number;

  constructor(functionCode: number) {
    super(
      FramingErrorKind.BAD_FUNC_CODE,
      `Unrecognized function code: 0x${functionCode.toString(16).padStart(2, '0')}`
    );
    this.name = 'ModbusBadFuncCodeError';
    this.functionCode = functionCode;
  }
}

/**
 * Error class for invalid configuration. Signals a programming error, not bad input.
 */
export class ModbusConfigError extends ModbusError {
  constructor(message: string = 'Invalid Modbus configuration') {
    super(message);
    this.name = 'ModbusConfigError';
  }
}

export function isFramingError(err: unknown): err is ModbusFramingError {
  return err instanceof ModbusFramingError;
}

export function isNotEnoughData(err: unknown): err is ModbusFramingError {
  return err instanceof ModbusFramingError && err.kind === FramingErrorKind.NOT_ENOUGH_DATA;
}

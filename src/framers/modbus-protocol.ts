// src/framers/modbus-protocol.ts

/**
 * Transport-specific framing rules for one Modbus variant (TCP, RTU, ...).
 *
 * Every method receives a window: the bytes buffered so far, starting at the
 * first byte of an ADU. Methods are pure and signal problems by throwing a
 * ModbusFramingError subclass.
 */
export interface ModbusProtocol<THeader, TAduOptions = THeader> {
  /** Short transport name, used in log context */
  readonly name: string;

  /** Largest ADU this transport allows, in bytes */
  readonly aduMaxLength: number;

  /**
   * Total ADU length announced by the start of `window`.
   *
   * Throws NotEnoughData when `window` is too short to tell, BadLength when the
   * result exceeds aduMaxLength, and BadFuncCode when the length depends on a
   * function code the rule does not know.
   */
  length(window: Uint8Array): number;

  /**
   * Decodes the header. Throws NotEnoughData when `window` is shorter than the
   * header.
   */
  header(window: Uint8Array): THeader;

  /**
   * Confirms the integrity of a window already known to hold one whole ADU.
   * Throws NotEnoughData or BadErrorCheck.
   */
  validate(window: Uint8Array): void;

  /**
   * Validates, then returns the PDU: the bytes after the header, without any
   * trailing check value. The result is a view into `window`.
   */
  payload(window: Uint8Array): Uint8Array;

  /** Wraps a PDU into an ADU for this transport */
  buildAdu(options: TAduOptions, pdu: Uint8Array): Uint8Array;
}

// src/framers/stream-framer.ts

import type { ModbusProtocol } from './modbus-protocol.js';
import type {
  DetachedPacket,
  LoggerInstance,
  Packet,
  ProcessResult,
  StreamFramerOptions,
} from '../types/modbus-types.js';
import { RECV_BUFFER_LENGTH } from '../constants/constants.js';
import {
  isFramingError,
  isNotEnoughData,
  ModbusBadLengthError,
  ModbusConfigError,
  ModbusNotEnoughDataError,
} from '../errors.js';
import { sliceUint8Array } from '../utils/utils.js';

/**
 * Turns a raw byte stream into a sequence of Modbus ADUs.
 *
 * Feed every chunk received from the transport to `process`:
 *
 * - the chunk completes exactly one ADU: you get the packet and an empty leftover;
 * - the chunk completes an ADU and carries more: you get the packet and the
 *   surplus as `leftover`; call `process(leftover)` once the packet is handled;
 * - the chunk does not complete an ADU: ModbusNotEnoughDataError is thrown and
 *   the bytes stay buffered for the next call;
 * - the data is corrupt (bad length, bad check, unknown function code): the
 *   error is thrown and everything buffered, this chunk included, is dropped.
 *
 * The framer owns one fixed buffer of RECV_BUFFER_LENGTH bytes. A returned
 * packet's payload is a view into that buffer and goes stale on the next
 * `process` or `reset`; use `detachPacket` to keep it longer.
 *
 * Single writer: one framer per stream, no locking inside.
 */
export class StreamFramer<THeader extends object> {
  // Invariant: when _containsComplete is set, the first _used bytes are
  // exactly one complete ADU.
  private readonly _buffer: Uint8Array = new Uint8Array(RECV_BUFFER_LENGTH);
  private _used: number = 0;
  private _containsComplete: boolean = false;
  private _generation: number = 0;
  private readonly logger: LoggerInstance | null;

  constructor(
    private readonly protocol: ModbusProtocol<THeader, never>,
    options: StreamFramerOptions = {}
  ) {
    if (protocol.aduMaxLength > RECV_BUFFER_LENGTH) {
      throw new ModbusConfigError(
        `Protocol "${protocol.name}" allows ADUs of ${protocol.aduMaxLength} bytes, framer capacity is ${RECV_BUFFER_LENGTH}`
      );
    }
    this.logger = options.logger ?? null;
  }

  public process(chunk: Uint8Array): ProcessResult<THeader> {
    this._generation++;

    if (this._containsComplete) {
      this.clearBuffer();
    }

    const usedBefore = this._used;
    const lengthToAdd = Math.min(this.spaceLeft(), chunk.length);
    this.addData(sliceUint8Array(chunk, 0, lengthToAdd));

    let aduLength: number;
    try {
      aduLength = this.protocol.length(this.buffer());
    } catch (err: unknown) {
      if (!isNotEnoughData(err)) {
        this.discard(err);
        throw err;
      }
      if (this.spaceLeft() === 0) {
        // The length rule wants more than the buffer can ever hold
        const overflow = new ModbusBadLengthError(this._used + 1, this.protocol.aduMaxLength);
        this.discard(overflow);
        throw overflow;
      }
      this.logger?.trace('Waiting for ADU length', {
        transport: this.protocol.name,
        bytes: this._used,
      });
      throw err;
    }

    if (aduLength > this.protocol.aduMaxLength || aduLength > this.capacity) {
      // Such an ADU could never complete, the buffer would stay full
      const oversized = new ModbusBadLengthError(aduLength, this.protocol.aduMaxLength);
      this.discard(oversized);
      throw oversized;
    }

    if (this._used < aduLength) {
      this.logger?.trace('Partial ADU buffered', {
        transport: this.protocol.name,
        bytes: this._used,
        required: aduLength,
      });
      throw new ModbusNotEnoughDataError(this._used, aduLength);
    }

    if (aduLength < usedBefore) {
      // Bytes from earlier calls were already past the end of this ADU
      const inconsistent = new ModbusBadLengthError(
        aduLength,
        this.protocol.aduMaxLength,
        `Bad ADU length: ${aduLength} bytes, but ${usedBefore} bytes were already buffered`
      );
      this.discard(inconsistent);
      throw inconsistent;
    }

    // Also the number of bytes of this chunk that went into the ADU
    const remainingIndex = aduLength - usedBefore;

    this._containsComplete = true;
    this.trimTo(aduLength);

    const window = this.buffer();
    let packet: Packet<THeader>;
    try {
      const payload = this.protocol.payload(window);
      const header = this.protocol.header(window);
      packet = { header, payload, generation: this._generation };
    } catch (err: unknown) {
      // The length said complete, so running short here means the ADU is malformed
      const failure = isNotEnoughData(err)
        ? new ModbusBadLengthError(
            aduLength,
            this.protocol.aduMaxLength,
            `Bad ADU length: ${aduLength} bytes is too short for a ${this.protocol.name} header`
          )
        : err;
      this.discard(failure);
      throw failure;
    }

    this.logger?.debug('ADU decoded', {
      transport: this.protocol.name,
      bytes: aduLength,
      leftover: chunk.length - remainingIndex,
    });

    return { packet, leftover: sliceUint8Array(chunk, remainingIndex) };
  }

  /**
   * Drops everything buffered, complete or not
   */
  public reset(): void {
    this._generation++;
    this.clearBuffer();
  }

  /**
   * Whether `packet` still reflects the framer's buffer, i.e. it came from the
   * last `process` call and nothing has run since.
   */
  public isCurrent(packet: Packet<THeader>): boolean {
    return this._containsComplete && packet.generation === this._generation;
  }

  /**
   * Copies a packet out of the framer's buffer.
   * @throws ModbusConfigError if the packet is already stale
   */
  public detachPacket(packet: Packet<THeader>): DetachedPacket<THeader> {
    if (!this.isCurrent(packet)) {
      throw new ModbusConfigError(
        'Packet is stale: the framer buffer was reused since it was returned'
      );
    }
    return { header: { ...packet.header }, payload: packet.payload.slice() };
  }

  /**
   * Number of bytes currently buffered
   */
  public get used(): number {
    return this._used;
  }

  public get capacity(): number {
    return this._buffer.length;
  }

  public get generation(): number {
    return this._generation;
  }

  public get containsComplete(): boolean {
    return this._containsComplete;
  }

  private discard(reason: unknown): void {
    this.logger?.warn('Discarding buffered data', {
      transport: this.protocol.name,
      bytes: this._used,
      errorKind: isFramingError(reason) ? reason.kind : 'unknown',
    });
    this.clearBuffer();
  }

  private spaceLeft(): number {
    return this._buffer.length - this._used;
  }

  private addData(data: Uint8Array): void {
    this._buffer.set(data, this._used);
    this._used += data.length;
  }

  private clearBuffer(): void {
    this._used = 0;
    this._containsComplete = false;
  }

  private trimTo(length: number): void {
    this._used = length;
  }

  private buffer(): Uint8Array {
    return sliceUint8Array(this._buffer, 0, this._used);
  }
}

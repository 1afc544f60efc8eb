// src/frame-reader.ts

import { Mutex } from 'async-mutex';
import Logger from './logger.js';
import { StreamFramer } from './framers/stream-framer.js';
import type { ModbusProtocol } from './framers/modbus-protocol.js';
import { isFramingError, isNotEnoughData } from './errors.js';
import type {
  DetachedPacket,
  FrameEvent,
  FrameReaderOptions,
  FrameReaderResult,
  FrameReaderStats,
  LoggerInstance,
} from './types/modbus-types.js';

const logger = new Logger();
logger.setLevel('warn');

/**
 * Feeds chunks from an asynchronous source into a StreamFramer.
 *
 * Chunks pushed concurrently (several event handlers, an iterator plus manual
 * pushes) are processed one after another. Every decoded packet is copied out
 * of the framer, so frames stay valid after the next chunk arrives.
 */
export class FrameReader<THeader extends object> {
  private readonly _framer: StreamFramer<THeader>;
  private readonly _mutex: Mutex = new Mutex();
  private readonly logger: LoggerInstance;
  private readonly transport: string;

  private framesDecoded: number = 0;
  private bytesReceived: number = 0;
  private bytesDiscarded: number = 0;
  private errorsByKind: Record<string, number> = {};

  constructor(protocol: ModbusProtocol<THeader, never>, options: FrameReaderOptions = {}) {
    this.logger = options.logger ?? logger.createLogger('FrameReader');
    if (options.logLevel) {
      this.logger.setLevel(options.logLevel);
    }
    this.transport = protocol.name;
    this._framer = new StreamFramer(protocol, { logger: this.logger });
  }

  /**
   * Processes one chunk and returns every frame it completed.
   *
   * When the chunk runs into corrupt data the framer drops what it had
   * buffered; the frames decoded before that point are returned together with
   * the error, and the rest of the chunk is dropped.
   */
  public async push(chunk: Uint8Array): Promise<FrameReaderResult<THeader>> {
    const release = await this._mutex.acquire();
    try {
      return this.drain(chunk);
    } finally {
      release();
    }
  }

  /**
   * Reads a chunk source to the end, yielding frames and framing errors in
   * stream order. Reading carries on after a framing error.
   */
  public async *read(source: AsyncIterable<Uint8Array>): AsyncGenerator<FrameEvent<THeader>> {
    for await (const chunk of source) {
      const { frames, error } = await this.push(chunk);
      for (const frame of frames) {
        yield { type: 'frame', frame };
      }
      if (error) {
        yield { type: 'error', error };
      }
    }
  }

  public stats(): FrameReaderStats {
    return {
      framesDecoded: this.framesDecoded,
      bytesReceived: this.bytesReceived,
      bytesDiscarded: this.bytesDiscarded,
      errorsByKind: { ...this.errorsByKind },
    };
  }

  /**
   * Bytes waiting for the rest of their ADU
   */
  public get pending(): number {
    return this._framer.containsComplete ? 0 : this._framer.used;
  }

  /**
   * Drops any partially received ADU, e.g. after the transport reconnects.
   */
  public async reset(): Promise<void> {
    const release = await this._mutex.acquire();
    try {
      this._framer.reset();
    } finally {
      release();
    }
  }

  private drain(chunk: Uint8Array): FrameReaderResult<THeader> {
    this.bytesReceived += chunk.length;
    const frames: DetachedPacket<THeader>[] = [];
    let remaining = chunk;

    while (remaining.length > 0) {
      const pendingBefore = this.pending;
      try {
        const { packet, leftover } = this._framer.process(remaining);
        frames.push(this._framer.detachPacket(packet));
        this.framesDecoded++;
        remaining = leftover;
      } catch (err: unknown) {
        if (isNotEnoughData(err)) {
          break;
        }
        if (!isFramingError(err)) {
          throw err;
        }

        const discarded = pendingBefore + remaining.length;
        this.bytesDiscarded += discarded;
        this.errorsByKind[err.kind] = (this.errorsByKind[err.kind] ?? 0) + 1;
        this.logger.debug('Chunk dropped after framing error', err, {
          transport: this.transport,
          bytes: discarded,
          errorKind: err.kind,
        });
        return { frames, error: err };
      }
    }

    return { frames };
  }
}

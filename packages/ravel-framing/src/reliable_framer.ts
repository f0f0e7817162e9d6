// Length-delimited framing for reliable byte streams.
//
// Each message of L bytes (1 <= L <= 65536) is prefixed with a 2-byte
// little-endian header holding L - 1.

import createDebug from "debug";
import { hexDump } from "@ravel/ravel-binary";
import type { StreamFramer } from "./stream_framer.ts";

const debug = createDebug("ravel:framer");

export const RELIABLE_HEADER_LENGTH = 2;
export const RELIABLE_MAX_MESSAGE_SIZE = 0x1_0000;

export interface ReliableFramerOptions {
  /**
   * Largest message accepted by `frame`. Defaults to (and may not exceed)
   * 65536, the most a 2-byte length-minus-one header describes.
   */
  maxMessageSize?: number;
}

/**
 * Framer for transports that deliver every byte in order.
 *
 * Insufficient input is never an error: `pop` returns null until the whole
 * segment has arrived, leaving the buffered bytes in place.
 */
export class ReliableFramer implements StreamFramer {
  readonly headerLength = RELIABLE_HEADER_LENGTH;
  readonly maximumSegmentSize: number;
  private buf: Buffer = Buffer.alloc(0);

  constructor(options: ReliableFramerOptions = {}) {
    const max = options.maxMessageSize ?? RELIABLE_MAX_MESSAGE_SIZE;
    if (!Number.isInteger(max) || max < 1 || max > RELIABLE_MAX_MESSAGE_SIZE) {
      throw new RangeError(`maxMessageSize must be in [1, ${RELIABLE_MAX_MESSAGE_SIZE}]: ${max}`);
    }
    this.maximumSegmentSize = max;
  }

  /** Number of buffered, unconsumed bytes. */
  get bufferedLength(): number {
    return this.buf.length;
  }

  /**
   * Frame one message.
   *
   * Empty messages have no encoding (a zero header already means one byte)
   * and are rejected, as are messages over `maximumSegmentSize`.
   */
  frame(data: Uint8Array): Uint8Array {
    if (data.length === 0) {
      throw new RangeError("cannot frame an empty message");
    }
    if (data.length > this.maximumSegmentSize) {
      throw new RangeError(`message too large: ${data.length} bytes (max: ${this.maximumSegmentSize})`);
    }
    const framed = Buffer.alloc(RELIABLE_HEADER_LENGTH + data.length);
    framed.writeUInt16LE(data.length - 1, 0);
    framed.set(data, RELIABLE_HEADER_LENGTH);
    return new Uint8Array(framed.buffer, framed.byteOffset, framed.length);
  }

  push(data: Uint8Array): void {
    if (data.length === 0) return;
    this.buf = Buffer.concat([this.buf, data]);
  }

  pop(): Uint8Array | null {
    if (this.buf.length < RELIABLE_HEADER_LENGTH) return null;

    const segmentLength = this.buf.readUInt16LE(0) + 1;
    const needed = RELIABLE_HEADER_LENGTH + segmentLength;
    if (this.buf.length < needed) return null;

    const payload = new Uint8Array(this.buf.subarray(RELIABLE_HEADER_LENGTH, needed));
    this.buf = this.buf.subarray(needed);
    debug("pop %d byte frame, %d bytes left", segmentLength, this.buf.length);
    return payload;
  }

  inputEmpty(): boolean {
    return this.buf.length === 0;
  }

  skipNoise(): Uint8Array | null {
    if (this.buf.length === 0) return null;
    const noise = new Uint8Array(this.buf);
    this.buf = Buffer.alloc(0);
    debug("skipped %d bytes of noise: %s", noise.length, hexDump(noise));
    return noise;
  }
}

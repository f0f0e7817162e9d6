/**
 * Stream framer abstraction.
 *
 * A framer turns a byte-oriented transport into a sequence of discrete
 * messages and back. One framer is created per stream direction when the
 * stream opens; every chunk received is `push`ed and `pop` is called until
 * it returns null.
 *
 * Implementations:
 * - ReliableFramer for transports that never drop or corrupt bytes
 */
export interface StreamFramer {
  /** Bytes of header `frame` prepends to each message. */
  readonly headerLength: number;

  /** Largest message `frame` accepts. */
  readonly maximumSegmentSize: number;

  /** Encode one message for the wire. */
  frame(data: Uint8Array): Uint8Array;

  /** Append received bytes. */
  push(data: Uint8Array): void;

  /**
   * Remove and return the next complete message, or null if the buffered
   * bytes do not hold one yet.
   */
  pop(): Uint8Array | null;

  /** True when no unconsumed bytes remain. */
  inputEmpty(): boolean;

  /**
   * Discard everything buffered and return it, or null when nothing is
   * buffered. Used to resynchronise after the peer is known to have sent
   * garbage.
   */
  skipNoise(): Uint8Array | null;
}

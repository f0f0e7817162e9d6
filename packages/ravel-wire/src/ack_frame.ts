// Selective-acknowledgment frame.
//
// Wire layout (all fields LEB128 varints, no block count):
//
//   ack_to_seq | delay_and_flags | (acks nacks)*
//
// Everything at or below `ack_to_seq` is acknowledged unless a block nacks
// it. Blocks walk backward from `ack_to_seq`: each skips `acks` acknowledged
// sequence numbers, then names `nacks` missing ones.

import createDebug from "debug";
import { decodeVarint, hexDump, maxVarintForLength, varintLength, writeVarint } from "@ravel/ravel-binary";
import { Status, StatusError } from "./status.ts";

const debug = createDebug("ravel:ack-frame");

const U64_MAX = 0xffff_ffff_ffff_ffffn;
const DELAY_TOP_BIT = 1n << 63n;
/** Shifted delay used when the delay does not fit in 63 bits. */
const SATURATED_DELAY = 0xffff_ffff_ffff_fffen;

/** A run of acknowledged then missing sequence numbers. */
export interface AckBlock {
  readonly acks: bigint;
  readonly nacks: bigint;
}

/** Maps a (possibly lowered) ack-to sequence number to its ack delay in µs. */
export type DelayFn = (ackToSeq: bigint) => bigint;

/**
 * Result of parsing an ack frame without throwing.
 */
export type AckFrameResult =
  | { ok: true; frame: AckFrame }
  | { ok: false; error: StatusError };

type Field = { ok: true; value: bigint; next: number } | { ok: false; reason: string };

function readField(buf: Uint8Array, offset: number, name: string): Field {
  try {
    const { value, next } = decodeVarint(buf, offset);
    return { ok: true, value, next };
  } catch (e) {
    const cause = e instanceof Error ? e.message : String(e);
    return { ok: false, reason: `failed to read ${name}: ${cause}` };
  }
}

/**
 * Largest count below `count` whose varint is at least one byte shorter;
 * zero for counts that already fit in one byte.
 */
function shrinkCount(count: bigint): bigint {
  return maxVarintForLength(varintLength(count) - 1);
}

export class AckFrame {
  private _ackToSeq: bigint;
  private _ackDelayUs: bigint;
  private _partial = false;
  private readonly blockList: Array<{ acks: bigint; nacks: bigint }> = [];
  /** Lowest sequence number covered by the blocks so far. */
  private lastNack: bigint;

  constructor(ackToSeq: bigint, ackDelayUs: bigint = 0n) {
    if (ackToSeq <= 0n || ackToSeq > U64_MAX) {
      throw new RangeError(`ack_to_seq out of range: ${ackToSeq}`);
    }
    if (ackDelayUs < 0n || ackDelayUs > U64_MAX) {
      throw new RangeError(`ack delay out of range: ${ackDelayUs}`);
    }
    this._ackToSeq = ackToSeq;
    this._ackDelayUs = ackDelayUs;
    this.lastNack = ackToSeq + 1n;
  }

  get ackToSeq(): bigint {
    return this._ackToSeq;
  }

  get ackDelayUs(): bigint {
    return this._ackDelayUs;
  }

  /** Set once the frame has been trimmed and no longer covers every nack. */
  get partial(): boolean {
    return this._partial;
  }

  get blocks(): readonly AckBlock[] {
    return this.blockList.map((b) => ({ acks: b.acks, nacks: b.nacks }));
  }

  /**
   * Record `seq` as missing. Calls must pass strictly decreasing sequence
   * numbers in `(0, ackToSeq]`.
   */
  addNack(seq: bigint): void {
    if (seq <= 0n || seq > this._ackToSeq) {
      throw new RangeError(`nack ${seq} outside (0, ${this._ackToSeq}]`);
    }
    if (seq >= this.lastNack) {
      throw new RangeError(`nack ${seq} not below previous nack ${this.lastNack}`);
    }
    const last = this.blockList[this.blockList.length - 1];
    if (last !== undefined && seq === this.lastNack - 1n) {
      last.nacks++;
    } else {
      this.blockList.push({ acks: this.lastNack - seq - 1n, nacks: 1n });
    }
    this.lastNack = seq;
  }

  /**
   * Nacked sequence numbers, highest first. The iterable is lazy and can be
   * iterated more than once.
   */
  nackSeqs(): Iterable<bigint> {
    return { [Symbol.iterator]: () => this.walkNacks() };
  }

  private *walkNacks(): Generator<bigint> {
    let base = this._ackToSeq;
    for (const block of this.blockList) {
      base -= block.acks;
      for (let i = 0n; i < block.nacks; i++) {
        yield base;
        base--;
      }
    }
  }

  private delayAndFlags(): bigint {
    const shifted = (this._ackDelayUs & DELAY_TOP_BIT) !== 0n ? SATURATED_DELAY : this._ackDelayUs << 1n;
    return shifted | (this._partial ? 1n : 0n);
  }

  /** Length in bytes of `write()`'s output. */
  encodedLength(): number {
    let n = varintLength(this._ackToSeq) + varintLength(this.delayAndFlags());
    for (const block of this.blockList) {
      n += varintLength(block.acks) + varintLength(block.nacks);
    }
    return n;
  }

  write(): Uint8Array {
    const out = new Uint8Array(this.encodedLength());
    let offset = writeVarint(out, 0, this._ackToSeq);
    offset = writeVarint(out, offset, this.delayAndFlags());
    for (const block of this.blockList) {
      offset = writeVarint(out, offset, block.acks);
      offset = writeVarint(out, offset, block.nacks);
    }
    return out;
  }

  /**
   * Parse a frame, throwing a `StatusError` (INVALID_ARGUMENT) on malformed
   * input. A malformed frame is a peer protocol violation.
   */
  static parse(bytes: Uint8Array): AckFrame {
    const result = AckFrame.tryParse(bytes);
    if (!result.ok) throw result.error;
    return result.frame;
  }

  static tryParse(bytes: Uint8Array): AckFrameResult {
    const reject = (reason: string): AckFrameResult => {
      debug("rejecting ack frame (%s): %s", reason, hexDump(bytes));
      return { ok: false, error: new StatusError(Status.invalidArgument(reason)) };
    };

    const ackTo = readField(bytes, 0, "ack_to_seq");
    if (!ackTo.ok) return reject(ackTo.reason);
    if (ackTo.value === 0n) return reject("ack_to_seq must be positive");

    const flags = readField(bytes, ackTo.next, "ack delay");
    if (!flags.ok) return reject(flags.reason);

    const frame = new AckFrame(ackTo.value, flags.value >> 1n);
    frame._partial = (flags.value & 1n) === 1n;

    let base = ackTo.value;
    let offset = flags.next;
    while (offset < bytes.length) {
      const acks = readField(bytes, offset, "ack count");
      if (!acks.ok) return reject(acks.reason);
      const nacks = readField(bytes, acks.next, "nack count");
      if (!nacks.ok) return reject(nacks.reason);
      offset = nacks.next;

      if (acks.value >= base) return reject("too many acks");
      if (nacks.value > base - acks.value) return reject("too many nacks");
      if (nacks.value === 0n) return reject("nack count cannot be zero");

      frame.blockList.push({ acks: acks.value, nacks: nacks.value });
      base -= acks.value + nacks.value;
      frame.lastNack = base + 1n;
    }

    return { ok: true, frame };
  }

  /**
   * Shrink the frame in place until it encodes in at most `maxBytes` bytes.
   *
   * Trims the block nearest `ackToSeq`, lowering `ackToSeq` by whatever was
   * cut so the remaining blocks keep naming the same sequence numbers.
   * `delayFn` supplies the ack delay for each new `ackToSeq`. Every step
   * removes at least one encoded byte or a whole block.
   */
  adjustForMSS(maxBytes: number, delayFn: DelayFn): void {
    while (this.blockList.length > 0 && this.encodedLength() > maxBytes) {
      this._partial = true;
      const block = this.blockList[0];

      if (block.acks > 0n) {
        const acks = shrinkCount(block.acks);
        const cut = block.acks - acks;
        block.acks = acks;
        debug("trim acks by %s to fit %d bytes", cut, maxBytes);
        this.lowerAckTo(this._ackToSeq - cut, delayFn);
        continue;
      }

      const nacks = shrinkCount(block.nacks);
      if (nacks === 0n && this._ackToSeq === block.nacks) {
        // The block reaches down to sequence 1; dropping it would leave
        // nothing to acknowledge, so keep the lowest nack and stop.
        const cut = block.nacks - 1n;
        block.nacks = 1n;
        debug("trim nacks to the floor (cut %s)", cut);
        this.lowerAckTo(this._ackToSeq - cut, delayFn);
        break;
      }

      const cut = block.nacks - nacks;
      block.nacks = nacks;
      if (nacks === 0n) {
        this.blockList.shift();
        debug("drop block of %s nacks", cut);
      } else {
        debug("trim nacks by %s", cut);
      }
      this.lowerAckTo(this._ackToSeq - cut, delayFn);
    }

    if (this.blockList.length === 0) {
      this.lastNack = this._ackToSeq + 1n;
    }
  }

  private lowerAckTo(ackToSeq: bigint, delayFn: DelayFn): void {
    if (ackToSeq === this._ackToSeq) return;
    this._ackToSeq = ackToSeq;
    const delay = delayFn(ackToSeq);
    if (delay < 0n || delay > U64_MAX) {
      throw new RangeError(`ack delay out of range: ${delay}`);
    }
    this._ackDelayUs = delay;
  }

  equals(other: AckFrame): boolean {
    if (
      this._ackToSeq !== other._ackToSeq ||
      this._ackDelayUs !== other._ackDelayUs ||
      this._partial !== other._partial ||
      this.blockList.length !== other.blockList.length
    ) {
      return false;
    }
    for (let i = 0; i < this.blockList.length; i++) {
      const a = this.blockList[i];
      const b = other.blockList[i];
      if (a.acks !== b.acks || a.nacks !== b.nacks) return false;
    }
    return this.blockList.length === 0 || this.lastNack === other.lastNack;
  }

  toString(): string {
    const blocks = this.blockList.map((b) => `${b.acks}+${b.nacks}`).join(", ");
    return `ACK{to:${this._ackToSeq}, delay:${this._ackDelayUs}us, partial:${this._partial}, blocks:[${blocks}]}`;
  }
}

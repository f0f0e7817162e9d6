// Close-handshake state machine for one duplex stream.

import { type Status } from "@ravel/ravel-wire";
import { Kernel } from "./kernel.ts";
import {
  State,
  canBeginOp,
  canBeginSend,
  isClosed,
  isOpenForReceiving,
  isOpenForSending,
  isSendAcked,
} from "./state.ts";
import {
  forceCloseTarget,
  localCloseTarget,
  noOutstandingSendsTarget,
  remoteCloseTarget,
} from "./transitions.ts";
import { StreamStateError, type StreamStateListener } from "./types.ts";

/** Resends of a CLOSE frame allowed after UNAVAILABLE acks. */
export const MAX_CLOSE_RETRIES = 3;

export interface StreamStateOptions {
  /** Resend budget for UNAVAILABLE close acks. Defaults to MAX_CLOSE_RETRIES. */
  maxCloseRetries?: number;

  /** Name used in debug output. Defaults to "stream". */
  label?: string;
}

/**
 * Tracks one stream through the bilateral close handshake.
 *
 * Both endpoints run one of these per stream. Local and remote close
 * requests, acks for the CLOSE frame and op/send reference counts drive the
 * state; the listener performs the I/O the state asks for. The stream is
 * quiesced once both sides have closed, the closing protocol has finished
 * and no ops remain, at which point the owner may drop it.
 *
 * All methods are synchronous and expect a single owner. Listener callbacks
 * may re-enter; see {@link StreamStateListener}.
 */
export class StreamState {
  private readonly kernel: Kernel;
  private readonly maxCloseRetries: number;
  private _outstandingOps = 0;
  private _outstandingSends = 0;

  constructor(listener: StreamStateListener, options: StreamStateOptions = {}) {
    this.maxCloseRetries = options.maxCloseRetries ?? MAX_CLOSE_RETRIES;
    if (!Number.isInteger(this.maxCloseRetries) || this.maxCloseRetries < 0) {
      throw new RangeError(`maxCloseRetries must be a non-negative integer: ${this.maxCloseRetries}`);
    }
    this.kernel = new Kernel(listener, options.label ?? "stream");
  }

  get state(): State {
    return this.kernel.state;
  }

  get outstandingOps(): number {
    return this._outstandingOps;
  }

  get outstandingSends(): number {
    return this._outstandingSends;
  }

  /** CLOSE frames resent for the current close attempt. */
  get resendCount(): number {
    return this.kernel.resendCount;
  }

  /** Status reported to `stopReading`: the close error, if one is carried. */
  get closingStatus(): Status {
    return this.kernel.closingStatus;
  }

  isOpenForSending(): boolean {
    return isOpenForSending(this.state);
  }

  isOpenForReceiving(): boolean {
    return isOpenForReceiving(this.state);
  }

  canBeginSend(): boolean {
    return canBeginSend(this.state);
  }

  canBeginOp(): boolean {
    return canBeginOp(this.state);
  }

  isClosed(): boolean {
    return isClosed(this.state);
  }

  isQuiesced(): boolean {
    return this.state === State.Quiesced;
  }

  description(): string {
    return `${this.kernel.label}: ${this.state} ops=${this._outstandingOps} sends=${this._outstandingSends}`;
  }

  /**
   * Request a local half-close.
   *
   * `onQuiesced` fires once the stream reaches Quiesced, immediately if it
   * already has. It is registered even when the request changes nothing.
   */
  localClose(status: Status, onQuiesced?: () => void): void {
    this.kernel.submit(() => {
      if (onQuiesced) this.kernel.onQuiesced(onQuiesced);
      const to = localCloseTarget(this.kernel.state, status);
      if (to !== null) this.kernel.enter(to, "localClose", status);
    });
  }

  /** The peer closed its half of the stream. */
  remoteClose(status: Status): void {
    this.kernel.submit(() => {
      const to = remoteCloseTarget(this.kernel.state, status);
      if (to !== null) this.kernel.enter(to, "remoteClose", status);
    });
  }

  /**
   * Report how transmitting the last CLOSE frame went. Only valid while a
   * CLOSE is in flight.
   */
  sendCloseAck(status: Status): void {
    this.kernel.submit(() => {
      const state = this.kernel.state;
      if (!isSendAcked(state)) throw StreamStateError.sendCloseAck(state);

      switch (state) {
        case State.PendingCloseOnSendAck:
          this.kernel.enter(State.ClosingProtocol, "sendCloseAck", status);
          return;
        case State.PendingLocalCloseRequestedWithErrorOnSendAck:
          this.kernel.enter(State.LocalCloseRequestedWithError, "sendCloseAck", status);
          return;
        case State.PendingRemoteClosedAndLocalCloseRequestedWithError:
          this.kernel.enter(State.RemoteClosedAndLocalCloseRequestedWithError, "sendCloseAck", status);
          return;
      }

      if (status.isUnavailable() && this.kernel.resendCount < this.maxCloseRetries) {
        this.kernel.resend();
        return;
      }
      if (state === State.LocalCloseRequestedOk && status.isOk()) {
        const to = this._outstandingSends > 0 ? State.LocalClosedOkDraining : State.LocalClosedOkComplete;
        this.kernel.enter(to, "sendCloseAck", status);
        return;
      }
      this.kernel.enter(State.ClosingProtocol, "sendCloseAck", status);
    });
  }

  /** Tear the stream down without waiting for the peer. */
  forceClose(status: Status): void {
    this.kernel.submit(() => {
      const to = forceCloseTarget(this.kernel.state);
      if (to !== null) this.kernel.enter(to, "forceClose", status);
    });
  }

  /** The closing protocol started by `streamClosed` has finished. */
  quiesceReady(): void {
    this.kernel.submit(() => {
      const state = this.kernel.state;
      if (state !== State.ClosingProtocol) throw StreamStateError.quiesceReady(state);
      this.kernel.enter(State.Closed, "quiesceReady");
      if (this._outstandingOps === 0) this.kernel.enter(State.Quiesced, "quiesceReady");
    });
  }

  beginOp(): void {
    if (!this.canBeginOp()) throw StreamStateError.beginOp(this.state);
    this._outstandingOps++;
  }

  endOp(): void {
    if (this._outstandingOps === 0) throw StreamStateError.endOp("no outstanding op");
    if (this._outstandingOps === this._outstandingSends) {
      throw StreamStateError.endOp("every outstanding op is a send; use endSend");
    }
    this._outstandingOps--;
    if (this._outstandingOps === 0) this.kernel.submit(() => this.noOutstandingOps());
  }

  /**
   * Start a send. Permitted while sends may begin, or while another send is
   * still outstanding so in-flight sends can drain.
   */
  beginSend(): void {
    if (!this.canBeginSend() && this._outstandingSends === 0) {
      throw StreamStateError.beginSend(this.state);
    }
    this._outstandingOps++;
    this._outstandingSends++;
  }

  endSend(): void {
    if (this._outstandingSends === 0) throw StreamStateError.endSend();
    this._outstandingSends--;
    this._outstandingOps--;
    if (this._outstandingSends === 0) this.kernel.submit(() => this.noOutstandingSends());
    if (this._outstandingOps === 0) this.kernel.submit(() => this.noOutstandingOps());
  }

  /** Run `fn` as an op, ending it however `fn` settles. */
  async withOp<T>(fn: () => Promise<T>): Promise<T> {
    this.beginOp();
    try {
      return await fn();
    } finally {
      this.endOp();
    }
  }

  /** Run `fn` as a send, ending it however `fn` settles. */
  async withSend<T>(fn: () => Promise<T>): Promise<T> {
    this.beginSend();
    try {
      return await fn();
    } finally {
      this.endSend();
    }
  }

  private noOutstandingOps(): void {
    // Another op may have begun while this hook sat in the queue.
    if (this._outstandingOps !== 0) return;
    if (this.kernel.state === State.Closed) this.kernel.enter(State.Quiesced, "noOutstandingOps");
  }

  private noOutstandingSends(): void {
    if (this._outstandingSends !== 0) return;
    const to = noOutstandingSendsTarget(this.kernel.state);
    if (to !== null) this.kernel.enter(to, "noOutstandingSends");
  }
}

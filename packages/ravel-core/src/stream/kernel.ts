// Transition engine behind StreamState.

import createDebug from "debug";
import { Status } from "@ravel/ravel-wire";
import {
  State,
  carriesError,
  isClosed,
  isOpenForReceiving,
  sendsClose,
} from "./state.ts";
import { StreamStateError, type StreamStateListener } from "./types.ts";

const debug = createDebug("ravel:stream-state");

/**
 * Owns the current state and runs transitions one at a time.
 *
 * Events are submitted as closures. A closure submitted while another is
 * running (typically from a listener callback) is queued and runs after the
 * running one, so listeners observe a single total order of state changes.
 */
export class Kernel {
  private _state: State = State.Open;
  private _resendCount = 0;
  private error: Status | null = null;
  private transitioning = false;
  private readonly pending: Array<() => void> = [];
  private readonly quiesceCallbacks: Array<() => void> = [];

  constructor(
    private readonly listener: StreamStateListener,
    readonly label: string,
  ) {}

  get state(): State {
    return this._state;
  }

  get resendCount(): number {
    return this._resendCount;
  }

  /** Stored error while in an error-carrying state, otherwise OK. */
  get closingStatus(): Status {
    if (this.error !== null && carriesError(this._state)) return this.error;
    return Status.ok();
  }

  /** Run `event` now, or after the transition in progress. */
  submit(event: () => void): void {
    this.pending.push(event);
    if (this.transitioning) return;

    this.transitioning = true;
    try {
      for (let next = this.pending.shift(); next !== undefined; next = this.pending.shift()) {
        next();
      }
    } catch (e) {
      this.pending.length = 0;
      throw e;
    } finally {
      this.transitioning = false;
    }

    this.flushQuiesced();
  }

  /** Register a one-shot callback for when the stream is quiesced. */
  onQuiesced(callback: () => void): void {
    this.quiesceCallbacks.push(callback);
  }

  /**
   * Move to `to`, running the side effects implied by the predicates of the
   * old and new state.
   */
  enter(to: State, cause: string, status: Status = Status.ok()): void {
    const from = this._state;
    if (from === to) return;

    if (carriesError(to)) this.recordError(to, status);
    this._state = to;
    debug("%s: %s -> %s (%s %s)", this.label, from, to, cause, status.toString());

    if (sendsClose(to) && !sendsClose(from)) {
      this._resendCount = 0;
      this.listener.sendClose();
    }
    if (isOpenForReceiving(from) && !isOpenForReceiving(to)) {
      this.listener.stopReading(this.closingStatus);
    }
    if (!isClosed(from) && isClosed(to)) {
      this.listener.streamClosed();
    }
  }

  /** Retransmit the CLOSE frame for the current state. */
  resend(): void {
    this._resendCount++;
    debug("%s: resend close #%d in %s", this.label, this._resendCount, this._state);
    this.listener.sendClose();
  }

  // The only writer of `error`: the first error-carrying state fixes it.
  private recordError(to: State, status: Status): void {
    if (this.error !== null) return;
    if (status.isOk()) throw StreamStateError.errorState(to);
    this.error = status;
  }

  private flushQuiesced(): void {
    if (this._state !== State.Quiesced || this.quiesceCallbacks.length === 0) return;
    debug("%s: quiesced, firing %d callbacks", this.label, this.quiesceCallbacks.length);
    // A callback that throws leaves the ones after it queued for the next flush.
    for (let next = this.quiesceCallbacks.shift(); next !== undefined; next = this.quiesceCallbacks.shift()) {
      next();
    }
  }
}

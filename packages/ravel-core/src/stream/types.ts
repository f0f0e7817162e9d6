// Close-handshake collaborator types.

import type { Status } from "@ravel/ravel-wire";
import type { State } from "./state.ts";

/**
 * Side effects requested by a StreamState.
 *
 * Callbacks run synchronously from inside a transition and may call back
 * into the StreamState; such calls are queued and run, in order, once the
 * current transition's side effects have completed.
 *
 * The listener is borrowed: it must outlive the StreamState that calls it.
 */
export interface StreamStateListener {
  /** Transmit a CLOSE frame, then report the outcome via `sendCloseAck`. */
  sendClose(): void;
  /** Stop delivering payload to the application. */
  stopReading(status: Status): void;
  /** Run closing protocol, then report completion via `quiesceReady`. */
  streamClosed(): void;
}

export type StreamStateErrorKind =
  | "beginOp"
  | "beginSend"
  | "endOp"
  | "endSend"
  | "sendCloseAck"
  | "quiesceReady"
  | "errorState";

/**
 * Contract violation by the code driving a StreamState. These are bugs in
 * the caller and leave the stream in an unspecified state.
 */
export class StreamStateError extends Error {
  constructor(
    public kind: StreamStateErrorKind,
    message: string,
  ) {
    super(message);
    this.name = "StreamStateError";
  }

  static beginOp(state: State): StreamStateError {
    return new StreamStateError("beginOp", `cannot begin op in state ${state}`);
  }

  static beginSend(state: State): StreamStateError {
    return new StreamStateError("beginSend", `cannot begin send in state ${state}`);
  }

  static endOp(reason: string): StreamStateError {
    return new StreamStateError("endOp", `endOp: ${reason}`);
  }

  static endSend(): StreamStateError {
    return new StreamStateError("endSend", "endSend without an outstanding send");
  }

  static sendCloseAck(state: State): StreamStateError {
    return new StreamStateError("sendCloseAck", `unexpected close ack in state ${state}`);
  }

  static quiesceReady(state: State): StreamStateError {
    return new StreamStateError("quiesceReady", `quiesceReady in state ${state}`);
  }

  static errorState(state: State): StreamStateError {
    return new StreamStateError("errorState", `entered ${state} without an error status`);
  }
}

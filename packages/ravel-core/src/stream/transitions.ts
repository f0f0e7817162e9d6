// Transition tables for the close handshake. Each function maps the current
// state and the event's status to the next state, or null when the event
// leaves the state unchanged.
//
// sendCloseAck is not tabulated here: its outcome also depends on the
// resend budget and the outstanding send count.

import type { Status } from "@ravel/ravel-wire";
import { State } from "./state.ts";

export function localCloseTarget(state: State, status: Status): State | null {
  const ok = status.isOk();
  switch (state) {
    case State.Open:
      return ok ? State.LocalCloseRequestedOk : State.LocalCloseRequestedWithError;
    case State.LocalCloseRequestedOk:
      return ok ? null : State.PendingLocalCloseRequestedWithErrorOnSendAck;
    case State.LocalClosedOkDraining:
    case State.LocalClosedOkComplete:
      return ok ? null : State.LocalCloseRequestedWithError;
    case State.RemoteClosedOk:
      return ok ? State.RemoteClosedAndLocalCloseRequestedOk : State.RemoteClosedAndLocalCloseRequestedWithError;
    case State.RemoteClosedAndLocalCloseRequestedOk:
      return ok ? null : State.PendingRemoteClosedAndLocalCloseRequestedWithError;
    case State.RemoteClosedOkAndLocalClosedOkDraining:
      return ok ? null : State.RemoteClosedAndLocalCloseRequestedWithError;
    default:
      return null;
  }
}

export function remoteCloseTarget(state: State, status: Status): State | null {
  const ok = status.isOk();
  switch (state) {
    case State.Open:
      return ok ? State.RemoteClosedOk : State.ClosingProtocol;
    case State.LocalCloseRequestedOk:
      return ok ? State.RemoteClosedAndLocalCloseRequestedOk : State.PendingCloseOnSendAck;
    case State.LocalCloseRequestedWithError:
      return ok ? State.RemoteClosedAndLocalCloseRequestedWithError : State.PendingCloseOnSendAck;
    case State.LocalClosedOkDraining:
      return ok ? State.RemoteClosedOkAndLocalClosedOkDraining : State.ClosingProtocol;
    case State.LocalClosedOkComplete:
      return State.ClosingProtocol;
    case State.RemoteClosedOk:
    case State.RemoteClosedOkAndLocalClosedOkDraining:
      return ok ? null : State.ClosingProtocol;
    case State.RemoteClosedAndLocalCloseRequestedOk:
    case State.RemoteClosedAndLocalCloseRequestedWithError:
      return ok ? null : State.PendingCloseOnSendAck;
    case State.PendingLocalCloseRequestedWithErrorOnSendAck:
      return ok ? State.PendingRemoteClosedAndLocalCloseRequestedWithError : State.PendingCloseOnSendAck;
    case State.PendingRemoteClosedAndLocalCloseRequestedWithError:
      return ok ? null : State.PendingCloseOnSendAck;
    default:
      return null;
  }
}

export function forceCloseTarget(state: State): State | null {
  switch (state) {
    case State.Open:
    case State.LocalClosedOkDraining:
    case State.LocalClosedOkComplete:
    case State.RemoteClosedOk:
    case State.RemoteClosedOkAndLocalClosedOkDraining:
      return State.ClosingProtocol;
    case State.LocalCloseRequestedOk:
    case State.LocalCloseRequestedWithError:
    case State.RemoteClosedAndLocalCloseRequestedOk:
    case State.RemoteClosedAndLocalCloseRequestedWithError:
    case State.PendingLocalCloseRequestedWithErrorOnSendAck:
    case State.PendingRemoteClosedAndLocalCloseRequestedWithError:
      // A CLOSE is in flight; finish once its ack arrives.
      return State.PendingCloseOnSendAck;
    default:
      return null;
  }
}

export function noOutstandingSendsTarget(state: State): State | null {
  switch (state) {
    case State.LocalClosedOkDraining:
      return State.LocalClosedOkComplete;
    case State.RemoteClosedOkAndLocalClosedOkDraining:
      return State.ClosingProtocol;
    default:
      return null;
  }
}

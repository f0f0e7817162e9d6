// Close-handshake states and the predicates derived from them.

/** Close-handshake state. Values double as display names. */
export const State = {
  Open: "Open",
  LocalCloseRequestedOk: "LocalCloseRequestedOk",
  LocalCloseRequestedWithError: "LocalCloseRequestedWithError",
  LocalClosedOkDraining: "LocalClosedOkDraining",
  LocalClosedOkComplete: "LocalClosedOkComplete",
  RemoteClosedOk: "RemoteClosedOk",
  RemoteClosedAndLocalCloseRequestedOk: "RemoteClosedAndLocalCloseRequestedOk",
  RemoteClosedAndLocalCloseRequestedWithError: "RemoteClosedAndLocalCloseRequestedWithError",
  RemoteClosedOkAndLocalClosedOkDraining: "RemoteClosedOkAndLocalClosedOkDraining",
  PendingCloseOnSendAck: "PendingCloseOnSendAck",
  PendingLocalCloseRequestedWithErrorOnSendAck: "PendingLocalCloseRequestedWithErrorOnSendAck",
  PendingRemoteClosedAndLocalCloseRequestedWithError: "PendingRemoteClosedAndLocalCloseRequestedWithError",
  ClosingProtocol: "ClosingProtocol",
  Closed: "Closed",
  Quiesced: "Quiesced",
} as const;
export type State = (typeof State)[keyof typeof State];

export const ALL_STATES: readonly State[] = Object.values(State);

const OPEN_FOR_SENDING: ReadonlySet<State> = new Set<State>([
  State.Open,
  State.LocalCloseRequestedOk,
  State.LocalClosedOkDraining,
  State.RemoteClosedOk,
  State.RemoteClosedAndLocalCloseRequestedOk,
  State.RemoteClosedOkAndLocalClosedOkDraining,
]);

const OPEN_FOR_RECEIVING: ReadonlySet<State> = new Set<State>([
  State.Open,
  State.LocalCloseRequestedOk,
  State.LocalClosedOkDraining,
  State.LocalClosedOkComplete,
]);

const CAN_BEGIN_SEND: ReadonlySet<State> = new Set<State>([
  State.Open,
  State.RemoteClosedOk,
  State.RemoteClosedAndLocalCloseRequestedOk,
]);

const CLOSED: ReadonlySet<State> = new Set<State>([State.ClosingProtocol, State.Closed, State.Quiesced]);

const SENDS_CLOSE: ReadonlySet<State> = new Set<State>([
  State.LocalCloseRequestedOk,
  State.LocalCloseRequestedWithError,
  State.RemoteClosedAndLocalCloseRequestedOk,
  State.RemoteClosedAndLocalCloseRequestedWithError,
]);

const SEND_ACKED: ReadonlySet<State> = new Set<State>([
  ...SENDS_CLOSE,
  State.PendingCloseOnSendAck,
  State.PendingLocalCloseRequestedWithErrorOnSendAck,
  State.PendingRemoteClosedAndLocalCloseRequestedWithError,
]);

const CARRIES_ERROR: ReadonlySet<State> = new Set<State>([
  State.LocalCloseRequestedWithError,
  State.RemoteClosedAndLocalCloseRequestedWithError,
  State.PendingRemoteClosedAndLocalCloseRequestedWithError,
  State.PendingLocalCloseRequestedWithErrorOnSendAck,
]);

export function isOpenForSending(state: State): boolean {
  return OPEN_FOR_SENDING.has(state);
}

export function isOpenForReceiving(state: State): boolean {
  return OPEN_FOR_RECEIVING.has(state);
}

export function canBeginSend(state: State): boolean {
  return CAN_BEGIN_SEND.has(state);
}

export function canBeginOp(state: State): boolean {
  return state !== State.Quiesced;
}

export function isClosed(state: State): boolean {
  return CLOSED.has(state);
}

/** A CLOSE frame is in flight and `sendCloseAck` is expected. */
export function isSendAcked(state: State): boolean {
  return SEND_ACKED.has(state);
}

/** Entering this state transmits a CLOSE frame. */
export function sendsClose(state: State): boolean {
  return SENDS_CLOSE.has(state);
}

/** The close was requested with an error that travels with the stream. */
export function carriesError(state: State): boolean {
  return CARRIES_ERROR.has(state);
}

export {
  State,
  ALL_STATES,
  isOpenForSending,
  isOpenForReceiving,
  canBeginSend,
  canBeginOp,
  isClosed,
  isSendAcked,
  sendsClose,
  carriesError,
} from "./state.ts";
export { type StreamStateListener, type StreamStateErrorKind, StreamStateError } from "./types.ts";
export { StreamState, MAX_CLOSE_RETRIES, type StreamStateOptions } from "./stream_state.ts";

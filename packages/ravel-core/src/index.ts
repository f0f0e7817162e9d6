// @ravel/ravel-core - stream lifecycle for the ravel transport
//
// The close-handshake state machine and its listener contract. Status types
// are re-exported so callers need a single import.

// ============================================================================
// Stream state
// ============================================================================

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
  StreamState,
  StreamStateError,
  MAX_CLOSE_RETRIES,
  type StreamStateListener,
  type StreamStateErrorKind,
  type StreamStateOptions,
} from "./stream/index.ts";

// ============================================================================
// Logging
// ============================================================================

export { loggingListener, type ListenerLoggingOptions } from "./logging.ts";

// ============================================================================
// Re-exports
// ============================================================================

export { Status, StatusCode, StatusError, statusCodeName } from "@ravel/ravel-wire";

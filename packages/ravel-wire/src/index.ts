// @ravel/ravel-wire - wire-level types for the ravel transport
//
// Status codes shared by the close handshake and the codecs, and the
// selective-acknowledgment frame.

// ============================================================================
// Status
// ============================================================================

export { Status, StatusCode, StatusError, statusCodeName } from "./status.ts";

// ============================================================================
// Ack frames
// ============================================================================

export { AckFrame, type AckBlock, type AckFrameResult, type DelayFn } from "./ack_frame.ts";

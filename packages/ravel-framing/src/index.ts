// @ravel/ravel-framing - message framing over byte streams

export { type StreamFramer } from "./stream_framer.ts";
export {
  ReliableFramer,
  RELIABLE_HEADER_LENGTH,
  RELIABLE_MAX_MESSAGE_SIZE,
  type ReliableFramerOptions,
} from "./reliable_framer.ts";

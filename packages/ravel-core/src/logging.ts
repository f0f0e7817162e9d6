// Logging for StreamState listeners.
//
// Wraps a listener so every side effect a stream requests is written to a
// debug namespace before it is forwarded.

import createDebug from "debug";
import type { StreamStateListener } from "./stream/types.ts";

export interface ListenerLoggingOptions {
  /**
   * Namespace for debug matching. Defaults to "ravel:listener".
   * Enable with DEBUG=ravel:* or DEBUG=ravel:listener.
   */
  namespace?: string;

  /** Prefix for each line, usually the stream's label. Defaults to "stream". */
  label?: string;
}

/**
 * Create a listener that logs each callback, then calls `inner`.
 *
 * @example
 * ```typescript
 * const state = new StreamState(loggingListener(transport, { label: "stream 7" }));
 * ```
 */
export function loggingListener(
  inner: StreamStateListener,
  options: ListenerLoggingOptions = {},
): StreamStateListener {
  const log = createDebug(options.namespace ?? "ravel:listener");
  const label = options.label ?? "stream";

  return {
    sendClose(): void {
      log("%s: send close", label);
      inner.sendClose();
    },

    stopReading(status): void {
      log("%s: stop reading (%s)", label, status.toString());
      inner.stopReading(status);
    },

    streamClosed(): void {
      log("%s: stream closed", label);
      inner.streamClosed();
    },
  };
}

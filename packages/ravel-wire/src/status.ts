// Status values carried through the close handshake and returned by the
// wire codecs.

/** Status codes. Numbering follows the canonical RPC status code space. */
export const StatusCode = {
  OK: 0,
  CANCELLED: 1,
  UNKNOWN: 2,
  INVALID_ARGUMENT: 3,
  DEADLINE_EXCEEDED: 4,
  NOT_FOUND: 5,
  ALREADY_EXISTS: 6,
  PERMISSION_DENIED: 7,
  RESOURCE_EXHAUSTED: 8,
  FAILED_PRECONDITION: 9,
  ABORTED: 10,
  OUT_OF_RANGE: 11,
  UNIMPLEMENTED: 12,
  INTERNAL: 13,
  /** Transient; the operation may succeed if retried. */
  UNAVAILABLE: 14,
  DATA_LOSS: 15,
  UNAUTHENTICATED: 16,
} as const;

export type StatusCode = (typeof StatusCode)[keyof typeof StatusCode];

const CODE_NAMES: Record<StatusCode, string> = {
  [StatusCode.OK]: "OK",
  [StatusCode.CANCELLED]: "CANCELLED",
  [StatusCode.UNKNOWN]: "UNKNOWN",
  [StatusCode.INVALID_ARGUMENT]: "INVALID_ARGUMENT",
  [StatusCode.DEADLINE_EXCEEDED]: "DEADLINE_EXCEEDED",
  [StatusCode.NOT_FOUND]: "NOT_FOUND",
  [StatusCode.ALREADY_EXISTS]: "ALREADY_EXISTS",
  [StatusCode.PERMISSION_DENIED]: "PERMISSION_DENIED",
  [StatusCode.RESOURCE_EXHAUSTED]: "RESOURCE_EXHAUSTED",
  [StatusCode.FAILED_PRECONDITION]: "FAILED_PRECONDITION",
  [StatusCode.ABORTED]: "ABORTED",
  [StatusCode.OUT_OF_RANGE]: "OUT_OF_RANGE",
  [StatusCode.UNIMPLEMENTED]: "UNIMPLEMENTED",
  [StatusCode.INTERNAL]: "INTERNAL",
  [StatusCode.UNAVAILABLE]: "UNAVAILABLE",
  [StatusCode.DATA_LOSS]: "DATA_LOSS",
  [StatusCode.UNAUTHENTICATED]: "UNAUTHENTICATED",
};

/** Human-readable name of a status code. */
export function statusCodeName(code: StatusCode): string {
  return CODE_NAMES[code] ?? `CODE_${code}`;
}

/**
 * Outcome of an operation: OK, or an error code with an optional reason.
 *
 * Statuses are immutable values; compare them with `equals`.
 */
export class Status {
  private static readonly OK = new Status(StatusCode.OK, "");

  private constructor(
    readonly code: StatusCode,
    readonly reason: string,
  ) {}

  static ok(): Status {
    return Status.OK;
  }

  static fromCode(code: StatusCode, reason = ""): Status {
    if (code === StatusCode.OK) return Status.OK;
    return new Status(code, reason);
  }

  static cancelled(reason = ""): Status {
    return new Status(StatusCode.CANCELLED, reason);
  }

  static unavailable(reason = ""): Status {
    return new Status(StatusCode.UNAVAILABLE, reason);
  }

  static invalidArgument(reason = ""): Status {
    return new Status(StatusCode.INVALID_ARGUMENT, reason);
  }

  static internal(reason = ""): Status {
    return new Status(StatusCode.INTERNAL, reason);
  }

  isOk(): boolean {
    return this.code === StatusCode.OK;
  }

  isError(): boolean {
    return this.code !== StatusCode.OK;
  }

  /** Transient failures that the close handshake retries. */
  isUnavailable(): boolean {
    return this.code === StatusCode.UNAVAILABLE;
  }

  equals(other: Status): boolean {
    return this.code === other.code && this.reason === other.reason;
  }

  toString(): string {
    const name = statusCodeName(this.code);
    return this.reason ? `${name}: ${this.reason}` : name;
  }

  /** Wrap an error status in a throwable. */
  toError(): StatusError {
    return new StatusError(this);
  }
}

/** Error thrown where a non-OK status has to cross a throwing API. */
export class StatusError extends Error {
  readonly status: Status;

  constructor(status: Status) {
    if (status.isOk()) {
      throw new RangeError("StatusError requires an error status");
    }
    super(status.toString());
    this.name = "StatusError";
    this.status = status;
  }

  get code(): StatusCode {
    return this.status.code;
  }
}

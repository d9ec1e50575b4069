export type BmsErrorKind =
  | "device_unreachable"
  | "negotiation_failed"
  | "transport_failure"
  | "response_timeout"
  | "frame_too_short";

export class BmsError extends Error {
  constructor(readonly kind: BmsErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BmsError";
  }
}

export class DeviceUnreachableError extends BmsError {
  constructor(address: string, options?: { cause?: unknown }) {
    super("device_unreachable", `Device ${address} is not reachable`, options);
    this.name = "DeviceUnreachableError";
  }
}

export class NegotiationFailedError extends BmsError {
  constructor(address: string, detail: string) {
    super("negotiation_failed", `Negotiation with ${address} failed: ${detail}`);
    this.name = "NegotiationFailedError";
  }
}

export class TransportFailureError extends BmsError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("transport_failure", message, options);
    this.name = "TransportFailureError";
  }
}

export class ResponseTimeoutError extends BmsError {
  constructor(address: string, timeoutMs: number, buffered: number) {
    super(
      "response_timeout",
      `No response from ${address} within ${timeoutMs} ms (${buffered} bytes buffered)`
    );
    this.name = "ResponseTimeoutError";
  }
}

export class FrameTooShortError extends BmsError {
  constructor(readonly length: number, readonly expected: number) {
    super("frame_too_short", `Response too short: ${length} bytes, expected >= ${expected}`);
    this.name = "FrameTooShortError";
  }
}

export function describeError(e: unknown) {
  return e instanceof Error ? e.message : String(e);
}

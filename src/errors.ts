export type DecodeReason =
  | { type: "xml"; detail: string }
  | { type: "field-not-found"; field: string }
  | { type: "field-not-supported"; field: string }
  | { type: "invalid-value"; field: string; value: string }
  | { type: "status-mismatched"; responseCode: number; expectedCode: number };

export type AuthProbeReason =
  | { type: "status-mismatched"; responseCode: number; expectedCode: number }
  | { type: "no-auth-header" }
  | { type: "invalid-challenge"; detail: string };

export type WebDAVErrorKind =
  | "transport"
  | "request"
  | "auth-probe"
  | "auth-compute"
  | "missing-auth-context"
  | "decode"
  | "server";

/**
 * Base class of everything the client throws. Switch on `kind` to find the
 * stage that failed.
 */
export abstract class WebDAVError extends Error {
  abstract readonly kind: WebDAVErrorKind;

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

/** Network or socket level failure reported by the transport. */
export class TransportError extends WebDAVError {
  readonly kind = "transport";

  constructor(
    message: string,
    public readonly method: string,
    public readonly url: string,
    cause?: unknown
  ) {
    super(message, cause);
  }
}

/** The request could not be built (bad URL, bad options). */
export class RequestError extends WebDAVError {
  readonly kind = "request";
}

export class AuthProbeError extends WebDAVError {
  readonly kind = "auth-probe";

  constructor(public readonly reason: AuthProbeReason, cause?: unknown) {
    super(describeProbeReason(reason), cause);
  }
}

export class AuthComputeError extends WebDAVError {
  readonly kind = "auth-compute";
}

/**
 * The Digest session had no challenge right after a successful probe.
 * Only reachable if the stored state is dropped between the two steps.
 */
export class MissingAuthContextError extends WebDAVError {
  readonly kind = "missing-auth-context";

  constructor() {
    super("Digest auth context missing after probe.");
  }
}

export class DecodeError extends WebDAVError {
  readonly kind = "decode";

  constructor(public readonly reason: DecodeReason, cause?: unknown) {
    super(describeDecodeReason(reason), cause);
  }
}

/** Non-2xx response, with the exception/message the server sent back. */
export class ServerError extends WebDAVError {
  readonly kind = "server";

  constructor(
    public readonly responseCode: number,
    public readonly exception: string,
    public readonly serverMessage: string
  ) {
    super(`Server responded ${responseCode}: ${exception}: ${serverMessage}`);
  }
}

function describeProbeReason(reason: AuthProbeReason): string {
  switch (reason.type) {
    case "status-mismatched":
      return (
        `Digest probe expected status ${reason.expectedCode}, ` +
        `got ${reason.responseCode}.`
      );
    case "no-auth-header":
      return "Digest probe response carried no WWW-Authenticate header.";
    case "invalid-challenge":
      return `Digest challenge could not be parsed: ${reason.detail}`;
  }
}

function describeDecodeReason(reason: DecodeReason): string {
  switch (reason.type) {
    case "xml":
      return `Invalid multistatus XML: ${reason.detail}`;
    case "field-not-found":
      return `Field not found: ${reason.field}`;
    case "field-not-supported":
      return `Field not supported: ${reason.field}`;
    case "invalid-value":
      return `Invalid value for ${reason.field}: "${reason.value}"`;
    case "status-mismatched":
      return (
        `Expected status ${reason.expectedCode}, ` +
        `got ${reason.responseCode}.`
      );
  }
}

/**
 * Error taxonomy shared by the protocol, engine and HTTP layers.
 * Nothing in this codebase retries on its own; callers decide.
 */

export class StrandlightError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = "StrandlightError";
  }
}

/** Socket open/connect/send/receive failure. Fatal to the current frame only. */
export class TransportError extends StrandlightError {
  constructor(
    message: string,
    public readonly address?: string,
    public readonly port?: number,
  ) {
    super(message, "TRANSPORT_ERROR");
    this.name = "TransportError";
  }
}

/** Non-2xx HTTP, undecodable or misshapen JSON, or a non-success device code. */
export class ProtocolError extends StrandlightError {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly responseCode?: number,
    code = "PROTOCOL_ERROR",
  ) {
    super(message, code);
    this.name = "ProtocolError";
  }
}

export class AuthenticationError extends ProtocolError {
  constructor(message: string, status?: number, responseCode?: number) {
    super(message, status, responseCode, "AUTHENTICATION_ERROR");
    this.name = "AuthenticationError";
  }
}

/** Bad engine or request configuration, raised before any network action. */
export class ValidationError extends StrandlightError {
  constructor(message: string) {
    super(message, "VALIDATION_ERROR");
    this.name = "ValidationError";
  }
}

export class DeviceNotFoundError extends StrandlightError {
  constructor(public readonly macAddress: string) {
    super(`Unknown device: ${macAddress}`, "DEVICE_NOT_FOUND");
    this.name = "DeviceNotFoundError";
  }
}

export function isStrandlightError(error: unknown): error is StrandlightError {
  return error instanceof StrandlightError;
}

export function formatErrorMessage(error: unknown): string {
  if (isStrandlightError(error)) {
    return `${error.code}: ${error.message}`;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}

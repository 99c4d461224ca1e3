// src/errors.ts

/**
 * Base error class for all bus service errors.
 */
export class BusServiceError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "BusServiceError";
  }
}

/**
 * Thrown for invalid startup options or an invalid service identity.
 * Always raised before any bus interaction.
 */
export class ConfigurationError extends BusServiceError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIGURATION_ERROR", context);
    this.name = "ConfigurationError";
  }
}

export type RegistrationErrorKind = "NameTaken" | "BusUnavailable";

/**
 * Describes why a name claim did not succeed. Kept by the coordinator and
 * exposed through errorMessage(); never thrown out of register().
 */
export class RegistrationError extends BusServiceError {
  readonly kind: RegistrationErrorKind;

  constructor(
    kind: RegistrationErrorKind,
    serviceName: string,
    message: string,
    cause?: Error,
  ) {
    super(message, "REGISTRATION_FAILED", {
      kind,
      serviceName,
      cause: cause?.message,
    });
    this.name = "RegistrationError";
    this.kind = kind;
  }
}

export type ForwardingErrorKind = "OwnerUnreachable" | "Timeout" | "RemoteError";

/**
 * Describes why forwarding an invocation to the owning instance failed.
 */
export class ForwardingError extends BusServiceError {
  readonly kind: ForwardingErrorKind;

  constructor(
    kind: ForwardingErrorKind,
    serviceName: string,
    message: string,
    cause?: Error,
  ) {
    super(message, "FORWARDING_FAILED", {
      kind,
      serviceName,
      cause: cause?.message,
    });
    this.name = "ForwardingError";
    this.kind = kind;
  }
}

/**
 * Error raised by a bus connection. `errorName` carries the D-Bus error
 * name, e.g. "org.freedesktop.DBus.Error.ServiceUnknown".
 */
export class BusError extends BusServiceError {
  constructor(
    public readonly errorName: string,
    message: string,
  ) {
    super(message, "BUS_ERROR", { errorName });
    this.name = "BusError";
  }
}

/**
 * Error thrown when an operation times out.
 */
export class TimeoutError extends BusServiceError {
  constructor(operation: string, timeoutMs: number) {
    super(`Operation timed out after ${timeoutMs}ms: ${operation}`, "TIMEOUT", {
      operation,
      timeoutMs,
    });
    this.name = "TimeoutError";
  }
}

/**
 * Well-known D-Bus error names used across the package.
 */
export const BusErrorNames = {
  ServiceUnknown: "org.freedesktop.DBus.Error.ServiceUnknown",
  NameHasNoOwner: "org.freedesktop.DBus.Error.NameHasNoOwner",
  NoReply: "org.freedesktop.DBus.Error.NoReply",
  Disconnected: "org.freedesktop.DBus.Error.Disconnected",
  UnknownObject: "org.freedesktop.DBus.Error.UnknownObject",
  UnknownInterface: "org.freedesktop.DBus.Error.UnknownInterface",
  UnknownMethod: "org.freedesktop.DBus.Error.UnknownMethod",
  InvalidArgs: "org.freedesktop.DBus.Error.InvalidArgs",
  Failed: "org.freedesktop.DBus.Error.Failed",
} as const;

/**
 * Normalizes an unknown thrown value into an Error.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

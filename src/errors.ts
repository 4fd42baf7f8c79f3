// Error taxonomy for the discovery bridge.
// Caller-input and translation failures are rendered as error-flagged tool
// results; UpstreamError and CancelledError propagate as faults.

export type BridgeErrorCode =
  | "LOAD_ERROR"
  | "CONFIG_ERROR"
  | "VALIDATION_ERROR"
  | "PAYMENT_META_ERROR"
  | "ENCODE_ERROR"
  | "DECODE_ERROR"
  | "NOT_FOUND"
  | "UPSTREAM_ERROR"
  | "CANCELLED";

export class BridgeError extends Error {
  constructor(
    message: string,
    public readonly code: BridgeErrorCode,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "BridgeError";
  }
}

/** Catalog fixture missing, unreadable or malformed */
export class LoadError extends BridgeError {
  constructor(message: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, "LOAD_ERROR", context, options);
    this.name = "LoadError";
  }
}

export class ConfigError extends BridgeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", context);
    this.name = "ConfigError";
  }
}

/** Malformed caller input */
export class ValidationError extends BridgeError {
  constructor(message: string, context?: Record<string, unknown>, code: BridgeErrorCode = "VALIDATION_ERROR") {
    super(message, code, context);
    this.name = "ValidationError";
  }
}

/** The x402/payment metadata on a call could not be turned into a request header */
export class PaymentMetaError extends ValidationError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context, "PAYMENT_META_ERROR");
    this.name = "PaymentMetaError";
  }
}

/** Protocol version of a payment credential could not be determined */
export class EncodeError extends BridgeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "ENCODE_ERROR", context);
    this.name = "EncodeError";
  }
}

/** Corrupt base64 or JSON in a payment header */
export class DecodeError extends BridgeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "DECODE_ERROR", context);
    this.name = "DecodeError";
  }
}

export class NotFoundError extends BridgeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "NOT_FOUND", context);
    this.name = "NotFoundError";
  }
}

/** The upstream resource could not be reached or read */
export class UpstreamError extends BridgeError {
  constructor(message: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, "UPSTREAM_ERROR", context, options);
    this.name = "UpstreamError";
  }
}

export class CancelledError extends BridgeError {
  constructor(message = "proxy call cancelled", context?: Record<string, unknown>) {
    super(message, "CANCELLED", context);
    this.name = "CancelledError";
  }
}

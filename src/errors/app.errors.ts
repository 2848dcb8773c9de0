/**
 * Base application error class
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code?: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Configuration error - thrown when config values are missing or out of range
 */
export class ConfigurationError extends AppError {
  constructor(message: string, cause?: Error) {
    super(message, "CONFIG_ERROR", cause);
  }
}

/**
 * Signal validation error - thrown at the ingestion boundary for malformed payloads
 */
export class SignalValidationError extends AppError {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message, "SIGNAL_INVALID");
  }
}

/**
 * Exchange API error - the exchange answered with an error code or HTTP status
 */
export class ExchangeApiError extends AppError {
  constructor(
    message: string,
    public readonly endpoint?: string,
    public readonly status?: number,
    public readonly exchangeCode?: string,
    cause?: Error,
  ) {
    super(message, "EXCHANGE_API_ERROR", cause);
  }
}

/**
 * Transient exchange error - network, timeout or rate limit; retried with backoff
 */
export class TransientExchangeError extends AppError {
  constructor(
    message: string,
    public readonly endpoint?: string,
    cause?: Error,
    code = "TRANSIENT_EXCHANGE_ERROR",
  ) {
    super(message, code, cause);
  }
}

/**
 * Call timeout - the exchange call did not settle within its deadline
 */
export class CallTimeoutError extends TransientExchangeError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`, operation, undefined, "CALL_TIMEOUT");
  }
}

/**
 * Retries exhausted - surfaced by the call executor instead of blocking forever
 */
export class RetriesExhaustedError extends AppError {
  constructor(
    public readonly operation: string,
    public readonly attempts: number,
    cause?: Error,
  ) {
    super(
      `${operation} failed after ${attempts} attempt(s): ${cause?.message ?? "unknown error"}`,
      "RETRIES_EXHAUSTED",
      cause,
    );
  }
}

/**
 * Capability unknown - a probe was inconclusive; never treated as success or failure
 */
export class CapabilityUnknownError extends AppError {
  constructor(
    public readonly capability: string,
    cause?: Error,
  ) {
    super(`Capability ${capability} is unresolved`, "CAPABILITY_UNKNOWN", cause);
  }
}

/**
 * Reconciliation divergence - local state and exchange truth disagree
 */
export class ReconciliationDivergenceError extends AppError {
  constructor(
    message: string,
    public readonly symbol: string,
    public readonly finding: string,
  ) {
    super(message, "RECONCILIATION_DIVERGENCE");
  }
}

/**
 * Fatal safety trigger - drawdown breach or panic signal; never retried
 */
export class FatalSafetyTriggerError extends AppError {
  constructor(
    message: string,
    public readonly trigger: string,
  ) {
    super(message, "FATAL_SAFETY_TRIGGER");
  }
}

/**
 * Domain error types.
 * Framework-independent. No business logic.
 */

/** Optional metadata attached to domain errors. */
export type ErrorMetadata = Record<string, unknown>;

/** Base for all domain errors. Preserves prototype chain for instanceof. */
export class DomainError extends Error {
  readonly metadata: ErrorMetadata | undefined;

  constructor(message: string, metadata?: ErrorMetadata) {
    super(message);
    this.name = this.constructor.name;
    this.metadata = metadata;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** User-correctable input: bad PoP, query stop before PoP, non-numeric hours. */
export class ValidationError extends DomainError {
  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, metadata);
  }
}

/** Thrown when an invariant is violated. */
export class InvariantViolation extends DomainError {
  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, metadata);
  }
}

/** Remote API config missing or malformed. Fatal for the session. */
export class ConfigurationError extends DomainError {
  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, metadata);
  }
}

/** Timesheet fetch failed: network, bad status or undecodable payload. */
export class TransportError extends DomainError {
  readonly status: number | undefined;

  constructor(message: string, metadata?: ErrorMetadata & { status?: number }) {
    super(message, metadata);
    this.status = metadata?.status;
  }
}

/** Ceiling record could not be read or written. */
export class PersistenceError extends DomainError {
  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, metadata);
  }
}

/** Failure kinds surfaced to callers. */
export type ErrorKind = "configuration" | "validation" | "transport" | "persistence" | "cancelled";

/** Kind of a known domain error; null for anything unexpected. */
export function classifyError(err: unknown): ErrorKind | null {
  if (err instanceof ConfigurationError) return "configuration";
  if (err instanceof ValidationError) return "validation";
  if (err instanceof TransportError) return "transport";
  if (err instanceof PersistenceError) return "persistence";
  if (err instanceof Error && err.name === "AbortError") return "cancelled";
  return null;
}

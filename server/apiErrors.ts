/**
 * API error payload.
 * Maps domain error kinds to HTTP codes.
 */

import type { ErrorKind } from "../domain/errors.js";

export type ErrorCode =
  | "INVALID_INPUT"
  | "NOT_FOUND"
  | "CONFIGURATION_ERROR"
  | "UPSTREAM_ERROR"
  | "PERSISTENCE_ERROR"
  | "CANCELLED"
  | "INTERNAL_ERROR";

export interface ApiErrorPayload {
  readonly error: {
    readonly code: ErrorCode;
    readonly message: string;
    readonly details?: Record<string, unknown>;
  };
}

export function apiError(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>
): ApiErrorPayload {
  return { error: { code, message, ...(details != null && { details }) } };
}

const BY_KIND: Record<ErrorKind, { status: number; code: ErrorCode }> = {
  validation: { status: 400, code: "INVALID_INPUT" },
  configuration: { status: 503, code: "CONFIGURATION_ERROR" },
  transport: { status: 502, code: "UPSTREAM_ERROR" },
  persistence: { status: 500, code: "PERSISTENCE_ERROR" },
  cancelled: { status: 499, code: "CANCELLED" },
};

export function httpErrorFor(kind: ErrorKind): { status: number; code: ErrorCode } {
  return BY_KIND[kind];
}

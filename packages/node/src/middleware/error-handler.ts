/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps domain error codes (LedgerError, StakingError, etc.)
 * to HTTP status codes.
 */

import type { Context } from "hono";
import { ZodError } from "zod";
import { LedgerError } from "@amoca/ledger";
import { StakingError } from "@amoca/staking";
import { GovernanceError } from "@amoca/governance";
import { AccessError } from "@amoca/access";
import { EventStoreError } from "@amoca/event-store";
import { createErrorEnvelope, HttpError } from "../types/error.js";
import type { ErrorStatus } from "../types/error.js";
import { formatZodErrors } from "./validate.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Readonly<Record<string, ErrorStatus>> = {
  // Authorization
  UNAUTHORIZED: 403,

  // Malformed arguments
  INVALID_AMOUNT: 400,
  INVALID_ADDRESS: 400,
  INVALID_DURATION: 400,
  INVALID_RATE: 400,
  INVALID_WEIGHT: 400,
  INVALID_LEVEL: 400,
  INVALID_EXPIRATION: 400,
  INVALID_DATA_ID: 400,
  INVALID_STREAM_ID: 400,

  // Missing records
  COIN_NOT_FOUND: 404,
  STAKE_NOT_FOUND: 404,
  POOL_NOT_FOUND: 404,
  PROPOSAL_NOT_FOUND: 404,
  RIGHT_NOT_FOUND: 404,

  // State conflicts
  AUTHORITY_EXISTS: 409,
  POOL_EXISTS: 409,
  ALREADY_CLAIMED: 409,
  PROPOSAL_ALREADY_EXECUTED: 409,
  CONCURRENCY_CONFLICT: 409,

  // Business rules
  INSUFFICIENT_BALANCE: 422,
  ARITHMETIC_OVERFLOW: 422,
  ARITHMETIC_UNDERFLOW: 422,
  STAKE_NOT_MATURED: 422,
  VOTING_CLOSED: 422,
  WEIGHT_REJECTED: 422,
};

type DomainError = LedgerError | StakingError | GovernanceError | AccessError | EventStoreError;

function isDomainError(err: Error): err is DomainError {
  return (
    err instanceof LedgerError ||
    err instanceof StakingError ||
    err instanceof GovernanceError ||
    err instanceof AccessError ||
    err instanceof EventStoreError
  );
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 *
 * `onInternal` sees every error answered with 500.
 */
export function createErrorHandler(
  onInternal?: (err: Error) => void,
): (err: Error, c: Context) => Response {
  return (err, c) => {
    if (err instanceof HttpError) {
      return c.json(createErrorEnvelope(err.code, err.message, err.details), err.status);
    }

    if (err instanceof ZodError) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Request validation failed", {
          issues: formatZodErrors(err),
        }),
        400,
      );
    }

    if (isDomainError(err)) {
      const status = STATUS_MAP[err.code];
      if (status !== undefined) {
        return c.json(createErrorEnvelope(err.code, err.message), status);
      }
    }

    onInternal?.(err);
    // Don't leak internal details
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  };
}

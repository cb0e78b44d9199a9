/**
 * Error taxonomy.
 *
 * Every domain error carries a `code`. This module is the one place
 * that maps codes to the kind of failure reported to callers.
 */

import { GovernanceError } from "@ledgerkit/governance";
import { LedgerError } from "@ledgerkit/ledger";
import { ValidationError } from "@ledgerkit/validation";

// =============================================================================
// Process Errors
// =============================================================================

export type ProcessErrorCode = "MALFORMED_MESSAGE";

/**
 * Error raised by the host adapter itself (not the ledger or governance).
 */
export class ProcessError extends Error {
  public readonly code: ProcessErrorCode;

  constructor(code: ProcessErrorCode, message: string) {
    super(message);
    this.name = "ProcessError";
    this.code = code;
  }
}

// =============================================================================
// Code → Kind Mapping
// =============================================================================

export type ErrorKind =
  | "validation"
  | "authorization"
  | "state"
  | "conflict"
  | "not_found"
  | "internal";

const KIND_MAP: Readonly<Record<string, ErrorKind>> = {
  // Validation
  VALIDATION_FAILED: "validation",
  INVALID_SNAPSHOT: "validation",
  MALFORMED_MESSAGE: "validation",

  // Authorization
  UNAUTHORIZED: "authorization",
  UNAUTHORIZED_TARGET: "authorization",

  // Ledger state
  NO_BALANCE: "state",
  INSUFFICIENT_BALANCE: "state",
  NOT_INITIALIZED: "state",
  QUORUM_UNREACHABLE: "state",

  // Conflicts
  ALREADY_INITIALIZED: "conflict",
  SELF_TRANSFER: "conflict",
  ALREADY_APPROVED: "conflict",
  PROPOSAL_CLOSED: "conflict",
  MEMBER_EXISTS: "conflict",

  // Lookups
  PROPOSAL_NOT_FOUND: "not_found",
  MEMBER_NOT_FOUND: "not_found",
};

export interface ErrorDescriptor {
  readonly code: string;
  readonly kind: ErrorKind;
  readonly message: string;
}

type DomainError = ValidationError | LedgerError | GovernanceError | ProcessError;

function isDomainError(error: unknown): error is DomainError {
  return (
    error instanceof ValidationError ||
    error instanceof LedgerError ||
    error instanceof GovernanceError ||
    error instanceof ProcessError
  );
}

/**
 * Describe any thrown value. Unknown errors become INTERNAL_ERROR and
 * do not expose their message.
 */
export function describeError(error: unknown): ErrorDescriptor {
  if (isDomainError(error)) {
    return {
      code: error.code,
      kind: KIND_MAP[error.code] ?? "internal",
      message: error.message,
    };
  }

  return { code: "INTERNAL_ERROR", kind: "internal", message: "Internal error" };
}

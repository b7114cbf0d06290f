export type SaleDeskErrorCode =
  | "VALIDATION"
  | "AUTHORIZATION"
  | "NOT_FOUND"
  | "STATE"
  | "INSUFFICIENT_ALLOWANCE"
  | "CAPACITY_EXCEEDED"
  | "ORACLE"
  | "TRANSFER_FAILURE"
  | "REENTRANCY";

/**
 * Base class for every failure the sale system reports. The `code` is stable
 * and is what the HTTP layer and the CLI key off.
 */
export abstract class SaleDeskError extends Error {
  abstract readonly code: SaleDeskErrorCode;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends SaleDeskError {
  readonly code = "VALIDATION";
}

export class AuthorizationError extends SaleDeskError {
  readonly code = "AUTHORIZATION";
}

export class NotFoundError extends SaleDeskError {
  readonly code = "NOT_FOUND";
}

/** Sale is paused, not started yet, or already ended. */
export class StateError extends SaleDeskError {
  readonly code = "STATE";
}

export class InsufficientAllowanceError extends SaleDeskError {
  readonly code = "INSUFFICIENT_ALLOWANCE";

  constructor(
    readonly required: bigint,
    readonly allowance: bigint
  ) {
    super(`Allowance ${allowance} is below the required ${required}`);
  }
}

export class CapacityExceededError extends SaleDeskError {
  readonly code = "CAPACITY_EXCEEDED";

  constructor(
    readonly requested: bigint,
    readonly remaining: bigint
  ) {
    super(`Requested ${requested} exceeds the remaining ${remaining}`);
  }
}

export class OracleError extends SaleDeskError {
  readonly code = "ORACLE";
}

export class TransferFailureError extends SaleDeskError {
  readonly code = "TRANSFER_FAILURE";
}

export class ReentrancyError extends SaleDeskError {
  readonly code = "REENTRANCY";

  constructor() {
    super("Re-entrant call rejected: another operation is in flight");
  }
}

export function isSaleDeskError(err: unknown): err is SaleDeskError {
  return err instanceof SaleDeskError;
}

import type { TransitionResult } from "../types";

export enum ErrorKind {
  TIMEOUT = "Timeout",
  OPERATION_FAILED = "OperationFailed",
  VALIDATION = "Validation",
}

/**
 * The waiter gave up before the operation reached a terminal state.
 * The provider-side action keeps running.
 */
export class OperationTimeoutError extends Error {
  public readonly kind = ErrorKind.TIMEOUT;

  constructor(
    public readonly label: string,
    public readonly operationName: string,
    public readonly timeoutMs: number
  ) {
    super(
      `Timed out after ${timeoutMs / 1000}s waiting for ${label} (${operationName})`
    );
    this.name = "OperationTimeoutError";
  }
}

/**
 * The provider reported an error code on a completed operation.
 */
export class OperationFailedError extends Error {
  public readonly kind = ErrorKind.OPERATION_FAILED;

  constructor(
    message: string,
    public readonly code: string,
    public readonly operationName: string
  ) {
    super(message);
    this.name = "OperationFailedError";
  }
}

/**
 * A transition in a /set_state batch failed; the remaining instances were
 * not attempted.
 */
export class StateTransitionError extends Error {
  /** Kind of the cause; undefined when a collaborator call failed */
  public readonly kind: ErrorKind | undefined;

  constructor(
    public readonly cause: Error,
    public readonly completed: TransitionResult[]
  ) {
    super(cause.message);
    this.name = "StateTransitionError";
    this.kind =
      cause instanceof OperationTimeoutError ||
      cause instanceof OperationFailedError
        ? cause.kind
        : undefined;
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export class RequestValidationError extends Error {
  public readonly kind = ErrorKind.VALIDATION;

  constructor(public readonly issues: ValidationIssue[]) {
    super(issues.map((issue) => `${issue.path}: ${issue.message}`).join("; "));
    this.name = "RequestValidationError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}

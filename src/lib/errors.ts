/**
 * Trader error taxonomy. Everything the pipeline can fail with maps onto
 * one of these kinds; only ConnectivityError abandons a whole tick.
 */

export type TraderErrorKind =
  | "data_unavailable"
  | "risk_breach"
  | "validation_failure"
  | "broker_rejection"
  | "connectivity_loss";

export class TraderError extends Error {
  readonly kind: TraderErrorKind;

  constructor(kind: TraderErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TraderError";
    this.kind = kind;
  }
}

export class DataUnavailableError extends TraderError {
  constructor(message: string) {
    super("data_unavailable", message);
    this.name = "DataUnavailableError";
  }
}

export class RiskBreachError extends TraderError {
  constructor(message: string) {
    super("risk_breach", message);
    this.name = "RiskBreachError";
  }
}

export class ValidationError extends TraderError {
  readonly errors: string[];

  constructor(errors: string[]) {
    super("validation_failure", errors.join("; "));
    this.name = "ValidationError";
    this.errors = errors;
  }
}

export class BrokerRejectionError extends TraderError {
  readonly returnCode: number;

  constructor(operation: string, returnCode: number, reason: string) {
    super("broker_rejection", `${operation} rejected (${returnCode}): ${reason}`);
    this.name = "BrokerRejectionError";
    this.returnCode = returnCode;
  }
}

export class ConnectivityError extends TraderError {
  constructor(operation: string, cause: unknown) {
    super("connectivity_loss", `${operation} failed: ${errorMessage(cause)}`, { cause });
    this.name = "ConnectivityError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

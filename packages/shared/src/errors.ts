/**
 * Echo session errors.
 *
 * Every error names the runtime operation that failed and the status it
 * reported. The message is what the CLI prints on abnormal exit:
 *
 * ```
 * Error calling read_cb: end of file (EOF)
 * ```
 */

import {
  UV_EBUSY,
  statusDescription,
  statusFromError,
  statusName,
  type Status,
} from "./status.js";

export type EchoErrorKind = "init" | "mode" | "start" | "busy" | "write" | "runtime";

export abstract class EchoError extends Error {
  abstract readonly kind: EchoErrorKind;

  constructor(
    readonly operation: string,
    readonly status: Status,
  ) {
    super(`Error calling ${operation}: ${statusDescription(status)} (${statusName(status)})`);
  }

  get statusName(): string {
    return statusName(this.status);
  }

  get description(): string {
    return statusDescription(this.status);
  }
}

/** Binding a terminal handle failed. */
export class InitError extends EchoError {
  readonly name = "InitError";
  readonly kind = "init";
}

/** The input device could not switch to raw mode (not a terminal, permission denied). */
export class ModeError extends EchoError {
  readonly name = "ModeError";
  readonly kind = "mode";
}

/** Registering the read callbacks failed. */
export class StartError extends EchoError {
  readonly name = "StartError";
  readonly kind = "start";
}

/** A write was submitted while the single write request was still in flight. */
export class BusyError extends EchoError {
  readonly name = "BusyError";
  readonly kind = "busy";

  constructor(operation: string) {
    super(operation, UV_EBUSY);
  }
}

/** The runtime rejected a write submission synchronously. */
export class WriteError extends EchoError {
  readonly name = "WriteError";
  readonly kind = "write";
}

/** A negative status delivered to a callback, or a failed loop operation. */
export class RuntimeError extends EchoError {
  readonly name = "RuntimeError";
  readonly kind = "runtime";
}

export function isEchoError(error: unknown): error is EchoError {
  return error instanceof EchoError;
}

/**
 * Normalize anything thrown into an EchoError. Foreign errors become a
 * RuntimeError whose status is taken from their errno or code.
 */
export function toEchoError(error: unknown, operation: string): EchoError {
  if (isEchoError(error)) {
    return error;
  }
  return new RuntimeError(operation, statusFromError(error));
}

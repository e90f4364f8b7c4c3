/**
 * Bus Error Types
 *
 * Error taxonomy for the bus client:
 * - BusError: failures carrying a bus-assigned symbolic error name. Raised to
 *   synchronous callers, thrown by method handlers to produce an error reply,
 *   and synthesized for call timeouts.
 * - MessageValidationError / SignatureError: a message could not be built.
 * - HandlerRegistrationError: a handler entry is malformed.
 * - PollInterruptedError: a readiness poll was interrupted and must be retried.
 * - ReactorError: a fatal failure of the polling primitive.
 */

import type { ZodIssue } from 'zod';
import { ErrorNames } from '../protocol/types';

/**
 * Failure identified by a bus error name (e.g. org.freedesktop.DBus.Error.NoReply)
 */
export class BusError extends Error {
  /** Symbolic error name sent on or received from the bus */
  readonly errorName: string;
  /** Arguments of the error reply, when it carried any */
  readonly args: readonly unknown[];

  constructor(errorName: string, message?: string, args: readonly unknown[] = []) {
    super(message ?? errorName);
    this.name = 'BusError';
    this.errorName = errorName;
    this.args = args;
  }

  /**
   * Synthetic failure for a call whose timeout elapsed before a reply arrived
   */
  static noReply(member: string, timeoutMs: number): BusError {
    return new BusError(
      ErrorNames.NO_REPLY,
      `No reply to ${member} within ${timeoutMs}ms`
    );
  }

  static unknownMethod(member: string, iface: string | undefined, signature: string): BusError {
    const target = iface ? `${iface}.${member}` : member;
    return new BusError(
      ErrorNames.UNKNOWN_METHOD,
      `No handler for method ${target} with signature "${signature}"`
    );
  }

  static invalidArgs(message: string): BusError {
    return new BusError(ErrorNames.INVALID_ARGS, message);
  }
}

/**
 * A message header or payload failed validation at construction time
 */
export class MessageValidationError extends Error {
  readonly issues: readonly ZodIssue[];

  constructor(message: string, issues: readonly ZodIssue[] = []) {
    super(message);
    this.name = 'MessageValidationError';
    this.issues = issues;
  }
}

/**
 * A type signature string is malformed
 */
export class SignatureError extends Error {
  readonly signature: string;

  constructor(signature: string, reason: string) {
    super(`Invalid signature "${signature}": ${reason}`);
    this.name = 'SignatureError';
    this.signature = signature;
  }
}

/**
 * A handler entry cannot be registered (bad member, interface, path or
 * reply signature)
 */
export class HandlerRegistrationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HandlerRegistrationError';
  }
}

/**
 * A readiness poll was interrupted before it could complete (EINTR analogue).
 * The reactor retries the poll.
 */
export class PollInterruptedError extends Error {
  constructor(message = 'Poll interrupted') {
    super(message);
    this.name = 'PollInterruptedError';
  }
}

/**
 * Fatal reactor failure; propagates out of the loop
 */
export class ReactorError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ReactorError';
  }
}

/**
 * Operation attempted on a connection that is not open
 */
export class ConnectionClosedError extends BusError {
  constructor(operation: string) {
    super(ErrorNames.DISCONNECTED, `Cannot ${operation}: connection is closed`);
    this.name = 'ConnectionClosedError';
  }
}

/**
 * Type guard for bus errors
 */
export function isBusError(error: unknown): error is BusError {
  return error instanceof BusError;
}

/**
 * Render any thrown value for a log line
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.stack ?? `${error.name}: ${error.message}`;
  }
  return String(error);
}

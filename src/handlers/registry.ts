/**
 * Handler Registry
 *
 * One ordered handler chain. Inbound method calls and signals are matched
 * by member name (map lookup), then interface (exact, or any when the entry
 * names none), then object path (exact or glob). The first matching entry
 * in insertion order wins.
 *
 * Each matched message runs in its own task with its own HandlerContext,
 * so per-message state never leaks between concurrent dispatches. A method
 * call that matched gets exactly one reply:
 * - the handler's response on success
 * - an error named by a thrown BusError
 * - org.buslink.Error.UncaughtException for anything else
 * Signal handler failures are logged and never replied to.
 */

import { v4 as uuidv4 } from 'uuid';
import type { BusConnection } from '../connection/bus-connection';
import { BusError, HandlerRegistrationError } from '../errors/errors';
import type { BusMessage } from '../protocol/message';
import { InterfaceNameSchema, MemberNameSchema, ObjectPathSchema } from '../protocol/schemas';
import { isValidSignature } from '../protocol/signature';
import { ErrorNames, MessageType } from '../protocol/types';
import { compilePathPattern, isPathPattern, type PathMatcher } from './path-pattern';

// ============================================================================
// Types
// ============================================================================

/**
 * Per-dispatch context handed to every handler invocation
 */
export interface HandlerContext {
  readonly connection: BusConnection;
  readonly message: BusMessage;
  /** Set the method return payload; overrides a returned args array */
  setResponse(signature: string, args: readonly unknown[]): void;
}

/**
 * Method handlers may return the reply args (paired with the entry's
 * replySignature) or use ctx.setResponse
 */
export type MethodHandler = (
  ctx: HandlerContext
) => readonly unknown[] | void | Promise<readonly unknown[] | void>;

export type SignalHandler = (ctx: HandlerContext) => void | Promise<void>;

interface EntryBase {
  member: string;
  interface?: string;
  /** Exact object path or glob; omitted matches any path */
  path?: string;
}

export interface MethodEntry extends EntryBase {
  kind: 'method';
  /** Signature of the args the handler produces */
  replySignature?: string;
  handler: MethodHandler;
}

export interface SignalEntry extends EntryBase {
  kind: 'signal';
  handler: SignalHandler;
}

export type HandlerEntry = MethodEntry | SignalEntry;

export interface HandlerRegistration {
  readonly id: string;
  readonly entry: HandlerEntry;
}

interface CompiledRegistration extends HandlerRegistration {
  readonly matchesPath: PathMatcher;
}

export interface HandlerRegistryOptions {
  /** Label used in log lines */
  name?: string;
}

// ============================================================================
// HandlerRegistry
// ============================================================================

export class HandlerRegistry {
  readonly name: string;
  private readonly methods = new Map<string, CompiledRegistration[]>();
  private readonly signals = new Map<string, CompiledRegistration[]>();
  private readonly byId = new Map<string, CompiledRegistration>();

  constructor(entries: readonly HandlerEntry[] = [], options: HandlerRegistryOptions = {}) {
    this.name = options.name ?? 'handlers';
    for (const entry of entries) {
      this.register(entry);
    }
  }

  /**
   * Add an entry at the end of the chain
   *
   * @throws {HandlerRegistrationError} If a name, path or signature is malformed
   */
  register(entry: HandlerEntry): HandlerRegistration {
    validateEntry(entry);
    const registration: CompiledRegistration = {
      id: uuidv4(),
      entry,
      matchesPath: compilePathPattern(entry.path),
    };

    const table = entry.kind === 'method' ? this.methods : this.signals;
    const candidates = table.get(entry.member);
    if (candidates) {
      candidates.push(registration);
    } else {
      table.set(entry.member, [registration]);
    }
    this.byId.set(registration.id, registration);
    return { id: registration.id, entry };
  }

  unregister(id: string): boolean {
    const registration = this.byId.get(id);
    if (!registration) {
      return false;
    }
    this.byId.delete(id);

    const table = registration.entry.kind === 'method' ? this.methods : this.signals;
    const candidates = table.get(registration.entry.member) ?? [];
    const remaining = candidates.filter((candidate) => candidate.id !== id);
    if (remaining.length > 0) {
      table.set(registration.entry.member, remaining);
    } else {
      table.delete(registration.entry.member);
    }
    return true;
  }

  get size(): number {
    return this.byId.size;
  }

  /**
   * First registration structurally matching the message, if any
   */
  match(message: BusMessage): HandlerRegistration | undefined {
    return this.findMatch(message);
  }

  /**
   * Offer a message to this chain.
   *
   * @returns true if a registration matched; the handler then runs as its
   *   own task spawned on the connection
   */
  dispatch(connection: BusConnection, message: BusMessage): boolean {
    const registration = this.findMatch(message);
    if (!registration) {
      return false;
    }
    const { entry } = registration;
    if (entry.kind === 'method') {
      connection.spawn(() => this.invokeMethod(entry, connection, message));
    } else {
      connection.spawn(() => this.invokeSignal(entry, connection, message));
    }
    return true;
  }

  private findMatch(message: BusMessage): CompiledRegistration | undefined {
    let table: Map<string, CompiledRegistration[]>;
    if (message.type === MessageType.METHOD_CALL) {
      table = this.methods;
    } else if (message.type === MessageType.SIGNAL) {
      table = this.signals;
    } else {
      return undefined;
    }

    if (message.member === undefined) {
      return undefined;
    }
    const candidates = table.get(message.member);
    if (!candidates) {
      return undefined;
    }

    return candidates.find(
      (candidate) =>
        (candidate.entry.interface === undefined || candidate.entry.interface === message.interface) &&
        candidate.matchesPath(message.path)
    );
  }

  // ==========================================================================
  // Invocation
  // ==========================================================================

  private async invokeMethod(entry: MethodEntry, connection: BusConnection, message: BusMessage): Promise<void> {
    const state: { response?: { signature: string; args: readonly unknown[] } } = {};
    const ctx: HandlerContext = {
      connection,
      message,
      setResponse(signature, args) {
        state.response = { signature, args };
      },
    };

    let returned: unknown;
    try {
      returned = await entry.handler(ctx);
    } catch (error) {
      this.replyWithFailure(connection, message, error);
      return;
    }

    if (message.noReplyExpected) {
      return;
    }

    const { response } = state;
    const signature = response?.signature ?? entry.replySignature ?? '';
    const args: readonly unknown[] = response?.args ?? (Array.isArray(returned) ? returned : []);
    try {
      connection.sendMethodReturn(message, signature, args);
    } catch (error) {
      // The response could not be built (e.g. args do not fit the signature)
      this.replyWithFailure(connection, message, error);
    }
  }

  private replyWithFailure(connection: BusConnection, message: BusMessage, error: unknown): void {
    if (error instanceof BusError) {
      if (!message.noReplyExpected) {
        this.sendErrorSafely(connection, message, error.errorName, error.message);
      }
      return;
    }

    connection.reportHandlerError(message, error, `Uncaught exception in method call (${this.name})`);
    if (!message.noReplyExpected) {
      const text = error instanceof Error ? error.message : String(error);
      this.sendErrorSafely(connection, message, ErrorNames.UNCAUGHT_EXCEPTION, text);
    }
  }

  private sendErrorSafely(connection: BusConnection, message: BusMessage, errorName: string, text: string): void {
    try {
      connection.sendError(message, errorName, 's', [text]);
    } catch (error) {
      connection.reportHandlerError(message, error, `Could not send error reply ${errorName}`);
    }
  }

  private async invokeSignal(entry: SignalEntry, connection: BusConnection, message: BusMessage): Promise<void> {
    const ctx: HandlerContext = {
      connection,
      message,
      setResponse() {
        // Signals have no reply channel
      },
    };
    try {
      await entry.handler(ctx);
    } catch (error) {
      connection.reportHandlerError(message, error, `Uncaught exception in signal handler (${this.name})`);
    }
  }
}

// ============================================================================
// Validation
// ============================================================================

function validateEntry(entry: HandlerEntry): void {
  const problems: string[] = [];

  if (!MemberNameSchema.safeParse(entry.member).success) {
    problems.push(`member "${entry.member}" is not a valid member name`);
  }
  if (entry.interface !== undefined && !InterfaceNameSchema.safeParse(entry.interface).success) {
    problems.push(`interface "${entry.interface}" is not a valid interface name`);
  }
  if (entry.path !== undefined && !isPathPattern(entry.path) && !ObjectPathSchema.safeParse(entry.path).success) {
    problems.push(`path "${entry.path}" is neither an object path nor a pattern`);
  }
  if (entry.kind === 'method' && entry.replySignature !== undefined && !isValidSignature(entry.replySignature)) {
    problems.push(`reply signature "${entry.replySignature}" is malformed`);
  }

  if (problems.length > 0) {
    throw new HandlerRegistrationError(`Invalid ${entry.kind} handler: ${problems.join('; ')}`);
  }
}

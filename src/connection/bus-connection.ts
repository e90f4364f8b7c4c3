/**
 * Bus Connection
 *
 * Application-facing connection. Wraps a RawConnection, installs the event
 * loop adapter built by the given factory, routes inbound messages and
 * offers the call façade:
 * - callMethod(): fire-and-forget, or callback-on-reply with a timeout
 * - call() / callArgs(): await the correlated reply; error replies reject
 *   with BusError
 *
 * Routing, per inbound message:
 * - method returns and errors resolve pending calls by reply serial
 * - method calls are offered to each handler chain in order until one
 *   handles it; an unhandled call that expects a reply gets UnknownMethod
 *   (unless dispatch.unknownMethod is "ignore")
 * - signals are offered to every chain
 */

import { EventEmitter } from 'events';
import { getConfig } from '../config';
import { BusError, ConnectionClosedError, describeError } from '../errors/errors';
import type { HandlerRegistry } from '../handlers/registry';
import { scopedLogger } from '../logging/logger';
import type { EventLoopAdapter, LoopFactory } from '../loop/adapter';
import { BusMessage } from '../protocol/message';
import { ErrorNames, MessageType } from '../protocol/types';
import { PendingCallRegistry, type ReplyCallback } from './pending-calls';
import type { MessageFilter, RawConnection } from './types';

// ============================================================================
// Types
// ============================================================================

export interface CallOptions {
  destination?: string;
  path: string;
  /** Member name, or "interface.Member" when interface is omitted */
  member: string;
  interface?: string;
  signature?: string;
  args?: readonly unknown[];
  /** Reply timeout in milliseconds; null for none (default: calls.defaultTimeoutMs) */
  timeoutMs?: number | null;
}

export interface SignalOptions {
  path: string;
  /** Member name, or "interface.Member" when interface is omitted */
  member: string;
  interface?: string;
  signature?: string;
  args?: readonly unknown[];
  destination?: string;
}

/**
 * Runs one handler invocation as an independent task
 */
export type SpawnStrategy = (task: () => Promise<void>) => void;

export interface ConnectionSettings {
  defaultCallTimeoutMs: number | null;
  unknownMethod: 'reply' | 'ignore';
}

export interface BusConnectionOptions<L extends EventLoopAdapter> {
  loop: LoopFactory<L>;
  spawn?: SpawnStrategy;
  /** Overrides for values otherwise taken from the loaded configuration */
  config?: Partial<ConnectionSettings>;
}

export interface HandlerErrorEvent {
  message: BusMessage;
  error: unknown;
}

/**
 * Bus Connection Event Types
 */
export interface BusConnectionEvents {
  'handler-error': (event: HandlerErrorEvent) => void;
}

// ============================================================================
// BusConnection
// ============================================================================

export class BusConnection<L extends EventLoopAdapter = EventLoopAdapter> extends EventEmitter {
  private readonly loop: L;
  private readonly chains: HandlerRegistry[] = [];
  private readonly pendingCalls = new PendingCallRegistry();
  private readonly settings: ConnectionSettings;
  private readonly spawnTask: SpawnStrategy;
  private readonly filter: MessageFilter = (message) => this.route(message);

  constructor(
    private readonly raw: RawConnection,
    options: BusConnectionOptions<L>
  ) {
    super();
    this.settings = resolveSettings(options.config ?? {});
    this.spawnTask = options.spawn ?? ((task) => this.runDetached(task));
    this.loop = options.loop(raw);
    raw.setLoop(this.loop);
    raw.addFilter(this.filter);
  }

  get eventLoop(): L {
    return this.loop;
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Connect to the bus at `address`, or at bus.address from the configuration
   */
  async open(address?: string): Promise<void> {
    const target = address ?? getConfig().bus.address;
    if (!target) {
      throw new Error('No bus address given and none configured (bus.address)');
    }
    await this.raw.open(target);
    this.logger.info(`connected to ${target} as ${this.raw.getUniqueName() ?? '(anonymous)'}`);
  }

  /**
   * Flush queued output, fail every pending call with Disconnected and
   * release the loop registrations
   */
  close(): void {
    if (this.raw.isOpen()) {
      this.raw.flush();
    }
    const cancelled = this.pendingCalls.cancelAll(ErrorNames.DISCONNECTED, 'Connection closed');
    if (cancelled > 0) {
      this.logger.debug(`cancelled ${cancelled} pending call(s) on close`);
    }
    this.raw.close();
    this.loop.close?.();
  }

  isOpen(): boolean {
    return this.raw.isOpen();
  }

  getUniqueName(): string | undefined {
    return this.raw.getUniqueName();
  }

  /**
   * Write out everything queued for sending
   */
  flush(): void {
    this.raw.flush();
  }

  // ==========================================================================
  // Handler Chains
  // ==========================================================================

  addHandler(registry: HandlerRegistry): void {
    if (!this.chains.includes(registry)) {
      this.chains.push(registry);
    }
  }

  removeHandler(registry: HandlerRegistry): boolean {
    const index = this.chains.indexOf(registry);
    if (index === -1) {
      return false;
    }
    this.chains.splice(index, 1);
    return true;
  }

  get handlers(): readonly HandlerRegistry[] {
    return this.chains;
  }

  /**
   * Run a handler invocation with the configured spawn strategy
   */
  spawn(task: () => Promise<void>): void {
    this.spawnTask(task);
  }

  /**
   * Log a handler failure and emit 'handler-error'
   */
  reportHandlerError(message: BusMessage, error: unknown, context: string): void {
    this.logger.error(`${context} while handling ${message.describe()}:\n${describeError(error)}`);
    const event: HandlerErrorEvent = { message, error };
    this.emit('handler-error', event);
  }

  // ==========================================================================
  // Sending
  // ==========================================================================

  sendMethodReturn(call: BusMessage, signature?: string, args?: readonly unknown[]): number {
    this.ensureOpen('send method return');
    return this.raw.send(BusMessage.methodReturn(call, signature, args));
  }

  sendError(call: BusMessage, errorName: string, signature?: string, args?: readonly unknown[]): number {
    this.ensureOpen('send error');
    return this.raw.send(BusMessage.errorReply(call, errorName, signature, args));
  }

  /**
   * @throws {BusError} InvalidArgs when no interface is given or implied by the member
   */
  sendSignal(options: SignalOptions): number {
    this.ensureOpen('send signal');
    const { iface, member } = splitMember(options.member, options.interface);
    if (iface === undefined) {
      throw BusError.invalidArgs(`Signal ${member} needs an interface`);
    }
    return this.raw.send(
      BusMessage.signal({
        path: options.path,
        interface: iface,
        member,
        destination: options.destination,
        signature: options.signature,
        args: options.args,
      })
    );
  }

  // ==========================================================================
  // Call Façade
  // ==========================================================================

  /**
   * Send a method call. Without `onReply` the call is flagged
   * no-reply-expected; with it, `onReply` runs exactly once with the reply
   * or a synthetic NoReply error after the timeout.
   *
   * @returns Serial of the sent call
   */
  callMethod(options: CallOptions, onReply?: ReplyCallback): number {
    this.ensureOpen('call method');
    const { iface, member } = splitMember(options.member, options.interface);
    const message = BusMessage.methodCall({
      destination: options.destination,
      path: options.path,
      interface: iface,
      member,
      signature: options.signature,
      args: options.args,
      noReplyExpected: onReply === undefined,
    });

    const serial = this.raw.send(message);
    if (onReply) {
      const timeoutMs = options.timeoutMs === undefined ? this.settings.defaultCallTimeoutMs : options.timeoutMs;
      const target = iface === undefined ? member : `${iface}.${member}`;
      this.pendingCalls.register(serial, target, onReply, timeoutMs);
    }
    return serial;
  }

  /**
   * Send a method call and wait for its reply. Under a loop-owning adapter
   * the loop runs until the reply arrives.
   *
   * @throws {BusError} For an error reply, including NoReply on timeout
   */
  async call(options: CallOptions): Promise<BusMessage> {
    const reply = new Promise<BusMessage>((resolve) => {
      this.callMethod(options, resolve);
    });
    if (this.loop.drive) {
      await this.loop.drive(reply);
    }

    const message = await reply;
    if (message.type === MessageType.ERROR) {
      throw new BusError(message.errorName ?? ErrorNames.FAILED, message.errorMessage(), message.args);
    }
    return message;
  }

  /**
   * call() returning only the reply arguments
   */
  async callArgs(options: CallOptions): Promise<readonly unknown[]> {
    const reply = await this.call(options);
    return reply.args;
  }

  get pendingCallCount(): number {
    return this.pendingCalls.size;
  }

  // ==========================================================================
  // Routing
  // ==========================================================================

  private route(message: BusMessage): boolean {
    switch (message.type) {
      case MessageType.METHOD_RETURN:
      case MessageType.ERROR:
        return this.pendingCalls.resolve(message);
      case MessageType.METHOD_CALL:
        return this.routeCall(message);
      case MessageType.SIGNAL:
        return this.routeSignal(message);
    }
  }

  private routeCall(message: BusMessage): boolean {
    for (const chain of [...this.chains]) {
      if (chain.dispatch(this, message)) {
        return true;
      }
    }

    if (!message.expectsReply() || this.settings.unknownMethod === 'ignore') {
      this.logger.debug(`no handler for ${message.describe()}`);
      return false;
    }

    const error = BusError.unknownMethod(message.member ?? '', message.interface, message.signature);
    try {
      this.sendError(message, error.errorName, 's', [error.message]);
    } catch (sendError) {
      this.logger.warn(`could not send UnknownMethod reply: ${describeError(sendError)}`);
    }
    return true;
  }

  private routeSignal(message: BusMessage): boolean {
    let handled = false;
    for (const chain of [...this.chains]) {
      handled = chain.dispatch(this, message) || handled;
    }
    return handled;
  }

  private runDetached(task: () => Promise<void>): void {
    void task().catch((error: unknown) => {
      this.logger.error(`handler task failed:\n${describeError(error)}`);
    });
  }

  private ensureOpen(operation: string): void {
    if (!this.raw.isOpen()) {
      throw new ConnectionClosedError(operation);
    }
  }

  private get logger() {
    return scopedLogger('connection');
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Split "interface.Member" at the last dot unless an interface is given
 */
export function splitMember(member: string, iface?: string): { iface?: string; member: string } {
  if (iface !== undefined) {
    return { iface, member };
  }
  const dot = member.lastIndexOf('.');
  if (dot === -1) {
    return { member };
  }
  return { iface: member.slice(0, dot), member: member.slice(dot + 1) };
}

function resolveSettings(overrides: Partial<ConnectionSettings>): ConnectionSettings {
  if (overrides.defaultCallTimeoutMs !== undefined && overrides.unknownMethod !== undefined) {
    return { defaultCallTimeoutMs: overrides.defaultCallTimeoutMs, unknownMethod: overrides.unknownMethod };
  }
  const config = getConfig();
  return {
    defaultCallTimeoutMs:
      overrides.defaultCallTimeoutMs !== undefined ? overrides.defaultCallTimeoutMs : config.calls.defaultTimeoutMs,
    unknownMethod: overrides.unknownMethod ?? config.dispatch.unknownMethod,
  };
}

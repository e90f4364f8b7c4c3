/**
 * Pending Call Registry
 *
 * Correlates outstanding method-call serials with their continuations.
 * A pending call lives from the moment its call is sent until a reply with
 * a matching reply serial arrives or its timeout fires, whichever happens
 * first; the loser finds nothing to resolve and is dropped. The callback is
 * therefore invoked exactly once.
 */

import { BusError, describeError } from '../errors/errors';
import { scopedLogger } from '../logging/logger';
import { BusMessage } from '../protocol/message';
import { MessageType } from '../protocol/types';

export type ReplyCallback = (reply: BusMessage) => void;

interface PendingCall {
  serial: number;
  member: string;
  callback: ReplyCallback;
  timer?: NodeJS.Timeout;
}

export class PendingCallRegistry {
  private readonly pending = new Map<number, PendingCall>();

  /**
   * Register a continuation for a sent call.
   *
   * @param timeoutMs - Milliseconds before a synthetic NoReply error is
   *   delivered; null for no timeout
   * @throws {Error} If the serial already has a live pending call
   */
  register(serial: number, member: string, callback: ReplyCallback, timeoutMs: number | null): void {
    if (this.pending.has(serial)) {
      throw new Error(`Serial ${serial} already has a pending call`);
    }
    const call: PendingCall = { serial, member, callback };
    if (timeoutMs !== null) {
      call.timer = setTimeout(() => this.expire(serial, timeoutMs), timeoutMs);
    }
    this.pending.set(serial, call);
  }

  /**
   * Deliver a method return or error to its pending call.
   *
   * @returns false if no call was waiting (late or unsolicited reply)
   */
  resolve(reply: BusMessage): boolean {
    const call = reply.replySerial === undefined ? undefined : this.take(reply.replySerial);
    if (!call) {
      this.logger.debug(`dropping reply with no pending call: ${reply.describe()}`);
      return false;
    }
    this.deliver(call, reply);
    return true;
  }

  /**
   * Fail every pending call, e.g. when the connection closes
   */
  cancelAll(errorName: string, text: string): number {
    const calls = [...this.pending.values()];
    for (const call of calls) {
      this.take(call.serial);
      this.deliver(call, syntheticError(call.serial, errorName, text));
    }
    return calls.length;
  }

  has(serial: number): boolean {
    return this.pending.has(serial);
  }

  get size(): number {
    return this.pending.size;
  }

  private expire(serial: number, timeoutMs: number): void {
    const call = this.take(serial);
    if (!call) {
      return;
    }
    const error = BusError.noReply(call.member, timeoutMs);
    this.deliver(call, syntheticError(serial, error.errorName, error.message));
  }

  private take(serial: number): PendingCall | undefined {
    const call = this.pending.get(serial);
    if (!call) {
      return undefined;
    }
    this.pending.delete(serial);
    if (call.timer) {
      clearTimeout(call.timer);
    }
    return call;
  }

  private deliver(call: PendingCall, reply: BusMessage): void {
    try {
      call.callback(reply);
    } catch (error) {
      this.logger.error(`reply callback for ${call.member} (serial ${call.serial}) failed:\n${describeError(error)}`);
    }
  }

  private get logger() {
    return scopedLogger('calls');
  }
}

/**
 * Locally generated error reply for a call that got no real one
 */
function syntheticError(serial: number, errorName: string, text: string): BusMessage {
  return new BusMessage({
    type: MessageType.ERROR,
    errorName,
    replySerial: serial,
    signature: 's',
    args: [text],
  });
}

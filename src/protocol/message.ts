/**
 * Bus Message
 *
 * Immutable request/response/signal unit. Headers are validated on
 * construction; the argument payload is checked for arity against its
 * signature. The serial is stamped by the connection when the message is
 * sent, which yields a new message rather than mutating this one.
 */

import { MessageValidationError, SignatureError } from '../errors/errors';
import { MessageHeaderSchema } from './schemas';
import { splitSignature } from './signature';
import { MessageType, type MessageInit } from './types';

export interface MethodCallInit {
  path: string;
  member: string;
  interface?: string;
  destination?: string;
  signature?: string;
  args?: readonly unknown[];
  noReplyExpected?: boolean;
}

export interface SignalInit {
  path: string;
  interface: string;
  member: string;
  destination?: string;
  signature?: string;
  args?: readonly unknown[];
}

export class BusMessage {
  readonly type: MessageType;
  readonly path?: string;
  readonly interface?: string;
  readonly member?: string;
  readonly errorName?: string;
  readonly destination?: string;
  readonly sender?: string;
  readonly serial?: number;
  readonly replySerial?: number;
  readonly noReplyExpected: boolean;
  readonly signature: string;
  readonly args: readonly unknown[];

  constructor(init: MessageInit) {
    const parsed = MessageHeaderSchema.safeParse({
      type: init.type,
      path: init.path,
      interface: init.interface,
      member: init.member,
      errorName: init.errorName,
      destination: init.destination,
      sender: init.sender,
      serial: init.serial,
      replySerial: init.replySerial,
      noReplyExpected: init.noReplyExpected
    });
    if (!parsed.success) {
      const details = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || 'header'}: ${issue.message}`)
        .join('; ');
      throw new MessageValidationError(`Invalid ${init.type} message: ${details}`, parsed.error.issues);
    }

    const signature = init.signature ?? '';
    const args = init.args ?? [];
    checkPayload(signature, args);

    const header = parsed.data;
    this.type = header.type;
    this.path = header.path;
    this.interface = header.interface;
    this.member = header.member;
    this.errorName = header.errorName;
    this.destination = header.destination;
    this.sender = header.sender;
    this.serial = header.serial;
    this.replySerial = header.replySerial;
    this.noReplyExpected = header.noReplyExpected ?? false;
    this.signature = signature;
    this.args = Object.freeze([...args]);
    Object.freeze(this);
  }

  // ==========================================================================
  // Factories
  // ==========================================================================

  static methodCall(init: MethodCallInit): BusMessage {
    return new BusMessage({ type: MessageType.METHOD_CALL, ...init });
  }

  /**
   * Build the return for a received method call
   */
  static methodReturn(call: BusMessage, signature?: string, args?: readonly unknown[]): BusMessage {
    return new BusMessage({
      type: MessageType.METHOD_RETURN,
      replySerial: requireSerial(call),
      destination: call.sender,
      signature,
      args
    });
  }

  /**
   * Build an error reply for a received method call
   */
  static errorReply(
    call: BusMessage,
    errorName: string,
    signature?: string,
    args?: readonly unknown[]
  ): BusMessage {
    return new BusMessage({
      type: MessageType.ERROR,
      errorName,
      replySerial: requireSerial(call),
      destination: call.sender,
      signature,
      args
    });
  }

  static signal(init: SignalInit): BusMessage {
    return new BusMessage({ type: MessageType.SIGNAL, ...init });
  }

  // ==========================================================================
  // Accessors
  // ==========================================================================

  /**
   * Copy of this message stamped with the serial (and sender) assigned on send
   */
  withSerial(serial: number, sender?: string): BusMessage {
    return new BusMessage({ ...this.toInit(), serial, sender: sender ?? this.sender });
  }

  isReply(): boolean {
    return this.type === MessageType.METHOD_RETURN || this.type === MessageType.ERROR;
  }

  expectsReply(): boolean {
    return this.type === MessageType.METHOD_CALL && !this.noReplyExpected;
  }

  /**
   * First string argument of an error reply, conventionally its description
   */
  errorMessage(): string | undefined {
    const first = this.args[0];
    return this.type === MessageType.ERROR && typeof first === 'string' ? first : undefined;
  }

  toInit(): MessageInit {
    return {
      type: this.type,
      path: this.path,
      interface: this.interface,
      member: this.member,
      errorName: this.errorName,
      destination: this.destination,
      sender: this.sender,
      serial: this.serial,
      replySerial: this.replySerial,
      noReplyExpected: this.noReplyExpected,
      signature: this.signature,
      args: this.args
    };
  }

  /**
   * One-line description for log output
   */
  describe(): string {
    const parts: string[] = [this.type];
    if (this.serial !== undefined) parts.push(`serial=${this.serial}`);
    if (this.replySerial !== undefined) parts.push(`reply_serial=${this.replySerial}`);
    if (this.path) parts.push(`path=${this.path}`);
    if (this.interface) parts.push(`interface=${this.interface}`);
    if (this.member) parts.push(`member=${this.member}`);
    if (this.errorName) parts.push(`error_name=${this.errorName}`);
    if (this.sender) parts.push(`sender=${this.sender}`);
    if (this.destination) parts.push(`destination=${this.destination}`);
    return parts.join(' ');
  }
}

function checkPayload(signature: string, args: readonly unknown[]): void {
  let types: string[];
  try {
    types = splitSignature(signature);
  } catch (error) {
    if (error instanceof SignatureError) {
      throw new MessageValidationError(error.message);
    }
    throw error;
  }
  if (types.length !== args.length) {
    throw new MessageValidationError(
      `Signature "${signature}" describes ${types.length} argument(s) but ${args.length} given`
    );
  }
}

function requireSerial(call: BusMessage): number {
  if (call.serial === undefined) {
    throw new MessageValidationError(`Cannot reply to a message that was never sent (${call.describe()})`);
  }
  return call.serial;
}

/**
 * Handler Registry Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { BusConnection, type HandlerErrorEvent } from '../../src/connection/bus-connection';
import { BusError, HandlerRegistrationError } from '../../src/errors/errors';
import { defineHandlers, method, signalHandler } from '../../src/handlers/handler-set';
import { HandlerRegistry } from '../../src/handlers/registry';
import { hostLoop } from '../../src/loop/factories';
import { BusMessage, type MethodCallInit } from '../../src/protocol/message';
import { ErrorNames, MessageType } from '../../src/protocol/types';
import { MemoryBus, type MemoryConnection } from '../support/memory-bus';

const CALLER = ':1.99';
const PATH = '/org/example/Echo';
const IFACE = 'org.example.Echo';

let serial = 100;

function incomingCall(member: string, init: Partial<MethodCallInit> = {}): BusMessage {
  return BusMessage.methodCall({ path: PATH, member, ...init }).withSerial(++serial, CALLER);
}

function incomingSignal(member: string, path = PATH): BusMessage {
  return BusMessage.signal({ path, interface: IFACE, member }).withSerial(++serial, CALLER);
}

describe('HandlerRegistry', () => {
  let raw: MemoryConnection;
  let connection: BusConnection;
  let tasks: Promise<void>[];
  let handlerErrors: HandlerErrorEvent[];

  beforeEach(async () => {
    const bus = new MemoryBus();
    raw = bus.connection();
    tasks = [];
    handlerErrors = [];
    connection = new BusConnection(raw, {
      loop: hostLoop(bus.hub),
      spawn: (task) => {
        tasks.push(task());
      },
      config: { defaultCallTimeoutMs: null, unknownMethod: 'reply' },
    });
    connection.on('handler-error', (event: HandlerErrorEvent) => handlerErrors.push(event));
    await connection.open(bus.address);
  });

  afterEach(() => {
    connection.close();
  });

  async function settle(): Promise<void> {
    await Promise.all(tasks);
  }

  function repliesTo(call: BusMessage): BusMessage[] {
    return raw.sent.filter((message) => message.isReply() && message.replySerial === call.serial);
  }

  describe('matching', () => {
    it('should match by member, interface and path', () => {
      const registry = defineHandlers([method('Echo', () => undefined, { interface: IFACE, path: PATH })]);

      expect(registry.match(incomingCall('Echo', { interface: IFACE }))).toBeDefined();
      expect(registry.match(incomingCall('Echo', { interface: 'org.example.Other' }))).toBeUndefined();
      expect(registry.match(incomingCall('Echo', { interface: IFACE, path: '/elsewhere' }))).toBeUndefined();
      expect(registry.match(incomingCall('Other', { interface: IFACE }))).toBeUndefined();
    });

    it('should treat an entry without interface as matching any interface', () => {
      const registry = defineHandlers([method('Echo', () => undefined)]);

      expect(registry.match(incomingCall('Echo'))).toBeDefined();
      expect(registry.match(incomingCall('Echo', { interface: 'org.example.Anything' }))).toBeDefined();
    });

    it('should prefer the first structurally matching entry', () => {
      const specific = method('Echo', () => undefined, { path: '/foo/bar' });
      const glob = method('Echo', () => undefined, { path: '/foo/*' });
      const registry = defineHandlers([specific, glob]);

      expect(registry.match(incomingCall('Echo', { path: '/foo/bar' }))?.entry).toBe(specific);
      expect(registry.match(incomingCall('Echo', { path: '/foo/baz' }))?.entry).toBe(glob);
    });

    it('should keep methods and signals apart', () => {
      const registry = defineHandlers([signalHandler('Changed', () => undefined)]);

      expect(registry.match(incomingCall('Changed'))).toBeUndefined();
      expect(registry.match(incomingSignal('Changed'))).toBeDefined();
    });

    it('should report replies as unhandled', () => {
      const registry = defineHandlers([method('Echo', () => undefined)]);
      const reply = BusMessage.methodReturn(incomingCall('Echo'));

      expect(registry.dispatch(connection, reply)).toBe(false);
      expect(tasks).toHaveLength(0);
    });
  });

  describe('registration', () => {
    it('should assign ids and unregister by id', () => {
      const registry = new HandlerRegistry([], { name: 'echo' });
      const registration = registry.register(method('Echo', () => undefined));

      expect(registration.id).toMatch(/^[0-9a-f-]{36}$/);
      expect(registry.size).toBe(1);

      expect(registry.unregister(registration.id)).toBe(true);
      expect(registry.unregister(registration.id)).toBe(false);
      expect(registry.size).toBe(0);
      expect(registry.match(incomingCall('Echo'))).toBeUndefined();
    });

    it('should keep the other entries of a member when one is unregistered', () => {
      const registry = new HandlerRegistry();
      const first = registry.register(method('Echo', () => undefined, { path: '/a' }));
      const second = registry.register(method('Echo', () => undefined, { path: '/b' }));

      registry.unregister(first.id);

      expect(registry.match(incomingCall('Echo', { path: '/b' }))?.id).toBe(second.id);
    });

    it('should reject malformed entries', () => {
      expect(() => defineHandlers([method('not a member', () => undefined)])).toThrow(HandlerRegistrationError);
      expect(() => defineHandlers([method('Echo', () => undefined, { interface: 'single' })])).toThrow(
        /interface "single" is not a valid interface name/
      );
      expect(() => defineHandlers([method('Echo', () => undefined, { path: 'relative' })])).toThrow(
        /neither an object path nor a pattern/
      );
      expect(() => defineHandlers([method('Echo', () => undefined, { replySignature: '(i' })])).toThrow(
        /reply signature "\(i" is malformed/
      );
    });
  });

  describe('method calls', () => {
    it('should reply with the returned args and the declared signature', async () => {
      const registry = defineHandlers([method('Echo', ({ message }) => message.args, { replySignature: 'i' })]);
      const call = incomingCall('Echo', { signature: 'i', args: [42] });

      expect(registry.dispatch(connection, call)).toBe(true);
      await settle();

      const replies = repliesTo(call);
      expect(replies).toHaveLength(1);
      expect(replies[0].type).toBe(MessageType.METHOD_RETURN);
      expect(replies[0].signature).toBe('i');
      expect(replies[0].args).toEqual([42]);
      expect(replies[0].destination).toBe(CALLER);
    });

    it('should send an empty return when the handler returns nothing', async () => {
      const registry = defineHandlers([method('Ping', () => undefined)]);
      const call = incomingCall('Ping');

      registry.dispatch(connection, call);
      await settle();

      const [reply] = repliesTo(call);
      expect(reply.type).toBe(MessageType.METHOD_RETURN);
      expect(reply.signature).toBe('');
      expect(reply.args).toEqual([]);
    });

    it('should let setResponse override returned args', async () => {
      const registry = defineHandlers([
        method(
          'Echo',
          ({ setResponse }) => {
            setResponse('s', ['from context']);
            return [1];
          },
          { replySignature: 'i' }
        ),
      ]);
      const call = incomingCall('Echo');

      registry.dispatch(connection, call);
      await settle();

      const [reply] = repliesTo(call);
      expect(reply.signature).toBe('s');
      expect(reply.args).toEqual(['from context']);
    });

    it('should await async handlers before replying', async () => {
      const registry = defineHandlers([
        method(
          'Later',
          async () => {
            await new Promise((resolve) => setTimeout(resolve, 5));
            return ['done'];
          },
          { replySignature: 's' }
        ),
      ]);
      const call = incomingCall('Later');

      registry.dispatch(connection, call);
      expect(repliesTo(call)).toHaveLength(0);
      await settle();

      expect(repliesTo(call)[0].args).toEqual(['done']);
    });

    it('should turn a thrown BusError into an error reply with its name', async () => {
      const registry = defineHandlers([
        method('Divide', () => {
          throw new BusError('org.example.Error.DivisionByZero', 'cannot divide by zero');
        }),
      ]);
      const call = incomingCall('Divide');

      registry.dispatch(connection, call);
      await settle();

      const replies = repliesTo(call);
      expect(replies).toHaveLength(1);
      expect(replies[0].type).toBe(MessageType.ERROR);
      expect(replies[0].errorName).toBe('org.example.Error.DivisionByZero');
      expect(replies[0].args).toEqual(['cannot divide by zero']);
      expect(handlerErrors).toHaveLength(0);
    });

    it('should reply UncaughtException for any other failure and report it', async () => {
      const failure = new Error('boom');
      const registry = defineHandlers([
        method('Explode', () => {
          throw failure;
        }),
      ]);
      const call = incomingCall('Explode');

      registry.dispatch(connection, call);
      await settle();

      const replies = repliesTo(call);
      expect(replies).toHaveLength(1);
      expect(replies[0].errorName).toBe(ErrorNames.UNCAUGHT_EXCEPTION);
      expect(replies[0].args).toEqual(['boom']);
      expect(handlerErrors).toHaveLength(1);
      expect(handlerErrors[0].error).toBe(failure);
      expect(handlerErrors[0].message).toBe(call);
    });

    it('should reply with an error when the response does not fit its signature', async () => {
      const registry = defineHandlers([method('Mismatch', () => [1, 2], { replySignature: 'i' })]);
      const call = incomingCall('Mismatch');

      registry.dispatch(connection, call);
      await settle();

      const replies = repliesTo(call);
      expect(replies).toHaveLength(1);
      expect(replies[0].errorName).toBe(ErrorNames.UNCAUGHT_EXCEPTION);
      expect(replies[0].args).toEqual(['Signature "i" describes 1 argument(s) but 2 given']);
    });

    it('should send nothing for calls flagged no-reply-expected', async () => {
      const registry = defineHandlers([
        method('Notify', () => ['ignored'], { replySignature: 's' }),
        method('Fail', () => {
          throw new BusError('org.example.Error.Failed');
        }),
      ]);
      const notify = incomingCall('Notify', { noReplyExpected: true });
      const fail = incomingCall('Fail', { noReplyExpected: true });

      registry.dispatch(connection, notify);
      registry.dispatch(connection, fail);
      await settle();

      expect(repliesTo(notify)).toHaveLength(0);
      expect(repliesTo(fail)).toHaveLength(0);
    });

    it('should give each dispatch its own context', async () => {
      const gates = new Map<number, () => void>();
      const registry = defineHandlers([
        method('Slow', async ({ message, setResponse }) => {
          const key = Number(message.args[0]);
          await new Promise<void>((resolve) => gates.set(key, resolve));
          setResponse('i', [key]);
        }),
      ]);
      const first = incomingCall('Slow', { signature: 'i', args: [1] });
      const second = incomingCall('Slow', { signature: 'i', args: [2] });

      registry.dispatch(connection, first);
      registry.dispatch(connection, second);
      gates.get(2)?.();
      gates.get(1)?.();
      await settle();

      expect(repliesTo(first)[0].args).toEqual([1]);
      expect(repliesTo(second)[0].args).toEqual([2]);
    });
  });

  describe('signals', () => {
    it('should invoke the handler and never reply', async () => {
      const seen: string[] = [];
      const registry = defineHandlers([
        signalHandler('Changed', ({ message }) => {
          seen.push(message.path ?? '');
        }),
      ]);
      const signal = incomingSignal('Changed', '/org/example/Thing');

      expect(registry.dispatch(connection, signal)).toBe(true);
      await settle();

      expect(seen).toEqual(['/org/example/Thing']);
      expect(raw.sent).toHaveLength(0);
    });

    it('should report a failing signal handler without replying', async () => {
      const registry = defineHandlers([
        signalHandler('Changed', () => {
          throw new BusError('org.example.Error.Ignored');
        }),
      ]);

      registry.dispatch(connection, incomingSignal('Changed'));
      await settle();

      expect(raw.sent).toHaveLength(0);
      expect(handlerErrors).toHaveLength(1);
    });
  });
});

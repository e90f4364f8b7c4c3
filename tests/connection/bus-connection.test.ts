/**
 * Bus Connection Tests
 *
 * Client and server connections on an in-process bus, run once under the
 * polling reactor and once under the Node host loop.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  BusConnection,
  splitMember,
  type ConnectionSettings,
  type HandlerErrorEvent,
} from '../../src/connection/bus-connection';
import { BusError, ConnectionClosedError } from '../../src/errors/errors';
import { defineHandlers, method, signalHandler } from '../../src/handlers/handler-set';
import type { LoopFactory } from '../../src/loop/adapter';
import { hostLoop, pollingLoop } from '../../src/loop/factories';
import { PollingReactor } from '../../src/loop/polling-reactor';
import type { BusMessage } from '../../src/protocol/message';
import { ErrorNames, MessageType } from '../../src/protocol/types';
import { MemoryBus, type MemoryConnection } from '../support/memory-bus';

const PATH = '/org/example/Echo';
const IFACE = 'org.example.Echo';

const SETTINGS: ConnectionSettings = { defaultCallTimeoutMs: 2000, unknownMethod: 'reply' };

interface AdapterCase {
  name: string;
  loop(bus: MemoryBus): LoopFactory;
}

const adapters: AdapterCase[] = [
  { name: 'polling reactor', loop: (bus) => pollingLoop(bus.hub, { defaultPollTimeoutMs: 50 }) },
  { name: 'host loop', loop: (bus) => hostLoop(bus.hub) },
];

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Keep a connection's loop turning until `until` settles
 */
async function pump(connection: BusConnection, until: Promise<unknown>): Promise<void> {
  const loop = connection.eventLoop;
  if (loop.drive) {
    await loop.drive(until);
  }
  await until;
}

/**
 * Run a reactor-driven connection in the background
 *
 * @returns Function that stops it
 */
function serve(connection: BusConnection): () => Promise<void> {
  const loop = connection.eventLoop;
  if (!(loop instanceof PollingReactor)) {
    return async () => undefined;
  }
  const running = loop.run();
  return async () => {
    loop.stop();
    await running;
  };
}

function callSerial(raw: MemoryConnection, member: string): number | undefined {
  return raw.sent.find((message) => message.type === MessageType.METHOD_CALL && message.member === member)?.serial;
}

async function expectBusError(pending: Promise<unknown>): Promise<BusError> {
  const error = await pending.then(
    () => undefined,
    (caught: unknown) => caught
  );
  if (!(error instanceof BusError)) {
    throw new Error(`expected a BusError, got ${String(error)}`);
  }
  return error;
}

describe('splitMember', () => {
  it('should split a dotted member at the last dot', () => {
    expect(splitMember('org.example.Echo.Ping')).toEqual({ iface: 'org.example.Echo', member: 'Ping' });
  });

  it('should leave a plain member alone', () => {
    expect(splitMember('Ping')).toEqual({ member: 'Ping' });
  });

  it('should prefer an explicit interface', () => {
    expect(splitMember('Ping', 'org.example.Other')).toEqual({ iface: 'org.example.Other', member: 'Ping' });
  });
});

describe.each(adapters)('BusConnection over the $name', ({ loop }) => {
  let bus: MemoryBus;
  let serverRaw: MemoryConnection;
  let clientRaw: MemoryConnection;
  let server: BusConnection;
  let client: BusConnection;
  let serverName: string;
  let serverErrors: HandlerErrorEvent[];
  let stopServer: () => Promise<void>;

  beforeEach(async () => {
    bus = new MemoryBus();
    serverRaw = bus.connection();
    clientRaw = bus.connection();
    server = new BusConnection(serverRaw, { loop: loop(bus), config: SETTINGS });
    client = new BusConnection(clientRaw, { loop: loop(bus), config: SETTINGS });
    await server.open(bus.address);
    await client.open(bus.address);
    serverName = server.getUniqueName() ?? '';

    serverErrors = [];
    server.on('handler-error', (event: HandlerErrorEvent) => serverErrors.push(event));
    server.addHandler(
      defineHandlers(
        [
          method('Echo', ({ message, setResponse }) => setResponse(message.signature, message.args), {
            interface: IFACE,
          }),
          method('Divide', ({ message }) => {
            const [a, b] = message.args;
            if (b === 0) {
              throw new BusError('org.example.Error.DivisionByZero', 'cannot divide by zero');
            }
            return [Number(a) / Number(b)];
          }, { replySignature: 'd' }),
          method('Explode', () => {
            throw new Error('boom');
          }),
          method('Slow', async () => {
            await sleep(150);
            return ['late'];
          }, { replySignature: 's' }),
          method(
            'Relay',
            ({ connection, message }) =>
              connection.callArgs({
                destination: connection.getUniqueName(),
                path: PATH,
                member: `${IFACE}.Echo`,
                signature: message.signature,
                args: message.args,
              }),
            { replySignature: 'i' }
          ),
        ],
        { name: 'echo-service' }
      )
    );
    stopServer = serve(server);
  });

  afterEach(async () => {
    await stopServer();
    client.close();
    server.close();
  });

  function echo(signature: string, args: readonly unknown[]): Promise<readonly unknown[]> {
    return client.callArgs({ destination: serverName, path: PATH, member: `${IFACE}.Echo`, signature, args });
  }

  describe('round trip', () => {
    it('should assign unique names in connection order', () => {
      expect(server.getUniqueName()).toBe(':1.1');
      expect(client.getUniqueName()).toBe(':1.2');
    });

    it('should echo a scalar', async () => {
      expect(await echo('i', [42])).toEqual([42]);
    });

    it('should echo a nested structure', async () => {
      const args = [['name', [1, true]]];
      expect(await echo('(s(ib))', args)).toEqual(args);
    });

    it('should echo a collection', async () => {
      expect(await echo('as', [['a', 'b', 'c']])).toEqual([['a', 'b', 'c']]);
    });

    it('should echo a key-value mapping', async () => {
      const mapping = { volume: 11, muted: false };
      expect(await echo('a{sv}', [mapping])).toEqual([mapping]);
    });

    it('should return the reply message from call()', async () => {
      const reply: BusMessage = await client.call({
        destination: serverName,
        path: PATH,
        member: 'Divide',
        signature: 'ii',
        args: [9, 3],
      });

      expect(reply.type).toBe(MessageType.METHOD_RETURN);
      expect(reply.signature).toBe('d');
      expect(reply.args).toEqual([3]);
      expect(reply.sender).toBe(serverName);
    });

    it('should resolve concurrent calls whose replies arrive out of order', async () => {
      const started = Date.now();

      const [slow, fast] = await Promise.all([
        client.callArgs({ destination: serverName, path: PATH, member: 'Slow', timeoutMs: 1000 }),
        client.callArgs({ destination: serverName, path: PATH, member: 'Divide', signature: 'ii', args: [8, 2] }),
      ]);

      expect(slow).toEqual(['late']);
      expect(fast).toEqual([4]);
      expect(Date.now() - started).toBeLessThan(1000);
      const replyIndex = (member: string) =>
        bus.traffic.findIndex((message) => message.isReply() && message.replySerial === callSerial(clientRaw, member));
      expect(replyIndex('Divide')).toBeLessThan(replyIndex('Slow'));
      expect(client.pendingCallCount).toBe(0);
    });

    it('should let a handler call out while it is being dispatched', async () => {
      const args = await client.callArgs({
        destination: serverName,
        path: PATH,
        member: 'Relay',
        signature: 'i',
        args: [7],
      });

      expect(args).toEqual([7]);
    });
  });

  describe('errors', () => {
    it('should reject with UnknownMethod when no handler matches', async () => {
      const error = await expectBusError(
        client.call({ destination: serverName, path: PATH, member: `${IFACE}.Missing` })
      );

      expect(error.errorName).toBe(ErrorNames.UNKNOWN_METHOD);
      expect(error.message).toBe('No handler for method org.example.Echo.Missing with signature ""');
      const serial = callSerial(clientRaw, 'Missing');
      expect(serial === undefined ? [] : bus.repliesTo(serial)).toHaveLength(1);
    });

    it('should reject with the name a handler declared', async () => {
      const error = await expectBusError(
        client.call({ destination: serverName, path: PATH, member: 'Divide', signature: 'ii', args: [1, 0] })
      );

      expect(error.errorName).toBe('org.example.Error.DivisionByZero');
      expect(error.message).toBe('cannot divide by zero');
      expect(error.args).toEqual(['cannot divide by zero']);
    });

    it('should reject with UncaughtException and report the failure on the server', async () => {
      const error = await expectBusError(client.call({ destination: serverName, path: PATH, member: 'Explode' }));

      expect(error.errorName).toBe(ErrorNames.UNCAUGHT_EXCEPTION);
      expect(error.message).toBe('boom');
      expect(serverErrors).toHaveLength(1);
      expect(serverErrors[0].message.member).toBe('Explode');
    });

    it('should reject with ServiceUnknown for a name nobody owns', async () => {
      const error = await expectBusError(client.call({ destination: ':1.404', path: PATH, member: 'Echo' }));

      expect(error.errorName).toBe(ErrorNames.SERVICE_UNKNOWN);
    });

    it('should reject with NoReply on timeout and drop the late reply', async () => {
      const error = await expectBusError(
        client.call({ destination: serverName, path: PATH, member: 'Slow', timeoutMs: 30 })
      );
      expect(error.errorName).toBe(ErrorNames.NO_REPLY);
      expect(error.message).toBe('No reply to Slow within 30ms');

      await pump(client, sleep(250));

      const serial = callSerial(clientRaw, 'Slow');
      expect(serial === undefined ? [] : bus.repliesTo(serial).map((reply) => reply.args)).toEqual([['late']]);
      expect(client.pendingCallCount).toBe(0);
    });
  });

  describe('handler chains', () => {
    it('should send exactly one reply when several chains match', async () => {
      server.addHandler(defineHandlers([method('Claim', () => ['first'], { replySignature: 's' })]));
      server.addHandler(defineHandlers([method('Claim', () => ['second'], { replySignature: 's' })]));

      const args = await client.callArgs({ destination: serverName, path: PATH, member: 'Claim' });

      expect(args).toEqual(['first']);
      await pump(client, sleep(30));
      const serial = callSerial(clientRaw, 'Claim');
      expect(serial === undefined ? [] : bus.repliesTo(serial)).toHaveLength(1);
    });

    it('should stop offering calls to a removed chain', async () => {
      const chain = defineHandlers([method('Temporary', () => undefined)]);
      server.addHandler(chain);
      expect(server.removeHandler(chain)).toBe(true);
      expect(server.removeHandler(chain)).toBe(false);

      const error = await expectBusError(client.call({ destination: serverName, path: PATH, member: 'Temporary' }));
      expect(error.errorName).toBe(ErrorNames.UNKNOWN_METHOD);
    });

    it('should offer signals to every chain', async () => {
      const seen: string[] = [];
      let delivered: () => void = () => undefined;
      const both = new Promise<void>((resolve) => {
        delivered = resolve;
      });
      const record = (label: string) => ({ message }: { message: BusMessage }) => {
        seen.push(`${label}:${String(message.args[0])}`);
        if (seen.length === 2) {
          delivered();
        }
      };
      client.addHandler(defineHandlers([signalHandler('Changed', record('a'), { interface: IFACE })]));
      client.addHandler(defineHandlers([signalHandler('Changed', record('b'), { path: '/org/example/*' })]));

      server.sendSignal({ path: PATH, member: `${IFACE}.Changed`, signature: 's', args: ['on'] });
      await pump(client, both);

      expect(seen.sort()).toEqual(['a:on', 'b:on']);
      expect(serverRaw.sent.filter((message) => message.isReply())).toHaveLength(0);
    });
  });

  describe('fire and forget', () => {
    it('should send without a reply expectation and get no reply', async () => {
      let received: () => void = () => undefined;
      const handled = new Promise<void>((resolve) => {
        received = resolve;
      });
      server.addHandler(
        defineHandlers([
          method('Notify', () => {
            received();
            return ['ignored'];
          }, { replySignature: 's' }),
        ])
      );

      const serial = client.callMethod({ destination: serverName, path: PATH, member: 'Notify' });
      await pump(client, handled);
      await pump(client, sleep(30));

      expect(clientRaw.sent.find((message) => message.serial === serial)?.noReplyExpected).toBe(true);
      expect(bus.repliesTo(serial)).toHaveLength(0);
      expect(client.pendingCallCount).toBe(0);
    });

    it('should invoke the callback exactly once with the reply', async () => {
      const replies: BusMessage[] = [];
      const done = new Promise<void>((resolve) => {
        client.callMethod(
          { destination: serverName, path: PATH, member: `${IFACE}.Echo`, signature: 's', args: ['hi'] },
          (reply) => {
            replies.push(reply);
            resolve();
          }
        );
      });

      await pump(client, done);
      await pump(client, sleep(30));

      expect(replies).toHaveLength(1);
      expect(replies[0].args).toEqual(['hi']);
    });
  });

  describe('lifecycle', () => {
    it('should fail pending calls with Disconnected on close', () => {
      const replies: BusMessage[] = [];
      client.callMethod({ destination: serverName, path: PATH, member: 'Slow' }, (reply) => replies.push(reply));

      client.close();

      expect(replies).toHaveLength(1);
      expect(replies[0].errorName).toBe(ErrorNames.DISCONNECTED);
      expect(client.isOpen()).toBe(false);
    });

    it('should refuse to send once closed', () => {
      client.close();

      expect(() => client.callMethod({ destination: serverName, path: PATH, member: 'Echo' })).toThrow(
        ConnectionClosedError
      );
      expect(() => client.sendSignal({ path: PATH, member: `${IFACE}.Changed` })).toThrow(
        'Cannot send signal: connection is closed'
      );
    });

    it('should reject a signal without an interface', () => {
      try {
        server.sendSignal({ path: PATH, member: 'Changed' });
        expect.fail('expected sendSignal to throw');
      } catch (error) {
        expect(error).toBeInstanceOf(BusError);
        expect(error instanceof BusError ? error.errorName : undefined).toBe(ErrorNames.INVALID_ARGS);
      }
    });
  });

  describe('transport timeouts', () => {
    it('should fire a registered timeout and follow its interval changes', async () => {
      const raw = bus.connection({ timeoutIntervalMs: 10 });
      const connection = new BusConnection(raw, { loop: loop(bus), config: SETTINGS });
      await connection.open(bus.address);

      try {
        await pump(connection, sleep(80));
        expect(raw.timeoutFirings).toBeGreaterThanOrEqual(2);

        raw.setTimeoutInterval(10_000);
        const fired = raw.timeoutFirings;
        await pump(connection, sleep(60));

        expect(raw.timeoutFirings).toBe(fired);
      } finally {
        connection.close();
      }
    });
  });

  describe('unknown method policy', () => {
    it('should leave unmatched calls unanswered when set to ignore', async () => {
      const quietRaw = bus.connection();
      const quiet = new BusConnection(quietRaw, { loop: loop(bus), config: { ...SETTINGS, unknownMethod: 'ignore' } });
      await quiet.open(bus.address);
      const stopQuiet = serve(quiet);

      try {
        const error = await expectBusError(
          client.call({ destination: quiet.getUniqueName(), path: PATH, member: 'Missing', timeoutMs: 80 })
        );
        expect(error.errorName).toBe(ErrorNames.NO_REPLY);
      } finally {
        await stopQuiet();
        quiet.close();
      }
    });
  });
});

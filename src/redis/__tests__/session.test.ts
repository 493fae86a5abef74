/**
 * Tests for the single-connection cache session
 */

import * as net from 'net';
import {FakeRedisServer} from '../../__tests__/helpers/fake-redis-server';
import {ConnectError, ProtocolError, TimeoutError} from '../errors';
import {
  CacheSession,
  SocketConnector,
  buildTlsOptions,
  connectSocket,
} from '../session';
import {TransportConfig} from '../types';

function transportFor(
  port: number,
  overrides: Partial<TransportConfig> = {}
): TransportConfig {
  return {
    host: '127.0.0.1',
    port,
    tls: false,
    insecureTransport: false,
    connectTimeoutMs: 1000,
    commandTimeoutMs: 1000,
    ...overrides,
  };
}

describe('CacheSession', () => {
  let server: FakeRedisServer;
  let session: CacheSession | undefined;

  afterEach(async () => {
    session?.close();
    session = undefined;
    await server?.stop();
  });

  async function openSessionOn(
    fake: FakeRedisServer,
    overrides: Partial<TransportConfig> = {}
  ): Promise<CacheSession> {
    server = fake;
    const port = await server.start();
    session = await CacheSession.open(transportFor(port, overrides));
    return session;
  }

  describe('open()', () => {
    test('should connect and start in the connected state', async () => {
      const opened = await openSessionOn(new FakeRedisServer());
      expect(opened.state).toBe('connected');
      expect(opened.isOpen).toBe(true);
    });

    test('should fail with TimeoutError and destroy the socket when connect hangs', async () => {
      server = new FakeRedisServer();
      const captured: {socket?: net.Socket} = {};
      const hangingConnector: SocketConnector = () => {
        captured.socket = new net.Socket();
        return captured.socket;
      };

      const attempt = CacheSession.open(
        transportFor(6379, {connectTimeoutMs: 50}),
        hangingConnector
      );

      await expect(attempt).rejects.toBeInstanceOf(TimeoutError);
      await expect(attempt).rejects.toMatchObject({
        kind: 'timeout',
        phase: 'connect',
      });
      expect(captured.socket?.destroyed).toBe(true);
    });

    test('should fail with ConnectError when the connection is refused', async () => {
      server = new FakeRedisServer();
      const refusingConnector: SocketConnector = () => {
        const socket = new net.Socket();
        process.nextTick(() =>
          socket.destroy(new Error('connect ECONNREFUSED 127.0.0.1:6379'))
        );
        return socket;
      };

      const attempt = CacheSession.open(transportFor(6379), refusingConnector);

      await expect(attempt).rejects.toBeInstanceOf(ConnectError);
      await expect(attempt).rejects.toThrow(
        'Failed to connect to 127.0.0.1:6379: connect ECONNREFUSED 127.0.0.1:6379'
      );
    });

    test('should fail with ConnectError when the connector throws', async () => {
      server = new FakeRedisServer();
      const brokenConnector: SocketConnector = () => {
        throw new Error('no route');
      };

      await expect(
        CacheSession.open(transportFor(6379), brokenConnector)
      ).rejects.toThrow('Failed to connect to 127.0.0.1:6379: no route');
    });
  });

  describe('authenticate()', () => {
    test('should move to authenticated on +OK', async () => {
      const opened = await openSessionOn(
        new FakeRedisServer({password: 'test-secret'})
      );

      await expect(opened.authenticate('test-secret')).resolves.toBe(
        'authenticated'
      );
      expect(opened.state).toBe('authenticated');
      expect(server.commands).toEqual([['AUTH', 'test-secret']]);
    });

    test('should move to auth_failed on rejection and keep the socket open', async () => {
      const opened = await openSessionOn(
        new FakeRedisServer({password: 'test-secret'})
      );

      await expect(opened.authenticate('wrong-secret')).resolves.toBe(
        'auth_failed'
      );
      expect(opened.state).toBe('auth_failed');
      expect(opened.isOpen).toBe(true);

      // Still usable: the server answers, just not with PONG
      const reply = await opened.execute(['PING']);
      expect(reply).toEqual({
        type: 'error',
        message: 'NOAUTH Authentication required.',
      });
    });

    test('should treat an unparseable AUTH reply as auth_failed', async () => {
      const opened = await openSessionOn(
        new FakeRedisServer({
          respond: args => (args[0] === 'AUTH' ? ':1\r\n' : undefined),
        })
      );

      await expect(opened.authenticate('test-secret')).resolves.toBe(
        'auth_failed'
      );
    });
  });

  describe('ping()', () => {
    test('should return true for +PONG', async () => {
      const opened = await openSessionOn(new FakeRedisServer());
      await expect(opened.ping()).resolves.toBe(true);
    });

    test('should return false for any other reply', async () => {
      const opened = await openSessionOn(
        new FakeRedisServer({
          respond: args => (args[0] === 'PING' ? '+OK\r\n' : undefined),
        })
      );
      await expect(opened.ping()).resolves.toBe(false);
    });

    test('should return false when the exchange fails', async () => {
      const opened = await openSessionOn(
        new FakeRedisServer({silentCommands: ['PING']}),
        {commandTimeoutMs: 50}
      );
      await expect(opened.ping()).resolves.toBe(false);
    });
  });

  describe('execute()', () => {
    test('should round-trip SET and GET', async () => {
      const opened = await openSessionOn(new FakeRedisServer());

      await expect(opened.execute(['SET', 'event:1', 'payload'])).resolves.toEqual({
        type: 'status',
        value: 'OK',
      });

      const reply = await opened.execute(['GET', 'event:1']);
      expect(reply.type).toBe('bulk');
      if (reply.type === 'bulk') {
        expect(reply.value?.toString()).toBe('payload');
      }
    });

    test('should return the null bulk string for a missing key', async () => {
      const opened = await openSessionOn(new FakeRedisServer());
      await expect(opened.execute(['GET', 'event:missing'])).resolves.toEqual({
        type: 'bulk',
        value: null,
      });
    });

    test('should accumulate a reply split across reads', async () => {
      const opened = await openSessionOn(new FakeRedisServer({splitReplies: true}));
      const value = JSON.stringify({id: 'a1', note: 'ünïcödé'});

      await opened.execute(['SET', 'event:a1', value]);
      const reply = await opened.execute(['GET', 'event:a1']);

      expect(reply.type).toBe('bulk');
      if (reply.type === 'bulk') {
        expect(reply.value?.toString('utf8')).toBe(value);
      }
    });

    test('should return unparseable replies without throwing', async () => {
      const opened = await openSessionOn(
        new FakeRedisServer({
          respond: args => (args[0] === 'GET' ? '?garbage\r\n' : undefined),
        })
      );

      const reply = await opened.execute(['GET', 'event:1']);
      expect(reply.type).toBe('unparseable');
    });

    test('should return an unterminated reply with an unknown prefix at once', async () => {
      const opened = await openSessionOn(
        new FakeRedisServer({
          respond: args => (args[0] === 'GET' ? '?garbage' : undefined),
        }),
        {commandTimeoutMs: 2000}
      );

      const reply = await opened.execute(['GET', 'event:1']);

      expect(reply).toEqual({type: 'unparseable', raw: Buffer.from('?garbage')});
      expect(opened.isOpen).toBe(true);
    });

    test('should time out and close the session when no reply arrives', async () => {
      const opened = await openSessionOn(
        new FakeRedisServer({silentCommands: ['GET']}),
        {commandTimeoutMs: 50}
      );

      const attempt = opened.execute(['GET', 'event:1']);
      await expect(attempt).rejects.toBeInstanceOf(TimeoutError);
      await expect(attempt).rejects.toMatchObject({phase: 'command'});
      expect(opened.isOpen).toBe(false);
      await server.waitForDisconnects();
    });

    test('should raise ProtocolError when the connection drops mid-reply', async () => {
      const opened = await openSessionOn(
        new FakeRedisServer({
          respond: args => (args[0] === 'GET' ? '$10\r\nabc' : undefined),
          closeAfter: ['GET'],
        })
      );

      await expect(opened.execute(['GET', 'event:1'])).rejects.toBeInstanceOf(
        ProtocolError
      );
    });

    test('should raise ConnectError when the connection drops before a reply', async () => {
      const opened = await openSessionOn(
        new FakeRedisServer({silentCommands: ['GET'], closeAfter: ['GET']})
      );

      await expect(opened.execute(['GET', 'event:1'])).rejects.toBeInstanceOf(
        ConnectError
      );
      expect(opened.isOpen).toBe(false);
    });

    test('should refuse a second command while one is in flight', async () => {
      const opened = await openSessionOn(new FakeRedisServer({splitReplies: true}));

      const first = opened.execute(['PING']);
      await expect(opened.execute(['PING'])).rejects.toThrow(
        'Cache session already has a command in flight'
      );
      await expect(first).resolves.toEqual({type: 'status', value: 'PONG'});
    });
  });

  describe('close()', () => {
    test('should be idempotent and reject later commands', async () => {
      const opened = await openSessionOn(new FakeRedisServer());

      opened.close();
      opened.close();

      expect(opened.state).toBe('closed');
      await expect(opened.execute(['PING'])).rejects.toBeInstanceOf(ConnectError);
      await server.waitForDisconnects();
    });
  });
});

describe('buildTlsOptions()', () => {
  const base = transportFor(6380, {host: 'cache.internal', tls: true});

  test('should verify certificates by default', () => {
    const options = buildTlsOptions(base);
    expect(options).toEqual({
      host: 'cache.internal',
      port: 6380,
      servername: 'cache.internal',
    });
  });

  test('should disable certificate and hostname checks when insecure', () => {
    const options = buildTlsOptions({...base, insecureTransport: true});
    expect(options.rejectUnauthorized).toBe(false);
    expect(typeof options.checkServerIdentity).toBe('function');
  });

  test('should omit SNI for IP addresses', () => {
    const options = buildTlsOptions({...base, host: '10.0.0.5'});
    expect(options.servername).toBeUndefined();
  });
});

describe('connectSocket()', () => {
  test('should connect over plain TCP when tls is disabled', async () => {
    const server = new FakeRedisServer();
    const port = await server.start();

    try {
      const session = await CacheSession.open(transportFor(port), connectSocket);
      await expect(session.ping()).resolves.toBe(true);
      session.close();
    } finally {
      await server.stop();
    }
  });
});

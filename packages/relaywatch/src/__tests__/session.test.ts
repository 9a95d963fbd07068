/**
 * Session relay behaviour against scripted connections
 */

import { describe, it, expect, vi } from 'vitest';
import { Session, SessionState, CONNECTION_LOST } from '../session/session.js';
import { ErrorCode, RelayError, RemoteDisconnectError } from '../types/errors.js';
import type { Packet } from '../types/packets.js';
import type { PacketDirection } from '../observer/observer.js';
import {
  FakeClient,
  FakeDialer,
  FakeUpstream,
  StaticTokenSource,
  captureLogger,
  textPackets,
} from './helpers/fakes.js';

const UPSTREAM = { host: '127.0.0.1', port: 19134 };

function createSession(options: {
  client?: FakeClient;
  upstream?: FakeUpstream;
  dialer?: FakeDialer;
  observer?: (direction: PacketDirection, packet: Packet) => void;
} = {}) {
  const client = options.client ?? new FakeClient();
  const upstream = options.upstream ?? new FakeUpstream();
  const dialer = options.dialer ?? new FakeDialer([upstream]);
  const session = new Session({
    id: 1,
    client,
    upstream: UPSTREAM,
    dialer,
    credentials: new StaticTokenSource(),
    observer: options.observer,
  });
  const states: SessionState[] = [];
  session.on('state', (state) => states.push(state));
  return { session, client, upstream, dialer, states };
}

describe('Session', () => {
  describe('connecting', () => {
    it('should dial the configured upstream with the client identity and token', async () => {
      const client = new FakeClient({ displayName: 'Steve', deviceOS: 7 });
      const { session, upstream, dialer } = createSession({ client });

      const run = session.run();
      await vi.waitFor(() => expect(session.state).toBe('relaying'));
      upstream.failReads(new Error('stop'));
      await run;

      expect(dialer.calls).toHaveLength(1);
      expect(dialer.calls[0].target).toEqual(UPSTREAM);
      expect(dialer.calls[0].clientData).toEqual({ displayName: 'Steve', deviceOS: 7 });
      expect(dialer.calls[0].token.accessToken).toBe('test-access-token');
    });

    it('should disconnect the client with the upstream reason when the dial is refused', async () => {
      const dialer = new FakeDialer();
      dialer.dialError = new RelayError(ErrorCode.ERR_DIAL_FAILED, 'refused', {
        cause: new RemoteDisconnectError('server is full'),
      });
      const { session, client, states } = createSession({ dialer });

      await expect(session.run()).rejects.toMatchObject({ code: ErrorCode.ERR_DIAL_FAILED });

      expect(client.disconnects).toEqual(['server is full']);
      expect(states).toEqual(['closing', 'closed']);
      expect(session.reason).toBe('server is full');
    });

    it('should disconnect the client with "connection lost" when the upstream is unreachable', async () => {
      const dialer = new FakeDialer();
      dialer.dialError = new RelayError(ErrorCode.ERR_DIAL_FAILED, 'ECONNREFUSED');
      const { session, client, states } = createSession({ dialer });

      await expect(session.run()).rejects.toThrow('ECONNREFUSED');

      expect(client.disconnects).toEqual([CONNECTION_LOST]);
      expect(states).not.toContain('handshaking');
    });
  });

  describe('handshaking', () => {
    it('should start the client game with the upstream game data and spawn upstream', async () => {
      const upstream = new FakeUpstream({ worldName: 'Bedrock level', entityRuntimeId: 42 });
      const { session, client } = createSession({ upstream });

      const run = session.run();
      await vi.waitFor(() => expect(session.state).toBe('relaying'));
      client.failReads(new Error('done'));
      await run;

      expect(client.startedWith).toEqual([{ worldName: 'Bedrock level', entityRuntimeId: 42 }]);
      expect(upstream.spawnCount).toBe(1);
    });

    it('should relay even when both handshake steps fail', async () => {
      const { session, client, upstream, states } = createSession();
      client.startGameError = new Error('client did not ask for chunks');
      upstream.spawnError = new Error('spawn timed out');
      const [packet] = textPackets('late', 1);

      const run = session.run();
      await vi.waitFor(() => expect(session.state).toBe('relaying'));
      client.feed(packet);
      await vi.waitFor(() => expect(upstream.written).toEqual([packet]));
      client.failReads(new Error('done'));
      await run;

      expect(states.slice(0, 2)).toEqual(['handshaking', 'relaying']);
    });
  });

  describe('relaying', () => {
    it('should forward client packets to the upstream in order, unmodified', async () => {
      const { session, client, upstream } = createSession();
      const trace = textPackets('c2s', 50);
      client.feed(...trace);

      const run = session.run();
      await vi.waitFor(() => expect(upstream.written).toHaveLength(50));
      client.failReads(new Error('done'));
      await run;

      expect(upstream.written).toEqual(trace);
      upstream.written.forEach((packet, i) => expect(packet).toBe(trace[i]));
    });

    it('should forward upstream packets to the client in order, unmodified', async () => {
      const { session, client, upstream } = createSession();
      const trace = textPackets('s2c', 50);
      upstream.feed(...trace);

      const run = session.run();
      await vi.waitFor(() => expect(client.written).toHaveLength(50));
      upstream.failReads(new Error('done'));
      await run;

      expect(client.written).toEqual(trace);
    });

    it('should observe each packet with its direction before forwarding it', async () => {
      const seen: Array<[PacketDirection, Packet]> = [];
      const { session, client, upstream } = createSession({
        observer: (direction, packet) => {
          seen.push([direction, packet]);
        },
      });
      const [fromClient] = textPackets('up', 1);
      const [fromServer] = textPackets('down', 1);

      const run = session.run();
      await vi.waitFor(() => expect(session.state).toBe('relaying'));
      client.feed(fromClient);
      await vi.waitFor(() => expect(upstream.written).toHaveLength(1));
      upstream.feed(fromServer);
      await vi.waitFor(() => expect(client.written).toHaveLength(1));
      client.failReads(new Error('done'));
      await run;

      expect(seen).toEqual([
        ['client', fromClient],
        ['server', fromServer],
      ]);
    });

    it('should keep relaying when the observer throws', async () => {
      const { logger, records } = captureLogger('debug');
      const client = new FakeClient();
      const upstream = new FakeUpstream();
      const session = new Session({
        id: 9,
        client,
        upstream: UPSTREAM,
        dialer: new FakeDialer([upstream]),
        credentials: new StaticTokenSource(),
        observer: () => {
          throw new Error('observer broke');
        },
        logger,
      });
      const trace = textPackets('x', 3);
      client.feed(...trace);

      const run = session.run();
      await vi.waitFor(() => expect(upstream.written).toHaveLength(3));
      client.failReads(new Error('done'));
      await run;

      expect(upstream.written).toEqual(trace);
      const failures = records.filter((record) => record.msg === 'Observer failed');
      expect(failures).toHaveLength(3);
      expect(failures[0].session).toBe(9);
      expect(failures[0].level).toBe(20);
    });
  });

  describe('teardown', () => {
    it('should close the upstream once and disconnect the client once on a generic client read failure', async () => {
      const { session, client, upstream } = createSession();

      const run = session.run();
      await vi.waitFor(() => expect(session.state).toBe('relaying'));
      client.failReads(new Error('socket reset'));
      await run;

      expect(upstream.closeCount).toBe(1);
      expect(client.disconnects).toEqual([CONNECTION_LOST]);
      expect(session.state).toBe('closed');
    });

    it('should pass the upstream disconnect reason to the client', async () => {
      const { session, client, upstream } = createSession();

      const run = session.run();
      await vi.waitFor(() => expect(session.state).toBe('relaying'));
      upstream.failReads(new RemoteDisconnectError('You were kicked'));
      await run;

      expect(client.disconnects).toEqual(['You were kicked']);
      expect(upstream.closeCount).toBe(1);
    });

    it('should not pass a reason on a generic upstream read failure', async () => {
      const { session, client, upstream } = createSession();

      const run = session.run();
      await vi.waitFor(() => expect(session.state).toBe('relaying'));
      upstream.failReads(new RelayError(ErrorCode.ERR_READ_FAILED, 'ECONNRESET'));
      await run;

      expect(client.disconnects).toEqual([CONNECTION_LOST]);
    });

    it('should pass the reason when an upstream write fails because the upstream disconnected', async () => {
      const { session, client, upstream } = createSession();
      upstream.failWrites(
        new RelayError(ErrorCode.ERR_WRITE_FAILED, 'Write failed', {
          cause: new RemoteDisconnectError('Server closed'),
        })
      );

      const run = session.run();
      await vi.waitFor(() => expect(session.state).toBe('relaying'));
      client.feed(...textPackets('a', 1));
      await run;

      expect(client.disconnects).toEqual(['Server closed']);
      expect(upstream.closeCount).toBe(1);
    });

    it('should disconnect the client without a reason when a client write fails', async () => {
      const { session, client, upstream } = createSession();
      client.failWrites(new RelayError(ErrorCode.ERR_WRITE_FAILED, 'broken pipe'));

      const run = session.run();
      await vi.waitFor(() => expect(session.state).toBe('relaying'));
      upstream.feed(...textPackets('b', 1));
      await run;

      expect(client.disconnects).toEqual([CONNECTION_LOST]);
      expect(upstream.closeCount).toBe(1);
    });

    it('should tear down once when both directions fail together', async () => {
      const { session, client, upstream } = createSession();
      const closes: string[] = [];
      session.on('close', (reason) => closes.push(reason));

      const run = session.run();
      await vi.waitFor(() => expect(session.state).toBe('relaying'));
      upstream.failReads(new RemoteDisconnectError('first'));
      client.failReads(new Error('second'));
      await run;

      expect(upstream.closeCount).toBe(1);
      expect(client.disconnects).toEqual(['first']);
      expect(closes).toEqual(['first']);
    });

    it('should stop forwarding after the upstream stops accepting packets', async () => {
      const { session, client, upstream } = createSession();
      const [a, b, c] = textPackets('abc', 3);
      upstream.failWritesAfter(2, new RelayError(ErrorCode.ERR_WRITE_FAILED, 'connection reset'));
      client.feed(a, b, c);

      await session.run();

      expect(upstream.written).toEqual([a, b]);
      expect(client.disconnects).toEqual([CONNECTION_LOST]);
      expect(upstream.closeCount).toBe(1);
    });

    it('should not deliver packets sent after the upstream read fails', async () => {
      const { session, client, upstream } = createSession();
      const [a, b, c] = textPackets('abc', 3);

      const run = session.run();
      client.feed(a, b);
      await vi.waitFor(() => expect(upstream.written).toEqual([a, b]));
      upstream.failReads(new RelayError(ErrorCode.ERR_READ_FAILED, 'ECONNRESET'));
      await run;
      client.feed(c);

      expect(upstream.written).toEqual([a, b]);
      expect(client.disconnects).toEqual([CONNECTION_LOST]);
      expect(upstream.closeCount).toBe(1);
    });

    it('should move through every state in order', async () => {
      const { session, client, states } = createSession();

      const run = session.run();
      await vi.waitFor(() => expect(session.state).toBe('relaying'));
      client.failReads(new Error('done'));
      await run;

      expect(states).toEqual(['handshaking', 'relaying', 'closing', 'closed']);
    });

    it('should refuse to run twice', async () => {
      const { session, client } = createSession();

      const run = session.run();
      await expect(session.run()).rejects.toThrow('Session already started');
      await vi.waitFor(() => expect(session.state).toBe('relaying'));
      client.failReads(new Error('done'));
      await run;
    });
  });

  describe('concurrency', () => {
    it('should keep concurrent sessions apart', async () => {
      const pairs = Array.from({ length: 8 }, (_, i) => {
        const client = new FakeClient({ displayName: `player-${i}` });
        const upstream = new FakeUpstream({ worldName: `world-${i}` });
        const session = new Session({
          id: i + 1,
          client,
          upstream: UPSTREAM,
          dialer: new FakeDialer([upstream]),
          credentials: new StaticTokenSource(),
        });
        const up = textPackets(`c${i}`, 20);
        const down = textPackets(`s${i}`, 20);
        client.feed(...up);
        upstream.feed(...down);
        return { session, client, upstream, up, down };
      });

      const runs = pairs.map((pair) => pair.session.run());
      await vi.waitFor(() => {
        for (const pair of pairs) {
          expect(pair.upstream.written).toHaveLength(20);
          expect(pair.client.written).toHaveLength(20);
        }
      });
      for (const pair of pairs) {
        pair.client.failReads(new Error('done'));
      }
      await Promise.all(runs);

      for (const pair of pairs) {
        expect(pair.upstream.written).toEqual(pair.up);
        expect(pair.client.written).toEqual(pair.down);
        expect(pair.client.startedWith).toEqual([pair.upstream.gameData]);
        expect(pair.client.disconnects).toEqual([CONNECTION_LOST]);
      }
    });
  });
});

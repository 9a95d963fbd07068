/**
 * Accept loop behaviour
 */

import { describe, it, expect, vi } from 'vitest';
import { Relay } from '../relay/relay.js';
import type { Session } from '../session/session.js';
import { ErrorCode, RelayError } from '../types/errors.js';
import {
  FakeAcceptor,
  FakeClient,
  FakeDialer,
  FakeUpstream,
  StaticTokenSource,
  captureLogger,
  textPackets,
} from './helpers/fakes.js';

const UPSTREAM = { host: '127.0.0.1', port: 19134 };

function createRelay(upstreams: FakeUpstream[] = []) {
  const listener = new FakeAcceptor();
  const dialer = new FakeDialer(upstreams);
  const { logger, records } = captureLogger();
  const relay = new Relay({
    listener,
    dialer,
    upstream: UPSTREAM,
    credentials: new StaticTokenSource(),
    logger,
  });
  const sessions: Session[] = [];
  relay.on('session', (session) => sessions.push(session));
  return { relay, listener, dialer, records, sessions };
}

describe('Relay', () => {
  it('should start one session per accepted client', async () => {
    const upstreams = [new FakeUpstream(), new FakeUpstream()];
    const { relay, listener, sessions } = createRelay(upstreams);
    const clients = [new FakeClient({ displayName: 'one' }), new FakeClient({ displayName: 'two' })];

    const serving = relay.serve();
    listener.push({ ok: true, client: clients[0] });
    listener.push({ ok: true, client: clients[1] });

    await vi.waitFor(() => expect(sessions.map((s) => s.state)).toEqual(['relaying', 'relaying']));
    expect(relay.sessionCount).toBe(2);
    expect(sessions.map((s) => s.client)).toEqual(clients);

    await relay.stop();
    await serving;
  });

  it('should keep accepting after an accept failure', async () => {
    const { relay, listener, records, sessions } = createRelay([new FakeUpstream()]);

    const serving = relay.serve();
    listener.push({ ok: false, error: new RelayError(ErrorCode.ERR_LOGIN_FAILED, 'bad login') });
    listener.push({ ok: true, client: new FakeClient() });

    await vi.waitFor(() => expect(sessions).toHaveLength(1));
    const warning = records.find((record) => record.msg === 'Accept failed');
    expect(warning?.level).toBe(40);

    await relay.stop();
    await serving;
  });

  it('should not let a failed session stop the loop', async () => {
    const upstream = new FakeUpstream();
    const { relay, listener, dialer, sessions } = createRelay([upstream]);
    dialer.dialError = new RelayError(ErrorCode.ERR_DIAL_FAILED, 'unreachable');
    const refused = new FakeClient({ displayName: 'refused' });

    const serving = relay.serve();
    listener.push({ ok: true, client: refused });
    await vi.waitFor(() => expect(refused.disconnects).toEqual(['connection lost']));
    await vi.waitFor(() => expect(relay.sessionCount).toBe(0));

    dialer.dialError = null;
    const accepted = new FakeClient({ displayName: 'accepted' });
    const trace = textPackets('ok', 2);
    accepted.feed(...trace);
    listener.push({ ok: true, client: accepted });

    await vi.waitFor(() => expect(upstream.written).toEqual(trace));
    expect(sessions).toHaveLength(2);
    expect(dialer.calls.map((call) => call.clientData.displayName)).toEqual(['refused', 'accepted']);

    await relay.stop();
    await serving;
  });

  it('should stop serving when the listener is closed', async () => {
    const { relay, listener } = createRelay();
    const closed = vi.fn();
    relay.on('close', closed);

    const serving = relay.serve();
    await relay.stop();
    await serving;

    expect(listener.closeCount).toBe(1);
    expect(closed).toHaveBeenCalledTimes(1);
  });

  it('should leave running sessions alone when stopped', async () => {
    const upstream = new FakeUpstream();
    const { relay, listener, sessions } = createRelay([upstream]);
    const client = new FakeClient();

    const serving = relay.serve();
    listener.push({ ok: true, client });
    await vi.waitFor(() => expect(sessions[0]?.state).toBe('relaying'));

    await relay.stop();
    await serving;

    const [late] = textPackets('after-stop', 1);
    client.feed(late);
    await vi.waitFor(() => expect(upstream.written).toEqual([late]));
    expect(relay.sessionCount).toBe(1);

    client.failReads(new Error('done'));
    await vi.waitFor(() => expect(relay.sessionCount).toBe(0));
  });

  it('should refuse to serve twice at once', async () => {
    const { relay } = createRelay();

    const serving = relay.serve();
    await expect(relay.serve()).rejects.toThrow('Relay is already serving');

    await relay.stop();
    await serving;
  });
});

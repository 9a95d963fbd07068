/**
 * Command line option parsing
 */

import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { DEFAULT_UPSTREAM, resolveConfig } from 'relaywatch';
import { parseAddress, parseMilliseconds, parsePort, toConfigInput } from '../commands/options.js';
import { formatPrompt } from '../commands/auth.js';
import { createProgram } from '../program.js';

describe('parsePort', () => {
  it('should accept a port number', () => {
    expect(parsePort('19132')).toBe(19132);
    expect(parsePort('0')).toBe(0);
  });

  it.each(['-1', '65536', 'abc', '12.5', ''])('should reject %j', (value) => {
    expect(() => parsePort(value)).toThrow(InvalidArgumentError);
  });
});

describe('parseMilliseconds', () => {
  it('should accept a positive integer', () => {
    expect(parseMilliseconds('2500')).toBe(2500);
  });

  it.each(['0', '-5', '1s'])('should reject %j', (value) => {
    expect(() => parseMilliseconds(value)).toThrow('Not a positive number of milliseconds.');
  });
});

describe('parseAddress', () => {
  it('should parse host:port', () => {
    expect(parseAddress('0.0.0.0:19132')).toEqual({ host: '0.0.0.0', port: 19132 });
  });

  it('should parse a bracketed IPv6 address', () => {
    expect(parseAddress('[::1]:19133')).toEqual({ host: '::1', port: 19133 });
  });

  it('should reject an address without a port', () => {
    expect(() => parseAddress('localhost')).toThrow('Invalid locator format: localhost');
  });
});

describe('toConfigInput', () => {
  it('should leave unset options to the defaults', () => {
    expect(toConfigInput({})).toEqual({ log: { level: undefined, format: undefined } });
  });

  it('should fill the other half of the upstream from the defaults', () => {
    expect(toConfigInput({ port: 25565 }).upstream).toEqual({ host: DEFAULT_UPSTREAM.host, port: 25565 });
    expect(toConfigInput({ host: 'play.example.test' }).upstream).toEqual({
      host: 'play.example.test',
      port: DEFAULT_UPSTREAM.port,
    });
  });

  it('should map every option onto the configuration', () => {
    const config = resolveConfig(
      toConfigInput({
        host: 'play.example.test',
        port: 25565,
        listen: { host: '127.0.0.1', port: 19000 },
        tokenFile: '/tmp/relay.tok',
        dialTimeout: 5000,
        handshakeTimeout: 8000,
        logLevel: 'debug',
        logFormat: 'json',
      })
    );

    expect(config.upstream).toEqual({ host: 'play.example.test', port: 25565 });
    expect(config.listen).toEqual({ host: '127.0.0.1', port: 19000 });
    expect(config.tokenFile).toBe('/tmp/relay.tok');
    expect(config.dialTimeoutMs).toBe(5000);
    expect(config.handshakeTimeoutMs).toBe(8000);
    expect(config.log).toEqual({ level: 'debug', format: 'json' });
  });
});

describe('formatPrompt', () => {
  it('should tell the user where to sign in', () => {
    expect(
      formatPrompt({ verificationUri: 'https://login.example.test/link', userCode: 'ABCD-EFGH', expiresIn: 900 })
    ).toBe('Sign in at https://login.example.test/link with the code ABCD-EFGH');
  });
});

describe('createProgram', () => {
  it('should register the commands', () => {
    const program = createProgram();
    expect(program.name()).toBe('relaywatch');
    expect(program.commands.map((command) => command.name())).toEqual(['start', 'login', 'logout']);
  });
});

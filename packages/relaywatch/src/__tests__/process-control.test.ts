/**
 * Stop command and shutdown hook
 */

import { describe, it, expect, vi } from 'vitest';
import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';
import { registerShutdownHook, watchStopCommand } from '../relay/process-control.js';
import { captureLogger } from './helpers/fakes.js';

describe('watchStopCommand', () => {
  it('should fire once on a stop line', async () => {
    const input = new PassThrough();
    const onStop = vi.fn();
    watchStopCommand(input, onStop);

    input.write('status\n');
    input.write('  stop  \n');
    input.write('stop\n');

    await vi.waitFor(() => expect(onStop).toHaveBeenCalledTimes(1));
    input.end();
  });

  it('should ignore other lines', async () => {
    const input = new PassThrough();
    const onStop = vi.fn();
    const unwatch = watchStopCommand(input, onStop);

    input.write('stopping\n');
    input.write('please stop\n');
    await new Promise((resolve) => setImmediate(resolve));

    expect(onStop).not.toHaveBeenCalled();
    unwatch();
  });

  it('should only accept the command in lower case', async () => {
    const input = new PassThrough();
    const onStop = vi.fn();
    const unwatch = watchStopCommand(input, onStop);

    input.write('STOP\n');
    input.write(' Stop \n');
    await new Promise((resolve) => setImmediate(resolve));

    expect(onStop).not.toHaveBeenCalled();
    unwatch();
  });

  it('should stop watching when closed', async () => {
    const input = new PassThrough();
    const onStop = vi.fn();
    const unwatch = watchStopCommand(input, onStop);

    unwatch();
    input.write('stop\n');
    await new Promise((resolve) => setImmediate(resolve));

    expect(onStop).not.toHaveBeenCalled();
  });
});

describe('registerShutdownHook', () => {
  it('should run the task once and exit on the first signal', async () => {
    const target = new EventEmitter();
    const task = vi.fn(async () => undefined);
    const exit = vi.fn();
    registerShutdownHook(task, { target, exit });

    target.emit('SIGTERM');
    target.emit('SIGINT');

    await vi.waitFor(() => expect(exit).toHaveBeenCalledWith(0));
    expect(task).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledTimes(1);
    expect(target.listenerCount('SIGINT')).toBe(0);
    expect(target.listenerCount('SIGTERM')).toBe(0);
  });

  it('should exit even when the task fails', async () => {
    const target = new EventEmitter();
    const exit = vi.fn();
    const { logger, records } = captureLogger();
    registerShutdownHook(
      async () => {
        throw new Error('save failed');
      },
      { target, exit, logger }
    );

    target.emit('SIGINT');

    await vi.waitFor(() => expect(exit).toHaveBeenCalledWith(0));
    const failure = records.find((record) => record.msg === 'Shutdown task failed');
    expect(failure?.level).toBe(50);
  });

  it('should listen only to the given signals', () => {
    const target = new EventEmitter();
    registerShutdownHook(async () => undefined, { target, exit: vi.fn(), signals: ['SIGHUP'] });

    expect(target.listenerCount('SIGHUP')).toBe(1);
    expect(target.listenerCount('SIGINT')).toBe(0);
  });

  it('should detach when removed', () => {
    const target = new EventEmitter();
    const task = vi.fn(async () => undefined);
    const remove = registerShutdownHook(task, { target, exit: vi.fn() });

    remove();
    target.emit('SIGINT');

    expect(task).not.toHaveBeenCalled();
    expect(target.listenerCount('SIGINT')).toBe(0);
  });
});

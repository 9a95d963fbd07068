/**
 * Process-level controls: the stop command and the termination hook.
 */

import * as readline from 'node:readline';
import type { Readable } from 'node:stream';
import type { Logger } from 'pino';
import { silentLogger } from '../utils/logger.js';

export const STOP_COMMAND = 'stop';

/**
 * Call `onStop` when a line reading `stop` arrives on `input`.
 * Returns a function that stops watching.
 */
export function watchStopCommand(input: Readable, onStop: () => void): () => void {
  const lines = readline.createInterface({ input, terminal: false });
  let fired = false;

  lines.on('line', (line) => {
    if (!fired && line.trim() === STOP_COMMAND) {
      fired = true;
      lines.close();
      onStop();
    }
  });

  return () => lines.close();
}

/**
 * The parts of `process` the shutdown hook needs
 */
export interface SignalTarget {
  once(signal: NodeJS.Signals, listener: () => void): unknown;
  off(signal: NodeJS.Signals, listener: () => void): unknown;
}

export interface ShutdownHookOptions {
  signals?: readonly NodeJS.Signals[];
  target?: SignalTarget;
  /** Called after the task has finished, whatever its outcome */
  exit?: (code: number) => void;
  logger?: Logger;
}

/**
 * Run `task` once on the first termination signal, then exit.
 * Task failures are logged; the exit still happens.
 * Returns a function that removes the hook.
 */
export function registerShutdownHook(
  task: () => Promise<void>,
  options: ShutdownHookOptions = {}
): () => void {
  const signals = options.signals ?? ['SIGINT', 'SIGTERM'];
  const target: SignalTarget = options.target ?? process;
  const exit = options.exit ?? ((code: number) => process.exit(code));
  const logger = options.logger ?? silentLogger();

  let fired = false;

  const remove = (): void => {
    for (const signal of signals) {
      target.off(signal, handler);
    }
  };

  const handler = (): void => {
    if (fired) {
      return;
    }
    fired = true;
    remove();
    logger.info('Shutting down');

    void (async () => {
      try {
        await task();
      } catch (err) {
        logger.error({ err }, 'Shutdown task failed');
      } finally {
        exit(0);
      }
    })();
  };

  for (const signal of signals) {
    target.once(signal, handler);
  }

  return remove;
}

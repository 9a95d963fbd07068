/**
 * Command tree
 */

import { Command } from 'commander';
import { startCommand } from './commands/start.js';
import { loginCommand, logoutCommand } from './commands/auth.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('relaywatch')
    .description('Relay game clients to a server and log the packets that cross it')
    .version('0.1.0');

  program.addCommand(startCommand, { isDefault: true });
  program.addCommand(loginCommand);
  program.addCommand(logoutCommand);

  return program;
}

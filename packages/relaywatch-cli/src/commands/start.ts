/**
 * Start command - run the relay
 */

import { Command, Option } from 'commander';
import {
  CredentialStore,
  PacketListener,
  Relay,
  ResolvedRelayConfig,
  TcpDialer,
  TokenSource,
  acquireToken,
  createLoggingObserver,
  createRootLogger,
  formatLocator,
  registerShutdownHook,
  resolveConfig,
  resolveLogConfig,
  watchStopCommand,
} from 'relaywatch';
import { createAuthProvider, formatPrompt } from './auth.js';
import {
  StartOptions,
  logFormatOption,
  logLevelOption,
  parseAddress,
  parseMilliseconds,
  parsePort,
  toConfigInput,
  tokenFileOption,
} from './options.js';

export const startCommand = new Command('start')
  .description('Accept game clients and relay them to the upstream server')
  .addOption(
    new Option('--host <host>', 'upstream host (default: 127.0.0.1)').env('RELAYWATCH_UPSTREAM_HOST')
  )
  .addOption(
    new Option('--port <port>', 'upstream port (default: 19134)')
      .env('RELAYWATCH_UPSTREAM_PORT')
      .argParser(parsePort)
  )
  .addOption(
    new Option('--listen <address>', 'address to accept clients on (default: 0.0.0.0:19132)')
      .env('RELAYWATCH_LISTEN')
      .argParser(parseAddress)
  )
  .addOption(tokenFileOption())
  .addOption(
    new Option('--dial-timeout <ms>', 'upstream connect timeout').argParser(parseMilliseconds)
  )
  .addOption(
    new Option('--handshake-timeout <ms>', 'login and spawn timeout').argParser(parseMilliseconds)
  )
  .addOption(logLevelOption())
  .addOption(logFormatOption())
  .action(async (options: StartOptions) => {
    let config: ResolvedRelayConfig;
    try {
      config = resolveConfig(toConfigInput(options));
    } catch (err) {
      console.error(err instanceof Error ? err.message : err);
      process.exit(1);
    }

    const logger = createRootLogger(resolveLogConfig(config.log));
    const store = new CredentialStore({ path: config.tokenFile });
    const provider = createAuthProvider(config, (prompt) => {
      logger.info({ verificationUri: prompt.verificationUri, userCode: prompt.userCode }, formatPrompt(prompt));
    });

    let tokens: TokenSource;
    try {
      tokens = await acquireToken(store, provider, logger);
    } catch (err) {
      logger.fatal({ err }, 'Could not obtain a token');
      process.exit(1);
    }

    const saveToken = async (): Promise<void> => {
      await store.persist(tokens.current());
      logger.info({ path: store.path }, 'Token saved');
    };
    registerShutdownHook(saveToken, { logger });

    let listener: PacketListener;
    try {
      listener = await PacketListener.listen({
        host: config.listen.host,
        port: config.listen.port,
        handshakeTimeoutMs: config.handshakeTimeoutMs,
        logger,
      });
    } catch (err) {
      logger.fatal({ err }, 'Could not listen');
      process.exit(1);
    }

    const relay = new Relay({
      listener,
      dialer: new TcpDialer({
        dialTimeoutMs: config.dialTimeoutMs,
        handshakeTimeoutMs: config.handshakeTimeoutMs,
        logger,
      }),
      upstream: config.upstream,
      credentials: tokens,
      observer: createLoggingObserver(logger),
      logger,
    });

    watchStopCommand(process.stdin, () => {
      logger.info('Stop requested');
      relay.stop().catch((err: unknown) => {
        logger.error({ err }, 'Failed to close listener');
      });
    });

    logger.info(
      {
        listen: formatLocator(listener.address ?? config.listen),
        upstream: formatLocator(config.upstream),
      },
      'Relay started, type "stop" to exit'
    );
    await relay.serve();

    try {
      await saveToken();
    } catch (err) {
      logger.error({ err }, 'Could not save token');
    }
    process.exit(0);
  });

/**
 * Daily Numeral Bot
 *
 * Posts the day's counter to Bluesky as a Persian numeral, each post quoting
 * the one before it. Meant to run once a day from a scheduler.
 *
 * Usage: index.ts [run | status | convert <n...> | clear-cooldown | set-counter <n> [uri]]
 */

import 'dotenv/config';
import * as Sentry from '@sentry/node';
import { createFileStore, createStateManager } from '../entities/counter-state';
import { createBlueskyClient } from '../features/bluesky-poster';
import { EXIT_FATAL, EXIT_OK } from '../features/daily-counter';
import { isAbortError } from '../shared';
import {
  clearCooldownCommand,
  convertCommand,
  runCommand,
  setCounterCommand,
  statusCommand,
  type CommandContext,
} from './commands';
import { ConfigError, loadConfig, requireCredentials, type AppConfig } from './config';

function createContext(config: AppConfig): CommandContext {
  const store = createFileStore(config.state.directory);
  const stateManager = createStateManager(store, {
    minCounter: config.counter.minCounter,
    maxCounter: config.counter.maxCounter,
    counterKey: config.state.counterFile,
    cooldownKey: config.state.cooldownFile,
  });
  return { config: config.counter, stateManager };
}

async function dispatch(command: string, args: string[], config: AppConfig, signal: AbortSignal): Promise<number> {
  switch (command) {
    case 'run': {
      const client = createBlueskyClient(requireCredentials(config), config.service);
      return runCommand({ ...createContext(config), client, signal });
    }
    case 'status':
      return statusCommand(createContext(config));
    case 'convert':
      return convertCommand(args);
    case 'clear-cooldown':
      return clearCooldownCommand(createContext(config));
    case 'set-counter':
      return setCounterCommand(createContext(config), args);
    default:
      console.error(`✗ Unknown command: ${command}`);
      console.error('Commands: run, status, convert <n...>, clear-cooldown, set-counter <n> [uri]');
      return EXIT_FATAL;
  }
}

async function main(argv: string[]): Promise<number> {
  const [command = 'run', ...args] = argv;

  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    console.error(error instanceof ConfigError ? `✗ ${error.message}` : error);
    return EXIT_FATAL;
  }

  if (config.sentryDsn) {
    Sentry.init({ dsn: config.sentryDsn, tracesSampleRate: 0 });
  }

  const controller = new AbortController();
  const abort = () => controller.abort();
  process.once('SIGINT', abort);
  process.once('SIGTERM', abort);

  try {
    return await dispatch(command, args, config, controller.signal);
  } catch (error) {
    if (isAbortError(error)) {
      console.log('\n👋 Interrupted, exiting');
      return EXIT_OK;
    }

    console.error('✗ Unexpected error:', error);
    Sentry.captureException(error, { tags: { command } });
    return EXIT_FATAL;
  } finally {
    process.off('SIGINT', abort);
    process.off('SIGTERM', abort);
    await Sentry.flush(2000);
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('✗ Fatal error:', error);
    process.exitCode = EXIT_FATAL;
  }
);

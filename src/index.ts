/**
 * Deal Desk - Discord assistant for deal pipeline questions, article
 * summaries and a daily deadline countdown.
 *
 * Entry point for the application.
 */

import 'dotenv/config';

import { ConfigurationError, createContainerAsync, type Container } from './core/container.js';

let container: Container | undefined;
let isShuttingDown = false;

async function main(): Promise<void> {
  container = await createContainerAsync();
  await container.start();
}

// Handle shutdown gracefully
async function shutdown(code = 0): Promise<void> {
  if (isShuttingDown) {
    return; // Already shutting down, ignore duplicate signals
  }
  isShuttingDown = true;

  if (container) {
    await container.shutdown();
  }
  process.exit(code);
}

process.on('SIGINT', () => {
  void shutdown();
});

process.on('SIGTERM', () => {
  void shutdown();
});

// Handle uncaught errors
process.on('uncaughtException', (error: unknown) => {
  if (container) {
    container.logger.fatal({ error }, 'Uncaught exception');
  } else {
    // eslint-disable-next-line no-console
    console.error('Uncaught exception:', error);
  }
  void shutdown(1);
});

process.on('unhandledRejection', (reason: unknown) => {
  if (container) {
    container.logger.fatal({ reason }, 'Unhandled rejection');
  } else {
    // eslint-disable-next-line no-console
    console.error('Unhandled rejection:', reason);
  }
  void shutdown(1);
});

// Start the application
main().catch((error: unknown) => {
  if (error instanceof ConfigurationError) {
    // eslint-disable-next-line no-console
    console.error(`Error: ${error.message}`);
    if (error.hint) {
      // eslint-disable-next-line no-console
      console.error(error.hint);
    }
  } else {
    // eslint-disable-next-line no-console
    console.error('Failed to start:', error);
  }
  process.exit(1);
});

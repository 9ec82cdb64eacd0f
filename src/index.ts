#!/usr/bin/env node
import { logger } from './utils/logger.js';
import { VpnConsoleError } from './utils/errors.js';
import { runCli } from './cli/main.js';

const log = logger.child({ component: 'main' });

process.on('uncaughtException', (err) => {
  log.fatal({ err }, 'Uncaught exception');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  log.fatal({ reason }, 'Unhandled rejection');
  process.exit(1);
});

runCli(process.argv.slice(2))
  .then((code) => {
    process.exit(code);
  })
  .catch((err) => {
    if (err instanceof VpnConsoleError) {
      log.debug({ err, code: err.code }, 'Command failed');
      console.error(err.message);
    } else {
      log.fatal({ err }, 'Failed to run command');
    }
    process.exit(1);
  });

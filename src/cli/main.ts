import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { assertCommandsInstalled, getOpenVpnVersion } from '../utils/system.js';
import { ConfigStore } from '../storage/configs.js';
import { SessionJournal, closeDatabase, getDatabase } from '../storage/sqlite.js';
import { SessionController } from '../session/controller.js';
import { ManagementChannel } from '../management/channel.js';
import { PtyProcessLauncher } from '../vpn/pty-process.js';
import type { CredentialRequest, SessionEndReason } from '../session/types.js';
import { parseCliArgs } from './args.js';
import { formatHistory, formatLogLine, formatStatus } from './console-view.js';
import { promptCredentials } from './prompt.js';
import { CLI_USAGE_TEXT } from './usage.js';

const log = logger.child({ component: 'cli' });

function createController(journal: SessionJournal): SessionController {
  return new SessionController(
    new PtyProcessLauncher(),
    () => new ManagementChannel(),
    {
      binary: config.vpn.binary,
      elevationCommand: config.vpn.elevationCommand,
      host: config.management.host,
      port: config.management.port,
      spawnTimeoutMs: config.timeouts.spawnMs,
      connectTimeoutMs: config.timeouts.connectMs,
      exitTimeoutMs: config.timeouts.exitMs,
    },
    journal
  );
}

async function answerCredentialRequest(
  controller: SessionController,
  request: CredentialRequest
): Promise<void> {
  if (request.verificationFailed) {
    console.log('Authentication failed, try again.');
  }

  const credentials = await promptCredentials();
  if (!credentials) {
    log.info({ sessionId: request.sessionId }, 'Credential prompt cancelled');
    return;
  }

  if (controller.isActive()) {
    controller.submitCredentials(credentials.username, credentials.password);
  }
}

async function runConnect(name: string, verbose: boolean): Promise<number> {
  const store = new ConfigStore();
  const configPath = store.resolveConfigPath(name);
  assertCommandsInstalled([config.vpn.elevationCommand, config.vpn.binary]);

  if (verbose) {
    console.log(getOpenVpnVersion(config.vpn.binary) ?? `${config.vpn.binary} (version unknown)`);
  }

  const journal = new SessionJournal(getDatabase());
  const controller = createController(journal);
  let prompting = false;

  const ended = new Promise<SessionEndReason>((resolve) => {
    controller.once('sessionEnded', (_sessionId, reason) => resolve(reason));
  });

  controller.on('stateChanged', (snapshot) => {
    console.log(formatStatus(snapshot));
  });

  controller.on('log', (line) => {
    if (verbose || line.level !== 'debug') {
      console.log(formatLogLine(line));
    }
  });

  controller.on('credentialsRequested', (request) => {
    if (prompting) return;
    prompting = true;
    answerCredentialRequest(controller, request)
      .catch((err) => {
        log.error({ err }, 'Failed to submit credentials');
        console.error(`Could not submit credentials: ${err instanceof Error ? err.message : String(err)}`);
      })
      .finally(() => {
        prompting = false;
      });
  });

  let stopping = false;
  const stop = (signal: string): void => {
    if (stopping) return;
    stopping = true;
    log.info({ signal }, 'Disconnecting...');
    console.log('Disconnecting...');
    controller.stop().catch((err) => {
      log.error({ err }, 'Error while disconnecting');
    });
  };

  process.on('SIGINT', () => stop('SIGINT'));
  process.on('SIGTERM', () => stop('SIGTERM'));

  try {
    await controller.start(configPath);
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    closeDatabase();
    return 1;
  }

  const reason = await ended;
  closeDatabase();
  return reason === 'stopped' ? 0 : 1;
}

// Main CLI dispatcher.
export async function runCli(argv: string[]): Promise<number> {
  const command = parseCliArgs(argv);

  switch (command.type) {
    case 'help':
      console.log(CLI_USAGE_TEXT);
      return 0;

    case 'list': {
      const names = new ConfigStore().listConfigs();
      console.log(names.length > 0 ? names.join('\n') : 'No configurations imported yet.');
      return 0;
    }

    case 'import': {
      const name = new ConfigStore().importConfig(command.file);
      console.log(`Configuration '${name}' imported successfully.`);
      return 0;
    }

    case 'connect':
      return runConnect(command.name, command.verbose);

    case 'history': {
      const journal = new SessionJournal(getDatabase());
      console.log(formatHistory(journal.getRecentSessions(command.limit)));
      closeDatabase();
      return 0;
    }

    case 'invalid':
      console.error(command.message);
      return 1;

    case 'unknown':
      console.error(`Unknown command: ${command.command}\n`);
      console.log(CLI_USAGE_TEXT);
      return 1;
  }
}

import os from 'os';
import path from 'path';
import { z } from 'zod';

const DEFAULT_HOME = path.join(os.homedir(), '.vpn-console');

const configSchema = z.object({
  vpn: z.object({
    binary: z.string().min(1).default('openvpn'),
    elevationCommand: z.string().min(1).default('pkexec'),
    configDir: z.string().default(path.join(DEFAULT_HOME, 'configs')),
  }),

  management: z.object({
    host: z.string().ip({ message: 'Management host must be an IP address' }).default('127.0.0.1'),
    port: z.number().int().min(1).max(65535).default(7505),
  }),

  timeouts: z.object({
    spawnMs: z.number().int().positive().default(2000),
    connectMs: z.number().int().positive().default(2000),
    exitMs: z.number().int().positive().default(2000),
  }),

  journal: z.object({
    path: z.string().default(path.join(DEFAULT_HOME, 'history.db')),
  }),

  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('warn'),
    pretty: z.boolean().default(process.env.NODE_ENV !== 'production'),
  }),
});

export type Config = z.infer<typeof configSchema>;

type Env = Record<string, string | undefined>;

function parseEnvInt(value: string | undefined): number | undefined {
  if (!value) return undefined;
  return parseInt(value, 10);
}

export function parseConfig(env: Env) {
  const rawConfig = {
    vpn: {
      binary: env.OPENVPN_BINARY,
      elevationCommand: env.ELEVATION_COMMAND,
      configDir: env.VPN_CONFIG_DIR,
    },
    management: {
      host: env.MANAGEMENT_HOST,
      port: parseEnvInt(env.MANAGEMENT_PORT),
    },
    timeouts: {
      spawnMs: parseEnvInt(env.SPAWN_TIMEOUT_MS),
      connectMs: parseEnvInt(env.CONNECT_TIMEOUT_MS),
      exitMs: parseEnvInt(env.EXIT_TIMEOUT_MS),
    },
    journal: {
      path: env.JOURNAL_PATH,
    },
    logging: {
      level: env.LOG_LEVEL,
      pretty: env.LOG_PRETTY === undefined ? undefined : env.LOG_PRETTY === 'true',
    },
  };

  return configSchema.safeParse(rawConfig);
}

function loadConfig(): Config {
  const result = parseConfig(process.env);

  if (!result.success) {
    console.error('Configuration validation failed:');
    for (const issue of result.error.issues) {
      console.error(`  - ${issue.path.join('.')}: ${issue.message}`);
    }
    process.exit(1);
  }

  return result.data;
}

export const config = loadConfig();

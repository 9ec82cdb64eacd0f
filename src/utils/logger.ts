import pino, { type Logger as PinoLogger } from 'pino';
import { config } from '../config/index.js';

// stderr keeps log records out of the CLI's own output on stdout
const transport = config.logging.pretty
  ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        destination: 2,
      },
    }
  : undefined;

export const logger = transport
  ? pino({ level: config.logging.level, transport })
  : pino({ level: config.logging.level }, pino.destination(2));

export function createChildLogger(context: Record<string, unknown>) {
  return logger.child(context);
}

export type Logger = PinoLogger;

import pino, { Logger } from 'pino';
import { getConfig } from './config';

// Shared by the Fastify request logger and the standalone one below
export interface LogSettings {
  level: string;
  transport?: { target: string; options: Record<string, unknown> };
}

export function loggerOptions(): LogSettings {
  const config = getConfig();
  if (!config.LOG_PRETTY) {
    return { level: config.LOG_LEVEL };
  }
  return {
    level: config.LOG_LEVEL,
    transport: {
      target: 'pino-pretty',
      options: {
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      },
    },
  };
}

let root: Logger | null = null;

export function getLogger(module: string): Logger {
  if (!root) {
    root = pino(loggerOptions());
  }
  return root.child({ module });
}

import pino, { Logger, LevelWithSilent } from 'pino';

export type { Logger };

export interface LoggerOptions {
  level?: LevelWithSilent;
  name?: string;
}

export function createLogger(options?: LoggerOptions): Logger {
  return pino({
    name: options?.name ?? 'ashare-screener',
    level: options?.level ?? resolveLevel(process.env.LOG_LEVEL),
  });
}

export function componentLogger(parent: Logger | undefined, component: string): Logger {
  return (parent ?? defaultLogger()).child({ component });
}

let rootLogger: Logger | null = null;

function defaultLogger(): Logger {
  if (!rootLogger) {
    rootLogger = createLogger();
  }
  return rootLogger;
}

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export function resolveLevel(value: string | undefined, fallback: LevelWithSilent = 'info'): LevelWithSilent {
  const normalized = value?.trim().toLowerCase();
  return LEVELS.find((level) => level === normalized) ?? fallback;
}

import pino, { type Logger } from 'pino';
import { existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerOptions {
  level?: LogLevel;
  /** Human-readable output on stderr instead of the JSON log file */
  pretty?: boolean;
  /** Log file; defaults to ~/.decision-copilot/logs/decision-copilot.log */
  destination?: string;
}

const LOG_DIR = join(homedir(), '.decision-copilot', 'logs');

function ensureLogDir(): void {
  if (!existsSync(LOG_DIR)) {
    mkdirSync(LOG_DIR, { recursive: true });
  }
}

export function createLogger(name: string = 'decision-copilot', options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info';

  if (level === 'silent') {
    return pino({ name, level });
  }

  if (options.pretty) {
    return pino({
      name,
      level,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, destination: 2 },
      },
    });
  }

  if (!options.destination) {
    ensureLogDir();
  }

  return pino({
    name,
    level,
    transport: {
      target: 'pino/file',
      options: { destination: options.destination ?? join(LOG_DIR, 'decision-copilot.log'), mkdir: true },
    },
  });
}

let _logger: Logger | null = null;

export function getLogger(): Logger {
  if (!_logger) {
    _logger = createLogger();
  }
  return _logger;
}

export function setLogger(logger: Logger): void {
  _logger = logger;
}

import path from 'path';
import pino from 'pino';
import { formatDay } from './timestamps';

export type Logger = pino.Logger;

export interface LoggerOptions {
  level?: string;
  /** When set, lines are also appended to `<logDir>/<name>_<YYYYMMDD>.log`. */
  logDir?: string;
}

const LEVELS: readonly pino.Level[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'];

function resolveLevel(raw: string | undefined): pino.LevelWithSilent {
  if (raw === 'silent') return 'silent';
  const level = LEVELS.find((candidate) => candidate === raw);
  if (level) return level;
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

export function createLogger(name: string, options: LoggerOptions = {}): Logger {
  const level = resolveLevel(options.level ?? process.env.LOG_LEVEL);
  const logDir = options.logDir ?? process.env.LOG_DIR;

  if (!logDir || level === 'silent') {
    return pino({ name, level });
  }

  const file = pino.destination({
    dest: path.join(logDir, `${name}_${formatDay(new Date())}.log`),
    mkdir: true,
    sync: false
  });

  return pino(
    { name, level },
    pino.multistream([
      { stream: process.stdout, level },
      { stream: file, level }
    ])
  );
}

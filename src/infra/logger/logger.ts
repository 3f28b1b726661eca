import chalk from 'chalk';
import type { AppConfigRequired, LogLevel } from '../config/config.js';

export type { LogLevel };

export interface Logger {
  info(context: string, message: string): void;
  debug(context: string, message: string): void;
  warn(context: string, message: string): void;
  error(context: string, message: string): void;
}

export interface LogEntry {
  level: LogLevel;
  context: string;
  message: string;
  time: Date;
}

type Paint = (text: string) => string;

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const LEVEL_BADGES: Record<LogLevel, Paint> = {
  debug: chalk.bgBlue.black,
  info: chalk.bgGreen.black,
  warn: chalk.bgYellow.black,
  error: chalk.bgRed.white,
};

const LEVEL_SINKS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.log(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

// contexts take the next palette colour on first use
const CONTEXT_PALETTE: readonly Paint[] = [chalk.cyan, chalk.magenta, chalk.blue, chalk.green, chalk.yellow];
const contextPaint = new Map<string, Paint>();

function paintFor(context: string): Paint {
  let paint = contextPaint.get(context);
  if (!paint) {
    paint = CONTEXT_PALETTE[contextPaint.size % CONTEXT_PALETTE.length];
    contextPaint.set(context, paint);
  }
  return paint;
}

export function shouldLog(level: LogLevel, threshold: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[threshold];
}

/** `YYYY-MM-DD HH:MM:SS`, UTC */
export function formatTimestamp(date: Date = new Date()): string {
  return date.toISOString().replace('T', ' ').slice(0, 19);
}

export function formatLogLine(entry: LogEntry, color: boolean): string {
  const ts = formatTimestamp(entry.time);
  const level = entry.level.toUpperCase();
  const tag = `[${entry.context}]`;
  if (!color) return `${ts} ${level} ${tag} ${entry.message}`;
  return `${chalk.gray(ts)} ${LEVEL_BADGES[entry.level](` ${level} `)} ${paintFor(entry.context)(tag)} ${entry.message}`;
}

export function createLogger(cfg: Pick<AppConfigRequired, 'logging'>): Logger {
  const { level: threshold, color } = cfg.logging;

  const emitter = (level: LogLevel) => (context: string, message: string) => {
    if (!shouldLog(level, threshold)) return;
    LEVEL_SINKS[level](formatLogLine({ level, context, message, time: new Date() }, color));
  };

  return {
    debug: emitter('debug'),
    info: emitter('info'),
    warn: emitter('warn'),
    error: emitter('error'),
  };
}

import chalk from 'chalk';
import { LOG_LEVELS } from '../config/schema.js';

export type LogLevel = (typeof LOG_LEVELS)[number];

let currentLevel: LogLevel = 'info';

const levels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: LogLevel): boolean {
  return levels[level] >= levels[currentLevel];
}

function stamp(): string {
  return new Date().toISOString();
}

export function debug(msg: string, ...args: unknown[]): void {
  if (shouldLog('debug')) console.log(chalk.gray(`${stamp()} [DEBUG] ${msg}`), ...args);
}

export function info(msg: string, ...args: unknown[]): void {
  if (shouldLog('info')) console.log(chalk.blue(`${stamp()} [INFO] ${msg}`), ...args);
}

export function warn(msg: string, ...args: unknown[]): void {
  if (shouldLog('warn')) console.log(chalk.yellow(`${stamp()} [WARN] ${msg}`), ...args);
}

export function error(msg: string, ...args: unknown[]): void {
  if (shouldLog('error')) console.error(chalk.red(`${stamp()} [ERROR] ${msg}`), ...args);
}

/** Printer for hono's request logger middleware. */
export function request(line: string, ...rest: string[]): void {
  info([line, ...rest].join(' '));
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

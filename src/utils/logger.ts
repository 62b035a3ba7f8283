/**
 * Structured console logger with chalk colors and log levels.
 *
 * Progress and diagnostics go through here; LLM output and reports that the
 * user asked for are printed by the CLI commands directly.
 *
 * Dependency direction: logger.ts → chalk (external only)
 * Used by: every layer for consistent logging output
 */

import chalk from 'chalk';

export enum LogLevel {
    Debug = 0,
    Info = 1,
    Warn = 2,
    Error = 3,
    Silent = 4,
}

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVELS_BY_NAME: Record<LogLevelName, LogLevel> = {
    debug: LogLevel.Debug,
    info: LogLevel.Info,
    warn: LogLevel.Warn,
    error: LogLevel.Error,
    silent: LogLevel.Silent,
};

let currentLevel: LogLevel = LogLevel.Info;

/** Set the global log level. */
export function setLogLevel(level: LogLevel): void {
    currentLevel = level;
}

/** Map a level name (case-insensitive) to a LogLevel; undefined if unknown. */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
    if (!name) return undefined;
    const key = name.trim().toLowerCase();
    return isLogLevelName(key) ? LEVELS_BY_NAME[key] : undefined;
}

function isLogLevelName(name: string): name is LogLevelName {
    return Object.hasOwn(LEVELS_BY_NAME, name);
}

/** Log a debug message (grey, only shown at Debug level). */
export function debug(message: string, ...args: unknown[]): void {
    if (currentLevel <= LogLevel.Debug) {
        console.debug(chalk.gray(`[DEBUG] ${message}`), ...args);
    }
}

/** Log an info message (blue). */
export function info(message: string, ...args: unknown[]): void {
    if (currentLevel <= LogLevel.Info) {
        console.info(chalk.blue(`[INFO]  ${message}`), ...args);
    }
}

/** Log a success message (green). */
export function success(message: string, ...args: unknown[]): void {
    if (currentLevel <= LogLevel.Info) {
        console.info(chalk.green(`✔ ${message}`), ...args);
    }
}

export function warn(message: string, ...args: unknown[]): void {
    if (currentLevel <= LogLevel.Warn) {
        console.warn(chalk.yellow(`[WARN]  ${message}`), ...args);
    }
}

export function error(message: string, ...args: unknown[]): void {
    if (currentLevel <= LogLevel.Error) {
        console.error(chalk.red(`[ERROR] ${message}`), ...args);
    }
}

/** Log an attempt within a bounded loop (cyan, "[n/total]"). */
export function step(stepNumber: number, total: number, message: string): void {
    if (currentLevel <= LogLevel.Info) {
        console.info(chalk.cyan(`[${stepNumber}/${total}] ${message}`));
    }
}

/** Log a section banner (bold white with a rule). */
export function header(message: string): void {
    if (currentLevel <= LogLevel.Info) {
        console.log();
        console.log(chalk.bold.white(message));
        console.log(chalk.gray('─'.repeat(Math.min(message.length + 4, 60))));
    }
}

export const logger = {
    debug,
    info,
    success,
    warn,
    error,
    step,
    header,
    setLogLevel,
    parseLogLevel,
};

// src/utils/logger.ts
import chalk from 'chalk';

//#region TYPES

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

//#endregion

/**
 * Leveled console logger. Library code logs at debug; the CLI decides
 * what reaches the terminal.
 */
export class Logger {
    private level: LogLevel;
    private readonly prefix: string;

    constructor(prefix: string = '', level: LogLevel = 'info') {
        this.prefix = prefix;
        this.level = level;
    }

    public setLevel(level: LogLevel): void {
        this.level = level;
    }

    public getLevel(): LogLevel {
        return this.level;
    }

    public debug(message: string, data?: Record<string, unknown>): void {
        if (!this.shouldLog('debug')) return;
        console.log(chalk.gray(`[DEBUG] ${this.format(message)}`));
        if (data) {
            console.log(chalk.gray(JSON.stringify(data, null, 2)));
        }
    }

    public info(message: string, data?: Record<string, unknown>): void {
        if (!this.shouldLog('info')) return;
        console.log(chalk.blue(`[INFO] ${this.format(message)}`));
        if (data) {
            console.log(chalk.blue(JSON.stringify(data, null, 2)));
        }
    }

    public warn(message: string, data?: Record<string, unknown>): void {
        if (!this.shouldLog('warn')) return;
        console.warn(chalk.yellow(`[WARN] ${this.format(message)}`));
        if (data) {
            console.warn(chalk.yellow(JSON.stringify(data, null, 2)));
        }
    }

    public error(message: string, error?: Error | Record<string, unknown>): void {
        if (!this.shouldLog('error')) return;
        console.error(chalk.red(`[ERROR] ${this.format(message)}`));
        if (error instanceof Error) {
            console.error(chalk.red(error.stack ?? error.message));
        } else if (error) {
            console.error(chalk.red(JSON.stringify(error, null, 2)));
        }
    }

    private shouldLog(level: LogLevel): boolean {
        return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
    }

    private format(message: string): string {
        return this.prefix ? `[${this.prefix}] ${message}` : message;
    }
}

/** Shared logger for the package */
export const logger = new Logger('sevenzip');

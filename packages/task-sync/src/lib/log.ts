import chalk from "chalk";

//
// Levels of logging, from the most verbose.
//
export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

//
// Logging as used across the library.
//
export interface ILog {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string, err?: unknown): void;
    error(message: string, err?: unknown): void;
}

export function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some(level => level === value);
}

//
// Formats an error for the log, with the stack when there is one.
//
function formatError(err: unknown): string {
    if (err instanceof Error) {
        return err.stack || err.message;
    }

    return String(err);
}

//
// Logs to the console, in color.
//
export class ConsoleLog implements ILog {

    constructor(private readonly level: LogLevel = "info") {
    }

    //
    // Is the level enabled?
    //
    private enabled(level: LogLevel): boolean {
        return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
    }

    debug(message: string): void {
        if (this.enabled("debug")) {
            console.log(chalk.gray(message));
        }
    }

    info(message: string): void {
        if (this.enabled("info")) {
            console.log(message);
        }
    }

    warn(message: string, err?: unknown): void {
        if (this.enabled("warn")) {
            console.error(chalk.yellow(message));
            if (err !== undefined) {
                console.error(chalk.yellow(formatError(err)));
            }
        }
    }

    error(message: string, err?: unknown): void {
        if (this.enabled("error")) {
            console.error(chalk.red(message));
            if (err !== undefined) {
                console.error(chalk.red(formatError(err)));
            }
        }
    }
}

//
// Discards everything.
//
export const nullLog: ILog = {
    debug() {},
    info() {},
    warn() {},
    error() {},
};

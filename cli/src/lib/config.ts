import { isLogLevel, LogLevel } from "task-sync";

//
// Settings for the command line client.
//
export interface ICliConfig {
    //
    // Base URL of the task backend.
    //
    apiUrl: string;

    //
    // The user whose tasks are synchronized.
    //
    userId: string;

    //
    // Directory for the local task cache.
    //
    storageDir: string;

    //
    // Milliseconds before a remote request is abandoned, 0 for no timeout.
    //
    requestTimeoutMs: number;

    coalesceResyncs: boolean;

    logLevel: LogLevel;
}

//
// The configuration is missing a value or has a bad one.
//
export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigError";
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

export type Environment = Record<string, string | undefined>;

//
// Gets an environment variable, falling back to the default.
// Throws when the variable is required and not set.
//
export function getEnvVar(env: Environment, name: string, defaultValue?: string): string {
    const value = env[name];
    if (!value) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }

        throw new ConfigError(`${name} environment variable is required.`);
    }

    return value;
}

function parseWholeNumber(name: string, value: string): number {
    if (!/^\d+$/.test(value)) {
        throw new ConfigError(`${name} must be a whole number of milliseconds, got "${value}".`);
    }

    return parseInt(value, 10);
}

function parseBoolean(name: string, value: string): boolean {
    if (value === "true") {
        return true;
    }
    else if (value === "false") {
        return false;
    }

    throw new ConfigError(`${name} must be true or false, got "${value}".`);
}

//
// Loads the configuration from environment variables.
//
export function loadConfig(env: Environment = process.env): ICliConfig {
    const logLevel = getEnvVar(env, "LOG_LEVEL", "info");
    if (!isLogLevel(logLevel)) {
        throw new ConfigError(`LOG_LEVEL must be one of debug, info, warn or error, got "${logLevel}".`);
    }

    return {
        apiUrl: getEnvVar(env, "TASKS_API_URL"),
        userId: getEnvVar(env, "TASKS_USER_ID", "default-user"),
        storageDir: getEnvVar(env, "TASKS_STORAGE_DIR", "./storage"),
        requestTimeoutMs: parseWholeNumber("TASKS_REQUEST_TIMEOUT", getEnvVar(env, "TASKS_REQUEST_TIMEOUT", "30000")),
        coalesceResyncs: parseBoolean("TASKS_COALESCE_RESYNC", getEnvVar(env, "TASKS_COALESCE_RESYNC", "false")),
        logLevel,
    };
}

import { ConsoleLog, isLogLevel } from "task-sync";
import { createServer } from "./server";

process.on("uncaughtException", err => {
    console.error("There was an uncaught exception:", err);
    process.exit(1);
});

process.on("unhandledRejection", reason => {
    console.error("Unhandled promise rejection:", reason);
    process.exit(1);
});

function getEnvVar(name: string, defaultValue?: string): string {
    const value = process.env[name];
    if (!value) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }

        console.error(`${name} environment variable is required.`);
        process.exit(1);
    }

    return value;
}

const port = parseInt(getEnvVar("PORT", "3000"));
if (isNaN(port)) {
    console.error(`PORT must be a number.`);
    process.exit(1);
}

const logLevel = getEnvVar("LOG_LEVEL", "info");
if (!isLogLevel(logLevel)) {
    console.error(`LOG_LEVEL must be one of debug, info, warn or error.`);
    process.exit(1);
}

const log = new ConsoleLog(logLevel);
const app = createServer(log);

app.listen(port, () => {
    log.info(`Task backend running on http://localhost:${port}`);
});

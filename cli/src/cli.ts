import chalk from "chalk";
import { ParsedArgs } from "minimist";
import { ConsoleLog, HttpRemoteTaskApi, isTask, ITask, LocalTaskStore, RemoteTaskStore, TaskRepository } from "task-sync";
import { ICommandOutput, parseArgs, runCommand } from "./commands";
import { ConfigError, loadConfig } from "./lib/config";
import { FileStorage } from "./lib/file-storage";

process.on("uncaughtException", err => {
    console.error("There was an uncaught exception:", err);
    process.exit(1);
});

process.on("unhandledRejection", reason => {
    console.error("Unhandled promise rejection:", reason);
    process.exit(1);
});

const consoleOutput: ICommandOutput = {
    info: line => console.log(line),
    error: line => console.error(chalk.red(line)),
};

async function main(argv: ParsedArgs): Promise<number> {
    const config = loadConfig();
    const log = new ConsoleLog(config.logLevel);
    log.debug(`Using ${config.apiUrl} for user ${config.userId}, caching in ${config.storageDir}.`);

    const remote = new RemoteTaskStore(new HttpRemoteTaskApi({
        baseUrl: config.apiUrl,
        userId: config.userId,
        timeoutMs: config.requestTimeoutMs,
    }), log);
    const local = new LocalTaskStore(new FileStorage<ITask>(config.storageDir, isTask));
    const repository = new TaskRepository(remote, local, {
        log,
        coalesceResyncs: config.coalesceResyncs,
    });

    try {
        return await runCommand(argv, repository, consoleOutput);
    }
    finally {
        remote.close();
    }
}

main(parseArgs(process.argv.slice(2)))
    .then(exitCode => {
        process.exitCode = exitCode;
    })
    .catch(err => {
        if (err instanceof ConfigError) {
            console.error(chalk.red(err.message));
        }
        else {
            console.error(err);
        }
        process.exit(1);
    });

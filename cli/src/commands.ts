import minimist, { ParsedArgs } from "minimist";
import { createTask, firstValue, ITask, IWriteResult, TaskRepository, TaskStoreError } from "task-sync";

//
// Where command output goes.
//
export interface ICommandOutput {
    //
    // Prints a line of normal output.
    //
    info(line: string): void;

    //
    // Prints a line describing a failure.
    //
    error(line: string): void;
}

export const USAGE = [
    "Usage: tasks <command> [args]",
    "",
    "Commands:",
    "  list [--refresh]              List tasks, pulling from the remote first with --refresh.",
    "  get <id> [--refresh]          Show one task.",
    "  add <title> [description]     Add a new task.",
    "  complete <id>                 Mark a task as completed.",
    "  activate <id>                 Mark a task as active.",
    "  delete <id>                   Delete a task.",
    "  clear-completed               Delete all completed tasks.",
    "  delete-all                    Delete every task.",
    "  refresh                       Replace the local tasks with the remote tasks.",
];

//
// Parses the command line. Positional arguments stay strings, so ids that look like numbers keep their form.
//
export function parseArgs(args: string[]): ParsedArgs {
    return minimist(args, { boolean: ["refresh"], string: ["_"] });
}

//
// Formats a task as a single line.
//
export function formatTask(task: ITask): string {
    const line = `${task.completed ? "[x]" : "[ ]"} ${task.id}  ${task.title}`;
    return task.description ? `${line} - ${task.description}` : line;
}

//
// Gets a positional argument as a string.
//
function positional(argv: ParsedArgs, index: number): string | undefined {
    const value = argv._[index];
    if (value === undefined) {
        return undefined;
    }

    return String(value);
}

//
// Prints how a write to both stores went, returns the exit code.
//
function reportWrite(output: ICommandOutput, result: IWriteResult, success: string): number {
    if (result.ok) {
        output.info(success);
        return 0;
    }

    if (result.remoteError) {
        output.error(`Remote store failed: ${result.remoteError.message}`);
    }
    if (result.localError) {
        output.error(`Local store failed: ${result.localError.message}`);
    }

    return 1;
}

//
// Runs a command against the repository. Resolves to the exit code.
//
export async function runCommand(argv: ParsedArgs, repository: TaskRepository, output: ICommandOutput): Promise<number> {
    const command = positional(argv, 0);
    const refresh = argv.refresh === true;

    //
    // Gets a required task id argument.
    //
    const requireId = (): string | undefined => {
        const taskId = positional(argv, 1);
        if (!taskId) {
            output.error(`The ${command} command needs a task id.`);
        }
        return taskId;
    };

    try {
        switch (command) {
            case "list": {
                const tasks = await firstValue(repository.list(refresh));
                if (tasks.length === 0) {
                    output.info("No tasks.");
                }
                for (const task of tasks) {
                    output.info(formatTask(task));
                }
                return 0;
            }

            case "get": {
                const taskId = requireId();
                if (!taskId) {
                    return 1;
                }

                output.info(formatTask(await firstValue(repository.get(taskId, refresh))));
                return 0;
            }

            case "add": {
                const title = positional(argv, 1);
                if (!title) {
                    output.error(`The add command needs a title.`);
                    return 1;
                }

                const task = createTask(title, positional(argv, 2));
                return reportWrite(output, await repository.save(task), `Added task ${task.id}.`);
            }

            case "complete":
            case "activate": {
                const taskId = requireId();
                if (!taskId) {
                    return 1;
                }

                const result = command === "complete"
                    ? await repository.complete(taskId)
                    : await repository.activate(taskId);
                return reportWrite(output, result, `Marked task ${taskId} as ${command === "complete" ? "completed" : "active"}.`);
            }

            case "delete": {
                const taskId = requireId();
                if (!taskId) {
                    return 1;
                }

                return reportWrite(output, await repository.delete(taskId), `Deleted task ${taskId}.`);
            }

            case "clear-completed": {
                return reportWrite(output, await repository.clearCompletedTasks(), `Deleted completed tasks.`);
            }

            case "delete-all": {
                return reportWrite(output, await repository.deleteAll(), `Deleted all tasks.`);
            }

            case "refresh": {
                const result = await repository.refreshAll();
                if (result.status === "stale") {
                    output.error(`Refresh failed: ${result.error ? result.error.message : "unknown error"}`);
                    return 1;
                }

                output.info(`Refreshed ${result.count} tasks.`);
                return 0;
            }

            case undefined:
            case "help": {
                for (const line of USAGE) {
                    output.info(line);
                }
                return command === undefined ? 1 : 0;
            }

            default: {
                output.error(`Unknown command "${command}".`);
                for (const line of USAGE) {
                    output.error(line);
                }
                return 1;
            }
        }
    }
    catch (err) {
        if (err instanceof TaskStoreError) {
            output.error(err.message);
            return 1;
        }

        throw err;
    }
}

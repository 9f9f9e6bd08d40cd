import { v4 as uuid } from "uuid";
import { InvalidTaskError } from "./errors";

//
// Any record that can be kept in storage.
//
export interface IDocument {
    //
    // The unique id of the record.
    //
    id: string;
}

//
// The synchronized entity.
//
// Identity is the id only, two tasks with the same id are the same task.
//
export interface ITask extends IDocument {
    //
    // The title of the task.
    //
    title: string;

    //
    // The longer description of the task.
    //
    description: string;

    //
    // Whether the task is completed.
    //
    completed: boolean;
}

//
// Makes a new task with a freshly assigned id.
//
export function createTask(title: string, description: string = ""): ITask {
    return {
        id: uuid(),
        title,
        description,
        completed: false,
    };
}

//
// Checks that a value read back from storage is a complete task.
//
export function isTask(value: unknown): value is ITask {
    if (typeof value !== "object" || value === null) {
        return false;
    }

    const task: Record<string, unknown> = { ...value };
    return typeof task.id === "string"
        && typeof task.title === "string"
        && typeof task.description === "string"
        && typeof task.completed === "boolean";
}

//
// A task with an empty id must never be persisted or deleted by id.
//
export function isValidTaskId(taskId: string): boolean {
    return taskId.length > 0;
}

//
// Refuses an empty id.
//
export function requireTaskId(taskId: string): string {
    if (!isValidTaskId(taskId)) {
        throw new InvalidTaskError();
    }

    return taskId;
}

//
// Gets the id from either a task or an id.
//
export function resolveTaskId(target: ITask | string): string {
    return typeof target === "string" ? target : target.id;
}

export function isSameTask(a: ITask, b: ITask): boolean {
    return a.id === b.id;
}

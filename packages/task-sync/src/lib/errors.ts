//
// The kinds of failure a task store can report.
//
export type TaskStoreErrorKind = "unavailable" | "not-found" | "cancelled" | "invalid";

//
// Base class for errors raised by task stores.
//
export class TaskStoreError extends Error {
    constructor(message: string, public readonly kind: TaskStoreErrorKind, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "TaskStoreError";
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

//
// The network or the backend failed.
//
export class UnavailableError extends TaskStoreError {
    constructor(message: string, cause?: unknown) {
        super(message, "unavailable", { cause });
        this.name = "UnavailableError";
    }
}

//
// A single task was requested that does not exist.
//
export class NotFoundError extends TaskStoreError {
    constructor(public readonly taskId: string) {
        super(`Task ${taskId} was not found.`, "not-found");
        this.name = "NotFoundError";
    }
}

//
// The consumer cancelled, or the store was closed.
//
export class CancelledError extends TaskStoreError {
    constructor(message: string = "The operation was cancelled.") {
        super(message, "cancelled");
        this.name = "CancelledError";
    }
}

export class InvalidTaskError extends TaskStoreError {
    constructor(message: string = "Task id must not be empty.") {
        super(message, "invalid");
        this.name = "InvalidTaskError";
    }
}

//
// Turns anything that was thrown into an Error.
//
export function toError(err: unknown): Error {
    if (err instanceof Error) {
        return err;
    }

    return new Error(String(err));
}

//
// Store errors pass through, anything else is treated as the store being unavailable.
//
export function toStoreError(err: unknown): TaskStoreError {
    if (err instanceof TaskStoreError) {
        return err;
    }

    const error = toError(err);
    return new UnavailableError(error.message, error);
}

import { ITask } from "./task";

//
// The fields the remote keeps for each task.
//
export type RemoteTaskFields = Omit<ITask, "id">;

//
// A task as the remote holds it, one entry per id.
//
// Entries written by other clients may be missing fields.
//
export interface IRemoteTaskEntry extends Partial<RemoteTaskFields> {
    id: string;
}

//
// The type of a function called when a request succeeds.
//
export type SuccessCallbackFn<ResultT> = (result: ResultT) => void;

//
// The type of a function called when a request fails.
//
export type FailureCallbackFn = (err: Error) => void;

//
// An in-flight request to the remote.
//
// Completion is reported through callbacks. Callbacks attached after the request has settled fire straight away.
//
export interface IRemoteRequest<ResultT> {
    onSuccess(callback: SuccessCallbackFn<ResultT>): IRemoteRequest<ResultT>;

    onFailure(callback: FailureCallbackFn): IRemoteRequest<ResultT>;

    //
    // Asks for the request to be dropped.
    // There's no guarantee it is, the request may still complete.
    //
    abort(): void;

    //
    // True once the request has succeeded or failed.
    //
    readonly settled: boolean;
}

//
// A callback based client for the remote task collection.
//
export interface IRemoteTaskApi {
    //
    // Gets every entry in the collection.
    //
    getAll(): IRemoteRequest<IRemoteTaskEntry[]>;

    //
    // Gets one entry, the result is undefined when there is no such entry.
    //
    getOne(taskId: string): IRemoteRequest<IRemoteTaskEntry | undefined>;

    //
    // Creates the entry or merges the fields into it.
    //
    set(taskId: string, fields: RemoteTaskFields): IRemoteRequest<void>;

    //
    // Updates fields of an existing entry, fails when there is no such entry.
    //
    update(taskId: string, fields: Partial<RemoteTaskFields>): IRemoteRequest<void>;

    //
    // Deletes an entry. Deleting a missing entry succeeds.
    //
    delete(taskId: string): IRemoteRequest<void>;
}

type Outcome<ResultT> =
    | { state: "pending" }
    | { state: "succeeded", result: ResultT }
    | { state: "failed", error: Error };

//
// A request that is settled by whoever issued it.
//
export class RemoteRequest<ResultT> implements IRemoteRequest<ResultT> {

    private outcome: Outcome<ResultT> = { state: "pending" };

    private successCallbacks: SuccessCallbackFn<ResultT>[] = [];

    private failureCallbacks: FailureCallbackFn[] = [];

    //
    // Optionally takes the function that aborts the underlying work.
    //
    constructor(private readonly onAbort?: () => void) {
    }

    get settled(): boolean {
        return this.outcome.state !== "pending";
    }

    onSuccess(callback: SuccessCallbackFn<ResultT>): IRemoteRequest<ResultT> {
        if (this.outcome.state === "succeeded") {
            callback(this.outcome.result);
        }
        else if (this.outcome.state === "pending") {
            this.successCallbacks.push(callback);
        }

        return this;
    }

    onFailure(callback: FailureCallbackFn): IRemoteRequest<ResultT> {
        if (this.outcome.state === "failed") {
            callback(this.outcome.error);
        }
        else if (this.outcome.state === "pending") {
            this.failureCallbacks.push(callback);
        }

        return this;
    }

    abort(): void {
        if (!this.settled && this.onAbort) {
            this.onAbort();
        }
    }

    //
    // Settles the request successfully. Only the first settlement counts.
    //
    succeed(result: ResultT): void {
        if (this.settled) {
            return;
        }

        this.outcome = { state: "succeeded", result };
        const callbacks = this.successCallbacks;
        this.successCallbacks = [];
        this.failureCallbacks = [];
        for (const callback of callbacks) {
            callback(result);
        }
    }

    //
    // Settles the request as failed. Only the first settlement counts.
    //
    fail(error: Error): void {
        if (this.settled) {
            return;
        }

        this.outcome = { state: "failed", error };
        const callbacks = this.failureCallbacks;
        this.successCallbacks = [];
        this.failureCallbacks = [];
        for (const callback of callbacks) {
            callback(error);
        }
    }
}

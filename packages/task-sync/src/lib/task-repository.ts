import { toError } from "./errors";
import { fanOut, IWriteResult } from "./fan-out";
import { ILog, nullLog } from "./log";
import { firstValue, ISubscription, Stream } from "./stream";
import { isValidTaskId, ITask } from "./task";
import { ITaskStore } from "./task-store";

//
// Where the most recent full resync is at.
//
// Idle until the first resync. Stale means the last resync failed and local may be out of date or torn.
//
export type ResyncState = "idle" | "resyncing" | "synced" | "stale";

//
// The result of pulling from the remote into the local store.
//
export interface IResyncResult {
    status: "synced" | "stale";

    //
    // The number of tasks written to the local store.
    //
    count?: number;

    //
    // Why the resync failed.
    //
    error?: Error;
}

//
// The type of a function called after each resync.
//
export type ResyncCallbackFn = (result: IResyncResult) => void;

export interface ITaskRepositoryOptions {
    log?: ILog;

    //
    // When true, concurrent full resyncs share a single run instead of each
    // deleting and reinserting the local store.
    //
    coalesceResyncs?: boolean;
}

//
// Single entry point for tasks. Reads come from the local store, the remote is only
// pulled from when a resync is asked for, writes go to both.
//
export class TaskRepository {

    private readonly log: ILog;

    private readonly coalesceResyncs: boolean;

    private state: ResyncState = "idle";

    //
    // The full resync in progress, when resyncs are coalesced.
    //
    private inFlightResync: Promise<IResyncResult> | undefined = undefined;

    private resyncCallbacks: ResyncCallbackFn[] = [];

    constructor(private readonly remote: ITaskStore, private readonly local: ITaskStore, options: ITaskRepositoryOptions = {}) {
        this.log = options.log || nullLog;
        this.coalesceResyncs = options.coalesceResyncs || false;
    }

    //
    // Streams all tasks from the local store, after pulling from the remote if forced.
    //
    // A failed resync is logged and the read carries on with whatever the local store holds.
    //
    list(forceResync: boolean): Stream<ITask[]> {
        return this.readAfter(forceResync ? () => this.refreshAll() : undefined, () => this.local.list());
    }

    //
    // Streams one task from the local store, after pulling it from the remote if forced.
    //
    get(taskId: string, forceResync: boolean): Stream<ITask> {
        return this.readAfter(forceResync ? () => this.refreshOne(taskId) : undefined, () => this.local.get(taskId));
    }

    //
    // Replaces the local store with the remote snapshot.
    //
    // This is not atomic: local is cleared before it is repopulated, so a failure part way leaves it torn
    // and readers can see it empty or partial in the meantime. Never rejects.
    //
    async refreshAll(): Promise<IResyncResult> {
        if (this.coalesceResyncs && this.inFlightResync) {
            this.log.debug(`Joining the resync already in progress.`);
            return this.inFlightResync;
        }

        const resync = this.runFullResync();
        if (this.coalesceResyncs) {
            this.inFlightResync = resync;
        }

        try {
            return await resync;
        }
        finally {
            if (this.inFlightResync === resync) {
                this.inFlightResync = undefined;
            }
        }
    }

    //
    // Pulls one task from the remote into the local store. Never rejects.
    //
    async refreshOne(taskId: string): Promise<IResyncResult> {
        let result: IResyncResult;
        try {
            const task = await firstValue(this.remote.get(taskId));
            await this.local.save(task);
            result = { status: "synced", count: 1 };
        }
        catch (err) {
            this.log.error(`Failed to refresh task ${taskId} from the remote.`, err);
            result = { status: "stale", error: toError(err) };
        }

        this.notifyResync(result);
        return result;
    }

    //
    // Where the most recent full resync is at.
    //
    resyncState(): ResyncState {
        return this.state;
    }

    //
    // Subscribes to the result of every resync, including those started by forced reads.
    //
    onResync(callback: ResyncCallbackFn): ISubscription {
        this.resyncCallbacks.push(callback);

        let closed = false;
        return {
            get closed() {
                return closed;
            },
            unsubscribe: () => {
                closed = true;
                const index = this.resyncCallbacks.indexOf(callback);
                if (index !== -1) {
                    this.resyncCallbacks.splice(index, 1);
                }
            },
        };
    }

    save(task: ITask): Promise<IWriteResult> {
        return this.write(`save task ${task.id}`, store => store.save(task));
    }

    setCompleted(target: ITask | string, completed: boolean): Promise<IWriteResult> {
        if (typeof target === "string") {
            return this.withLocalTask(target, task => this.setCompleted(task, completed));
        }

        return this.write(`set task ${target.id} completed to ${completed}`, store => store.setCompleted(target, completed));
    }

    complete(target: ITask | string): Promise<IWriteResult> {
        return this.setCompleted(target, true);
    }

    activate(target: ITask | string): Promise<IWriteResult> {
        return this.setCompleted(target, false);
    }

    //
    // Each store works out for itself which of its tasks are completed,
    // the two runs aren't coordinated.
    //
    clearCompletedTasks(): Promise<IWriteResult> {
        return this.write(`clear completed tasks`, store => store.deleteAllCompleted());
    }

    deleteAll(): Promise<IWriteResult> {
        return this.write(`delete all tasks`, store => store.deleteAll());
    }

    delete(taskId: string): Promise<IWriteResult> {
        return this.write(`delete task ${taskId}`, store => store.delete(taskId));
    }

    //
    // Fetches the remote snapshot, clears local and inserts the tasks one at a time.
    //
    private async runFullResync(): Promise<IResyncResult> {
        this.state = "resyncing";

        let result: IResyncResult;
        try {
            const tasks = await firstValue(this.remote.list());

            await this.local.deleteAll();

            let count = 0;
            for (const task of tasks) {
                if (!isValidTaskId(task.id)) {
                    this.log.warn(`Skipping a remote task with an empty id.`);
                    continue;
                }

                await this.local.save(task);
                count += 1;
            }

            this.state = "synced";
            result = { status: "synced", count };
        }
        catch (err) {
            this.log.error(`Failed to refresh tasks from the remote.`, err);
            this.state = "stale";
            result = { status: "stale", error: toError(err) };
        }

        this.notifyResync(result);
        return result;
    }

    //
    // Makes a stream that optionally resyncs first, then forwards a local read.
    //
    // Unsubscribing stops the local read. A resync already started carries on regardless.
    //
    private readAfter<ValueT>(resync: (() => Promise<IResyncResult>) | undefined, read: () => Stream<ValueT>): Stream<ValueT> {
        return new Stream<ValueT>(emitter => {
            let inner: ISubscription | undefined = undefined;

            const start = () => {
                if (emitter.active) {
                    inner = read().subscribe(emitter);
                }
            };

            if (resync) {
                //
                // Resync results are reported through onResync, the read always goes ahead.
                //
                resync()
                    .then(start)
                    .catch(err => {
                        emitter.error(toError(err));
                    });
            }
            else {
                start();
            }

            return () => {
                if (inner) {
                    inner.unsubscribe();
                }
            };
        });
    }

    //
    // Resolves a task by id from the local store, then runs the operation on it.
    //
    private async withLocalTask(taskId: string, operation: (task: ITask) => Promise<IWriteResult>): Promise<IWriteResult> {
        const task = await firstValue(this.local.get(taskId));
        return operation(task);
    }

    //
    // Dispatches a write to both stores.
    //
    private async write(description: string, operation: (store: ITaskStore) => Promise<void>): Promise<IWriteResult> {
        const result = await fanOut(() => operation(this.remote), () => operation(this.local));
        if (result.remoteError) {
            this.log.warn(`Remote store failed to ${description}.`, result.remoteError);
        }
        if (result.localError) {
            this.log.warn(`Local store failed to ${description}.`, result.localError);
        }

        return result;
    }

    private notifyResync(result: IResyncResult): void {
        for (const callback of this.resyncCallbacks.slice()) {
            try {
                callback(result);
            }
            catch (err) {
                this.log.error(`Error in resync callback.`, err);
            }
        }
    }
}

import { CancelledError, NotFoundError, toStoreError } from "./errors";
import { ILog, nullLog } from "./log";
import { IRemoteRequest, IRemoteTaskApi, IRemoteTaskEntry } from "./remote-api";
import { firstValue, Stream } from "./stream";
import { isValidTaskId, ITask, requireTaskId, resolveTaskId } from "./task";
import { ITaskStore } from "./task-store";

//
// Converts a remote entry to a task, filling in missing fields.
//
export function toTask(entry: IRemoteTaskEntry): ITask {
    return {
        id: entry.id,
        title: entry.title ?? "",
        description: entry.description ?? "",
        completed: entry.completed ?? false,
    };
}

//
// The remote task collection as a task store.
//
// Wraps the callback based API: reads become cold streams that emit one snapshot and complete,
// writes become promises that settle when the callback fires.
//
export class RemoteTaskStore implements ITaskStore {

    //
    // Requests that have not settled yet, so they can be aborted on close.
    //
    private pendingRequests = new Set<IRemoteRequest<unknown>>();

    //
    // Fails pending calls and open read streams when the store is closed.
    //
    private pendingCancellations = new Set<(err: Error) => void>();

    private closed = false;

    constructor(private readonly api: IRemoteTaskApi, private readonly log: ILog = nullLog) {
    }

    list(): Stream<ITask[]> {
        return this.fetch(() => this.api.getAll(), entries => entries.map(toTask), "list tasks");
    }

    get(taskId: string): Stream<ITask> {
        return this.fetch(() => this.api.getOne(taskId), entry => {
            if (!entry) {
                throw new NotFoundError(taskId);
            }

            return toTask(entry);
        }, `get task ${taskId}`);
    }

    async save(task: ITask): Promise<void> {
        requireTaskId(task.id);

        await this.call(() => this.api.set(task.id, {
            title: task.title,
            description: task.description,
            completed: task.completed,
        }));
    }

    async setCompleted(target: ITask | string, completed: boolean): Promise<void> {
        const taskId = requireTaskId(resolveTaskId(target));
        await this.call(() => this.api.update(taskId, { completed }));
    }

    async deleteAllCompleted(): Promise<void> {
        await this.deleteMatching(task => task.completed);
    }

    async deleteAll(): Promise<void> {
        await this.deleteMatching(() => true);
    }

    async delete(taskId: string): Promise<void> {
        requireTaskId(taskId);
        await this.call(() => this.api.delete(taskId));
    }

    //
    // The remote is the source, there is no copy to refresh. This checks the remote can be reached.
    //
    async refreshAll(): Promise<void> {
        await firstValue(this.list());
    }

    async refreshOne(taskId: string): Promise<void> {
        await firstValue(this.get(taskId));
    }

    //
    // Aborts everything in flight. Calls made after this fail with CancelledError.
    //
    close(): void {
        if (this.closed) {
            return;
        }

        this.closed = true;

        //
        // Waiters fail first, an aborted request need not settle.
        //
        const cancelled = new CancelledError("The remote task store was closed.");
        for (const cancel of Array.from(this.pendingCancellations)) {
            cancel(cancelled);
        }
        this.pendingCancellations.clear();

        for (const request of Array.from(this.pendingRequests)) {
            request.abort();
        }
        this.pendingRequests.clear();
    }

    //
    // Takes a snapshot of the remote, then deletes each matching task one after the other.
    // The first failure stops the sequence, tasks already deleted stay deleted.
    //
    private async deleteMatching(predicate: (task: ITask) => boolean): Promise<void> {
        const tasks = await firstValue(this.list());
        for (const task of tasks) {
            if (!predicate(task)) {
                continue;
            }

            if (!isValidTaskId(task.id)) {
                this.log.warn(`Skipping a remote task with an empty id.`);
                continue;
            }

            await this.call(() => this.api.delete(task.id));
        }
    }

    //
    // Makes a cold stream that issues one request per subscriber,
    // emits the single result and completes.
    //
    private fetch<EntryT, ValueT>(issue: () => IRemoteRequest<EntryT>, toValue: (entry: EntryT) => ValueT, description: string): Stream<ValueT> {
        return new Stream<ValueT>(emitter => {
            if (this.closed) {
                emitter.error(new CancelledError("The remote task store is closed."));
                return;
            }

            const cancel = (err: Error) => emitter.error(err);
            this.pendingCancellations.add(cancel);

            const request = issue();
            this.track(request);

            request
                .onSuccess(entry => {
                    this.untrack(request);
                    this.pendingCancellations.delete(cancel);

                    if (!emitter.active) {
                        this.log.debug(`Discarding the late result of "${description}".`);
                        return;
                    }

                    let value: ValueT;
                    try {
                        value = toValue(entry);
                    }
                    catch (err) {
                        emitter.error(toStoreError(err));
                        return;
                    }

                    emitter.next(value);
                    emitter.complete();
                })
                .onFailure(err => {
                    this.untrack(request);
                    this.pendingCancellations.delete(cancel);
                    emitter.error(toStoreError(err));
                });

            return () => {
                this.pendingCancellations.delete(cancel);
                if (!request.settled) {
                    this.log.debug(`Subscription to "${description}" cancelled before the remote responded.`);
                    this.untrack(request);
                    request.abort();
                }
            };
        });
    }

    //
    // Issues a single-shot request and waits for its callback.
    //
    private call<ResultT>(issue: () => IRemoteRequest<ResultT>): Promise<ResultT> {
        if (this.closed) {
            return Promise.reject(new CancelledError("The remote task store is closed."));
        }

        return new Promise<ResultT>((resolve, reject) => {
            const request = issue();
            this.track(request);
            this.pendingCancellations.add(reject);

            request
                .onSuccess(result => {
                    this.untrack(request);
                    this.pendingCancellations.delete(reject);
                    resolve(result);
                })
                .onFailure(err => {
                    this.untrack(request);
                    this.pendingCancellations.delete(reject);
                    reject(toStoreError(err));
                });
        });
    }

    private track<ResultT>(request: IRemoteRequest<ResultT>): void {
        if (!request.settled) {
            this.pendingRequests.add(request);
        }
    }

    private untrack<ResultT>(request: IRemoteRequest<ResultT>): void {
        this.pendingRequests.delete(request);
    }
}

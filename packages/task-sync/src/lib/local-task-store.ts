import { NotFoundError, toStoreError } from "./errors";
import { IStorage } from "./storage";
import { IStreamEmitter, Stream } from "./stream";
import { ITask, requireTaskId, resolveTaskId } from "./task";
import { ITaskStore } from "./task-store";

//
// Re-reads storage and pushes the result to one subscriber.
//
type WatcherFn = () => void;

//
// The local cache of tasks, on top of a pluggable storage.
//
// Reads are live: each subscriber receives the current state, then the new state after every change made through this store.
//
export class LocalTaskStore implements ITaskStore {

    //
    // Subscribers waiting for changes.
    //
    private watchers = new Set<WatcherFn>();

    constructor(private readonly storage: IStorage<ITask>, private readonly collectionName: string = "tasks") {
    }

    list(): Stream<ITask[]> {
        return this.watch(async emitter => {
            emitter.next(await this.storage.getAllDocuments(this.collectionName));
        });
    }

    get(taskId: string): Stream<ITask> {
        return this.watch(async emitter => {
            const task = await this.storage.getDocument(this.collectionName, taskId);
            if (task) {
                emitter.next(task);
            }
            else {
                emitter.error(new NotFoundError(taskId));
            }
        });
    }

    async save(task: ITask): Promise<void> {
        requireTaskId(task.id);

        await this.storage.updateDocument(this.collectionName, task.id, existing => existing ? { ...existing, ...task } : task);
        this.notifyWatchers();
    }

    async setCompleted(target: ITask | string, completed: boolean): Promise<void> {
        const taskId = requireTaskId(resolveTaskId(target));

        const updated = await this.storage.updateDocument(this.collectionName, taskId, existing => existing && { ...existing, completed });
        if (!updated) {
            throw new NotFoundError(taskId);
        }

        this.notifyWatchers();
    }

    //
    // Uses the storage's field matching, instead of scanning the whole collection.
    //
    async deleteAllCompleted(): Promise<void> {
        const completed = await this.storage.getMatchingDocuments(this.collectionName, "completed", true);
        for (const task of completed) {
            await this.storage.deleteDocument(this.collectionName, task.id);
        }

        this.notifyWatchers();
    }

    async deleteAll(): Promise<void> {
        await this.storage.deleteAllDocuments(this.collectionName);
        this.notifyWatchers();
    }

    async delete(taskId: string): Promise<void> {
        requireTaskId(taskId);

        await this.storage.deleteDocument(this.collectionName, taskId);
        this.notifyWatchers();
    }

    //
    // The cache is its own source, refreshing just re-reads storage for current subscribers.
    //
    async refreshAll(): Promise<void> {
        this.notifyWatchers();
    }

    async refreshOne(taskId: string): Promise<void> {
        this.notifyWatchers();
    }

    //
    // Makes a stream that reads now and again after each change.
    //
    private watch<ValueT>(read: (emitter: IStreamEmitter<ValueT>) => Promise<void>): Stream<ValueT> {
        return new Stream<ValueT>(emitter => {
            const watcher: WatcherFn = () => {
                read(emitter)
                    .catch(err => {
                        emitter.error(toStoreError(err));
                    });
            };

            this.watchers.add(watcher);
            watcher();

            return () => {
                this.watchers.delete(watcher);
            };
        });
    }

    //
    // Notify subscribers of a change.
    //
    private notifyWatchers(): void {
        for (const watcher of Array.from(this.watchers)) {
            watcher();
        }
    }
}

import { Stream } from "./stream";
import { ITask } from "./task";

//
// The capabilities every task store implements, local or remote.
//
// Mutations change this store only, coordinating stores is the job of the repository.
//
export interface ITaskStore {
    //
    // Streams the full collection of tasks.
    //
    list(): Stream<ITask[]>;

    //
    // Streams a single task. Fails with NotFoundError if there is no such task.
    //
    get(taskId: string): Stream<ITask>;

    //
    // Creates the task, or merges it into the existing task with the same id.
    //
    save(task: ITask): Promise<void>;

    //
    // Marks a task as completed or active.
    //
    setCompleted(target: ITask | string, completed: boolean): Promise<void>;

    //
    // Deletes every completed task.
    //
    deleteAllCompleted(): Promise<void>;

    //
    // Deletes every task.
    //
    deleteAll(): Promise<void>;

    //
    // Deletes a task by id.
    //
    delete(taskId: string): Promise<void>;

    //
    // Pulls all data again, without returning it.
    //
    refreshAll(): Promise<void>;

    //
    // Pulls a single task again, without returning it.
    //
    refreshOne(taskId: string): Promise<void>;
}

import express, { NextFunction, Request, Response } from "express";
import cors from "cors";
import { ILog, IRemoteTaskEntry, RemoteTaskFields } from "task-sync";

declare global {
    namespace Express {
        interface Request {
            userId?: string;
        }
    }
}

//
// The tasks of one user, keyed by id in the order they were created.
//
type TaskCollection = Map<string, IRemoteTaskEntry>;

//
// Holds a separate task collection for each user.
//
export class TaskCollections {

    private collections = new Map<string, TaskCollection>();

    //
    // Gets the user's tasks, lazily creating the collection.
    //
    forUser(userId: string): TaskCollection {
        let collection = this.collections.get(userId);
        if (!collection) {
            collection = new Map<string, IRemoteTaskEntry>();
            this.collections.set(userId, collection);
        }

        return collection;
    }
}

//
// Reads the task fields from a request body.
// Returns undefined when the body isn't an object or a field has the wrong type.
//
export function parseTaskFields(body: unknown): Partial<RemoteTaskFields> | undefined {
    if (typeof body !== "object" || body === null || Array.isArray(body)) {
        return undefined;
    }

    const input: Record<string, unknown> = { ...body };
    const fields: Partial<RemoteTaskFields> = {};

    if (input.title !== undefined) {
        if (typeof input.title !== "string") {
            return undefined;
        }
        fields.title = input.title;
    }

    if (input.description !== undefined) {
        if (typeof input.description !== "string") {
            return undefined;
        }
        fields.description = input.description;
    }

    if (input.completed !== undefined) {
        if (typeof input.completed !== "boolean") {
            return undefined;
        }
        fields.completed = input.completed;
    }

    return fields;
}

//
// Gets the user id set by the authentication middleware.
//
function requireUserId(req: Request): string {
    const userId = req.userId;
    if (!userId) {
        throw new Error("User is not identified.");
    }

    return userId;
}

//
// The 4xx status attached to an error raised by the body parser, if any.
//
function clientErrorStatus(err: Error): number | undefined {
    const status: unknown = Reflect.get(err, "status");
    if (typeof status === "number" && status >= 400 && status < 500) {
        return status;
    }

    return undefined;
}

//
// Creates the HTTP service that holds the remote task collections.
//
export function createServer(log: ILog, collections: TaskCollections = new TaskCollections()): express.Express {
    const app = express();

    app.use(cors());
    app.use(express.json());

    //
    // Checks the header of requests for the user id.
    //
    // NOTE: This should be replaced with a JWT for production use.
    //
    app.use((req, res, next) => {
        const userId = req.header("x-user-id");
        if (!userId) {
            res.sendStatus(401);
            return;
        }

        req.userId = userId;
        log.debug(`${req.method} ${req.path} for user ${userId}`);

        next();
    });

    //
    // Gets all tasks for the user.
    //
    app.get("/tasks", (req, res) => {
        const tasks = collections.forUser(requireUserId(req));
        res.json(Array.from(tasks.values()));
    });

    //
    // Gets a single task.
    //
    app.get("/tasks/:id", (req, res) => {
        const task = collections.forUser(requireUserId(req)).get(req.params.id);
        if (!task) {
            res.sendStatus(404);
            return;
        }

        res.json(task);
    });

    //
    // Creates the task, or merges the fields into the existing task.
    //
    app.put("/tasks/:id", (req, res) => {
        const fields = parseTaskFields(req.body);
        if (!fields) {
            res.status(400).json({ error: "Invalid task fields." });
            return;
        }

        const taskId = req.params.id;
        const tasks = collections.forUser(requireUserId(req));
        const existing = tasks.get(taskId);
        tasks.set(taskId, { ...existing, ...fields, id: taskId });

        res.sendStatus(200);
    });

    //
    // Updates fields of an existing task.
    //
    app.patch("/tasks/:id", (req, res) => {
        const fields = parseTaskFields(req.body);
        if (!fields) {
            res.status(400).json({ error: "Invalid task fields." });
            return;
        }

        const taskId = req.params.id;
        const tasks = collections.forUser(requireUserId(req));
        const existing = tasks.get(taskId);
        if (!existing) {
            res.sendStatus(404);
            return;
        }

        tasks.set(taskId, { ...existing, ...fields, id: taskId });

        res.sendStatus(200);
    });

    //
    // Deletes a task. Deleting a missing task succeeds.
    //
    app.delete("/tasks/:id", (req, res) => {
        const tasks = collections.forUser(requireUserId(req));
        tasks.delete(req.params.id);

        res.sendStatus(200);
    });

    app.use((err: Error, req: Request, res: Response, next: NextFunction) => {
        if (res.headersSent) {
            next(err);
            return;
        }

        const status = clientErrorStatus(err);
        if (status !== undefined) {
            //
            // Eg a body that isn't valid JSON.
            //
            res.status(status).json({ error: err.message });
            return;
        }

        log.error(`Failed to handle ${req.method} ${req.path}.`, err);
        res.sendStatus(500);
    });

    return app;
}

import http from "http";
import axios from "axios";
import express from "express";
import { firstValue, HttpRemoteTaskApi, ILog, NotFoundError, RemoteTaskStore, UnavailableError } from "task-sync";
import { createServer, parseTaskFields } from "../server";

function makeLog(): ILog {
    return {
        debug: jest.fn(),
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
    };
}

//
// Starts the app on a free loopback port.
//
function listen(app: express.Express): Promise<http.Server> {
    return new Promise((resolve, reject) => {
        const server = app.listen(0, "127.0.0.1", () => resolve(server));
        server.on("error", reject);
    });
}

function close(server: http.Server): Promise<void> {
    return new Promise((resolve, reject) => {
        server.closeAllConnections();
        server.close(err => err ? reject(err) : resolve());
    });
}

function baseUrlOf(server: http.Server): string {
    const address = server.address();
    if (address === null || typeof address === "string") {
        throw new Error("Server is not listening on a port.");
    }

    return `http://127.0.0.1:${address.port}`;
}

describe("backend", () => {

    let server: http.Server;
    let baseUrl: string;

    beforeEach(async () => {
        server = await listen(createServer(makeLog()));
        baseUrl = baseUrlOf(server);
    });

    afterEach(async () => {
        await close(server);
    });

    function makeStore(userId: string = "user-1"): RemoteTaskStore {
        return new RemoteTaskStore(new HttpRemoteTaskApi({ baseUrl, userId, timeoutMs: 5000 }));
    }

    test("starts with no tasks", async () => {
        expect(await firstValue(makeStore().list())).toEqual([]);
    });

    test("saves and lists tasks", async () => {
        const store = makeStore();

        await store.save({ id: "1", title: "A", description: "first", completed: false });
        await store.save({ id: "2", title: "B", description: "second", completed: true });

        expect(await firstValue(store.list())).toEqual([
            { id: "1", title: "A", description: "first", completed: false },
            { id: "2", title: "B", description: "second", completed: true },
        ]);
    });

    test("saving an existing task merges into it", async () => {
        const store = makeStore();

        await store.save({ id: "1", title: "A", description: "first", completed: false });
        await store.save({ id: "1", title: "A2", description: "first", completed: true });

        expect(await firstValue(store.get("1"))).toEqual({ id: "1", title: "A2", description: "first", completed: true });
    });

    test("getting a missing task fails with NotFoundError", async () => {
        await expect(firstValue(makeStore().get("9"))).rejects.toBeInstanceOf(NotFoundError);
    });

    test("sets completed on an existing task", async () => {
        const store = makeStore();
        await store.save({ id: "1", title: "A", description: "", completed: false });

        await store.setCompleted("1", true);

        expect(await firstValue(store.get("1"))).toEqual({ id: "1", title: "A", description: "", completed: true });
    });

    test("setting completed on a missing task fails with NotFoundError", async () => {
        await expect(makeStore().setCompleted("9", true)).rejects.toBeInstanceOf(NotFoundError);
    });

    test("deletes completed tasks", async () => {
        const store = makeStore();
        await store.save({ id: "1", title: "A", description: "", completed: false });
        await store.save({ id: "2", title: "B", description: "", completed: true });

        await store.deleteAllCompleted();

        expect(await firstValue(store.list())).toEqual([{ id: "1", title: "A", description: "", completed: false }]);
    });

    test("ids are encoded in the url", async () => {
        const store = makeStore();

        await store.save({ id: "a/b c", title: "Odd", description: "", completed: false });
        expect(await firstValue(store.get("a/b c"))).toEqual({ id: "a/b c", title: "Odd", description: "", completed: false });

        await store.delete("a/b c");
        expect(await firstValue(store.list())).toEqual([]);
    });

    test("keeps each user's tasks separate", async () => {
        const alice = makeStore("alice");
        const bob = makeStore("bob");

        await alice.save({ id: "1", title: "A", description: "", completed: false });

        expect(await firstValue(bob.list())).toEqual([]);
        expect(await firstValue(alice.list())).toHaveLength(1);
    });

    test("requests without a user id are refused", async () => {
        const response = await axios.get(`${baseUrl}/tasks`, { validateStatus: () => true });
        expect(response.status).toBe(401);
    });

    test("a body with a field of the wrong type is refused", async () => {
        const response = await axios.put(`${baseUrl}/tasks/1`, { title: 5 }, {
            headers: { "x-user-id": "user-1" },
            validateStatus: () => true,
        });
        expect(response.status).toBe(400);
    });

    test("a body that isn't JSON is refused", async () => {
        const response = await axios.put(`${baseUrl}/tasks/1`, "{not json", {
            headers: { "x-user-id": "user-1", "content-type": "application/json" },
            validateStatus: () => true,
        });
        expect(response.status).toBe(400);
    });
});

describe("HttpRemoteTaskApi", () => {

    test("a request the backend never answers times out as UnavailableError", async () => {
        const app = express();
        app.get("/tasks", () => {
            // Never responds.
        });
        const server = await listen(app);

        try {
            const store = new RemoteTaskStore(new HttpRemoteTaskApi({ baseUrl: baseUrlOf(server), userId: "user-1", timeoutMs: 50 }));
            await expect(firstValue(store.list())).rejects.toBeInstanceOf(UnavailableError);
        }
        finally {
            await close(server);
        }
    });

    test("a backend that is down fails with UnavailableError", async () => {
        const server = await listen(express());
        const baseUrl = baseUrlOf(server);
        await close(server);

        const store = new RemoteTaskStore(new HttpRemoteTaskApi({ baseUrl, userId: "user-1", timeoutMs: 1000 }));
        await expect(store.save({ id: "1", title: "A", description: "", completed: false })).rejects.toBeInstanceOf(UnavailableError);
    });

    test("a response that isn't a task list fails with UnavailableError", async () => {
        const app = express();
        app.get("/tasks", (req, res) => {
            res.json({ tasks: [] });
        });
        const server = await listen(app);

        try {
            const store = new RemoteTaskStore(new HttpRemoteTaskApi({ baseUrl: baseUrlOf(server), userId: "user-1" }));
            await expect(firstValue(store.list())).rejects.toThrow("Unexpected response for the task list.");
        }
        finally {
            await close(server);
        }
    });
});

describe("parseTaskFields", () => {

    test("takes the known fields", () => {
        expect(parseTaskFields({ title: "A", completed: true, other: 1 })).toEqual({ title: "A", completed: true });
    });

    test("refuses values that aren't objects", () => {
        expect(parseTaskFields("A")).toBeUndefined();
        expect(parseTaskFields(null)).toBeUndefined();
        expect(parseTaskFields([])).toBeUndefined();
    });

    test("refuses fields of the wrong type", () => {
        expect(parseTaskFields({ completed: "yes" })).toBeUndefined();
        expect(parseTaskFields({ description: false })).toBeUndefined();
    });
});

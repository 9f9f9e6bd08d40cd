import axios, { AxiosInstance, AxiosRequestConfig, AxiosResponse } from "axios";
import { NotFoundError, UnavailableError } from "./errors";
import { IRemoteRequest, IRemoteTaskApi, IRemoteTaskEntry, RemoteRequest, RemoteTaskFields } from "./remote-api";

//
// Options for connecting to the backend.
//
export interface IHttpRemoteApiOptions {
    //
    // Base URL of the backend, eg http://localhost:3000.
    //
    baseUrl: string;

    //
    // The user whose tasks are accessed.
    //
    userId: string;

    //
    // Milliseconds before a request is abandoned, 0 for no timeout.
    //
    timeoutMs?: number;
}

//
// Checks that a value received from the backend looks like a task entry.
//
export function isRemoteTaskEntry(value: unknown): value is IRemoteTaskEntry {
    if (typeof value !== "object" || value === null) {
        return false;
    }

    const entry: Record<string, unknown> = { ...value };
    return typeof entry.id === "string"
        && (entry.title === undefined || typeof entry.title === "string")
        && (entry.description === undefined || typeof entry.description === "string")
        && (entry.completed === undefined || typeof entry.completed === "boolean");
}

//
// The remote task collection, accessed over HTTP.
//
export class HttpRemoteTaskApi implements IRemoteTaskApi {

    private client: AxiosInstance;

    constructor(options: IHttpRemoteApiOptions) {
        this.client = axios.create({
            baseURL: options.baseUrl,
            timeout: options.timeoutMs || 0,
            headers: {
                //
                // NOTE: This should be replaced with a JWT for production use.
                //
                "x-user-id": options.userId,
            },
        });
    }

    getAll(): IRemoteRequest<IRemoteTaskEntry[]> {
        return this.request({ method: "get", url: "/tasks" }, response => {
            const data: unknown = response.data;
            if (!Array.isArray(data) || !data.every(isRemoteTaskEntry)) {
                throw new UnavailableError(`Unexpected response for the task list.`);
            }

            return data;
        });
    }

    getOne(taskId: string): IRemoteRequest<IRemoteTaskEntry | undefined> {
        return this.request({ method: "get", url: taskUrl(taskId), validateStatus: isOkOrNotFound }, response => {
            if (response.status === 404) {
                return undefined;
            }

            const data: unknown = response.data;
            if (!isRemoteTaskEntry(data)) {
                throw new UnavailableError(`Unexpected response for task ${taskId}.`);
            }

            return data;
        });
    }

    set(taskId: string, fields: RemoteTaskFields): IRemoteRequest<void> {
        return this.request({ method: "put", url: taskUrl(taskId), data: fields }, () => {});
    }

    update(taskId: string, fields: Partial<RemoteTaskFields>): IRemoteRequest<void> {
        return this.request({ method: "patch", url: taskUrl(taskId), data: fields, validateStatus: isOkOrNotFound }, response => {
            if (response.status === 404) {
                throw new NotFoundError(taskId);
            }
        });
    }

    delete(taskId: string): IRemoteRequest<void> {
        return this.request({ method: "delete", url: taskUrl(taskId) }, () => {});
    }

    //
    // Issues a request and reports its completion through the callbacks of the returned request.
    //
    private request<ResultT>(config: AxiosRequestConfig, toResult: (response: AxiosResponse<unknown>) => ResultT): IRemoteRequest<ResultT> {
        const controller = new AbortController();
        const request = new RemoteRequest<ResultT>(() => controller.abort());

        this.client.request<unknown>({ ...config, signal: controller.signal })
            .then(response => {
                request.succeed(toResult(response));
            })
            .catch((err: unknown) => {
                request.fail(toRequestError(config, err));
            });

        return request;
    }
}

//
// Builds the URL for a single task.
//
function taskUrl(taskId: string): string {
    return `/tasks/${encodeURIComponent(taskId)}`;
}

function isOkOrNotFound(status: number): boolean {
    return (status >= 200 && status < 300) || status === 404;
}

//
// Describes why a request failed.
//
function toRequestError(config: AxiosRequestConfig, err: unknown): Error {
    if (err instanceof NotFoundError || err instanceof UnavailableError) {
        return err;
    }

    if (axios.isAxiosError(err)) {
        const status = err.response ? ` with status ${err.response.status}` : "";
        return new UnavailableError(`Request ${config.method?.toUpperCase()} ${config.url} failed${status}: ${err.message}`, err);
    }

    return new UnavailableError(`Request ${config.method?.toUpperCase()} ${config.url} failed.`, err);
}

import { toError } from "./errors";

//
// How a write dispatched to both stores turned out.
//
export type WriteOutcome = "ok" | "remote-failed" | "local-failed" | "both-failed";

//
// The joint result of a write to the remote and local stores.
//
export interface IWriteResult {
    outcome: WriteOutcome;

    //
    // True only when both stores took the write.
    //
    ok: boolean;

    remoteError?: Error;

    localError?: Error;
}

//
// Starts the remote and local writes together, waits for both to settle and reports how each went.
//
// Neither side is rolled back when the other fails.
//
export async function fanOut(remoteWrite: () => Promise<void>, localWrite: () => Promise<void>): Promise<IWriteResult> {
    const [remote, local] = await Promise.allSettled([
        Promise.resolve().then(remoteWrite),
        Promise.resolve().then(localWrite),
    ]);

    const remoteError = remote.status === "rejected" ? toError(remote.reason) : undefined;
    const localError = local.status === "rejected" ? toError(local.reason) : undefined;

    let outcome: WriteOutcome;
    if (remoteError && localError) {
        outcome = "both-failed";
    }
    else if (remoteError) {
        outcome = "remote-failed";
    }
    else if (localError) {
        outcome = "local-failed";
    }
    else {
        outcome = "ok";
    }

    return {
        outcome,
        ok: outcome === "ok",
        remoteError,
        localError,
    };
}

//
// Thrown by assertWritten when a write failed on either side.
//
export class WriteFailedError extends Error {
    constructor(public readonly result: IWriteResult) {
        super(describeFailure(result));
        this.name = "WriteFailedError";
    }
}

//
// Throws if the write did not land on both stores.
//
export function assertWritten(result: IWriteResult): void {
    if (!result.ok) {
        throw new WriteFailedError(result);
    }
}

function describeFailure(result: IWriteResult): string {
    const failures: string[] = [];
    if (result.remoteError) {
        failures.push(`remote: ${result.remoteError.message}`);
    }
    if (result.localError) {
        failures.push(`local: ${result.localError.message}`);
    }

    return `Write failed (${result.outcome}). ${failures.join("; ")}`;
}

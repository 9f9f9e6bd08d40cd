import { CancelledError, toError } from "./errors";

//
// Receives the values, the error and the completion of a stream.
//
export interface IStreamObserver<ValueT> {
    next(value: ValueT): void;

    //
    // Called at most once. No more values are delivered after an error.
    //
    error(err: Error): void;

    complete?(): void;
}

//
// Represents a subscription to a stream.
//
export interface ISubscription {
    //
    // Set to true once the subscription has ended, for whatever reason.
    //
    readonly closed: boolean;

    //
    // Stops the subscription. Nothing is delivered after this.
    //
    unsubscribe(): void;
}

//
// Handed to the producer of a stream so it can push values to the subscriber.
//
export interface IStreamEmitter<ValueT> extends IStreamObserver<ValueT> {
    complete(): void;

    //
    // False once the subscriber has unsubscribed or the stream has closed.
    // Anything emitted after that is discarded.
    //
    readonly active: boolean;
}

//
// Cleans up a producer when the subscription ends.
//
export type TeardownFn = () => void;

//
// Starts producing values for a single subscriber.
//
export type StreamProducerFn<ValueT> = (emitter: IStreamEmitter<ValueT>) => TeardownFn | void;

//
// A cold stream.
//
// Every subscription runs the producer anew, nothing is shared between subscribers.
//
export class Stream<ValueT> {

    constructor(private readonly producer: StreamProducerFn<ValueT>) {
    }

    //
    // Subscribes to the stream, which starts the producer.
    //
    subscribe(observer: IStreamObserver<ValueT>): ISubscription {
        let active = true;
        let teardown: TeardownFn | undefined = undefined;

        //
        // Ends the subscription, returns false if it had already ended.
        //
        function close(): boolean {
            if (!active) {
                return false;
            }

            active = false;

            if (teardown) {
                const cleanup = teardown;
                teardown = undefined;
                cleanup();
            }

            return true;
        }

        const emitter: IStreamEmitter<ValueT> = {
            get active() {
                return active;
            },
            next(value: ValueT) {
                if (active) {
                    observer.next(value);
                }
            },
            error(err: Error) {
                if (close()) {
                    observer.error(err);
                }
            },
            complete() {
                if (close() && observer.complete) {
                    observer.complete();
                }
            },
        };

        try {
            const cleanup = this.producer(emitter);
            if (cleanup) {
                if (active) {
                    teardown = cleanup;
                }
                else {
                    //
                    // The producer finished before it returned its teardown.
                    //
                    cleanup();
                }
            }
        }
        catch (err) {
            emitter.error(toError(err));
        }

        return {
            get closed() {
                return !active;
            },
            unsubscribe() {
                close();
            },
        };
    }

    //
    // A stream that emits a single value and completes.
    //
    static of<ValueT>(value: ValueT): Stream<ValueT> {
        return new Stream<ValueT>(emitter => {
            emitter.next(value);
            emitter.complete();
        });
    }

    //
    // A stream that fails straight away.
    //
    static fail<ValueT>(err: Error): Stream<ValueT> {
        return new Stream<ValueT>(emitter => {
            emitter.error(err);
        });
    }
}

//
// Waits for the first value from a stream, then unsubscribes.
//
// Rejects with the stream's error, or with a CancelledError if the signal is aborted first.
//
export function firstValue<ValueT>(stream: Stream<ValueT>, signal?: AbortSignal): Promise<ValueT> {
    return new Promise<ValueT>((resolve, reject) => {
        if (signal && signal.aborted) {
            reject(new CancelledError());
            return;
        }

        let settled = false;
        let subscription: ISubscription | undefined = undefined;

        function onAbort() {
            settle();
            if (subscription) {
                subscription.unsubscribe();
            }
            reject(new CancelledError());
        }

        function settle(): boolean {
            if (settled) {
                return false;
            }

            settled = true;

            if (signal) {
                signal.removeEventListener("abort", onAbort);
            }

            return true;
        }

        if (signal) {
            signal.addEventListener("abort", onAbort);
        }

        subscription = stream.subscribe({
            next: value => {
                if (settle()) {
                    resolve(value);
                    if (subscription) {
                        subscription.unsubscribe();
                    }
                }
            },
            error: err => {
                if (settle()) {
                    reject(err);
                }
            },
            complete: () => {
                if (settle()) {
                    reject(new Error("The stream completed without a value."));
                }
            },
        });

        if (settled) {
            //
            // A synchronous stream has already delivered.
            //
            subscription.unsubscribe();
        }
    });
}

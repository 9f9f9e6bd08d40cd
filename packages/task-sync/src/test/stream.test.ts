import { CancelledError } from "../lib/errors";
import { firstValue, IStreamEmitter, Stream } from "../lib/stream";

describe("Stream", () => {

    test("runs the producer for each subscriber", () => {
        const producer = jest.fn((emitter: IStreamEmitter<number>) => {
            emitter.next(1);
            emitter.complete();
        });
        const stream = new Stream<number>(producer);

        const values: number[] = [];
        stream.subscribe({ next: value => values.push(value), error: () => {} });
        stream.subscribe({ next: value => values.push(value), error: () => {} });

        expect(producer).toHaveBeenCalledTimes(2);
        expect(values).toEqual([1, 1]);
    });

    test("nothing is delivered after unsubscribing", () => {
        const emitters: IStreamEmitter<string>[] = [];
        const stream = new Stream<string>(emitter => {
            emitters.push(emitter);
        });

        const next = jest.fn();
        const subscription = stream.subscribe({ next, error: () => {} });
        subscription.unsubscribe();

        expect(subscription.closed).toBe(true);
        expect(emitters[0].active).toBe(false);

        emitters[0].next("late");
        expect(next).not.toHaveBeenCalled();
    });

    test("runs the teardown when unsubscribed", () => {
        const teardown = jest.fn();
        const stream = new Stream<string>(() => teardown);

        const subscription = stream.subscribe({ next: () => {}, error: () => {} });
        expect(teardown).not.toHaveBeenCalled();

        subscription.unsubscribe();
        subscription.unsubscribe();
        expect(teardown).toHaveBeenCalledTimes(1);
    });

    test("runs the teardown straight away when the producer completes before returning it", () => {
        const teardown = jest.fn();
        const stream = new Stream<string>(emitter => {
            emitter.complete();
            return teardown;
        });

        const subscription = stream.subscribe({ next: () => {}, error: () => {} });

        expect(subscription.closed).toBe(true);
        expect(teardown).toHaveBeenCalledTimes(1);
    });

    test("delivers the error once and closes", () => {
        const error = jest.fn();
        const complete = jest.fn();
        const stream = new Stream<string>(emitter => {
            emitter.error(new Error("first"));
            emitter.error(new Error("second"));
            emitter.complete();
        });

        const subscription = stream.subscribe({ next: () => {}, error, complete });

        expect(error).toHaveBeenCalledTimes(1);
        expect(error.mock.calls[0][0].message).toBe("first");
        expect(complete).not.toHaveBeenCalled();
        expect(subscription.closed).toBe(true);
    });

    test("an exception thrown by the producer becomes an error", () => {
        const error = jest.fn();
        const stream = new Stream<string>(() => {
            throw new Error("broken producer");
        });

        stream.subscribe({ next: () => {}, error });

        expect(error.mock.calls[0][0].message).toBe("broken producer");
    });
});

describe("firstValue", () => {

    test("resolves the first value and unsubscribes", async () => {
        const teardown = jest.fn();
        const emitters: IStreamEmitter<number>[] = [];
        const stream = new Stream<number>(emitter => {
            emitters.push(emitter);
            return teardown;
        });

        const promise = firstValue(stream);
        emitters[0].next(7);
        emitters[0].next(8);

        await expect(promise).resolves.toBe(7);
        expect(teardown).toHaveBeenCalledTimes(1);
    });

    test("resolves a value emitted synchronously", async () => {
        await expect(firstValue(Stream.of("now"))).resolves.toBe("now");
    });

    test("rejects with the stream's error", async () => {
        await expect(firstValue(Stream.fail(new Error("failed")))).rejects.toThrow("failed");
    });

    test("rejects when the stream completes without a value", async () => {
        const stream = new Stream<number>(emitter => emitter.complete());
        await expect(firstValue(stream)).rejects.toThrow("The stream completed without a value.");
    });

    test("rejects with CancelledError when aborted", async () => {
        const teardown = jest.fn();
        const stream = new Stream<number>(() => teardown);
        const controller = new AbortController();

        const promise = firstValue(stream, controller.signal);
        controller.abort();

        await expect(promise).rejects.toBeInstanceOf(CancelledError);
        expect(teardown).toHaveBeenCalledTimes(1);
    });

    test("rejects straight away when the signal is already aborted", async () => {
        const producer = jest.fn();
        const controller = new AbortController();
        controller.abort();

        await expect(firstValue(new Stream<number>(producer), controller.signal)).rejects.toBeInstanceOf(CancelledError);
        expect(producer).not.toHaveBeenCalled();
    });
});

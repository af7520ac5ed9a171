/**
 * Serializes async critical sections: each `run` starts only after every
 * previously queued section has settled.
 */
export class Mutex {
    private tail: Promise<void> = Promise.resolve();

    run<T>(fn: () => Promise<T>): Promise<T> {
        const result = this.tail.then(fn, fn);
        this.tail = result.then(
            () => undefined,
            () => undefined
        );
        return result;
    }
}

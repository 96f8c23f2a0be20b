/** Runs async tasks one at a time in submission order. */
export class TaskQueue {
    #tail: Promise<void> = Promise.resolve();

    run<T>(task: () => Promise<T>): Promise<T> {
        const result = this.#tail.then(task);
        this.#tail = result.then(
            () => undefined,
            () => undefined
        );
        return result;
    }

    /** Resolves when everything queued so far has settled. */
    drain(): Promise<void> {
        return this.#tail;
    }
}

/**
 * Bounded single-consumer queue. `push` never waits: when the queue is full
 * the offered item is dropped and the ones already queued keep their order.
 */
export class FrameQueue<T> {
    #items: T[] = [];
    #capacity: number;
    #closed = false;
    #waiter: ((item: T | undefined) => void) | undefined;
    #dropped = 0;

    constructor(capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`Invalid queue capacity ${capacity}`);
        }
        this.#capacity = capacity;
    }

    get length(): number {
        return this.#items.length;
    }

    get dropped(): number {
        return this.#dropped;
    }

    get closed(): boolean {
        return this.#closed;
    }

    push(item: T): boolean {
        if (this.#closed) {
            return false;
        }
        const waiter = this.#waiter;
        if (waiter) {
            this.#waiter = undefined;
            waiter(item);
            return true;
        }
        if (this.#items.length >= this.#capacity) {
            ++this.#dropped;
            return false;
        }
        this.#items.push(item);
        return true;
    }

    /** Resolves with the oldest item, or undefined once closed or aborted. */
    next(signal?: AbortSignal): Promise<T | undefined> {
        const item = this.#items.shift();
        if (item !== undefined || this.#closed || signal?.aborted) {
            return Promise.resolve(item);
        }
        if (this.#waiter) {
            return Promise.reject(new Error("FrameQueue already has a pending reader"));
        }

        return new Promise<T | undefined>((resolve: (value: T | undefined) => void) => {
            const onAbort = (): void => {
                if (this.#waiter === settle) {
                    this.#waiter = undefined;
                }
                resolve(undefined);
            };
            const settle = (value: T | undefined): void => {
                signal?.removeEventListener("abort", onAbort);
                resolve(value);
            };
            this.#waiter = settle;
            signal?.addEventListener("abort", onAbort, { once: true });
        });
    }

    close(): void {
        if (this.#closed) {
            return;
        }
        this.#closed = true;
        this.#items = [];
        const waiter = this.#waiter;
        this.#waiter = undefined;
        if (waiter) {
            waiter(undefined);
        }
    }
}

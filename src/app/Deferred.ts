/** A promise settled from outside its executor. */
export class Deferred<T> {
    readonly promise: Promise<T>;
    #resolve: (value: T) => void = () => undefined;
    #settled = false;

    constructor() {
        this.promise = new Promise<T>((resolve: (value: T) => void) => {
            this.#resolve = resolve;
        });
    }

    get settled(): boolean {
        return this.#settled;
    }

    resolve(value: T): void {
        if (!this.#settled) {
            this.#settled = true;
            this.#resolve(value);
        }
    }
}

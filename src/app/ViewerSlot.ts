import { KvmError } from "./KvmError";
import { debug } from "./debug";

/**
 * The one video viewer the daemon serves, shared by the MJPEG and H264
 * endpoints since both drive the same camera.
 */
export class ViewerSlot {
    #holder: string | undefined;

    get busy(): boolean {
        return this.#holder !== undefined;
    }

    get holder(): string | undefined {
        return this.#holder;
    }

    /** Throws StreamConflict while taken. The returned release is idempotent. */
    acquire(holder: string): () => void {
        if (this.#holder !== undefined) {
            throw new KvmError("StreamConflict", `Stream already in use by ${this.#holder}`);
        }
        this.#holder = holder;
        debug(`Video viewer attached: ${holder}`);

        let released = false;
        return (): void => {
            if (!released) {
                released = true;
                this.#holder = undefined;
                debug(`Video viewer detached: ${holder}`);
            }
        };
    }
}

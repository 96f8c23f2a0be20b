import { CaptureProcess } from "./CaptureProcess";
import { TaskQueue } from "./TaskQueue";
import { captureArgs } from "./captureArgs";
import { log } from "./log";
import { sameCaptureOptions } from "./sameCaptureOptions";
import { spawnCapture } from "./spawnCapture";
import type { CaptureOptions } from "./CaptureOptions";
import type { CaptureSpawner } from "./CaptureSpawner";

export const DEFAULT_CAPTURE_COMMAND = "rpicam-vid";

/**
 * Owns the single capture session of the daemon. Start, restart and stop
 * requests run one after another so two capture tools never hold the
 * camera at once.
 */
export class CaptureSupervisor {
    #command: string;
    #spawner: CaptureSpawner;
    #current: CaptureProcess | undefined;
    #options: CaptureOptions | undefined;
    #queue = new TaskQueue();

    constructor(command: string = DEFAULT_CAPTURE_COMMAND, spawner: CaptureSpawner = spawnCapture) {
        this.#command = command;
        this.#spawner = spawner;
    }

    get current(): CaptureProcess | undefined {
        return this.#current?.running ? this.#current : undefined;
    }

    get options(): CaptureOptions | undefined {
        return this.current ? this.#options : undefined;
    }

    /**
     * Returns the running session when it already matches `options`,
     * otherwise stops it and starts a new one.
     */
    start(options: CaptureOptions): Promise<CaptureProcess> {
        return this.#queue.run(async (): Promise<CaptureProcess> => {
            const current = this.current;
            if (current && this.#options && sameCaptureOptions(this.#options, options)) {
                return current;
            }
            if (current) {
                log(`Reconfiguring ${options.codec} capture: ${describe(options)}`);
                await this.#stopCurrent();
            } else {
                log(`Starting ${options.codec} capture: ${describe(options)}`);
            }

            const capture = await CaptureProcess.start(this.#command, captureArgs(options), this.#spawner);
            this.#current = capture;
            this.#options = { ...options };
            return capture;
        });
    }

    stop(): Promise<void> {
        return this.#queue.run(async (): Promise<void> => {
            await this.#stopCurrent();
        });
    }

    async #stopCurrent(): Promise<void> {
        const capture = this.#current;
        this.#current = undefined;
        this.#options = undefined;
        if (capture) {
            await capture.stop();
        }
    }
}

function describe(options: CaptureOptions): string {
    const size = options.width > 0 && options.height > 0 ? `${options.width}x${options.height}` : "native";
    return `${size} @ ${options.framerate}fps`;
}

import { CaptureProcess } from "./CaptureProcess";
import { TaskQueue } from "./TaskQueue";
import { defaultVideoSettings } from "./defaultVideoSettings";
import { log } from "./log";
import { spawnCapture } from "./spawnCapture";
import { ustreamerArgs } from "./ustreamerArgs";
import type { CaptureSpawner } from "./CaptureSpawner";
import type { UstreamerOptions } from "./UstreamerOptions";
import type { VideoSettings } from "./VideoSettings";

/**
 * Manages the external MJPEG HTTP server used when the browser pulls video
 * straight from ustreamer. Settings changes apply on the next start.
 */
export class UstreamerSupervisor {
    #options: UstreamerOptions;
    #spawner: CaptureSpawner;
    #settings: VideoSettings = defaultVideoSettings();
    #process: CaptureProcess | undefined;
    #queue = new TaskQueue();

    constructor(options: UstreamerOptions, spawner: CaptureSpawner = spawnCapture) {
        this.#options = { ...options };
        this.#spawner = spawner;
    }

    get port(): number {
        return this.#options.port;
    }

    get settings(): VideoSettings {
        return { ...this.#settings };
    }

    set settings(settings: VideoSettings) {
        this.#settings = { ...settings };
        log(
            `Updated video settings: quality=${settings.quality}, fps=${settings.desiredFps}, ` +
                `buffers=${settings.buffers}, tcp-nodelay=${settings.tcpNodelay}`
        );
    }

    get running(): boolean {
        return this.#process?.running ?? false;
    }

    /** Starting while already running does nothing. */
    start(): Promise<void> {
        return this.#queue.run(async (): Promise<void> => {
            if (this.running) {
                return;
            }
            const settings = this.#settings;
            log(
                `Starting ustreamer on ${this.#options.host}:${this.#options.port} with settings: ` +
                    `quality=${settings.quality}, fps=${settings.desiredFps}, buffers=${settings.buffers}, ` +
                    `tcp-nodelay=${settings.tcpNodelay}`
            );
            const ustreamer = await CaptureProcess.start(
                this.#options.command,
                ustreamerArgs(this.#options, settings),
                this.#spawner,
                true
            );
            this.#process = ustreamer;
            log(`ustreamer started (PID: ${ustreamer.pid})`);
        });
    }

    stop(): Promise<void> {
        return this.#queue.run(async (): Promise<void> => {
            const ustreamer = this.#process;
            this.#process = undefined;
            if (ustreamer?.running) {
                log(`Stopping ustreamer (PID: ${ustreamer.pid})...`);
                await ustreamer.stop();
                log("ustreamer stopped");
            }
        });
    }
}

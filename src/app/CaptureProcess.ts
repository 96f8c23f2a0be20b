import { Deferred } from "./Deferred";
import { KvmError } from "./KvmError";
import { basename } from "path";
import { createInterface } from "readline";
import { debug } from "./debug";
import { error } from "./error";
import { errorMessage } from "./errorMessage";
import { log } from "./log";
import { once } from "events";
import { spawnCapture } from "./spawnCapture";
import type { CaptureChild } from "./CaptureChild";
import type { CaptureExit } from "./CaptureExit";
import type { CaptureSpawner } from "./CaptureSpawner";
import type { Readable } from "stream";

const KILL_TIMEOUT_MS = 3000;

/**
 * One running capture tool. `signal` aborts as soon as the process is gone,
 * whatever the reason; `stop()` resolves only after that has happened.
 */
export class CaptureProcess {
    readonly command: string;
    readonly args: readonly string[];
    #child: CaptureChild;
    #stdout: Readable;
    #controller = new AbortController();
    #exit = new Deferred<CaptureExit>();
    #stopRequested = false;

    private constructor(
        command: string,
        args: readonly string[],
        child: CaptureChild,
        stdout: Readable,
        logStdout: boolean
    ) {
        this.command = command;
        this.args = args;
        this.#child = child;
        this.#stdout = stdout;

        const tool = basename(command);
        if (child.stderr) {
            logLines(tool, child.stderr);
        }
        if (logStdout) {
            logLines(tool, stdout);
        }

        child.on("error", (err: Error) => {
            error(`${tool} error:`, err.message);
        });

        child.once("close", (code: number | null, signal: NodeJS.Signals | null) => {
            const requested = this.#stopRequested;
            if (requested) {
                debug(`${tool} stopped`);
            } else {
                log(`${tool} exited (code ${code}, signal ${signal})`);
            }
            this.#exit.resolve({ code, signal, requested });
            this.#controller.abort(
                new KvmError("SubprocessExited", `${tool} exited with ${signal ?? `code ${code}`}`)
            );
        });
    }

    /**
     * Spawns the tool and waits until the OS reports it running. With
     * `logStdout` the tool's stdout is logged like stderr instead of being
     * left for a reader.
     */
    static async start(
        command: string,
        args: readonly string[],
        spawner: CaptureSpawner = spawnCapture,
        logStdout: boolean = false
    ): Promise<CaptureProcess> {
        debug(`Starting ${command} ${args.join(" ")}`);
        let child: CaptureChild;
        try {
            child = spawner(command, args);
            await once(child, "spawn");
        } catch (err) {
            throw new KvmError("SubprocessStartFailed", `Failed to start ${command}: ${errorMessage(err)}`, err);
        }

        if (!child.stdout) {
            child.kill("SIGKILL");
            throw new KvmError("SubprocessStartFailed", `${command} has no stdout pipe`);
        }
        return new CaptureProcess(command, args, child, child.stdout, logStdout);
    }

    get pid(): number | undefined {
        return this.#child.pid;
    }

    get stdout(): Readable {
        return this.#stdout;
    }

    get signal(): AbortSignal {
        return this.#controller.signal;
    }

    get running(): boolean {
        return !this.#exit.settled;
    }

    get exited(): Promise<CaptureExit> {
        return this.#exit.promise;
    }

    /** SIGTERM, then SIGKILL if the tool lingers. */
    async stop(): Promise<CaptureExit> {
        if (!this.#exit.settled) {
            this.#stopRequested = true;
            this.#child.kill("SIGTERM");
            const timer = setTimeout(() => {
                debug(`${basename(this.command)} ignored SIGTERM, killing`);
                this.#child.kill("SIGKILL");
            }, KILL_TIMEOUT_MS);
            try {
                return await this.#exit.promise;
            } finally {
                clearTimeout(timer);
            }
        }
        return this.#exit.promise;
    }
}

function logLines(tool: string, input: Readable): void {
    const lines = createInterface({ input, crlfDelay: Infinity });
    lines.on("line", (line: string) => {
        if (line.trim()) {
            log(`[${tool}] ${line}`);
        }
    });
}

import type { EventEmitter } from "events";
import type { Readable } from "stream";

/**
 * The part of a ChildProcess the capture code relies on. Emits "spawn",
 * "error" and "close" (code, signal) like the real thing.
 */
export interface CaptureChild extends EventEmitter {
    readonly stdout: Readable | null;
    readonly stderr: Readable | null;
    readonly pid?: number | undefined;
    kill(signal?: NodeJS.Signals): boolean;
}

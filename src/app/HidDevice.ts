import { KvmError } from "./KvmError";
import { error } from "./error";
import { errorMessage } from "./errorMessage";
import { hasErrnoCode } from "./hasErrnoCode";
import { open, stat } from "fs/promises";
import { setTimeout as sleep } from "timers/promises";
import type { FileHandle } from "fs/promises";
import type { ReportSink } from "./ReportSink";

export const DEFAULT_HID_DEVICE = "/dev/hidg0";
export const DEFAULT_REPORT_DELAY_MS = 10;

/**
 * Writes reports to a HID gadget character device.
 *
 * The device is opened and closed around every report. The gadget can be
 * unbound and rebound from its UDC while the daemon runs, and a handle kept
 * across that would point at the old endpoint.
 */
export class HidDevice implements ReportSink {
    #path: string;
    #defaultDelayMs: number;

    constructor(path: string = DEFAULT_HID_DEVICE, defaultDelayMs: number = DEFAULT_REPORT_DELAY_MS) {
        this.#path = path || DEFAULT_HID_DEVICE;
        this.#defaultDelayMs = defaultDelayMs;
    }

    get path(): string {
        return this.#path;
    }

    async send(report: Buffer, delayMs: number = this.#defaultDelayMs): Promise<void> {
        let handle: FileHandle;
        try {
            handle = await open(this.#path, "r+");
        } catch (err) {
            throw new KvmError("DeviceUnavailable", `failed to open HID device ${this.#path}`, err);
        }

        try {
            await handle.write(report, 0, report.length);
        } catch (err) {
            throw new KvmError("WriteFailed", `failed to write HID report to ${this.#path}`, err);
        } finally {
            await handle.close().catch((err: unknown) => {
                error(`Failed to close HID device ${this.#path}:`, errorMessage(err));
            });
        }

        if (delayMs > 0) {
            await sleep(delayMs);
        }
    }

    /** Throws DeviceUnavailable unless the path exists and is a character device. */
    async check(): Promise<void> {
        let isCharacterDevice: boolean;
        try {
            isCharacterDevice = (await stat(this.#path)).isCharacterDevice();
        } catch (err) {
            if (hasErrnoCode(err, "ENOENT")) {
                throw new KvmError("DeviceUnavailable", `HID device not found: ${this.#path}`, err);
            }
            throw new KvmError("DeviceUnavailable", `cannot inspect HID device ${this.#path}: ${errorMessage(err)}`, err);
        }
        if (!isCharacterDevice) {
            throw new KvmError("DeviceUnavailable", `path is not a character device: ${this.#path}`);
        }
    }
}

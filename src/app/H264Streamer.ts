import { error } from "./error";
import { errorMessage } from "./errorMessage";
import { isKvmError } from "./isKvmError";
import { log } from "./log";
import { parsePositiveInt } from "./parsePositiveInt";
import { rejectUpgrade } from "./rejectUpgrade";
import { verbose } from "./verbose";
import WebSocket, { WebSocketServer } from "ws";
import type { CaptureProcess } from "./CaptureProcess";
import type { CaptureSupervisor } from "./CaptureSupervisor";
import type { Duplex } from "stream";
import type { IncomingMessage } from "http";
import type { VideoMode } from "./VideoMode";
import type { VideoSocket } from "./VideoSocket";
import type { ViewerSlot } from "./ViewerSlot";

const CLOSE_NORMAL = 1000;
const CLOSE_INTERNAL_ERROR = 1011;
// The capture pipe is paused while the viewer has more than this unsent
const MAX_BUFFERED_BYTES = 1024 * 1024;

export interface H264StreamerOptions {
    supervisor: CaptureSupervisor;
    slot: ViewerSlot;
    mode: VideoMode;
}

/**
 * Relays raw H264 from the capture tool to one WebSocket viewer. Chunks go
 * out as read from the pipe; the browser decoder finds the NAL boundaries.
 */
export class H264Streamer {
    #wss = new WebSocketServer({ noServer: true });
    #supervisor: CaptureSupervisor;
    #slot: ViewerSlot;
    #mode: VideoMode;

    constructor(options: H264StreamerOptions) {
        this.#supervisor = options.supervisor;
        this.#slot = options.slot;
        this.#mode = { ...options.mode };
    }

    /** The mode the last viewer asked for; the default for the next one. */
    get mode(): VideoMode {
        return { ...this.#mode };
    }

    /** Query values that are missing or not positive integers keep the current mode. */
    resolveMode(url: string | undefined): VideoMode {
        const params = new URL(url || "/", "http://localhost").searchParams;
        return {
            width: parsePositiveInt(params.get("width"), this.#mode.width),
            height: parsePositiveInt(params.get("height"), this.#mode.height),
            framerate: parsePositiveInt(params.get("framerate"), this.#mode.framerate)
        };
    }

    handleUpgrade(request: IncomingMessage, socket: Duplex, head: Buffer): void {
        const remote = request.socket.remoteAddress ?? "unknown";
        let release: () => void;
        try {
            release = this.#slot.acquire(`${remote} (h264)`);
        } catch (err) {
            if (isKvmError(err, "StreamConflict")) {
                log(`Rejecting H264 viewer ${remote}: ${err.message}`);
                rejectUpgrade(socket, 409, "Stream already in use");
                return;
            }
            throw err;
        }

        const mode = this.resolveMode(request.url);
        let accepted = false;
        socket.once("close", () => {
            if (!accepted) {
                release();
            }
        });
        this.#wss.handleUpgrade(request, socket, head, (ws: WebSocket) => {
            accepted = true;
            this.serve(ws, mode, remote)
                .catch((err: unknown) => {
                    error("H264 stream failed:", errorMessage(err));
                })
                .finally(release);
        });
    }

    /** Streams until either side goes away, then stops the capture. */
    async serve(ws: VideoSocket, mode: VideoMode, remote: string): Promise<void> {
        const closed = new Promise<void>((resolve: () => void) => {
            ws.once("close", () => {
                resolve();
            });
        });
        ws.on("error", (err: Error) => {
            verbose(`H264 socket error from ${remote}:`, err.message);
        });

        this.#mode = { ...mode };
        let capture: CaptureProcess;
        try {
            capture = await this.#supervisor.start({ codec: "h264", ...mode });
        } catch (err) {
            error("Failed to start H264 capture:", errorMessage(err));
            ws.close(CLOSE_INTERNAL_ERROR, "Failed to start stream");
            return;
        }

        log(`H264 client connected: ${remote} (${mode.width}x${mode.height} @ ${mode.framerate}fps)`);
        const stdout = capture.stdout;
        const onData = (chunk: Buffer): void => {
            if (ws.readyState !== WebSocket.OPEN) {
                return;
            }
            ws.send(chunk, { binary: true }, (err?: Error) => {
                if (err) {
                    verbose("Failed to send H264 data:", err.message);
                }
                if (stdout.isPaused() && ws.bufferedAmount <= MAX_BUFFERED_BYTES) {
                    stdout.resume();
                }
            });
            if (ws.bufferedAmount > MAX_BUFFERED_BYTES && !stdout.isPaused()) {
                verbose(`H264 viewer ${remote} is behind by ${ws.bufferedAmount} bytes, pausing capture output`);
                stdout.pause();
            }
        };
        const onEnded = (): void => {
            ws.close(CLOSE_NORMAL, "Stream ended");
        };
        stdout.on("data", onData);
        capture.signal.addEventListener("abort", onEnded, { once: true });
        if (capture.signal.aborted || ws.readyState !== WebSocket.OPEN) {
            ws.close(CLOSE_NORMAL, "Stream ended");
        }

        try {
            await closed;
        } finally {
            stdout.off("data", onData);
            stdout.resume();
            capture.signal.removeEventListener("abort", onEnded);
            await this.#supervisor.stop();
            log(`H264 client disconnected: ${remote}`);
        }
    }

    close(): void {
        this.#wss.clients.forEach((client: WebSocket): void => {
            client.terminate();
        });
        this.#wss.close();
    }
}

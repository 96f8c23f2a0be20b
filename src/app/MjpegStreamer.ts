import { FrameQueue } from "./FrameQueue";
import { MJPEG_BOUNDARY, multipartFrameHeader } from "./multipartFrameHeader";
import { MjpegFrameExtractor } from "./MjpegFrameExtractor";
import { error } from "./error";
import { errorMessage } from "./errorMessage";
import { isKvmError } from "./isKvmError";
import { log } from "./log";
import { once } from "events";
import { verbose } from "./verbose";
import type { CaptureOptions } from "./CaptureOptions";
import type { CaptureProcess } from "./CaptureProcess";
import type { CaptureSupervisor } from "./CaptureSupervisor";
import type { FastifyReply, FastifyRequest } from "fastify";
import type { ServerResponse } from "http";
import type { ViewerSlot } from "./ViewerSlot";

export interface MjpegStreamerOptions {
    supervisor: CaptureSupervisor;
    slot: ViewerSlot;
    // Read on every connect so a config change applies to the next viewer
    capture: () => Omit<CaptureOptions, "codec">;
    maxFrameBytes: number;
}

/** Serves the camera as multipart/x-mixed-replace JPEG frames. */
export class MjpegStreamer {
    #supervisor: CaptureSupervisor;
    #slot: ViewerSlot;
    #capture: () => Omit<CaptureOptions, "codec">;
    #maxFrameBytes: number;

    constructor(options: MjpegStreamerOptions) {
        this.#supervisor = options.supervisor;
        this.#slot = options.slot;
        this.#capture = options.capture;
        this.#maxFrameBytes = options.maxFrameBytes;
    }

    async handle(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | undefined> {
        let release: () => void;
        try {
            release = this.#slot.acquire(`${request.ip} (mjpeg)`);
        } catch (err) {
            if (isKvmError(err, "StreamConflict")) {
                log(`Rejecting MJPEG viewer ${request.ip}: ${err.message}`);
                return reply.code(409).send({ error: "Stream already in use" });
            }
            throw err;
        }

        const options: CaptureOptions = { ...this.#capture(), codec: "mjpeg" };
        let capture: CaptureProcess;
        try {
            capture = await this.#supervisor.start(options);
        } catch (err) {
            release();
            error("Failed to start MJPEG capture:", errorMessage(err));
            return reply.code(500).send({ error: "Failed to start video stream" });
        }

        reply.hijack();
        if (request.raw.destroyed || reply.raw.destroyed) {
            await this.#supervisor.stop();
            release();
            log(`MJPEG client ${request.ip} left before the stream started`);
            return undefined;
        }
        const res = reply.raw;
        res.writeHead(200, {
            "Content-Type": `multipart/x-mixed-replace; boundary=${MJPEG_BOUNDARY}`,
            "Cache-Control": "no-cache, no-store, must-revalidate",
            Pragma: "no-cache",
            Connection: "close"
        });
        log(`MJPEG client connected: ${request.ip}`);

        try {
            await this.#pump(capture, res, options.framerate);
        } catch (err) {
            error("MJPEG stream failed:", errorMessage(err));
        } finally {
            await this.#supervisor.stop();
            release();
            if (!res.writableEnded) {
                res.end();
            }
            log(`MJPEG client disconnected: ${request.ip}`);
        }
        return undefined;
    }

    async #pump(capture: CaptureProcess, res: ServerResponse, framerate: number): Promise<void> {
        const controller = new AbortController();
        const abort = (): void => {
            controller.abort();
        };
        res.once("close", abort);
        capture.signal.addEventListener("abort", abort, { once: true });
        if (capture.signal.aborted || res.destroyed || res.writableEnded) {
            controller.abort();
        }

        // Roughly one second of video
        const queue = new FrameQueue<Buffer>(Math.max(1, framerate));
        const extractor = new MjpegFrameExtractor(this.#maxFrameBytes);
        const onData = (chunk: Buffer): void => {
            for (const frame of extractor.feed(chunk)) {
                queue.push(frame);
            }
        };
        capture.stdout.on("data", onData);

        let frames = 0;
        const stats = setInterval(() => {
            if (frames > 0) {
                verbose(`MJPEG stream: ${frames} fps, ${queue.dropped} dropped`);
                frames = 0;
            }
        }, 1000);

        try {
            while (!controller.signal.aborted) {
                const frame = await queue.next(controller.signal);
                if (!frame) {
                    break;
                }
                res.write(multipartFrameHeader(frame.length));
                res.write(frame);
                if (!res.write("\r\n")) {
                    await once(res, "drain", { signal: controller.signal });
                }
                ++frames;
            }
        } catch (err) {
            if (!controller.signal.aborted) {
                throw err;
            }
        } finally {
            clearInterval(stats);
            capture.stdout.off("data", onData);
            capture.signal.removeEventListener("abort", abort);
            res.off("close", abort);
            queue.close();
        }
    }
}

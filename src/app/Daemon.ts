import { CaptureSupervisor } from "./CaptureSupervisor";
import { ControlChannel } from "./ControlChannel";
import { H264Streamer } from "./H264Streamer";
import { HidDevice } from "./HidDevice";
import { InputTranslator } from "./InputTranslator";
import { MjpegStreamer } from "./MjpegStreamer";
import { Server } from "./Server";
import { UstreamerSupervisor } from "./UstreamerSupervisor";
import { ViewerSlot } from "./ViewerSlot";
import { detectCameraModes } from "./detectCameraModes";
import { error } from "./error";
import { errorMessage } from "./errorMessage";
import { log } from "./log";
import { once } from "events";
import { spawnCapture } from "./spawnCapture";
import type { CameraMode } from "./CameraMode";
import type { CaptureSpawner } from "./CaptureSpawner";
import type { Config } from "./Config";

/**
 * Wires the HID path, the video paths and the HTTP server together and owns
 * the root abort signal. Aborting it stops the capture tool and ustreamer
 * before the server closes.
 */
export class Daemon {
    #config: Config;
    #controller = new AbortController();
    #hid: HidDevice;
    #capture: CaptureSupervisor;
    #ustreamer: UstreamerSupervisor;
    #control: ControlChannel;
    #server: Server;
    #cameraModes: Promise<CameraMode[]> | undefined;

    constructor(config: Config, spawner: CaptureSpawner = spawnCapture) {
        this.#config = config;
        this.#hid = new HidDevice(config.hidDevice, config.reportDelayMs);
        this.#capture = new CaptureSupervisor(config.captureCommand, spawner);
        this.#ustreamer = new UstreamerSupervisor(
            {
                command: config.ustreamerCommand,
                device: config.videoDevice,
                host: config.ustreamerHost,
                port: config.ustreamerPort
            },
            spawner
        );
        this.#control = new ControlChannel(new InputTranslator(this.#hid));

        const slot = new ViewerSlot();
        this.#server = new Server({
            host: config.host,
            port: config.port,
            staticDir: config.staticDir,
            control: this.#control,
            mjpeg: new MjpegStreamer({
                supervisor: this.#capture,
                slot,
                capture: () => ({
                    width: config.videoWidth,
                    height: config.videoHeight,
                    framerate: config.framerate,
                    quality: config.quality
                }),
                maxFrameBytes: config.maxFrameBytes
            }),
            h264: new H264Streamer({
                supervisor: this.#capture,
                slot,
                mode: { width: config.videoWidth, height: config.videoHeight, framerate: config.framerate }
            }),
            ustreamer: this.#ustreamer,
            cameraModes: () => this.#detectCameraModes()
        });
    }

    get signal(): AbortSignal {
        return this.#controller.signal;
    }

    get server(): Server {
        return this.#server;
    }

    async start(): Promise<void> {
        try {
            await this.#hid.check();
        } catch (err) {
            // The control channel stays usable; reports fail until the gadget appears
            log(`Warning: ${errorMessage(err)}`);
        }
        await this.#server.start();
    }

    stop(): void {
        this.#controller.abort();
    }

    /** Starts, then resolves once stop() has been called and shutdown is complete. */
    async run(): Promise<void> {
        await this.start();
        if (!this.#controller.signal.aborted) {
            await once(this.#controller.signal, "abort");
        }
        await this.#shutdown();
    }

    async #shutdown(): Promise<void> {
        log("Shutting down...");
        const results = await Promise.allSettled([this.#capture.stop(), this.#ustreamer.stop()]);
        for (const result of results) {
            if (result.status === "rejected") {
                error("Failed to stop video:", errorMessage(result.reason));
            }
        }
        await this.#server.stop(this.#config.shutdownGraceMs);
        await this.#control.idle();
    }

    // The list is stable for the life of the camera; detect it once
    #detectCameraModes(): Promise<CameraMode[]> {
        if (!this.#cameraModes) {
            this.#cameraModes = detectCameraModes(this.#config.captureCommand);
        }
        return this.#cameraModes;
    }
}

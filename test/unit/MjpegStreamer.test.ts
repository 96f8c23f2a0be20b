import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { CaptureSupervisor } from "../../src/app/CaptureSupervisor";
import { FakeSpawner } from "../helpers/FakeSpawner";
import { Deferred } from "../../src/app/Deferred";
import { MjpegStreamer } from "../../src/app/MjpegStreamer";
import { ViewerSlot } from "../../src/app/ViewerSlot";
import { flush } from "../helpers/flush";
import { multipartFrameHeader } from "../../src/app/multipartFrameHeader";
import Fastify from "fastify";
import http from "http";
import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import type { IncomingMessage } from "http";

const JPEG = Buffer.from([0xff, 0xd8, 0x01, 0x02, 0xff, 0xd9]);

describe("multipartFrameHeader", () => {
    it("describes one JPEG part", () => {
        expect(multipartFrameHeader(1234)).toBe(
            "--frame\r\nContent-Type: image/jpeg\r\nContent-Length: 1234\r\n\r\n"
        );
    });
});

describe("MjpegStreamer", () => {
    let app: FastifyInstance;
    let spawner: FakeSpawner;
    let slot: ViewerSlot;
    let lastRequest: IncomingMessage | undefined;

    beforeEach(async () => {
        lastRequest = undefined;
        spawner = new FakeSpawner();
        slot = new ViewerSlot();
        const streamer = new MjpegStreamer({
            supervisor: new CaptureSupervisor("rpicam-vid", spawner.spawn),
            slot,
            capture: () => ({ width: 1280, height: 720, framerate: 30, quality: 80 }),
            maxFrameBytes: 1024
        });
        app = Fastify({ logger: false });
        app.get("/stream", async (request: FastifyRequest, reply: FastifyReply) => {
            lastRequest = request.raw;
            return streamer.handle(request, reply);
        });
        await app.ready();
    });

    afterEach(async () => {
        await app.close();
    });

    it("answers 409 while another viewer holds the camera", async () => {
        slot.acquire("h264 viewer");
        const response = await app.inject({ method: "GET", url: "/stream" });
        expect(response.statusCode).toBe(409);
        expect(response.json()).toEqual({ error: "Stream already in use" });
        expect(spawner.calls).toHaveLength(0);
    });

    it("answers 500 and frees the slot when capture cannot start", async () => {
        spawner.failure = new Error("spawn rpicam-vid ENOENT");
        const response = await app.inject({ method: "GET", url: "/stream" });
        expect(response.statusCode).toBe(500);
        expect(response.json()).toEqual({ error: "Failed to start video stream" });
        expect(slot.busy).toBe(false);
    });

    it("streams extracted frames until the capture ends", async () => {
        const pending = app.inject({ method: "GET", url: "/stream" });
        await flush(10);

        const child = spawner.last;
        child.stdout.write(Buffer.concat([Buffer.from([0x00]), JPEG.subarray(0, 3)]));
        child.stdout.write(JPEG.subarray(3));
        await flush();
        child.exit(0);

        const response = await pending;
        expect(response.statusCode).toBe(200);
        expect(response.headers["content-type"]).toBe("multipart/x-mixed-replace; boundary=frame");
        expect(response.rawPayload).toEqual(
            Buffer.concat([Buffer.from(multipartFrameHeader(JPEG.length)), JPEG, Buffer.from("\r\n")])
        );
        expect(spawner.calls[0].args).toContain("mjpeg");
        expect(slot.busy).toBe(false);
    });

    it("stops the capture and frees the slot when the viewer leaves during startup", async () => {
        const spawned = new Deferred<void>();
        spawner.hold = spawned.promise;
        const address = await app.listen({ port: 0, host: "127.0.0.1" });

        const client = http.get(new URL("/stream", address));
        const clientErrors: string[] = [];
        client.on("error", (err: Error) => {
            clientErrors.push(err.message);
        });
        await vi.waitFor(() => {
            expect(spawner.calls).toHaveLength(1);
        });

        client.destroy();
        await vi.waitFor(() => {
            expect(lastRequest?.destroyed).toBe(true);
        });
        spawned.resolve();

        await vi.waitFor(() => {
            expect(slot.busy).toBe(false);
        });
        expect(spawner.last.signals).toEqual(["SIGTERM"]);
        expect(spawner.calls).toHaveLength(1);
    });
});

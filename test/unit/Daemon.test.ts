import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { Config } from "../../src/app/Config";
import { Daemon } from "../../src/app/Daemon";
import { FakeSpawner } from "../helpers/FakeSpawner";
import { join } from "path";
import { tmpdir } from "os";

describe("Daemon", () => {
    let dir: string;
    let spawner: FakeSpawner;
    let daemon: Daemon;

    beforeEach(async () => {
        dir = mkdtempSync(join(tmpdir(), "daemon-test-"));
        writeFileSync(join(dir, "index.html"), "<title>kvm</title>");
        spawner = new FakeSpawner();
        const config = new Config(undefined, [], {
            GADGETKVM_STATIC_DIR: dir,
            GADGETKVM_USTREAMER_PORT: "9100",
            GADGETKVM_USTREAMER_COMMAND: "/opt/ustreamer"
        });
        daemon = new Daemon(config, spawner.spawn);
        await daemon.server.ready();
    });

    afterEach(async () => {
        daemon.stop();
        await daemon.server.stop(100);
        rmSync(dir, { recursive: true, force: true });
    });

    it("serves the UI from the static directory", async () => {
        const response = await daemon.server.fastify.inject({ method: "GET", url: "/" });
        expect(response.statusCode).toBe(200);
        expect(response.body).toBe("<title>kvm</title>");
    });

    it("wires the API to the configured ustreamer", async () => {
        const config = await daemon.server.fastify.inject({ method: "GET", url: "/config" });
        expect(config.json()).toEqual({ ustreamerPort: "9100" });

        const started = await daemon.server.fastify.inject({ method: "POST", url: "/video/start" });
        expect(started.json()).toEqual({ status: "started" });
        expect(spawner.calls[0].command).toBe("/opt/ustreamer");

        await daemon.server.fastify.inject({ method: "POST", url: "/video/stop" });
        expect(spawner.last.signals).toEqual(["SIGTERM"]);
    });

    it("aborts its signal on stop", () => {
        expect(daemon.signal.aborted).toBe(false);
        daemon.stop();
        expect(daemon.signal.aborted).toBe(true);
    });
});

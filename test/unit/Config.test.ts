import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { Config } from "../../src/app/Config";
import { join } from "path";
import { tmpdir } from "os";

describe("Config", () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), "config-test-"));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    function writeConfig(data: unknown): string {
        const path = join(dir, "config.json");
        writeFileSync(path, JSON.stringify(data));
        return path;
    }

    it("uses the defaults", () => {
        const config = new Config(undefined, [], {});
        expect(config.host).toBe("0.0.0.0");
        expect(config.port).toBe(8876);
        expect(config.hidDevice).toBe("/dev/hidg0");
        expect(config.reportDelayMs).toBe(10);
        expect(config.captureCommand).toBe("rpicam-vid");
        expect(config.framerate).toBe(30);
        expect(config.quality).toBe(80);
        expect(config.maxFrameBytes).toBe(1048576);
        expect(config.ustreamerPort).toBe(8877);
        expect(config.staticDir).toBeNull();
        expect(config.logLevel).toBe("log");
        expect(config.logFile).toBeNull();
    });

    it("reads environment variables", () => {
        const config = new Config(undefined, [], {
            GADGETKVM_PORT: "9000",
            GADGETKVM_HID_DEVICE: "/dev/hidg1",
            GADGETKVM_LOG_LEVEL: "debug"
        });
        expect(config.port).toBe(9000);
        expect(config.hidDevice).toBe("/dev/hidg1");
        expect(config.logLevel).toBe("debug");
    });

    it("layers file, environment and command line", () => {
        const path = writeConfig({ network: { port: 7000, host: "127.0.0.1" }, video: { quality: 50 } });
        const config = new Config(path, ["--port", "7100"], { GADGETKVM_PORT: "7050" });
        expect(config.port).toBe(7100);
        expect(config.host).toBe("127.0.0.1");
        expect(config.quality).toBe(50);
    });

    it("applies command line flags", () => {
        const config = new Config(
            undefined,
            ["--hid", "/dev/hidg2", "--video-device", "/dev/video2", "--ustreamer-addr", "127.0.0.1:9001", "-vv"],
            {}
        );
        expect(config.hidDevice).toBe("/dev/hidg2");
        expect(config.videoDevice).toBe("/dev/video2");
        expect(config.ustreamerHost).toBe("127.0.0.1");
        expect(config.ustreamerPort).toBe(9001);
        expect(config.logLevel).toBe("verbose");
    });

    it("lets an explicit log level win over -v", () => {
        const config = new Config(undefined, ["-v", "--log-level", "error"], {});
        expect(config.logLevel).toBe("error");
    });

    it("rejects invalid values", () => {
        expect(() => new Config(undefined, [], { GADGETKVM_VIDEO_QUALITY: "0" })).toThrow();
        expect(() => new Config(writeConfig({ network: { nope: 1 } }), [], {})).toThrow();
        expect(() => new Config(undefined, ["--ustreamer-addr", "nowhere"], {})).toThrow(
            'Invalid address "nowhere", expected host:port'
        );
    });

    it("requires a JSON object in the config file", () => {
        const path = writeConfig([1, 2, 3]);
        expect(() => new Config(path, [], {})).toThrow(`Config file must contain a JSON object: ${path}`);
    });

    it("complains about a missing file named with --config", () => {
        const missing = join(dir, "missing.json");
        expect(() => Config.findAndLoadConfig(["--config", missing])).toThrow(`Config file not found: ${missing}`);
    });

    it("loads the file named with --config", () => {
        const path = writeConfig({ hid: { device: "/dev/hidg3" } });
        expect(Config.findAndLoadConfig([`--config=${path}`]).hidDevice).toBe("/dev/hidg3");
    });
});

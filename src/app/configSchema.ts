import { format } from "util";
import convict from "convict";
import type { ConfigType } from "./ConfigType";

convict.addFormat({
    name: "nullable-string",
    validate: (val: unknown): void => {
        if (val === null) {
            return;
        }
        if (typeof val !== "string") {
            throw new Error("must be null or a string");
        }
    },
    coerce: (val: unknown): unknown => {
        if (val === null) {
            return null;
        }
        if (typeof val === "string") {
            return val;
        }
        return format(val);
    }
});

convict.addFormat({
    name: "positive-int",
    validate: (val: unknown): void => {
        if (typeof val !== "number" || !Number.isInteger(val) || val < 1) {
            throw new Error("must be a positive integer");
        }
    },
    coerce: (val: unknown): number => Number(val)
});

convict.addFormat({
    name: "quality",
    validate: (val: unknown): void => {
        if (typeof val !== "number" || !Number.isInteger(val) || val < 1 || val > 100) {
            throw new Error("must be an integer between 1 and 100");
        }
    },
    coerce: (val: unknown): number => Number(val)
});

/** A fresh convict instance; every Config owns its own. */
export function configSchema(env: NodeJS.ProcessEnv = process.env): convict.Config<ConfigType> {
    return convict<ConfigType>(
        {
            network: {
                host: {
                    doc: "Address the HTTP and WebSocket server binds to",
                    format: String,
                    default: "0.0.0.0",
                    env: "GADGETKVM_HOST"
                },
                port: {
                    doc: "HTTP and WebSocket server port",
                    format: "port",
                    default: 8876,
                    env: "GADGETKVM_PORT"
                }
            },

            hid: {
                device: {
                    doc: "HID gadget character device receiving keyboard and mouse reports",
                    format: String,
                    default: "/dev/hidg0",
                    env: "GADGETKVM_HID_DEVICE"
                },
                reportDelayMs: {
                    doc: "Pause after every HID report, in milliseconds",
                    format: "nat",
                    default: 10,
                    env: "GADGETKVM_HID_REPORT_DELAY_MS"
                }
            },

            video: {
                device: {
                    doc: "V4L2 device ustreamer captures from",
                    format: String,
                    default: "/dev/video0",
                    env: "GADGETKVM_VIDEO_DEVICE"
                },
                captureCommand: {
                    doc: "Camera capture tool writing H264 or MJPEG to stdout",
                    format: String,
                    default: "rpicam-vid",
                    env: "GADGETKVM_CAPTURE_COMMAND"
                },
                width: {
                    doc: "Capture width; 0 together with height 0 uses the sensor's native mode",
                    format: "nat",
                    default: 1280,
                    env: "GADGETKVM_VIDEO_WIDTH"
                },
                height: {
                    doc: "Capture height",
                    format: "nat",
                    default: 720,
                    env: "GADGETKVM_VIDEO_HEIGHT"
                },
                framerate: {
                    doc: "Capture frame rate",
                    format: "positive-int",
                    default: 30,
                    env: "GADGETKVM_VIDEO_FRAMERATE"
                },
                quality: {
                    doc: "JPEG quality of the MJPEG stream",
                    format: "quality",
                    default: 80,
                    env: "GADGETKVM_VIDEO_QUALITY"
                },
                maxFrameBytes: {
                    doc: "Largest JPEG frame accepted from the capture tool",
                    format: "positive-int",
                    default: 1024 * 1024,
                    env: "GADGETKVM_VIDEO_MAX_FRAME_BYTES"
                }
            },

            ustreamer: {
                command: {
                    doc: "External MJPEG HTTP server started by /video/start",
                    format: String,
                    default: "ustreamer",
                    env: "GADGETKVM_USTREAMER_COMMAND"
                },
                host: {
                    doc: "Address ustreamer listens on",
                    format: String,
                    default: "0.0.0.0",
                    env: "GADGETKVM_USTREAMER_HOST"
                },
                port: {
                    doc: "Port ustreamer listens on",
                    format: "port",
                    default: 8877,
                    env: "GADGETKVM_USTREAMER_PORT"
                }
            },

            server: {
                staticDir: {
                    doc: "Directory with the browser UI (defaults to the bundled public directory)",
                    format: "nullable-string",
                    default: null,
                    env: "GADGETKVM_STATIC_DIR"
                },
                shutdownGraceMs: {
                    doc: "How long shutdown waits for open connections",
                    format: "nat",
                    default: 5000,
                    env: "GADGETKVM_SHUTDOWN_GRACE_MS"
                }
            },

            logging: {
                level: {
                    doc: "Console log level",
                    format: ["silent", "error", "log", "debug", "verbose"],
                    default: "log",
                    env: "GADGETKVM_LOG_LEVEL"
                },
                file: {
                    doc: "Append every log line to this file",
                    format: "nullable-string",
                    default: null,
                    env: "GADGETKVM_LOG_FILE"
                }
            }
        },
        { env, args: [] }
    );
}

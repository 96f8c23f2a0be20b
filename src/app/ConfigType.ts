import type { LogLevelName } from "./LogLevelName";

export interface ConfigType {
    network: {
        host: string;
        port: number;
    };
    hid: {
        device: string;
        reportDelayMs: number;
    };
    video: {
        device: string;
        captureCommand: string;
        width: number;
        height: number;
        framerate: number;
        quality: number;
        maxFrameBytes: number;
    };
    ustreamer: {
        command: string;
        host: string;
        port: number;
    };
    server: {
        staticDir: string | null;
        shutdownGraceMs: number;
    };
    logging: {
        level: LogLevelName;
        file: string | null;
    };
}

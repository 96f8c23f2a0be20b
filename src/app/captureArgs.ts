import type { CaptureOptions } from "./CaptureOptions";

/** Arguments for rpicam-vid writing an endless stream to stdout. */
export function captureArgs(options: CaptureOptions): string[] {
    const args = ["--timeout", "0", "--nopreview"];
    if (options.width > 0 && options.height > 0) {
        args.push("--width", String(options.width), "--height", String(options.height));
    }
    args.push("--framerate", String(options.framerate), "--codec", options.codec);
    if (options.codec === "mjpeg" && options.quality !== undefined) {
        args.push("--quality", String(options.quality));
    }
    args.push("--output", "-");
    return args;
}

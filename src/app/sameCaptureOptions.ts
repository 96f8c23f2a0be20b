import type { CaptureOptions } from "./CaptureOptions";

export function sameCaptureOptions(a: CaptureOptions, b: CaptureOptions): boolean {
    return (
        a.codec === b.codec &&
        a.width === b.width &&
        a.height === b.height &&
        a.framerate === b.framerate &&
        a.quality === b.quality
    );
}

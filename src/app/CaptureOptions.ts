import type { CaptureCodec } from "./CaptureCodec";

export interface CaptureOptions {
    codec: CaptureCodec;
    // 0 for either dimension means the sensor's native mode
    width: number;
    height: number;
    framerate: number;
    quality?: number;
}

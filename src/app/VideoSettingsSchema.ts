import { z } from "zod";

const QUALITY_RANGE = "Quality must be between 1 and 100";
const FPS_RANGE = "Desired FPS must be between 0 and 60";
const BUFFERS_RANGE = "Buffers must be between 2 and 10";

// A missing number counts as 0 and is then held to its range.
// Buffers are checked before the frame rate.
export const VideoSettingsSchema = z.object({
    quality: z
        .number({ invalid_type_error: QUALITY_RANGE })
        .int(QUALITY_RANGE)
        .min(1, QUALITY_RANGE)
        .max(100, QUALITY_RANGE)
        .default(0),
    buffers: z
        .number({ invalid_type_error: BUFFERS_RANGE })
        .int(BUFFERS_RANGE)
        .min(2, BUFFERS_RANGE)
        .max(10, BUFFERS_RANGE)
        .default(0),
    desiredFps: z.number({ invalid_type_error: FPS_RANGE }).int(FPS_RANGE).min(0, FPS_RANGE).max(60, FPS_RANGE).default(0),
    tcpNodelay: z.boolean().default(false)
});

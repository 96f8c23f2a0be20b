import type { VideoSettings } from "./VideoSettings";

export function defaultVideoSettings(): VideoSettings {
    return { quality: 80, desiredFps: 30, buffers: 5, tcpNodelay: false };
}

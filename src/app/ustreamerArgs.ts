import type { UstreamerOptions } from "./UstreamerOptions";
import type { VideoSettings } from "./VideoSettings";

export function ustreamerArgs(options: UstreamerOptions, settings: VideoSettings): string[] {
    const args = [
        "--persistent",
        "--device",
        options.device,
        "--dv-timings",
        "--host",
        options.host,
        "--port",
        String(options.port),
        "--resolution",
        "1280x720",
        "--format",
        "UYVY",
        "--quality",
        String(settings.quality),
        "--buffers",
        String(settings.buffers),
        "--drop-same-frames",
        "30",
        "--slowdown"
    ];
    if (settings.desiredFps > 0) {
        args.push("--desired-fps", String(settings.desiredFps));
    }
    if (settings.tcpNodelay) {
        args.push("--tcp-nodelay");
    }
    return args;
}

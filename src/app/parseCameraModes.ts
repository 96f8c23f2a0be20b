import type { CameraMode } from "./CameraMode";

// "1536x864 [120.13 fps - (768, 432)/3072x1728 crop]"; the fps tag tells a
// sensor mode apart from crop and sensor dimensions on the same line
const MODE_PATTERN = /(\d+)x(\d+)\s+\[[\d.]+\s+fps/;

export function parseCameraModes(output: string): CameraMode[] {
    const modes: CameraMode[] = [];
    const seen = new Set<string>();
    for (const line of output.split(/\r?\n/)) {
        const match = MODE_PATTERN.exec(line);
        if (!match) {
            continue;
        }
        const width = Number.parseInt(match[1], 10);
        const height = Number.parseInt(match[2], 10);
        const key = `${width}x${height}`;
        if (!seen.has(key)) {
            seen.add(key);
            modes.push({ width, height });
        }
    }
    return modes;
}

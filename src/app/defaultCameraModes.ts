import type { CameraMode } from "./CameraMode";

export function defaultCameraModes(): CameraMode[] {
    return [
        { width: 640, height: 480 },
        { width: 800, height: 600 },
        { width: 1024, height: 768 },
        { width: 1280, height: 720 },
        { width: 1920, height: 1080 }
    ];
}

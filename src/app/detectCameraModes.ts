import { defaultCameraModes } from "./defaultCameraModes";
import { errorMessage } from "./errorMessage";
import { listCameras } from "./listCameras";
import { log } from "./log";
import { parseCameraModes } from "./parseCameraModes";
import type { CameraMode } from "./CameraMode";

export async function detectCameraModes(
    command: string,
    list: (command: string) => Promise<string> = listCameras
): Promise<CameraMode[]> {
    log("Detecting camera modes...");
    let output: string;
    try {
        output = await list(command);
    } catch (err) {
        log("Failed to detect camera modes:", errorMessage(err));
        return defaultCameraModes();
    }

    const modes = parseCameraModes(output);
    if (modes.length === 0) {
        log("No camera modes detected, using defaults");
        return defaultCameraModes();
    }
    log(`Detected ${modes.length} camera modes`);
    return modes;
}

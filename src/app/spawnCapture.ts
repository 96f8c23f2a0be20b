import { spawn } from "child_process";
import type { CaptureChild } from "./CaptureChild";

export function spawnCapture(command: string, args: readonly string[]): CaptureChild {
    return spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] });
}

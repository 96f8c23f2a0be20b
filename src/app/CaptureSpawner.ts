import type { CaptureChild } from "./CaptureChild";

export type CaptureSpawner = (command: string, args: readonly string[]) => CaptureChild;

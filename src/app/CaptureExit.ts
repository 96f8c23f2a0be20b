export interface CaptureExit {
    code: number | null;
    signal: NodeJS.Signals | null;
    // True when the exit followed a call to stop()
    requested: boolean;
}

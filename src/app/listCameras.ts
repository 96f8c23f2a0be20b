import { execFile } from "child_process";
import { promisify } from "util";

const execFileAsync = promisify(execFile);

/** Runs `<command> --list-cameras`; the tool splits its report over stdout and stderr. */
export async function listCameras(command: string): Promise<string> {
    const { stdout, stderr } = await execFileAsync(command, ["--list-cameras"], { timeout: 10000 });
    return stdout + stderr;
}

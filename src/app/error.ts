import { LogLevel } from "./LogLevel";
import { doLog } from "./doLog";

/** Always reaches the log file; goes to stderr unless the console is silenced. */
export function error(...args: unknown[]): void {
    doLog(LogLevel.Error, args);
}

import { LogLevel } from "./LogLevel";
import { format } from "util";
import { getConsoleLevel } from "./consoleLevel";
import { getLogFile } from "./logFile";

const LABELS: Readonly<Record<LogLevel, string>> = {
    [LogLevel.Verbose]: "VERBOSE",
    [LogLevel.Debug]: "DEBUG",
    [LogLevel.Log]: "INFO",
    [LogLevel.Error]: "ERROR",
    [LogLevel.Silent]: "SILENT"
};

function formatLine(level: LogLevel, args: unknown[]): string {
    return `[${new Date().toISOString()}] [${LABELS[level]}] ${format(...args)}`;
}

export function doLog(level: LogLevel, args: unknown[]): void {
    // The file gets every level; the console only what passes the threshold
    const logFile = getLogFile();
    if (logFile) {
        logFile.write(formatLine(level, args) + "\n");
    }

    if (level >= getConsoleLevel()) {
        if (level >= LogLevel.Error) {
            console.error(...args);
        } else {
            console.log(...args);
        }
    }
}

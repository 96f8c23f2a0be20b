import type { LogLevelName } from "./LogLevelName";

export function isLogLevelName(value: unknown): value is LogLevelName {
    return value === "silent" || value === "error" || value === "log" || value === "debug" || value === "verbose";
}

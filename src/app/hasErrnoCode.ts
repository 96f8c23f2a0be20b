/** True for a system error such as EADDRINUSE or ENOENT carrying `code`. */
export function hasErrnoCode(err: unknown, code: string): err is NodeJS.ErrnoException {
    return err instanceof Error && "code" in err && err.code === code;
}

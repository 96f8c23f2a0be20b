import type { KvmErrorCode } from "./KvmErrorCode";

export class KvmError extends Error {
    readonly code: KvmErrorCode;

    constructor(code: KvmErrorCode, message: string, cause?: unknown) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = "KvmError";
        this.code = code;
    }
}

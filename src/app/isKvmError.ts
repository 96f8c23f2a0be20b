import { KvmError } from "./KvmError";
import type { KvmErrorCode } from "./KvmErrorCode";

export function isKvmError(err: unknown, code?: KvmErrorCode): err is KvmError {
    return err instanceof KvmError && (code === undefined || err.code === code);
}

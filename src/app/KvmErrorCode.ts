export type KvmErrorCode =
    | "DeviceUnavailable"
    | "WriteFailed"
    | "DecodeFailed"
    | "UnknownEventType"
    | "UnknownToken"
    | "SubprocessStartFailed"
    | "SubprocessExited"
    | "StreamConflict";

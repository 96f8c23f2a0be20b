import type { RawData } from "ws";

export function textFromWebSocketMessage(message: RawData): string {
    if (Buffer.isBuffer(message)) {
        return message.toString("utf-8");
    }
    if (Array.isArray(message)) {
        return Buffer.concat(message).toString("utf-8");
    }
    return Buffer.from(message).toString("utf-8");
}

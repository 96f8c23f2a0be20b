import type { EventEmitter } from "events";

/** Emits "message" (RawData, isBinary), "close" and "error" like a ws WebSocket. */
export interface ControlSocket extends EventEmitter {
    terminate(): void;
}

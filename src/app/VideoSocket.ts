import type { EventEmitter } from "events";

/** What the H264 relay needs from a ws WebSocket. */
export interface VideoSocket extends EventEmitter {
    readonly readyState: number;
    // Bytes queued by send() but not yet written to the network
    readonly bufferedAmount: number;
    send(data: Buffer, options: { binary: boolean }, cb?: (err?: Error) => void): void;
    close(code?: number, reason?: string): void;
}

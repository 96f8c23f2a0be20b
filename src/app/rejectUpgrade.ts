import { STATUS_CODES } from "http";
import type { Duplex } from "stream";

/** Answers a WebSocket upgrade with a plain HTTP error and drops the socket. */
export function rejectUpgrade(socket: Duplex, statusCode: number, message: string): void {
    const body = JSON.stringify({ error: message });
    socket.once("finish", () => {
        socket.destroy();
    });
    socket.end(
        `HTTP/1.1 ${statusCode} ${STATUS_CODES[statusCode] ?? "Error"}\r\n` +
            "Connection: close\r\n" +
            "Content-Type: application/json; charset=utf-8\r\n" +
            `Content-Length: ${Buffer.byteLength(body)}\r\n` +
            "\r\n" +
            body
    );
}

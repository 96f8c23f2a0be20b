import { Duplex } from "stream";
import { describe, expect, it } from "vitest";
import { rejectUpgrade } from "../../src/app/rejectUpgrade";

describe("rejectUpgrade", () => {
    it("writes a complete HTTP error response and destroys the socket", async () => {
        const chunks: Buffer[] = [];
        const socket = new Duplex({
            read(): void {},
            write(chunk: Buffer, _encoding: BufferEncoding, callback: (err?: Error | null) => void): void {
                chunks.push(chunk);
                callback();
            }
        });
        const closed = new Promise<void>((resolve: () => void) => {
            socket.once("close", resolve);
        });

        rejectUpgrade(socket, 409, "Control connection already in use");
        await closed;

        const body = '{"error":"Control connection already in use"}';
        expect(Buffer.concat(chunks).toString()).toBe(
            "HTTP/1.1 409 Conflict\r\n" +
                "Connection: close\r\n" +
                "Content-Type: application/json; charset=utf-8\r\n" +
                `Content-Length: ${body.length}\r\n` +
                "\r\n" +
                body
        );
        expect(socket.destroyed).toBe(true);
    });
});

import { decodeInputEvent } from "./decodeInputEvent";
import { error } from "./error";
import { errorMessage } from "./errorMessage";
import { isKvmError } from "./isKvmError";
import { log } from "./log";
import { rejectUpgrade } from "./rejectUpgrade";
import { TaskQueue } from "./TaskQueue";
import { textFromWebSocketMessage } from "./textFromWebSocketMessage";
import { verbose } from "./verbose";
import WebSocket, { WebSocketServer } from "ws";
import type { ControlSocket } from "./ControlSocket";
import type { Duplex } from "stream";
import type { IncomingMessage } from "http";
import type { InputTranslator } from "./InputTranslator";

/**
 * The browser's input connection. Only one is served at a time, and its
 * events reach the translator strictly in arrival order.
 */
export class ControlChannel {
    #wss = new WebSocketServer({ noServer: true });
    #translator: InputTranslator;
    #busy = false;
    #socket: ControlSocket | undefined;
    #queue = new TaskQueue();

    constructor(translator: InputTranslator) {
        this.#translator = translator;
    }

    get connected(): boolean {
        return this.#busy;
    }

    handleUpgrade(request: IncomingMessage, socket: Duplex, head: Buffer): void {
        const remote = request.socket.remoteAddress ?? "unknown";
        if (this.#busy) {
            log(`Rejecting control connection from ${remote}: already connected`);
            rejectUpgrade(socket, 409, "Control connection already in use");
            return;
        }

        this.#busy = true;
        let accepted = false;
        socket.once("close", () => {
            if (!accepted) {
                this.#busy = false;
            }
        });
        this.#wss.handleUpgrade(request, socket, head, (ws: WebSocket) => {
            accepted = true;
            this.accept(ws, remote);
        });
    }

    accept(socket: ControlSocket, remote: string): void {
        this.#busy = true;
        this.#socket = socket;
        log(`Control connection opened from ${remote}`);

        socket.on("message", (data: WebSocket.RawData) => {
            const text = textFromWebSocketMessage(data);
            this.#enqueue(async (): Promise<void> => {
                await this.#translator.handle(decodeInputEvent(text));
            });
        });

        socket.on("error", (err: Error) => {
            verbose(`Control connection error from ${remote}:`, err.message);
        });

        socket.once("close", () => {
            log(`Control connection closed from ${remote}`);
            if (this.#socket === socket) {
                this.#socket = undefined;
            }
            // Nothing may stay held on the target once the browser is gone
            this.#enqueue(async (): Promise<void> => {
                await this.#translator.releaseAll();
            });
            this.#busy = false;
        });
    }

    /** Resolves once every event received so far has been handled. */
    idle(): Promise<void> {
        return this.#queue.drain();
    }

    close(): void {
        this.#socket?.terminate();
        this.#wss.close();
    }

    #enqueue(task: () => Promise<void>): void {
        this.#queue.run(task).catch((err: unknown) => {
            if (isKvmError(err, "DecodeFailed") || isKvmError(err, "UnknownEventType")) {
                log("Dropping control message:", err.message);
            } else {
                error("Control event failed:", errorMessage(err));
            }
        });
    }
}

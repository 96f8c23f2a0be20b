import { debug } from "./debug";
import { error } from "./error";
import { existsSync } from "fs";
import { hasErrnoCode } from "./hasErrnoCode";
import { join, resolve } from "path";
import { log } from "./log";
import { registerApiRoutes } from "./registerApiRoutes";
import { rejectUpgrade } from "./rejectUpgrade";
import { setTimeout as sleep } from "timers/promises";
import { verbose } from "./verbose";
import Fastify from "fastify";
import fastifyStatic from "@fastify/static";
import type { CameraMode } from "./CameraMode";
import type { ControlChannel } from "./ControlChannel";
import type { Duplex } from "stream";
import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import type { H264Streamer } from "./H264Streamer";
import type { IncomingMessage } from "http";
import type { MjpegStreamer } from "./MjpegStreamer";
import type { UstreamerSupervisor } from "./UstreamerSupervisor";

export const DEFAULT_STATIC_DIR = join(__dirname, "..", "..", "public");

export interface ServerOptions {
    host: string;
    port: number;
    staticDir: string | null;
    control: ControlChannel;
    mjpeg: MjpegStreamer;
    h264: H264Streamer;
    ustreamer: UstreamerSupervisor;
    cameraModes: () => Promise<CameraMode[]>;
}

export class Server {
    #fastify: FastifyInstance;
    #options: ServerOptions;
    #ready: Promise<void> | undefined;

    constructor(options: ServerOptions) {
        this.#options = options;

        // Fastify's pino output goes through the daemon's own logger
        const customLogger = {
            level: "debug",
            stream: {
                write: (msg: string): void => {
                    try {
                        const logEntry: unknown = JSON.parse(msg.trim());
                        const entry = typeof logEntry === "object" && logEntry !== null ? logEntry : {};
                        const level = "level" in entry && typeof entry.level === "number" ? entry.level : 30;
                        let logMessage = "msg" in entry && typeof entry.msg === "string" ? entry.msg : "";
                        if ("req" in entry && typeof entry.req === "object" && entry.req !== null) {
                            const req = entry.req;
                            if ("method" in req && "url" in req) {
                                logMessage = `${String(req.method)} ${String(req.url)}`;
                            }
                        } else if ("res" in entry && typeof entry.res === "object" && entry.res !== null) {
                            const res = entry.res;
                            if ("statusCode" in res) {
                                logMessage += ` - ${String(res.statusCode)}`;
                            }
                        }

                        if (level <= 20) {
                            verbose(`[Fastify] ${logMessage}`);
                        } else if (level <= 30) {
                            debug(`[Fastify] ${logMessage}`);
                        } else if (level <= 40) {
                            log(`[Fastify] ${logMessage}`);
                        } else {
                            error(`[Fastify] ${logMessage}`);
                        }
                    } catch {
                        debug(`[Fastify] ${msg.trim()}`);
                    }
                }
            }
        };

        this.#fastify = Fastify({ logger: customLogger });
        this.#setupUpgradeHandling();
    }

    get fastify(): FastifyInstance {
        return this.#fastify;
    }

    /** Registers routes and static files; safe to call more than once. */
    ready(): Promise<void> {
        if (!this.#ready) {
            this.#ready = this.#registerRoutes();
        }
        return this.#ready;
    }

    async start(): Promise<void> {
        await this.ready();

        const { host, port } = this.#options;
        try {
            const addr = await this.#fastify.listen({ host, port });
            log(`HTTP listening at ${addr}, control at /ws, video at /stream and /video-stream`);
        } catch (err: unknown) {
            if (hasErrnoCode(err, "EADDRINUSE")) {
                throw new Error(`Address ${host}:${port} is already in use`, { cause: err });
            }
            throw err;
        }
    }

    /** Closes sockets and waits up to `graceMs` for requests in flight. */
    async stop(graceMs: number): Promise<void> {
        this.#options.control.close();
        this.#options.h264.close();

        const closed = this.#fastify.close().then(() => true);
        const finished = await Promise.race([closed, sleep(graceMs, false, { ref: false })]);
        if (!finished) {
            log(`Connections still open after ${graceMs}ms, closing them`);
            this.#fastify.server.closeAllConnections();
            await closed;
        }
        log("Server shut down");
    }

    async #registerRoutes(): Promise<void> {
        const { mjpeg, ustreamer, cameraModes } = this.#options;
        registerApiRoutes(this.#fastify, { ustreamer, cameraModes });

        this.#fastify.get("/stream", async (request: FastifyRequest, reply: FastifyReply) => {
            return mjpeg.handle(request, reply);
        });

        const staticDir = resolve(this.#options.staticDir ?? DEFAULT_STATIC_DIR);
        if (existsSync(staticDir)) {
            await this.#fastify.register(fastifyStatic, { root: staticDir, prefix: "/" });
            verbose(`Serving UI from ${staticDir}`);
        } else {
            verbose(`UI not found at ${staticDir}`);
        }
    }

    #setupUpgradeHandling(): void {
        this.#fastify.server.on("upgrade", (request: IncomingMessage, socket: Duplex, head: Buffer): void => {
            const pathname = new URL(request.url || "/", "http://localhost").pathname;
            if (pathname === "/ws") {
                this.#options.control.handleUpgrade(request, socket, head);
            } else if (pathname === "/video-stream") {
                this.#options.h264.handleUpgrade(request, socket, head);
            } else {
                rejectUpgrade(socket, 404, `No WebSocket endpoint at ${pathname}`);
            }
        });
    }
}

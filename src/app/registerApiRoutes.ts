import { VideoSettingsSchema } from "./VideoSettingsSchema";
import { error } from "./error";
import { errorMessage } from "./errorMessage";
import { hostname } from "os";
import type { CameraMode } from "./CameraMode";
import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import type { UstreamerSupervisor } from "./UstreamerSupervisor";

interface ApiDependencies {
    ustreamer: UstreamerSupervisor;
    cameraModes: () => Promise<CameraMode[]>;
}

export function registerApiRoutes(fastify: FastifyInstance, deps: ApiDependencies): void {
    const { ustreamer, cameraModes } = deps;

    // Errors leave as { error } like every other failure the UI sees
    fastify.setErrorHandler((err: FastifyError, _: FastifyRequest, reply: FastifyReply) => {
        const statusCode = err.statusCode ?? 500;
        if (statusCode >= 500) {
            error("Request failed:", err.message);
        }
        return reply.code(statusCode).send({ error: statusCode >= 500 ? "Internal server error" : err.message });
    });

    fastify.get("/hostname", async () => {
        return { hostname: hostname() };
    });

    fastify.get("/config", async () => {
        return { ustreamerPort: String(ustreamer.port) };
    });

    fastify.get("/settings", async () => {
        return ustreamer.settings;
    });

    fastify.post<{ Body: unknown }>(
        "/settings/update",
        async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
            const body = request.body;
            if (!body || typeof body !== "object" || Array.isArray(body)) {
                return reply.code(400).send({ error: "Invalid request body" });
            }

            const result = VideoSettingsSchema.safeParse(body);
            if (!result.success) {
                return reply.code(400).send({ error: result.error.issues[0]?.message ?? "Invalid request body" });
            }

            ustreamer.settings = result.data;
            return { status: "updated" };
        }
    );

    fastify.post("/video/start", async (_: FastifyRequest, reply: FastifyReply) => {
        try {
            await ustreamer.start();
        } catch (err) {
            error("Failed to start ustreamer:", errorMessage(err));
            return reply.code(500).send({ error: "Failed to start video stream" });
        }
        return { status: "started" };
    });

    fastify.post("/video/stop", async () => {
        await ustreamer.stop();
        return { status: "stopped" };
    });

    fastify.get("/camera-modes", async () => {
        const modes = await cameraModes();
        return modes.map((mode: CameraMode) => ({ Width: mode.width, Height: mode.height }));
    });
}

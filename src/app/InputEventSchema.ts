import { SYSTEM_COMMAND_NAMES } from "./SystemCommandName";
import { z } from "zod";

const ModifiersSchema = z.array(z.string()).default([]);

const ButtonTokenSchema = z.union([z.string().min(1), z.number().int().transform((n: number) => String(n))]);

export const KeyDownEventSchema = z.object({
    type: z.literal("keydown"),
    code: z.string().min(1),
    modifiers: ModifiersSchema
});

export const KeyUpEventSchema = z.object({
    type: z.literal("keyup"),
    code: z.string().min(1),
    modifiers: ModifiersSchema
});

export const MouseMoveEventSchema = z.object({
    type: z.literal("mousemove"),
    x: z.number().default(0),
    y: z.number().default(0)
});

export const MouseDownEventSchema = z.object({
    type: z.literal("mousedown"),
    button: ButtonTokenSchema
});

export const MouseUpEventSchema = z.object({
    type: z.literal("mouseup"),
    button: ButtonTokenSchema
});

export const WheelEventSchema = z.object({
    type: z.literal("wheel"),
    delta: z.number().default(0)
});

export const SystemCommandEventSchema = z.object({
    type: z.enum(SYSTEM_COMMAND_NAMES)
});

export const InputEventSchema = z.discriminatedUnion("type", [
    KeyDownEventSchema,
    KeyUpEventSchema,
    MouseMoveEventSchema,
    MouseDownEventSchema,
    MouseUpEventSchema,
    WheelEventSchema,
    SystemCommandEventSchema
]);

import type { InputEventSchema } from "./InputEventSchema";
import type { z } from "zod";

export type InputEvent = z.infer<typeof InputEventSchema>;

import type { VideoSettingsSchema } from "./VideoSettingsSchema";
import type { z } from "zod";

export type VideoSettings = z.infer<typeof VideoSettingsSchema>;

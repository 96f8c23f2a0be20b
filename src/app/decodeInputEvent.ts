import { InputEventSchema } from "./InputEventSchema";
import { KvmError } from "./KvmError";
import { errorMessage } from "./errorMessage";
import { isInputEventType } from "./InputEventType";
import type { InputEvent } from "./InputEvent";

export function decodeInputEvent(text: string): InputEvent {
    let data: unknown;
    try {
        data = JSON.parse(text);
    } catch (err) {
        throw new KvmError("DecodeFailed", `failed to parse event: ${errorMessage(err)}`, err);
    }

    if (typeof data !== "object" || data === null || !("type" in data) || typeof data.type !== "string") {
        throw new KvmError("DecodeFailed", "event has no type");
    }

    if (!isInputEventType(data.type)) {
        throw new KvmError("UnknownEventType", `unknown event type: ${data.type}`);
    }

    const result = InputEventSchema.safeParse(data);
    if (!result.success) {
        const issues = result.error.issues
            .map((issue: { path: (string | number)[]; message: string }) => `${issue.path.join(".") || "event"}: ${issue.message}`)
            .join(", ");
        throw new KvmError("DecodeFailed", `invalid ${data.type} event: ${issues}`);
    }
    return result.data;
}

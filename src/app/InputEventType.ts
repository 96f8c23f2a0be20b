import { SYSTEM_COMMAND_NAMES } from "./SystemCommandName";
import type { InputEvent } from "./InputEvent";

export type InputEventType = InputEvent["type"];

const INPUT_EVENT_TYPES: ReadonlySet<string> = new Set<string>([
    "keydown",
    "keyup",
    "mousemove",
    "mousedown",
    "mouseup",
    "wheel",
    ...SYSTEM_COMMAND_NAMES
]);

export function isInputEventType(value: string): value is InputEventType {
    return INPUT_EVENT_TYPES.has(value);
}

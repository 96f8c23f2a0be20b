import { KvmError } from "./KvmError";
import { MouseButton } from "./MouseButton";

// Browser MouseEvent.button numbers are accepted alongside the names
const BUTTON_TOKENS: ReadonlyMap<string, MouseButton> = new Map<string, MouseButton>([
    ["left", MouseButton.Left],
    ["0", MouseButton.Left],
    ["middle", MouseButton.Middle],
    ["1", MouseButton.Middle],
    ["right", MouseButton.Right],
    ["2", MouseButton.Right]
]);

/** Throws UnknownToken for anything but the three buttons the report carries. */
export function mouseButtonForToken(token: string): MouseButton {
    const button = BUTTON_TOKENS.get(token.toLowerCase());
    if (button === undefined) {
        throw new KvmError("UnknownToken", `unknown mouse button ${token}`);
    }
    return button;
}

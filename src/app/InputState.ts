/**
 * Pressed keys and mouse buttons as the browser reported them. Keys keep
 * their press order so the oldest six recognised ones fill a keyboard report.
 */
export class InputState {
    readonly pressedKeys = new Set<string>();
    readonly pressedButtons = new Set<number>();

    clear(): void {
        this.pressedKeys.clear();
        this.pressedButtons.clear();
    }
}

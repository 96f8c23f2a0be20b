import { InputState } from "./InputState";
import { MAX_REPORTED_KEYS, encodeKeyboardReport } from "./encodeKeyboardReport";
import { MouseButton } from "./MouseButton";
import { debug } from "./debug";
import { encodeConsumerReport } from "./encodeConsumerReport";
import { encodeMouseReport } from "./encodeMouseReport";
import { error } from "./error";
import { errorMessage } from "./errorMessage";
import { hidUsageForCode } from "./hidUsageForCode";
import { isKvmError } from "./isKvmError";
import { modifierMaskFor } from "./modifierMaskFor";
import { mouseButtonForToken } from "./mouseButtonForToken";
import { systemCommands } from "./systemCommands";
import { verbose } from "./verbose";
import type { InputEvent } from "./InputEvent";
import type { ReportSink } from "./ReportSink";
import type { SystemCommandName } from "./SystemCommandName";

const KEYBOARD_RELEASE = encodeKeyboardReport(0, []);
const MOUSE_NEUTRAL = encodeMouseReport(MouseButton.None, 0, 0, 0);
const CONSUMER_RELEASE = encodeConsumerReport(0, 0, 0);

/**
 * Turns browser input events into HID reports for one target machine.
 *
 * State is updated before the report goes out, so a failed write leaves the
 * pressed sets describing what the user is holding and a later release
 * still clears it.
 */
export class InputTranslator {
    #sink: ReportSink;
    #state: InputState;

    constructor(sink: ReportSink, state: InputState = new InputState()) {
        this.#sink = sink;
        this.#state = state;
    }

    get state(): InputState {
        return this.#state;
    }

    /** Dispatches one event; unknown tokens and send failures are logged, never thrown. */
    async handle(event: InputEvent): Promise<void> {
        try {
            switch (event.type) {
                case "keydown":
                    await this.keyDown(event.code, event.modifiers);
                    break;
                case "keyup":
                    await this.keyUp(event.code, event.modifiers);
                    break;
                case "mousemove":
                    await this.mouseMove(event.x, event.y);
                    break;
                case "mousedown":
                    await this.mouseDown(event.button);
                    break;
                case "mouseup":
                    await this.mouseUp(event.button);
                    break;
                case "wheel":
                    await this.wheel(event.delta);
                    break;
                default:
                    await this.systemCommand(event.type);
                    break;
            }
        } catch (err) {
            if (isKvmError(err, "UnknownToken")) {
                verbose(`Ignoring ${event.type}: ${err.message}`);
                return;
            }
            error(`Failed to send report for ${event.type}:`, errorMessage(err));
        }
    }

    async keyDown(code: string, modifiers: readonly string[]): Promise<void> {
        this.#state.pressedKeys.add(code);
        if (hidUsageForCode(code) === undefined) {
            debug(`No HID usage for key code ${code}`);
        }
        await this.#sink.send(encodeKeyboardReport(modifierMaskFor(modifiers), this.#keycodes()));
    }

    async keyUp(code: string, modifiers: readonly string[]): Promise<void> {
        this.#state.pressedKeys.delete(code);
        const modifier = modifierMaskFor(modifiers);
        const keycodes = this.#keycodes();
        if (keycodes.length === 0 && modifier === 0) {
            await this.#sink.send(KEYBOARD_RELEASE);
            return;
        }
        await this.#sink.send(encodeKeyboardReport(modifier, keycodes));
    }

    async mouseMove(dx: number, dy: number): Promise<void> {
        await this.#sink.send(encodeMouseReport(this.#buttonMask(), dx, dy, 0));
    }

    async mouseDown(token: string): Promise<void> {
        const button = mouseButtonForToken(token);
        this.#state.pressedButtons.add(button);
        await this.#sink.send(encodeMouseReport(this.#buttonMask(), 0, 0, 0));
    }

    async mouseUp(token: string): Promise<void> {
        const button = mouseButtonForToken(token);
        this.#state.pressedButtons.delete(button);
        const mask = this.#buttonMask();
        if (mask === MouseButton.None) {
            await this.#sink.send(MOUSE_NEUTRAL);
            return;
        }
        await this.#sink.send(encodeMouseReport(mask, 0, 0, 0));
    }

    // Wheel reports never carry the held buttons
    async wheel(delta: number): Promise<void> {
        await this.#sink.send(encodeMouseReport(MouseButton.None, 0, 0, delta));
    }

    async systemCommand(name: SystemCommandName): Promise<void> {
        const command = systemCommands[name];
        if (command.kind === "consumer") {
            await this.#sink.send(encodeConsumerReport(command.media, command.browser, command.extra));
            await this.#sink.send(CONSUMER_RELEASE);
        } else {
            await this.#sink.send(encodeKeyboardReport(command.modifier, [command.usage]));
            await this.#sink.send(KEYBOARD_RELEASE);
        }
    }

    async releaseAll(): Promise<void> {
        this.#state.clear();
        await this.#sink.send(KEYBOARD_RELEASE);
        await this.#sink.send(MOUSE_NEUTRAL);
    }

    #keycodes(): number[] {
        const keycodes: number[] = [];
        for (const code of this.#state.pressedKeys) {
            const usage = hidUsageForCode(code);
            if (usage !== undefined) {
                keycodes.push(usage);
                if (keycodes.length === MAX_REPORTED_KEYS) {
                    break;
                }
            }
        }
        return keycodes;
    }

    #buttonMask(): number {
        let mask = 0;
        for (const button of this.#state.pressedButtons) {
            mask |= button;
        }
        return mask;
    }
}

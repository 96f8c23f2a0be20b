import { ConsumerBrowser, ConsumerExtra, ConsumerMedia } from "./ConsumerControl";
import { HidUsage } from "./HidUsage";
import { KeyboardModifier } from "./KeyboardModifier";
import type { SystemCommand } from "./SystemCommand";
import type { SystemCommandName } from "./SystemCommandName";

function consumer(media: number, browser: number): SystemCommand {
    return { kind: "consumer", media, browser, extra: ConsumerExtra.None };
}

function chord(modifier: number, usage: number): SystemCommand {
    return { kind: "chord", modifier, usage };
}

const Ctrl = KeyboardModifier.LeftCtrl;
const CtrlShift = KeyboardModifier.LeftCtrl | KeyboardModifier.LeftShift;

export const systemCommands: Readonly<Record<SystemCommandName, SystemCommand>> = {
    volume_up: consumer(ConsumerMedia.VolumeUp, ConsumerBrowser.None),
    volume_down: consumer(ConsumerMedia.VolumeDown, ConsumerBrowser.None),
    brightness_up: consumer(ConsumerMedia.None, ConsumerBrowser.BrightnessUp),
    brightness_down: consumer(ConsumerMedia.None, ConsumerBrowser.BrightnessDown),
    ctrl_w: chord(Ctrl, HidUsage.KeyW),
    ctrl_t: chord(Ctrl, HidUsage.KeyT),
    ctrl_n: chord(Ctrl, HidUsage.KeyN),
    ctrl_q: chord(Ctrl, HidUsage.KeyQ),
    ctrl_tab: chord(Ctrl, HidUsage.Tab),
    ctrl_shift_tab: chord(CtrlShift, HidUsage.Tab),
    ctrl_shift_t: chord(CtrlShift, HidUsage.KeyT),
    ctrl_f4: chord(Ctrl, HidUsage.F4),
    alt_f4: chord(KeyboardModifier.LeftAlt, HidUsage.F4),
    f11: chord(KeyboardModifier.None, HidUsage.F11)
};

export const SYSTEM_COMMAND_NAMES = [
    "brightness_up",
    "brightness_down",
    "volume_up",
    "volume_down",
    "ctrl_w",
    "ctrl_t",
    "ctrl_n",
    "ctrl_q",
    "ctrl_tab",
    "ctrl_shift_tab",
    "ctrl_shift_t",
    "ctrl_f4",
    "alt_f4",
    "f11"
] as const;

export type SystemCommandName = (typeof SYSTEM_COMMAND_NAMES)[number];

import { KeyboardModifier } from "./KeyboardModifier";

// Right-hand variants are never asserted; every alias maps to the left bit
const MODIFIER_BITS: ReadonlyMap<string, number> = new Map<string, number>([
    ["ctrl", KeyboardModifier.LeftCtrl],
    ["control", KeyboardModifier.LeftCtrl],
    ["shift", KeyboardModifier.LeftShift],
    ["alt", KeyboardModifier.LeftAlt],
    ["meta", KeyboardModifier.LeftMeta],
    ["super", KeyboardModifier.LeftMeta],
    ["cmd", KeyboardModifier.LeftMeta],
    ["win", KeyboardModifier.LeftMeta]
]);

export function modifierMaskFor(modifiers: readonly string[]): number {
    let mask = 0;
    for (const name of modifiers) {
        mask |= MODIFIER_BITS.get(name.toLowerCase()) ?? 0;
    }
    return mask;
}

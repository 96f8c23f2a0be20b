// Usage ids referenced directly by the shortcut table
export const enum HidUsage {
    KeyN = 0x11,
    KeyQ = 0x14,
    KeyT = 0x17,
    KeyW = 0x1a,
    Tab = 0x2b,
    F4 = 0x3d,
    F11 = 0x44,
    Delete = 0x4c
}

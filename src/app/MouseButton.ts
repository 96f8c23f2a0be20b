export const enum MouseButton {
    None = 0x00,
    Left = 0x01,
    Right = 0x02,
    Middle = 0x04
}

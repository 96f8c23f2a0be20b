export const enum SystemControl {
    None = 0x00,
    Power = 0x01,
    Sleep = 0x02,
    Wake = 0x04
}

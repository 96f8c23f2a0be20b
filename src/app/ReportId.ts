export const enum ReportId {
    Keyboard = 0x01,
    ConsumerControl = 0x02,
    SystemControl = 0x03,
    Mouse = 0x04
}

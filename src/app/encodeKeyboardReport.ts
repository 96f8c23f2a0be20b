import { ReportId } from "./ReportId";

export const KEYBOARD_REPORT_SIZE = 9;
export const MAX_REPORTED_KEYS = 6;

/**
 * Layout (9 bytes):
 *   0     report id (0x01)
 *   1     modifier bitmask
 *   2     reserved
 *   3..8  up to six usage ids, unused slots zero
 *
 * Keycodes past the sixth are not encoded; callers truncate first.
 */
export function encodeKeyboardReport(modifier: number, keycodes: readonly number[]): Buffer {
    const report = Buffer.alloc(KEYBOARD_REPORT_SIZE);
    report[0] = ReportId.Keyboard;
    report[1] = modifier & 0xff;
    for (let i = 0; i < MAX_REPORTED_KEYS && i < keycodes.length; ++i) {
        report[3 + i] = keycodes[i] & 0xff;
    }
    return report;
}

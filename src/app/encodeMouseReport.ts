import { ReportId } from "./ReportId";
import { clampMovement } from "./clampMovement";

export const MOUSE_REPORT_SIZE = 5;

/**
 * Layout (5 bytes): report id (0x04), button bits (left, right, middle),
 * then dx, dy and wheel as two's-complement bytes after clamping.
 */
export function encodeMouseReport(buttons: number, dx: number, dy: number, wheel: number): Buffer {
    const report = Buffer.alloc(MOUSE_REPORT_SIZE);
    report[0] = ReportId.Mouse;
    report[1] = buttons & 0x07;
    report.writeInt8(clampMovement(dx), 2);
    report.writeInt8(clampMovement(dy), 3);
    report.writeInt8(clampMovement(wheel), 4);
    return report;
}

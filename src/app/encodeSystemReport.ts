import { ReportId } from "./ReportId";

export const SYSTEM_REPORT_SIZE = 2;

export function encodeSystemReport(buttons: number): Buffer {
    return Buffer.from([ReportId.SystemControl, buttons & 0xff]);
}

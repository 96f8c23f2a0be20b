import { ReportId } from "./ReportId";

export const CONSUMER_REPORT_SIZE = 4;

export function encodeConsumerReport(media: number, browser: number, extra: number): Buffer {
    return Buffer.from([ReportId.ConsumerControl, media & 0xff, browser & 0xff, extra & 0xff]);
}

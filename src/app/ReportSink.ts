export interface ReportSink {
    send(report: Buffer, delayMs?: number): Promise<void>;
}

export const MJPEG_BOUNDARY = "frame";

export function multipartFrameHeader(length: number): string {
    return `--${MJPEG_BOUNDARY}\r\nContent-Type: image/jpeg\r\nContent-Length: ${length}\r\n\r\n`;
}

export type CaptureCodec = "h264" | "mjpeg";

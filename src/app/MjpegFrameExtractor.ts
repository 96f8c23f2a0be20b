import { debug } from "./debug";

export const DEFAULT_MAX_FRAME_BYTES = 1024 * 1024;

const SOI = Buffer.from([0xff, 0xd8]);
const EOI = Buffer.from([0xff, 0xd9]);
const MARKER_PREFIX = Buffer.from([0xff]);

/**
 * Splits a raw MJPEG byte stream into JPEG images. Chunks may cut anywhere,
 * including between the two bytes of a marker; the last byte of each chunk
 * is kept so such a marker is still recognised.
 */
export class MjpegFrameExtractor {
    #maxFrameBytes: number;
    #inFrame = false;
    #parts: Buffer[] = [];
    #size = 0;
    #lastByte = -1;
    #discarded = 0;

    constructor(maxFrameBytes: number = DEFAULT_MAX_FRAME_BYTES) {
        this.#maxFrameBytes = maxFrameBytes;
    }

    /** Frames thrown away for growing past the size limit. */
    get discarded(): number {
        return this.#discarded;
    }

    /** Returns the frames completed by this chunk, oldest first. */
    feed(chunk: Buffer): Buffer[] {
        const frames: Buffer[] = [];
        if (chunk.length === 0) {
            return frames;
        }

        let pos = 0;
        let start = 0;
        if (this.#lastByte === 0xff) {
            if (this.#inFrame && chunk[0] === 0xd9) {
                this.#complete(chunk.subarray(0, 1), frames);
                pos = 1;
            } else if (!this.#inFrame && chunk[0] === 0xd8) {
                this.#begin();
                this.#append(MARKER_PREFIX);
                pos = 1;
            }
        }

        while (true) {
            if (!this.#inFrame) {
                const soi = pos < chunk.length ? chunk.indexOf(SOI, pos) : -1;
                if (soi === -1) {
                    break;
                }
                this.#begin();
                start = soi;
                pos = soi + SOI.length;
                continue;
            }

            const eoi = pos < chunk.length ? chunk.indexOf(EOI, pos) : -1;
            if (eoi === -1) {
                this.#append(chunk.subarray(start));
                break;
            }
            this.#complete(chunk.subarray(start, eoi + EOI.length), frames);
            pos = eoi + EOI.length;
        }

        this.#lastByte = chunk[chunk.length - 1];
        return frames;
    }

    reset(): void {
        this.#inFrame = false;
        this.#parts = [];
        this.#size = 0;
        this.#lastByte = -1;
    }

    #begin(): void {
        this.#inFrame = true;
        this.#parts = [];
        this.#size = 0;
    }

    #append(part: Buffer): void {
        this.#parts.push(part);
        this.#size += part.length;
        if (this.#size > this.#maxFrameBytes) {
            this.#discard();
        }
    }

    #complete(part: Buffer, frames: Buffer[]): void {
        const size = this.#size + part.length;
        if (size > this.#maxFrameBytes) {
            this.#discard();
            return;
        }
        this.#parts.push(part);
        frames.push(Buffer.concat(this.#parts, size));
        this.#inFrame = false;
        this.#parts = [];
        this.#size = 0;
    }

    #discard(): void {
        ++this.#discarded;
        debug(`Discarding MJPEG frame larger than ${this.#maxFrameBytes} bytes`);
        this.#inFrame = false;
        this.#parts = [];
        this.#size = 0;
    }
}

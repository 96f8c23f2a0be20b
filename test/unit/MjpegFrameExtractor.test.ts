import { describe, expect, it } from "vitest";
import { MjpegFrameExtractor } from "../../src/app/MjpegFrameExtractor";

const FRAME_ONE = [0xff, 0xd8, 0x01, 0xff, 0x00, 0x02, 0xff, 0xff, 0xd9];
const FRAME_TWO = [0xff, 0xd8, 0x09, 0x08, 0xff, 0xd9];
const STREAM = Buffer.from([0x00, 0xff, 0x11, 0xff, ...FRAME_ONE, 0x42, ...FRAME_TWO, 0x13]);

function feedAll(extractor: MjpegFrameExtractor, chunks: Buffer[]): number[][] {
    const frames: number[][] = [];
    for (const chunk of chunks) {
        for (const frame of extractor.feed(chunk)) {
            frames.push([...frame]);
        }
    }
    return frames;
}

describe("MjpegFrameExtractor", () => {
    it("extracts frames from a single chunk and skips bytes between them", () => {
        expect(feedAll(new MjpegFrameExtractor(), [STREAM])).toEqual([FRAME_ONE, FRAME_TWO]);
    });

    it("finds the same frames whatever the split point", () => {
        for (let split = 1; split < STREAM.length; ++split) {
            const chunks = [STREAM.subarray(0, split), STREAM.subarray(split)];
            expect(feedAll(new MjpegFrameExtractor(), chunks), `split at ${split}`).toEqual([FRAME_ONE, FRAME_TWO]);
        }
    });

    it("finds the same frames when fed one byte at a time", () => {
        const chunks = [...STREAM].map((byte: number) => Buffer.from([byte]));
        expect(feedAll(new MjpegFrameExtractor(), chunks)).toEqual([FRAME_ONE, FRAME_TWO]);
    });

    it("returns copies that outlive the input chunk", () => {
        const chunk = Buffer.from(FRAME_TWO);
        const [frame] = new MjpegFrameExtractor().feed(chunk);
        chunk.fill(0);
        expect([...frame]).toEqual(FRAME_TWO);
    });

    it("discards an oversized frame and recovers on the next one", () => {
        const extractor = new MjpegFrameExtractor(16);
        const oversized = Buffer.from([0xff, 0xd8, ...new Array<number>(20).fill(0x10)]);
        const rest = Buffer.from([0x10, 0x10, 0xff, 0xd9, 0xff, 0xd8, 0x01, 0x02, 0xff, 0xd9]);

        expect(feedAll(extractor, [oversized, rest])).toEqual([[0xff, 0xd8, 0x01, 0x02, 0xff, 0xd9]]);
        expect(extractor.discarded).toBe(1);
    });

    it("discards a frame that ends past the limit within one chunk", () => {
        const extractor = new MjpegFrameExtractor(16);
        const frame = Buffer.from([0xff, 0xd8, ...new Array<number>(20).fill(0x20), 0xff, 0xd9]);
        expect(extractor.feed(frame)).toEqual([]);
        expect(extractor.discarded).toBe(1);
        expect(feedAll(extractor, [Buffer.from(FRAME_TWO)])).toEqual([FRAME_TWO]);
    });

    it("ignores an end marker outside a frame", () => {
        expect(feedAll(new MjpegFrameExtractor(), [Buffer.from([0xff, 0xd9, 0x00]), Buffer.from(FRAME_TWO)])).toEqual([
            FRAME_TWO
        ]);
    });
});

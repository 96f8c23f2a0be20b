import { describe, expect, it } from "vitest";
import { FrameQueue } from "../../src/app/FrameQueue";

describe("FrameQueue", () => {
    it("rejects an invalid capacity", () => {
        expect(() => new FrameQueue<number>(0)).toThrow(RangeError);
        expect(() => new FrameQueue<number>(1.5)).toThrow(RangeError);
    });

    it("hands out items oldest first", async () => {
        const queue = new FrameQueue<number>(3);
        queue.push(1);
        queue.push(2);
        expect(await queue.next()).toBe(1);
        expect(await queue.next()).toBe(2);
        expect(queue.length).toBe(0);
    });

    it("drops the newest item when full", async () => {
        const queue = new FrameQueue<number>(2);
        expect(queue.push(1)).toBe(true);
        expect(queue.push(2)).toBe(true);
        expect(queue.push(3)).toBe(false);
        expect(queue.dropped).toBe(1);
        expect(await queue.next()).toBe(1);
        expect(await queue.next()).toBe(2);
    });

    it("delivers a pushed item straight to a waiting reader", async () => {
        const queue = new FrameQueue<string>(1);
        const pending = queue.next();
        expect(queue.push("a")).toBe(true);
        expect(queue.push("b")).toBe(true);
        expect(await pending).toBe("a");
        expect(await queue.next()).toBe("b");
    });

    it("refuses a second pending reader", async () => {
        const queue = new FrameQueue<number>(1);
        const first = queue.next();
        await expect(queue.next()).rejects.toThrow("already has a pending reader");
        queue.push(7);
        expect(await first).toBe(7);
    });

    it("wakes the reader with undefined on close", async () => {
        const queue = new FrameQueue<number>(2);
        const pending = queue.next();
        queue.close();
        expect(await pending).toBeUndefined();
        expect(queue.closed).toBe(true);
        expect(queue.push(1)).toBe(false);
        expect(await queue.next()).toBeUndefined();
    });

    it("discards queued items on close", async () => {
        const queue = new FrameQueue<number>(2);
        queue.push(1);
        queue.close();
        expect(queue.length).toBe(0);
        expect(await queue.next()).toBeUndefined();
    });

    it("wakes the reader with undefined on abort and accepts a new reader", async () => {
        const queue = new FrameQueue<number>(2);
        const controller = new AbortController();
        const pending = queue.next(controller.signal);
        controller.abort();
        expect(await pending).toBeUndefined();

        const next = queue.next();
        queue.push(5);
        expect(await next).toBe(5);
    });

    it("returns undefined at once for an already aborted signal", async () => {
        const queue = new FrameQueue<number>(2);
        expect(await queue.next(AbortSignal.abort())).toBeUndefined();
    });
});

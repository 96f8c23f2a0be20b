import { describe, expect, it } from "vitest";
import { TaskQueue } from "../../src/app/TaskQueue";

function delay(ms: number): Promise<void> {
    return new Promise<void>((resolve: () => void) => {
        setTimeout(resolve, ms);
    });
}

describe("TaskQueue", () => {
    it("runs tasks one at a time in submission order", async () => {
        const queue = new TaskQueue();
        const events: string[] = [];
        const slow = queue.run(async () => {
            events.push("slow start");
            await delay(20);
            events.push("slow end");
            return 1;
        });
        const fast = queue.run(async () => {
            events.push("fast");
            return 2;
        });

        expect(await Promise.all([slow, fast])).toEqual([1, 2]);
        expect(events).toEqual(["slow start", "slow end", "fast"]);
    });

    it("keeps going after a failed task", async () => {
        const queue = new TaskQueue();
        const failed = queue.run(async () => {
            throw new Error("boom");
        });
        const next = queue.run(async () => "ok");

        await expect(failed).rejects.toThrow("boom");
        expect(await next).toBe("ok");
        await expect(queue.drain()).resolves.toBeUndefined();
    });
});

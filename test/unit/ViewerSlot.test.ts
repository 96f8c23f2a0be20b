import { describe, expect, it } from "vitest";
import { ViewerSlot } from "../../src/app/ViewerSlot";
import { isKvmError } from "../../src/app/isKvmError";

describe("ViewerSlot", () => {
    it("admits one holder at a time", () => {
        const slot = new ViewerSlot();
        const release = slot.acquire("mjpeg 10.0.0.2");
        expect(slot.busy).toBe(true);
        expect(slot.holder).toBe("mjpeg 10.0.0.2");

        let caught: unknown;
        try {
            slot.acquire("h264 10.0.0.3");
        } catch (err) {
            caught = err;
        }
        expect(isKvmError(caught, "StreamConflict")).toBe(true);

        release();
        expect(slot.busy).toBe(false);
        expect(() => slot.acquire("h264 10.0.0.3")).not.toThrow();
    });

    it("ignores a stale release after the slot changed hands", () => {
        const slot = new ViewerSlot();
        const first = slot.acquire("a");
        first();
        slot.acquire("b");
        first();
        expect(slot.holder).toBe("b");
    });
});

import { describe, expect, it } from "vitest";
import { hidUsageForCode } from "../../src/app/hidUsageForCode";

describe("hidUsageForCode", () => {
    it("maps letters, digits and editing keys", () => {
        expect(hidUsageForCode("KeyA")).toBe(0x04);
        expect(hidUsageForCode("KeyZ")).toBe(0x1d);
        expect(hidUsageForCode("Digit1")).toBe(0x1e);
        expect(hidUsageForCode("Digit0")).toBe(0x27);
        expect(hidUsageForCode("Enter")).toBe(0x28);
        expect(hidUsageForCode("Delete")).toBe(0x4c);
    });

    it("maps function and arrow keys", () => {
        expect(hidUsageForCode("F1")).toBe(0x3a);
        expect(hidUsageForCode("F11")).toBe(0x44);
        expect(hidUsageForCode("ArrowRight")).toBe(0x4f);
        expect(hidUsageForCode("ArrowUp")).toBe(0x52);
    });

    it("returns undefined for codes outside the table", () => {
        expect(hidUsageForCode("ShiftLeft")).toBeUndefined();
        expect(hidUsageForCode("NotAKey")).toBeUndefined();
        expect(hidUsageForCode("")).toBeUndefined();
    });
});

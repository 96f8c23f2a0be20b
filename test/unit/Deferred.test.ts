import { describe, expect, it } from "vitest";
import { Deferred } from "../../src/app/Deferred";

describe("Deferred", () => {
    it("settles once with the first value", async () => {
        const deferred = new Deferred<number>();
        expect(deferred.settled).toBe(false);
        deferred.resolve(1);
        deferred.resolve(2);
        expect(deferred.settled).toBe(true);
        expect(await deferred.promise).toBe(1);
    });
});

import { FakeCaptureChild } from "./FakeCaptureChild";
import type { CaptureSpawner } from "../../src/app/CaptureSpawner";

export interface SpawnCall {
    command: string;
    args: readonly string[];
}

export class FakeSpawner {
    readonly calls: SpawnCall[] = [];
    readonly children: FakeCaptureChild[] = [];
    // Emitted as the child's "error" instead of "spawn", like ENOENT
    failure: Error | undefined;
    // Delays the spawn outcome until it settles
    hold: Promise<void> | undefined;

    readonly spawn: CaptureSpawner = (command: string, args: readonly string[]): FakeCaptureChild => {
        this.calls.push({ command, args });
        const child = new FakeCaptureChild(1000 + this.children.length);
        this.children.push(child);
        const failure = this.failure;
        const settle = (): void => {
            if (failure) {
                child.emit("error", failure);
            } else {
                child.emit("spawn");
            }
        };
        if (this.hold) {
            void this.hold.then(settle);
        } else {
            setImmediate(settle);
        }
        return child;
    };

    get last(): FakeCaptureChild {
        const child = this.children[this.children.length - 1];
        if (!child) {
            throw new Error("nothing spawned yet");
        }
        return child;
    }
}

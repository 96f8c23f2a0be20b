import { Daemon } from "./app/Daemon";
import { debug } from "./app/debug";
import { log } from "./app/log";
import type { Config } from "./app/Config";

export async function main(config: Config): Promise<void> {
    const daemon = new Daemon(config);

    const shutdown = (signal: NodeJS.Signals): void => {
        log(`\nReceived ${signal}`);
        daemon.stop();
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);

    try {
        debug("gadgetkvmd is running. Press Ctrl+C to exit.");
        await daemon.run();
    } finally {
        process.off("SIGINT", shutdown);
        process.off("SIGTERM", shutdown);
    }
}

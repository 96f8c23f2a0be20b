#!/usr/bin/env node

import { Config } from "./app/Config";
import { VERSION } from "./app/version";
import { closeLogger } from "./app/closeLogger";
import { logLevelFromName } from "./app/logLevelFromName";
import { main } from "./main";
import { setConsoleLevel } from "./app/consoleLevel";
import { setLogFile } from "./app/logFile";

if (process.argv.includes("--help") || process.argv.includes("-h")) {
    console.log(`Usage: gadgetkvmd [options]
Options:
  --help, -h                Show this help message
  --version                 Show version number
  --config, -c              Path to config file
  --host, -H                Host to bind server to
  --port, -p                HTTP server port
  --hid                     HID gadget device (default /dev/hidg0)
  --video-device            Video device for ustreamer (default /dev/video0)
  --ustreamer-addr          host:port for ustreamer (default 0.0.0.0:8877)
  --log-level, -l           Log level (silent, error, log, debug, verbose)
  --verbose, -v             Enable verbose logging (-v debug, -vv verbose)
  --log-file, -f            Path to log file
`);
    process.exit(0);
}

if (process.argv.includes("--version")) {
    console.log(`gadgetkvmd version ${VERSION}`);
    process.exit(0);
}

let config: Config;
try {
    config = Config.findAndLoadConfig();
} catch (err) {
    console.error("Failed to load configuration:", err);
    process.exit(1);
}

setConsoleLevel(logLevelFromName(config.logLevel));

(async (): Promise<void> => {
    try {
        const logFile = config.logFile;
        if (logFile) {
            setLogFile(logFile);
        }
        await main(config);
        closeLogger();
        process.exit();
    } catch (err: unknown) {
        console.error("Fatal error:", err);
        closeLogger();
        process.exit(1);
    }
})();

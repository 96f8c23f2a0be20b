import { configSchema } from "./configSchema";
import { debug } from "./debug";
import { error } from "./error";
import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { isLogLevelName } from "./isLogLevelName";
import { parseHostPort } from "./parseHostPort";
import path from "path";
import yargs from "yargs";
import type { ConfigType } from "./ConfigType";
import type { LogLevelName } from "./LogLevelName";
import type convict from "convict";

export class Config {
    #convictConfig: convict.Config<ConfigType>;

    constructor(configPath?: string, cliArgs: string[] = process.argv.slice(2), env: NodeJS.ProcessEnv = process.env) {
        this.#convictConfig = configSchema(env);
        this.#loadConfig(configPath);
        this.#loadCliArgs(cliArgs);
        this.#validate();
    }

    // Network configuration
    get host(): string {
        return this.#convictConfig.get("network.host");
    }

    get port(): number {
        return this.#convictConfig.get("network.port");
    }

    // HID configuration
    get hidDevice(): string {
        return this.#convictConfig.get("hid.device");
    }

    get reportDelayMs(): number {
        return this.#convictConfig.get("hid.reportDelayMs");
    }

    // Video configuration
    get videoDevice(): string {
        return this.#convictConfig.get("video.device");
    }

    get captureCommand(): string {
        return this.#convictConfig.get("video.captureCommand");
    }

    get videoWidth(): number {
        return this.#convictConfig.get("video.width");
    }

    get videoHeight(): number {
        return this.#convictConfig.get("video.height");
    }

    get framerate(): number {
        return this.#convictConfig.get("video.framerate");
    }

    get quality(): number {
        return this.#convictConfig.get("video.quality");
    }

    get maxFrameBytes(): number {
        return this.#convictConfig.get("video.maxFrameBytes");
    }

    get ustreamerCommand(): string {
        return this.#convictConfig.get("ustreamer.command");
    }

    get ustreamerHost(): string {
        return this.#convictConfig.get("ustreamer.host");
    }

    get ustreamerPort(): number {
        return this.#convictConfig.get("ustreamer.port");
    }

    // Server configuration
    get staticDir(): string | null {
        return this.#convictConfig.get("server.staticDir");
    }

    get shutdownGraceMs(): number {
        return this.#convictConfig.get("server.shutdownGraceMs");
    }

    // Logging configuration
    get logLevel(): LogLevelName {
        return this.#convictConfig.get("logging.level");
    }

    get logFile(): string | null {
        return this.#convictConfig.get("logging.file");
    }

    getAll(): ConfigType {
        return this.#convictConfig.getProperties();
    }

    toJSON(): string {
        return JSON.stringify(this.getAll(), null, 2);
    }

    static getDefaultConfigPaths(): string[] {
        return [
            path.join(process.cwd(), "gadgetkvm.config.json"),
            path.join(process.cwd(), ".gadgetkvmrc.json"),
            path.join(homedir(), ".config", "gadgetkvm", "config.json")
        ];
    }

    /** Uses --config/-c when given, otherwise the first default path that exists. */
    static findAndLoadConfig(cliArgs: string[] = process.argv.slice(2)): Config {
        const configPath = Config.#configPathFromArgs(cliArgs);
        if (configPath) {
            debug(`Using config file from CLI: ${configPath}`);
            if (!existsSync(configPath)) {
                throw new Error(`Config file not found: ${configPath}`);
            }
            return new Config(configPath, cliArgs);
        }

        for (const candidate of Config.getDefaultConfigPaths()) {
            if (existsSync(candidate)) {
                debug(`Found config file: ${candidate}`);
                return new Config(candidate, cliArgs);
            }
        }

        debug("No config file found, using defaults");
        return new Config(undefined, cliArgs);
    }

    static #configPathFromArgs(args: string[]): string | undefined {
        for (let i = 0; i < args.length; ++i) {
            const arg = args[i];
            if ((arg === "--config" || arg === "-c") && i + 1 < args.length) {
                return args[i + 1];
            }
            if (arg.startsWith("--config=")) {
                return arg.slice("--config=".length);
            }
        }
        return undefined;
    }

    #loadConfig(configPath?: string): void {
        if (!configPath) {
            return;
        }

        if (!existsSync(configPath)) {
            debug(`Config file not found: ${configPath}`);
            return;
        }

        let configData: unknown;
        try {
            configData = JSON.parse(readFileSync(configPath, "utf8"));
        } catch (err) {
            error(`Failed to load config file: ${configPath}`, err);
            throw new Error(`Config loading failed: ${err}`, { cause: err });
        }

        if (!configData || typeof configData !== "object" || Array.isArray(configData)) {
            throw new Error(`Config file must contain a JSON object: ${configPath}`);
        }
        this.#convictConfig.load(configData);
        debug(`Loaded config from: ${configPath}`);
    }

    #loadCliArgs(args: string[]): void {
        if (args.length === 0) {
            return;
        }

        debug("Loading CLI args:", args.join(" "));

        const argv = yargs(args)
            .option("config", {
                alias: "c",
                type: "string",
                description: "Path to a JSON config file"
            })
            .option("verbose", {
                alias: "v",
                type: "count",
                description: "Enable verbose logging (use -v for debug, -vv for verbose)"
            })
            .option("port", {
                alias: "p",
                type: "number",
                description: "HTTP server port"
            })
            .option("host", {
                alias: "H",
                type: "string",
                description: "Host to bind server to"
            })
            .option("hid", {
                type: "string",
                description: "HID gadget device"
            })
            .option("video-device", {
                type: "string",
                description: "Video device for ustreamer"
            })
            .option("ustreamer-addr", {
                type: "string",
                description: "host:port ustreamer listens on"
            })
            .option("log-level", {
                alias: "l",
                type: "string",
                choices: ["silent", "error", "log", "debug", "verbose"],
                description: "Logging level"
            })
            .option("log-file", {
                alias: "f",
                type: "string",
                description: "Log file path"
            })
            .help(false)
            .version(false)
            .parseSync();

        if (typeof argv.verbose === "number" && argv.verbose > 0) {
            const level = argv.verbose === 1 ? "debug" : "verbose";
            this.#convictConfig.set("logging.level", level);
            debug(`CLI override: ${argv.verbose} verbose flag(s) - log-level = ${level}`);
        }

        if (typeof argv.port === "number") {
            this.#convictConfig.set("network.port", argv.port);
            debug(`CLI override: port = ${argv.port}`);
        }

        if (typeof argv.host === "string") {
            this.#convictConfig.set("network.host", argv.host);
            debug(`CLI override: host = ${argv.host}`);
        }

        if (typeof argv.hid === "string") {
            this.#convictConfig.set("hid.device", argv.hid);
            debug(`CLI override: hid = ${argv.hid}`);
        }

        if (typeof argv["video-device"] === "string") {
            this.#convictConfig.set("video.device", argv["video-device"]);
            debug(`CLI override: video-device = ${argv["video-device"]}`);
        }

        if (typeof argv["ustreamer-addr"] === "string") {
            const { host, port } = parseHostPort(argv["ustreamer-addr"]);
            this.#convictConfig.set("ustreamer.host", host);
            this.#convictConfig.set("ustreamer.port", port);
            debug(`CLI override: ustreamer-addr = ${host}:${port}`);
        }

        if (isLogLevelName(argv["log-level"])) {
            this.#convictConfig.set("logging.level", argv["log-level"]);
            debug(`CLI override: log-level = ${argv["log-level"]}`);
        }

        if (typeof argv["log-file"] === "string") {
            this.#convictConfig.set("logging.file", argv["log-file"]);
            debug(`CLI override: log-file = ${argv["log-file"]}`);
        }
    }

    #validate(): void {
        try {
            this.#convictConfig.validate({ allowed: "strict" });
        } catch (err) {
            error("Config validation failed:", err);
            throw err;
        }
    }
}

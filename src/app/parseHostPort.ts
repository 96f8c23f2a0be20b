export interface HostPort {
    host: string;
    port: number;
}

/** "host:port", ":port" or "[::1]:port"; an empty host means every interface. */
export function parseHostPort(value: string, defaultHost: string = "0.0.0.0"): HostPort {
    const match = /^(?:\[([^\]]*)\]|([^:]*)):(\d+)$/.exec(value.trim());
    if (!match) {
        throw new Error(`Invalid address "${value}", expected host:port`);
    }
    const port = Number.parseInt(match[3], 10);
    if (port < 1 || port > 65535) {
        throw new Error(`Invalid port in address "${value}"`);
    }
    const host = match[1] ?? match[2];
    return { host: host || defaultHost, port };
}

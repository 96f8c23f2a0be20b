export interface UstreamerOptions {
    command: string;
    device: string;
    host: string;
    port: number;
}

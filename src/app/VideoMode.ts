export interface VideoMode {
    width: number;
    height: number;
    framerate: number;
}

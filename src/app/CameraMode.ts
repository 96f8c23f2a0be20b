export interface CameraMode {
    width: number;
    height: number;
}

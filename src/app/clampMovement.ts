export const MOVEMENT_LIMIT = 127;

/**
 * Saturates a relative movement to the signed 8-bit range a boot mouse
 * report can carry. -128 is excluded so the axis stays symmetric.
 */
export function clampMovement(value: number): number {
    if (value > MOVEMENT_LIMIT) {
        return MOVEMENT_LIMIT;
    }
    if (value < -MOVEMENT_LIMIT) {
        return -MOVEMENT_LIMIT;
    }
    return Math.trunc(value);
}

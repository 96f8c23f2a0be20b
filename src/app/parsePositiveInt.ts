export function parsePositiveInt(value: string | null | undefined, fallback: number): number {
    if (!value || !/^\d+$/.test(value.trim())) {
        return fallback;
    }
    const parsed = Number.parseInt(value, 10);
    return parsed > 0 && Number.isSafeInteger(parsed) ? parsed : fallback;
}

import browserKeyCodes from "./browserKeyCodes.json";

// KeyboardEvent.code values (https://www.w3.org/TR/uievents-code/) to HID usage ids
const usageTable: ReadonlyMap<string, number> = new Map(Object.entries(browserKeyCodes));

export function hidUsageForCode(code: string): number | undefined {
    return usageTable.get(code);
}

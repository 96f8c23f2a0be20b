// Byte 1 of the consumer-control report: media keys
export const enum ConsumerMedia {
    None = 0x00,
    VolumeUp = 0x01,
    VolumeDown = 0x02,
    Mute = 0x04,
    PlayPause = 0x08,
    NextTrack = 0x10,
    PreviousTrack = 0x20,
    Stop = 0x40,
    Email = 0x80
}

// Byte 2: brightness and browser (AC) keys
export const enum ConsumerBrowser {
    None = 0x00,
    BrightnessUp = 0x01,
    BrightnessDown = 0x02,
    Search = 0x04,
    Home = 0x08,
    Back = 0x10,
    Forward = 0x20,
    Stop = 0x40,
    Refresh = 0x80
}

// Byte 3
export const enum ConsumerExtra {
    None = 0x00,
    Eject = 0x01
}

export type SystemCommand =
    | { kind: "consumer"; media: number; browser: number; extra: number }
    | { kind: "chord"; modifier: number; usage: number };

import { FormatError } from "./errors.js";

/** Index into the 16-entry palette, 0-15. */
export type Colour = number;

export const COLOUR_COUNT = 16;

export function isColour(value: number): value is Colour {
    return Number.isInteger(value) && value >= 0 && value < COLOUR_COUNT;
}

export function parseColour(token: string, line?: number): Colour {
    if (!/^[0-9a-fA-F]$/.test(token)) {
        throw new FormatError(`Bad colour (should be a hex digit between 0 and f): "${token}"`, line);
    }
    return parseInt(token, 16);
}

export function formatColour(colour: Colour): string {
    return colour.toString(16);
}

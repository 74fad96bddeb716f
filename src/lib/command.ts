import { type Colour, formatColour, parseColour } from "./colour.js";
import { type Direction, parseDirection, transposeDirection } from "./direction.js";
import { FormatError } from "./errors.js";

export interface MoveCommand {
    direction: Direction;
    distance: number;
    paint: false;
}

export interface PaintCommand {
    direction: Direction;
    distance: number;
    paint: true;
    colour: Colour;
}

/**
 * Move `distance` cells in `direction` (a negative distance moves the other
 * way). Paint commands colour every cell stepped onto; with distance 0 they
 * colour the current cell.
 */
export type DrawingCommand = MoveCommand | PaintCommand;

export function move(direction: Direction, distance: number): MoveCommand {
    return { direction, distance, paint: false };
}

export function paint(direction: Direction, distance: number, colour: Colour): PaintCommand {
    return { direction, distance, paint: true, colour };
}

// Distances are 32-bit signed integers
export const MIN_DISTANCE = -2_147_483_648;
export const MAX_DISTANCE = 2_147_483_647;

function parseDistance(token: string, line?: number): number {
    const distance = /^[+-]?\d+$/.test(token) ? Number(token) : NaN;
    if (Number.isNaN(distance)) {
        throw new FormatError(`Bad distance (should be a number): "${token}"`, line);
    }
    if (distance < MIN_DISTANCE || distance > MAX_DISTANCE) {
        throw new FormatError(`Bad distance (should be between ${MIN_DISTANCE} and ${MAX_DISTANCE}): "${token}"`, line);
    }
    // Avoid -0 leaking into formatted output
    return distance === 0 ? 0 : distance;
}

/**
 * Parse `<direction> <distance>` or `<direction> <distance> <colour>`, e.g.
 * `left 10 3`, `up 1`, `up 2 c`.
 */
export function parseCommand(text: string, line?: number): DrawingCommand {
    const tokens = text.trim().split(/\s+/);
    if (tokens.length !== 2 && tokens.length !== 3) {
        throw new FormatError(`Bad command (should have 2 or 3 parts): "${text}"`, line);
    }

    const direction = parseDirection(tokens[0], line);
    const distance = parseDistance(tokens[1], line);
    if (tokens.length === 2) {
        return move(direction, distance);
    }
    return paint(direction, distance, parseColour(tokens[2], line));
}

export function formatCommand(command: DrawingCommand): string {
    const base = `${command.direction} ${command.distance}`;
    return command.paint ? `${base} ${formatColour(command.colour)}` : base;
}

export function transposeCommand(command: DrawingCommand): DrawingCommand {
    return { ...command, direction: transposeDirection(command.direction) };
}

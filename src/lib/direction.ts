import { FormatError } from "./errors.js";

export type Direction = "up" | "down" | "left" | "right";

export const DIRECTIONS: readonly Direction[] = ["up", "down", "left", "right"];

export interface Step {
    dRow: number;
    dCol: number;
}

export const STEPS: Readonly<Record<Direction, Step>> = {
    up: { dRow: -1, dCol: 0 },
    down: { dRow: 1, dCol: 0 },
    left: { dRow: 0, dCol: -1 },
    right: { dRow: 0, dCol: 1 },
};

const TRANSPOSED: Readonly<Record<Direction, Direction>> = {
    up: "left",
    down: "right",
    left: "up",
    right: "down",
};

function isDirection(token: string): token is Direction {
    return DIRECTIONS.some((direction) => direction === token);
}

export function parseDirection(token: string, line?: number): Direction {
    if (!isDirection(token)) {
        throw new FormatError(`Bad direction (should be up, down, left, or right): "${token}"`, line);
    }
    return token;
}

/** Mirror a direction across the main diagonal (rows become columns). */
export function transposeDirection(direction: Direction): Direction {
    return TRANSPOSED[direction];
}

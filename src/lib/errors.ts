import type { DrawingCommand } from "./command.js";

export interface Position {
    row: number;
    col: number;
}

/** Malformed textual input: a drawing program, a command line or a raster file. */
export class FormatError extends Error {
    override readonly name = "FormatError";

    constructor(
        message: string,
        readonly line?: number
    ) {
        super(line === undefined ? message : `${message} (line ${line})`);
    }
}

export class OutOfBoundsError extends RangeError {
    override readonly name = "OutOfBoundsError";

    constructor(
        readonly row: number,
        readonly col: number,
        readonly height: number,
        readonly width: number
    ) {
        super(`Position (${row}, ${col}) is outside the ${height}x${width} raster`);
    }
}

/**
 * A command tried to paint outside the raster. `index` is the command's
 * zero-based position in the drawing.
 */
export class BadCommandError extends Error {
    override readonly name = "BadCommandError";

    constructor(
        readonly index: number,
        readonly command: DrawingCommand,
        readonly position: Position
    ) {
        super(`Command ${index + 1} paints outside the raster at (${position.row}, ${position.col})`);
    }
}

/** A move carried the cursor beyond the range where positions stay exact. */
export class CursorRangeError extends Error {
    override readonly name = "CursorRangeError";

    constructor(
        readonly index: number,
        readonly command: DrawingCommand
    ) {
        super(`Command ${index + 1} moves the cursor beyond ${Number.MAX_SAFE_INTEGER} cells`);
    }
}

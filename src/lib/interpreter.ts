import type { PaintCommand } from "./command.js";
import { STEPS } from "./direction.js";
import type { Drawing } from "./drawing.js";
import { BadCommandError, CursorRangeError, OutOfBoundsError, type Position } from "./errors.js";
import { Raster } from "./raster.js";

export interface ExecutionResult {
    raster: Raster;
    cursor: Position;
}

/**
 * Replay every command over a fresh raster, starting at the top-left cell.
 * Throws BadCommandError if any paint lands outside the raster; no raster
 * is returned in that case.
 */
export function execute(drawing: Drawing): ExecutionResult {
    const raster = Raster.create(drawing.height, drawing.width, drawing.background);
    let row = 0;
    let col = 0;

    drawing.commands.forEach((command, index) => {
        const step = STEPS[command.direction];
        const sign = command.distance < 0 ? -1 : 1;
        const dRow = step.dRow * sign;
        const dCol = step.dCol * sign;
        const count = Math.abs(command.distance);

        if (!command.paint) {
            row += dRow * count;
            col += dCol * count;
            if (!Number.isSafeInteger(row) || !Number.isSafeInteger(col)) {
                throw new CursorRangeError(index, command);
            }
            return;
        }

        if (count === 0) {
            paintAt(raster, index, command, row, col);
            return;
        }

        // Cells on a straight path that lie inside the raster form one
        // contiguous stretch, so checking both ends covers the whole path.
        const lastRow = row + dRow * count;
        const lastCol = col + dCol * count;
        if (!raster.contains(row + dRow, col + dCol) || !raster.contains(lastRow, lastCol)) {
            let r = row + dRow;
            let c = col + dCol;
            while (raster.contains(r, c)) {
                r += dRow;
                c += dCol;
            }
            throw new BadCommandError(index, command, { row: r, col: c });
        }

        for (let i = 0; i < count; i++) {
            row += dRow;
            col += dCol;
            raster.setPixel(row, col, command.colour);
        }
    });

    return { raster, cursor: { row, col } };
}

function paintAt(raster: Raster, index: number, command: PaintCommand, row: number, col: number): void {
    try {
        raster.setPixel(row, col, command.colour);
    } catch (err) {
        if (err instanceof OutOfBoundsError) {
            throw new BadCommandError(index, command, { row, col });
        }
        throw err;
    }
}

/** Run a drawing and return only the finished raster. */
export function interpret(drawing: Drawing): Raster {
    return execute(drawing).raster;
}

import type { Colour } from "./colour.js";
import { move, paint } from "./command.js";
import { type Drawing, DrawingBuilder, transposeDrawing } from "./drawing.js";
import type { Raster } from "./raster.js";

export type StrategyName = "row-serpentine" | "column-serpentine" | "row-sparse" | "column-sparse";

export interface CompressionStrategy {
    readonly name: StrategyName;
    compress(raster: Raster): Drawing;
}

interface Run {
    start: number;
    length: number;
    colour: Colour;
}

/**
 * Maximal runs of equal colour along `row`, visiting columns from `from`
 * towards `to` (inclusive, either direction). `start` is the first visited
 * column of each run.
 */
function runsInRow(raster: Raster, row: number, from: number, to: number): Run[] {
    const runs: Run[] = [];
    const step = from <= to ? 1 : -1;
    for (let col = from; col !== to + step; col += step) {
        const colour = raster.getPixel(row, col);
        const last = runs[runs.length - 1];
        if (last !== undefined && last.colour === colour) {
            last.length++;
        } else {
            runs.push({ start: col, length: 1, colour });
        }
    }
    return runs;
}

/**
 * Serpentine row scan: the background is the top-left colour, row 0 is
 * painted rightwards from column 1, and each later row is entered with a
 * painted `down 1` and scanned in the opposite direction to the row above.
 */
function rowSerpentine(raster: Raster): Drawing {
    const { height, width } = raster;
    const drawing = new DrawingBuilder(height, width, raster.getPixel(0, 0));
    let col = 0;

    for (let row = 0; row < height; row++) {
        const rightwards = row % 2 === 0;
        if (row > 0) {
            drawing.add(paint("down", 1, raster.getPixel(row, col)));
        }
        const from = rightwards ? col + 1 : col - 1;
        const to = rightwards ? width - 1 : 0;
        if (width > 1) {
            for (const run of runsInRow(raster, row, from, to)) {
                drawing.add(paint(rightwards ? "right" : "left", run.length, run.colour));
            }
        }
        col = rightwards ? width - 1 : 0;
    }

    return drawing.build();
}

function mostFrequentColour(raster: Raster): Colour {
    const counts = raster.histogram();
    let best = 0;
    counts.forEach((count, colour) => {
        if (count > counts[best]) best = colour;
    });
    return best;
}

/**
 * Paint only the runs that differ from the most frequent colour, moving the
 * cursor between them with unpainted commands. To paint a run the cursor
 * stands on the cell just before it, which may lie one step outside the
 * raster.
 */
function rowSparse(raster: Raster): Drawing {
    const background = mostFrequentColour(raster);
    const drawing = new DrawingBuilder(raster.height, raster.width, background);
    let cursorRow = 0;
    let cursorCol = 0;
    let rightwards = true;

    for (let row = 0; row < raster.height; row++) {
        const from = rightwards ? 0 : raster.width - 1;
        const to = rightwards ? raster.width - 1 : 0;
        const runs = runsInRow(raster, row, from, to).filter((run) => run.colour !== background);
        if (runs.length === 0) continue;

        for (const run of runs) {
            const entryCol = rightwards ? run.start - 1 : run.start + 1;
            if (row !== cursorRow) {
                drawing.add(move("down", row - cursorRow));
                cursorRow = row;
            }
            if (entryCol !== cursorCol) {
                drawing.add(entryCol > cursorCol ? move("right", entryCol - cursorCol) : move("left", cursorCol - entryCol));
                cursorCol = entryCol;
            }
            drawing.add(paint(rightwards ? "right" : "left", run.length, run.colour));
            cursorCol += rightwards ? run.length : -run.length;
        }
        rightwards = !rightwards;
    }

    return drawing.build();
}

/** Run a row strategy on the transposed raster and transpose its drawing back. */
function byColumns(rowStrategy: (raster: Raster) => Drawing): (raster: Raster) => Drawing {
    return (raster) => transposeDrawing(rowStrategy(raster.transpose()));
}

/** Candidate strategies in preference order; ties go to the earlier entry. */
export const STRATEGIES: readonly CompressionStrategy[] = [
    { name: "row-serpentine", compress: rowSerpentine },
    { name: "column-serpentine", compress: byColumns(rowSerpentine) },
    { name: "row-sparse", compress: rowSparse },
    { name: "column-sparse", compress: byColumns(rowSparse) },
];

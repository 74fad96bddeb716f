import type { Colour } from "./colour.js";
import { FormatError } from "./errors.js";
import type { Raster } from "./raster.js";

export interface CellDiff {
    row: number;
    col: number;
    expected: Colour;
    actual: Colour;
}

export interface RasterDiff {
    cells: CellDiff[];
    changedCount: number;
}

/**
 * Cells whose colour differs between two rasters of the same size, in
 * row-major order.
 */
export function computeRasterDiff(expected: Raster, actual: Raster): RasterDiff {
    if (expected.height !== actual.height || expected.width !== actual.width) {
        throw new FormatError(
            `Cannot compare a ${expected.height}x${expected.width} raster with a ${actual.height}x${actual.width} raster`
        );
    }

    const cells: CellDiff[] = [];
    for (let row = 0; row < expected.height; row++) {
        for (let col = 0; col < expected.width; col++) {
            const want = expected.getPixel(row, col);
            const got = actual.getPixel(row, col);
            if (want !== got) {
                cells.push({ row, col, expected: want, actual: got });
            }
        }
    }

    return { cells, changedCount: cells.length };
}

import { MAX_RASTER_CELLS } from "../config.js";
import { type Colour, COLOUR_COUNT, formatColour, isColour } from "./colour.js";
import { FormatError, OutOfBoundsError } from "./errors.js";

function assertDimension(name: string, value: number): void {
    if (!Number.isInteger(value) || value <= 0) {
        throw new RangeError(`Raster ${name} must be a positive integer, got ${value}`);
    }
}

function assertColour(colour: number): void {
    if (!isColour(colour)) {
        throw new RangeError(`Colour must be an integer 0-15, got ${colour}`);
    }
}

/**
 * Split text into lines, accepting `\r\n` endings and one trailing newline.
 */
export function splitLines(text: string): string[] {
    const lines = text.split("\n").map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
    if (lines.length > 0 && lines[lines.length - 1] === "") {
        lines.pop();
    }
    return lines;
}

/**
 * Fixed-size grid of 4-bit colours, stored row-major.
 */
export class Raster {
    private readonly cells: Uint8Array;

    private constructor(
        readonly height: number,
        readonly width: number,
        cells: Uint8Array
    ) {
        this.cells = cells;
    }

    /** A raster with every cell set to `background`. */
    static create(height: number, width: number, background: Colour): Raster {
        assertDimension("height", height);
        assertDimension("width", width);
        assertColour(background);
        return new Raster(height, width, new Uint8Array(height * width).fill(background));
    }

    /**
     * Parse one line per row, one hex digit per column. All lines must have
     * the same length.
     */
    static load(text: string): Raster {
        const lines = splitLines(text);
        if (lines.length === 0) {
            throw new FormatError("Empty raster");
        }

        const width = lines[0].length;
        if (width === 0) {
            throw new FormatError("Empty row", 1);
        }
        if (lines.length * width > MAX_RASTER_CELLS) {
            throw new FormatError(`Raster of ${lines.length}x${width} exceeds the ${MAX_RASTER_CELLS} cell limit`);
        }

        const cells = new Uint8Array(lines.length * width);
        lines.forEach((line, row) => {
            if (line.length !== width) {
                throw new FormatError(
                    `Inconsistent line lengths: ${width} and ${line.length} on lines 1 and ${row + 1}`,
                    row + 1
                );
            }
            for (let col = 0; col < width; col++) {
                const ch = line[col];
                const value = parseInt(ch, 16);
                if (Number.isNaN(value)) {
                    throw new FormatError(`Invalid contents: "${ch}"`, row + 1);
                }
                cells[row * width + col] = value;
            }
        });

        return new Raster(lines.length, width, cells);
    }

    /** Build from a row array; used by tests and the transpose. */
    static fromRows(rows: readonly (readonly Colour[])[]): Raster {
        const height = rows.length;
        assertDimension("height", height);
        const width = rows[0].length;
        assertDimension("width", width);

        const cells = new Uint8Array(height * width);
        rows.forEach((row, r) => {
            if (row.length !== width) {
                throw new RangeError(`Row ${r} has ${row.length} cells, expected ${width}`);
            }
            row.forEach((colour, c) => {
                assertColour(colour);
                cells[r * width + c] = colour;
            });
        });
        return new Raster(height, width, cells);
    }

    contains(row: number, col: number): boolean {
        return row >= 0 && row < this.height && col >= 0 && col < this.width;
    }

    getPixel(row: number, col: number): Colour {
        if (!this.contains(row, col)) {
            throw new OutOfBoundsError(row, col, this.height, this.width);
        }
        return this.cells[row * this.width + col];
    }

    setPixel(row: number, col: number, colour: Colour): void {
        if (!this.contains(row, col)) {
            throw new OutOfBoundsError(row, col, this.height, this.width);
        }
        assertColour(colour);
        this.cells[row * this.width + col] = colour;
    }

    /** Copy of the full grid, one array per row. */
    rows(): Colour[][] {
        const rows: Colour[][] = [];
        for (let r = 0; r < this.height; r++) {
            rows.push(Array.from(this.cells.subarray(r * this.width, (r + 1) * this.width)));
        }
        return rows;
    }

    /** Number of cells holding each colour, indexed by colour. */
    histogram(): number[] {
        const counts = new Array<number>(COLOUR_COUNT).fill(0);
        for (const colour of this.cells) {
            counts[colour]++;
        }
        return counts;
    }

    transpose(): Raster {
        const cells = new Uint8Array(this.cells.length);
        for (let r = 0; r < this.height; r++) {
            for (let c = 0; c < this.width; c++) {
                cells[c * this.height + r] = this.cells[r * this.width + c];
            }
        }
        return new Raster(this.width, this.height, cells);
    }

    clone(): Raster {
        return new Raster(this.height, this.width, this.cells.slice());
    }

    equals(other: Raster): boolean {
        if (other.height !== this.height || other.width !== this.width) return false;
        return this.cells.every((colour, i) => colour === other.cells[i]);
    }

    /** Text form read by `Raster.load`: one newline-terminated line per row. */
    toString(): string {
        const lines = new Array<string>(this.height);
        for (let r = 0; r < this.height; r++) {
            let line = "";
            for (let c = 0; c < this.width; c++) {
                line += formatColour(this.cells[r * this.width + c]);
            }
            lines[r] = line;
        }
        return lines.join("\n") + "\n";
    }
}

import { MAX_RASTER_CELLS } from "../config.js";
import { type Colour, formatColour, isColour, parseColour } from "./colour.js";
import { type DrawingCommand, formatCommand, parseCommand, transposeCommand } from "./command.js";
import { FormatError } from "./errors.js";
import { splitLines } from "./raster.js";

/** A program that produces a raster: its size, background and commands. */
export interface Drawing {
    readonly height: number;
    readonly width: number;
    readonly background: Colour;
    readonly commands: readonly DrawingCommand[];
}

function freeze(height: number, width: number, background: Colour, commands: DrawingCommand[]): Drawing {
    return Object.freeze({ height, width, background, commands: Object.freeze(commands) });
}

export class DrawingBuilder {
    private readonly commands: DrawingCommand[] = [];

    constructor(
        readonly height: number,
        readonly width: number,
        readonly background: Colour
    ) {
        if (!Number.isInteger(height) || height <= 0 || !Number.isInteger(width) || width <= 0) {
            throw new RangeError(`Drawing size must be positive integers, got ${height}x${width}`);
        }
        if (!isColour(background)) {
            throw new RangeError(`Background must be an integer 0-15, got ${background}`);
        }
    }

    get size(): number {
        return this.commands.length;
    }

    add(command: DrawingCommand): this {
        this.commands.push(command);
        return this;
    }

    build(): Drawing {
        return freeze(this.height, this.width, this.background, [...this.commands]);
    }
}

function parseSize(label: string, text: string | undefined, line: number): number {
    const value = text !== undefined && /^\d+$/.test(text.trim()) ? Number(text.trim()) : NaN;
    if (!Number.isSafeInteger(value) || value <= 0) {
        throw new FormatError(`Expected the ${label} on line ${line}: "${text ?? ""}"`, line);
    }
    return value;
}

/**
 * Read a drawing program: height, width and background colour on the first
 * three lines, then one command per line.
 */
export function parseDrawing(text: string): Drawing {
    const lines = splitLines(text);
    while (lines.length > 0 && lines[lines.length - 1].trim() === "") {
        lines.pop();
    }

    const height = parseSize("height", lines[0], 1);
    const width = parseSize("width", lines[1], 2);
    if (height * width > MAX_RASTER_CELLS) {
        throw new FormatError(`Drawing of ${height}x${width} exceeds the ${MAX_RASTER_CELLS} cell limit`);
    }

    const backgroundText = lines[2];
    if (backgroundText === undefined) {
        throw new FormatError("Expected the background colour on line 3", 3);
    }
    const background = parseColour(backgroundText.trim(), 3);

    const commands = lines.slice(3).map((line, i) => parseCommand(line, i + 4));
    return freeze(height, width, background, commands);
}

export function serializeDrawing(drawing: Drawing): string {
    const lines = [String(drawing.height), String(drawing.width), formatColour(drawing.background)];
    for (const command of drawing.commands) {
        lines.push(formatCommand(command));
    }
    return lines.join("\n") + "\n";
}

/** The same drawing mirrored across the main diagonal. */
export function transposeDrawing(drawing: Drawing): Drawing {
    return freeze(drawing.width, drawing.height, drawing.background, drawing.commands.map(transposeCommand));
}

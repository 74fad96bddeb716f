import { readFileSync, writeFileSync } from "node:fs";
import { parseArgs } from "node:util";
import { DEFAULT_CELL_SIZE } from "./config.js";
import { parseDrawing, serializeDrawing } from "./lib/drawing.js";
import { BadCommandError, CursorRangeError, FormatError } from "./lib/errors.js";
import { interpret } from "./lib/interpreter.js";
import { Raster } from "./lib/raster.js";
import { renderSvg } from "./lib/svg.js";
import { svgToPng } from "./lib/png.js";
import { checkImageSize, parseStrategyName } from "./lib/validation.js";
import { getDrawing, verifyRoundTrip } from "./services/compression.js";

const USAGE = `Usage:
  hexdraw draw <program-file> [--png <out.png>]
  hexdraw compress <raster-file> [--strategy <name>] [--verify]`;

export interface CliIo {
    stdout: (text: string) => void;
    stderr: (text: string) => void;
}

const processIo: CliIo = {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
};

function runDraw(file: string, pngPath: string | undefined, io: CliIo): number {
    const drawing = parseDrawing(readFileSync(file, "utf-8"));
    if (pngPath !== undefined) {
        const tooLarge = checkImageSize(drawing.height, drawing.width, DEFAULT_CELL_SIZE);
        if (tooLarge) {
            io.stderr(`${tooLarge.error}\n`);
            return 1;
        }
    }

    const raster = interpret(drawing);
    if (pngPath !== undefined) {
        writeFileSync(pngPath, svgToPng(renderSvg(raster, DEFAULT_CELL_SIZE), raster.width * DEFAULT_CELL_SIZE));
    }
    io.stdout(raster.toString());
    return 0;
}

function runCompress(file: string, strategyParam: string | undefined, verify: boolean, io: CliIo): number {
    const parsed = parseStrategyName(strategyParam);
    if ("error" in parsed) {
        io.stderr(`${parsed.error}\n`);
        return 2;
    }

    const raster = Raster.load(readFileSync(file, "utf-8"));
    const { drawing, strategy } = getDrawing(raster, parsed.strategy);
    io.stdout(serializeDrawing(drawing));
    io.stdout(`${drawing.commands.length} commands (${strategy})\n`);

    if (verify) {
        const diff = verifyRoundTrip(raster, drawing);
        if (diff.changedCount > 0) {
            for (const cell of diff.cells) {
                io.stderr(`mismatch at (${cell.row}, ${cell.col}): expected ${cell.expected}, got ${cell.actual}\n`);
            }
            return 1;
        }
        io.stdout("round trip ok\n");
    }
    return 0;
}

function parseCliArgs(argv: string[]) {
    return parseArgs({
        args: argv,
        allowPositionals: true,
        options: {
            png: { type: "string" },
            strategy: { type: "string" },
            verify: { type: "boolean", default: false },
        },
    });
}

/** Run one CLI invocation and return its exit code. */
export function main(argv: string[], io: CliIo = processIo): number {
    let parsed: ReturnType<typeof parseCliArgs>;
    try {
        parsed = parseCliArgs(argv);
    } catch (err) {
        io.stderr(`${err instanceof Error ? err.message : String(err)}\n${USAGE}\n`);
        return 2;
    }
    const { values, positionals } = parsed;

    const [command, file] = positionals;
    if (file === undefined || (command !== "draw" && command !== "compress")) {
        io.stderr(`${USAGE}\n`);
        return 2;
    }

    try {
        return command === "draw"
            ? runDraw(file, values.png, io)
            : runCompress(file, values.strategy, values.verify ?? false, io);
    } catch (err) {
        if (err instanceof FormatError || err instanceof BadCommandError || err instanceof CursorRangeError) {
            io.stderr(`${err.message}\n`);
            return 1;
        }
        if (err instanceof Error && "code" in err && err.code === "ENOENT") {
            io.stderr(`File not found: ${file}\n`);
            return 1;
        }
        throw err;
    }
}

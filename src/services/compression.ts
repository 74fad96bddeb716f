import { type CompressionResult, compareStrategies, compressWith } from "../lib/compress.js";
import { computeRasterDiff, type RasterDiff } from "../lib/diff.js";
import type { Drawing } from "../lib/drawing.js";
import { interpret } from "../lib/interpreter.js";
import type { Raster } from "../lib/raster.js";
import type { StrategyName } from "../lib/strategies.js";
import { compressionCache } from "./cache.js";

export function getCompression(raster: Raster): CompressionResult {
    const key = raster.toString();
    const cached = compressionCache.get(key);
    if (cached) return cached;

    const result = compareStrategies(raster);
    compressionCache.set(key, result);
    return result;
}

/** Compress with one named strategy, or the best one when none is given. */
export function getDrawing(raster: Raster, strategy?: StrategyName): { drawing: Drawing; strategy: StrategyName } {
    if (strategy !== undefined) {
        return { drawing: compressWith(raster, strategy), strategy };
    }
    const { drawing, strategy: chosen } = getCompression(raster);
    return { drawing, strategy: chosen };
}

/** Re-draw a compressed drawing and list every cell that came out different. */
export function verifyRoundTrip(raster: Raster, drawing: Drawing): RasterDiff {
    return computeRasterDiff(raster, interpret(drawing));
}

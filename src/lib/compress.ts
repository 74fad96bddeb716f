import type { Drawing } from "./drawing.js";
import type { Raster } from "./raster.js";
import { type CompressionStrategy, STRATEGIES, type StrategyName } from "./strategies.js";

export interface CandidateSummary {
    strategy: StrategyName;
    commandCount: number;
}

export interface CompressionResult {
    drawing: Drawing;
    strategy: StrategyName;
    candidates: readonly CandidateSummary[];
}

export function findStrategy(name: StrategyName): CompressionStrategy {
    const strategy = STRATEGIES.find((s) => s.name === name);
    if (!strategy) {
        throw new Error(`Unknown compression strategy "${name}"`);
    }
    return strategy;
}

/**
 * Run every strategy and keep the drawing with the fewest commands. Ties go
 * to the strategy listed first. The result is frozen, since it is cached and
 * shared between callers.
 */
export function compareStrategies(raster: Raster): CompressionResult {
    let best: { drawing: Drawing; strategy: StrategyName } | undefined;
    const candidates: CandidateSummary[] = [];

    for (const strategy of STRATEGIES) {
        const drawing = strategy.compress(raster);
        candidates.push(Object.freeze({ strategy: strategy.name, commandCount: drawing.commands.length }));
        if (!best || drawing.commands.length < best.drawing.commands.length) {
            best = { drawing, strategy: strategy.name };
        }
    }

    if (!best) {
        throw new Error("No compression strategies registered");
    }
    return Object.freeze({ ...best, candidates: Object.freeze(candidates) });
}

export function compress(raster: Raster): Drawing {
    return compareStrategies(raster).drawing;
}

export function compressWith(raster: Raster, name: StrategyName): Drawing {
    return findStrategy(name).compress(raster);
}

import { DEFAULT_CELL_SIZE, MAX_CELL_SIZE, MAX_IMAGE_PIXELS } from "../config.js";
import { STRATEGIES, type StrategyName } from "./strategies.js";

export function parseCellSize(param: string | undefined): { cellSize: number } | { error: string } {
    if (param === undefined) return { cellSize: DEFAULT_CELL_SIZE };
    const parsed = Number(param);
    if (!Number.isInteger(parsed) || parsed < 1 || parsed > MAX_CELL_SIZE) {
        return { error: `Invalid scale: "${param}". Must be an integer 1-${MAX_CELL_SIZE}.` };
    }
    return { cellSize: parsed };
}

export function parseStrategyName(param: string | undefined): { strategy?: StrategyName } | { error: string } {
    if (param === undefined) return {};
    const match = STRATEGIES.find((s) => s.name === param);
    if (!match) {
        const names = STRATEGIES.map((s) => s.name).join(", ");
        return { error: `Unknown strategy: "${param}". Must be one of ${names}.` };
    }
    return { strategy: match.name };
}

/** Rendered images are `height * cellSize` by `width * cellSize` pixels. */
export function checkImageSize(height: number, width: number, cellSize: number): { error: string } | undefined {
    const pixelWidth = width * cellSize;
    const pixelHeight = height * cellSize;
    if (pixelWidth * pixelHeight > MAX_IMAGE_PIXELS) {
        return {
            error: `Image of ${pixelWidth}x${pixelHeight} pixels exceeds the ${MAX_IMAGE_PIXELS} pixel limit. Use a smaller scale.`,
        };
    }
    return undefined;
}

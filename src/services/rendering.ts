import type { Raster } from "../lib/raster.js";
import { renderSvg } from "../lib/svg.js";
import { svgToPng } from "../lib/png.js";
import { pngCache } from "./cache.js";

export function getPng(raster: Raster, cellSize: number): Buffer {
    const key = `${cellSize}:${raster.toString()}`;
    const cached = pngCache.get(key);
    if (cached) return cached;

    const png = svgToPng(renderSvg(raster, cellSize), raster.width * cellSize);
    pngCache.set(key, png);
    return png;
}

import { PALETTE } from "../config.js";
import type { Raster } from "./raster.js";

/**
 * Generate an SVG of the raster, `cellSize` pixels per cell:
 * - viewBox in cell units, shape-rendering="crispEdges"
 * - One rect in the most frequent colour covering everything
 * - Row-scan RLE: consecutive cells of any other colour merged into wider rects
 */
export function renderSvg(raster: Raster, cellSize: number): string {
    const { height, width } = raster;
    const counts = raster.histogram();
    const background = counts.indexOf(Math.max(...counts));
    const parts: string[] = [];

    parts.push(
        `<svg xmlns="http://www.w3.org/2000/svg" width="${width * cellSize}" height="${height * cellSize}" viewBox="0 0 ${width} ${height}" shape-rendering="crispEdges">`
    );
    parts.push(`<rect width="${width}" height="${height}" fill="${PALETTE[background]}"/>`);

    for (let y = 0; y < height; y++) {
        let x = 0;
        while (x < width) {
            const colour = raster.getPixel(y, x);
            const runStart = x;
            x++;
            while (x < width && raster.getPixel(y, x) === colour) {
                x++;
            }
            if (colour !== background) {
                parts.push(
                    `<rect x="${runStart}" y="${y}" width="${x - runStart}" height="1" fill="${PALETTE[colour]}"/>`
                );
            }
        }
    }

    parts.push("</svg>");
    return parts.join("");
}

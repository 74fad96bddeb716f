import { Hono } from "hono";
import { parseDrawing } from "../lib/drawing.js";
import { interpret } from "../lib/interpreter.js";
import { renderSvg } from "../lib/svg.js";
import { checkImageSize, parseCellSize } from "../lib/validation.js";
import { getPng } from "../services/rendering.js";

const draw = new Hono();

draw.post("/", async (c) => {
    const raster = interpret(parseDrawing(await c.req.text()));
    return c.text(raster.toString());
});

draw.post("/image.svg", async (c) => {
    const result = parseCellSize(c.req.query("scale"));
    if ("error" in result) return c.json({ error: result.error }, 400);

    const drawing = parseDrawing(await c.req.text());
    const tooLarge = checkImageSize(drawing.height, drawing.width, result.cellSize);
    if (tooLarge) return c.json(tooLarge, 400);

    const raster = interpret(drawing);
    const svg = renderSvg(raster, result.cellSize);
    return c.body(svg, 200, { "Content-Type": "image/svg+xml" });
});

draw.post("/image.png", async (c) => {
    const result = parseCellSize(c.req.query("scale"));
    if ("error" in result) return c.json({ error: result.error }, 400);

    const drawing = parseDrawing(await c.req.text());
    const tooLarge = checkImageSize(drawing.height, drawing.width, result.cellSize);
    if (tooLarge) return c.json(tooLarge, 400);

    const raster = interpret(drawing);
    const png = getPng(raster, result.cellSize);
    return new Response(new Uint8Array(png), { status: 200, headers: { "Content-Type": "image/png" } });
});

export { draw };

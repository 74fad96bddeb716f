import { Hono } from "hono";
import { serializeDrawing } from "../lib/drawing.js";
import { Raster } from "../lib/raster.js";
import { parseStrategyName } from "../lib/validation.js";
import { getCompression, getDrawing, verifyRoundTrip } from "../services/compression.js";

const compress = new Hono();

compress.post("/", async (c) => {
    const result = parseStrategyName(c.req.query("strategy"));
    if ("error" in result) return c.json({ error: result.error }, 400);

    const raster = Raster.load(await c.req.text());
    const { drawing, strategy } = getDrawing(raster, result.strategy);
    return c.text(serializeDrawing(drawing), 200, {
        "X-Strategy": strategy,
        "X-Command-Count": String(drawing.commands.length),
    });
});

compress.post("/report", async (c) => {
    const raster = Raster.load(await c.req.text());
    const { drawing, strategy, candidates } = getCompression(raster);
    const diff = verifyRoundTrip(raster, drawing);

    return c.json({
        height: raster.height,
        width: raster.width,
        histogram: raster.histogram(),
        strategy,
        commandCount: drawing.commands.length,
        candidates,
        mismatchedCells: diff.changedCount,
    });
});

export { compress };

import { Hono } from "hono";
import { bodyLimit } from "hono/body-limit";
import { cors } from "hono/cors";
import { logger } from "hono/logger";
import { MAX_BODY_BYTES } from "./config.js";
import { rateLimiter } from "./middleware/rate-limit.js";
import { errorHandler } from "./middleware/error-handler.js";
import { draw } from "./routes/draw.js";
import { compress } from "./routes/compress.js";
import { docs } from "./routes/docs.js";

const app = new Hono();

app.use("*", logger());
app.use("*", cors());
app.use("*", rateLimiter);
app.use(
    "*",
    bodyLimit({
        maxSize: MAX_BODY_BYTES,
        onError: (c) => c.json({ error: `Request body exceeds ${MAX_BODY_BYTES} bytes` }, 413),
    })
);

app.onError(errorHandler);

app.route("/", docs);
app.route("/draw", draw);
app.route("/compress", compress);

app.get("/health", (c) => c.json({ status: "ok" }));

export { app };

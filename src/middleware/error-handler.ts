import type { ErrorHandler } from "hono";
import { HTTPException } from "hono/http-exception";
import { formatCommand } from "../lib/command.js";
import { BadCommandError, CursorRangeError, FormatError } from "../lib/errors.js";

export const errorHandler: ErrorHandler = (err, c) => {
    if (err instanceof FormatError) {
        console.warn(`[WARN] ${c.req.method} ${c.req.path}: ${err.message}`);
        return c.json({ error: err.message, line: err.line }, 400);
    }

    if (err instanceof BadCommandError) {
        console.warn(`[WARN] ${c.req.method} ${c.req.path}: ${err.message}`);
        return c.json({ error: err.message, command: formatCommand(err.command), position: err.position }, 422);
    }

    if (err instanceof CursorRangeError) {
        console.warn(`[WARN] ${c.req.method} ${c.req.path}: ${err.message}`);
        return c.json({ error: err.message, command: formatCommand(err.command) }, 422);
    }

    if (err instanceof HTTPException) {
        return err.getResponse();
    }

    console.error(`[ERROR] ${c.req.method} ${c.req.path}:`, err);
    return c.json({ error: "Internal server error" }, 500);
};

import type { MiddlewareHandler } from "hono";
import { RATE_LIMIT_WINDOW_MS, RATE_LIMIT_MAX_REQUESTS } from "../config.js";

export interface RateLimitOptions {
    windowMs: number;
    max: number;
}

/**
 * Sliding-window limiter keyed by client IP. Each limiter keeps its own
 * request log.
 */
export function createRateLimiter({ windowMs, max }: RateLimitOptions): MiddlewareHandler {
    const clients = new Map<string, number[]>();

    // Clean up stale entries every 5 minutes
    setInterval(() => {
        const now = Date.now();
        for (const [key, timestamps] of clients) {
            const active = timestamps.filter((t) => now - t < windowMs);
            if (active.length === 0) {
                clients.delete(key);
            } else {
                clients.set(key, active);
            }
        }
    }, 5 * 60_000).unref();

    return async (c, next) => {
        const ip =
            c.req.header("x-forwarded-for")?.split(",")[0]?.trim() ??
            c.req.header("x-real-ip") ??
            "unknown";

        const now = Date.now();
        let timestamps = clients.get(ip);
        if (!timestamps) {
            timestamps = [];
            clients.set(ip, timestamps);
        }

        const cutoff = now - windowMs;
        while (timestamps.length > 0 && timestamps[0] < cutoff) {
            timestamps.shift();
        }

        c.header("X-RateLimit-Limit", String(max));
        if (timestamps.length >= max) {
            c.header("Retry-After", String(Math.ceil(windowMs / 1000)));
            c.header("X-RateLimit-Remaining", "0");
            return c.json({ error: "Rate limit exceeded. Try again later." }, 429);
        }

        timestamps.push(now);
        c.header("X-RateLimit-Remaining", String(max - timestamps.length));

        await next();
    };
}

export const rateLimiter = createRateLimiter({ windowMs: RATE_LIMIT_WINDOW_MS, max: RATE_LIMIT_MAX_REQUESTS });

import { LRUCache } from "lru-cache";
import { CACHE_MAX_ENTRIES, CACHE_TTL_MS } from "../config.js";
import type { CompressionResult } from "../lib/compress.js";

// Keyed by the raster's canonical text form
export const compressionCache = new LRUCache<string, CompressionResult>({
    max: CACHE_MAX_ENTRIES,
    ttl: CACHE_TTL_MS,
});

// Keyed by `${cellSize}:${raster text}`
export const pngCache = new LRUCache<string, Buffer>({
    max: CACHE_MAX_ENTRIES,
    ttl: CACHE_TTL_MS,
});

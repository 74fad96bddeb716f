import "dotenv/config";

export const PORT = Number(process.env.PORT ?? 3000);

// Cache settings
export const CACHE_MAX_ENTRIES = Number(process.env.CACHE_MAX_ENTRIES ?? 1_000);
export const CACHE_TTL_MS = Number(process.env.CACHE_TTL_MS ?? 3_600_000); // 1 hour default

// Rate limiting
export const RATE_LIMIT_WINDOW_MS = 60_000; // 1 minute
export const RATE_LIMIT_MAX_REQUESTS = Number(process.env.RATE_LIMIT_MAX ?? 60);

// Input limits
export const MAX_BODY_BYTES = Number(process.env.MAX_BODY_BYTES ?? 1_048_576);
export const MAX_RASTER_CELLS = Number(process.env.MAX_RASTER_CELLS ?? 1_000_000);
export const MAX_IMAGE_PIXELS = Number(process.env.MAX_IMAGE_PIXELS ?? 16_777_216); // 4096x4096

// Rendering
export const DEFAULT_CELL_SIZE = 10;
export const MAX_CELL_SIZE = 64;

// Standard 4-bit EGA palette, indexed by colour
export const PALETTE = [
    "#000000", "#0000aa", "#00aa00", "#00aaaa",
    "#aa0000", "#aa00aa", "#aa5500", "#aaaaaa",
    "#555555", "#5555ff", "#55ff55", "#55ffff",
    "#ff5555", "#ff55ff", "#ffff55", "#ffffff",
] as const;

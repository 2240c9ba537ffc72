import type { OrientationData } from "./types.js";

export const LIBRARY_VERSION = "0.1.0";

// Check if process is defined (Node) to avoid ReferenceError in browser
const isNode = typeof process !== "undefined" && process.env !== undefined;

function readEnv(name: string): string | undefined {
    return isNode ? process.env[name] : undefined;
}

export function parseBooleanEnv(name: string, defaultValue: boolean): boolean {
    const raw = readEnv(name);
    if (raw === undefined) return defaultValue;
    return raw === "1" || raw.toLowerCase() === "true";
}

export function parseIntegerEnv(name: string, defaultValue: number): number {
    const raw = readEnv(name);
    if (!raw) return defaultValue;
    const parsed = Number.parseInt(raw, 10);
    return Number.isFinite(parsed) && parsed > 0 ? parsed : defaultValue;
}

/** Initial state of the debug logger; HEXLATTICE_DEBUG=1 turns it on. */
export const DEBUG_DEFAULT = parseBooleanEnv("HEXLATTICE_DEBUG", false);

/** Node expansions A* performs before giving up, unless the caller passes its own cap. */
export const DEFAULT_MAX_PATH_EXPANSIONS = parseIntegerEnv("HEXLATTICE_MAX_PATH_EXPANSIONS", 10_000);

export const SQRT_3 = Math.sqrt(3);

export const TAU = Math.PI * 2;

/** 60 degrees in radians. */
export const SECTOR_RADIANS = Math.PI / 3;

// Orientations
export const POINTY_ORIENTATION: OrientationData = {
    forward: [SQRT_3, SQRT_3 / 2, 0, 3 / 2],
    inverse: [SQRT_3 / 3, -1 / 3, 0, 2 / 3],
    startRotation: 0.5,
};

export const FLAT_ORIENTATION: OrientationData = {
    forward: [3 / 2, 0, SQRT_3 / 2, SQRT_3],
    inverse: [2 / 3, 0, -1 / 3, SQRT_3 / 3],
    startRotation: 0,
};

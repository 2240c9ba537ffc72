import { DoubledMode, type HexCoord, OffsetMode } from "./types.js";
import { hex } from "./hex.js";

// Offset and doubled layouts: https://www.redblobgames.com/grids/hexagons/#coordinates

export function toDoubledCoordinates(h: HexCoord, mode: DoubledMode): [number, number] {
    switch (mode) {
        case DoubledMode.DoubledWidth:
            return [2 * h.q + h.r, h.r];
        case DoubledMode.DoubledHeight:
            return [h.q, 2 * h.r + h.q];
    }
}

/**
 * Inverse of `toDoubledCoordinates`. Input pairs whose parity does not match a
 * hex center are truncated toward zero.
 */
export function fromDoubledCoordinates([col, row]: readonly [number, number], mode: DoubledMode): HexCoord {
    switch (mode) {
        case DoubledMode.DoubledWidth:
            return hex(Math.trunc((col - row) / 2), row);
        case DoubledMode.DoubledHeight:
            return hex(col, Math.trunc((row - col) / 2));
    }
}

function isEven(mode: OffsetMode): boolean {
    return mode === OffsetMode.EvenColumns || mode === OffsetMode.EvenRows;
}

/** Half-step shift applied to odd columns or rows. */
function offsetShift(n: number, even: boolean): number {
    const parity = n & 1;
    return Math.trunc((even ? n + parity : n - parity) / 2);
}

export function toOffsetCoordinates(h: HexCoord, mode: OffsetMode): [number, number] {
    const even = isEven(mode);
    switch (mode) {
        case OffsetMode.EvenColumns:
        case OffsetMode.OddColumns:
            return [h.q, h.r + offsetShift(h.q, even)];
        case OffsetMode.EvenRows:
        case OffsetMode.OddRows:
            return [h.q + offsetShift(h.r, even), h.r];
    }
}

export function fromOffsetCoordinates([col, row]: readonly [number, number], mode: OffsetMode): HexCoord {
    const even = isEven(mode);
    switch (mode) {
        case OffsetMode.EvenColumns:
        case OffsetMode.OddColumns:
            return hex(col, row - offsetShift(col, even));
        case OffsetMode.EvenRows:
        case OffsetMode.OddRows:
            return hex(col - offsetShift(row, even), row);
    }
}

// --- Hexmod ---

/** Number of hexes within `radius` of a center: 3r(r + 1) + 1. */
export function rangeCount(radius: number): number {
    return 3 * radius * (radius + 1) + 1;
}

/** Step between neighboring cell centers in the hexmod index space: 3r + 2. */
export function resolutionShift(radius: number): number {
    return 3 * radius + 2;
}

/**
 * Index of a hex inside the cell of the given radius that contains it.
 * Every hex of a hexagon of that radius gets a distinct index in 0..rangeCount(radius).
 */
export function toHexmod(h: HexCoord, radius: number): number {
    const area = rangeCount(radius);
    const shift = resolutionShift(radius);
    const value = (h.r + shift * h.q) % area;
    return value < 0 ? value + area : value;
}

/**
 * Inverse of `toHexmod` for the hexagon of `radius` centered on the origin.
 * Indices outside 0..rangeCount(radius) produce meaningless coordinates.
 */
export function fromHexmod(index: number, radius: number): HexCoord {
    const shift = resolutionShift(radius);
    const ms = Math.trunc((index + radius) / shift);
    const mcs = Math.trunc((index + 2 * radius) / (shift - 1));
    return hex(ms * (radius + 1) - mcs * radius, index + ms * (-2 * radius - 1) + mcs * (-radius - 1));
}

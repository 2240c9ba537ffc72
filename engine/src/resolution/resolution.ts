import type { HexCoord } from "../core/types.js";
import { hex, hexS, subtractHex } from "../core/hex.js";
import { rangeCount, resolutionShift } from "../core/conversions.js";
import { assertPositiveRadius } from "../core/validation.js";

// Cells of radius R tile the plane as a coarser hex grid; see
// https://observablehq.com/@sanderevers/hex-tiling-of-a-hexagon-grid

export function lowerResUnchecked(c: HexCoord, radius: number): HexCoord {
    const x = c.q;
    const y = c.r;
    const z = hexS(c);
    const area = rangeCount(radius);
    const shift = resolutionShift(radius);
    const cx = Math.floor((y + shift * x) / area);
    const cy = Math.floor((z + shift * y) / area);
    const cz = Math.floor((x + shift * z) / area);
    return hex(Math.floor((1 + cx - cy) / 3), Math.floor((1 + cy - cz) / 3));
}

export function higherResUnchecked(c: HexCoord, radius: number): HexCoord {
    return hex(c.q * (radius + 1) - radius * hexS(c), c.r * (radius + 1) - radius * c.q);
}

export function localUnchecked(c: HexCoord, radius: number): HexCoord {
    return subtractHex(c, higherResUnchecked(lowerResUnchecked(c, radius), radius));
}

/**
 * Returns the coordinate of the radius-`radius` cell containing `c`, in the coarse grid.
 * @param c - A fine-grid coordinate.
 * @param radius - Cell radius, >= 1.
 * @returns The coarse-grid coordinate of the enclosing cell.
 */
export function toLowerRes(c: HexCoord, radius: number): HexCoord {
    assertPositiveRadius(radius);
    return lowerResUnchecked(c, radius);
}

/**
 * Returns the fine-grid center of the coarse cell `c`.
 * @param c - A coarse-grid coordinate.
 * @param radius - Cell radius, >= 1.
 * @returns The center hex of that cell in the fine grid.
 */
export function toHigherRes(c: HexCoord, radius: number): HexCoord {
    assertPositiveRadius(radius);
    return higherResUnchecked(c, radius);
}

/**
 * Offset of `c` from the center of the cell containing it. Always within
 * `radius` steps of the origin.
 */
export function toLocal(c: HexCoord, radius: number): HexCoord {
    assertPositiveRadius(radius);
    return localUnchecked(c, radius);
}

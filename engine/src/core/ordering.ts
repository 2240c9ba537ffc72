import type { HexCoord } from "./types.js";
import { hexLength } from "./hex.js";

// Comparators for Array.prototype.sort

/** Orders by distance from the origin only; equal lengths keep their input order. */
export function compareByLength(a: HexCoord, b: HexCoord): number {
    return hexLength(a) - hexLength(b);
}

/** Orders by q, then r. */
export function compareByXY(a: HexCoord, b: HexCoord): number {
    return a.q - b.q || a.r - b.r;
}

/** Orders by r, then q. */
export function compareByYX(a: HexCoord, b: HexCoord): number {
    return a.r - b.r || a.q - b.q;
}

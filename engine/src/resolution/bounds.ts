import type { Bounds, HexCoord } from "../core/types.js";
import { addHex, HEX_ZERO, hexDistance, hexEquals, roundHex, subtractHex } from "../core/hex.js";
import { rangeCount } from "../core/conversions.js";
import { HexSequence } from "../core/sequence.js";
import { assertRadius } from "../core/validation.js";
import { hexRange } from "../enumeration/range.js";
import { localUnchecked } from "./resolution.js";

/**
 * Creates bounds: every hex within `radius` of `center`.
 * @throws RangeError when radius is negative or fractional.
 */
export function hexBounds(center: HexCoord, radius: number): Bounds {
    assertRadius(radius);
    return { center, radius };
}

/**
 * Smallest bounds centered on the rounded midpoint of min and max that covers
 * the whole q/r parallelogram between them.
 */
export function boundsFromMinMax(min: HexCoord, max: HexCoord): Bounds {
    const center = roundHex({ q: (min.q + max.q) / 2, r: (min.r + max.r) / 2 });
    const corners = [min, max, { q: min.q, r: max.r }, { q: max.q, r: min.r }];
    const radius = Math.max(...corners.map((c) => hexDistance(center, c)));
    return { center, radius };
}

/**
 * Bounds enclosing every given coordinate, centered on the middle of their q/r extent.
 * An empty input gives a zero-radius bounds at the origin.
 */
export function boundsFromCoords(coords: Iterable<HexCoord>): Bounds {
    const all = [...coords];
    if (all.length === 0) return { center: HEX_ZERO, radius: 0 };
    let minQ = Infinity;
    let minR = Infinity;
    let maxQ = -Infinity;
    let maxR = -Infinity;
    for (const c of all) {
        minQ = Math.min(minQ, c.q);
        minR = Math.min(minR, c.r);
        maxQ = Math.max(maxQ, c.q);
        maxR = Math.max(maxR, c.r);
    }
    const center = roundHex({ q: (minQ + maxQ) / 2, r: (minR + maxR) / 2 });
    let radius = 0;
    for (const c of all) {
        radius = Math.max(radius, hexDistance(center, c));
    }
    return { center, radius };
}

/** Center of the bounds enclosing the coordinates. */
export function centerHex(coords: Iterable<HexCoord>): HexCoord {
    return boundsFromCoords(coords).center;
}

export function isInBounds(bounds: Bounds, c: HexCoord): boolean {
    return hexDistance(bounds.center, c) <= bounds.radius;
}

export function boundsHexCount(bounds: Bounds): number {
    return rangeCount(bounds.radius);
}

export function boundsCoords(bounds: Bounds): HexSequence {
    return hexRange(bounds.center, bounds.radius);
}

export function boundsEquals(a: Bounds, b: Bounds): boolean {
    return a.radius === b.radius && hexEquals(a.center, b.center);
}

export function boundsIntersectsWith(a: Bounds, b: Bounds): boolean {
    return hexDistance(a.center, b.center) <= a.radius + b.radius;
}

/** Hexes inside both bounds, in the range order of the smaller one. */
export function boundsIntersection(a: Bounds, b: Bounds): HexSequence {
    const [small, large] = a.radius > b.radius ? [b, a] : [a, b];
    const inside = boundsCoords(small).toArray().filter((c) => isInBounds(large, c));
    return HexSequence.of(inside);
}

/**
 * Wraps `c` into the bounds and returns the result relative to the bounds center.
 * The plane is tiled with copies of the bounds hexagon; `c` maps to the hex at
 * the same offset in the copy it falls into.
 */
export function wrapLocal(bounds: Bounds, c: HexCoord): HexCoord {
    return localUnchecked(subtractHex(c, bounds.center), bounds.radius);
}

/**
 * Wraps `c` into the bounds. Coordinates already in bounds are returned unchanged.
 */
export function wrap(bounds: Bounds, c: HexCoord): HexCoord {
    return addHex(wrapLocal(bounds, c), bounds.center);
}

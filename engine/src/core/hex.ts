import {
    type CubeCoord,
    type DirectionWay,
    EdgeDirection,
    type FractionalHex,
    type HexCoord,
    type Orientation,
    VertexDirection,
} from "./types.js";
import { SQRT_3 } from "./constants.js";
import { EDGE_DELTAS, VERTEX_DELTAS, edgeAt, mod6, vertexAt } from "./directions.js";
import { wayFromAxis, wayMain } from "./direction-way.js";
import { forwardTransform } from "./orientation.js";

/**
 * Creates a hex coordinate. Negative zero is folded to zero so that
 * structurally equal coordinates always compare equal.
 * @param q - The q (column) component.
 * @param r - The r (row) component.
 * @returns The coordinate.
 */
export function hex(q: number, r: number): HexCoord {
    return { q: q + 0, r: r + 0 };
}

export const HEX_ZERO: Readonly<HexCoord> = Object.freeze(hex(0, 0));

/**
 * Returns the derived third cubic component.
 * @param h - The coordinate.
 * @returns s = -q - r.
 */
export function hexS(h: HexCoord): number {
    return -h.q - h.r + 0;
}

export function axialToCube(h: HexCoord): CubeCoord {
    return { x: h.q, y: h.r, z: hexS(h) };
}

export function cubeToAxial(cube: CubeCoord): HexCoord {
    return hex(cube.x, cube.y);
}

// --- Arithmetic ---

/**
 * Adds two hex coordinates together.
 * @param a - The first coordinate.
 * @param b - The second coordinate.
 * @returns The sum of the two coordinates.
 */
export function addHex(a: HexCoord, b: HexCoord): HexCoord {
    return hex(a.q + b.q, a.r + b.r);
}

/**
 * Subtracts `b` from `a`.
 * @param a - The first coordinate.
 * @param b - The coordinate to subtract.
 * @returns The difference.
 */
export function subtractHex(a: HexCoord, b: HexCoord): HexCoord {
    return hex(a.q - b.q, a.r - b.r);
}

/**
 * Scales a hex coordinate by a factor k.
 * @param a - The coordinate to scale.
 * @param k - The scaling factor.
 * @returns The scaled coordinate.
 */
export function scaleHex(a: HexCoord, k: number): HexCoord {
    return hex(a.q * k, a.r * k);
}

/** Component-wise division by `k`, truncating toward zero. */
export function divideHex(a: HexCoord, k: number): HexCoord {
    if (k === 0) {
        throw new RangeError("Cannot divide a hex coordinate by zero");
    }
    return hex(Math.trunc(a.q / k), Math.trunc(a.r / k));
}

/** Component-wise truncated remainder, sign following the dividend. */
export function remHex(a: HexCoord, k: number): HexCoord {
    if (k === 0) {
        throw new RangeError("Cannot take the remainder of a hex coordinate by zero");
    }
    return hex(a.q % k, a.r % k);
}

export function negateHex(a: HexCoord): HexCoord {
    return hex(-a.q, -a.r);
}

export function absHex(a: HexCoord): HexCoord {
    return hex(Math.abs(a.q), Math.abs(a.r));
}

export function signumHex(a: HexCoord): HexCoord {
    return hex(Math.sign(a.q), Math.sign(a.r));
}

export function minHex(a: HexCoord, b: HexCoord): HexCoord {
    return hex(Math.min(a.q, b.q), Math.min(a.r, b.r));
}

export function maxHex(a: HexCoord, b: HexCoord): HexCoord {
    return hex(Math.max(a.q, b.q), Math.max(a.r, b.r));
}

// --- Metrics ---

/**
 * Returns the number of steps from the origin.
 * @param a - The coordinate.
 * @returns max(|q|, |r|, |s|).
 */
export function hexLength(a: HexCoord): number {
    return Math.max(Math.abs(a.q), Math.abs(a.r), Math.abs(hexS(a)));
}

/**
 * Calculates the distance between two hex coordinates.
 * Components are doubles, so the sums stay exact for any 32-bit coordinate.
 * @param a - The first coordinate.
 * @param b - The second coordinate.
 * @returns The distance in hex steps.
 */
export function hexDistance(a: HexCoord, b: HexCoord): number {
    return (Math.abs(a.q - b.q) + Math.abs(a.q + a.r - b.q - b.r) + Math.abs(a.r - b.r)) / 2;
}

/**
 * Straight-line distance between two hex centers, in units of the hex inner diameter.
 * @param a - The first coordinate.
 * @param b - The second coordinate.
 * @param orientation - Layout used for the projection; the result is the same for both.
 * @returns The euclidean distance.
 */
export function euclideanDistance(a: HexCoord, b: HexCoord, orientation: Orientation = "pointy"): number {
    return euclideanLength(subtractHex(a, b), orientation);
}

export function euclideanLength(a: HexCoord, orientation: Orientation = "pointy"): number {
    const [x, y] = forwardTransform(orientation, a);
    // Adjacent centers are sqrt(3) apart in the layout space
    return Math.hypot(x, y) / SQRT_3;
}

/**
 * Checks if two hex coordinates are equal.
 * @param a - The first coordinate.
 * @param b - The second coordinate.
 * @returns True if q and r match.
 */
export function hexEquals(a: HexCoord, b: HexCoord): boolean {
    return a.q === b.q && a.r === b.r;
}

/**
 * Converts a hex coordinate to a string key "q,r".
 * @param h - The coordinate.
 * @returns The string representation.
 */
export function hexToString(h: HexCoord): string {
    return `${h.q},${h.r}`;
}

/**
 * Parses a string key "q,r" back into a hex coordinate.
 * @param s - The string representation.
 * @returns The hex coordinate.
 */
export function stringToHex(s: string): HexCoord {
    const parts = s.split(",");
    if (parts.length !== 2) {
        throw new Error(`Invalid hex key "${s}"`);
    }
    const q = Number(parts[0]);
    const r = Number(parts[1]);
    if (!Number.isInteger(q) || !Number.isInteger(r)) {
        throw new Error(`Invalid hex key "${s}"`);
    }
    return hex(q, r);
}

// --- Neighbors ---

/**
 * Returns the neighbor of a hex in a specific direction.
 * @param h - The center hex.
 * @param direction - The edge direction.
 * @returns The neighbor coordinate.
 */
export function hexNeighbor(h: HexCoord, direction: EdgeDirection): HexCoord {
    return addHex(h, EDGE_DELTAS[direction]);
}

/**
 * Returns the diagonal neighbor of a hex, two steps away through a vertex.
 * @param h - The center hex.
 * @param direction - The vertex direction.
 * @returns The diagonal neighbor coordinate.
 */
export function diagonalNeighbor(h: HexCoord, direction: VertexDirection): HexCoord {
    return addHex(h, VERTEX_DELTAS[direction]);
}

/**
 * Returns all 6 neighbors of a hex, in clockwise direction order.
 * @param h - The center hex.
 * @returns Array of neighbor coordinates.
 */
export function getNeighbors(h: HexCoord): HexCoord[] {
    return EDGE_DELTAS.map((d) => addHex(h, d));
}

export function getDiagonalNeighbors(h: HexCoord): HexCoord[] {
    return VERTEX_DELTAS.map((d) => addHex(h, d));
}

/**
 * Returns the edge direction from `a` to `b` if they are adjacent.
 * @param a - The origin.
 * @param b - The target.
 * @returns The direction, or null when `b` is not a neighbor of `a`.
 */
export function directionTo(a: HexCoord, b: HexCoord): EdgeDirection | null {
    const delta = subtractHex(b, a);
    const index = EDGE_DELTAS.findIndex((d) => hexEquals(d, delta));
    return index === -1 ? null : edgeAt(index);
}

// --- Rotation & reflection ---

/**
 * Rotates a coordinate clockwise around the origin by steps of 60 degrees.
 * @param a - The coordinate.
 * @param steps - Number of steps; any integer, normalized modulo 6.
 * @returns The rotated coordinate.
 */
export function rotateCw(a: HexCoord, steps = 1): HexCoord {
    const s = hexS(a);
    switch (mod6(steps)) {
        case 1:
            return hex(-a.r, -s);
        case 2:
            return hex(s, a.q);
        case 3:
            return hex(-a.q, -a.r);
        case 4:
            return hex(a.r, s);
        case 5:
            return hex(-s, -a.q);
        default:
            return hex(a.q, a.r);
    }
}

export function rotateCcw(a: HexCoord, steps = 1): HexCoord {
    return rotateCw(a, -steps);
}

export function rotateAround(a: HexCoord, center: HexCoord, steps = 1): HexCoord {
    return addHex(rotateCw(subtractHex(a, center), steps), center);
}

export function rotateAroundCcw(a: HexCoord, center: HexCoord, steps = 1): HexCoord {
    return addHex(rotateCcw(subtractHex(a, center), steps), center);
}

/** Reflection keeping q fixed: (q, r) -> (q, s). */
export function reflectQ(a: HexCoord): HexCoord {
    return hex(a.q, hexS(a));
}

/** Reflection keeping r fixed: (q, r) -> (s, r). */
export function reflectR(a: HexCoord): HexCoord {
    return hex(hexS(a), a.r);
}

/** Reflection keeping s fixed: (q, r) -> (r, q). */
export function reflectS(a: HexCoord): HexCoord {
    return hex(a.r, a.q);
}

// --- Fractional space ---

/**
 * Rounds a fractional axial position to the nearest hex.
 * The cubic component with the largest rounding error is recomputed from the other two.
 * @param frac - The fractional position.
 * @returns The nearest hex coordinate.
 */
export function roundHex(frac: FractionalHex): HexCoord {
    const x = frac.q;
    const y = frac.r;
    const z = -frac.q - frac.r;
    let rx = Math.round(x);
    let ry = Math.round(y);
    let rz = Math.round(z);

    const xDiff = Math.abs(rx - x);
    const yDiff = Math.abs(ry - y);
    const zDiff = Math.abs(rz - z);

    if (xDiff > yDiff && xDiff > zDiff) {
        rx = -ry - rz;
    } else if (yDiff > zDiff) {
        ry = -rx - rz;
    } else {
        rz = -rx - ry;
    }

    return hex(rx, ry);
}

/**
 * Linear interpolation between two hexes.
 * @param a - Value at t = 0.
 * @param b - Value at t = 1.
 * @param t - Interpolation factor; values outside 0..1 extrapolate.
 * @returns The fractional position.
 */
export function lerpHex(a: HexCoord, b: HexCoord, t: number): FractionalHex {
    return { q: a.q + (b.q - a.q) * t, r: a.r + (b.r - a.r) * t };
}

// --- Direction queries ---

/**
 * Finds which edge direction best leads from `a` to `b`.
 * @param a - The origin.
 * @param b - The target.
 * @returns A single direction, or a tie when `b` sits on the boundary of two edge wedges.
 */
export function wayTo(a: HexCoord, b: HexCoord): DirectionWay<EdgeDirection> {
    const { x: cx, y: cy, z: cz } = axialToCube(subtractHex(b, a));
    // Project onto the edge axes
    const x = cy - cx;
    const y = cz - cy;
    const z = cx - cz;
    const [xa, ya, za] = [Math.abs(x), Math.abs(y), Math.abs(z)];
    const max = Math.max(xa, ya, za);
    if (max === xa) return wayFromAxis(x < 0, xa === ya, xa === za, EdgeDirection.E2, edgeAt);
    if (max === ya) return wayFromAxis(y < 0, ya === za, ya === xa, EdgeDirection.E4, edgeAt);
    return wayFromAxis(z < 0, za === xa, za === ya, EdgeDirection.E0, edgeAt);
}

/**
 * Finds which vertex direction best leads from `a` to `b`.
 * @param a - The origin.
 * @param b - The target.
 * @returns A single direction, or a tie when `b` lies exactly along an edge direction.
 */
export function diagonalWayTo(a: HexCoord, b: HexCoord): DirectionWay<VertexDirection> {
    const { x, y, z } = axialToCube(subtractHex(b, a));
    const [xa, ya, za] = [Math.abs(x), Math.abs(y), Math.abs(z)];
    const max = Math.max(xa, ya, za);
    if (max === xa) return wayFromAxis(x < 0, xa === ya, xa === za, VertexDirection.V0, vertexAt);
    if (max === ya) return wayFromAxis(y < 0, ya === za, ya === xa, VertexDirection.V2, vertexAt);
    return wayFromAxis(z < 0, za === xa, za === ya, VertexDirection.V4, vertexAt);
}

export function mainDirectionTo(a: HexCoord, b: HexCoord): EdgeDirection {
    return wayMain(wayTo(a, b));
}

export function mainDiagonalTo(a: HexCoord, b: HexCoord): VertexDirection {
    return wayMain(diagonalWayTo(a, b));
}

// --- Aggregates ---

/**
 * Rounded centroid of a set of coordinates.
 * @param coords - Any finite collection of coordinates.
 * @returns The average, or the origin for an empty input.
 */
export function averageHex(coords: Iterable<HexCoord>): HexCoord {
    let sumQ = 0;
    let sumR = 0;
    let count = 0;
    for (const c of coords) {
        sumQ += c.q;
        sumR += c.r;
        count++;
    }
    if (count === 0) return HEX_ZERO;
    return roundHex({ q: sumQ / count, r: sumR / count });
}

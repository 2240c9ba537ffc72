import { EdgeDirection, type HexCoord, type RadiusRange, VertexDirection } from "../core/types.js";
import { EDGE_DELTAS, edgeAt, vertexAt } from "../core/directions.js";
import { addHex, scaleHex } from "../core/hex.js";
import { HexSequence } from "../core/sequence.js";
import { assertRadius, assertRadiusRange, radiiOf } from "../core/validation.js";

/** Number of hexes at exactly `radius` steps from a center. */
export function ringCount(radius: number): number {
    return radius === 0 ? 1 : 6 * radius;
}

function* walkRing(center: HexCoord, radius: number, start: EdgeDirection, clockwise: boolean): Generator<HexCoord> {
    if (radius === 0) {
        yield center;
        return;
    }
    let current = addHex(center, scaleHex(EDGE_DELTAS[start], radius));
    for (let side = 0; side < 6; side++) {
        // From E0, clockwise sides run E2, E3, ... E1; counter-clockwise sides run E4, E3, ... E5
        const step = EDGE_DELTAS[clockwise ? edgeAt(start + 2 + side) : edgeAt(start - 2 - side)];
        for (let i = 0; i < radius; i++) {
            yield current;
            current = addHex(current, step);
        }
    }
}

/**
 * Returns a ring of hexes at a specific radius from the center.
 * Starts at `center + E0 * radius` and runs clockwise.
 * @param center - The center hex.
 * @param radius - The radius of the ring.
 * @returns The ring; a single hex for radius 0.
 */
export function hexRing(center: HexCoord, radius: number): HexSequence {
    assertRadius(radius);
    return customRing(center, radius, EdgeDirection.E0, true);
}

/** Same loop as `hexRing`, from the same start, counter-clockwise. */
export function hexRingCcw(center: HexCoord, radius: number): HexSequence {
    assertRadius(radius);
    return customRing(center, radius, EdgeDirection.E0, false);
}

/**
 * A ring starting at `center + start * radius`, walked in either winding.
 * @param center - The center hex.
 * @param radius - The radius of the ring.
 * @param start - Edge direction of the first hex.
 * @param clockwise - Winding of the walk.
 */
export function customRing(center: HexCoord, radius: number, start: EdgeDirection, clockwise: boolean): HexSequence {
    assertRadius(radius);
    return new HexSequence(ringCount(radius), () => walkRing(center, radius, start, clockwise));
}

/** One `customRing` per radius of `range`, innermost first. */
export function customRings(
    center: HexCoord,
    range: RadiusRange,
    start: EdgeDirection,
    clockwise: boolean,
): HexSequence[] {
    assertRadiusRange(range);
    return radiiOf(range).map((r) => customRing(center, r, start, clockwise));
}

/**
 * Rings for every radius of `range`, concatenated in ascending order.
 * @param center - The center hex.
 * @param range - Inclusive radius range, e.g. `{ start: 0, end: 3 }` for a filled hexagon.
 * @returns All hexes of the covered rings.
 */
export function spiralRange(center: HexCoord, range: RadiusRange): HexSequence {
    assertRadiusRange(range);
    return HexSequence.concat(radiiOf(range).map((r) => hexRing(center, r)));
}

export function spiralRangeCcw(center: HexCoord, range: RadiusRange): HexSequence {
    assertRadiusRange(range);
    return HexSequence.concat(radiiOf(range).map((r) => hexRingCcw(center, r)));
}

/**
 * The side of a ring facing a vertex direction, corner to corner, clockwise.
 * Runs from `center + E(v - 1) * radius` to `center + E(v) * radius`.
 * @param center - The center hex.
 * @param radius - The ring radius.
 * @param direction - The vertex direction the side faces.
 * @returns `radius + 1` hexes.
 */
export function ringEdge(center: HexCoord, radius: number, direction: VertexDirection): HexSequence {
    return customRingEdge(center, radius, edgeAt(direction - 1), true);
}

/** `ringEdge` walked from the clockwise corner back to the counter-clockwise one. */
export function ringEdgeCcw(center: HexCoord, radius: number, direction: VertexDirection): HexSequence {
    return customRingEdge(center, radius, edgeAt(direction), false);
}

/**
 * One side of a ring, from the corner `center + start * radius` to the next
 * corner in the given winding.
 * @returns `radius + 1` hexes.
 */
export function customRingEdge(center: HexCoord, radius: number, start: EdgeDirection, clockwise: boolean): HexSequence {
    assertRadius(radius);
    const first = addHex(center, scaleHex(EDGE_DELTAS[start], radius));
    const step = EDGE_DELTAS[edgeAt(clockwise ? start + 2 : start - 2)];
    return new HexSequence(radius + 1, function* () {
        for (let i = 0; i <= radius; i++) {
            yield addHex(first, scaleHex(step, i));
        }
    });
}

/**
 * All six sides of a ring, clockwise, starting with the side facing V1 so the
 * first side begins where `hexRing` begins. Consecutive sides share a corner.
 */
export function ringEdges(center: HexCoord, radius: number): HexSequence[] {
    assertRadius(radius);
    const sides: HexSequence[] = [];
    for (let i = 0; i < 6; i++) {
        sides.push(ringEdge(center, radius, vertexAt(i + 1)));
    }
    return sides;
}

import { EdgeDirection, type HexCoord, type RadiusRange, VertexDirection } from "../core/types.js";
import { EDGE_DELTAS, edgeAt } from "../core/directions.js";
import { addHex, hexDistance, mainDiagonalTo, mainDirectionTo, scaleHex } from "../core/hex.js";
import { HexSequence } from "../core/sequence.js";
import { assertRadius, assertRadiusRange, radiiOf } from "../core/validation.js";
import { ringEdge, ringEdgeCcw } from "./rings.js";

export type WedgeOptions = {
    /** Walk each ring side clockwise (default) or counter-clockwise. */
    clockwise?: boolean;
    /** First radius included; 0 keeps the apex. */
    innerRadius?: number;
};

/** Number of hexes in a wedge covering radii 0..radius. */
export function wedgeCount(radius: number): number {
    return ((radius + 1) * (radius + 2)) / 2;
}

/**
 * A triangular 60 degree sector pointing along a vertex direction: the ring
 * sides facing `direction` for every radius of `range`.
 * @param center - The apex.
 * @param range - Inclusive radii.
 * @param direction - The vertex direction the wedge opens toward.
 * @param clockwise - Walk each side clockwise.
 */
export function customWedge(
    center: HexCoord,
    range: RadiusRange,
    direction: VertexDirection,
    clockwise: boolean,
): HexSequence {
    assertRadiusRange(range);
    const side = clockwise ? ringEdge : ringEdgeCcw;
    return HexSequence.concat(radiiOf(range).map((r) => side(center, r, direction)));
}

export function wedge(center: HexCoord, range: RadiusRange, direction: VertexDirection): HexSequence {
    return customWedge(center, range, direction, true);
}

/**
 * The wedge from `a` that contains `b`, up to `b`'s distance.
 */
export function wedgeTo(a: HexCoord, b: HexCoord): HexSequence {
    return customWedgeTo(a, b, {});
}

export function customWedgeTo(a: HexCoord, b: HexCoord, options: WedgeOptions): HexSequence {
    const innerRadius = options.innerRadius ?? 0;
    assertRadius(innerRadius, "innerRadius");
    const range = { start: innerRadius, end: hexDistance(a, b) };
    return customWedge(a, range, mainDiagonalTo(a, b), options.clockwise ?? true);
}

/**
 * A 60 degree cone centered on an edge direction. At radius r it holds the
 * corner `center + E(d) * r` and floor(r / 2) ring hexes on each side of it,
 * ordered clockwise.
 * @param center - The apex.
 * @param range - Inclusive radii.
 * @param direction - The edge direction the cone is centered on.
 */
export function cornerWedge(center: HexCoord, range: RadiusRange, direction: EdgeDirection): HexSequence {
    assertRadiusRange(range);
    const radii = radiiOf(range);
    const axis = EDGE_DELTAS[direction];
    const towardCcw = EDGE_DELTAS[edgeAt(direction - 2)];
    const towardCw = EDGE_DELTAS[edgeAt(direction + 2)];
    const length = radii.reduce((sum, r) => sum + 2 * Math.floor(r / 2) + 1, 0);
    return new HexSequence(length, function* () {
        for (const r of radii) {
            const corner = addHex(center, scaleHex(axis, r));
            const half = Math.floor(r / 2);
            for (let i = half; i >= 1; i--) {
                yield addHex(corner, scaleHex(towardCcw, i));
            }
            yield corner;
            for (let i = 1; i <= half; i++) {
                yield addHex(corner, scaleHex(towardCw, i));
            }
        }
    });
}

/** The corner wedge from `a` centered on the main direction toward `b`, up to `b`'s distance. */
export function cornerWedgeTo(a: HexCoord, b: HexCoord): HexSequence {
    return cornerWedge(a, { start: 0, end: hexDistance(a, b) }, mainDirectionTo(a, b));
}

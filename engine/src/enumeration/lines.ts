import type { HexCoord } from "../core/types.js";
import { EDGE_DELTAS, vertexEdgeDirections } from "../core/directions.js";
import { addHex, hexDistance, hexEquals, hexLength, lerpHex, mainDiagonalTo, roundHex, scaleHex, subtractHex } from "../core/hex.js";
import { HexSequence } from "../core/sequence.js";

/**
 * Returns a line of hexes between two coordinates (inclusive).
 * @param a - The start hex.
 * @param b - The end hex.
 * @returns distance(a, b) + 1 hexes from `a` to `b`.
 */
export function lineTo(a: HexCoord, b: HexCoord): HexSequence {
    if (hexEquals(a, b)) return HexSequence.of([a]);
    const dist = hexDistance(a, b);
    const divisor = Math.max(dist, 1);
    return new HexSequence(dist + 1, function* () {
        for (let i = 0; i <= dist; i++) {
            yield roundHex(lerpHex(a, b, i / divisor));
        }
    });
}

/**
 * A staircase line using only the two edge directions flanking the
 * main diagonal from `a` to `b`: all steps of one, then all steps of the other.
 * @param a - The start hex.
 * @param b - The end hex.
 * @param clockwise - Take the counter-clockwise direction first when true, the clockwise one first when false.
 * @returns distance(a, b) + 1 hexes from `a` to `b`.
 */
export function rectilineTo(a: HexCoord, b: HexCoord, clockwise = true): HexSequence {
    const delta = subtractHex(b, a);
    const count = hexLength(delta);
    const [ccw, cw] = vertexEdgeDirections(mainDiagonalTo(a, b));
    const dirA = EDGE_DELTAS[clockwise ? ccw : cw];
    const dirB = EDGE_DELTAS[clockwise ? cw : ccw];
    // Steps along dirA: how far delta is from a pure dirB run
    const stepsA = hexDistance(scaleHex(dirB, count), delta);
    return new HexSequence(count + 1, function* () {
        let p = a;
        yield p;
        for (let i = 0; i < count; i++) {
            p = addHex(p, i < stepsA ? dirA : dirB);
            yield p;
        }
    });
}

import { type BlockingFn, EdgeDirection, type HexCoord } from "../core/types.js";
import { edgeDiagonalLeft, edgeDiagonalRight } from "../core/directions.js";
import { diagonalWayTo, hexEquals, hexToString } from "../core/hex.js";
import { wayMatches } from "../core/direction-way.js";
import { hexRange } from "../enumeration/range.js";
import { lineTo } from "../enumeration/lines.js";

/**
 * True when no hex strictly between `from` and `target` on the line blocks.
 * Neither end is tested.
 */
export function hasClearLineOfSight(from: HexCoord, target: HexCoord, isBlocking: BlockingFn): boolean {
    const line = lineTo(from, target).toArray();
    for (let i = 1; i < line.length - 1; i++) {
        if (isBlocking(line[i])) return false;
    }
    return true;
}

function collectVisible(
    origin: HexCoord,
    radius: number,
    isBlocking: BlockingFn,
    inCone: (target: HexCoord) => boolean,
): Set<string> {
    const visible = new Set<string>();
    for (const target of hexRange(origin, radius)) {
        if (hexEquals(target, origin)) {
            visible.add(hexToString(target));
            continue;
        }
        if (!inCone(target)) continue;
        if (hasClearLineOfSight(origin, target, isBlocking)) {
            visible.add(hexToString(target));
        }
    }
    return visible;
}

/**
 * Omnidirectional field of view.
 * A blocking hex is itself visible; it hides what lies behind it.
 * @param origin - The viewer; always visible.
 * @param radius - Sight range.
 * @param isBlocking - Whether a hex blocks sight.
 * @returns Keys ("q,r") of the visible hexes.
 */
export function rangeFov(origin: HexCoord, radius: number, isBlocking: BlockingFn): Set<string> {
    return collectVisible(origin, radius, isBlocking, () => true);
}

/**
 * Field of view restricted to the 120 degree cone centered on `direction`:
 * the targets whose diagonal way from the origin includes one of the two
 * vertex directions flanking it.
 */
export function directionalFov(
    origin: HexCoord,
    radius: number,
    direction: EdgeDirection,
    isBlocking: BlockingFn,
): Set<string> {
    const left = edgeDiagonalLeft(direction);
    const right = edgeDiagonalRight(direction);
    return collectVisible(origin, radius, isBlocking, (target) => {
        const way = diagonalWayTo(origin, target);
        return wayMatches(way, left) || wayMatches(way, right);
    });
}

import type { HexCoord } from "../core/types.js";
import { hex } from "../core/hex.js";
import { rangeCount } from "../core/conversions.js";
import { HexSequence } from "../core/sequence.js";
import { assertRadius } from "../core/validation.js";

function* walkRange(center: HexCoord, radius: number, includeCenter: boolean): Generator<HexCoord> {
    for (let q = -radius; q <= radius; q++) {
        const rMin = Math.max(-radius, -q - radius);
        const rMax = Math.min(radius, radius - q);
        for (let r = rMin; r <= rMax; r++) {
            if (!includeCenter && q === 0 && r === 0) continue;
            yield hex(center.q + q, center.r + r);
        }
    }
}

/**
 * Returns all hexes within `radius` steps of the center, column by column.
 * @param center - The center hex.
 * @param radius - The maximum distance.
 * @returns 3r^2 + 3r + 1 hexes.
 */
export function hexRange(center: HexCoord, radius: number): HexSequence {
    assertRadius(radius);
    return new HexSequence(rangeCount(radius), () => walkRange(center, radius, true));
}

/** `hexRange` without the center itself. */
export function hexXRange(center: HexCoord, radius: number): HexSequence {
    assertRadius(radius);
    return new HexSequence(rangeCount(radius) - 1, () => walkRange(center, radius, false));
}

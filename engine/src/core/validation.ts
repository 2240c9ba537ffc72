import type { RadiusRange } from "./types.js";

/** Throws unless `radius` is an integer >= 0. */
export function assertRadius(radius: number, label = "radius"): void {
    if (!Number.isInteger(radius) || radius < 0) {
        throw new RangeError(`${label} must be a non-negative integer, got ${radius}`);
    }
}

/** Throws unless `radius` is an integer >= 1. */
export function assertPositiveRadius(radius: number, label = "radius"): void {
    if (!Number.isInteger(radius) || radius < 1) {
        throw new RangeError(`${label} must be a positive integer, got ${radius}`);
    }
}

/** Throws unless both ends are valid radii. A range with start > end is empty. */
export function assertRadiusRange(range: RadiusRange): void {
    assertRadius(range.start, "range start");
    assertRadius(range.end, "range end");
}

/** Radii of an inclusive range, ascending. */
export function radiiOf(range: RadiusRange): number[] {
    const radii: number[] = [];
    for (let r = range.start; r <= range.end; r++) {
        radii.push(r);
    }
    return radii;
}

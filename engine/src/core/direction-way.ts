import type { Direction, DirectionWay } from "./types.js";
import { mod6 } from "./directions.js";

export function singleWay<D extends Direction>(direction: D): DirectionWay<D> {
    return { kind: "single", direction };
}

/**
 * Builds a tie. `ccw` must be the counter-clockwise neighbor of `cw`, and `main` one of the two.
 */
export function tieWay<D extends Direction>(ccw: D, cw: D, main: D): DirectionWay<D> {
    return { kind: "tie", directions: [ccw, cw], main };
}

/**
 * Builds a way from the dominant axis of a delta.
 * @param isNegative - The axis component is negative, so the way points opposite to `base`.
 * @param tiesCcw - The axis ties with the axis on its counter-clockwise side.
 * @param tiesCw - The axis ties with the axis on its clockwise side.
 * @param base - The direction for a positive axis component.
 * @param at - Index-to-direction lookup for the direction family.
 */
export function wayFromAxis<D extends Direction>(
    isNegative: boolean,
    tiesCcw: boolean,
    tiesCw: boolean,
    base: D,
    at: (index: number) => D,
): DirectionWay<D> {
    const main = isNegative ? at(base + 3) : base;
    if (tiesCcw) return tieWay(at(main - 1), main, main);
    if (tiesCw) return tieWay(main, at(main + 1), main);
    return singleWay(main);
}

/** One or two directions held by the way, counter-clockwise first. */
export function wayDirections<D extends Direction>(way: DirectionWay<D>): D[] {
    return way.kind === "single" ? [way.direction] : [...way.directions];
}

/** The single direction, or the dominant-axis member of a tie. */
export function wayMain<D extends Direction>(way: DirectionWay<D>): D {
    return way.kind === "single" ? way.direction : way.main;
}

export function isTie<D extends Direction>(way: DirectionWay<D>): boolean {
    return way.kind === "tie";
}

/**
 * Compares a way against one direction. A tie matches both of its members.
 */
export function wayMatches<D extends Direction>(way: DirectionWay<D>, direction: D): boolean {
    if (way.kind === "single") return way.direction === direction;
    return way.directions[0] === direction || way.directions[1] === direction;
}

export function wayEquals<D extends Direction>(a: DirectionWay<D>, b: DirectionWay<D>): boolean {
    if (a.kind === "single" && b.kind === "single") return a.direction === b.direction;
    if (a.kind === "tie" && b.kind === "tie") {
        return a.directions[0] === b.directions[0] && a.directions[1] === b.directions[1] && a.main === b.main;
    }
    return false;
}

/** Checks that a tie holds two clockwise-adjacent directions and that `main` is one of them. */
export function isValidWay<D extends Direction>(way: DirectionWay<D>): boolean {
    if (way.kind === "single") return true;
    const [ccw, cw] = way.directions;
    return mod6(cw - ccw) === 1 && (way.main === ccw || way.main === cw);
}

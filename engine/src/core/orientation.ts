import type { FractionalHex, Orientation, OrientationData } from "./types.js";
import { FLAT_ORIENTATION, POINTY_ORIENTATION } from "./constants.js";

export const ORIENTATIONS: Record<Orientation, OrientationData> = {
    pointy: POINTY_ORIENTATION,
    flat: FLAT_ORIENTATION,
};

export function orientationData(orientation: Orientation): OrientationData {
    return ORIENTATIONS[orientation];
}

/**
 * Projects an axial position through the forward matrix.
 * Returns unscaled layout units: multiply by the hex size to get pixels.
 */
export function forwardTransform(orientation: Orientation, position: FractionalHex): [number, number] {
    const [f0, f1, f2, f3] = ORIENTATIONS[orientation].forward;
    return [f0 * position.q + f1 * position.r, f2 * position.q + f3 * position.r];
}

/** Inverse of `forwardTransform`; the result still needs rounding to land on a hex. */
export function inverseTransform(orientation: Orientation, point: readonly [number, number]): FractionalHex {
    const [i0, i1, i2, i3] = ORIENTATIONS[orientation].inverse;
    const [x, y] = point;
    return { q: i0 * x + i1 * y, r: i2 * x + i3 * y };
}

/** Angle of the first hexagon corner, in radians. */
export function startAngle(orientation: Orientation): number {
    return (ORIENTATIONS[orientation].startRotation * Math.PI) / 3;
}

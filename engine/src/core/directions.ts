import { EdgeDirection, type HexCoord, type Orientation, VertexDirection } from "./types.js";
import { SECTOR_RADIANS } from "./constants.js";

export const EDGE_DIRECTIONS: readonly EdgeDirection[] = [
    EdgeDirection.E0,
    EdgeDirection.E1,
    EdgeDirection.E2,
    EdgeDirection.E3,
    EdgeDirection.E4,
    EdgeDirection.E5,
];

export const VERTEX_DIRECTIONS: readonly VertexDirection[] = [
    VertexDirection.V0,
    VertexDirection.V1,
    VertexDirection.V2,
    VertexDirection.V3,
    VertexDirection.V4,
    VertexDirection.V5,
];

// Unit deltas, indexed by direction
export const EDGE_DELTAS: readonly HexCoord[] = [
    { q: 1, r: 0 },
    { q: 0, r: 1 },
    { q: -1, r: 1 },
    { q: -1, r: 0 },
    { q: 0, r: -1 },
    { q: 1, r: -1 },
];

export const VERTEX_DELTAS: readonly HexCoord[] = [
    { q: 2, r: -1 },
    { q: 1, r: 1 },
    { q: -1, r: 2 },
    { q: -2, r: 1 },
    { q: -1, r: -1 },
    { q: 1, r: -2 },
];

/** Edge direction names for flat-topped hexagons. */
export const FlatEdge = {
    BottomRight: EdgeDirection.E0,
    Bottom: EdgeDirection.E1,
    BottomLeft: EdgeDirection.E2,
    TopLeft: EdgeDirection.E3,
    Top: EdgeDirection.E4,
    TopRight: EdgeDirection.E5,
} as const;

/** Edge direction names for pointy-topped hexagons. */
export const PointyEdge = {
    Right: EdgeDirection.E0,
    BottomRight: EdgeDirection.E1,
    BottomLeft: EdgeDirection.E2,
    Left: EdgeDirection.E3,
    TopLeft: EdgeDirection.E4,
    TopRight: EdgeDirection.E5,
} as const;

/** Vertex direction names for flat-topped hexagons. */
export const FlatVertex = {
    Right: VertexDirection.V0,
    BottomRight: VertexDirection.V1,
    BottomLeft: VertexDirection.V2,
    Left: VertexDirection.V3,
    TopLeft: VertexDirection.V4,
    TopRight: VertexDirection.V5,
} as const;

/** Vertex direction names for pointy-topped hexagons. */
export const PointyVertex = {
    TopRight: VertexDirection.V0,
    BottomRight: VertexDirection.V1,
    Bottom: VertexDirection.V2,
    BottomLeft: VertexDirection.V3,
    TopLeft: VertexDirection.V4,
    Top: VertexDirection.V5,
} as const;

/** Normalizes any integer into 0..5. */
export function mod6(n: number): number {
    return ((n % 6) + 6) % 6;
}

function mod360(degrees: number): number {
    return ((degrees % 360) + 360) % 360;
}

function toDegrees(radians: number): number {
    return (radians * 180) / Math.PI;
}

export function edgeAt(index: number): EdgeDirection {
    return EDGE_DIRECTIONS[mod6(index)];
}

export function vertexAt(index: number): VertexDirection {
    return VERTEX_DIRECTIONS[mod6(index)];
}

export function edgeDelta(direction: EdgeDirection): HexCoord {
    return EDGE_DELTAS[direction];
}

export function vertexDelta(direction: VertexDirection): HexCoord {
    return VERTEX_DELTAS[direction];
}

// --- Rotation ---

export function rotateEdgeCw(direction: EdgeDirection, steps = 1): EdgeDirection {
    return edgeAt(direction + steps);
}

export function rotateEdgeCcw(direction: EdgeDirection, steps = 1): EdgeDirection {
    return edgeAt(direction - steps);
}

export function rotateVertexCw(direction: VertexDirection, steps = 1): VertexDirection {
    return vertexAt(direction + steps);
}

export function rotateVertexCcw(direction: VertexDirection, steps = 1): VertexDirection {
    return vertexAt(direction - steps);
}

export function oppositeEdge(direction: EdgeDirection): EdgeDirection {
    return edgeAt(direction + 3);
}

export function oppositeVertex(direction: VertexDirection): VertexDirection {
    return vertexAt(direction + 3);
}

/** Next edge direction counter-clockwise. */
export function edgeLeft(direction: EdgeDirection): EdgeDirection {
    return rotateEdgeCcw(direction);
}

/** Next edge direction clockwise. */
export function edgeRight(direction: EdgeDirection): EdgeDirection {
    return rotateEdgeCw(direction);
}

export function vertexLeft(direction: VertexDirection): VertexDirection {
    return rotateVertexCcw(direction);
}

export function vertexRight(direction: VertexDirection): VertexDirection {
    return rotateVertexCw(direction);
}

// --- Cross-family neighbors ---

/** The vertex direction on the counter-clockwise side of an edge direction. */
export function edgeDiagonalLeft(direction: EdgeDirection): VertexDirection {
    return vertexAt(direction);
}

/** The vertex direction on the clockwise side of an edge direction. */
export function edgeDiagonalRight(direction: EdgeDirection): VertexDirection {
    return vertexAt(direction + 1);
}

/** The edge direction on the counter-clockwise side of a vertex direction. */
export function vertexDirectionLeft(direction: VertexDirection): EdgeDirection {
    return edgeAt(direction - 1);
}

/** The edge direction on the clockwise side of a vertex direction. */
export function vertexDirectionRight(direction: VertexDirection): EdgeDirection {
    return edgeAt(direction);
}

/** Both edge directions flanking a vertex direction, counter-clockwise first. */
export function vertexEdgeDirections(direction: VertexDirection): [EdgeDirection, EdgeDirection] {
    return [vertexDirectionLeft(direction), vertexDirectionRight(direction)];
}

/** Both vertex directions flanking an edge direction, counter-clockwise first. */
export function edgeVertexDirections(direction: EdgeDirection): [VertexDirection, VertexDirection] {
    return [edgeDiagonalLeft(direction), edgeDiagonalRight(direction)];
}

// --- Angles ---
// Angles grow clockwise from the +x axis, in screen space (y pointing down).

export function edgeAnglePointyDegrees(direction: EdgeDirection): number {
    return direction * 60;
}

export function edgeAngleFlatDegrees(direction: EdgeDirection): number {
    return direction * 60 + 30;
}

export function edgeAnglePointy(direction: EdgeDirection): number {
    return direction * SECTOR_RADIANS;
}

export function edgeAngleFlat(direction: EdgeDirection): number {
    return direction * SECTOR_RADIANS + SECTOR_RADIANS / 2;
}

export function edgeAngleDegrees(direction: EdgeDirection, orientation: Orientation): number {
    return orientation === "pointy" ? edgeAnglePointyDegrees(direction) : edgeAngleFlatDegrees(direction);
}

export function edgeAngle(direction: EdgeDirection, orientation: Orientation): number {
    return orientation === "pointy" ? edgeAnglePointy(direction) : edgeAngleFlat(direction);
}

export function vertexAngleFlatDegrees(direction: VertexDirection): number {
    return direction * 60;
}

export function vertexAnglePointyDegrees(direction: VertexDirection): number {
    return mod360(direction * 60 - 30);
}

export function vertexAngleFlat(direction: VertexDirection): number {
    return direction * SECTOR_RADIANS;
}

export function vertexAnglePointy(direction: VertexDirection): number {
    return (vertexAnglePointyDegrees(direction) * Math.PI) / 180;
}

export function vertexAngleDegrees(direction: VertexDirection, orientation: Orientation): number {
    return orientation === "pointy" ? vertexAnglePointyDegrees(direction) : vertexAngleFlatDegrees(direction);
}

export function vertexAngle(direction: VertexDirection, orientation: Orientation): number {
    return orientation === "pointy" ? vertexAnglePointy(direction) : vertexAngleFlat(direction);
}

/** Clockwise angle in degrees needed to turn `to` into `from`. */
export function edgeAngleBetween(from: EdgeDirection, to: EdgeDirection): number {
    return mod6(from - to) * 60;
}

export function vertexAngleBetween(from: VertexDirection, to: VertexDirection): number {
    return mod6(from - to) * 60;
}

// --- Angle to direction ---

export function edgeFromFlatAngleDegrees(degrees: number): EdgeDirection {
    return edgeAt(Math.trunc(mod360(degrees) / 60));
}

export function edgeFromPointyAngleDegrees(degrees: number): EdgeDirection {
    return edgeFromFlatAngleDegrees(degrees + 30);
}

export function edgeFromFlatAngle(radians: number): EdgeDirection {
    return edgeFromFlatAngleDegrees(toDegrees(radians));
}

export function edgeFromPointyAngle(radians: number): EdgeDirection {
    return edgeFromPointyAngleDegrees(toDegrees(radians));
}

export function edgeFromAngleDegrees(degrees: number, orientation: Orientation): EdgeDirection {
    return orientation === "pointy" ? edgeFromPointyAngleDegrees(degrees) : edgeFromFlatAngleDegrees(degrees);
}

export function edgeFromAngle(radians: number, orientation: Orientation): EdgeDirection {
    return edgeFromAngleDegrees(toDegrees(radians), orientation);
}

export function vertexFromPointyAngleDegrees(degrees: number): VertexDirection {
    return vertexAt(Math.trunc(mod360(degrees) / 60) + 1);
}

export function vertexFromFlatAngleDegrees(degrees: number): VertexDirection {
    return vertexFromPointyAngleDegrees(degrees - 30);
}

export function vertexFromPointyAngle(radians: number): VertexDirection {
    return vertexFromPointyAngleDegrees(toDegrees(radians));
}

export function vertexFromFlatAngle(radians: number): VertexDirection {
    return vertexFromFlatAngleDegrees(toDegrees(radians));
}

export function vertexFromAngleDegrees(degrees: number, orientation: Orientation): VertexDirection {
    return orientation === "pointy" ? vertexFromPointyAngleDegrees(degrees) : vertexFromFlatAngleDegrees(degrees);
}

export function vertexFromAngle(radians: number, orientation: Orientation): VertexDirection {
    return vertexFromAngleDegrees(toDegrees(radians), orientation);
}

export type HexCoord = {
    q: number;
    r: number;
};

/** Cubic view of an axial coordinate: x = q, y = r, z = s = -q - r. */
export type CubeCoord = {
    x: number;
    y: number;
    z: number;
};

/** A non-integer axial position, produced by interpolation and pixel math. */
export type FractionalHex = {
    q: number;
    r: number;
};

/** Edge (side-adjacent) directions in clockwise order. */
export enum EdgeDirection {
    E0 = 0,
    E1 = 1,
    E2 = 2,
    E3 = 3,
    E4 = 4,
    E5 = 5,
}

/** Vertex (diagonal) directions in clockwise order. */
export enum VertexDirection {
    V0 = 0,
    V1 = 1,
    V2 = 2,
    V3 = 3,
    V4 = 4,
    V5 = 5,
}

export type Direction = EdgeDirection | VertexDirection;

/**
 * Result of a direction query. A tie holds the two adjacent directions, counter-clockwise
 * member first, when the target lies exactly on the boundary between them. `main` is the
 * member along the dominant axis of the delta.
 */
export type DirectionWay<D extends Direction> =
    | { kind: "single"; direction: D }
    | { kind: "tie"; directions: [D, D]; main: D };

/** A corner of a hex: the hex it belongs to and the vertex direction it lies toward. */
export type GridVertex = {
    origin: HexCoord;
    direction: VertexDirection;
};

/** A side of a hex: the hex it belongs to and the edge direction it faces. */
export type GridEdge = {
    origin: HexCoord;
    direction: EdgeDirection;
};

export type Orientation = "pointy" | "flat";

export type OrientationData = {
    /** Row-major 2x2 matrix mapping axial to pixel units. */
    forward: readonly [number, number, number, number];
    /** Inverse of `forward`. */
    inverse: readonly [number, number, number, number];
    /** Angle of the first vertex, in multiples of 60 degrees. */
    startRotation: number;
};

export enum OffsetMode {
    EvenColumns = "EvenColumns",
    OddColumns = "OddColumns",
    EvenRows = "EvenRows",
    OddRows = "OddRows",
}

export enum DoubledMode {
    DoubledWidth = "DoubledWidth",
    DoubledHeight = "DoubledHeight",
}

/** Inclusive radius span used by spirals and wedges. */
export type RadiusRange = {
    start: number;
    end: number;
};

export type Bounds = {
    center: HexCoord;
    radius: number;
};

/** Edge cost between two adjacent cells; `null` marks the step as impassable. */
export type EdgeCostFn = (from: HexCoord, to: HexCoord) => number | null;

/** Cost of entering a cell; `null` marks the cell as impassable. */
export type CellCostFn = (coord: HexCoord) => number | null;

export type BlockingFn = (coord: HexCoord) => boolean;

export type PathFailureReason = "unreachable" | "expansion-limit" | "impassable-goal";

export type PathResult =
    | { found: true; path: HexCoord[]; cost: number; expansions: number }
    | { found: false; reason: PathFailureReason; expansions: number };

export type FindPathOptions = {
    passable?: (coord: HexCoord) => boolean;
    maxExpansions?: number;
};

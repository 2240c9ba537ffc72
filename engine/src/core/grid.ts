import type { GridEdge, GridVertex, HexCoord } from "./types.js";
import {
    EDGE_DIRECTIONS,
    VERTEX_DIRECTIONS,
    edgeDiagonalLeft,
    edgeDiagonalRight,
    oppositeEdge,
    oppositeVertex,
    rotateEdgeCcw,
    rotateEdgeCw,
    rotateVertexCcw,
    rotateVertexCw,
    vertexDirectionLeft,
    vertexDirectionRight,
} from "./directions.js";
import { hexEquals, hexNeighbor } from "./hex.js";

// --- Vertices ---

function sameVertex(a: GridVertex, b: GridVertex): boolean {
    return a.direction === b.direction && hexEquals(a.origin, b.origin);
}

/**
 * Whether two vertices are the same grid corner. A corner is shared by three
 * hexes, so it has three representations.
 */
export function vertexEquivalent(a: GridVertex, b: GridVertex): boolean {
    // The same corner seen from the hexes on either side of the direction
    const fromCw: GridVertex = {
        origin: hexNeighbor(a.origin, vertexDirectionRight(a.direction)),
        direction: rotateVertexCcw(a.direction, 2),
    };
    const fromCcw: GridVertex = {
        origin: hexNeighbor(a.origin, vertexDirectionLeft(a.direction)),
        direction: rotateVertexCw(a.direction, 2),
    };
    return sameVertex(a, b) || sameVertex(fromCw, b) || sameVertex(fromCcw, b);
}

/** The three hexes meeting at the corner, clockwise from the origin. */
export function vertexCoordinates(vertex: GridVertex): [HexCoord, HexCoord, HexCoord] {
    const [ccw, cw] = vertexDestinations(vertex);
    return [vertex.origin, ccw, cw];
}

/** The two neighbors of the origin sharing the corner, counter-clockwise first. */
export function vertexDestinations(vertex: GridVertex): [HexCoord, HexCoord] {
    return [
        hexNeighbor(vertex.origin, vertexDirectionLeft(vertex.direction)),
        hexNeighbor(vertex.origin, vertexDirectionRight(vertex.direction)),
    ];
}

/** The two sides of the origin hex ending at the corner, counter-clockwise first. */
export function vertexSideEdges(vertex: GridVertex): [GridEdge, GridEdge] {
    return [
        { origin: vertex.origin, direction: vertexDirectionLeft(vertex.direction) },
        { origin: vertex.origin, direction: vertexDirectionRight(vertex.direction) },
    ];
}

export function negateVertex(vertex: GridVertex): GridVertex {
    return { origin: vertex.origin, direction: oppositeVertex(vertex.direction) };
}

export function rotateGridVertexCw(vertex: GridVertex, steps = 1): GridVertex {
    return { origin: vertex.origin, direction: rotateVertexCw(vertex.direction, steps) };
}

export function rotateGridVertexCcw(vertex: GridVertex, steps = 1): GridVertex {
    return { origin: vertex.origin, direction: rotateVertexCcw(vertex.direction, steps) };
}

/** The six corners of a hex, V0 first. */
export function allVertices(origin: HexCoord): GridVertex[] {
    return VERTEX_DIRECTIONS.map((direction) => ({ origin, direction }));
}

// --- Edges ---

/** The hex on the other side of the edge. */
export function edgeDestination(edge: GridEdge): HexCoord {
    return hexNeighbor(edge.origin, edge.direction);
}

/** The two corners bounding the edge, counter-clockwise first. */
export function edgeVertices(edge: GridEdge): [GridVertex, GridVertex] {
    return [
        { origin: edge.origin, direction: edgeDiagonalLeft(edge.direction) },
        { origin: edge.origin, direction: edgeDiagonalRight(edge.direction) },
    ];
}

/** The same side seen from the destination hex. */
export function flipEdge(edge: GridEdge): GridEdge {
    return { origin: edgeDestination(edge), direction: oppositeEdge(edge.direction) };
}

/** Whether two edges are the same grid side, from either hex. */
export function edgeEquivalent(a: GridEdge, b: GridEdge): boolean {
    if (a.direction === b.direction && hexEquals(a.origin, b.origin)) return true;
    const flipped = flipEdge(b);
    return a.direction === flipped.direction && hexEquals(a.origin, flipped.origin);
}

export function negateEdge(edge: GridEdge): GridEdge {
    return { origin: edge.origin, direction: oppositeEdge(edge.direction) };
}

export function rotateGridEdgeCw(edge: GridEdge, steps = 1): GridEdge {
    return { origin: edge.origin, direction: rotateEdgeCw(edge.direction, steps) };
}

export function rotateGridEdgeCcw(edge: GridEdge, steps = 1): GridEdge {
    return { origin: edge.origin, direction: rotateEdgeCcw(edge.direction, steps) };
}

/** The six sides of a hex, E0 first. */
export function allEdges(origin: HexCoord): GridEdge[] {
    return EDGE_DIRECTIONS.map((direction) => ({ origin, direction }));
}

import { describe, expect, it } from "vitest";
import { EdgeDirection, VertexDirection } from "./types.js";
import {
    EDGE_DIRECTIONS,
    FlatEdge,
    PointyEdge,
    PointyVertex,
    VERTEX_DIRECTIONS,
    edgeAngle,
    edgeAngleBetween,
    edgeAngleFlatDegrees,
    edgeAnglePointy,
    edgeAnglePointyDegrees,
    edgeDelta,
    edgeDiagonalLeft,
    edgeDiagonalRight,
    edgeFromAngleDegrees,
    edgeFromFlatAngleDegrees,
    edgeFromPointyAngle,
    edgeFromPointyAngleDegrees,
    edgeLeft,
    edgeRight,
    oppositeEdge,
    oppositeVertex,
    rotateEdgeCcw,
    rotateEdgeCw,
    rotateVertexCw,
    vertexAngleFlatDegrees,
    vertexAnglePointyDegrees,
    vertexAt,
    vertexDelta,
    vertexDirectionLeft,
    vertexDirectionRight,
    vertexFromAngleDegrees,
    vertexFromFlatAngleDegrees,
    vertexFromPointyAngleDegrees,
} from "./directions.js";
import { addHex } from "./hex.js";

describe("direction rotation", () => {
    it("wraps around modulo six", () => {
        expect(rotateEdgeCw(EdgeDirection.E5)).toBe(EdgeDirection.E0);
        expect(rotateEdgeCcw(EdgeDirection.E0, 2)).toBe(EdgeDirection.E4);
        expect(rotateEdgeCw(EdgeDirection.E1, -7)).toBe(EdgeDirection.E0);
        expect(rotateVertexCw(VertexDirection.V4, 14)).toBe(VertexDirection.V0);
    });

    it("finds opposites three steps away", () => {
        expect(oppositeEdge(EdgeDirection.E1)).toBe(EdgeDirection.E4);
        expect(oppositeVertex(VertexDirection.V5)).toBe(VertexDirection.V2);
    });

    it("turns left counter-clockwise and right clockwise", () => {
        expect(edgeLeft(EdgeDirection.E0)).toBe(EdgeDirection.E5);
        expect(edgeRight(EdgeDirection.E0)).toBe(EdgeDirection.E1);
    });
});

describe("direction deltas", () => {
    it("places each vertex direction between its two edge directions", () => {
        for (const e of EDGE_DIRECTIONS) {
            const next = rotateEdgeCw(e);
            expect(addHex(edgeDelta(e), edgeDelta(next))).toEqual(vertexDelta(vertexAt(e + 1)));
        }
    });

    it("names directions per orientation", () => {
        expect(FlatEdge.Top).toBe(EdgeDirection.E4);
        expect(PointyEdge.Right).toBe(EdgeDirection.E0);
        expect(PointyVertex.Top).toBe(VertexDirection.V5);
        expect(edgeDelta(PointyEdge.Right)).toEqual({ q: 1, r: 0 });
    });
});

describe("cross-family neighbors", () => {
    it("interleaves edge and vertex directions", () => {
        expect(edgeDiagonalLeft(EdgeDirection.E0)).toBe(VertexDirection.V0);
        expect(edgeDiagonalRight(EdgeDirection.E0)).toBe(VertexDirection.V1);
        expect(vertexDirectionLeft(VertexDirection.V0)).toBe(EdgeDirection.E5);
        expect(vertexDirectionRight(VertexDirection.V0)).toBe(EdgeDirection.E0);
    });
});

describe("angles", () => {
    it("offsets flat edge angles by half a sector", () => {
        expect(edgeAnglePointyDegrees(EdgeDirection.E2)).toBe(120);
        expect(edgeAngleFlatDegrees(EdgeDirection.E2)).toBe(150);
        expect(edgeAngle(EdgeDirection.E1, "flat")).toBeCloseTo(Math.PI / 2);
    });

    it("offsets pointy vertex angles back by half a sector", () => {
        expect(vertexAnglePointyDegrees(VertexDirection.V0)).toBe(330);
        expect(vertexAnglePointyDegrees(VertexDirection.V1)).toBe(30);
        expect(vertexAngleFlatDegrees(VertexDirection.V3)).toBe(180);
    });

    it("measures the clockwise angle between directions", () => {
        expect(edgeAngleBetween(EdgeDirection.E2, EdgeDirection.E0)).toBe(120);
        expect(edgeAngleBetween(EdgeDirection.E0, EdgeDirection.E2)).toBe(240);
    });

    it("buckets arbitrary angles into sectors", () => {
        expect(edgeFromPointyAngleDegrees(-20)).toBe(EdgeDirection.E0);
        expect(edgeFromPointyAngleDegrees(29)).toBe(EdgeDirection.E0);
        expect(edgeFromPointyAngleDegrees(31)).toBe(EdgeDirection.E1);
        expect(edgeFromFlatAngleDegrees(725)).toBe(EdgeDirection.E0);
        expect(vertexFromPointyAngleDegrees(310)).toBe(VertexDirection.V0);
        expect(vertexFromFlatAngleDegrees(-25)).toBe(VertexDirection.V0);
    });

    it("maps every direction's own angle back to it", () => {
        for (const e of EDGE_DIRECTIONS) {
            expect(edgeFromAngleDegrees(edgeAnglePointyDegrees(e), "pointy")).toBe(e);
            expect(edgeFromAngleDegrees(edgeAngleFlatDegrees(e), "flat")).toBe(e);
            expect(edgeFromPointyAngle(edgeAnglePointy(e))).toBe(e);
        }
        for (const v of VERTEX_DIRECTIONS) {
            expect(vertexFromAngleDegrees(vertexAnglePointyDegrees(v), "pointy")).toBe(v);
            expect(vertexFromAngleDegrees(vertexAngleFlatDegrees(v), "flat")).toBe(v);
        }
    });
});

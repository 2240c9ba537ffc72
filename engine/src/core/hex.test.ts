import { describe, expect, it } from "vitest";
import { EdgeDirection, VertexDirection } from "./types.js";
import { EDGE_DIRECTIONS } from "./directions.js";
import { wayMatches } from "./direction-way.js";
import {
    HEX_ZERO,
    addHex,
    averageHex,
    diagonalNeighbor,
    diagonalWayTo,
    directionTo,
    divideHex,
    euclideanDistance,
    getNeighbors,
    hex,
    hexDistance,
    hexEquals,
    hexLength,
    hexNeighbor,
    hexS,
    hexToString,
    lerpHex,
    mainDiagonalTo,
    mainDirectionTo,
    maxHex,
    minHex,
    reflectQ,
    reflectR,
    reflectS,
    remHex,
    rotateAround,
    rotateCcw,
    rotateCw,
    roundHex,
    signumHex,
    stringToHex,
    subtractHex,
    wayTo,
} from "./hex.js";

const SAMPLE = [hex(0, 0), hex(3, -1), hex(-2, 5), hex(7, 7), hex(-4, -4), hex(1, -6)];

describe("hex arithmetic", () => {
    it("adds and subtracts component-wise", () => {
        expect(addHex(hex(1, -2), hex(3, 4))).toEqual(hex(4, 2));
        expect(subtractHex(hex(1, -2), hex(3, 4))).toEqual(hex(-2, -6));
    });

    it("never produces negative zero", () => {
        const folded = subtractHex(hex(0, 0), hex(0, 0));
        expect(Object.is(folded.q, 0)).toBe(true);
        expect(Object.is(hexS(HEX_ZERO), 0)).toBe(true);
        expect(Object.is(roundHex({ q: -0.2, r: 0.1 }).q, 0)).toBe(true);
    });

    it("divides and takes remainders with truncation", () => {
        expect(divideHex(hex(7, -7), 2)).toEqual(hex(3, -3));
        expect(remHex(hex(7, -7), 3)).toEqual(hex(1, -1));
        expect(() => divideHex(hex(1, 1), 0)).toThrow(RangeError);
    });

    it("computes signum, min and max", () => {
        expect(signumHex(hex(-4, 0))).toEqual(hex(-1, 0));
        expect(minHex(hex(1, 5), hex(3, -2))).toEqual(hex(1, -2));
        expect(maxHex(hex(1, 5), hex(3, -2))).toEqual(hex(3, 5));
    });
});

describe("distance", () => {
    it("is symmetric and zero on identical coordinates", () => {
        for (const a of SAMPLE) {
            expect(hexDistance(a, a)).toBe(0);
            for (const b of SAMPLE) {
                expect(hexDistance(a, b)).toBe(hexDistance(b, a));
            }
        }
    });

    it("matches the largest cubic component", () => {
        expect(hexLength(hex(2, -5))).toBe(5);
        expect(hexDistance(HEX_ZERO, hex(3, -3))).toBe(3);
        expect(hexDistance(hex(-2, 5), hex(1, -6))).toBe(11);
    });

    it("stays exact at the ends of the 32-bit range", () => {
        expect(hexDistance(hex(-(2 ** 31), 0), hex(2 ** 31 - 1, 0))).toBe(2 ** 32 - 1);
    });

    it("puts every neighbor at distance 1", () => {
        for (const a of SAMPLE) {
            for (const d of EDGE_DIRECTIONS) {
                expect(hexDistance(a, hexNeighbor(a, d))).toBe(1);
            }
        }
    });

    it("places diagonal neighbors two steps away", () => {
        expect(diagonalNeighbor(hex(1, 1), VertexDirection.V0)).toEqual(hex(3, 0));
        expect(hexDistance(hex(1, 1), diagonalNeighbor(hex(1, 1), VertexDirection.V3))).toBe(2);
    });

    it("measures euclidean distance in hex widths for both orientations", () => {
        expect(euclideanDistance(HEX_ZERO, hex(1, 0))).toBeCloseTo(1);
        expect(euclideanDistance(HEX_ZERO, hex(2, -1))).toBeCloseTo(Math.sqrt(3));
        expect(euclideanDistance(HEX_ZERO, hex(2, -1), "flat")).toBeCloseTo(Math.sqrt(3));
    });
});

describe("neighbors", () => {
    it("lists neighbors in clockwise direction order", () => {
        expect(getNeighbors(hex(2, 2))).toEqual([hex(3, 2), hex(2, 3), hex(1, 3), hex(1, 2), hex(2, 1), hex(3, 1)]);
    });

    it("finds the direction between adjacent hexes only", () => {
        expect(directionTo(hex(1, 1), hex(1, 2))).toBe(EdgeDirection.E1);
        expect(directionTo(HEX_ZERO, hex(2, 0))).toBeNull();
    });
});

describe("rotation", () => {
    it("rotates one step clockwise and counter-clockwise", () => {
        expect(rotateCw(hex(1, 0))).toEqual(hex(0, 1));
        expect(rotateCw(hex(2, -1))).toEqual(hex(1, 1));
        expect(rotateCcw(hex(1, 0))).toEqual(hex(1, -1));
        expect(rotateCw(hex(2, -1), 3)).toEqual(hex(-2, 1));
    });

    it("undoes a counter-clockwise rotation for any step count", () => {
        for (const a of SAMPLE) {
            for (let k = -7; k <= 13; k++) {
                expect(rotateCw(rotateCcw(a, k), k)).toEqual(a);
            }
        }
    });

    it("returns to the start after six steps", () => {
        for (const a of SAMPLE) {
            expect(rotateCw(a, 6)).toEqual(a);
            expect(rotateCw(a, -1)).toEqual(rotateCcw(a, 1));
        }
    });

    it("rotates around an arbitrary center", () => {
        expect(rotateAround(hex(3, 0), hex(2, 0), 1)).toEqual(hex(2, 1));
    });

    it("reflects across each axis", () => {
        expect(reflectQ(hex(3, -1))).toEqual(hex(3, -2));
        expect(reflectR(hex(3, -1))).toEqual(hex(-2, -1));
        expect(reflectS(hex(3, -1))).toEqual(hex(-1, 3));
        expect(reflectQ(reflectQ(hex(3, -1)))).toEqual(hex(3, -1));
    });
});

describe("rounding", () => {
    it("keeps integer positions", () => {
        expect(roundHex({ q: 2, r: -1 })).toEqual(hex(2, -1));
    });

    it("recomputes the component with the largest error", () => {
        // x = 0.4, y = 0.3, z = -0.7: x has the largest error and is rebuilt
        expect(roundHex({ q: 0.4, r: 0.3 })).toEqual(hex(1, 0));
        // x = 0.3, y = 0.45, z = -0.75: y has the largest error
        expect(roundHex({ q: 0.3, r: 0.45 })).toEqual(hex(0, 1));
    });

    it("interpolates linearly", () => {
        expect(lerpHex(HEX_ZERO, hex(4, -2), 0.5)).toEqual({ q: 2, r: -1 });
    });
});

describe("keys", () => {
    it("round-trips through string keys", () => {
        expect(hexToString(hex(3, -4))).toBe("3,-4");
        expect(stringToHex("3,-4")).toEqual(hex(3, -4));
        expect(hexEquals(stringToHex(hexToString(hex(-9, 12))), hex(-9, 12))).toBe(true);
    });

    it("rejects malformed keys", () => {
        expect(() => stringToHex("a,b")).toThrow('Invalid hex key "a,b"');
        expect(() => stringToHex("1,2,3")).toThrow(Error);
    });
});

describe("wayTo", () => {
    it("returns a single direction off the boundaries", () => {
        expect(wayTo(HEX_ZERO, hex(3, -1))).toEqual({ kind: "single", direction: EdgeDirection.E0 });
        expect(wayTo(HEX_ZERO, hex(0, -2))).toEqual({ kind: "single", direction: EdgeDirection.E4 });
    });

    it("reports a tie exactly between two edge directions", () => {
        expect(wayTo(HEX_ZERO, hex(2, -1))).toEqual({ kind: "tie", directions: [EdgeDirection.E5, EdgeDirection.E0], main: EdgeDirection.E5 });
        expect(wayTo(HEX_ZERO, hex(1, 1))).toEqual({ kind: "tie", directions: [EdgeDirection.E0, EdgeDirection.E1], main: EdgeDirection.E1 });
        expect(wayTo(HEX_ZERO, hex(-1, 2))).toEqual({ kind: "tie", directions: [EdgeDirection.E1, EdgeDirection.E2], main: EdgeDirection.E2 });
    });

    it("matches both members of a tie and nothing else", () => {
        const way = wayTo(HEX_ZERO, hex(1, 1));
        expect(wayMatches(way, EdgeDirection.E0)).toBe(true);
        expect(wayMatches(way, EdgeDirection.E1)).toBe(true);
        expect(wayMatches(way, EdgeDirection.E2)).toBe(false);
    });

    it("matches a single way only against its direction", () => {
        const way = wayTo(hex(5, 5), hex(8, 4));
        expect(wayMatches(way, EdgeDirection.E0)).toBe(true);
        expect(wayMatches(way, EdgeDirection.E5)).toBe(false);
    });

    it("points each neighbor toward its own direction", () => {
        for (const d of EDGE_DIRECTIONS) {
            expect(wayTo(HEX_ZERO, hexNeighbor(HEX_ZERO, d))).toEqual({ kind: "single", direction: d });
        }
    });

    it("reports a fixed tie between identical hexes", () => {
        expect(wayTo(hex(4, 4), hex(4, 4))).toEqual({ kind: "tie", directions: [EdgeDirection.E1, EdgeDirection.E2], main: EdgeDirection.E2 });
        expect(diagonalWayTo(hex(4, 4), hex(4, 4))).toEqual({ kind: "tie", directions: [VertexDirection.V5, VertexDirection.V0], main: VertexDirection.V0 });
    });

    it("resolves the main direction of a tie to the dominant axis", () => {
        expect(mainDirectionTo(HEX_ZERO, hex(1, 1))).toBe(EdgeDirection.E1);
        expect(mainDirectionTo(HEX_ZERO, hex(2, -1))).toBe(EdgeDirection.E5);
        expect(mainDirectionTo(HEX_ZERO, hex(-1, 2))).toBe(EdgeDirection.E2);
        expect(mainDirectionTo(HEX_ZERO, hex(-3, 1))).toBe(EdgeDirection.E3);
    });
});

describe("diagonalWayTo", () => {
    it("returns a single vertex direction inside a diagonal wedge", () => {
        expect(diagonalWayTo(HEX_ZERO, hex(2, -1))).toEqual({ kind: "single", direction: VertexDirection.V0 });
        expect(diagonalWayTo(HEX_ZERO, hex(-3, 1))).toEqual({ kind: "single", direction: VertexDirection.V3 });
    });

    it("ties along edge directions", () => {
        expect(diagonalWayTo(HEX_ZERO, hex(1, 0))).toEqual({ kind: "tie", directions: [VertexDirection.V0, VertexDirection.V1], main: VertexDirection.V0 });
        expect(diagonalWayTo(HEX_ZERO, hex(0, 1))).toEqual({ kind: "tie", directions: [VertexDirection.V1, VertexDirection.V2], main: VertexDirection.V2 });
        expect(mainDiagonalTo(HEX_ZERO, hex(1, 0))).toBe(VertexDirection.V0);
        expect(mainDiagonalTo(HEX_ZERO, hex(0, 1))).toBe(VertexDirection.V2);
    });
});

describe("averageHex", () => {
    it("rounds the centroid", () => {
        expect(averageHex([hex(0, 0), hex(2, 0), hex(1, 3)])).toEqual(hex(1, 1));
    });

    it("returns the origin for no input", () => {
        expect(averageHex([])).toEqual(HEX_ZERO);
    });
});

describe("HEX_ZERO", () => {
    it("is frozen", () => {
        expect(Object.isFrozen(HEX_ZERO)).toBe(true);
        expect(HEX_ZERO).toEqual(hex(0, 0));
    });
});

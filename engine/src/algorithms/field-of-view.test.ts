import { describe, expect, it } from "vitest";
import { EdgeDirection } from "../core/types.js";
import { hex, hexEquals } from "../core/hex.js";
import { directionalFov, hasClearLineOfSight, rangeFov } from "./field-of-view.js";

const nothingBlocks = () => false;

describe("hasClearLineOfSight", () => {
    it("ignores both endpoints", () => {
        expect(hasClearLineOfSight(hex(0, 0), hex(1, 0), () => true)).toBe(true);
    });

    it("is stopped by a hex in between", () => {
        expect(hasClearLineOfSight(hex(0, 0), hex(2, 0), (c) => hexEquals(c, hex(1, 0)))).toBe(false);
        expect(hasClearLineOfSight(hex(0, 0), hex(0, 2), (c) => hexEquals(c, hex(1, 0)))).toBe(true);
    });
});

describe("rangeFov", () => {
    it("sees the whole range on open ground", () => {
        expect(rangeFov(hex(3, 3), 2, nothingBlocks).size).toBe(19);
    });

    it("shows a blocker but hides what lies behind it", () => {
        const visible = rangeFov(hex(0, 0), 2, (c) => hexEquals(c, hex(1, 0)));
        expect(visible.size).toBe(16);
        expect(visible.has("0,0")).toBe(true);
        expect(visible.has("1,0")).toBe(true);
        expect(visible.has("2,0")).toBe(false);
        expect(visible.has("2,-1")).toBe(false);
        expect(visible.has("1,1")).toBe(false);
        expect(visible.has("0,2")).toBe(true);
    });

    it("always includes the origin", () => {
        expect([...rangeFov(hex(-4, 1), 0, () => true)]).toEqual(["-4,1"]);
    });
});

describe("directionalFov", () => {
    it("keeps the 120 degree cone around the facing", () => {
        const visible = directionalFov(hex(0, 0), 1, EdgeDirection.E0, nothingBlocks);
        expect([...visible].sort()).toEqual(["0,0", "0,1", "1,-1", "1,0"]);
    });

    it("still respects blockers", () => {
        const visible = directionalFov(hex(0, 0), 2, EdgeDirection.E0, (c) => hexEquals(c, hex(1, 0)));
        expect(visible.has("1,0")).toBe(true);
        expect(visible.has("2,0")).toBe(false);
        expect(visible.has("-1,0")).toBe(false);
    });
});

import { describe, expect, it } from "vitest";
import { HexSequence } from "./sequence.js";
import { hex } from "./hex.js";

describe("HexSequence", () => {
    it("knows its length before iterating", () => {
        let generated = 0;
        const seq = new HexSequence(3, function* () {
            for (let i = 0; i < 3; i++) {
                generated++;
                yield hex(i, 0);
            }
        });
        expect(seq.length).toBe(3);
        expect(generated).toBe(0);
    });

    it("restarts on every iteration", () => {
        const seq = HexSequence.of([hex(1, 1), hex(2, 2)]);
        expect([...seq]).toEqual([hex(1, 1), hex(2, 2)]);
        expect(seq.toArray()).toEqual([hex(1, 1), hex(2, 2)]);
    });

    it("concatenates and maps lazily", () => {
        const joined = HexSequence.concat([HexSequence.of([hex(0, 0)]), HexSequence.empty(), HexSequence.of([hex(1, 0)])]);
        expect(joined.length).toBe(2);
        expect(joined.map((c, i) => hex(c.q, i)).toArray()).toEqual([hex(0, 0), hex(1, 1)]);
    });
});

import type { HexCoord } from "./types.js";

/**
 * A finite, restartable sequence of coordinates whose length is known up front.
 * Every enumeration in the library returns one of these; elements are generated
 * lazily on each iteration.
 */
export class HexSequence implements Iterable<HexCoord> {
    readonly length: number;
    private readonly generate: () => Iterator<HexCoord>;

    constructor(length: number, generate: () => Iterator<HexCoord>) {
        this.length = length;
        this.generate = generate;
    }

    static of(coords: readonly HexCoord[]): HexSequence {
        return new HexSequence(coords.length, () => coords[Symbol.iterator]());
    }

    static empty(): HexSequence {
        return HexSequence.of([]);
    }

    /** Concatenates sequences, summing their lengths. */
    static concat(parts: readonly HexSequence[]): HexSequence {
        const length = parts.reduce((sum, p) => sum + p.length, 0);
        return new HexSequence(length, function* () {
            for (const part of parts) {
                yield* part;
            }
        });
    }

    [Symbol.iterator](): Iterator<HexCoord> {
        return this.generate();
    }

    toArray(): HexCoord[] {
        const out = new Array<HexCoord>(this.length);
        let i = 0;
        for (const c of this) {
            out[i++] = c;
        }
        out.length = i;
        return out;
    }

    /** Lazily maps each element; the length is preserved. */
    map(fn: (coord: HexCoord, index: number) => HexCoord): HexSequence {
        const source = this;
        return new HexSequence(this.length, function* () {
            let i = 0;
            for (const c of source) {
                yield fn(c, i++);
            }
        });
    }
}

import { type HexCoord, VertexDirection } from "../core/types.js";
import { addHex, HEX_ZERO } from "../core/hex.js";
import { HexSequence } from "../core/sequence.js";
import { assertRadius } from "../core/validation.js";
import { hexRing, ringEdges } from "./rings.js";

function translate(offsets: readonly HexCoord[], center: HexCoord): HexSequence {
    return HexSequence.of(offsets).map((offset) => addHex(center, offset));
}

function freezeOffsets(side: HexSequence): readonly HexCoord[] {
    return Object.freeze(side.toArray().map((offset) => Object.freeze(offset)));
}

/**
 * Ring offsets relative to the origin, keyed by radius.
 * Fill lazily through `ring`, or up front with `precompute`; reuse across centers.
 */
export class RingCache {
    private readonly offsets = new Map<number, readonly HexCoord[]>();

    get size(): number {
        return this.offsets.size;
    }

    has(radius: number): boolean {
        return this.offsets.has(radius);
    }

    /** Relative offsets of the ring, clockwise, computed on first use. */
    offsetsFor(radius: number): readonly HexCoord[] {
        assertRadius(radius);
        let cached = this.offsets.get(radius);
        if (!cached) {
            cached = freezeOffsets(hexRing(HEX_ZERO, radius));
            this.offsets.set(radius, cached);
        }
        return cached;
    }

    ring(center: HexCoord, radius: number): HexSequence {
        return translate(this.offsetsFor(radius), center);
    }

    /** Computes every radius 0..maxRadius. */
    precompute(maxRadius: number): void {
        assertRadius(maxRadius, "maxRadius");
        for (let r = 0; r <= maxRadius; r++) {
            this.offsetsFor(r);
        }
    }

    clear(): void {
        this.offsets.clear();
    }
}

/**
 * Ring side offsets keyed by radius; each entry holds the six sides indexed by
 * the vertex direction they face.
 */
export class RingEdgeCache {
    private readonly sides = new Map<number, readonly (readonly HexCoord[])[]>();

    get size(): number {
        return this.sides.size;
    }

    has(radius: number): boolean {
        return this.sides.has(radius);
    }

    private sidesFor(radius: number): readonly (readonly HexCoord[])[] {
        assertRadius(radius);
        let cached = this.sides.get(radius);
        if (!cached) {
            // ringEdges starts at V1; rotate so index i is the side facing V(i)
            const computed = ringEdges(HEX_ZERO, radius).map(freezeOffsets);
            const last = computed.pop();
            cached = Object.freeze(last ? [last, ...computed] : computed);
            this.sides.set(radius, cached);
        }
        return cached;
    }

    offsetsFor(radius: number, direction: VertexDirection): readonly HexCoord[] {
        return this.sidesFor(radius)[direction];
    }

    edge(center: HexCoord, radius: number, direction: VertexDirection): HexSequence {
        return translate(this.offsetsFor(radius, direction), center);
    }

    /** All six sides in the same order as `ringEdges`. */
    edges(center: HexCoord, radius: number): HexSequence[] {
        const sides = this.sidesFor(radius);
        const ordered: HexSequence[] = [];
        for (let i = 1; i <= 6; i++) {
            ordered.push(translate(sides[i % 6], center));
        }
        return ordered;
    }

    precompute(maxRadius: number): void {
        assertRadius(maxRadius, "maxRadius");
        for (let r = 0; r <= maxRadius; r++) {
            this.sidesFor(r);
        }
    }

    clear(): void {
        this.sides.clear();
    }
}

import type { HexCoord } from "../core/types.js";
import { hex } from "../core/hex.js";
import { HexSequence } from "../core/sequence.js";
import { assertRadius } from "../core/validation.js";
import { hexRange } from "./range.js";
import { wedgeCount } from "./wedges.js";

/** [left, right, top, bottom], all inclusive. */
export type RectangleBounds = readonly [number, number, number, number];

function span(min: number, max: number): number {
    return Math.max(0, max - min + 1);
}

/**
 * All hexes with min.q <= q <= max.q and min.r <= r <= max.r, q-major.
 */
export function parallelogram(min: HexCoord, max: HexCoord): HexSequence {
    return new HexSequence(span(min.q, max.q) * span(min.r, max.r), function* () {
        for (let q = min.q; q <= max.q; q++) {
            for (let r = min.r; r <= max.r; r++) {
                yield hex(q, r);
            }
        }
    });
}

/** Triangle with its right angle at the origin and `size + 1` hexes per side. */
export function triangle(size: number): HexSequence {
    assertRadius(size, "size");
    return new HexSequence(wedgeCount(size), function* () {
        for (let q = 0; q <= size; q++) {
            for (let r = 0; r <= size - q; r++) {
                yield hex(q, r);
            }
        }
    });
}

export function hexagon(center: HexCoord, radius: number): HexSequence {
    return hexRange(center, radius);
}

/** `rows` rows of `columns` hexes each, starting at `origin`, row-major. */
export function rhombus(origin: HexCoord, rows: number, columns: number): HexSequence {
    assertRadius(rows, "rows");
    assertRadius(columns, "columns");
    return new HexSequence(rows * columns, function* () {
        for (let r = 0; r < rows; r++) {
            for (let q = 0; q < columns; q++) {
                yield hex(origin.q + q, origin.r + r);
            }
        }
    });
}

/**
 * Rectangle of pointy-topped hexes. Each row is shifted back by half its row
 * index (arithmetic shift) so the columns line up on screen.
 */
export function pointyRectangle([left, right, top, bottom]: RectangleBounds): HexSequence {
    return new HexSequence(span(left, right) * span(top, bottom), function* () {
        for (let r = top; r <= bottom; r++) {
            const offset = r >> 1;
            for (let q = left - offset; q <= right - offset; q++) {
                yield hex(q, r);
            }
        }
    });
}

/** Rectangle of flat-topped hexes, column by column. */
export function flatRectangle([left, right, top, bottom]: RectangleBounds): HexSequence {
    return new HexSequence(span(left, right) * span(top, bottom), function* () {
        for (let q = left; q <= right; q++) {
            const offset = q >> 1;
            for (let r = top - offset; r <= bottom - offset; r++) {
                yield hex(q, r);
            }
        }
    });
}

import type { HexCoord } from "./types.js";
import { hex, hexS } from "./hex.js";

const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;

function assertInt32(value: number, label: string): void {
    if (!Number.isInteger(value) || value < INT32_MIN || value > INT32_MAX) {
        throw new RangeError(`${label} component ${value} does not fit in a signed 32-bit integer`);
    }
}

/**
 * Packs a coordinate into one 64-bit value: q in the high 32 bits, r in the low 32 bits,
 * both two's complement.
 */
export function packHex(h: HexCoord): bigint {
    assertInt32(h.q, "q");
    assertInt32(h.r, "r");
    return (BigInt.asUintN(32, BigInt(h.q)) << 32n) | BigInt.asUintN(32, BigInt(h.r));
}

export function unpackHex(value: bigint): HexCoord {
    const bits = BigInt.asUintN(64, value);
    return hex(Number(BigInt.asIntN(32, bits >> 32n)), Number(BigInt.asIntN(32, bits)));
}

/**
 * Writes coordinates as consecutive int32 values with no padding:
 * `q, r` per coordinate, or `q, r, s` when `withS` is set.
 */
export function toInt32Array(coords: readonly HexCoord[], withS = false): Int32Array {
    const stride = withS ? 3 : 2;
    const out = new Int32Array(coords.length * stride);
    coords.forEach((c, i) => {
        assertInt32(c.q, "q");
        assertInt32(c.r, "r");
        out[i * stride] = c.q;
        out[i * stride + 1] = c.r;
        if (withS) out[i * stride + 2] = hexS(c);
    });
    return out;
}

export function fromInt32Array(data: Int32Array, withS = false): HexCoord[] {
    const stride = withS ? 3 : 2;
    if (data.length % stride !== 0) {
        throw new RangeError(`Packed buffer of length ${data.length} is not a multiple of ${stride}`);
    }
    const out: HexCoord[] = [];
    for (let i = 0; i < data.length; i += stride) {
        out.push(hex(data[i], data[i + 1]));
    }
    return out;
}

import { createHash } from "node:crypto";
import { performance } from "node:perf_hooks";
import { type HexCoord, VertexDirection } from "../core/types.js";
import { LIBRARY_VERSION, parseBooleanEnv, parseIntegerEnv } from "../core/constants.js";
import { setHexDebug } from "../core/debug-logging.js";
import { HEX_ZERO, hex, hexToString, stringToHex } from "../core/hex.js";
import { hexRange } from "../enumeration/range.js";
import { hexRing, spiralRange } from "../enumeration/rings.js";
import { lineTo } from "../enumeration/lines.js";
import { wedge } from "../enumeration/wedges.js";
import { RingEdgeCache } from "../enumeration/ring-cache.js";
import { hexBounds, wrap } from "../resolution/bounds.js";
import { findPath } from "../algorithms/pathfinding.js";
import { rangeFov } from "../algorithms/field-of-view.js";
import { reachableCoords } from "../algorithms/field-of-movement.js";

type BenchConfig = {
    radius: number;
    repetitions: number;
    warmupRuns: number;
    quiet: boolean;
};

type BenchCase = {
    name: string;
    run: (config: BenchConfig) => HexCoord[];
};

type BenchResult = {
    name: string;
    meanMs: number;
    minMs: number;
    maxMs: number;
    fingerprint: string;
};

// Sparse walls: every hex whose q and r are both multiples of 3, except the origin
function isWall(c: HexCoord): boolean {
    return (c.q !== 0 || c.r !== 0) && c.q % 3 === 0 && c.r % 3 === 0;
}

const CASES: BenchCase[] = [
    { name: "range", run: ({ radius }) => hexRange(HEX_ZERO, radius).toArray() },
    { name: "ring", run: ({ radius }) => hexRing(HEX_ZERO, radius).toArray() },
    { name: "spiral", run: ({ radius }) => spiralRange(HEX_ZERO, { start: 0, end: radius }).toArray() },
    { name: "wedge", run: ({ radius }) => wedge(HEX_ZERO, { start: 0, end: radius }, VertexDirection.V1).toArray() },
    {
        name: "cached-ring-edges",
        run: ({ radius }) => {
            const cache = new RingEdgeCache();
            cache.precompute(radius);
            return cache.edges(hex(7, -3), radius).flatMap((side) => side.toArray());
        },
    },
    {
        name: "lines",
        run: ({ radius }) => hexRing(HEX_ZERO, radius).toArray().flatMap((target) => lineTo(HEX_ZERO, target).toArray()),
    },
    {
        name: "wrap",
        run: ({ radius }) => {
            const bounds = hexBounds(HEX_ZERO, radius);
            return hexRange(hex(radius, radius), radius * 2).toArray().map((c) => wrap(bounds, c));
        },
    },
    {
        name: "a-star",
        run: ({ radius }) => {
            const result = findPath(hex(-radius, 0), hex(radius, 0), (_from, to) => (isWall(to) ? null : 1), {
                maxExpansions: radius * radius * 10,
            });
            return result.found ? result.path : [];
        },
    },
    {
        name: "field-of-view",
        run: ({ radius }) => [...rangeFov(HEX_ZERO, radius, isWall)].map(stringToHex),
    },
    {
        name: "field-of-movement",
        run: ({ radius }) => reachableCoords(HEX_ZERO, radius, (c) => (isWall(c) ? null : 1 + (Math.abs(c.q) % 2))),
    },
];

function fingerprint(coords: HexCoord[]): string {
    return createHash("sha256").update(coords.map(hexToString).join(";")).digest("hex").slice(0, 16);
}

function mean(values: number[]): number {
    return values.reduce((sum, v) => sum + v, 0) / values.length;
}

function runCase(benchCase: BenchCase, config: BenchConfig): BenchResult {
    for (let i = 0; i < config.warmupRuns; i++) {
        benchCase.run(config);
    }
    const durations: number[] = [];
    const fingerprints = new Set<string>();
    for (let i = 0; i < config.repetitions; i++) {
        const start = performance.now();
        const output = benchCase.run(config);
        durations.push(performance.now() - start);
        fingerprints.add(fingerprint(output));
    }
    if (fingerprints.size !== 1) {
        throw new Error(`${benchCase.name}: output differs across repetitions`);
    }
    return {
        name: benchCase.name,
        meanMs: mean(durations),
        minMs: Math.min(...durations),
        maxMs: Math.max(...durations),
        fingerprint: [...fingerprints][0],
    };
}

function loadConfig(): BenchConfig {
    return {
        radius: parseIntegerEnv("BENCH_RADIUS", 40),
        repetitions: parseIntegerEnv("BENCH_REPS", 5),
        warmupRuns: parseIntegerEnv("BENCH_WARMUP", 1),
        quiet: parseBooleanEnv("BENCH_QUIET", false),
    };
}

function main(): void {
    setHexDebug(false);
    const config = loadConfig();

    if (!config.quiet) {
        console.log(`Hex Grid Benchmark (hexlattice ${LIBRARY_VERSION})`);
        console.log(`Radius: ${config.radius} | Reps: ${config.repetitions} | Warmup: ${config.warmupRuns}`);
        console.log("");
    }

    for (const benchCase of CASES) {
        const result = runCase(benchCase, config);
        console.log(
            `${result.name.padEnd(18)} mean=${result.meanMs.toFixed(3)}ms ` +
            `min=${result.minMs.toFixed(3)}ms max=${result.maxMs.toFixed(3)}ms fp=${result.fingerprint}`
        );
    }
}

main();

import type { CellCostFn, HexCoord } from "../core/types.js";
import { getNeighbors, hexDistance, hexToString, stringToHex } from "../core/hex.js";
import { hexLog } from "../core/debug-logging.js";
import { MinPriorityQueue } from "./priority-queue.js";
import { readStepCost } from "./pathfinding.js";

type Frontier = {
    coord: HexCoord;
    cost: number;
};

/**
 * Every hex reachable from `origin` within a movement budget.
 *
 * Dijkstra relaxation: each hex is settled once, at its cheapest total cost.
 * The search never leaves `hexRange(origin, budget)`, so zero-cost hexes
 * cannot extend it without bound.
 * @param origin - Starting hex, included at cost 0.
 * @param budget - Maximum total cost; finite and non-negative.
 * @param cost - Cost of entering a hex; `null` makes it impassable.
 * @returns Reachable hex keys ("q,r") mapped to their minimal total cost.
 */
export function fieldOfMovement(origin: HexCoord, budget: number, cost: CellCostFn): Map<string, number> {
    if (!Number.isFinite(budget) || budget < 0) {
        throw new RangeError(`Movement budget must be a finite number >= 0, got ${budget}`);
    }
    const settled = new Map<string, number>();
    const best = new Map<string, number>();
    const frontier = new MinPriorityQueue<Frontier>();

    best.set(hexToString(origin), 0);
    frontier.insert({ coord: origin, cost: 0 }, 0);

    while (!frontier.isEmpty) {
        const current = frontier.popMin();
        const key = hexToString(current.coord);
        if (settled.has(key)) continue;
        settled.set(key, current.cost);

        for (const next of getNeighbors(current.coord)) {
            const nextKey = hexToString(next);
            if (settled.has(nextKey) || hexDistance(origin, next) > budget) continue;
            const step = readStepCost(cost(next), current.coord, next);
            if (step === null) continue;
            const total = current.cost + step;
            if (total > budget) continue;
            const known = best.get(nextKey);
            if (known === undefined || total < known) {
                best.set(nextKey, total);
                frontier.insert({ coord: next, cost: total }, total);
            }
        }
    }

    hexLog("fieldOfMovement", () => `${hexToString(origin)} budget ${budget}: ${settled.size} hexes`);
    return settled;
}

/** Coordinates of `fieldOfMovement`, in settling order (cheapest first). */
export function reachableCoords(origin: HexCoord, budget: number, cost: CellCostFn): HexCoord[] {
    return [...fieldOfMovement(origin, budget, cost).keys()].map(stringToHex);
}

import type { EdgeCostFn, FindPathOptions, HexCoord, PathResult } from "../core/types.js";
import { DEFAULT_MAX_PATH_EXPANSIONS } from "../core/constants.js";
import { getNeighbors, hexDistance, hexEquals, hexToString } from "../core/hex.js";
import { hexLog, hexWarn } from "../core/debug-logging.js";
import { MinPriorityQueue } from "./priority-queue.js";

type Node = {
    coord: HexCoord;
    g: number; // Cost from start
    h: number; // Heuristic to end
    f: number; // Total cost (g + h)
    parent?: Node;
};

/**
 * Reads an edge cost, mapping `null` and non-finite values to impassable.
 * @throws Error on negative costs, which A* cannot handle.
 */
export function readStepCost(cost: number | null, from: HexCoord, to: HexCoord): number | null {
    if (cost === null || !Number.isFinite(cost)) return null;
    if (cost < 0) {
        throw new Error(`Negative step cost ${cost} from ${hexToString(from)} to ${hexToString(to)}`);
    }
    return cost;
}

function buildPath(node: Node): HexCoord[] {
    const path: HexCoord[] = [];
    let curr: Node | undefined = node;
    while (curr) {
        path.push(curr.coord);
        curr = curr.parent;
    }
    return path.reverse();
}

/**
 * A* Pathfinding Algorithm
 *
 * Searches the six neighbors of each hex. The heuristic is the hex distance,
 * so step costs below 1 can make the result suboptimal.
 * @param start - Where the search begins.
 * @param goal - Where it ends.
 * @param cost - Cost of stepping between two adjacent hexes; `null` blocks the step.
 * @param options - Optional `passable` filter and `maxExpansions` cap.
 * @returns The path from start to goal (both included) and its cost, or the failure reason.
 */
export function findPath(start: HexCoord, goal: HexCoord, cost: EdgeCostFn, options: FindPathOptions = {}): PathResult {
    const maxExpansions = options.maxExpansions ?? DEFAULT_MAX_PATH_EXPANSIONS;
    if (!Number.isInteger(maxExpansions) || maxExpansions < 1) {
        throw new RangeError(`maxExpansions must be a positive integer, got ${maxExpansions}`);
    }
    const passable = options.passable ?? (() => true);

    if (!passable(goal)) {
        return { found: false, reason: "impassable-goal", expansions: 0 };
    }
    if (hexEquals(start, goal)) {
        return { found: true, path: [start], cost: 0, expansions: 0 };
    }

    const openSet = new MinPriorityQueue<Node>();
    const bestByKey = new Map<string, Node>();
    const closedSet = new Set<string>();

    const startNode: Node = {
        coord: start,
        g: 0,
        h: hexDistance(start, goal),
        f: hexDistance(start, goal),
    };
    openSet.insert(startNode, startNode.f);
    bestByKey.set(hexToString(start), startNode);

    let expansions = 0;

    while (!openSet.isEmpty) {
        const current = openSet.popMin();
        const currentKey = hexToString(current.coord);

        // Stale entry superseded by a cheaper one
        if (closedSet.has(currentKey) || bestByKey.get(currentKey) !== current) continue;

        if (hexEquals(current.coord, goal)) {
            const path = buildPath(current);
            hexLog("findPath", () => `${hexToString(start)} -> ${hexToString(goal)}: ${path.length} hexes, cost ${current.g}, ${expansions} expansions`);
            return { found: true, path, cost: current.g, expansions };
        }

        if (expansions >= maxExpansions) {
            hexWarn("findPath", `${hexToString(start)} -> ${hexToString(goal)}: gave up after ${expansions} expansions`);
            return { found: false, reason: "expansion-limit", expansions };
        }

        closedSet.add(currentKey);
        expansions++;

        for (const neighborCoord of getNeighbors(current.coord)) {
            const neighborKey = hexToString(neighborCoord);
            if (closedSet.has(neighborKey)) continue;
            if (!passable(neighborCoord)) continue;

            const stepCost = readStepCost(cost(current.coord, neighborCoord), current.coord, neighborCoord);
            if (stepCost === null) continue;

            const gScore = current.g + stepCost;
            const existingNode = bestByKey.get(neighborKey);

            if (!existingNode || gScore < existingNode.g) {
                const hScore = hexDistance(neighborCoord, goal);
                const newNode: Node = {
                    coord: neighborCoord,
                    g: gScore,
                    h: hScore,
                    f: gScore + hScore,
                    parent: current,
                };
                bestByKey.set(neighborKey, newNode);
                openSet.insert(newNode, newNode.f);
            }
        }
    }

    hexLog("findPath", () => `${hexToString(start)} -> ${hexToString(goal)}: unreachable after ${expansions} expansions`);
    return { found: false, reason: "unreachable", expansions };
}

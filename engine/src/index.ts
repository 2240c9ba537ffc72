export * from "./core/types.js";
export * from "./core/constants.js";
export * from "./core/debug-logging.js";
export * from "./core/hex.js";
export * from "./core/directions.js";
export * from "./core/direction-way.js";
export * from "./core/grid.js";
export * from "./core/ordering.js";
export * from "./core/orientation.js";
export * from "./core/conversions.js";
export * from "./core/packed.js";
export * from "./core/sequence.js";
export * from "./core/validation.js";
export * from "./enumeration/range.js";
export * from "./enumeration/rings.js";
export * from "./enumeration/lines.js";
export * from "./enumeration/wedges.js";
export * from "./enumeration/shapes.js";
export * from "./enumeration/ring-cache.js";
export * from "./resolution/resolution.js";
export * from "./resolution/bounds.js";
export * from "./algorithms/priority-queue.js";
export * from "./algorithms/pathfinding.js";
export * from "./algorithms/field-of-view.js";
export * from "./algorithms/field-of-movement.js";

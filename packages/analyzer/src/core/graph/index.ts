/**
 * Graph utilities for level analysis.
 */

export * from "./shortest-paths";
export * from "./weighted-graph";

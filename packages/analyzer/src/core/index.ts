/**
 * Core module - foundational primitives for level analysis.
 */

export * from "./data-structures";
export * from "./geometry";
export * from "./graph";
export * from "./grid";

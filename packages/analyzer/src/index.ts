/**
 * Arena level analyzer: decodes a room genome, reduces it to a room graph,
 * measures visibility and connectivity, and places spawns, medkits and ammo.
 */

export * from "./core";
export * from "./genome";
export * from "./graphs";
export * from "./metrics";
export * from "./placement";
export * from "./pipeline";
export * from "./rooms";
export * from "./validation";

export * from "./merge";
export * from "./prune";
export * from "./reduce";
export * from "./types";

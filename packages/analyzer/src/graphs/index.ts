export * from "./outline-graph";
export * from "./room-graph";
export * from "./tile-graph";
export * from "./visibility";

export * from "./constants";
export * from "./engine";
export * from "./recipes";
export * from "./room-fit";
export * from "./tile-fit";
export * from "./types";

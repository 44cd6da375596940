export * from "./schemas/grid";
export * from "./schemas/resources";
export * from "./types/error";
export * from "./types/result";

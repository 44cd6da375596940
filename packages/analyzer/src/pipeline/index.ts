export * from "./analyze";
export * from "./builder";
export * from "./passes";
export * from "./trace";
export * from "./types";

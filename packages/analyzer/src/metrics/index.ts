export * from "./collector";
export * from "./degree";
export * from "./diameter";

export * from "./min-heap";

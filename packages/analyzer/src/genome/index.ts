export * from "./parser";
export * from "./serializer";

export * from "./errors";
export * from "./ir";
export * from "./tools/registry";
export type { bytes, double, float, int32, int64, uint32, uint64 } from "./tags";

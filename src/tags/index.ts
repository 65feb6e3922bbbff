/**
 * Scalar type aliases.
 *
 * Annotating a parameter or property with one of these picks the schema
 * scalar of the same name; the analyzer reads the alias name, the compiler
 * sees the plain runtime type.
 *
 * ```ts
 * import type { int64, double } from "toolwire";
 *
 * export function locate(id: int64, radius: double): string { ... }
 * ```
 */
export type int32 = number;
export type int64 = number;
export type uint32 = number;
export type uint64 = number;
export type float = number;
export type double = number;
export type bytes = Uint8Array;

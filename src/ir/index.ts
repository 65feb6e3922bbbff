/**
 * Descriptor model module
 *
 * Descriptors for messages, enums and services, plus the converters and
 * generators built on them.
 */

export * from "./types";
export * from "./utils";
export * from "./registry";
export * from "./type-mapper";
export * from "./converters/ts-to-ir";
export * from "./converters/function-to-ir";
export * from "./converters/protobufjs-to-ir";
export * from "./generators/ir-to-proto";
export * from "./generators/ir-to-message-class";

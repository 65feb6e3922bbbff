/**
 * Descriptor model for toolwire
 *
 * This module defines the intermediate representation that sits between
 * analyzed TypeScript declarations and the generated artifacts.
 *
 * All conversions go through these descriptors:
 * - The analyzer turns declarations into FunctionSpec / ClassSpec
 * - The synthesizer turns those into message and service descriptors
 * - Generators render descriptors to proto3 text or runtime classes
 */

/**
 * Scalar field types supported by the schema language
 */
export type ScalarType = "string" | "int32" | "int64" | "uint32" | "uint64" | "float" | "double" | "bool" | "bytes";

export interface PrimitiveRef {
    kind: "primitive";
    type: ScalarType;
}

/**
 * Reference to a message by name (simple or dotted nested name)
 */
export interface MessageRef {
    kind: "message";
    name: string;
}

export interface EnumRef {
    kind: "enum";
    name: string;
}

export interface OptionalRef {
    kind: "optional";
    of: TypeRef;
}

export interface RepeatedRef {
    kind: "repeated";
    of: TypeRef;
}

/**
 * String-keyed map. Other key types are rejected during analysis.
 */
export interface MapRef {
    kind: "map";
    key: "string";
    value: TypeRef;
}

/**
 * The value domain of a single field
 */
export type ValueTypeRef = PrimitiveRef | MessageRef | EnumRef;

/**
 * Analyzed type of a parameter, property or return value
 */
export type TypeRef = ValueTypeRef | OptionalRef | RepeatedRef | MapRef;

export type FieldLabel = "optional" | "repeated" | "required";

/**
 * Value of a field, method or enum option
 */
export type OptionValue = string | number | boolean;

/**
 * Literal default of a field
 */
export type ScalarValue = string | number | boolean;

/**
 * Field of a message. `number` is unique within the owning message and never
 * changes once assigned.
 */
export interface FieldSpec {
    readonly name: string;
    readonly type: ValueTypeRef;
    readonly label: FieldLabel;
    readonly number: number;
    /** Present on map fields, whose `type` is the value type */
    readonly keyType?: "string";
    readonly defaultValue?: ScalarValue;
    readonly options: Readonly<Record<string, OptionValue>>;
    readonly description?: string;
}

export interface EnumSpec {
    readonly name: string;
    /** Value name to number, in declaration order */
    readonly values: Readonly<Record<string, number>>;
    readonly description?: string;
}

export interface MessageSpec {
    readonly name: string;
    readonly fields: readonly FieldSpec[];
    readonly nestedMessages: readonly MessageSpec[];
    readonly nestedEnums: readonly EnumSpec[];
    readonly description?: string;
}

/**
 * RPC method. Input and output types are message names.
 */
export interface MethodSpec {
    readonly name: string;
    readonly inputType: string;
    readonly outputType: string;
    readonly clientStreaming: boolean;
    readonly serverStreaming: boolean;
    readonly options: Readonly<Record<string, OptionValue>>;
    readonly description?: string;
}

export interface ServiceSpec {
    readonly name: string;
    readonly methods: readonly MethodSpec[];
    readonly description?: string;
}

/**
 * Analyzed shape of one callable
 */
export interface FunctionSpec {
    name: string;
    /** Parameter name to type, in declaration order */
    args: ReadonlyMap<string, TypeRef>;
    /** `undefined` for functions returning `void` */
    returnType: TypeRef | undefined;
    /** JSDoc description, "" when the callable has none */
    description: string;
    isAsync: boolean;
    isGenerator: boolean;
    argDescriptions: ReadonlyMap<string, string>;
    argDefaults: ReadonlyMap<string, ScalarValue>;
    returnDescription?: string;
    deprecated: boolean;
}

/**
 * Analyzed shape of a class: its annotated public methods
 */
export interface ClassSpec {
    name: string;
    description: string;
    methods: FunctionSpec[];
}

/**
 * Plain snapshot of a registry, used for JSON and YAML output
 */
export interface RegistrySnapshot {
    syntax: "proto3";
    package?: string;
    enums: EnumSpec[];
    messages: MessageSpec[];
    services: ServiceSpec[];
}

/**
 * Utility functions for building and inspecting descriptors
 */
import { DuplicateNameError, InvalidEnumError, InvalidFieldNumberError, InvalidIdentifierError } from "../errors";
import { isValidIdentifier } from "./type-mapper";
import type {
    EnumRef,
    EnumSpec,
    FieldLabel,
    FieldSpec,
    MapRef,
    MessageRef,
    MessageSpec,
    MethodSpec,
    OptionalRef,
    OptionValue,
    PrimitiveRef,
    RepeatedRef,
    ScalarType,
    ScalarValue,
    ServiceSpec,
    TypeRef,
    ValueTypeRef,
} from "./types";

/** Largest field number the schema language accepts */
export const MAX_FIELD_NUMBER = 536_870_911;

/**
 * Create a primitive type reference
 */
export function createPrimitive(type: ScalarType): PrimitiveRef {
    return { kind: "primitive", type };
}

export function createMessageRef(name: string): MessageRef {
    return { kind: "message", name };
}

export function createEnumRef(name: string): EnumRef {
    return { kind: "enum", name };
}

export function createOptional(of: TypeRef): OptionalRef {
    return { kind: "optional", of };
}

export function createRepeated(of: TypeRef): RepeatedRef {
    return { kind: "repeated", of };
}

export function createMap(value: TypeRef): MapRef {
    return { kind: "map", key: "string", value };
}

/**
 * Type guards
 */
export function isPrimitive(type: TypeRef): type is PrimitiveRef {
    return type.kind === "primitive";
}

export function isMessageRef(type: TypeRef): type is MessageRef {
    return type.kind === "message";
}

export function isEnumRef(type: TypeRef): type is EnumRef {
    return type.kind === "enum";
}

export function isOptional(type: TypeRef): type is OptionalRef {
    return type.kind === "optional";
}

export function isRepeated(type: TypeRef): type is RepeatedRef {
    return type.kind === "repeated";
}

export function isMap(type: TypeRef): type is MapRef {
    return type.kind === "map";
}

export function isValueType(type: TypeRef): type is ValueTypeRef {
    return type.kind === "primitive" || type.kind === "message" || type.kind === "enum";
}

/**
 * Render a type reference for diagnostics, e.g. `repeated<string>`
 */
export function typeRefToString(type: TypeRef): string {
    switch (type.kind) {
        case "primitive":
            return type.type;
        case "message":
        case "enum":
            return type.name;
        case "optional":
        case "repeated":
            return `${type.kind}<${typeRefToString(type.of)}>`;
        case "map":
            return `map<string, ${typeRefToString(type.value)}>`;
    }
}

/**
 * Name used for a value type in schema text
 */
export function valueTypeName(type: ValueTypeRef): string {
    return type.kind === "primitive" ? type.type : type.name;
}

/**
 * Field definition before a number has been assigned
 */
export interface FieldInit {
    name: string;
    type: ValueTypeRef;
    label?: FieldLabel;
    number?: number;
    keyType?: "string";
    defaultValue?: ScalarValue;
    options?: Record<string, OptionValue>;
    description?: string;
}

export interface MessageInit {
    nestedMessages?: MessageSpec[];
    nestedEnums?: EnumSpec[];
    description?: string;
}

/**
 * Create a message, assigning numbers to fields that have none.
 *
 * Unnumbered fields take the next number after the highest one in use, in
 * declaration order, so a message without explicit numbers is numbered 1..N.
 */
export function createMessage(name: string, fields: FieldInit[], init: MessageInit = {}): MessageSpec {
    assertIdentifier("message", name);

    const used = new Set<number>();
    const names = new Set<string>();

    for (const field of fields) {
        assertIdentifier("field", field.name);
        if (names.has(field.name)) {
            throw new DuplicateNameError(`Field of ${name}`, field.name);
        }
        names.add(field.name);

        if (field.number !== undefined) {
            if (!Number.isInteger(field.number) || field.number < 1 || field.number > MAX_FIELD_NUMBER) {
                throw new InvalidFieldNumberError(name, field.name, field.number);
            }
            if (used.has(field.number)) {
                throw new InvalidFieldNumberError(name, field.name, field.number);
            }
            used.add(field.number);
        }
    }

    let highest = Math.max(0, ...used);
    const specs = fields.map((field) => {
        let number = field.number;
        if (number === undefined) {
            number = ++highest;
            used.add(number);
        }
        return createField({ ...field, number });
    });

    const nestedMessages = init.nestedMessages ?? [];
    const nestedEnums = init.nestedEnums ?? [];
    const nestedNames = new Set<string>();
    for (const nested of [...nestedEnums, ...nestedMessages]) {
        if (nestedNames.has(nested.name)) {
            throw new DuplicateNameError(`Nested type of ${name}`, nested.name);
        }
        nestedNames.add(nested.name);
    }
    // Enum values are scoped like their enum, beside the other nested types
    for (const nested of nestedEnums) {
        for (const valueName of Object.keys(nested.values)) {
            if (nestedNames.has(valueName)) {
                throw new DuplicateNameError(`Enum value of ${name}.${nested.name}`, valueName);
            }
            nestedNames.add(valueName);
        }
    }

    return Object.freeze({
        name,
        fields: Object.freeze(specs),
        nestedMessages: Object.freeze([...nestedMessages]),
        nestedEnums: Object.freeze([...nestedEnums]),
        ...(init.description ? { description: init.description } : {}),
    });
}

function createField(field: FieldInit & { number: number }): FieldSpec {
    return Object.freeze({
        name: field.name,
        type: Object.freeze({ ...field.type }),
        label: field.label ?? "optional",
        number: field.number,
        ...(field.keyType ? { keyType: field.keyType } : {}),
        ...(field.defaultValue !== undefined ? { defaultValue: field.defaultValue } : {}),
        options: Object.freeze({ ...field.options }),
        ...(field.description ? { description: field.description } : {}),
    });
}

/**
 * Create an enum. Value names and numbers must be unique and the first value must be 0.
 */
export function createEnum(name: string, values: Record<string, number>, description?: string): EnumSpec {
    assertIdentifier("enum", name);

    const [first] = Object.entries(values);
    if (!first) {
        throw new InvalidEnumError(name, "an enum needs at least one value");
    }
    if (first[1] !== 0) {
        throw new InvalidEnumError(name, `the first value must be 0, got ${first[0]} = ${first[1]}`);
    }

    const numbers = new Set<number>();
    for (const [valueName, value] of Object.entries(values)) {
        assertIdentifier("enum value", valueName);
        if (!Number.isInteger(value) || numbers.has(value)) {
            throw new DuplicateNameError(`Value number of ${name}`, String(value));
        }
        numbers.add(value);
    }

    return Object.freeze({
        name,
        values: Object.freeze({ ...values }),
        ...(description ? { description } : {}),
    });
}

export interface MethodInit {
    name: string;
    inputType: string;
    outputType: string;
    clientStreaming?: boolean;
    serverStreaming?: boolean;
    options?: Record<string, OptionValue>;
    description?: string;
}

export function createMethod(method: MethodInit): MethodSpec {
    assertIdentifier("method", method.name);
    return Object.freeze({
        name: method.name,
        inputType: method.inputType,
        outputType: method.outputType,
        clientStreaming: method.clientStreaming ?? false,
        serverStreaming: method.serverStreaming ?? false,
        options: Object.freeze({ ...method.options }),
        ...(method.description ? { description: method.description } : {}),
    });
}

/**
 * Create a service. Method names must be unique.
 */
export function createService(name: string, methods: MethodSpec[], description?: string): ServiceSpec {
    assertIdentifier("service", name);

    const names = new Set<string>();
    for (const method of methods) {
        if (names.has(method.name)) {
            throw new DuplicateNameError(`Method of ${name}`, method.name);
        }
        names.add(method.name);
    }

    return Object.freeze({
        name,
        methods: Object.freeze([...methods]),
        ...(description ? { description } : {}),
    });
}

function assertIdentifier(kind: string, name: string): void {
    if (!isValidIdentifier(name)) {
        throw new InvalidIdentifierError(kind, name);
    }
}

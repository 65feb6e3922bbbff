/**
 * Type mapper
 *
 * Maps leaf TypeScript annotations to schema value types and schema value
 * types to runtime representations and defaults.
 */
import { Node, SyntaxKind, type TypeNode } from "ts-morph";

import { UnsupportedTypeError } from "../errors";
import type { ScalarType, ValueTypeRef } from "./types";

/**
 * Explicit success or failure of a mapping, leaving the fallback policy to the caller
 */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export type RuntimeType = "string" | "number" | "boolean" | "bytes" | "message";

export type DefaultValue = string | number | boolean | Uint8Array | undefined;

/**
 * Type names that map directly to a scalar. The lower-case names are the
 * aliases exported from the package entry point.
 */
const NAMED_SCALARS: Record<string, ScalarType> = {
    int32: "int32",
    int64: "int64",
    uint32: "uint32",
    uint64: "uint64",
    float: "float",
    double: "double",
    bytes: "bytes",
    Uint8Array: "bytes",
    Buffer: "bytes",
    ArrayBuffer: "bytes",
};

const RUNTIME_TYPES: Record<ScalarType, RuntimeType> = {
    string: "string",
    int32: "number",
    int64: "number",
    uint32: "number",
    uint64: "number",
    float: "number",
    double: "number",
    bool: "boolean",
    bytes: "bytes",
};

export const SCALAR_TYPES: readonly ScalarType[] = Object.keys(RUNTIME_TYPES).filter(isScalarType);

export function isScalarType(name: string): name is ScalarType {
    return Object.prototype.hasOwnProperty.call(RUNTIME_TYPES, name);
}

/**
 * Map a leaf annotation (no unions, arrays or maps) to a value type.
 *
 * Type aliases are followed, so `type UserId = string` maps to `string`.
 */
export function fieldTypeFor(typeNode: TypeNode): Result<ValueTypeRef, UnsupportedTypeError> {
    switch (typeNode.getKind()) {
        case SyntaxKind.StringKeyword:
            return ok({ kind: "primitive", type: "string" });
        case SyntaxKind.NumberKeyword:
            return ok({ kind: "primitive", type: "int32" });
        case SyntaxKind.BigIntKeyword:
            return ok({ kind: "primitive", type: "int64" });
        case SyntaxKind.BooleanKeyword:
            return ok({ kind: "primitive", type: "bool" });
    }

    if (!Node.isTypeReference(typeNode) || typeNode.getTypeArguments().length > 0) {
        return unsupported(typeNode);
    }

    const typeName = typeNode.getTypeName();
    const name = typeName.getText();
    const scalar = NAMED_SCALARS[name];
    if (scalar) {
        return ok({ kind: "primitive", type: scalar });
    }

    let symbol = typeName.getSymbol();
    if (symbol?.isAlias()) {
        symbol = symbol.getAliasedSymbol() ?? symbol;
    }

    for (const declaration of symbol?.getDeclarations() ?? []) {
        // Library types such as Date or Promise have no schema counterpart
        if (declaration.getSourceFile().isDeclarationFile()) continue;

        if (Node.isEnumDeclaration(declaration)) {
            return ok({ kind: "enum", name: declaration.getName() });
        }
        if (Node.isInterfaceDeclaration(declaration)) {
            return ok({ kind: "message", name: declaration.getName() });
        }
        if (Node.isClassDeclaration(declaration) && declaration.getName()) {
            return ok({ kind: "message", name: declaration.getNameOrThrow() });
        }
        if (Node.isTypeAliasDeclaration(declaration) && declaration.getTypeParameters().length === 0) {
            const aliased = declaration.getTypeNode();
            if (Node.isTypeLiteral(aliased) && aliased.getIndexSignatures().length === 0) {
                return ok({ kind: "message", name: declaration.getName() });
            }
            if (aliased) {
                return fieldTypeFor(aliased);
            }
        }
    }

    return unsupported(typeNode);
}

/**
 * Runtime representation of a value type
 */
export function runtimeTypeFor(type: ValueTypeRef): RuntimeType {
    switch (type.kind) {
        case "primitive":
            return RUNTIME_TYPES[type.type];
        case "enum":
            return "number";
        case "message":
            return "message";
    }
}

/**
 * Default value of a value type. Messages have no default and are never
 * constructed implicitly.
 */
export function defaultFor(type: ValueTypeRef): DefaultValue {
    switch (type.kind) {
        case "enum":
            return 0;
        case "message":
            return undefined;
        case "primitive":
            switch (type.type) {
                case "string":
                    return "";
                case "bool":
                    return false;
                case "bytes":
                    return new Uint8Array(0);
                default:
                    return 0;
            }
    }
}

/**
 * Schema identifiers start with a letter and contain letters, digits and underscores
 */
export function isValidIdentifier(name: string): boolean {
    return /^[A-Za-z][A-Za-z0-9_]*$/.test(name);
}

export function snakeToCamel(name: string): string {
    const [first = "", ...rest] = name.split("_");
    return first + rest.map((part) => part.charAt(0).toUpperCase() + part.slice(1).toLowerCase()).join("");
}

export function camelToSnake(name: string): string {
    return name.replace(/(?<!^)(?=[A-Z])/g, "_").toLowerCase();
}

/**
 * `get_weather` and `getWeather` both become `GetWeather`
 */
export function toPascalCase(name: string): string {
    const camel = name.includes("_") ? snakeToCamel(name) : name;
    return camel.charAt(0).toUpperCase() + camel.slice(1);
}

function ok(value: ValueTypeRef): Result<ValueTypeRef, UnsupportedTypeError> {
    return { ok: true, value };
}

function unsupported(typeNode: TypeNode): Result<ValueTypeRef, UnsupportedTypeError> {
    return { ok: false, error: new UnsupportedTypeError(typeNode.getText()) };
}

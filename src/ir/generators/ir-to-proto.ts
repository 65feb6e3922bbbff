/**
 * Descriptor model to proto3 text generator
 */
import { parse, type Root } from "protobufjs";

import { UnresolvedReferenceError } from "../../errors";
import type { DescriptorRegistry } from "../registry";
import type { EnumSpec, FieldSpec, MessageSpec, MethodSpec, OptionValue, ServiceSpec } from "../types";
import { valueTypeName } from "../utils";

const INDENT = "  ";

/**
 * Render every descriptor in the registry as one proto3 file.
 *
 * Enums, messages and services appear in registration order, fields in number
 * order. References are checked before anything is returned, so an
 * unresolvable reference never produces partial text.
 */
export function renderFile(registry: DescriptorRegistry, packageName: string | undefined = registry.packageName): string {
    const lines: string[] = ['syntax = "proto3";'];

    if (packageName) {
        lines.push("", `package ${packageName};`);
    }

    for (const spec of registry.listEnums()) {
        lines.push("", ...renderEnum(spec, 0));
    }

    for (const spec of registry.listMessages()) {
        lines.push("", ...renderMessage(spec, [], registry));
    }

    for (const spec of registry.listServices()) {
        lines.push("", ...renderService(spec, registry));
    }

    return lines.join("\n") + "\n";
}

/**
 * Render and parse the registry with protobufjs, returning a resolved root
 */
export function toProtobufRoot(registry: DescriptorRegistry): Root {
    const { root } = parse(renderFile(registry), { keepCase: true, alternateCommentMode: true });
    root.resolveAll();
    return root;
}

function renderMessage(spec: MessageSpec, scope: readonly MessageSpec[], registry: DescriptorRegistry): string[] {
    const level = scope.length;
    const indent = INDENT.repeat(level);
    const inner = [...scope, spec];
    const lines = [...renderComment(spec.description, indent), `${indent}message ${spec.name} {`];

    for (const nested of spec.nestedEnums) {
        lines.push(...renderEnum(nested, level + 1));
    }

    for (const nested of spec.nestedMessages) {
        lines.push(...renderMessage(nested, inner, registry));
    }

    const fields = [...spec.fields].sort((a, b) => a.number - b.number);
    for (const field of fields) {
        checkFieldReference(field, inner, registry);
        lines.push(...renderComment(field.description, indent + INDENT), `${indent}${INDENT}${renderField(field)}`);
    }

    lines.push(`${indent}}`);
    return lines;
}

function renderField(field: FieldSpec): string {
    const typeName = valueTypeName(field.type);
    const declaration = field.keyType
        ? `map<${field.keyType}, ${typeName}> ${field.name} = ${field.number}`
        : `${field.label === "repeated" ? "repeated " : ""}${typeName} ${field.name} = ${field.number}`;

    const options = Object.entries(field.options);
    if (options.length === 0) {
        return `${declaration};`;
    }
    return `${declaration} [${options.map(([name, value]) => `${name} = ${renderOptionValue(value)}`).join(", ")}];`;
}

function checkFieldReference(field: FieldSpec, scope: readonly MessageSpec[], registry: DescriptorRegistry): void {
    if (field.type.kind === "primitive") return;

    const resolved = registry.resolve(field.type.name, scope);
    const owner = scope.map((m) => m.name).join(".");
    if (!resolved || resolved.kind !== field.type.kind) {
        throw new UnresolvedReferenceError(field.type.name, `field ${owner}.${field.name}`);
    }
}

function renderEnum(spec: EnumSpec, level: number): string[] {
    const indent = INDENT.repeat(level);
    return [
        ...renderComment(spec.description, indent),
        `${indent}enum ${spec.name} {`,
        ...Object.entries(spec.values).map(([name, value]) => `${indent}${INDENT}${name} = ${value};`),
        `${indent}}`,
    ];
}

function renderService(spec: ServiceSpec, registry: DescriptorRegistry): string[] {
    const lines = [...renderComment(spec.description, ""), `service ${spec.name} {`];

    for (const method of spec.methods) {
        lines.push(...renderComment(method.description, INDENT), ...renderMethod(spec, method, registry));
    }

    lines.push("}");
    return lines;
}

function renderMethod(service: ServiceSpec, method: MethodSpec, registry: DescriptorRegistry): string[] {
    for (const typeName of [method.inputType, method.outputType]) {
        if (registry.resolve(typeName)?.kind !== "message") {
            throw new UnresolvedReferenceError(typeName, `method ${service.name}.${method.name}`);
        }
    }

    const input = `${method.clientStreaming ? "stream " : ""}${method.inputType}`;
    const output = `${method.serverStreaming ? "stream " : ""}${method.outputType}`;
    const signature = `${INDENT}rpc ${method.name}(${input}) returns (${output})`;

    const options = Object.entries(method.options);
    if (options.length === 0) {
        return [`${signature};`];
    }
    return [
        `${signature} {`,
        ...options.map(([name, value]) => `${INDENT}${INDENT}option ${name} = ${renderOptionValue(value)};`),
        `${INDENT}}`,
    ];
}

function renderComment(description: string | undefined, indent: string): string[] {
    if (!description) return [];
    return description.split("\n").map((line) => (line ? `${indent}// ${line}` : `${indent}//`));
}

function renderOptionValue(value: OptionValue): string {
    return typeof value === "string" ? JSON.stringify(value) : String(value);
}

/**
 * protobufjs reflection to descriptor model converter
 *
 * Rebuilds a registry from live protobufjs descriptors so they can be rendered
 * and turned into message classes like synthesized ones.
 */
import {
    Enum,
    MapField,
    Namespace,
    Service,
    Type,
    type Field,
    type NamespaceBase,
    type ReflectionObject,
    type Root,
} from "protobufjs";

import { InvalidMapKeyError, UnresolvedReferenceError, UnsupportedTypeError } from "../../errors";
import { DescriptorRegistry } from "../registry";
import { isScalarType } from "../type-mapper";
import type { EnumSpec, FieldLabel, MessageSpec, OptionValue, ServiceSpec, ValueTypeRef } from "../types";
import { createEnum, createMessage, createMethod, createService, type FieldInit } from "../utils";

/**
 * Build a registry from the types, enums and services declared in a package of
 * a protobufjs root. Without a package name the package is inferred from the
 * chain of plain namespaces below the root.
 */
export function registryFromProtobufRoot(root: Root, packageName?: string): DescriptorRegistry {
    const pkg = packageName ?? inferPackage(root);
    const namespace = pkg ? root.lookup(pkg) : root;
    if (!(namespace instanceof Namespace)) {
        throw new UnresolvedReferenceError(pkg ?? "", "protobuf root");
    }

    const registry = new DescriptorRegistry(pkg);
    const enums: EnumSpec[] = [];
    const messages: MessageSpec[] = [];
    const services: ServiceSpec[] = [];

    for (const nested of namespace.nestedArray) {
        if (nested instanceof Type) {
            messages.push(messageFromType(nested, pkg));
        } else if (nested instanceof Enum) {
            enums.push(enumFromEnum(nested));
        } else if (nested instanceof Service) {
            services.push(serviceFromService(nested, pkg));
        }
    }

    registry.register({ enums, messages, services });
    return registry;
}

function inferPackage(root: Root): string | undefined {
    const path: string[] = [];
    let current: NamespaceBase = root;

    for (;;) {
        const [only, ...others] = current.nestedArray;
        if (!isPlainNamespace(only) || others.length > 0) break;
        path.push(only.name);
        current = only;
    }

    return path.length > 0 ? path.join(".") : undefined;
}

function isPlainNamespace(object: ReflectionObject | undefined): object is Namespace {
    return (
        object instanceof Namespace && !(object instanceof Type) && !(object instanceof Service) && !(object instanceof Enum)
    );
}

function messageFromType(type: Type, pkg: string | undefined): MessageSpec {
    const nestedMessages: MessageSpec[] = [];
    const nestedEnums: EnumSpec[] = [];
    for (const nested of type.nestedArray) {
        if (nested instanceof Type) {
            nestedMessages.push(messageFromType(nested, pkg));
        } else if (nested instanceof Enum) {
            nestedEnums.push(enumFromEnum(nested));
        }
    }

    const fields = type.fieldsArray.map((field): FieldInit => {
        const label: FieldLabel = field.repeated || field instanceof MapField ? "repeated" : field.required ? "required" : "optional";
        if (field instanceof MapField && field.keyType !== "string") {
            throw new InvalidMapKeyError(`map<${field.keyType}, ${field.type}> ${field.name}`, field.keyType);
        }
        return {
            name: field.name,
            type: valueTypeOf(field, type, pkg),
            label,
            number: field.id,
            ...(field instanceof MapField ? { keyType: "string" as const } : {}),
            options: optionsOf(field.options),
            description: field.comment ?? undefined,
        };
    });

    return createMessage(type.name, fields, {
        nestedMessages,
        nestedEnums,
        description: type.comment ?? undefined,
    });
}

function valueTypeOf(field: Field | MapField, owner: Type, pkg: string | undefined): ValueTypeRef {
    if (isScalarType(field.type)) {
        return { kind: "primitive", type: field.type };
    }

    if (/^(sint|fixed|sfixed)(32|64)$/.test(field.type)) {
        throw new UnsupportedTypeError(field.type);
    }

    const resolved = owner.lookup(field.type, [Type, Enum]);
    if (!(resolved instanceof Type) && !(resolved instanceof Enum)) {
        throw new UnresolvedReferenceError(field.type, `field ${owner.name}.${field.name}`);
    }

    const name = relativeName(field.type, pkg);
    return resolved instanceof Enum ? { kind: "enum", name } : { kind: "message", name };
}

/**
 * Reference as written, without a leading dot or the package prefix
 */
function relativeName(reference: string, pkg: string | undefined): string {
    const name = reference.replace(/^\./, "");
    return pkg && name.startsWith(`${pkg}.`) ? name.slice(pkg.length + 1) : name;
}

function enumFromEnum(spec: Enum): EnumSpec {
    return createEnum(spec.name, { ...spec.values }, spec.comment ?? undefined);
}

function serviceFromService(service: Service, pkg: string | undefined): ServiceSpec {
    const methods = service.methodsArray.map((method) => {
        for (const reference of [method.requestType, method.responseType]) {
            if (!service.lookup(reference, Type)) {
                throw new UnresolvedReferenceError(reference, `method ${service.name}.${method.name}`);
            }
        }
        return createMethod({
            name: method.name,
            inputType: relativeName(method.requestType, pkg),
            outputType: relativeName(method.responseType, pkg),
            clientStreaming: method.requestStream ?? false,
            serverStreaming: method.responseStream ?? false,
            options: optionsOf(method.options),
            description: method.comment ?? undefined,
        });
    });

    return createService(service.name, methods, service.comment ?? undefined);
}

/**
 * Keep the options the schema language can express. `proto3_optional` is a
 * parser artifact of the `optional` keyword, not a declared option.
 */
function optionsOf(options: Record<string, unknown> | undefined): Record<string, OptionValue> {
    const result: Record<string, OptionValue> = {};
    for (const [name, value] of Object.entries(options ?? {})) {
        if (name === "proto3_optional") continue;
        if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
            result[name] = value;
        }
    }
    return result;
}

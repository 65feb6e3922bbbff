/**
 * Function and class to message/service synthesizer
 */
import {
    Node,
    Scope,
    type ClassDeclaration,
    type EnumDeclaration,
    type InterfaceDeclaration,
    type PropertyDeclaration,
    type PropertySignature,
    type TypeAliasDeclaration,
} from "ts-morph";

import { MissingAnnotationError, ToolwireError, UnsupportedAnnotationError } from "../../errors";
import { renderFile } from "../generators/ir-to-proto";
import { DescriptorRegistry } from "../registry";
import { camelToSnake, toPascalCase } from "../type-mapper";
import type { EnumSpec, FieldLabel, FunctionSpec, MessageSpec, MethodSpec, ServiceSpec, TypeRef, ValueTypeRef } from "../types";
import { createEnum, createMessage, createMethod, createService, typeRefToString, type FieldInit } from "../utils";
import { analyzeClass, analyzeFunction, typeRefFromAnnotation, type Callable } from "./ts-to-ir";

export interface SynthesizerOptions {
    /**
     * Log skipped methods and registrations: `true` writes to the console,
     * a function receives each message instead
     */
    log?: boolean | ((message: string) => void);
}

/**
 * Field type, label and map key derived from a type reference
 */
export interface FieldShape {
    type: ValueTypeRef;
    label: FieldLabel;
    keyType?: "string";
}

export interface MethodSynthesis {
    request: MessageSpec;
    response: MessageSpec;
    method: MethodSpec;
}

export type MessageDeclaration = InterfaceDeclaration | ClassDeclaration | TypeAliasDeclaration;

/**
 * Derive the field shape of a type reference.
 *
 * Optional values and bare values are `optional`, lists are `repeated`, maps
 * are repeated entries with a string key. Nested repetition has no field shape.
 */
export function fieldShapeFromTypeRef(type: TypeRef): FieldShape {
    switch (type.kind) {
        case "primitive":
        case "message":
        case "enum":
            return { type, label: "optional" };
        case "optional":
            return fieldShapeFromTypeRef(type.of);
        case "repeated": {
            const element = type.of.kind === "optional" ? type.of.of : type.of;
            if (element.kind === "primitive" || element.kind === "message" || element.kind === "enum") {
                return { type: element, label: "repeated" };
            }
            throw new UnsupportedAnnotationError(typeRefToString(type), "nested lists and lists of maps");
        }
        case "map": {
            const value = type.value.kind === "optional" ? type.value.of : type.value;
            if (value.kind === "primitive" || value.kind === "message" || value.kind === "enum") {
                return { type: value, label: "repeated", keyType: "string" };
            }
            throw new UnsupportedAnnotationError(typeRefToString(type), "map values must be single values");
        }
    }
}

/**
 * Converts analyzed callables into request/response messages and services,
 * registering everything in its registry.
 */
export class Synthesizer {
    readonly registry: DescriptorRegistry;
    private readonly log: (message: string) => void;

    constructor(registry: DescriptorRegistry = new DescriptorRegistry(), options: SynthesizerOptions = {}) {
        this.registry = registry;
        if (typeof options.log === "function") {
            this.log = options.log;
        } else if (options.log) {
            this.log = (message) => console.log("[toolwire]", message);
        } else {
            this.log = () => {};
        }
    }

    /**
     * `<Name>Request` with one field per parameter, numbered 1..N in parameter order
     */
    buildRequestMessage(fn: FunctionSpec): MessageSpec {
        const fields: FieldInit[] = [];
        for (const [name, type] of fn.args) {
            fields.push({
                name,
                ...fieldShapeFromTypeRef(type),
                defaultValue: fn.argDefaults.get(name),
                description: fn.argDescriptions.get(name),
            });
        }
        return createMessage(`${toPascalCase(fn.name)}Request`, fields);
    }

    /**
     * `<Name>Response` with a single `result` field, or no field for `void`
     */
    buildResponseMessage(fn: FunctionSpec): MessageSpec {
        const fields: FieldInit[] = fn.returnType
            ? [{ name: "result", ...fieldShapeFromTypeRef(fn.returnType), description: fn.returnDescription }]
            : [];
        return createMessage(`${toPascalCase(fn.name)}Response`, fields);
    }

    /**
     * Build and register the request and response messages of a callable and
     * return the method referencing them. Nothing is registered on failure.
     */
    synthesizeMethod(source: FunctionSpec | Callable): MethodSynthesis {
        const synthesis = this.buildMethod(toFunctionSpec(source));
        this.registry.register({ messages: [synthesis.request, synthesis.response] });
        this.log(`registered method ${synthesis.method.name}`);
        return synthesis;
    }

    /**
     * Build a service from a list of callables or the public methods of a class
     * and register it together with all its messages, atomically.
     *
     * A class uses its own name unless `name` is given; a list of callables needs a name.
     */
    synthesizeService(source: ClassDeclaration | Array<FunctionSpec | Callable>, name?: string): ServiceSpec {
        let serviceName: string;
        let description: string | undefined;
        let specs: FunctionSpec[];

        if (Array.isArray(source)) {
            if (!name) {
                throw new ToolwireError("A service built from functions needs a name");
            }
            serviceName = name;
            specs = source.map(toFunctionSpec);
        } else {
            const classSpec = analyzeClass(source, name, {
                onSkip: (method, error) => this.log(`skipping method ${method}: ${error.message}`),
            });
            serviceName = classSpec.name;
            description = classSpec.description || undefined;
            specs = classSpec.methods;
        }

        const syntheses = specs.map((spec) => this.buildMethod(spec));
        const service = createService(
            serviceName,
            syntheses.map((s) => s.method),
            description,
        );

        this.registry.register({
            messages: syntheses.flatMap((s) => [s.request, s.response]),
            services: [service],
        });
        this.log(`registered service ${service.name} with ${service.methods.length} method(s)`);
        return service;
    }

    /**
     * One-method service for a single callable, named `<Name>Service` by default
     */
    synthesizeFunctionService(source: FunctionSpec | Callable, name?: string): ServiceSpec {
        const spec = toFunctionSpec(source);
        return this.synthesizeService([spec], name ?? `${toPascalCase(spec.name)}Service`);
    }

    /**
     * Register a message built from the properties of an interface, class or object type alias
     */
    synthesizeMessage(declaration: MessageDeclaration): MessageSpec {
        const message = messageFromDeclaration(declaration);
        this.registry.register({ messages: [message] });
        this.log(`registered message ${message.name}`);
        return message;
    }

    /**
     * Register an enum. Numeric members keep their values; string members take
     * the next number after the highest one in use, in declaration order.
     *
     * The zero member is moved first. An enum without one gets a leading
     * `<NAME>_UNSPECIFIED = 0` member, since proto3 enums open with zero.
     */
    synthesizeEnum(declaration: EnumDeclaration): EnumSpec {
        const members = declaration.getMembers().map((member) => ({ name: member.getName(), value: member.getValue() }));
        let next = Math.max(-1, ...members.flatMap((m) => (typeof m.value === "number" ? [m.value] : []))) + 1;

        const entries = members.map((m): [string, number] => [m.name, typeof m.value === "number" ? m.value : next++]);
        const zero = entries.findIndex(([, value]) => value === 0);
        if (zero >= 0) {
            entries.unshift(...entries.splice(zero, 1));
        } else {
            entries.unshift([`${camelToSnake(declaration.getName()).toUpperCase()}_UNSPECIFIED`, 0]);
        }

        const spec = createEnum(declaration.getName(), Object.fromEntries(entries), docDescription(declaration));
        this.registry.register({ enums: [spec] });
        this.log(`registered enum ${spec.name}`);
        return spec;
    }

    /**
     * Render the registry to schema text
     */
    render(): string {
        return renderFile(this.registry);
    }

    private buildMethod(fn: FunctionSpec): MethodSynthesis {
        const request = this.buildRequestMessage(fn);
        const response = this.buildResponseMessage(fn);
        const method = createMethod({
            name: fn.name,
            inputType: request.name,
            outputType: response.name,
            clientStreaming: false,
            serverStreaming: fn.isGenerator,
            options: fn.deprecated ? { deprecated: true } : {},
            description: fn.description || undefined,
        });
        return { request, response, method };
    }
}

function isFunctionSpec(source: FunctionSpec | Callable): source is FunctionSpec {
    return "args" in source && source.args instanceof Map;
}

function toFunctionSpec(source: FunctionSpec | Callable): FunctionSpec {
    return isFunctionSpec(source) ? source : analyzeFunction(source);
}

function messageFromDeclaration(declaration: MessageDeclaration): MessageSpec {
    const name = declaration.getName();
    if (!name) {
        throw new UnsupportedAnnotationError(declaration.getText().slice(0, 40), "anonymous declarations need a name");
    }

    let members: Array<PropertySignature | PropertyDeclaration>;
    if (Node.isTypeAliasDeclaration(declaration)) {
        const typeNode = declaration.getTypeNode();
        if (!Node.isTypeLiteral(typeNode)) {
            throw new UnsupportedAnnotationError(declaration.getText(), "only object type aliases become messages");
        }
        members = typeNode.getProperties();
    } else if (Node.isInterfaceDeclaration(declaration)) {
        members = declaration.getProperties();
    } else {
        members = declaration
            .getProperties()
            .filter((property) => !property.isStatic() && property.getScope() === Scope.Public);
    }

    const fields: FieldInit[] = members.map((property): FieldInit => {
        const propertyName = property.getName();
        const typeNode = property.getTypeNode();
        if (!typeNode) {
            throw new MissingAnnotationError(name, propertyName);
        }
        let type = typeRefFromAnnotation(typeNode);
        if (property.hasQuestionToken() && type.kind !== "optional") {
            type = { kind: "optional", of: type };
        }
        return {
            name: propertyName,
            ...fieldShapeFromTypeRef(type),
            description: docDescription(property),
            options: property.getJsDocs().some((doc) => doc.getTags().some((tag) => tag.getTagName() === "deprecated"))
                ? { deprecated: true }
                : {},
        };
    });

    return createMessage(name, fields, { description: docDescription(declaration) });
}

function docDescription(node: { getJsDocs(): Array<{ getDescription(): string }> }): string | undefined {
    const docs = node.getJsDocs();
    const text = docs[docs.length - 1]?.getDescription().trim();
    return text || undefined;
}

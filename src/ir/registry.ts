/**
 * Descriptor registry
 *
 * Owns the messages, enums and services of one conversion session, in
 * registration order. Messages, enums, services and top-level enum values
 * share one namespace.
 * A registry is not safe for concurrent registration; give each converter its
 * own instance.
 */
import { DuplicateNameError } from "../errors";
import type { EnumSpec, MessageSpec, RegistrySnapshot, ServiceSpec } from "./types";

export interface RegistrationBatch {
    messages?: MessageSpec[];
    enums?: EnumSpec[];
    services?: ServiceSpec[];
}

export type ResolvedType =
    | { kind: "message"; fullName: string; spec: MessageSpec }
    | { kind: "enum"; fullName: string; spec: EnumSpec };

export class DescriptorRegistry {
    private readonly messages = new Map<string, MessageSpec>();
    private readonly enums = new Map<string, EnumSpec>();
    private readonly services = new Map<string, ServiceSpec>();
    private readonly enumValues = new Set<string>();

    constructor(readonly packageName?: string) {}

    /**
     * Register a batch of descriptors. Either everything is registered or,
     * on a name collision, nothing is.
     */
    register(batch: RegistrationBatch): void {
        const pending = new Set<string>();
        const claim = (kind: string, name: string) => {
            if (this.has(name) || this.enumValues.has(name) || pending.has(name)) {
                throw new DuplicateNameError(kind, name);
            }
            pending.add(name);
        };

        batch.enums?.forEach((spec) => claim("Enum", spec.name));
        batch.messages?.forEach((spec) => claim("Message", spec.name));
        batch.services?.forEach((spec) => claim("Service", spec.name));
        // Enum values live in the package scope beside the enum itself
        batch.enums?.forEach((spec) => Object.keys(spec.values).forEach((value) => claim(`Enum value of ${spec.name}`, value)));

        batch.enums?.forEach((spec) => {
            this.enums.set(spec.name, spec);
            Object.keys(spec.values).forEach((value) => this.enumValues.add(value));
        });
        batch.messages?.forEach((spec) => this.messages.set(spec.name, spec));
        batch.services?.forEach((spec) => this.services.set(spec.name, spec));
    }

    addMessage(spec: MessageSpec): void {
        this.register({ messages: [spec] });
    }

    addEnum(spec: EnumSpec): void {
        this.register({ enums: [spec] });
    }

    addService(spec: ServiceSpec): void {
        this.register({ services: [spec] });
    }

    has(name: string): boolean {
        return this.messages.has(name) || this.enums.has(name) || this.services.has(name);
    }

    getMessage(name: string): MessageSpec | undefined {
        return this.messages.get(name);
    }

    getEnum(name: string): EnumSpec | undefined {
        return this.enums.get(name);
    }

    getService(name: string): ServiceSpec | undefined {
        return this.services.get(name);
    }

    listMessages(): MessageSpec[] {
        return [...this.messages.values()];
    }

    listEnums(): EnumSpec[] {
        return [...this.enums.values()];
    }

    listServices(): ServiceSpec[] {
        return [...this.services.values()];
    }

    get size(): number {
        return this.messages.size + this.enums.size + this.services.size;
    }

    /**
     * Fully qualified name, prefixed with the package when one is set
     */
    fullName(name: string): string {
        return this.packageName ? `${this.packageName}.${name}` : name;
    }

    /**
     * Resolve a message or enum reference.
     *
     * `scope` is the chain of enclosing messages, outermost first. The
     * reference is looked up in the innermost scope first, then outwards, then
     * among top-level types. Dotted names (`Outer.Inner`) walk nested types.
     */
    resolve(reference: string, scope: readonly MessageSpec[] = []): ResolvedType | undefined {
        const [head = "", ...rest] = reference.split(".");

        for (let depth = scope.length; depth >= 0; depth--) {
            const enclosing = scope.slice(0, depth);
            const parent = enclosing[enclosing.length - 1];
            const candidates = parent ? nestedTypes(parent) : this.topLevelTypes();
            const found = candidates.get(head);
            if (!found) continue;

            const prefix = [...enclosing.map((m) => m.name), head];
            return walk(found, rest, prefix, (name) => this.fullName(name));
        }

        return undefined;
    }

    snapshot(): RegistrySnapshot {
        return {
            syntax: "proto3",
            ...(this.packageName ? { package: this.packageName } : {}),
            enums: this.listEnums(),
            messages: this.listMessages(),
            services: this.listServices(),
        };
    }

    private topLevelTypes(): Map<string, MessageSpec | EnumSpec> {
        return new Map<string, MessageSpec | EnumSpec>([...this.enums, ...this.messages]);
    }
}

function nestedTypes(message: MessageSpec): Map<string, MessageSpec | EnumSpec> {
    const types = new Map<string, MessageSpec | EnumSpec>();
    message.nestedEnums.forEach((spec) => types.set(spec.name, spec));
    message.nestedMessages.forEach((spec) => types.set(spec.name, spec));
    return types;
}

function isMessageSpec(spec: MessageSpec | EnumSpec): spec is MessageSpec {
    return "fields" in spec;
}

function walk(
    spec: MessageSpec | EnumSpec,
    rest: string[],
    path: string[],
    qualify: (name: string) => string,
): ResolvedType | undefined {
    const [next, ...remaining] = rest;
    if (next === undefined) {
        const fullName = qualify(path.join("."));
        return isMessageSpec(spec) ? { kind: "message", fullName, spec } : { kind: "enum", fullName, spec };
    }
    if (!isMessageSpec(spec)) return undefined;

    const child = nestedTypes(spec).get(next);
    return child ? walk(child, remaining, [...path, next], qualify) : undefined;
}

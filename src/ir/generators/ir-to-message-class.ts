/**
 * Descriptor model to runtime message class builder
 *
 * A generated class stores its values in a field bag and dispatches every
 * access through an accessor bound to the field's descriptor.
 */
import {
    FieldTypeError,
    InvalidEnumValueError,
    RequiredFieldError,
    UnknownFieldError,
    UnresolvedReferenceError,
} from "../../errors";
import { DescriptorRegistry } from "../registry";
import { defaultFor } from "../type-mapper";
import type { EnumSpec, FieldSpec, MessageSpec, ScalarType, ValueTypeRef } from "../types";

export type MessageFields = Readonly<Record<string, unknown>>;

/**
 * Name to number and number to name table, shaped like a TypeScript numeric enum
 */
export type EnumType = Readonly<Record<string, string | number>>;

export interface MessageClass {
    new (init?: MessageFields): DynamicMessage;
    readonly descriptor: MessageSpec;
    readonly fullName: string;
    readonly nestedTypes: Readonly<Record<string, MessageClass>>;
    readonly nestedEnums: Readonly<Record<string, EnumType>>;
}

export interface BuildMessageClassOptions {
    /** Registry used to resolve references that are not nested in the message */
    registry?: DescriptorRegistry;
    /** Package prefix of full names; defaults to the registry's package */
    packageName?: string;
}

interface ValueCoercer {
    coerce(value: unknown): unknown;
    zero: unknown;
}

interface FieldAccessor {
    readonly field: FieldSpec;
    defaultValue(): unknown;
    coerce(value: unknown): unknown;
}

/**
 * Base of every generated message class
 */
export class DynamicMessage {
    private readonly values = new Map<string, unknown>();
    private readonly pending: Map<string, unknown>;

    constructor(
        private readonly messageName: string,
        private readonly accessors: ReadonlyMap<string, FieldAccessor>,
        init: MessageFields = {},
    ) {
        this.pending = new Map(Object.entries(init));
    }

    get(name: string): unknown {
        const accessor = this.accessor(name);
        this.flush(name);
        return this.values.has(name) ? this.values.get(name) : accessor.defaultValue();
    }

    set(name: string, value: unknown): void {
        const accessor = this.accessor(name);

        if (value === null || value === undefined) {
            if (accessor.field.label === "required") {
                throw new RequiredFieldError(this.path(name));
            }
            this.pending.delete(name);
            this.values.delete(name);
            return;
        }

        const coerced = accessor.coerce(value);
        this.pending.delete(name);
        this.values.set(name, coerced);
    }

    delete(name: string): void {
        this.accessor(name);
        this.pending.delete(name);
        this.values.delete(name);
    }

    /**
     * Whether a value has been assigned, either by `set` or by the initializer
     */
    has(name: string): boolean {
        this.accessor(name);
        return this.values.has(name) || this.pending.get(name) != null;
    }

    /**
     * Validate every initializer entry that has not been read yet
     */
    validate(): void {
        for (const name of [...this.pending.keys()]) {
            this.flush(name);
        }
    }

    /**
     * Plain object of the fields that hold a value; nested messages are converted too
     */
    toObject(): Record<string, unknown> {
        this.validate();
        const result: Record<string, unknown> = {};
        for (const name of this.accessors.keys()) {
            if (this.values.has(name)) {
                result[name] = plain(this.values.get(name));
            }
        }
        return result;
    }

    private accessor(name: string): FieldAccessor {
        const accessor = this.accessors.get(name);
        if (!accessor) {
            throw new UnknownFieldError(this.messageName, name);
        }
        return accessor;
    }

    private flush(name: string): void {
        if (this.pending.has(name)) {
            this.set(name, this.pending.get(name));
        }
    }

    private path(name: string): string {
        return `${this.messageName}.${name}`;
    }
}

/**
 * Build a runtime class for a message descriptor.
 *
 * Nested enums and messages are built first. References resolve through the
 * enclosing messages, then the registry; classes for registry messages are
 * built on first use. Built types live only as long as the returned class.
 */
export function buildMessageClass(spec: MessageSpec, options: BuildMessageClassOptions = {}): MessageClass {
    const packageName = options.packageName ?? options.registry?.packageName;
    const lookup = new DescriptorRegistry(packageName);
    lookup.register({
        enums: options.registry?.listEnums().filter((e) => e.name !== spec.name),
        messages: [spec, ...(options.registry?.listMessages().filter((m) => m.name !== spec.name) ?? [])],
    });
    return new ClassBuilder(lookup).messageClass(spec, []);
}

/**
 * Frozen name/number table of an enum
 */
export function buildEnumType(spec: EnumSpec): EnumType {
    const table: Record<string, string | number> = {};
    for (const [name, value] of Object.entries(spec.values)) {
        table[name] = value;
        table[String(value)] = name;
    }
    return Object.freeze(table);
}

class ClassBuilder {
    private readonly classes = new Map<string, MessageClass>();

    constructor(private readonly lookup: DescriptorRegistry) {}

    messageClass(spec: MessageSpec, scope: readonly MessageSpec[]): MessageClass {
        const chain = [...scope, spec];
        const fullName = this.lookup.fullName(chain.map((m) => m.name).join("."));
        const cached = this.classes.get(fullName);
        if (cached) return cached;

        const nestedEnums: Record<string, EnumType> = {};
        for (const nested of spec.nestedEnums) {
            nestedEnums[nested.name] = buildEnumType(nested);
        }
        const nestedTypes: Record<string, MessageClass> = {};
        for (const nested of spec.nestedMessages) {
            nestedTypes[nested.name] = this.messageClass(nested, chain);
        }

        const accessors = new Map<string, FieldAccessor>();
        for (const field of spec.fields) {
            accessors.set(field.name, this.accessorFor(field, chain));
        }

        const Generated = class extends DynamicMessage {
            static readonly descriptor = spec;
            static readonly fullName = fullName;
            static readonly nestedTypes = Object.freeze(nestedTypes);
            static readonly nestedEnums = Object.freeze(nestedEnums);

            constructor(init?: MessageFields) {
                super(spec.name, accessors, init);
            }
        };
        Object.defineProperty(Generated, "name", { value: spec.name });

        this.classes.set(fullName, Generated);
        return Generated;
    }

    private accessorFor(field: FieldSpec, scope: readonly MessageSpec[]): FieldAccessor {
        const path = `${scope[scope.length - 1]?.name ?? ""}.${field.name}`;
        const { coerce: coerceValue, zero } = this.valueCoercer(path, field.type, scope);

        const coerce = (value: unknown): unknown => {
            if (field.keyType) {
                return coerceMap(path, value, coerceValue);
            }
            if (field.label === "repeated") {
                if (!Array.isArray(value)) {
                    throw new FieldTypeError(path, "an array", value);
                }
                return value.map(coerceValue);
            }
            return coerceValue(value);
        };

        const defaultValue = (): unknown => {
            if (field.keyType) return {};
            if (field.label === "repeated") return [];
            return field.defaultValue ?? zero;
        };

        return { field, coerce, defaultValue };
    }

    /**
     * Coercion and zero value of a field's value type. An enum's zero value is
     * its first member.
     */
    private valueCoercer(path: string, type: ValueTypeRef, scope: readonly MessageSpec[]): ValueCoercer {
        if (type.kind === "primitive") {
            return { coerce: (value) => coerceScalar(path, type.type, value), zero: defaultFor(type) };
        }

        const resolved = this.lookup.resolve(type.name, scope);
        if (!resolved || resolved.kind !== type.kind) {
            throw new UnresolvedReferenceError(type.name, `field ${path}`);
        }

        if (resolved.kind === "enum") {
            const values = resolved.spec.values;
            const [first] = Object.values(values);
            return { coerce: (value) => coerceEnum(path, values, value), zero: first ?? defaultFor(type) };
        }

        const target = this.chainOf(resolved.fullName);
        const coerce = (value: unknown): unknown => {
            const Target = this.messageClass(target.spec, target.scope);
            if (value instanceof Target) return value;
            if (!isPlainObject(value)) {
                throw new FieldTypeError(path, `a ${Target.descriptor.name} message`, value);
            }
            const instance = new Target();
            for (const [key, entry] of Object.entries(value)) {
                instance.set(key, entry);
            }
            return instance;
        };
        return { coerce, zero: defaultFor(type) };
    }

    /**
     * Enclosing messages of a resolved message, from its full name
     */
    private chainOf(fullName: string): { spec: MessageSpec; scope: MessageSpec[] } {
        const prefix = this.lookup.packageName ? `${this.lookup.packageName}.` : "";
        const [top = "", ...rest] = fullName.slice(prefix.length).split(".");

        let spec = this.lookup.getMessage(top);
        const scope: MessageSpec[] = [];
        for (const name of rest) {
            const parent = spec;
            spec = parent?.nestedMessages.find((m) => m.name === name);
            if (parent) scope.push(parent);
        }
        if (!spec) {
            throw new UnresolvedReferenceError(fullName, "message class builder");
        }
        return { spec, scope };
    }
}

const INT_RANGES: Partial<Record<ScalarType, readonly [number, number]>> = {
    int32: [-2_147_483_648, 2_147_483_647],
    uint32: [0, 4_294_967_295],
    int64: [Number.MIN_SAFE_INTEGER, Number.MAX_SAFE_INTEGER],
    uint64: [0, Number.MAX_SAFE_INTEGER],
};

function coerceScalar(path: string, type: ScalarType, value: unknown): unknown {
    switch (type) {
        case "string":
            if (typeof value === "string") return value;
            if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
                return String(value);
            }
            throw new FieldTypeError(path, "a string", value);

        case "bool":
            if (typeof value === "boolean") return value;
            if (typeof value === "number") return value !== 0;
            throw new FieldTypeError(path, "a boolean", value);

        case "float":
        case "double":
            if (typeof value === "number") return value;
            if (typeof value === "string" && value.trim() !== "" && !Number.isNaN(Number(value))) {
                return Number(value);
            }
            throw new FieldTypeError(path, `a ${type}`, value);

        case "bytes":
            if (value instanceof Uint8Array) return value;
            if (typeof value === "string") return new TextEncoder().encode(value);
            if (Array.isArray(value) && value.every(isByte)) return Uint8Array.from(value);
            throw new FieldTypeError(path, "bytes", value);

        default:
            return coerceInteger(path, type, value);
    }
}

function coerceInteger(path: string, type: ScalarType, value: unknown): number {
    let result: number | undefined;
    if (typeof value === "number" && Number.isFinite(value)) {
        result = Math.trunc(value);
    } else if (typeof value === "string" && /^[+-]?\d+$/.test(value.trim())) {
        result = Number(value.trim());
    } else if (typeof value === "boolean") {
        result = value ? 1 : 0;
    } else if (typeof value === "bigint" && value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)) {
        result = Number(value);
    }

    const [min, max] = INT_RANGES[type] ?? [Number.MIN_SAFE_INTEGER, Number.MAX_SAFE_INTEGER];
    if (result === undefined || result < min || result > max) {
        throw new FieldTypeError(path, `an ${type}`, value);
    }
    // normalize -0 from truncation
    return result === 0 ? 0 : result;
}

function coerceEnum(path: string, values: Readonly<Record<string, number>>, value: unknown): number {
    if (typeof value === "string") {
        const number = Object.prototype.hasOwnProperty.call(values, value) ? values[value] : undefined;
        if (number === undefined) {
            throw new InvalidEnumValueError(path, value);
        }
        return number;
    }
    if (typeof value === "number") {
        if (!Object.values(values).includes(value)) {
            throw new InvalidEnumValueError(path, value);
        }
        return value;
    }
    throw new FieldTypeError(path, "an enum name or number", value);
}

function coerceMap(path: string, value: unknown, coerceValue: (value: unknown) => unknown): Record<string, unknown> {
    let entries: Array<[unknown, unknown]>;
    if (value instanceof Map) {
        entries = [...value.entries()];
    } else if (isPlainObject(value)) {
        entries = Object.entries(value);
    } else {
        throw new FieldTypeError(path, "an object with string keys", value);
    }

    const result: Record<string, unknown> = {};
    for (const [key, entry] of entries) {
        if (typeof key !== "string") {
            throw new FieldTypeError(`${path} key`, "a string", key);
        }
        // a plain assignment of "__proto__" would replace the prototype
        Object.defineProperty(result, key, { value: coerceValue(entry), enumerable: true, writable: true, configurable: true });
    }
    return result;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    if (typeof value !== "object" || value === null) return false;
    const prototype: unknown = Object.getPrototypeOf(value);
    return prototype === Object.prototype || prototype === null;
}

function isByte(value: unknown): value is number {
    return typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= 255;
}

function plain(value: unknown): unknown {
    if (value instanceof DynamicMessage) return value.toObject();
    if (Array.isArray(value)) return value.map(plain);
    if (isPlainObject(value)) {
        return Object.fromEntries(Object.entries(value).map(([key, entry]) => [key, plain(entry)]));
    }
    return value;
}

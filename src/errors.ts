/**
 * Error taxonomy for schema analysis, synthesis, rendering and message access.
 *
 * Every error carries the offending name or type so callers can fix the input.
 */
export class ToolwireError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/** A parameter or return type has no explicit annotation. */
export class MissingAnnotationError extends ToolwireError {
    constructor(
        readonly callable: string,
        readonly parameter?: string,
    ) {
        super(
            parameter
                ? `Parameter "${parameter}" of ${callable} must have a type annotation`
                : `Function ${callable} must have a return type annotation`,
        );
    }
}

/** A leaf type has no schema mapping. */
export class UnsupportedTypeError extends ToolwireError {
    constructor(readonly typeText: string) {
        super(`Unsupported type: ${typeText}`);
    }
}

/** A compound annotation (union, generic, tuple, inline object) has no schema shape. */
export class UnsupportedAnnotationError extends ToolwireError {
    constructor(
        readonly annotation: string,
        reason?: string,
    ) {
        super(`Unsupported type annotation: ${annotation}${reason ? ` (${reason})` : ""}`);
    }
}

export class InvalidMapKeyError extends ToolwireError {
    constructor(
        readonly annotation: string,
        readonly keyType: string,
    ) {
        super(`Map keys must be strings, got ${keyType} in ${annotation}`);
    }
}

export class DuplicateNameError extends ToolwireError {
    constructor(
        readonly kind: string,
        readonly duplicateName: string,
    ) {
        super(`${kind} ${duplicateName} already exists`);
    }
}

export class UnresolvedReferenceError extends ToolwireError {
    constructor(
        readonly reference: string,
        readonly context: string,
    ) {
        super(`Unresolved type reference "${reference}" in ${context}`);
    }
}

export class InvalidEnumValueError extends ToolwireError {
    constructor(
        readonly field: string,
        readonly value: string | number,
    ) {
        super(
            typeof value === "string"
                ? `Invalid enum value '${value}' for field ${field}`
                : `Invalid enum value ${value} for field ${field}`,
        );
    }
}

/** An enum has no values or does not open with zero. */
export class InvalidEnumError extends ToolwireError {
    constructor(
        readonly enumName: string,
        readonly reason: string,
    ) {
        super(`Invalid enum ${enumName}: ${reason}`);
    }
}

export class RequiredFieldError extends ToolwireError {
    constructor(readonly field: string) {
        super(`Field ${field} is required`);
    }
}

/** A value cannot be coerced to a field's type. */
export class FieldTypeError extends ToolwireError {
    constructor(
        readonly field: string,
        readonly expected: string,
        readonly received: unknown,
    ) {
        super(`Field ${field} must be ${expected}, got ${describeValue(received)}`);
    }
}

export class UnknownFieldError extends ToolwireError {
    constructor(
        readonly messageName: string,
        readonly field: string,
    ) {
        super(`Message ${messageName} has no field ${field}`);
    }
}

export class InvalidIdentifierError extends ToolwireError {
    constructor(
        readonly kind: string,
        readonly identifier: string,
    ) {
        super(`Invalid ${kind} name "${identifier}"`);
    }
}

export class InvalidFieldNumberError extends ToolwireError {
    constructor(
        readonly messageName: string,
        readonly field: string,
        readonly fieldNumber: number,
    ) {
        super(`Field ${field} of ${messageName} has invalid or duplicate number ${fieldNumber}`);
    }
}

export class UnknownArgumentError extends ToolwireError {
    constructor(
        readonly tool: string,
        readonly argument: string,
    ) {
        super(`Argument '${argument}' described but not found in the signature of ${tool}`);
    }
}

function describeValue(value: unknown): string {
    if (value === null) return "null";
    if (Array.isArray(value)) return "array";
    if (value instanceof Uint8Array) return "Uint8Array";
    if (typeof value === "string") return `string "${value}"`;
    if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
        return `${typeof value} ${String(value)}`;
    }
    return typeof value;
}

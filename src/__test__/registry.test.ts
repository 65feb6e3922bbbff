import { describe, expect, it } from "vitest";

import { DuplicateNameError, InvalidEnumError, InvalidFieldNumberError, InvalidIdentifierError } from "../errors";
import { DescriptorRegistry } from "../ir/registry";
import {
    createEnum,
    createMessage,
    createMethod,
    createPrimitive,
    createService,
    typeRefToString,
    createMap,
    createOptional,
    createRepeated,
    createMessageRef,
} from "../ir/utils";

const string = createPrimitive("string");

describe("createMessage", () => {
    it("should number fields 1..N in declaration order", () => {
        const message = createMessage("Query", [
            { name: "text", type: string },
            { name: "page", type: createPrimitive("int32") },
        ]);

        expect(message.fields.map((f) => [f.name, f.number])).toEqual([
            ["text", 1],
            ["page", 2],
        ]);
    });

    it("should continue after the highest explicit number", () => {
        const message = createMessage("Query", [
            { name: "text", type: string },
            { name: "page", type: string, number: 7 },
            { name: "size", type: string },
        ]);

        expect(message.fields.map((f) => f.number)).toEqual([8, 7, 9]);
    });

    it("should freeze fields so numbers cannot change", () => {
        const message = createMessage("Query", [{ name: "text", type: string }]);

        expect(Object.isFrozen(message)).toBe(true);
        expect(Object.isFrozen(message.fields[0])).toBe(true);
    });

    it("should reject duplicate field names and numbers", () => {
        expect(() =>
            createMessage("Query", [
                { name: "text", type: string },
                { name: "text", type: string },
            ]),
        ).toThrow("Field of Query text already exists");
        expect(() =>
            createMessage("Query", [
                { name: "a", type: string, number: 2 },
                { name: "b", type: string, number: 2 },
            ]),
        ).toThrow(InvalidFieldNumberError);
        expect(() => createMessage("Query", [{ name: "a", type: string, number: 0 }])).toThrow(InvalidFieldNumberError);
    });

    it("should reject invalid identifiers", () => {
        expect(() => createMessage("2fast", [])).toThrow(InvalidIdentifierError);
        expect(() => createMessage("Query", [{ name: "page-size", type: string }])).toThrow('Invalid field name "page-size"');
    });
});

describe("createEnum and createService", () => {
    it("should reject duplicate enum numbers", () => {
        expect(() => createEnum("Status", { Active: 0, Running: 0 })).toThrow(DuplicateNameError);
    });

    it("should require enums to open with zero", () => {
        expect(() => createEnum("Priority", { Low: 1, High: 2 })).toThrow(
            "Invalid enum Priority: the first value must be 0, got Low = 1",
        );
        expect(() => createEnum("Empty", {})).toThrow(InvalidEnumError);
    });

    it("should reject nested enum values that clash with sibling names", () => {
        const kind = createEnum("Kind", { Line: 0 });
        const tier = createEnum("Tier", { Basic: 0 });

        expect(() =>
            createMessage("Order", [], { nestedEnums: [kind], nestedMessages: [createMessage("Line", [])] }),
        ).toThrow("Enum value of Order.Kind Line already exists");
        expect(() =>
            createMessage("Order", [], { nestedEnums: [tier, createEnum("Plan", { Basic: 0 })] }),
        ).toThrow(DuplicateNameError);
    });

    it("should reject duplicate method names", () => {
        const method = createMethod({ name: "run", inputType: "RunRequest", outputType: "RunResponse" });

        expect(() => createService("Runner", [method, method])).toThrow("Method of Runner run already exists");
    });
});

describe("typeRefToString", () => {
    it("should describe nested references", () => {
        expect(typeRefToString(createRepeated(createOptional(string)))).toBe("repeated<optional<string>>");
        expect(typeRefToString(createMap(createMessageRef("User")))).toBe("map<string, User>");
    });
});

describe("DescriptorRegistry", () => {
    it("should keep registration order", () => {
        const registry = new DescriptorRegistry();
        registry.addMessage(createMessage("B", []));
        registry.addMessage(createMessage("A", []));

        expect(registry.listMessages().map((m) => m.name)).toEqual(["B", "A"]);
    });

    it("should reject a duplicate and keep the first registration", () => {
        const registry = new DescriptorRegistry();
        const first = createMessage("User", [{ name: "name", type: string }]);
        registry.addMessage(first);

        expect(() => registry.addMessage(createMessage("User", []))).toThrow("Message User already exists");
        expect(registry.getMessage("User")).toBe(first);
    });

    it("should share one namespace between messages, enums and services", () => {
        const registry = new DescriptorRegistry();
        registry.addEnum(createEnum("Status", { Active: 0 }));

        expect(() => registry.addMessage(createMessage("Status", []))).toThrow(DuplicateNameError);
        expect(() => registry.addService(createService("Status", []))).toThrow(DuplicateNameError);
    });

    it("should keep enum value names unique across the package", () => {
        const registry = new DescriptorRegistry();
        registry.addEnum(createEnum("Status", { Active: 0, Closed: 1 }));

        expect(() => registry.addEnum(createEnum("UserState", { Active: 0, Banned: 1 }))).toThrow(
            "Enum value of UserState Active already exists",
        );
        expect(() => registry.addMessage(createMessage("Closed", []))).toThrow("Message Closed already exists");
        expect(registry.listEnums().map((e) => e.name)).toEqual(["Status"]);
        expect(registry.size).toBe(1);
    });

    it("should register batches atomically", () => {
        const registry = new DescriptorRegistry();
        registry.addMessage(createMessage("Taken", []));

        expect(() =>
            registry.register({ messages: [createMessage("Fresh", []), createMessage("Taken", [])] }),
        ).toThrow(DuplicateNameError);
        expect(registry.has("Fresh")).toBe(false);
        expect(() => registry.register({ messages: [createMessage("Twice", []), createMessage("Twice", [])] })).toThrow(
            DuplicateNameError,
        );
        expect(registry.size).toBe(1);
    });

    it("should prefix full names with the package", () => {
        expect(new DescriptorRegistry("acme.tools").fullName("User")).toBe("acme.tools.User");
        expect(new DescriptorRegistry().fullName("User")).toBe("User");
    });

    it("should resolve nested scopes before top-level types", () => {
        const innerStatus = createEnum("Status", { Open: 0 });
        const order = createMessage("Order", [], { nestedEnums: [innerStatus] });
        const registry = new DescriptorRegistry("shop");
        registry.addEnum(createEnum("Status", { Active: 0 }));
        registry.addMessage(order);

        expect(registry.resolve("Status", [order])).toEqual({ kind: "enum", fullName: "shop.Order.Status", spec: innerStatus });
        expect(registry.resolve("Status")?.fullName).toBe("shop.Status");
        expect(registry.resolve("Order.Status")?.spec).toBe(innerStatus);
        expect(registry.resolve("Missing")).toBeUndefined();
        expect(registry.resolve("Order.Missing")).toBeUndefined();
    });

    it("should snapshot its contents", () => {
        const registry = new DescriptorRegistry("shop");
        registry.addEnum(createEnum("Status", { Active: 0 }));

        expect(registry.snapshot()).toEqual({
            syntax: "proto3",
            package: "shop",
            enums: [{ name: "Status", values: { Active: 0 } }],
            messages: [],
            services: [],
        });
    });
});

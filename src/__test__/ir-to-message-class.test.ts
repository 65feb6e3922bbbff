import { describe, expect, it } from "vitest";

import {
    FieldTypeError,
    InvalidEnumValueError,
    RequiredFieldError,
    UnknownFieldError,
    UnresolvedReferenceError,
} from "../errors";
import { buildEnumType, buildMessageClass } from "../ir/generators/ir-to-message-class";
import { DescriptorRegistry } from "../ir/registry";
import { createEnum, createMessage, createPrimitive } from "../ir/utils";

const string = createPrimitive("string");
const int32 = createPrimitive("int32");

function shop() {
    const registry = new DescriptorRegistry("shop");
    registry.addEnum(createEnum("Status", { ACTIVE: 0, PAUSED: 1 }));
    registry.addMessage(
        createMessage("Line", [
            { name: "sku", type: string },
            { name: "qty", type: int32 },
        ]),
    );
    registry.addMessage(
        createMessage(
            "Order",
            [
                { name: "id", type: string, label: "required" },
                { name: "n", type: int32 },
                { name: "counts", type: int32, label: "repeated" },
                { name: "lines", type: { kind: "message", name: "Line" }, label: "repeated" },
                { name: "status", type: { kind: "enum", name: "Status" } },
                { name: "kind", type: { kind: "enum", name: "Kind" } },
                { name: "meta", type: { kind: "message", name: "Meta" } },
                { name: "labels", type: int32, label: "repeated", keyType: "string" },
                { name: "payload", type: createPrimitive("bytes") },
                { name: "score", type: createPrimitive("double") },
                { name: "flag", type: createPrimitive("bool") },
                { name: "note", type: string, defaultValue: "none" },
            ],
            {
                nestedEnums: [createEnum("Kind", { STANDARD: 0, RUSH: 1 })],
                nestedMessages: [createMessage("Meta", [{ name: "source", type: string }])],
            },
        ),
    );
    return registry;
}

function orderClass() {
    const registry = shop();
    const spec = registry.getMessage("Order");
    if (!spec) throw new Error("Order is not registered");
    return buildMessageClass(spec, { registry });
}

describe("buildMessageClass", () => {
    it("should expose the descriptor, full name and nested types", () => {
        const Order = orderClass();

        expect(Order.name).toBe("Order");
        expect(Order.fullName).toBe("shop.Order");
        expect(Order.descriptor.fields).toHaveLength(12);
        expect(Object.keys(Order.nestedTypes)).toEqual(["Meta"]);
        expect(Order.nestedTypes.Meta?.fullName).toBe("shop.Order.Meta");
        expect(Order.nestedEnums.Kind).toEqual({ STANDARD: 0, RUSH: 1, "0": "STANDARD", "1": "RUSH" });
    });

    it("should return defaults until a value is set", () => {
        const order = new (orderClass())();

        expect(order.get("n")).toBe(0);
        expect(order.get("id")).toBe("");
        expect(order.get("note")).toBe("none");
        expect(order.get("counts")).toEqual([]);
        expect(order.get("labels")).toEqual({});
        expect(order.get("meta")).toBeUndefined();
        expect(order.get("payload")).toEqual(new Uint8Array(0));
        expect(order.has("n")).toBe(false);
    });

    it("should set, read and delete a field", () => {
        const order = new (orderClass())();

        order.set("n", 5);
        expect(order.get("n")).toBe(5);
        expect(order.has("n")).toBe(true);

        order.delete("n");
        expect(order.get("n")).toBe(0);
        expect(order.has("n")).toBe(false);
    });

    it("should clear optional fields set to null and reject null for required ones", () => {
        const order = new (orderClass())({ id: "o-1", n: 3 });

        order.set("n", null);
        expect(order.has("n")).toBe(false);
        expect(() => order.set("id", null)).toThrow(RequiredFieldError);
        expect(() => order.set("id", undefined)).toThrow("Field Order.id is required");
        expect(order.get("id")).toBe("o-1");
    });

    it("should coerce scalars", () => {
        const order = new (orderClass())();

        order.set("id", 42);
        expect(order.get("id")).toBe("42");
        order.set("n", "12");
        expect(order.get("n")).toBe(12);
        order.set("n", 3.9);
        expect(order.get("n")).toBe(3);
        order.set("score", "1.5");
        expect(order.get("score")).toBe(1.5);
        order.set("flag", 1);
        expect(order.get("flag")).toBe(true);
        order.set("payload", "hi");
        expect(order.get("payload")).toEqual(new Uint8Array([104, 105]));
        order.set("payload", [1, 2]);
        expect(order.get("payload")).toEqual(new Uint8Array([1, 2]));
    });

    it("should reject values that cannot be coerced", () => {
        const order = new (orderClass())();

        expect(() => order.set("n", 2 ** 31)).toThrow(FieldTypeError);
        expect(() => order.set("n", "ten")).toThrow('Field Order.n must be an int32, got string "ten"');
        expect(() => order.set("score", "x")).toThrow(FieldTypeError);
        expect(() => order.set("flag", "yes")).toThrow(FieldTypeError);
        expect(() => order.set("payload", [300])).toThrow(FieldTypeError);
        expect(() => order.set("id", {})).toThrow("Field Order.id must be a string, got object");
    });

    it("should require arrays for repeated fields and coerce every element", () => {
        const order = new (orderClass())();

        expect(() => order.set("counts", 5)).toThrow("Field Order.counts must be an array, got number 5");
        order.set("counts", [1, "2", true]);
        expect(order.get("counts")).toEqual([1, 2, 1]);
    });

    it("should accept enum names and numbers", () => {
        const order = new (orderClass())();

        order.set("status", "PAUSED");
        expect(order.get("status")).toBe(1);
        order.set("status", 0);
        expect(order.get("status")).toBe(0);
        order.set("kind", "RUSH");
        expect(order.get("kind")).toBe(1);

        expect(() => order.set("status", "ARCHIVED")).toThrow(InvalidEnumValueError);
        expect(() => order.set("status", 7)).toThrow("Invalid enum value 7 for field Order.status");
        expect(() => order.set("status", true)).toThrow(FieldTypeError);
    });

    it("should convert plain objects into nested messages", () => {
        const Order = orderClass();
        const order = new Order({ meta: { source: "web" }, lines: [{ sku: "sku-1", qty: "2" }] });

        const meta = order.get("meta");
        expect(meta).toBeInstanceOf(Order.nestedTypes.Meta);
        expect(order.toObject()).toEqual({ meta: { source: "web" }, lines: [{ sku: "sku-1", qty: 2 }] });
        expect(() => order.set("meta", "web")).toThrow('Field Order.meta must be a Meta message, got string "web"');
    });

    it("should keep message instances as they are", () => {
        const Order = orderClass();
        const Meta = Order.nestedTypes.Meta;
        if (!Meta) throw new Error("Meta was not built");
        const meta = new Meta({ source: "app" });
        const order = new Order();

        order.set("meta", meta);
        expect(order.get("meta")).toBe(meta);
    });

    it("should accept maps and plain objects for map fields", () => {
        const order = new (orderClass())();

        order.set("labels", { a: 1, b: "2" });
        expect(order.get("labels")).toEqual({ a: 1, b: 2 });
        order.set("labels", new Map([["c", 3]]));
        expect(order.get("labels")).toEqual({ c: 3 });

        expect(() => order.set("labels", new Map([[1, 3]]))).toThrow("Field Order.labels key must be a string, got number 1");
        expect(() => order.set("labels", [1])).toThrow(FieldTypeError);
    });

    it("should keep map entries whose key is __proto__", () => {
        const order = new (orderClass())();

        order.set("labels", JSON.parse('{"__proto__": 7, "a": "1"}'));

        const labels = order.get("labels");
        expect(Object.entries(labels ?? {})).toEqual([
            ["__proto__", 7],
            ["a", 1],
        ]);
        expect(Object.getPrototypeOf(labels)).toBe(Object.prototype);
        expect(Object.entries(order.toObject().labels ?? {})).toEqual([
            ["__proto__", 7],
            ["a", 1],
        ]);
    });

    it("should validate initializer values when they are first used", () => {
        const Order = orderClass();
        const order = new Order({ n: "abc" });

        expect(order.has("n")).toBe(true);
        expect(() => order.get("n")).toThrow('Field Order.n must be an int32, got string "abc"');
        expect(() => new Order({ counts: "1" }).validate()).toThrow(FieldTypeError);
    });

    it("should not count nullish initializer entries as present", () => {
        const order = new (orderClass())({ n: undefined, note: null });

        expect(order.has("n")).toBe(false);
        expect(order.has("note")).toBe(false);
        expect(order.toObject()).toEqual({});
        expect(order.has("n")).toBe(false);
    });

    it("should default enum fields to their first member", () => {
        const order = new (orderClass())();

        expect(order.get("status")).toBe(0);
        expect(order.get("kind")).toBe(0);
        order.set("kind", order.get("kind"));
        expect(order.toObject()).toEqual({ kind: 0 });
    });

    it("should reject unknown fields", () => {
        const Order = orderClass();

        expect(() => new Order().get("bogus")).toThrow(UnknownFieldError);
        expect(() => new Order().set("bogus", 1)).toThrow("Message Order has no field bogus");
        expect(() => new Order({ bogus: 1 }).validate()).toThrow(UnknownFieldError);
    });

    it("should only include fields that hold a value in toObject", () => {
        const order = new (orderClass())({ id: "o-1", status: "PAUSED" });
        order.set("n", 0);

        expect(order.toObject()).toEqual({ id: "o-1", n: 0, status: 1 });
    });

    it("should support recursive messages", () => {
        const node = createMessage("Node", [
            { name: "value", type: string },
            { name: "children", type: { kind: "message", name: "Node" }, label: "repeated" },
        ]);
        const Node = buildMessageClass(node);

        const tree = new Node({ value: "root", children: [{ value: "a", children: [{ value: "b" }] }] });
        expect(tree.toObject()).toEqual({ value: "root", children: [{ value: "a", children: [{ value: "b" }] }] });
        expect(Node.fullName).toBe("Node");
    });

    it("should fail on references it cannot resolve", () => {
        const holder = createMessage("Holder", [{ name: "ghost", type: { kind: "message", name: "Ghost" } }]);

        expect(() => buildMessageClass(holder)).toThrow(UnresolvedReferenceError);
        expect(() => buildMessageClass(holder)).toThrow('Unresolved type reference "Ghost" in field Holder.ghost');
    });
});

describe("buildEnumType", () => {
    it("should map names to numbers and numbers to names", () => {
        const Status = buildEnumType(createEnum("Status", { ACTIVE: 0, PAUSED: 5 }));

        expect(Status.PAUSED).toBe(5);
        expect(Status[5]).toBe("PAUSED");
        expect(Object.isFrozen(Status)).toBe(true);
    });
});

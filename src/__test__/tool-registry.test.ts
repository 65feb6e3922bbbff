import { describe, expect, it } from "vitest";

import { DuplicateNameError, UnknownArgumentError } from "../errors";
import { Synthesizer } from "../ir/converters/function-to-ir";
import { ToolRegistry } from "../tools/registry";
import { source } from "./util";

const file = source(`
    /**
     * Search the catalog.
     * Matches titles and authors.
     * @param query - Text to look for
     */
    export function search(query: string, limit: number): string[] { return []; }

    export function ping(): void {}
`);

const search = file.getFunctionOrThrow("search");
const ping = file.getFunctionOrThrow("ping");

describe("ToolRegistry", () => {
    it("should register a tool with metadata from its signature and JSDoc", () => {
        const registry = new ToolRegistry();
        const tool = registry.register(search);

        expect(tool.config).toEqual({
            name: "search",
            description: "Search the catalog.",
            args: { query: "Text to look for" },
        });
        expect(registry.get("search")).toBe(tool);
        expect(registry.has("search")).toBe(true);
        expect(registry.size).toBe(1);
    });

    it("should merge argument descriptions over the JSDoc ones", () => {
        const tool = new ToolRegistry().register(search, {
            name: "find",
            description: "Find books",
            icon: "book",
            args: { query: "Search text", limit: "Maximum results" },
        });

        expect(tool.config).toEqual({
            name: "find",
            description: "Find books",
            icon: "book",
            args: { query: "Search text", limit: "Maximum results" },
        });
        expect(tool.spec.name).toBe("find");
        expect(tool.spec.description).toBe("Find books");
        expect(tool.spec.argDescriptions.get("limit")).toBe("Maximum results");
    });

    it("should reject descriptions of arguments the signature lacks", () => {
        const registry = new ToolRegistry();

        expect(() => registry.register(search, { args: { page: "Page number" } })).toThrow(UnknownArgumentError);
        expect(() => registry.register(search, { args: { page: "Page number" } })).toThrow(
            "Argument 'page' described but not found in the signature of search",
        );
        expect(registry.size).toBe(0);
    });

    it("should reject duplicate tool names", () => {
        const registry = new ToolRegistry();
        registry.register(search);

        expect(() => registry.register(search)).toThrow(DuplicateNameError);
        expect(() => registry.register(ping, { name: "search" })).toThrow("Tool search already exists");
        expect(registry.register(search, { name: "search_again" }).config.name).toBe("search_again");
    });

    it("should list tools in registration order", () => {
        const registry = new ToolRegistry();
        registry.register(ping);
        registry.register(search);

        expect(registry.list().map((tool) => tool.config.name)).toEqual(["ping", "search"]);
    });

    it("should synthesize a service with one method per tool", () => {
        const registry = new ToolRegistry();
        registry.register(search, { name: "find_items" });
        registry.register(ping);
        const synthesizer = new Synthesizer();

        const service = registry.synthesize(synthesizer, "CatalogTools");

        expect(service.name).toBe("CatalogTools");
        expect(service.methods.map((m) => [m.name, m.inputType, m.outputType])).toEqual([
            ["find_items", "FindItemsRequest", "FindItemsResponse"],
            ["ping", "PingRequest", "PingResponse"],
        ]);
        expect(service.methods[0]?.description).toBe("Search the catalog.");
        expect(synthesizer.registry.getMessage("FindItemsRequest")?.fields[0]?.description).toBe("Text to look for");
    });
});

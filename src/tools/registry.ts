/**
 * Tool registry
 *
 * Keeps tool metadata in a table keyed by tool name instead of attaching it to
 * the callables themselves.
 */
import { DuplicateNameError, UnknownArgumentError } from "../errors";
import type { Synthesizer } from "../ir/converters/function-to-ir";
import { analyzeFunction, type Callable } from "../ir/converters/ts-to-ir";
import type { FunctionSpec, ServiceSpec } from "../ir/types";

export interface ToolConfig {
    name: string;
    description: string;
    icon?: string;
    /** Argument name to description */
    args: Record<string, string>;
}

export interface ToolOptions {
    /** Defaults to the callable's name */
    name?: string;
    /** Defaults to the first line of the JSDoc description */
    description?: string;
    icon?: string;
    /** Argument descriptions, merged over the `@param` texts */
    args?: Record<string, string>;
}

export interface RegisteredTool {
    config: ToolConfig;
    spec: FunctionSpec;
}

export class ToolRegistry {
    private readonly tools = new Map<string, RegisteredTool>();

    /**
     * Analyze a callable and store it under its tool name
     */
    register(callable: Callable, options: ToolOptions = {}): RegisteredTool {
        const analyzed = analyzeFunction(callable);
        const name = options.name ?? analyzed.name;

        if (this.tools.has(name)) {
            throw new DuplicateNameError("Tool", name);
        }

        for (const argument of Object.keys(options.args ?? {})) {
            if (!analyzed.args.has(argument)) {
                throw new UnknownArgumentError(name, argument);
            }
        }

        const args: Record<string, string> = Object.fromEntries(analyzed.argDescriptions);
        Object.assign(args, options.args);

        const config: ToolConfig = {
            name,
            description: options.description ?? analyzed.description.split("\n")[0] ?? "",
            ...(options.icon ? { icon: options.icon } : {}),
            args,
        };

        const tool: RegisteredTool = {
            config,
            spec: {
                ...analyzed,
                name,
                description: config.description,
                argDescriptions: new Map(Object.entries(args)),
            },
        };
        this.tools.set(name, tool);
        return tool;
    }

    get(name: string): RegisteredTool | undefined {
        return this.tools.get(name);
    }

    has(name: string): boolean {
        return this.tools.has(name);
    }

    list(): RegisteredTool[] {
        return [...this.tools.values()];
    }

    get size(): number {
        return this.tools.size;
    }

    /**
     * Synthesize one service with a method per registered tool
     */
    synthesize(synthesizer: Synthesizer, serviceName: string): ServiceSpec {
        return synthesizer.synthesizeService(
            this.list().map((tool) => tool.spec),
            serviceName,
        );
    }
}

import yaml from "js-yaml";
import { mkdir, writeFile } from "fs/promises";
import { dirname, resolve } from "path";

import { ToolwireError } from "../errors";
import { Synthesizer } from "../ir/converters/function-to-ir";
import { renderFile } from "../ir/generators/ir-to-proto";
import { DescriptorRegistry } from "../ir/registry";
import { scanFiles } from "./file-scanner";
import { DebugLogger, expandFilePaths, findNearestPackageJson, readPackageJson, toPackageName } from "./utils";

export type Format = "proto" | "json" | "yaml";

export const FORMATS: readonly Format[] = ["proto", "json", "yaml"];

export interface ProtoOptions {
    format?: Format;
    /** Schema package; defaults to the nearest package.json name */
    package?: string;
    /** Name of the service holding the standalone functions */
    service?: string;
    /** Write to this file instead of stdout */
    out?: string;
    debug?: boolean;
}

export function isFormat(value: string): value is Format {
    return FORMATS.some((format) => format === value);
}

/**
 * Generate a proto3 schema from the exported declarations of TypeScript files.
 *
 * Returns the generated text, which is also printed or written to `out`.
 */
export async function generateProto(paths: string[], options: ProtoOptions = {}): Promise<string> {
    const format = options.format ?? "proto";
    const serviceName = options.service ?? "ToolService";
    const debug = new DebugLogger(options.debug ?? false);

    debug.group("Command Arguments");
    debug.log("Command: proto");
    debug.log("Input paths:", paths);
    debug.log("Format:", format);
    debug.log("Service:", serviceName);

    if (paths.length === 0) {
        throw new ToolwireError("No files or directories specified");
    }

    const files = await expandFilePaths(paths);

    debug.group("Found Files");
    debug.log(`Total files found: ${files.length}`);
    if (files.length > 0) {
        debug.log("Files:", files);
    }

    if (files.length === 0) {
        throw new ToolwireError("No TypeScript files found");
    }

    const packageName = options.package ?? (await packageNameFor(files[0], debug));
    debug.log("Package:", packageName ?? "(none)");

    const scan = scanFiles(files, { debug });
    const synthesizer = new Synthesizer(new DescriptorRegistry(packageName), {
        log: (message) => debug.log(message),
    });

    debug.group("Synthesizing");
    scan.enums.forEach((declaration) => synthesizer.synthesizeEnum(declaration));
    scan.messages.forEach((declaration) => synthesizer.synthesizeMessage(declaration));
    scan.services.forEach((declaration) => synthesizer.synthesizeService(declaration));
    if (scan.functions.length > 0) {
        synthesizer.synthesizeService(scan.functions, serviceName);
    }

    if (synthesizer.registry.size === 0) {
        throw new ToolwireError("No exported enums, types, classes or functions found");
    }

    const output = formatOutput(synthesizer.registry, format);

    if (options.out) {
        const outPath = resolve(options.out);
        await mkdir(dirname(outPath), { recursive: true });
        await writeFile(outPath, output);
        console.log(`Schema written to ${outPath}`);
    } else {
        process.stdout.write(output);
    }

    return output;
}

async function packageNameFor(file: string | undefined, debug: DebugLogger): Promise<string | undefined> {
    if (!file) return undefined;

    const packageJsonPath = await findNearestPackageJson(dirname(file));
    if (!packageJsonPath) return undefined;

    debug.log(`Using package.json: ${packageJsonPath}`);
    const { name } = await readPackageJson(packageJsonPath);
    return name ? toPackageName(name) : undefined;
}

/**
 * Output the registry in the specified format.
 */
function formatOutput(registry: DescriptorRegistry, format: Format): string {
    // Rendering checks every reference, whatever the output format
    const text = renderFile(registry);
    switch (format) {
        case "proto":
            return text;
        case "json":
            return JSON.stringify(registry.snapshot(), null, 2) + "\n";
        case "yaml":
            return yaml.dump(registry.snapshot(), { indent: 2, lineWidth: -1, noRefs: true });
    }
}

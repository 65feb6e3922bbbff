#!/usr/bin/env node
import { parseArgs } from "util";

import { FORMATS, generateProto, isFormat } from "./proto";

const HELP_TEXT = `
toolwire - protocol schemas from TypeScript tools

Usage:
  toolwire <command> [options]

Commands:
  proto [files...]       Generate a proto3 schema from exported TypeScript declarations

Proto Options:
  --package <name>       Schema package (default: nearest package.json name)
  --service <name>       Service for exported functions (default: ToolService)
  --format <format>      Output format: proto, json or yaml (default: proto)
  --out <file>           Write to a file instead of stdout
  --debug                Print debug information to stderr

Examples:
  # Schema for every tool in a directory
  toolwire proto src/tools/

  # Custom package and service names
  toolwire proto src/tools.ts --package acme.tools --service SearchTools

  # Descriptor snapshot as YAML
  toolwire proto "src/**/*.tool.ts" --format yaml --out schema.yaml
`;

async function main() {
    const rawArgs = process.argv.slice(2);

    if (rawArgs.length === 0 || rawArgs[0] === "--help" || rawArgs[0] === "-h") {
        console.log(HELP_TEXT);
        process.exit(0);
    }

    const command = rawArgs[0];

    if (command === "proto") {
        const { values, positionals } = parseArgs({
            args: rawArgs.slice(1),
            options: {
                package: { type: "string" },
                service: { type: "string" },
                format: { type: "string", default: "proto" },
                out: { type: "string" },
                debug: { type: "boolean", default: false },
            },
            allowPositionals: true,
        });

        const format = values.format ?? "proto";
        if (!isFormat(format)) {
            console.error(`Error: Invalid format "${format}". Must be one of: ${FORMATS.join(", ")}.`);
            process.exit(1);
        }

        if (positionals.length === 0) {
            console.error("Error: No files or directories specified");
            console.error("Usage: toolwire proto [files|dirs|globs...] [--format proto|json|yaml]");
            process.exit(1);
        }

        await generateProto(positionals, {
            format,
            package: values.package,
            service: values.service,
            out: values.out,
            debug: values.debug,
        });
    } else if (command === "help") {
        console.log(HELP_TEXT);
    } else {
        console.error(`Error: Unknown command "${command}"`);
        console.error("");
        console.log(HELP_TEXT);
        process.exit(1);
    }
}

main().catch((error: unknown) => {
    console.error("Error:", error instanceof Error ? error.message : error);
    process.exit(1);
});

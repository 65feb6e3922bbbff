import { readFile, stat } from "fs/promises";
import { glob } from "glob";
import { dirname, extname, resolve } from "path";

const SOURCE_EXTENSIONS = new Set([".ts", ".tsx"]);

/**
 * Expands a list of file paths, directories, or glob patterns into a sorted list of TypeScript files.
 * Directories match all nested .ts/.tsx files; declaration files are left out.
 */
export async function expandFilePaths(paths: string[]): Promise<string[]> {
    const allFiles = new Set<string>();

    for (const path of paths) {
        const resolvedPath = resolve(path);
        const stats = await stat(resolvedPath).catch(() => undefined);

        let candidates: string[];
        if (stats?.isDirectory()) {
            candidates = await glob("**/*.{ts,tsx}", { cwd: resolvedPath, nodir: true, absolute: true });
        } else if (stats?.isFile()) {
            candidates = [resolvedPath];
        } else {
            // Not a path on disk, treat as a glob pattern
            candidates = await glob(path, { nodir: true, absolute: true });
        }

        candidates.filter(isSourceFile).forEach((file) => allFiles.add(file));
    }

    return Array.from(allFiles).sort();
}

function isSourceFile(file: string): boolean {
    return SOURCE_EXTENSIONS.has(extname(file)) && !file.endsWith(".d.ts");
}

/**
 * Finds the nearest package.json file by walking up the directory tree.
 */
export async function findNearestPackageJson(startPath: string): Promise<string | null> {
    let currentPath = resolve(startPath);

    for (;;) {
        const packageJsonPath = resolve(currentPath, "package.json");
        const stats = await stat(packageJsonPath).catch(() => undefined);
        if (stats?.isFile()) {
            return packageJsonPath;
        }

        const parentPath = dirname(currentPath);
        if (parentPath === currentPath) return null;
        currentPath = parentPath;
    }
}

export interface PackageJson {
    name?: string;
    version?: string;
}

/**
 * Reads a package.json file, keeping the fields the CLI uses.
 */
export async function readPackageJson(path: string): Promise<PackageJson> {
    const parsed: unknown = JSON.parse(await readFile(path, "utf8"));
    if (typeof parsed !== "object" || parsed === null) {
        return {};
    }

    const result: PackageJson = {};
    if ("name" in parsed && typeof parsed.name === "string") result.name = parsed.name;
    if ("version" in parsed && typeof parsed.version === "string") result.version = parsed.version;
    return result;
}

/**
 * Convert an npm package name to a schema package name: `@acme/my-tools` becomes `acme.my_tools`
 */
export function toPackageName(npmName: string): string {
    return npmName
        .replace(/^@/, "")
        .split("/")
        .filter(Boolean)
        .map((segment) => {
            const cleaned = segment.replace(/[^A-Za-z0-9_]/g, "_").toLowerCase();
            return /^[0-9]/.test(cleaned) ? `_${cleaned}` : cleaned;
        })
        .join(".");
}

/**
 * Debug output for CLI commands, written to stderr so it never mixes with generated output
 */
export class DebugLogger {
    constructor(readonly enabled: boolean) {}

    group(title: string): void {
        if (!this.enabled) return;
        console.error(`\n[toolwire] === ${title} ===`);
    }

    log(...args: unknown[]): void {
        if (!this.enabled) return;
        console.error("[toolwire]", ...args);
    }
}

import { Project, type SourceFile } from "ts-morph";

export function dedent(str: string) {
    return str
        .split(/\r?\n\r?/)
        .map((line) => line.trim())
        .join("\n")
        .trim();
}

/**
 * Join schema lines into file text ending in a newline
 */
export function lines(...content: string[]) {
    return content.join("\n") + "\n";
}

/**
 * Load source text into an in-memory ts-morph project
 */
export function source(code: string, fileName = "/src/tools.ts"): SourceFile {
    const project = new Project({
        useInMemoryFileSystem: true,
        compilerOptions: { strict: true },
    });
    return project.createSourceFile(fileName, dedent(code));
}

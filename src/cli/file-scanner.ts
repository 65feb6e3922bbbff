/**
 * Single-pass file scanner for the proto command
 *
 * Loads the files into one ts-morph project and sorts their exported
 * declarations into enums, messages, services and standalone functions.
 */
import {
    Node,
    Project,
    type ClassDeclaration,
    type EnumDeclaration,
    type SourceFile,
} from "ts-morph";

import type { MessageDeclaration } from "../ir/converters/function-to-ir";
import { publicMethods, type Callable } from "../ir/converters/ts-to-ir";
import type { DebugLogger } from "./utils";

/**
 * Results from scanning a set of files
 */
export interface ScanResult {
    enums: EnumDeclaration[];
    /** Interfaces, object type aliases and classes without public methods */
    messages: MessageDeclaration[];
    /** Classes with public methods */
    services: ClassDeclaration[];
    /** Exported functions and arrow functions bound to exported variables */
    functions: Callable[];
    /** The ts-morph Project used for scanning */
    project: Project;
    sourceFiles: SourceFile[];
}

export interface ScanOptions {
    debug?: DebugLogger;
    /** Use an existing project instead of one created from the file paths */
    project?: Project;
}

/**
 * Scan files once and collect their exported declarations in file order
 */
export function scanFiles(files: string[], options: ScanOptions = {}): ScanResult {
    const { debug } = options;
    const project = options.project ?? new Project({ skipAddingFilesFromTsConfig: true });

    debug?.group("File Scanning");
    debug?.log(`Scanning ${files.length} file(s)`);

    const sourceFiles = files.map((file) => project.getSourceFile(file) ?? project.addSourceFileAtPath(file));
    const result: ScanResult = { enums: [], messages: [], services: [], functions: [], project, sourceFiles };

    for (const sourceFile of sourceFiles) {
        const filePath = sourceFile.getFilePath();

        for (const declaration of sourceFile.getEnums()) {
            if (!declaration.isExported()) continue;
            result.enums.push(declaration);
            debug?.log(`Found enum: ${declaration.getName()}`, { file: filePath });
        }

        for (const declaration of sourceFile.getInterfaces()) {
            if (!declaration.isExported()) continue;
            result.messages.push(declaration);
            debug?.log(`Found interface: ${declaration.getName()}`, { file: filePath });
        }

        for (const declaration of sourceFile.getTypeAliases()) {
            if (!declaration.isExported()) continue;
            const typeNode = declaration.getTypeNode();
            if (Node.isTypeLiteral(typeNode) && declaration.getTypeParameters().length === 0) {
                result.messages.push(declaration);
                debug?.log(`Found object type: ${declaration.getName()}`, { file: filePath });
            } else {
                debug?.log(`Skipping type alias ${declaration.getName()}: not an object type`);
            }
        }

        for (const declaration of sourceFile.getClasses()) {
            if (!declaration.isExported() || !declaration.getName()) continue;
            if (publicMethods(declaration).length > 0) {
                result.services.push(declaration);
                debug?.log(`Found service class: ${declaration.getName()}`, { file: filePath });
            } else {
                result.messages.push(declaration);
                debug?.log(`Found data class: ${declaration.getName()}`, { file: filePath });
            }
        }

        for (const declaration of sourceFile.getFunctions()) {
            if (!declaration.isExported() || !declaration.getName() || !declaration.hasBody()) continue;
            result.functions.push(declaration);
            debug?.log(`Found function: ${declaration.getName()}`, { file: filePath });
        }

        for (const statement of sourceFile.getVariableStatements()) {
            if (!statement.isExported()) continue;
            for (const variable of statement.getDeclarations()) {
                const initializer = variable.getInitializer();
                if (Node.isArrowFunction(initializer) || Node.isFunctionExpression(initializer)) {
                    result.functions.push(initializer);
                    debug?.log(`Found function: ${variable.getName()}`, { file: filePath });
                }
            }
        }
    }

    debug?.log(
        `Scan complete: ${result.enums.length} enums, ${result.messages.length} messages, ` +
            `${result.services.length} services, ${result.functions.length} functions`,
    );

    return result;
}

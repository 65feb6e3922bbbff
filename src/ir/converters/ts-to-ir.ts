/**
 * TypeScript declarations to descriptor-model converter
 *
 * Reads function and class declarations through ts-morph and produces
 * FunctionSpec / ClassSpec values. Analysis is static: nothing is executed.
 */
import {
    Node,
    Scope,
    SyntaxKind,
    type ArrowFunction,
    type ClassDeclaration,
    type FunctionDeclaration,
    type FunctionExpression,
    type JSDoc,
    type MethodDeclaration,
    type ParameterDeclaration,
    type TypeNode,
} from "ts-morph";

import {
    InvalidMapKeyError,
    MissingAnnotationError,
    ToolwireError,
    UnsupportedAnnotationError,
    UnsupportedTypeError,
} from "../../errors";
import { fieldTypeFor } from "../type-mapper";
import type { ClassSpec, FunctionSpec, ScalarValue, TypeRef } from "../types";
import { createMap, createOptional, createRepeated } from "../utils";

/**
 * Declarations that can be analyzed as a callable
 */
export type Callable = FunctionDeclaration | FunctionExpression | ArrowFunction | MethodDeclaration;

/**
 * Errors that make a class method unsuitable for conversion
 */
export type AnnotationError = MissingAnnotationError | UnsupportedAnnotationError | UnsupportedTypeError | InvalidMapKeyError;

export interface AnalyzeClassOptions {
    /** Called for every public method skipped because its annotations cannot be converted */
    onSkip?: (method: string, error: AnnotationError) => void;
}

const ARRAY_TYPES = new Set(["Array", "ReadonlyArray"]);
const MAP_TYPES = new Set(["Record", "Map", "ReadonlyMap"]);
const STREAM_TYPES = new Set([
    "Generator",
    "AsyncGenerator",
    "Iterable",
    "AsyncIterable",
    "Iterator",
    "AsyncIterator",
    "IterableIterator",
    "AsyncIterableIterator",
]);

interface DocInfo {
    description: string;
    params: Map<string, string>;
    returns?: string;
    deprecated: boolean;
}

/**
 * Analyze a callable declaration.
 *
 * Every parameter except `this` and the return type need an explicit annotation.
 */
export function analyzeFunction(callable: Callable): FunctionSpec {
    const name = callableName(callable);

    const returnTypeNode = callable.getReturnTypeNode();
    if (!returnTypeNode) {
        throw new MissingAnnotationError(name);
    }

    const args = new Map<string, TypeRef>();
    const argDefaults = new Map<string, ScalarValue>();

    for (const parameter of callable.getParameters()) {
        const nameNode = parameter.getNameNode();
        if (!Node.isIdentifier(nameNode)) {
            throw new UnsupportedAnnotationError(parameter.getText(), "destructured parameters are not supported");
        }
        const parameterName = nameNode.getText();
        if (parameterName === "this") continue;

        const typeNode = parameter.getTypeNode();
        if (!typeNode) {
            throw new MissingAnnotationError(name, parameterName);
        }

        const type = typeRefFromAnnotation(typeNode);
        const optional = parameter.hasQuestionToken() || parameter.hasInitializer();
        args.set(parameterName, optional && type.kind !== "optional" ? createOptional(type) : type);

        const defaultValue = literalInitializer(parameter);
        if (defaultValue !== undefined) {
            argDefaults.set(parameterName, defaultValue);
        }
    }

    const isAsync = callable.isAsync();
    const isGenerator = Node.isArrowFunction(callable) ? false : callable.isGenerator();
    const docs = readDocs(jsDocsOf(callable));

    return {
        name,
        args,
        returnType: returnTypeFromAnnotation(returnTypeNode, isGenerator),
        description: docs.description,
        isAsync,
        isGenerator,
        argDescriptions: docs.params,
        argDefaults,
        ...(docs.returns ? { returnDescription: docs.returns } : {}),
        deprecated: docs.deprecated,
    };
}

/**
 * Analyze the public methods of a class.
 *
 * Methods whose annotations cannot be converted are skipped, so classes may
 * mix annotated and unannotated methods. Any other error propagates.
 */
export function analyzeClass(
    declaration: ClassDeclaration,
    nameOverride?: string,
    options: AnalyzeClassOptions = {},
): ClassSpec {
    const name = nameOverride ?? declaration.getName();
    if (!name) {
        throw new UnsupportedAnnotationError(declaration.getText().slice(0, 40), "anonymous classes need a name");
    }

    const methods: FunctionSpec[] = [];
    for (const method of publicMethods(declaration)) {
        try {
            methods.push(analyzeFunction(method));
        } catch (error) {
            if (!isAnnotationError(error)) throw error;
            options.onSkip?.(method.getName(), error);
        }
    }

    return {
        name,
        description: readDocs(declaration.getJsDocs()).description,
        methods,
    };
}

/**
 * Public instance methods without a `_` or `#` prefix, in declaration order
 */
export function publicMethods(declaration: ClassDeclaration): MethodDeclaration[] {
    return declaration.getMethods().filter((method) => {
        const methodName = method.getName();
        return (
            method.getScope() === Scope.Public &&
            !method.isStatic() &&
            !methodName.startsWith("_") &&
            !methodName.startsWith("#") &&
            !method.hasModifier(SyntaxKind.AbstractKeyword)
        );
    });
}

export function isAnnotationError(error: unknown): error is AnnotationError {
    return (
        error instanceof MissingAnnotationError ||
        error instanceof UnsupportedAnnotationError ||
        error instanceof UnsupportedTypeError ||
        error instanceof InvalidMapKeyError
    );
}

/**
 * Convert a type annotation to a type reference.
 *
 * - `T | undefined`, `T | null` read as optional
 * - `T[]`, `Array<T>`, `ReadonlyArray<T>`, `readonly T[]` read as repeated
 * - `Record<string, V>`, `Map<string, V>`, `{ [key: string]: V }` read as maps
 * - anything else goes through the type mapper
 */
export function typeRefFromAnnotation(typeNode: TypeNode): TypeRef {
    if (Node.isParenthesizedTypeNode(typeNode)) {
        return typeRefFromAnnotation(typeNode.getTypeNode());
    }

    if (Node.isTypeOperatorTypeNode(typeNode) && typeNode.getOperator() === SyntaxKind.ReadonlyKeyword) {
        return typeRefFromAnnotation(typeNode.getTypeNode());
    }

    if (Node.isArrayTypeNode(typeNode)) {
        return createRepeated(typeRefFromAnnotation(typeNode.getElementTypeNode()));
    }

    if (Node.isUnionTypeNode(typeNode)) {
        const members = typeNode.getTypeNodes().filter((member) => !isNullish(member));
        const [only] = members;
        if (members.length === 1 && only) {
            return createOptional(typeRefFromAnnotation(only));
        }
        throw new UnsupportedAnnotationError(typeNode.getText(), "unions other than T | undefined or T | null");
    }

    if (Node.isTypeLiteral(typeNode)) {
        const [index] = typeNode.getIndexSignatures();
        if (index && typeNode.getMembers().length === 1) {
            return mapType(typeNode, index.getKeyTypeNode(), index.getReturnTypeNode());
        }
        throw new UnsupportedAnnotationError(typeNode.getText(), "declare inline object types as interfaces");
    }

    if (Node.isTypeReference(typeNode)) {
        const referenceName = typeNode.getTypeName().getText();
        const typeArguments = typeNode.getTypeArguments();

        if (ARRAY_TYPES.has(referenceName) && typeArguments.length === 1 && typeArguments[0]) {
            return createRepeated(typeRefFromAnnotation(typeArguments[0]));
        }

        if (MAP_TYPES.has(referenceName) && typeArguments.length === 2) {
            const [key, value] = typeArguments;
            return mapType(typeNode, key, value);
        }

        if (typeArguments.length > 0) {
            throw new UnsupportedAnnotationError(typeNode.getText());
        }
    }

    if (Node.isTupleTypeNode(typeNode)) {
        throw new UnsupportedAnnotationError(typeNode.getText(), "tuples");
    }

    const mapped = fieldTypeFor(typeNode);
    if (!mapped.ok) {
        throw mapped.error;
    }
    return mapped.value;
}

/**
 * Return type of a callable, unwrapping promises and, for generators, the yielded type
 */
function returnTypeFromAnnotation(typeNode: TypeNode, isGenerator: boolean): TypeRef | undefined {
    let node = unwrapReference(typeNode, (name) => name === "Promise") ?? typeNode;

    if (isGenerator) {
        const yielded = unwrapReference(node, (name) => STREAM_TYPES.has(name));
        if (!yielded) {
            throw new UnsupportedAnnotationError(typeNode.getText(), "generators must return a Generator or Iterable type");
        }
        node = yielded;
    }

    if (isVoid(node)) {
        return undefined;
    }
    return typeRefFromAnnotation(node);
}

function unwrapReference(typeNode: TypeNode, matches: (name: string) => boolean): TypeNode | undefined {
    if (!Node.isTypeReference(typeNode) || !matches(typeNode.getTypeName().getText())) {
        return undefined;
    }
    const [first] = typeNode.getTypeArguments();
    if (!first) {
        throw new UnsupportedAnnotationError(typeNode.getText(), "missing type argument");
    }
    return first;
}

function mapType(annotation: TypeNode, key: TypeNode | undefined, value: TypeNode | undefined): TypeRef {
    if (!key || !value) {
        throw new UnsupportedAnnotationError(annotation.getText());
    }
    if (key.getKind() !== SyntaxKind.StringKeyword) {
        throw new InvalidMapKeyError(annotation.getText(), key.getText());
    }
    return createMap(typeRefFromAnnotation(value));
}

function isNullish(typeNode: TypeNode): boolean {
    if (typeNode.getKind() === SyntaxKind.UndefinedKeyword) return true;
    return Node.isLiteralTypeNode(typeNode) && typeNode.getLiteral().getKind() === SyntaxKind.NullKeyword;
}

function isVoid(typeNode: TypeNode): boolean {
    return typeNode.getKind() === SyntaxKind.VoidKeyword || typeNode.getKind() === SyntaxKind.UndefinedKeyword;
}

function callableName(callable: Callable): string {
    if (Node.isMethodDeclaration(callable)) {
        return callable.getName();
    }

    const ownName = Node.isArrowFunction(callable) ? undefined : callable.getName();
    if (ownName) return ownName;

    const variable = callable.getParentIfKind(SyntaxKind.VariableDeclaration);
    if (variable) return variable.getName();

    throw new ToolwireError(`Cannot determine the name of ${callable.getText().slice(0, 40)}`);
}

/**
 * Arrow functions and function expressions carry their JSDoc on the variable statement
 */
function jsDocsOf(callable: Callable): JSDoc[] {
    if (Node.isFunctionDeclaration(callable) || Node.isMethodDeclaration(callable)) {
        return callable.getJsDocs();
    }
    const statement = callable.getParentIfKind(SyntaxKind.VariableDeclaration)?.getVariableStatement();
    return statement?.getJsDocs() ?? [];
}

function readDocs(jsDocs: JSDoc[]): DocInfo {
    const info: DocInfo = { description: "", params: new Map(), deprecated: false };

    // The closest JSDoc block wins
    const jsDoc = jsDocs[jsDocs.length - 1];
    if (!jsDoc) return info;

    info.description = cleanDoc(jsDoc.getDescription());

    for (const tag of jsDoc.getTags()) {
        if (Node.isJSDocParameterTag(tag)) {
            const text = cleanDoc(tag.getCommentText() ?? "").replace(/^-\s*/, "");
            if (text) info.params.set(tag.getName(), text);
        } else if (Node.isJSDocReturnTag(tag)) {
            const text = cleanDoc(tag.getCommentText() ?? "");
            if (text) info.returns = text;
        } else if (tag.getTagName() === "deprecated") {
            info.deprecated = true;
        }
    }

    return info;
}

function cleanDoc(text: string): string {
    return text
        .split(/\r?\n/)
        .map((line) => line.trim())
        .join("\n")
        .trim();
}

function literalInitializer(parameter: ParameterDeclaration): ScalarValue | undefined {
    const initializer = parameter.getInitializer();
    if (!initializer) return undefined;

    if (Node.isStringLiteral(initializer) || Node.isNoSubstitutionTemplateLiteral(initializer)) {
        return initializer.getLiteralValue();
    }
    if (Node.isNumericLiteral(initializer)) {
        return initializer.getLiteralValue();
    }
    if (Node.isTrueLiteral(initializer) || Node.isFalseLiteral(initializer)) {
        return initializer.getLiteralValue();
    }
    if (Node.isPrefixUnaryExpression(initializer) && initializer.getOperatorToken() === SyntaxKind.MinusToken) {
        const operand = initializer.getOperand();
        if (Node.isNumericLiteral(operand)) return -operand.getLiteralValue();
    }
    return undefined;
}

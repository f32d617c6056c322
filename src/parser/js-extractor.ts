/**
 * JavaScript / TypeScript import extractor.
 *
 * Parses with the TypeScript compiler API (syntax only, no program, no
 * checker) and collects every module specifier written as a string literal:
 *
 *   import x from 'a'            export * from 'b'
 *   import type { T } from 'c'   export { y } from 'd'
 *   import z = require('e')      import('f')          require('g')
 */

import * as ts from 'typescript';
import { RawEdge } from '../graph/types';
import { extensionOf, isSourceFile, usesTypeScriptSyntax } from './config';
import { ExtractionContext, Extractor, importEdges } from './interfaces';
import { readSource } from './source';

function scriptKindFor(fileName: string): ts.ScriptKind {
    const ext = extensionOf(fileName);
    if (ext === 'tsx') return ts.ScriptKind.TSX;
    if (usesTypeScriptSyntax(ext)) return ts.ScriptKind.TS;
    // .jsx, and plain .js files that carry JSX anyway
    return ts.ScriptKind.JSX;
}

function stringLiteralText(node: ts.Node | undefined): string | undefined {
    if (node && (ts.isStringLiteral(node) || ts.isNoSubstitutionTemplateLiteral(node))) {
        return node.text;
    }
    return undefined;
}

function isRequireCall(node: ts.CallExpression): boolean {
    return ts.isIdentifier(node.expression) && node.expression.text === 'require';
}

/**
 * Module specifiers in source order, duplicates included.
 */
export function collectSpecifiers(text: string, fileName: string): string[] {
    const sourceFile = ts.createSourceFile(
        fileName,
        text,
        ts.ScriptTarget.Latest,
        false,
        scriptKindFor(fileName)
    );
    const specifiers: string[] = [];
    const push = (value: string | undefined) => {
        if (value !== undefined) specifiers.push(value);
    };

    const visit = (node: ts.Node): void => {
        if (ts.isImportDeclaration(node) || ts.isExportDeclaration(node)) {
            push(stringLiteralText(node.moduleSpecifier));
        } else if (ts.isImportEqualsDeclaration(node)) {
            if (ts.isExternalModuleReference(node.moduleReference)) {
                push(stringLiteralText(node.moduleReference.expression));
            }
        } else if (ts.isCallExpression(node)) {
            if (node.expression.kind === ts.SyntaxKind.ImportKeyword || isRequireCall(node)) {
                push(stringLiteralText(node.arguments[0]));
            }
        }
        ts.forEachChild(node, visit);
    };

    visit(sourceFile);
    return specifiers;
}

export class JsExtractor implements Extractor {
    readonly name = 'js';
    readonly fileNode = true;

    canHandle(filePath: string): boolean {
        return isSourceFile(filePath);
    }

    async extract(filePath: string, ctx: ExtractionContext): Promise<RawEdge[]> {
        const text = await readSource(filePath, ctx, this.name);
        if (text === null) return [];
        return importEdges(filePath, ctx, collectSpecifiers(text, filePath));
    }
}

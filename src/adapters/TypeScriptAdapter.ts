import path from 'path';
import ts from 'typescript';
import {
    LanguageAdapter,
    GapTypeRule,
    ParameterInfo,
    ScopeNode,
    SourceParseError,
    containsAny,
    keywordSeverityRules,
} from './LanguageAdapter';
import { jestTemplates } from '../generator/templates/JestTemplates';

const TEST_FILE = /\.(test|spec)\.[cm]?[jt]sx?$/;

/**
 * Language adapter for TypeScript and JavaScript sources (Jest conventions)
 */
export class TypeScriptAdapter implements LanguageAdapter {
    language = 'typescript';
    extensions = ['.ts', '.tsx', '.js', '.jsx', '.mjs', '.cjs'];

    gapTypeRules: GapTypeRule[] = [
        { gapType: 'missing_branch', matches: containsAny(['if (', 'else if', 'switch (', 'case ']) },
        { gapType: 'exception_handling', matches: containsAny(['catch']) },
        { gapType: 'uncovered_function', matches: containsAny(['function', '=>']) },
        { gapType: 'uncovered_class', matches: containsAny(['class ']) },
        { gapType: 'error_path', matches: containsAny(['throw ']) },
    ];

    severityRules = keywordSeverityRules({
        critical: ['throw', 'catch', 'assert', 'auth', 'password', 'token'],
        high: ['if ', 'else if', 'validate', 'check', 'verify'],
        medium: ['format', 'convert', 'parse', 'util'],
    });

    complexityTokens = ['if (', 'for (', 'while (', 'case ', 'catch', ' && ', ' || ', ' ?? ', ' ? '];

    templates = jestTemplates;

    isCommentLine(trimmedLine: string): boolean {
        return trimmedLine.startsWith('//') || trimmedLine.startsWith('/*') || trimmedLine.startsWith('*');
    }

    isTestFile(relativePath: string): boolean {
        const normalized = relativePath.split(path.sep).join('/');
        return TEST_FILE.test(normalized) || normalized.includes('__tests__/') || normalized.endsWith('.d.ts');
    }

    getTestFilePath(relativeSourcePath: string, testDir: string): string {
        const parsed = path.parse(relativeSourcePath);
        return path.join(testDir, parsed.dir, `${parsed.name}.test${parsed.ext}`);
    }

    getImportSpecifier(relativeSourcePath: string, testFilePath: string, sourceDir: string): string {
        const parsed = path.parse(relativeSourcePath);
        const target = path.join(sourceDir, parsed.dir, parsed.name);
        const relative = path.relative(path.dirname(testFilePath), target).split(path.sep).join('/');
        return relative.startsWith('.') ? relative : `./${relative}`;
    }

    parseScopes(source: string, fileName: string): ScopeNode[] {
        const sourceFile = ts.createSourceFile(fileName, source, ts.ScriptTarget.Latest, true, scriptKindFor(fileName));
        const scopes: ScopeNode[] = [];

        const lineOf = (position: number) => sourceFile.getLineAndCharacterOfPosition(position).line + 1;

        const syntaxError = syntacticErrors(source, fileName)[0];
        if (syntaxError) {
            throw new SourceParseError(
                fileName,
                lineOf(syntaxError.start ?? 0),
                ts.flattenDiagnosticMessageText(syntaxError.messageText, '\n')
            );
        }

        const addFunction = (name: string, span: ts.Node, fn: ts.SignatureDeclaration) => {
            scopes.push({
                kind: 'function',
                name,
                startLine: lineOf(span.getStart(sourceFile)),
                endLine: lineOf(span.getEnd()),
                parameters: fn.parameters
                    .map(p => toParameter(p, sourceFile))
                    .filter(p => p.name !== 'this'),
                isAsync: hasAsyncModifier(fn),
            });
        };

        const visit = (node: ts.Node): void => {
            if (ts.isFunctionDeclaration(node) && node.name) {
                addFunction(node.name.text, node, node);
            } else if (ts.isMethodDeclaration(node) || ts.isGetAccessorDeclaration(node) || ts.isSetAccessorDeclaration(node)) {
                addFunction(propertyName(node.name, sourceFile), node, node);
            } else if (ts.isConstructorDeclaration(node)) {
                addFunction('constructor', node, node);
            } else if (
                (ts.isVariableDeclaration(node) || ts.isPropertyDeclaration(node) || ts.isPropertyAssignment(node)) &&
                node.initializer &&
                (ts.isArrowFunction(node.initializer) || ts.isFunctionExpression(node.initializer))
            ) {
                addFunction(propertyName(node.name, sourceFile), node, node.initializer);
                // Skip the initializer itself so the expression is not reported twice
                ts.forEachChild(node.initializer, visit);
                return;
            } else if ((ts.isClassDeclaration(node) || ts.isClassExpression(node)) && node.name) {
                scopes.push({
                    kind: 'class',
                    name: node.name.text,
                    startLine: lineOf(node.getStart(sourceFile)),
                    endLine: lineOf(node.getEnd()),
                    parameters: [],
                    isAsync: false,
                });
            }
            ts.forEachChild(node, visit);
        };

        visit(sourceFile);
        return scopes;
    }
}

/**
 * Parse errors only; type and option diagnostics are left out
 */
function syntacticErrors(source: string, fileName: string): ts.Diagnostic[] {
    const { diagnostics = [] } = ts.transpileModule(source, { fileName, reportDiagnostics: true, compilerOptions: {} });
    return diagnostics.filter(d => d.file !== undefined && d.category === ts.DiagnosticCategory.Error);
}

function scriptKindFor(fileName: string): ts.ScriptKind {
    switch (path.extname(fileName).toLowerCase()) {
        case '.tsx':
            return ts.ScriptKind.TSX;
        case '.jsx':
            return ts.ScriptKind.JSX;
        case '.js':
        case '.mjs':
        case '.cjs':
            return ts.ScriptKind.JS;
        default:
            return ts.ScriptKind.TS;
    }
}

function propertyName(name: ts.Node, sourceFile: ts.SourceFile): string {
    if (ts.isIdentifier(name) || ts.isPrivateIdentifier(name) || ts.isStringLiteral(name) || ts.isNumericLiteral(name)) {
        return name.text;
    }
    return name.getText(sourceFile);
}

function toParameter(parameter: ts.ParameterDeclaration, sourceFile: ts.SourceFile): ParameterInfo {
    const info: ParameterInfo = {
        name: parameter.name.getText(sourceFile),
        hasDefault: parameter.initializer !== undefined || parameter.questionToken !== undefined,
    };
    if (parameter.type) {
        info.annotation = parameter.type.getText(sourceFile);
    }
    return info;
}

function hasAsyncModifier(node: ts.Node): boolean {
    if (!ts.canHaveModifiers(node)) return false;
    return (ts.getModifiers(node) ?? []).some(m => m.kind === ts.SyntaxKind.AsyncKeyword);
}

import { GapSeverity, GapType } from '../models/CoverageModels';

export interface ParameterInfo {
    name: string;
    annotation?: string;
    hasDefault: boolean;
}

/**
 * A function or class span in a parsed source file (1-based, inclusive lines)
 */
export interface ScopeNode {
    kind: 'function' | 'class';
    name: string;
    startLine: number;
    endLine: number;
    parameters: ParameterInfo[];
    isAsync: boolean;
}

export interface GapTypeRule {
    gapType: GapType;
    matches(line: string): boolean;
}

export interface SeverityContext {
    line: string;
    functionName?: string;
    className?: string;
}

export interface SeverityRule {
    severity: GapSeverity;
    matches(context: SeverityContext): boolean;
}

/**
 * Scope and parameters a template is rendered for
 */
export interface TemplateContext {
    functionName?: string;
    className?: string;
    parameters: ParameterInfo[];
    isAsync: boolean;
}

export interface ImportTarget {
    /** Module specifier as written in the test file */
    specifier: string;
    className?: string;
    functionName?: string;
}

/**
 * Test-framework specific template fragments
 */
export interface TestTemplateSet {
    framework: string;
    branch(context: TemplateContext): string;
    exception(context: TemplateContext): string;
    basic(context: TemplateContext): string;
    errorPath(context: TemplateContext): string;
    generic(context: TemplateContext): string;
    parameterEdgeCase(context: TemplateContext, parameter: ParameterInfo): string;
    header(sourcePath: string): string;
    imports(target: ImportTarget, withMocking: boolean): string;
    classSkeleton(className: string, body: string): string;
}

/**
 * Base interface for language adapters
 */
/**
 * Source text an adapter could not parse; `line` is 1-based
 */
export class SourceParseError extends Error {
    constructor(readonly fileName: string, readonly line: number, readonly reason: string) {
        super(`Cannot parse ${fileName}:${line}: ${reason}`);
        this.name = 'SourceParseError';
    }
}

export interface LanguageAdapter {
    /**
     * Language name
     */
    language: string;

    /**
     * File extensions handled, lower-case with leading dot
     */
    extensions: string[];

    /**
     * Ordered gap-type rules; the first match wins, `uncovered_lines` otherwise
     */
    gapTypeRules: GapTypeRule[];

    /**
     * Ordered severity rules; the first match wins, `low` otherwise
     */
    severityRules: SeverityRule[];

    /**
     * Tokens that each add one to a line's complexity
     */
    complexityTokens: string[];

    templates: TestTemplateSet;

    /**
     * Whether a trimmed, non-empty line is a comment
     */
    isCommentLine(trimmedLine: string): boolean;

    /**
     * Whether a path (relative to the source root) names a test file
     */
    isTestFile(relativePath: string): boolean;

    /**
     * Parse function and class spans. Throws SourceParseError when the source cannot be parsed.
     */
    parseScopes(source: string, fileName: string): ScopeNode[];

    /**
     * Conventional test file location for a source file relative to the source root
     */
    getTestFilePath(relativeSourcePath: string, testDir: string): string;

    /**
     * Module specifier a test file uses to import the source file
     */
    getImportSpecifier(relativeSourcePath: string, testFilePath: string, sourceDir: string): string;
}

/**
 * Build an ordered severity rule table from keyword lists:
 * critical matches the lower-cased line, high the line as written,
 * medium the lower-cased enclosing function name.
 */
export function keywordSeverityRules(keywords: {
    critical: string[];
    high: string[];
    medium: string[];
}): SeverityRule[] {
    return [
        {
            severity: 'critical',
            matches: ({ line }) => {
                const lower = line.toLowerCase();
                return keywords.critical.some(k => lower.includes(k));
            },
        },
        {
            severity: 'high',
            matches: ({ line }) => keywords.high.some(k => line.includes(k)),
        },
        {
            severity: 'medium',
            matches: ({ functionName }) => {
                if (!functionName) return false;
                const lower = functionName.toLowerCase();
                return keywords.medium.some(k => lower.includes(k));
            },
        },
    ];
}

export function containsAny(tokens: string[]): (line: string) => boolean {
    return line => tokens.some(token => line.includes(token));
}

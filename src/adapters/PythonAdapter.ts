import path from 'path';
import {
    LanguageAdapter,
    GapTypeRule,
    ParameterInfo,
    ScopeNode,
    SourceParseError,
    containsAny,
    keywordSeverityRules,
} from './LanguageAdapter';
import { pytestTemplates } from '../generator/templates/PytestTemplates';

const DEFINITION = /^(async\s+def|def|class)\s+([A-Za-z_]\w*)/;

interface LineInfo {
    indent: number;
    /** `blank` covers comment-only lines; `continuation` lines start inside brackets or strings */
    kind: 'statement' | 'continuation' | 'blank';
}

/**
 * Language adapter for Python sources (pytest conventions)
 */
export class PythonAdapter implements LanguageAdapter {
    language = 'python';
    extensions = ['.py'];

    gapTypeRules: GapTypeRule[] = [
        { gapType: 'missing_branch', matches: containsAny(['if ', 'elif ']) },
        { gapType: 'exception_handling', matches: containsAny(['except ', 'except:']) },
        { gapType: 'uncovered_function', matches: containsAny(['def ']) },
        { gapType: 'uncovered_class', matches: containsAny(['class ']) },
        { gapType: 'error_path', matches: containsAny(['raise ']) },
    ];

    severityRules = keywordSeverityRules({
        critical: ['raise', 'except', 'assert', 'auth', 'password', 'token'],
        high: ['if ', 'elif ', 'validate', 'check', 'verify'],
        medium: ['format', 'convert', 'parse', 'util'],
    });

    complexityTokens = ['if ', 'elif ', 'for ', 'while ', 'try ', 'except ', ' and ', ' or ', ' not '];

    templates = pytestTemplates;

    isCommentLine(trimmedLine: string): boolean {
        return trimmedLine.startsWith('#');
    }

    isTestFile(relativePath: string): boolean {
        const base = path.basename(relativePath);
        return base.startsWith('test_') || base.endsWith('_test.py') || base === 'conftest.py';
    }

    getTestFilePath(relativeSourcePath: string, testDir: string): string {
        const parsed = path.parse(relativeSourcePath);
        return path.join(testDir, 'unit', parsed.dir, `test_${parsed.name}.py`);
    }

    getImportSpecifier(relativeSourcePath: string): string {
        const parsed = path.parse(relativeSourcePath);
        return path.join(parsed.dir, parsed.name).split(path.sep).join('.');
    }

    parseScopes(source: string, fileName: string = '<source>'): ScopeNode[] {
        const lines = source.split('\n');
        const info = scanLines(lines, fileName);
        const scopes: ScopeNode[] = [];

        for (let i = 0; i < lines.length; i++) {
            if (info[i].kind !== 'statement') continue;

            const match = lines[i].trim().match(DEFINITION);
            if (!match) continue;

            const keyword = match[1];
            const name = match[2];
            const indent = info[i].indent;
            const headerEnd = findHeaderEnd(info, i);
            if (!hasBlockColon(lines.slice(i, headerEnd + 1))) {
                throw new SourceParseError(fileName, i + 1, `'${keyword}' header without ':'`);
            }
            const endLine = findBlockEnd(info, headerEnd, indent);

            const isClass = keyword === 'class';
            scopes.push({
                kind: isClass ? 'class' : 'function',
                name,
                startLine: i + 1,
                endLine: endLine + 1,
                parameters: isClass ? [] : parseParameters(lines.slice(i, headerEnd + 1).join('\n')),
                isAsync: keyword.startsWith('async'),
            });
        }

        return scopes;
    }
}

/**
 * Tokenize just enough to know which lines start statements:
 * strings, comments, open brackets and backslash continuations.
 * Throws on unbalanced brackets and unterminated triple-quoted strings.
 */
function scanLines(lines: string[], fileName: string): LineInfo[] {
    const result: LineInfo[] = [];
    const openers: number[] = [];
    let depth = 0;
    let openString: string | null = null;
    let stringStart = 0;
    let continued = false;

    for (let lineIndex = 0; lineIndex < lines.length; lineIndex++) {
        const line = lines[lineIndex];
        const trimmed = line.trim();
        const startsInside = depth > 0 || openString !== null || continued;
        result.push({
            indent: measureIndent(line),
            kind: startsInside ? 'continuation' : trimmed.length > 0 && !trimmed.startsWith('#') ? 'statement' : 'blank',
        });

        continued = false;
        let i = 0;
        while (i < line.length) {
            const ch = line[i];

            if (openString !== null) {
                if (ch === '\\') {
                    i += 2;
                    continue;
                }
                if (line.startsWith(openString, i)) {
                    i += openString.length;
                    openString = null;
                    continue;
                }
                i++;
                continue;
            }

            if (ch === '#') break;
            if (ch === '"' || ch === "'") {
                const triple = ch.repeat(3);
                openString = line.startsWith(triple, i) ? triple : ch;
                stringStart = lineIndex + 1;
                i += openString.length;
                continue;
            }
            if (ch === '(' || ch === '[' || ch === '{') {
                depth++;
                openers.push(lineIndex + 1);
            } else if (ch === ')' || ch === ']' || ch === '}') {
                if (depth === 0) {
                    throw new SourceParseError(fileName, lineIndex + 1, `unmatched '${ch}'`);
                }
                depth--;
                openers.pop();
            }
            i++;
        }

        // Single-quoted strings never span lines
        if (openString !== null && openString.length === 1) {
            openString = null;
        }
        if (openString === null && line.trimEnd().endsWith('\\')) {
            continued = true;
        }
    }

    if (openString !== null) {
        throw new SourceParseError(fileName, stringStart, 'unterminated triple-quoted string');
    }
    if (openers.length > 0) {
        throw new SourceParseError(fileName, openers[openers.length - 1], 'unclosed bracket');
    }
    return result;
}

/**
 * Whether a def/class header has its block colon outside brackets and strings
 */
function hasBlockColon(headerLines: string[]): boolean {
    const header = headerLines.map(stripComment).join('\n');
    let depth = 0;
    let quote: string | null = null;

    for (let i = 0; i < header.length; i++) {
        const ch = header[i];
        if (quote) {
            if (ch === '\\') i++;
            else if (ch === quote) quote = null;
        } else if (ch === '"' || ch === "'") {
            quote = ch;
        } else if (ch === '(' || ch === '[' || ch === '{') {
            depth++;
        } else if (ch === ')' || ch === ']' || ch === '}') {
            depth--;
        } else if (ch === ':' && depth === 0) {
            return true;
        }
    }
    return false;
}

function measureIndent(line: string): number {
    let width = 0;
    for (const ch of line) {
        if (ch === ' ') width++;
        else if (ch === '\t') width += 4;
        else break;
    }
    return width;
}

/**
 * Last line of a (possibly multi-line) header starting at `start`
 */
function findHeaderEnd(info: LineInfo[], start: number): number {
    let end = start;
    while (end + 1 < info.length && info[end + 1].kind === 'continuation') {
        end++;
    }
    return end;
}

/**
 * Last line of the block whose header ends at `headerEnd`: everything up to the next
 * statement indented at or left of the header, without trailing blank and comment lines.
 */
function findBlockEnd(info: LineInfo[], headerEnd: number, indent: number): number {
    let last = headerEnd;
    for (let i = headerEnd + 1; i < info.length; i++) {
        const line = info[i];
        if (line.kind === 'statement') {
            if (line.indent <= indent) break;
            last = i;
        } else if (line.kind === 'continuation') {
            last = i;
        }
    }
    return last;
}

function stripComment(line: string): string {
    let quote: string | null = null;
    for (let i = 0; i < line.length; i++) {
        const ch = line[i];
        if (quote) {
            if (ch === '\\') i++;
            else if (ch === quote) quote = null;
        } else if (ch === '"' || ch === "'") {
            quote = ch;
        } else if (ch === '#') {
            return line.slice(0, i);
        }
    }
    return line;
}

/**
 * Split text on commas outside brackets and strings
 */
function splitTopLevel(text: string, separator: string): string[] {
    const parts: string[] = [];
    let depth = 0;
    let quote: string | null = null;
    let current = '';

    for (let i = 0; i < text.length; i++) {
        const ch = text[i];
        if (quote) {
            current += ch;
            if (ch === '\\' && i + 1 < text.length) {
                current += text[++i];
            } else if (ch === quote) {
                quote = null;
            }
            continue;
        }
        if (ch === '"' || ch === "'") quote = ch;
        else if (ch === '(' || ch === '[' || ch === '{') depth++;
        else if (ch === ')' || ch === ']' || ch === '}') depth--;

        if (ch === separator && depth === 0) {
            parts.push(current);
            current = '';
        } else {
            current += ch;
        }
    }
    parts.push(current);
    return parts;
}

/**
 * Parameters of a `def` header; `self` and `cls` are dropped
 */
export function parseParameters(header: string): ParameterInfo[] {
    const open = header.indexOf('(');
    if (open === -1) return [];

    let depth = 0;
    let close = -1;
    for (let i = open; i < header.length; i++) {
        if (header[i] === '(') depth++;
        else if (header[i] === ')') {
            depth--;
            if (depth === 0) {
                close = i;
                break;
            }
        }
    }
    if (close === -1) return [];

    const inner = header
        .slice(open + 1, close)
        .split('\n')
        .map(stripComment)
        .join(' ');

    const parameters: ParameterInfo[] = [];
    for (const raw of splitTopLevel(inner, ',')) {
        const part = raw.trim();
        if (!part || part === '/' || part === '*') continue;

        const [declaration, ...defaultParts] = splitTopLevel(part, '=');
        const [namePart, ...annotationParts] = splitTopLevel(declaration, ':');
        const name = namePart.trim().replace(/^\*{1,2}/, '');
        if (name === 'self' || name === 'cls') continue;

        const parameter: ParameterInfo = { name, hasDefault: defaultParts.length > 0 };
        const annotation = annotationParts.join(':').trim();
        if (annotation) parameter.annotation = annotation;
        parameters.push(parameter);
    }
    return parameters;
}

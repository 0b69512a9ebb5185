import { LanguageAdapter, SeverityContext } from '../adapters/LanguageAdapter';
import { GapSeverity, GapType } from '../models/CoverageModels';

/**
 * Gap type of a line: first matching rule, `uncovered_lines` otherwise
 */
export function classifyGapType(line: string, adapter: LanguageAdapter): GapType {
    const rule = adapter.gapTypeRules.find(r => r.matches(line));
    return rule ? rule.gapType : 'uncovered_lines';
}

/**
 * Severity of a line in its scope: first matching rule, `low` otherwise
 */
export function determineSeverity(context: SeverityContext, adapter: LanguageAdapter): GapSeverity {
    const rule = adapter.severityRules.find(r => r.matches(context));
    return rule ? rule.severity : 'low';
}

/**
 * Non-overlapping occurrences of `token` in `text`
 */
export function countOccurrences(text: string, token: string): number {
    if (token.length === 0) return 0;
    let count = 0;
    let index = text.indexOf(token);
    while (index !== -1) {
        count++;
        index = text.indexOf(token, index + token.length);
    }
    return count;
}

/**
 * 1 + occurrences of the adapter's branch, loop and logical-operator tokens
 */
export function lineComplexity(line: string, adapter: LanguageAdapter): number {
    return adapter.complexityTokens.reduce((score, token) => score + countOccurrences(line, token), 1);
}

/**
 * Short test ideas for an uncovered line
 */
export function suggestTestsForLine(line: string, adapter: LanguageAdapter, functionName?: string): string[] {
    const text = line.trim();
    const matched = new Set(adapter.gapTypeRules.filter(r => r.matches(text)).map(r => r.gapType));
    const suggestions: string[] = [];

    if (matched.has('missing_branch')) {
        suggestions.push(`Test both true and false conditions for: ${text}`);
    }
    if (matched.has('exception_handling')) {
        suggestions.push(`Test exception handling: ${text}`);
    }
    if (functionName) {
        suggestions.push(`Test function '${functionName}' with edge cases`);
    }
    if (matched.has('error_path')) {
        suggestions.push(`Test error condition that triggers: ${text}`);
    }

    return suggestions;
}

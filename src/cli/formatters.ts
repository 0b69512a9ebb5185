import path from 'path';
import { CoverageGap, CoverageQualityMetrics } from '../models/CoverageModels';
import { MissingTestFile, SuggestionPriority, TestSuggestion, fullTestName } from '../models/SuggestionModels';
import { CoverageStatistics, RegressionCheck, TREND_METRICS, TREND_METRIC_KEYS } from '../models/TrendModels';

const RULE = '='.repeat(60);
const SUBRULE = '-'.repeat(30);

function titleCase(value: string): string {
    return value
        .split('_')
        .map(word => word.charAt(0).toUpperCase() + word.slice(1))
        .join(' ');
}

function signed(value: number): string {
    return `${value >= 0 ? '+' : ''}${value.toFixed(1)}`;
}

function pad(value: number): string {
    return value.toFixed(1).padStart(6);
}

export function formatAnalysisText(metrics: CoverageQualityMetrics, gaps: CoverageGap[], detailed: boolean): string {
    const lines = [
        RULE,
        'COVERAGE ANALYSIS REPORT',
        RULE,
        '',
        'COVERAGE METRICS',
        SUBRULE,
        `Line Coverage:      ${pad(metrics.lineCoveragePercent)}%`,
        `Branch Coverage:    ${pad(metrics.branchCoveragePercent)}%`,
        `Function Coverage:  ${pad(metrics.functionCoveragePercent)}%`,
        `Overall Score:      ${pad(metrics.overallScore)}`,
        `Effective Coverage: ${pad(metrics.effectiveCoverageScore)}%`,
        `Test Quality:       ${pad(metrics.testQualityScore)}`,
        '',
        'COVERAGE GAPS',
        SUBRULE,
        `Total Gaps:         ${metrics.totalGaps}`,
        `Critical Gaps:      ${metrics.criticalGaps}`,
        `High Priority:      ${metrics.highPriorityGaps}`,
        '',
        'TREND ANALYSIS',
        SUBRULE,
        `Trend Direction:    ${titleCase(metrics.coverageTrend)}`,
        `Trend Change:       ${signed(metrics.trendPercentage)}%`,
        '',
        'FILE ANALYSIS',
        SUBRULE,
        `Well Covered:       ${metrics.wellCoveredFiles} files (>=90%)`,
        `Poorly Covered:     ${metrics.poorlyCoveredFiles} files (<50%)`,
        `Uncovered:          ${metrics.uncoveredFiles} files (0%)`,
    ];

    if (detailed && gaps.length > 0) {
        lines.push('', 'DETAILED GAPS (Top 20)', SUBRULE);
        for (const gap of gaps.slice(0, 20)) {
            lines.push(`- ${path.basename(gap.filePath)}:${gap.lineStart}-${gap.lineEnd} - ${gap.gapType} (${gap.severity})`);
            if (gap.functionName) {
                lines.push(`  Function: ${gap.functionName}`);
            }
            if (gap.suggestedTests.length > 0) {
                lines.push(`  Suggestion: ${gap.suggestedTests[0]}`);
            }
            lines.push('');
        }
    }

    return lines.join('\n');
}

export function formatSuggestionsText(suggestions: TestSuggestion[]): string {
    const lines = [
        RULE,
        'TEST SUGGESTIONS',
        RULE,
        '',
        `Generated ${suggestions.length} test suggestions to improve coverage:`,
        '',
    ];

    const priorities: SuggestionPriority[] = ['high', 'medium', 'low'];
    for (const priority of priorities) {
        const group = suggestions.filter(s => s.priority === priority);
        if (group.length === 0) continue;

        lines.push(`${priority.toUpperCase()} PRIORITY (${group.length} suggestions)`, '-'.repeat(50));
        for (const suggestion of group) {
            const scope = suggestion.functionName ?? 'module level';
            const label = suggestion.className ? `${suggestion.className}.${scope}` : scope;
            lines.push(
                `- ${path.basename(suggestion.filePath)} - ${label}`,
                `  Type: ${titleCase(suggestion.testType)}`,
                `  Description: ${suggestion.description}`,
                `  Suggested test: ${fullTestName(suggestion)}`,
                ''
            );
        }
    }

    return lines.join('\n');
}

export function formatMissingTestsText(missing: MissingTestFile[], projectRoot: string): string {
    if (missing.length === 0) {
        return 'Every source file has a test file.';
    }

    const lines = [`MISSING TEST FILES (${missing.length})`, SUBRULE];
    for (const entry of missing) {
        lines.push(
            `- ${path.relative(projectRoot, entry.sourceFile)} -> ${path.relative(projectRoot, entry.suggestedTestFile)}`,
            `  Priority: ${entry.priority.toUpperCase()} (${entry.classes.length} classes, ${entry.functions.length} functions)`
        );
    }
    return lines.join('\n');
}

export function formatTrendsText(stats: CoverageStatistics, regression: RegressionCheck): string {
    const lines = [
        RULE,
        'COVERAGE TRENDS ANALYSIS',
        RULE,
        '',
        `ANALYSIS PERIOD: ${stats.periodDays} days`,
        `DATA POINTS: ${stats.dataPoints}`,
        `PERIOD: ${stats.firstTimestamp} to ${stats.lastTimestamp}`,
        '',
    ];

    for (const metric of TREND_METRICS) {
        const data = stats.statistics[metric];
        lines.push(
            TREND_METRIC_KEYS[metric].toUpperCase(),
            SUBRULE,
            `Current:    ${data.current.toFixed(1)}%`,
            `Average:    ${data.average.toFixed(1)}%`,
            `Range:      ${data.min.toFixed(1)}% - ${data.max.toFixed(1)}%`,
            `Trend:      ${titleCase(data.trend.direction)}`,
            `Change:     ${signed(data.trend.changePercent)}%`,
            ''
        );
    }

    if (regression.hasRegression) {
        lines.push('REGRESSION DETECTED', SUBRULE);
        for (const finding of regression.regressions) {
            lines.push(
                `- ${titleCase(TREND_METRIC_KEYS[finding.metric])}`,
                `  Current: ${finding.currentValue.toFixed(1)}`,
                `  Average: ${finding.recentAverage.toFixed(1)}`,
                `  Drop: ${finding.percentageDrop.toFixed(1)}%`,
                `  Severity: ${finding.severity.toUpperCase()}`,
                ''
            );
        }
    } else {
        lines.push(regression.message);
    }

    return lines.join('\n');
}

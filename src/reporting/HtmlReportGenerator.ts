import path from 'path';
import { CoverageGap, CoverageQualityMetrics, CoverageSummary } from '../models/CoverageModels';
import { TestSuggestion, fullTestName } from '../models/SuggestionModels';
import { CoverageTrend } from '../models/TrendModels';
import { mean } from '../utils/statistics';

export interface HtmlReportInput {
    title: string;
    generatedAt: Date;
    metrics: CoverageQualityMetrics;
    summary: CoverageSummary | null;
    gaps: CoverageGap[];
    trends: CoverageTrend[];
    suggestions: TestSuggestion[];
    /** Chart files relative to the report, by kind */
    charts?: Record<string, string>;
}

const MAX_GAP_ROWS = 20;
const MAX_SUGGESTION_ROWS = 15;

export function escapeHtml(value: unknown): string {
    return String(value)
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&#39;');
}

function titleCase(value: string): string {
    return value
        .split('_')
        .map(word => word.charAt(0).toUpperCase() + word.slice(1))
        .join(' ');
}

/**
 * good >= 80, warning >= 60, poor below
 */
export function scoreClass(value: number): 'good' | 'warning' | 'poor' {
    if (value >= 80) return 'good';
    if (value >= 60) return 'warning';
    return 'poor';
}

function scopeLabel(functionName?: string, className?: string): string {
    if (className) {
        return functionName ? `${className}.${functionName}` : className;
    }
    return functionName ?? '';
}

/**
 * Renders the coverage dashboard as a standalone HTML document
 */
export class HtmlReportGenerator {

    buildHtml(input: HtmlReportInput): string {
        return `<!DOCTYPE html>
<html lang="en">
<head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>${escapeHtml(input.title)}</title>
    ${this.getStyles()}
</head>
<body>
    <div class="container">
        ${this.buildHeader(input)}
        <div class="content">
            ${this.buildSummary(input.metrics)}
            ${this.buildMetricsDashboard(input.metrics)}
            ${this.buildGapsSection(input.gaps)}
            ${this.buildTrendsSection(input.trends, input.charts)}
            ${this.buildSuggestionsSection(input.suggestions)}
        </div>
        ${this.buildFooter(input)}
    </div>
</body>
</html>`;
    }

    private buildHeader(input: HtmlReportInput): string {
        return `
        <header>
            <h1>${escapeHtml(input.title)}</h1>
            <div class="subtitle">Generated ${escapeHtml(input.generatedAt.toISOString())}</div>
        </header>`;
    }

    private buildSummary(metrics: CoverageQualityMetrics): string {
        const score = metrics.overallScore;
        return `
        <section class="summary">
            <h2>Summary</h2>
            <div class="metrics-grid">
                <div class="metric ${scoreClass(score)}">
                    <div class="metric-value">${score.toFixed(1)}</div>
                    <div class="metric-label">Overall Score</div>
                </div>
                <div class="metric">
                    <div class="metric-value">${metrics.totalGaps}</div>
                    <div class="metric-label">Coverage Gaps</div>
                </div>
                <div class="metric ${metrics.criticalGaps > 0 ? 'poor' : ''}">
                    <div class="metric-value">${metrics.criticalGaps}</div>
                    <div class="metric-label">Critical Gaps</div>
                </div>
                <div class="metric">
                    <div class="metric-value">${metrics.wellCoveredFiles}</div>
                    <div class="metric-label">Well Covered Files</div>
                </div>
                <div class="metric ${metrics.uncoveredFiles > 0 ? 'warning' : ''}">
                    <div class="metric-value">${metrics.uncoveredFiles}</div>
                    <div class="metric-label">Uncovered Files</div>
                </div>
            </div>
        </section>`;
    }

    private buildMetricsDashboard(metrics: CoverageQualityMetrics): string {
        const cards: Array<[string, number]> = [
            ['Line Coverage', metrics.lineCoveragePercent],
            ['Branch Coverage', metrics.branchCoveragePercent],
            ['Function Coverage', metrics.functionCoveragePercent],
            ['Effective Coverage', metrics.effectiveCoverageScore],
            ['Test Quality', metrics.testQualityScore],
        ];

        return `
        <section class="dashboard">
            <h2>Quality Metrics</h2>
            <div class="metrics-grid">
                ${cards.map(([label, value]) => `
                <div class="metric-card ${scoreClass(value)}">
                    <div class="metric-label">${label}</div>
                    <div class="metric-value">${value.toFixed(1)}%</div>
                    <div class="coverage-bar"><div class="coverage-fill" style="width: ${Math.min(100, Math.max(0, value)).toFixed(1)}%"></div></div>
                </div>`).join('')}
                <div class="metric-card">
                    <div class="metric-label">Coverage Trend</div>
                    <div class="metric-value">${titleCase(metrics.coverageTrend)}</div>
                    <div class="metric-label">${metrics.trendPercentage >= 0 ? '+' : ''}${metrics.trendPercentage.toFixed(1)}</div>
                </div>
            </div>
        </section>`;
    }

    private buildGapsSection(gaps: CoverageGap[]): string {
        if (gaps.length === 0) {
            return `
        <section class="gaps">
            <h2>Coverage Gaps</h2>
            <div class="alert info">No coverage gaps found.</div>
        </section>`;
        }

        return `
        <section class="gaps">
            <h2>Coverage Gaps</h2>
            <table class="gaps-table">
                <thead>
                    <tr>
                        <th>File</th>
                        <th>Function/Class</th>
                        <th>Lines</th>
                        <th>Type</th>
                        <th>Severity</th>
                        <th>Complexity</th>
                        <th>Suggestions</th>
                    </tr>
                </thead>
                <tbody>
                    ${gaps.slice(0, MAX_GAP_ROWS).map(gap => {
                        const allSuggestions = gap.suggestedTests.length > 0 ? gap.suggestedTests.join('; ') : 'None';
                        let shown = gap.suggestedTests.length > 0 ? gap.suggestedTests.slice(0, 2).join('; ') : 'None';
                        if (shown.length > 100) {
                            shown = `${shown.slice(0, 97)}...`;
                        }
                        return `
                    <tr class="severity-row-${gap.severity}">
                        <td>${escapeHtml(path.basename(gap.filePath))}</td>
                        <td>${escapeHtml(scopeLabel(gap.functionName, gap.className))}</td>
                        <td>${gap.lineStart}-${gap.lineEnd}</td>
                        <td>${titleCase(gap.gapType)}</td>
                        <td><span class="severity-${gap.severity}">${gap.severity.toUpperCase()}</span></td>
                        <td>${gap.complexityScore || 1}</td>
                        <td title="${escapeHtml(allSuggestions)}">${escapeHtml(shown)}</td>
                    </tr>`;
                    }).join('')}
                </tbody>
            </table>
            ${gaps.length > MAX_GAP_ROWS ? `<div class="alert info">...and ${gaps.length - MAX_GAP_ROWS} more gaps. See the JSON report for the top entries.</div>` : ''}
        </section>`;
    }

    private buildTrendsSection(trends: CoverageTrend[], charts?: Record<string, string>): string {
        if (trends.length < 2) {
            return '';
        }

        const recent = trends.slice(-10).map(t => t.lineCoverage);
        const slope = (recent[recent.length - 1] - recent[0]) / recent.length;
        const direction = slope > 0.5 ? 'Improving' : slope < -0.5 ? 'Declining' : 'Stable';
        const chartEntries = Object.entries(charts ?? {});

        return `
        <section class="trends">
            <h2>Coverage Trends</h2>
            <div class="metrics-grid">
                <div class="metric">
                    <div class="metric-value">${trends.length}</div>
                    <div class="metric-label">Data Points</div>
                </div>
                <div class="metric">
                    <div class="metric-value">${direction}</div>
                    <div class="metric-label">Trend Direction</div>
                </div>
                <div class="metric">
                    <div class="metric-value">${mean(recent).toFixed(1)}%</div>
                    <div class="metric-label">Average Coverage</div>
                </div>
                <div class="metric">
                    <div class="metric-value">${(Math.max(...recent) - Math.min(...recent)).toFixed(1)}%</div>
                    <div class="metric-label">Coverage Range</div>
                </div>
            </div>
            ${chartEntries.length > 0
                ? `<div class="charts">${chartEntries.map(([kind, file]) =>
                    `<img src="${escapeHtml(file)}" alt="${escapeHtml(titleCase(kind))}">`).join('')}</div>`
                : '<div class="alert info">Trend charts are written to the charts directory when charting is enabled.</div>'}
        </section>`;
    }

    private buildSuggestionsSection(suggestions: TestSuggestion[]): string {
        if (suggestions.length === 0) {
            return '';
        }

        return `
        <section class="suggestions">
            <h2>Test Suggestions</h2>
            <table class="suggestions-table">
                <thead>
                    <tr>
                        <th>File</th>
                        <th>Function/Class</th>
                        <th>Test Type</th>
                        <th>Priority</th>
                        <th>Description</th>
                        <th>Suggested Test Name</th>
                    </tr>
                </thead>
                <tbody>
                    ${suggestions.slice(0, MAX_SUGGESTION_ROWS).map(s => `
                    <tr>
                        <td>${escapeHtml(path.basename(s.filePath))}</td>
                        <td>${escapeHtml(scopeLabel(s.functionName, s.className))}</td>
                        <td>${titleCase(s.testType)}</td>
                        <td><span class="priority-${s.priority}">${s.priority.toUpperCase()}</span></td>
                        <td>${escapeHtml(s.description)}</td>
                        <td><code>${escapeHtml(fullTestName(s))}</code></td>
                    </tr>`).join('')}
                </tbody>
            </table>
        </section>`;
    }

    private buildFooter(input: HtmlReportInput): string {
        const files = input.summary?.files;
        return `
        <footer>
            ${files ? `<div>Files: ${files.well_covered} well covered | ${files.poorly_covered} poorly covered | ${files.uncovered} uncovered</div>` : ''}
            <div>Report generated at: ${escapeHtml(input.generatedAt.toISOString())}</div>
        </footer>`;
    }

    private getStyles(): string {
        return `<style>
        * { margin: 0; padding: 0; box-sizing: border-box; }
        body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, Oxygen, Ubuntu, Cantarell, sans-serif; background: #f5f7fa; color: #333; line-height: 1.6; }
        .container { max-width: 1200px; margin: 0 auto; padding: 20px; }
        header { background: linear-gradient(135deg, #667eea 0%, #764ba2 100%); color: white; padding: 30px; border-radius: 12px; margin-bottom: 30px; box-shadow: 0 4px 6px rgba(0,0,0,0.1); }
        header h1 { font-size: 2em; font-weight: 300; }
        header .subtitle { opacity: 0.9; margin-top: 10px; }
        section { background: white; padding: 25px; border-radius: 12px; margin-bottom: 20px; box-shadow: 0 2px 4px rgba(0,0,0,0.05); }
        h2 { margin-bottom: 20px; color: #1f2937; font-size: 1.5em; }
        .metrics-grid { display: grid; grid-template-columns: repeat(auto-fit, minmax(180px, 1fr)); gap: 20px; }
        .metric, .metric-card { text-align: center; padding: 20px; background: #f9fafb; border-radius: 8px; border-left: 4px solid #e5e7eb; }
        .metric-value { font-size: 2em; font-weight: bold; color: #1f2937; }
        .metric-label { color: #6b7280; font-size: 0.9em; margin-top: 5px; }
        .good { border-left-color: #10b981; }
        .good .metric-value { color: #10b981; }
        .warning { border-left-color: #f59e0b; }
        .warning .metric-value { color: #d97706; }
        .poor { border-left-color: #ef4444; }
        .poor .metric-value { color: #ef4444; }
        .coverage-bar { height: 8px; background: #e5e7eb; border-radius: 4px; overflow: hidden; margin-top: 10px; }
        .coverage-fill { height: 100%; background: linear-gradient(90deg, #10b981 0%, #059669 100%); }
        .alert { padding: 15px; border-radius: 8px; margin: 15px 0; }
        .alert.info { background: #dbeafe; border-left: 4px solid #3b82f6; }
        table { width: 100%; border-collapse: collapse; margin: 10px 0; }
        th { background: #f9fafb; padding: 12px; text-align: left; font-weight: 600; border-bottom: 2px solid #e5e7eb; }
        td { padding: 12px; border-bottom: 1px solid #f3f4f6; }
        code { background: #f3f4f6; padding: 2px 6px; border-radius: 4px; font-family: 'Courier New', monospace; font-size: 0.9em; }
        .severity-critical { color: #991b1b; background: #fee2e2; padding: 2px 8px; border-radius: 12px; font-weight: 600; }
        .severity-high { color: #9a3412; background: #ffedd5; padding: 2px 8px; border-radius: 12px; font-weight: 600; }
        .severity-medium { color: #92400e; background: #fef3c7; padding: 2px 8px; border-radius: 12px; }
        .severity-low { color: #065f46; background: #d1fae5; padding: 2px 8px; border-radius: 12px; }
        .severity-row-critical { background: #fef2f2; }
        .priority-high { color: #991b1b; font-weight: 600; }
        .priority-medium { color: #92400e; }
        .priority-low { color: #065f46; }
        .charts img { max-width: 100%; margin-top: 15px; }
        footer { text-align: center; padding: 20px; color: #6b7280; }
        @media (max-width: 768px) {
            .metrics-grid { grid-template-columns: repeat(2, 1fr); }
        }
    </style>`;
    }
}

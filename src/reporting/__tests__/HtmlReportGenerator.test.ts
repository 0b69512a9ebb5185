import { CoverageGap, CoverageQualityMetrics, emptyMetrics } from '../../models/CoverageModels';
import { TestSuggestion } from '../../models/SuggestionModels';
import { CoverageTrend } from '../../models/TrendModels';
import { HtmlReportGenerator, HtmlReportInput, escapeHtml, scoreClass } from '../HtmlReportGenerator';

function gap(overrides: Partial<CoverageGap> = {}): CoverageGap {
    return {
        filePath: '/repo/src/calc.py',
        lineStart: 5,
        lineEnd: 5,
        gapType: 'error_path',
        severity: 'critical',
        functionName: 'divide',
        complexityScore: 2,
        suggestedTests: ['Test divide with zero'],
        ...overrides,
    };
}

function trend(lineCoverage: number): CoverageTrend {
    return {
        timestamp: '2024-05-01T00:00:00.000Z',
        lineCoverage,
        branchCoverage: 60,
        functionCoverage: 70,
        overallScore: 65,
        testCount: 10,
    };
}

const suggestion: TestSuggestion = {
    filePath: '/repo/src/calc.py',
    language: 'python',
    functionName: 'total',
    className: 'Calculator',
    testType: 'edge_case',
    priority: 'high',
    description: 'Test error conditions & edge cases in total',
    suggestedTestName: 'total_error_conditions',
    testTemplate: 'pass',
    coverageLines: [12],
    complexityScore: 1,
};

function input(overrides: Partial<HtmlReportInput> = {}): HtmlReportInput {
    const metrics: CoverageQualityMetrics = { ...emptyMetrics(), overallScore: 85, lineCoveragePercent: 64.25, totalGaps: 1, criticalGaps: 1 };
    return {
        title: 'Nightly <Coverage>',
        generatedAt: new Date('2024-05-01T08:30:00.000Z'),
        metrics,
        summary: null,
        gaps: [gap()],
        trends: [],
        suggestions: [suggestion],
        ...overrides,
    };
}

describe('HtmlReportGenerator', () => {
    const generator = new HtmlReportGenerator();

    it('should escape the title and show the generation time', () => {
        const html = generator.buildHtml(input());

        expect(html.startsWith('<!DOCTYPE html>')).toBe(true);
        expect(html).toContain('<title>Nightly &lt;Coverage&gt;</title>');
        expect(html).toContain('<div class="subtitle">Generated 2024-05-01T08:30:00.000Z</div>');
    });

    it('should color metric cards by score', () => {
        const html = generator.buildHtml(input());

        expect(html).toContain('<div class="metric good">\n                    <div class="metric-value">85.0</div>');
        expect(html).toContain('<div class="metric-card warning">\n                    <div class="metric-label">Line Coverage</div>\n                    <div class="metric-value">64.3%</div>');
    });

    it('should render gap rows with severity badges', () => {
        const html = generator.buildHtml(input({ gaps: [gap({ filePath: '/repo/src/<odd>.py', className: 'Calc' })] }));

        expect(html).toContain('<td>&lt;odd&gt;.py</td>');
        expect(html).toContain('<td>Calc.divide</td>');
        expect(html).toContain('<td>Error Path</td>');
        expect(html).toContain('<span class="severity-critical">CRITICAL</span>');
        expect(html).toContain('<td title="Test divide with zero">Test divide with zero</td>');
    });

    it('should truncate long suggestion text', () => {
        const first = 'a'.repeat(60);
        const second = 'b'.repeat(60);

        const html = generator.buildHtml(input({ gaps: [gap({ suggestedTests: [first, second, 'third'] })] }));

        expect(html).toContain(`<td title="${first}; ${second}; third">${first}; ${'b'.repeat(35)}...</td>`);
    });

    it('should show at most twenty gaps and note the rest', () => {
        const gaps = Array.from({ length: 25 }, (_, i) => gap({ lineStart: i + 1, lineEnd: i + 1 }));

        const html = generator.buildHtml(input({ gaps }));

        expect(html.match(/<tr class="severity-row-critical">/g)).toHaveLength(20);
        expect(html).toContain('...and 5 more gaps.');
    });

    it('should say so when there are no gaps', () => {
        expect(generator.buildHtml(input({ gaps: [] }))).toContain('<div class="alert info">No coverage gaps found.</div>');
        expect(generator.buildHtml(input({ gaps: [gap({ suggestedTests: [] })] }))).toContain('<td title="None">None</td>');
    });

    it('should summarize trends once there are two data points', () => {
        expect(generator.buildHtml(input({ trends: [trend(70)] }))).not.toContain('<h2>Coverage Trends</h2>');

        const html = generator.buildHtml(input({ trends: [trend(70), trend(75), trend(80)] }));

        expect(html).toContain('<h2>Coverage Trends</h2>');
        expect(html).toContain('<div class="metric-value">Improving</div>');
        expect(html).toContain('<div class="metric-value">75.0%</div>\n                    <div class="metric-label">Average Coverage</div>');
        expect(html).toContain('<div class="metric-value">10.0%</div>\n                    <div class="metric-label">Coverage Range</div>');
        expect(html).toContain('Trend charts are written to the charts directory when charting is enabled.');
    });

    it('should embed chart images when charts exist', () => {
        const html = generator.buildHtml(input({
            metrics: { ...emptyMetrics(), coverageTrend: 'improving' },
            trends: [trend(80), trend(80.2)],
            charts: { coverage_trends: 'charts/coverage_trends.svg' },
        }));

        expect(html).toContain('<div class="metric-value">Stable</div>');
        expect(html).toContain('<img src="charts/coverage_trends.svg" alt="Coverage Trends">');
    });

    it('should list suggestions with the full test name', () => {
        const html = generator.buildHtml(input());

        expect(html).toContain('<td>Calculator.total</td>');
        expect(html).toContain('<td>Edge Case</td>');
        expect(html).toContain('<span class="priority-high">HIGH</span>');
        expect(html).toContain('<td>Test error conditions &amp; edge cases in total</td>');
        expect(html).toContain('<code>test_calculator_total_error_conditions</code>');
    });

    it('should list file buckets in the footer when a summary exists', () => {
        const html = generator.buildHtml(input({
            summary: {
                timestamp: '2024-05-01T08:30:00.000Z',
                metrics: { line_coverage: 0, branch_coverage: 0, function_coverage: 0, overall_score: 0, effective_coverage: 0, test_quality: 0 },
                gaps: { total: 0, critical: 0, high: 0, by_type: {} },
                files: { well_covered: 1, poorly_covered: 2, uncovered: 0 },
                trend: { direction: 'stable', percentage: 0 },
            },
        }));

        expect(html).toContain('<div>Files: 1 well covered | 2 poorly covered | 0 uncovered</div>');
    });
});

describe('escapeHtml', () => {
    it('should escape markup characters', () => {
        expect(escapeHtml(`<a href="x">Tom & 'Jerry'</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;Tom &amp; &#39;Jerry&#39;&lt;/a&gt;');
        expect(escapeHtml(42)).toBe('42');
    });
});

describe('scoreClass', () => {
    it('should bucket scores', () => {
        expect(scoreClass(80)).toBe('good');
        expect(scoreClass(79.9)).toBe('warning');
        expect(scoreClass(60)).toBe('warning');
        expect(scoreClass(59.9)).toBe('poor');
    });
});

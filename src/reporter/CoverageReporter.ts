import path from 'path';
import { CoverageAnalyzer } from '../analyzer/CoverageAnalyzer';
import { TestGenerator } from '../generator/TestGenerator';
import {
    CoverageGap,
    CoverageQualityMetrics,
    CoverageSummary,
    countBy,
} from '../models/CoverageModels';
import { TestSuggestion, fullTestName } from '../models/SuggestionModels';
import { CoverageTrend, SerializedRegressionCheck, serializeRegressionCheck } from '../models/TrendModels';
import { ChartRenderer } from '../reporting/SvgChartRenderer';
import { HtmlReportGenerator } from '../reporting/HtmlReportGenerator';
import { CoverageTracker } from '../tracker/CoverageTracker';
import { formatFileStamp, writeFile } from '../utils/fileUtils';
import logger from '../utils/logger';
import { parseGateMetric, readGateMetric } from '../validator/QualityGate';

/**
 * Optional capabilities of the reporter, fixed at construction
 */
export interface ReporterCapabilities {
    charts?: ChartRenderer;
}

export type ArtifactKind = 'json' | 'html' | 'coverage_trends' | 'quality_score';

export type ReportArtifacts = Partial<Record<ArtifactKind, string>>;

export type ComprehensiveReportResult = ReportArtifacts | { error: string };

export interface ThresholdResult {
    current: number;
    threshold: number;
    passed: boolean;
    difference: number;
}

export type CiReport =
    | { status: 'error'; message: string }
    | {
        status: 'pass' | 'fail';
        overall_score: number;
        timestamp: string;
        quality_gates: Record<string, ThresholdResult>;
        regression_check: SerializedRegressionCheck | null;
        metrics: {
            line_coverage: number;
            branch_coverage: number;
            function_coverage: number;
            critical_gaps: number;
            high_priority_gaps: number;
        };
    };

const TREND_DAYS = 30;
const SUGGESTION_COUNT = 25;
const JSON_GAP_DETAILS = 20;
const JSON_TRENDS = 30;
const JSON_SUGGESTIONS = 15;

export const LOAD_FAILURE_MESSAGE = 'Failed to load coverage data';

/**
 * Writes the JSON, HTML and chart artifacts of a coverage run
 */
export class CoverageReporter {
    private html = new HtmlReportGenerator();
    private clock: () => Date;

    constructor(
        readonly outputDir: string,
        private capabilities: ReporterCapabilities = {},
        clock?: () => Date
    ) {
        this.clock = clock ?? (() => new Date());
    }

    /**
     * Reload coverage data and build every artifact; one artifact failing does not stop the others
     */
    async comprehensiveReport(
        analyzer: CoverageAnalyzer,
        tracker?: CoverageTracker,
        generator?: TestGenerator,
        title: string = 'Coverage Analysis Report'
    ): Promise<ComprehensiveReportResult> {
        if (!(await analyzer.load())) {
            return { error: LOAD_FAILURE_MESSAGE };
        }

        const trends = tracker ? await tracker.getRecentTrends(TREND_DAYS) : [];
        const metrics = await analyzer.calculateQualityMetrics(trends);
        const gaps = await analyzer.analyzeGaps();
        const summary = await analyzer.getCoverageSummary(trends);
        const suggestions = generator ? await generator.generateSuggestions(SUGGESTION_COUNT) : [];

        const now = this.clock();
        const stamp = formatFileStamp(now);
        const artifacts: ReportArtifacts = {};

        const charts = await this.writeCharts(trends);
        Object.assign(artifacts, charts);

        await this.writeArtifact(artifacts, 'json', path.join(this.outputDir, `coverage_data_${stamp}.json`), () =>
            JSON.stringify(this.buildJsonReport(analyzer, now, metrics, summary, gaps, trends, suggestions), null, 2)
        );

        await this.writeArtifact(artifacts, 'html', path.join(this.outputDir, `coverage_report_${stamp}.html`), () =>
            this.html.buildHtml({
                title,
                generatedAt: now,
                metrics,
                summary,
                gaps,
                trends,
                suggestions,
                charts: Object.fromEntries(
                    Object.entries(charts).map(([kind, file]) => [kind, path.relative(this.outputDir, file)])
                ),
            })
        );

        return artifacts;
    }

    /**
     * In-memory pass/fail verdict for `metric >= threshold` checks on freshly loaded data; writes nothing
     */
    async ciReport(
        analyzer: CoverageAnalyzer,
        thresholds: Record<string, number>,
        tracker?: CoverageTracker
    ): Promise<CiReport> {
        if (!(await analyzer.load())) {
            return { status: 'error', message: LOAD_FAILURE_MESSAGE };
        }

        const metrics = await analyzer.calculateQualityMetrics();
        const gates: Record<string, ThresholdResult> = {};
        let passed = true;

        for (const [name, threshold] of Object.entries(thresholds)) {
            const current = readGateMetric(metrics, parseGateMetric(name));
            const ok = current >= threshold;
            gates[name] = { current, threshold, passed: ok, difference: current - threshold };
            if (!ok) passed = false;
        }

        const regression = tracker ? await tracker.detectRegression() : null;
        if (regression?.hasRegression) {
            passed = false;
        }

        return {
            status: passed ? 'pass' : 'fail',
            overall_score: metrics.overallScore,
            timestamp: this.clock().toISOString(),
            quality_gates: gates,
            regression_check: regression ? serializeRegressionCheck(regression) : null,
            metrics: {
                line_coverage: metrics.lineCoveragePercent,
                branch_coverage: metrics.branchCoveragePercent,
                function_coverage: metrics.functionCoveragePercent,
                critical_gaps: metrics.criticalGaps,
                high_priority_gaps: metrics.highPriorityGaps,
            },
        };
    }

    buildJsonReport(
        analyzer: CoverageAnalyzer,
        generatedAt: Date,
        metrics: CoverageQualityMetrics,
        summary: CoverageSummary | null,
        gaps: CoverageGap[],
        trends: CoverageTrend[],
        suggestions: TestSuggestion[]
    ) {
        return {
            timestamp: generatedAt.toISOString(),
            summary,
            metrics: {
                line_coverage: metrics.lineCoveragePercent,
                branch_coverage: metrics.branchCoveragePercent,
                function_coverage: metrics.functionCoveragePercent,
                overall_score: metrics.overallScore,
                effective_coverage: metrics.effectiveCoverageScore,
                test_quality: metrics.testQualityScore,
                coverage_density: metrics.coverageDensity,
                trend: metrics.coverageTrend,
                trend_percentage: metrics.trendPercentage,
            },
            gaps: {
                total: gaps.length,
                critical: metrics.criticalGaps,
                high: metrics.highPriorityGaps,
                by_severity: countBy(gaps, g => g.severity),
                by_type: countBy(gaps, g => g.gapType),
                details: gaps.slice(0, JSON_GAP_DETAILS).map(gap => ({
                    file: path.relative(analyzer.projectRoot, gap.filePath),
                    lines: `${gap.lineStart}-${gap.lineEnd}`,
                    type: gap.gapType,
                    severity: gap.severity,
                    function: gap.functionName ?? null,
                    class: gap.className ?? null,
                    complexity: gap.complexityScore,
                    suggestions: gap.suggestedTests,
                })),
            },
            trends: trends.slice(-JSON_TRENDS).map(t => ({
                timestamp: t.timestamp,
                line_coverage: t.lineCoverage,
                branch_coverage: t.branchCoverage,
                function_coverage: t.functionCoverage,
                overall_score: t.overallScore,
                test_count: t.testCount,
            })),
            test_suggestions: suggestions.slice(0, JSON_SUGGESTIONS).map(s => ({
                file: path.relative(analyzer.projectRoot, s.filePath),
                function: s.functionName ?? null,
                class: s.className ?? null,
                type: s.testType,
                priority: s.priority,
                description: s.description,
                test_name: fullTestName(s),
                complexity: s.complexityScore,
            })),
        };
    }

    private async writeCharts(trends: CoverageTrend[]): Promise<ReportArtifacts> {
        const renderer = this.capabilities.charts;
        const artifacts: ReportArtifacts = {};
        if (!renderer || trends.length < 2) {
            return artifacts;
        }

        const chartsDir = path.join(this.outputDir, 'charts');
        const timestamps = trends.map(t => t.timestamp);

        await this.writeArtifact(artifacts, 'coverage_trends', path.join(chartsDir, `coverage_trends${renderer.extension}`), () =>
            renderer.render({
                title: 'Coverage Trends Over Time',
                yLabel: 'Coverage Percentage',
                timestamps,
                series: [
                    { label: 'Line Coverage', values: trends.map(t => t.lineCoverage) },
                    { label: 'Branch Coverage', values: trends.map(t => t.branchCoverage) },
                    { label: 'Function Coverage', values: trends.map(t => t.functionCoverage) },
                ],
            })
        );

        await this.writeArtifact(artifacts, 'quality_score', path.join(chartsDir, `quality_score${renderer.extension}`), () =>
            renderer.render({
                title: 'Overall Quality Score Trend',
                yLabel: 'Quality Score',
                timestamps,
                series: [{ label: 'Overall Quality Score', values: trends.map(t => t.overallScore) }],
            })
        );

        return artifacts;
    }

    private async writeArtifact(
        artifacts: ReportArtifacts,
        kind: ArtifactKind,
        filePath: string,
        render: () => string
    ): Promise<void> {
        try {
            await writeFile(filePath, render());
            artifacts[kind] = filePath;
            logger.info(`${kind} report generated: ${filePath}`);
        } catch (error) {
            logger.error(`Failed to generate ${kind} report: ${error instanceof Error ? error.message : String(error)}`);
        }
    }
}

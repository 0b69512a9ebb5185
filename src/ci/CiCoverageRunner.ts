import { CoverageAnalyzer } from '../analyzer/CoverageAnalyzer';
import { TestGenerator } from '../generator/TestGenerator';
import { CoverageQualityMetrics } from '../models/CoverageModels';
import { RegressionCheck, SerializedRegressionCheck, serializeRegressionCheck } from '../models/TrendModels';
import { CoverageReporter, LOAD_FAILURE_MESSAGE, ReportArtifacts } from '../reporter/CoverageReporter';
import { buildJUnitXml } from '../reporting/JUnitExporter';
import { CoverageTracker } from '../tracker/CoverageTracker';
import { writeFile } from '../utils/fileUtils';
import logger from '../utils/logger';
import {
    QualityGate,
    QualityGateResult,
    SerializedGateResult,
    serializeGateResult,
} from '../validator/QualityGate';
import { NullTestCounter, TestCounter } from './TestCounter';

export type CiStatus = 'success' | 'warning' | 'failure' | 'error';

export interface CiRunOptions {
    gates?: QualityGate[];
    generateReports?: boolean;
    trackTrends?: boolean;
    failOnRegression?: boolean;
    commitId?: string;
    branchName?: string;
    /** Regression threshold in percent */
    regressionThreshold?: number;
    reportTitle?: string;
}

export interface CiErrorResult {
    timestamp: string;
    status: 'error';
    exitCode: 1;
    message: string;
}

export interface CiVerdict {
    timestamp: string;
    status: Exclude<CiStatus, 'error'>;
    exitCode: 0 | 1;
    commit_id?: string;
    branch_name?: string;
    metrics: {
        line_coverage: number;
        branch_coverage: number;
        function_coverage: number;
        overall_score: number;
        critical_gaps: number;
        high_priority_gaps: number;
        total_gaps: number;
    };
    quality_gates: {
        total: number;
        passed: number;
        failed: number;
        warnings: number;
        results: SerializedGateResult[];
    };
    regression_check: SerializedRegressionCheck | null;
    reports: ReportArtifacts;
    summary: string;
}

export type CiRunResult = CiVerdict | CiErrorResult;

export interface QuickCheckResult {
    passed: boolean;
    message: string;
}

export interface CiCoverageRunnerOptions {
    analyzer: CoverageAnalyzer;
    tracker?: CoverageTracker;
    reporter?: CoverageReporter;
    generator?: TestGenerator;
    testCounter?: TestCounter;
    /** Gates used when a run does not pass its own */
    gates?: QualityGate[];
    clock?: () => Date;
}

/**
 * Gates applied when none are configured
 */
export function createDefaultQualityGates(): QualityGate[] {
    return [
        new QualityGate({ name: 'MinimumLineCoverage', metric: 'line_coverage', threshold: 80, severity: 'error' }),
        new QualityGate({ name: 'MinimumBranchCoverage', metric: 'branch_coverage', threshold: 70, severity: 'warning' }),
        new QualityGate({ name: 'MaximumCriticalGaps', metric: 'critical_gaps', threshold: 5, operator: 'lte', severity: 'error' }),
        new QualityGate({ name: 'MinimumOverallScore', metric: 'overall_score', threshold: 75, severity: 'warning' }),
    ];
}

export function evaluateQualityGates(gates: QualityGate[], metrics: CoverageQualityMetrics): QualityGateResult[] {
    return gates.map(gate => gate.check(metrics));
}

/**
 * Runs the analysis pipeline in CI and turns it into a pass/warn/fail verdict
 */
export class CiCoverageRunner {
    private analyzer: CoverageAnalyzer;
    private tracker?: CoverageTracker;
    private reporter?: CoverageReporter;
    private generator?: TestGenerator;
    private counter: TestCounter;
    private gates: QualityGate[];
    private clock: () => Date;

    constructor(options: CiCoverageRunnerOptions) {
        this.analyzer = options.analyzer;
        this.tracker = options.tracker;
        this.reporter = options.reporter;
        this.generator = options.generator;
        this.counter = options.testCounter ?? new NullTestCounter();
        this.gates = options.gates ?? createDefaultQualityGates();
        this.clock = options.clock ?? (() => new Date());
    }

    getQualityGates(): QualityGate[] {
        return [...this.gates];
    }

    setQualityGates(gates: QualityGate[]): void {
        this.gates = [...gates];
    }

    addQualityGate(gate: QualityGate): void {
        this.gates.push(gate);
    }

    async run(options: CiRunOptions = {}): Promise<CiRunResult> {
        const {
            generateReports = true,
            trackTrends = true,
            failOnRegression = true,
            regressionThreshold = 5,
        } = options;

        try {
            if (!(await this.analyzer.load())) {
                return this.errorResult(LOAD_FAILURE_MESSAGE);
            }

            const history = this.tracker ? await this.tracker.loadHistory() : [];
            const metrics = await this.analyzer.calculateQualityMetrics(history);
            const gaps = await this.analyzer.analyzeGaps();

            const gateResults = evaluateQualityGates(options.gates ?? this.gates, metrics);

            let regression: RegressionCheck | null = null;
            if (trackTrends && this.tracker) {
                const testCount = await this.counter.count();
                await this.tracker.record({
                    lineCoverage: metrics.lineCoveragePercent,
                    branchCoverage: metrics.branchCoveragePercent,
                    functionCoverage: metrics.functionCoveragePercent,
                    overallScore: metrics.overallScore,
                    testCount,
                    commitId: options.commitId,
                    branchName: options.branchName,
                });
                regression = await this.tracker.detectRegression(regressionThreshold);
            }

            let reports: ReportArtifacts = {};
            if (generateReports && this.reporter) {
                const generated = await this.reporter.comprehensiveReport(
                    this.analyzer,
                    this.tracker,
                    this.generator,
                    options.reportTitle ?? 'CI Coverage Analysis'
                );
                if ('error' in generated) {
                    logger.warn(`Report generation skipped: ${generated.error}`);
                } else {
                    reports = generated;
                }
            }

            const failed = gateResults.filter(r => !r.passed && r.gate.severity === 'error');
            const warnings = gateResults.filter(r => !r.passed && r.gate.severity === 'warning');
            const regressed = failOnRegression && (regression?.hasRegression ?? false);

            let status: CiVerdict['status'] = 'success';
            if (failed.length > 0 || regressed) {
                status = 'failure';
            } else if (warnings.length > 0) {
                status = 'warning';
            }

            const verdict: CiVerdict = {
                timestamp: this.clock().toISOString(),
                status,
                exitCode: status === 'failure' ? 1 : 0,
                metrics: {
                    line_coverage: metrics.lineCoveragePercent,
                    branch_coverage: metrics.branchCoveragePercent,
                    function_coverage: metrics.functionCoveragePercent,
                    overall_score: metrics.overallScore,
                    critical_gaps: metrics.criticalGaps,
                    high_priority_gaps: metrics.highPriorityGaps,
                    total_gaps: gaps.length,
                },
                quality_gates: {
                    total: gateResults.length,
                    passed: gateResults.filter(r => r.passed).length,
                    failed: failed.length,
                    warnings: warnings.length,
                    results: gateResults.map(serializeGateResult),
                },
                regression_check: regression ? serializeRegressionCheck(regression) : null,
                reports,
                summary: summaryMessage(failed.length, warnings.length, regression, metrics),
            };
            if (options.commitId) verdict.commit_id = options.commitId;
            if (options.branchName) verdict.branch_name = options.branchName;

            logger.info(verdict.summary);
            return verdict;
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            logger.error(`Coverage analysis failed: ${message}`);
            return this.errorResult(`Coverage analysis failed: ${message}`);
        }
    }

    /**
     * Line-coverage check only; no gates, tracking or reports
     */
    async quickCheck(minLineCoverage: number = 80): Promise<QuickCheckResult> {
        try {
            if (!(await this.analyzer.load())) {
                return { passed: false, message: LOAD_FAILURE_MESSAGE };
            }

            const line = (await this.analyzer.calculateQualityMetrics()).lineCoveragePercent;
            return line >= minLineCoverage
                ? { passed: true, message: `Coverage check passed: ${line.toFixed(1)}% >= ${minLineCoverage}%` }
                : { passed: false, message: `Coverage check failed: ${line.toFixed(1)}% < ${minLineCoverage}%` };
        } catch (error) {
            return { passed: false, message: `Coverage check error: ${error instanceof Error ? error.message : String(error)}` };
        }
    }

    async exportJUnit(result: CiRunResult, outputFile: string): Promise<void> {
        const gateResults = result.status === 'error' ? [] : result.quality_gates.results;
        await writeFile(outputFile, buildJUnitXml(gateResults));
        logger.info(`JUnit XML exported to: ${outputFile}`);
    }

    private errorResult(message: string): CiErrorResult {
        return {
            timestamp: this.clock().toISOString(),
            status: 'error',
            exitCode: 1,
            message,
        };
    }
}

/**
 * Multi-line digest for CI logs
 */
export function formatSummary(result: CiRunResult): string {
    if (result.status === 'error') {
        return `Coverage Analysis Error: ${result.message}`;
    }

    const { metrics, quality_gates: gates } = result;
    const lines = [
        `Coverage Analysis: ${result.status.toUpperCase()}`,
        `Line Coverage: ${metrics.line_coverage.toFixed(1)}%`,
        `Branch Coverage: ${metrics.branch_coverage.toFixed(1)}%`,
        `Overall Score: ${metrics.overall_score.toFixed(1)}`,
        `Critical Gaps: ${metrics.critical_gaps}`,
        `Quality Gates: ${gates.passed}/${gates.total} passed`,
    ];

    if (result.regression_check?.has_regression) {
        lines.push('Regression detected!');
    }

    return lines.join('\n');
}

function summaryMessage(
    failed: number,
    warnings: number,
    regression: RegressionCheck | null,
    metrics: CoverageQualityMetrics
): string {
    if (failed > 0) {
        return `Coverage analysis failed: ${failed} quality gate(s) failed`;
    }
    if (regression?.hasRegression) {
        return `Coverage regression detected: ${regression.regressions.length} metric(s) regressed`;
    }
    if (warnings > 0) {
        return `Coverage analysis passed with warnings: ${warnings} quality gate(s) have warnings`;
    }
    return `Coverage analysis passed: ${metrics.overallScore.toFixed(1)} overall score`;
}

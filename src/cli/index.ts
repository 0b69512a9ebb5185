#!/usr/bin/env node

import * as dotenv from 'dotenv';
import path from 'path';
import { Command, InvalidArgumentError } from 'commander';
import { formatSummary } from '../ci/CiCoverageRunner';
import { ConfigLoader } from '../config/ConfigLoader';
import { QualityGateConfig, SentinelConfig } from '../config/schema';
import { fullTestName, serializeMissingTestFile } from '../models/SuggestionModels';
import { serializeRegressionCheck, serializeTrendAnalysis, TREND_METRICS, TREND_METRIC_KEYS } from '../models/TrendModels';
import { PipelineOverrides, SentinelPipeline, createPipeline } from '../orchestrator/SentinelPipeline';
import { GitHead, readGitHead } from '../repo/GitInfo';
import { writeFile } from '../utils/fileUtils';
import logger from '../utils/logger';
import { formatAnalysisText, formatMissingTestsText, formatSuggestionsText, formatTrendsText } from './formatters';

export interface SharedOptions {
    config?: string;
    sourceDir?: string;
    coverageFile?: string;
    outputDir?: string;
    verbose?: boolean;
}

export interface AnalyzeOptions extends SharedOptions {
    format: 'text' | 'json';
    detailed?: boolean;
    output?: string;
}

export interface ReportOptions extends SharedOptions {
    title?: string;
    includeTrends?: boolean;
    includeSuggestions?: boolean;
}

export interface SuggestOptions extends SharedOptions {
    maxSuggestions?: number;
    format: 'text' | 'json';
    output?: string;
    missingTests?: boolean;
}

export interface TrendsOptions extends SharedOptions {
    period: number;
    format: 'text' | 'json';
}

export interface CiOptions extends SharedOptions {
    minCoverage?: number;
    minBranch?: number;
    maxCriticalGaps?: number;
    minScore?: number;
    reports?: boolean;
    tracking?: boolean;
    failOnRegression?: boolean;
    junitXml?: string;
    commitId?: string;
    branchName?: string;
    quick?: boolean;
}

export interface CleanOptions extends SharedOptions {
    keepDays: number;
}

/** Test seam: replaces the data source, source reader, test counter or clock */
let pipelineOverrides: PipelineOverrides = {};

export function setPipelineOverrides(overrides: PipelineOverrides): void {
    pipelineOverrides = overrides;
}

function parseNumber(value: string): number {
    const parsed = Number.parseFloat(value);
    if (!Number.isFinite(parsed)) {
        throw new InvalidArgumentError('Not a number.');
    }
    return parsed;
}

function parseInteger(value: string): number {
    const parsed = Number.parseInt(value, 10);
    if (!Number.isInteger(parsed) || parsed < 0) {
        throw new InvalidArgumentError('Not a non-negative integer.');
    }
    return parsed;
}

function parseFormat(value: string): 'text' | 'json' {
    if (value !== 'text' && value !== 'json') {
        throw new InvalidArgumentError('Expected "text" or "json".');
    }
    return value;
}

/**
 * Apply shared CLI options to config
 */
export function applyCliOptions(config: SentinelConfig, options: SharedOptions): SentinelConfig {
    if (options.sourceDir) {
        config.source_dir = options.sourceDir;
    }
    if (options.coverageFile) {
        config.coverage_file = options.coverageFile;
    }
    if (options.outputDir) {
        config.output_dir = options.outputDir;
    }
    return config;
}

/**
 * Replace the threshold of the gate on `metric`, or add an error gate for it
 */
function overrideGate(gates: QualityGateConfig[], metric: string, threshold: number, fallback: Omit<QualityGateConfig, 'metric' | 'threshold'>): QualityGateConfig[] {
    if (gates.some(gate => gate.metric === metric)) {
        return gates.map(gate => (gate.metric === metric ? { ...gate, threshold } : gate));
    }
    return [...gates, { ...fallback, metric, threshold }];
}

export function applyGateOptions(gates: QualityGateConfig[], options: CiOptions): QualityGateConfig[] {
    let result = gates;
    if (options.minCoverage !== undefined) {
        result = overrideGate(result, 'line_coverage', options.minCoverage,
            { name: 'MinimumLineCoverage', operator: 'gte', enabled: true, severity: 'error' });
    }
    if (options.minBranch !== undefined) {
        result = overrideGate(result, 'branch_coverage', options.minBranch,
            { name: 'MinimumBranchCoverage', operator: 'gte', enabled: true, severity: 'warning' });
    }
    if (options.maxCriticalGaps !== undefined) {
        result = overrideGate(result, 'critical_gaps', options.maxCriticalGaps,
            { name: 'MaximumCriticalGaps', operator: 'lte', enabled: true, severity: 'error' });
    }
    if (options.minScore !== undefined) {
        result = overrideGate(result, 'overall_score', options.minScore,
            { name: 'MinimumOverallScore', operator: 'gte', enabled: true, severity: 'warning' });
    }
    return result;
}

async function loadConfig(options: SharedOptions): Promise<SentinelConfig> {
    if (options.verbose) {
        logger.level = 'debug';
    }
    const config = await new ConfigLoader().load(options.config);
    return applyCliOptions(config, options);
}

async function buildPipeline(options: SharedOptions, configure?: (config: SentinelConfig) => void): Promise<SentinelPipeline> {
    const config = await loadConfig(options);
    configure?.(config);
    return createPipeline(config, pipelineOverrides);
}

async function emit(text: string, output?: string): Promise<void> {
    if (output) {
        await writeFile(output, text);
        console.log(`Saved to: ${output}`);
    } else {
        console.log(text);
    }
}

export async function analyzeAction(options: AnalyzeOptions): Promise<number> {
    const { analyzer, tracker } = await buildPipeline(options);

    if (!(await analyzer.load())) {
        console.error('Failed to load coverage data');
        return 1;
    }

    const history = await tracker.loadHistory();
    const metrics = await analyzer.calculateQualityMetrics(history);
    const gaps = await analyzer.analyzeGaps();

    if (options.format === 'json') {
        const summary = await analyzer.getCoverageSummary(history);
        const payload = options.detailed
            ? {
                ...summary,
                gaps_detail: gaps.slice(0, 20).map(gap => ({
                    file: path.relative(analyzer.projectRoot, gap.filePath),
                    lines: `${gap.lineStart}-${gap.lineEnd}`,
                    type: gap.gapType,
                    severity: gap.severity,
                    function: gap.functionName ?? null,
                    class: gap.className ?? null,
                    suggestions: gap.suggestedTests,
                })),
            }
            : summary;
        await emit(JSON.stringify(payload, null, 2), options.output);
    } else {
        await emit(formatAnalysisText(metrics, gaps, options.detailed ?? false), options.output);
    }
    return 0;
}

export async function reportAction(options: ReportOptions): Promise<number> {
    const { analyzer, tracker, generator, reporter, config } = await buildPipeline(options);

    const result = await reporter.comprehensiveReport(
        analyzer,
        options.includeTrends ? tracker : undefined,
        options.includeSuggestions ? generator : undefined,
        options.title ?? config.reports.title
    );

    if ('error' in result) {
        console.error(result.error);
        return 1;
    }

    console.log('Coverage reports generated:');
    for (const [kind, file] of Object.entries(result)) {
        console.log(`  ${kind.toUpperCase()}: ${file}`);
    }
    if (result.html) {
        console.log(`\nOpen HTML report: file://${path.resolve(result.html)}`);
    }
    return 0;
}

export async function suggestAction(options: SuggestOptions): Promise<number> {
    const { analyzer, generator, config, projectRoot } = await buildPipeline(options);

    if (!(await analyzer.load())) {
        console.error('Failed to load coverage data');
        return 1;
    }

    const suggestions = await generator.generateSuggestions(options.maxSuggestions ?? config.suggestions.max_count);
    const missing = options.missingTests ? await generator.findMissingTestFiles() : [];

    if (options.format === 'json') {
        const payload = {
            suggestions: suggestions.map(s => ({
                file: path.relative(projectRoot, s.filePath),
                function: s.functionName ?? null,
                class: s.className ?? null,
                type: s.testType,
                priority: s.priority,
                description: s.description,
                test_name: fullTestName(s),
                template: s.testTemplate,
            })),
            ...(options.missingTests ? { missing_tests: missing.map(serializeMissingTestFile) } : {}),
        };
        await emit(JSON.stringify(payload, null, 2), options.output);
        return 0;
    }

    const sections: string[] = [];
    sections.push(suggestions.length > 0
        ? formatSuggestionsText(suggestions)
        : 'No test suggestions needed - coverage looks good!');
    if (options.missingTests) {
        sections.push(formatMissingTestsText(missing, projectRoot));
    }
    await emit(sections.join('\n\n'), options.output);
    return 0;
}

export async function trendsAction(options: TrendsOptions): Promise<number> {
    const { tracker } = await buildPipeline(options);

    const stats = await tracker.statistics(options.period);
    if (!stats) {
        console.error(`No coverage data found for the last ${options.period} days`);
        return 1;
    }
    const regression = await tracker.detectRegression();

    if (options.format === 'json') {
        console.log(JSON.stringify({
            period_days: stats.periodDays,
            data_points: stats.dataPoints,
            first_timestamp: stats.firstTimestamp,
            last_timestamp: stats.lastTimestamp,
            statistics: Object.fromEntries(TREND_METRICS.map(metric => {
                const data = stats.statistics[metric];
                return [TREND_METRIC_KEYS[metric], {
                    current: data.current,
                    average: data.average,
                    median: data.median,
                    min: data.min,
                    max: data.max,
                    std_dev: data.stdDev,
                    trend: serializeTrendAnalysis(data.trend),
                }];
            })),
            regression_analysis: serializeRegressionCheck(regression),
        }, null, 2));
    } else {
        console.log(formatTrendsText(stats, regression));
    }
    return 0;
}

export async function ciAction(options: CiOptions): Promise<number> {
    const pipeline = await buildPipeline(options, config => {
        config.quality_gates = applyGateOptions(config.quality_gates, options);
        if (options.reports === false) config.reports.enabled = false;
        if (options.tracking === false) config.tracking.enabled = false;
        if (options.failOnRegression === false) config.regression.fail_on_regression = false;
    });
    const { runner, config, projectRoot } = pipeline;

    if (options.quick) {
        const lineGate = config.quality_gates.find(gate => gate.metric === 'line_coverage');
        const check = await runner.quickCheck(options.minCoverage ?? lineGate?.threshold ?? 80);
        console.log(check.message);
        return check.passed ? 0 : 1;
    }

    const head: GitHead = options.commitId && options.branchName ? {} : await readGitHead(projectRoot);
    const result = await runner.run({
        generateReports: config.reports.enabled,
        trackTrends: config.tracking.enabled,
        failOnRegression: config.regression.fail_on_regression,
        regressionThreshold: config.regression.threshold_percent,
        commitId: options.commitId ?? head.commitId,
        branchName: options.branchName ?? head.branchName,
        reportTitle: config.reports.title,
    });

    if (result.status !== 'error') {
        console.log(result.summary);
    }
    console.log(formatSummary(result));

    if (options.junitXml) {
        await runner.exportJUnit(result, options.junitXml);
        console.log(`JUnit XML exported to: ${options.junitXml}`);
    }

    return result.exitCode;
}

export async function cleanAction(options: CleanOptions): Promise<number> {
    const { tracker } = await buildPipeline(options);
    const removed = await tracker.cleanup(options.keepDays);
    console.log(`Removed ${removed} coverage records older than ${options.keepDays} days`);
    return 0;
}

export async function exportTrendsAction(file: string, options: SharedOptions): Promise<number> {
    const { tracker } = await buildPipeline(options);
    const rows = await tracker.exportCsv(file);
    console.log(`Exported ${rows} coverage records to: ${file}`);
    return 0;
}

/**
 * Run an action at the command boundary: errors are logged and reported, never thrown
 */
function run<A extends unknown[]>(action: (...args: A) => Promise<number>): (...args: A) => Promise<void> {
    return async (...args: A) => {
        try {
            process.exitCode = await action(...args);
        } catch (error) {
            logger.error(`Command failed: ${error instanceof Error ? error.stack ?? error.message : String(error)}`);
            console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
            process.exitCode = 1;
        }
    };
}

function withSharedOptions(command: Command): Command {
    return command
        .option('-c, --config <path>', 'Config file (default: .coverage-sentinel.yml)')
        .option('--source-dir <dir>', 'Source code directory')
        .option('--coverage-file <path>', 'Coverage report (coverage.py JSON, Istanbul JSON or Cobertura XML)')
        .option('--output-dir <dir>', 'Output directory for reports and history')
        .option('-v, --verbose', 'Verbose logging');
}

const program = new Command();

program
    .name('coverage-sentinel')
    .description('Coverage quality analysis, trend tracking and CI quality gates')
    .version('1.0.0');

withSharedOptions(program.command('analyze'))
    .description('Analyze coverage metrics and gaps')
    .option('--format <format>', 'Output format (text|json)', parseFormat, 'text')
    .option('--detailed', 'Include detailed gap analysis')
    .option('-o, --output <file>', 'Write the analysis to a file')
    .action(run(analyzeAction));

withSharedOptions(program.command('report'))
    .description('Generate JSON, HTML and chart reports')
    .option('--title <title>', 'Report title')
    .option('--include-trends', 'Include coverage trends')
    .option('--include-suggestions', 'Include test suggestions')
    .action(run(reportAction));

withSharedOptions(program.command('suggest'))
    .description('Suggest tests for coverage gaps')
    .option('--max-suggestions <n>', 'Maximum number of suggestions', parseInteger)
    .option('--format <format>', 'Output format (text|json)', parseFormat, 'text')
    .option('-o, --output <file>', 'Write the suggestions to a file')
    .option('--missing-tests', 'Also list source files without a test file')
    .action(run(suggestAction));

withSharedOptions(program.command('trends'))
    .description('Show coverage trends and regression analysis')
    .option('--period <days>', 'Period in days to analyze', parseInteger, 30)
    .option('--format <format>', 'Output format (text|json)', parseFormat, 'text')
    .action(run(trendsAction));

withSharedOptions(program.command('ci'))
    .description('Run coverage analysis with quality gates for CI')
    .option('--min-coverage <percent>', 'Minimum line coverage', parseNumber)
    .option('--min-branch <percent>', 'Minimum branch coverage', parseNumber)
    .option('--max-critical-gaps <n>', 'Maximum critical gaps', parseInteger)
    .option('--min-score <score>', 'Minimum overall score', parseNumber)
    .option('--no-reports', 'Skip report generation')
    .option('--no-tracking', 'Skip trend tracking')
    .option('--no-fail-on-regression', 'Do not fail on coverage regression')
    .option('--junit-xml <file>', 'Export JUnit XML to file')
    .option('--commit-id <sha>', 'Commit id (default: git HEAD)')
    .option('--branch-name <name>', 'Branch name (default: current git branch)')
    .option('--quick', 'Line coverage check only')
    .action(run(ciAction));

withSharedOptions(program.command('clean'))
    .description('Remove old coverage history')
    .option('--keep-days <days>', 'Days of history to keep', parseInteger, 365)
    .action(run(cleanAction));

withSharedOptions(program.command('export-trends'))
    .description('Export coverage history as CSV')
    .argument('<file>', 'Output CSV file')
    .action(run(exportTrendsAction));

// Only parse arguments if this module is run directly
if (require.main === module) {
    dotenv.config();
    program.parseAsync().catch((error: unknown) => {
        console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
        process.exitCode = 1;
    });
}

export { program };

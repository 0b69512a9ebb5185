import path from 'path';
import { AdapterRegistry } from '../adapters/AdapterRegistry';
import { CoverageAnalyzer, SourceReader } from '../analyzer/CoverageAnalyzer';
import { CiCoverageRunner } from '../ci/CiCoverageRunner';
import { CommandTestCounter, NullTestCounter, TestCounter } from '../ci/TestCounter';
import { SentinelConfig } from '../config/schema';
import { TestGenerator } from '../generator/TestGenerator';
import { CoverageReporter } from '../reporter/CoverageReporter';
import { SvgChartRenderer } from '../reporting/SvgChartRenderer';
import {
    COVERAGE_FILE_CANDIDATES,
    CoverageDataSource,
    FileCoverageSource,
    detectCoverageFile,
} from '../sources/CoverageDataSource';
import { CoverageTracker } from '../tracker/CoverageTracker';
import logger from '../utils/logger';
import { QualityGate } from '../validator/QualityGate';

/**
 * The wired set of components for one project
 */
export interface SentinelPipeline {
    config: SentinelConfig;
    projectRoot: string;
    outputDir: string;
    analyzer: CoverageAnalyzer;
    tracker: CoverageTracker;
    generator: TestGenerator;
    reporter: CoverageReporter;
    runner: CiCoverageRunner;
}

export interface PipelineOverrides {
    dataSource?: CoverageDataSource;
    sourceReader?: SourceReader;
    testCounter?: TestCounter;
    clock?: () => Date;
}

/**
 * Resolve the coverage report: configured file, else the first well-known location
 */
export async function resolveCoverageSource(config: SentinelConfig, projectRoot: string): Promise<CoverageDataSource> {
    if (config.coverage_file) {
        return new FileCoverageSource(path.resolve(projectRoot, config.coverage_file));
    }

    const detected = await detectCoverageFile(projectRoot);
    if (detected) {
        logger.debug(`Detected coverage report: ${detected}`);
        return new FileCoverageSource(detected);
    }

    // load() will fail and report the missing file
    return new FileCoverageSource(path.join(projectRoot, COVERAGE_FILE_CANDIDATES[0]));
}

/**
 * Build every component from configuration. Quality gates are validated here,
 * so an unknown gate metric fails before any analysis runs.
 */
export async function createPipeline(
    config: SentinelConfig,
    overrides: PipelineOverrides = {}
): Promise<SentinelPipeline> {
    const projectRoot = path.resolve(config.project_root);
    const outputDir = path.resolve(projectRoot, config.output_dir);
    const historyDir = config.history_dir
        ? path.resolve(projectRoot, config.history_dir)
        : path.join(outputDir, 'history');

    const adapters = new AdapterRegistry();
    const analyzer = new CoverageAnalyzer({
        projectRoot,
        sourceDir: config.source_dir,
        dataSource: overrides.dataSource ?? (await resolveCoverageSource(config, projectRoot)),
        sourceReader: overrides.sourceReader,
        adapters,
        excludePatterns: config.exclude_patterns,
        clock: overrides.clock,
    });

    const tracker = new CoverageTracker(historyDir, {
        maxEntries: config.tracking.max_entries,
        clock: overrides.clock,
    });

    const generator = new TestGenerator(analyzer, {
        testDir: config.test_dir,
        excludePatterns: config.exclude_patterns,
    });

    const reporter = new CoverageReporter(
        outputDir,
        config.reports.charts ? { charts: new SvgChartRenderer() } : {},
        overrides.clock
    );

    const counter = overrides.testCounter ?? (config.test_count.command
        ? new CommandTestCounter(config.test_count.command, projectRoot, config.test_count.timeout_ms)
        : new NullTestCounter());

    const runner = new CiCoverageRunner({
        analyzer,
        tracker,
        reporter,
        generator,
        testCounter: counter,
        gates: config.quality_gates.map(gate => new QualityGate(gate)),
        clock: overrides.clock,
    });

    return { config, projectRoot, outputDir, analyzer, tracker, generator, reporter, runner };
}

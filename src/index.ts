import { CiRunOptions, CiRunResult } from './ci/CiCoverageRunner';
import { ConfigLoader } from './config/ConfigLoader';
import { PipelineOverrides, createPipeline } from './orchestrator/SentinelPipeline';
import logger from './utils/logger';

/**
 * Main entry point for programmatic usage: load config, run the CI pipeline
 */
export async function runCoverageCi(
    configPath?: string,
    options: CiRunOptions = {},
    overrides: PipelineOverrides = {}
): Promise<CiRunResult> {
    const config = await new ConfigLoader().load(configPath);
    const { runner } = await createPipeline(config, overrides);

    const result = await runner.run({
        generateReports: config.reports.enabled,
        trackTrends: config.tracking.enabled,
        failOnRegression: config.regression.fail_on_regression,
        regressionThreshold: config.regression.threshold_percent,
        reportTitle: config.reports.title,
        ...options,
    });

    logger.info(`Coverage CI finished with status ${result.status}`);
    return result;
}

// Export main components for library usage
export { AdapterRegistry } from './adapters/AdapterRegistry';
export * from './adapters/LanguageAdapter';
export { PythonAdapter } from './adapters/PythonAdapter';
export { TypeScriptAdapter } from './adapters/TypeScriptAdapter';
export * from './analyzer/CoverageAnalyzer';
export * from './analyzer/GapClassifier';
export { ScopeIndex } from './analyzer/ScopeIndex';
export * from './analyzer/TestQualityScorer';
export * from './ci/CiCoverageRunner';
export * from './ci/TestCounter';
export { ConfigLoader, ConfigValidationError } from './config/ConfigLoader';
export * from './config/schema';
export { TestGenerator } from './generator/TestGenerator';
export * from './models/CoverageModels';
export * from './models/SuggestionModels';
export * from './models/TrendModels';
export * from './orchestrator/SentinelPipeline';
export * from './reporter/CoverageReporter';
export { HtmlReportGenerator, escapeHtml } from './reporting/HtmlReportGenerator';
export { buildJUnitXml } from './reporting/JUnitExporter';
export * from './reporting/SvgChartRenderer';
export * from './sources/CoverageDataSource';
export { CoverageFormatError, CoverageReportReader } from './sources/CoverageReportReader';
export * from './tracker/CoverageTracker';
export * from './validator/QualityGate';

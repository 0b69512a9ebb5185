import { z } from 'zod';
import { TrendDirection } from './CoverageModels';

/**
 * One historical coverage measurement
 */
export interface CoverageTrend {
    timestamp: string;
    lineCoverage: number;
    branchCoverage: number;
    functionCoverage: number;
    overallScore: number;
    testCount: number;
    commitId?: string;
    branchName?: string;
}

export type TrendMetric = 'lineCoverage' | 'branchCoverage' | 'functionCoverage' | 'overallScore';

export const TREND_METRICS: TrendMetric[] = ['lineCoverage', 'branchCoverage', 'functionCoverage', 'overallScore'];

/**
 * Wire names used in persisted files and JSON payloads
 */
export const TREND_METRIC_KEYS: Record<TrendMetric, string> = {
    lineCoverage: 'line_coverage',
    branchCoverage: 'branch_coverage',
    functionCoverage: 'function_coverage',
    overallScore: 'overall_score',
};

/**
 * Persisted form of a CoverageTrend (one entry of coverage_history.json)
 */
export const trendRecordSchema = z.object({
    timestamp: z.string(),
    line_coverage: z.number(),
    branch_coverage: z.number(),
    function_coverage: z.number(),
    overall_score: z.number(),
    test_count: z.number().int(),
    commit_hash: z.string().nullable().optional(),
    branch_name: z.string().nullable().optional(),
});

export type TrendRecord = z.infer<typeof trendRecordSchema>;

export function serializeTrend(trend: CoverageTrend): TrendRecord {
    return {
        timestamp: trend.timestamp,
        line_coverage: trend.lineCoverage,
        branch_coverage: trend.branchCoverage,
        function_coverage: trend.functionCoverage,
        overall_score: trend.overallScore,
        test_count: trend.testCount,
        commit_hash: trend.commitId ?? null,
        branch_name: trend.branchName ?? null,
    };
}

/**
 * Parse one persisted record; returns null when the record does not match the schema
 */
export function deserializeTrend(record: unknown): CoverageTrend | null {
    const parsed = trendRecordSchema.safeParse(record);
    if (!parsed.success) {
        return null;
    }
    const data = parsed.data;
    const trend: CoverageTrend = {
        timestamp: data.timestamp,
        lineCoverage: data.line_coverage,
        branchCoverage: data.branch_coverage,
        functionCoverage: data.function_coverage,
        overallScore: data.overall_score,
        testCount: data.test_count,
    };
    if (data.commit_hash) trend.commitId = data.commit_hash;
    if (data.branch_name) trend.branchName = data.branch_name;
    return trend;
}

export type TrendAnalysisDirection = TrendDirection | 'insufficient_data' | 'no_data';

export interface TrendAnalysis {
    direction: TrendAnalysisDirection;
    slope: number;
    /** R² of the least-squares fit */
    confidence: number;
    currentValue: number;
    changePercent: number;
    sampleCount: number;
}

export interface RegressionFinding {
    metric: TrendMetric;
    currentValue: number;
    recentAverage: number;
    percentageDrop: number;
    severity: 'high' | 'medium';
}

export interface RegressionCheck {
    hasRegression: boolean;
    regressions: RegressionFinding[];
    message: string;
    timestamp?: string;
    commitId?: string;
}

export interface MetricStatistics {
    current: number;
    average: number;
    median: number;
    min: number;
    max: number;
    stdDev: number;
    trend: TrendAnalysis;
}

export interface CoverageStatistics {
    periodDays: number;
    dataPoints: number;
    firstTimestamp: string;
    lastTimestamp: string;
    statistics: Record<TrendMetric, MetricStatistics>;
}

export function serializeTrendAnalysis(analysis: TrendAnalysis) {
    return {
        direction: analysis.direction,
        slope: analysis.slope,
        confidence: analysis.confidence,
        current_value: analysis.currentValue,
        change_percentage: analysis.changePercent,
        data_points: analysis.sampleCount,
    };
}

export function serializeRegressionCheck(check: RegressionCheck) {
    return {
        has_regression: check.hasRegression,
        regressions: check.regressions.map(r => ({
            metric: TREND_METRIC_KEYS[r.metric],
            current_value: r.currentValue,
            recent_average: r.recentAverage,
            percentage_drop: r.percentageDrop,
            severity: r.severity,
        })),
        message: check.message,
        timestamp: check.timestamp ?? null,
        commit_hash: check.commitId ?? null,
    };
}

export type SerializedRegressionCheck = ReturnType<typeof serializeRegressionCheck>;

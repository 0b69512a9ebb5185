/**
 * A branch arc: [decision line, target]. For coverage.py the target is the
 * destination line (negative for function exit); for Istanbul and Cobertura it
 * is the arm index of the decision.
 */
export type BranchArc = [number, number];

/**
 * Function hit recorded by a coverage tool that reports functions directly
 */
export interface FunctionHit {
    name: string;
    line: number;
    hits: number;
}

/**
 * Raw per-file coverage as read from a coverage report
 */
export interface FileCoverageData {
    path: string;
    executedLines: number[];
    missingLines: number[];
    executedBranches: BranchArc[];
    missingBranches: BranchArc[];
    functionHits?: FunctionHit[];
}

export interface CoverageData {
    format: 'coverage.py' | 'istanbul' | 'cobertura' | 'memory';
    files: FileCoverageData[];
}

export type GapType =
    | 'uncovered_lines'
    | 'missing_branch'
    | 'exception_handling'
    | 'uncovered_function'
    | 'uncovered_class'
    | 'error_path';

export type GapSeverity = 'critical' | 'high' | 'medium' | 'low';

export const SEVERITY_RANK: Record<GapSeverity, number> = {
    critical: 4,
    high: 3,
    medium: 2,
    low: 1,
};

/**
 * One region of source not exercised by any test
 */
export interface CoverageGap {
    filePath: string;
    lineStart: number;
    lineEnd: number;
    gapType: GapType;
    severity: GapSeverity;
    functionName?: string;
    className?: string;
    complexityScore: number;
    suggestedTests: string[];
}

export type TrendDirection = 'improving' | 'stable' | 'declining';

/**
 * Aggregate snapshot of coverage health for one analysis run
 */
export interface CoverageQualityMetrics {
    lineCoveragePercent: number;
    branchCoveragePercent: number;
    functionCoveragePercent: number;

    /** Complexity-weighted share of executed non-comment lines */
    effectiveCoverageScore: number;
    testQualityScore: number;
    /** Executed lines per non-comment line, 0..1 */
    coverageDensity: number;

    criticalGaps: number;
    highPriorityGaps: number;
    mediumPriorityGaps: number;
    lowPriorityGaps: number;
    totalGaps: number;

    coverageTrend: TrendDirection;
    trendPercentage: number;

    wellCoveredFiles: number;
    poorlyCoveredFiles: number;
    uncoveredFiles: number;

    overallScore: number;
}

/**
 * Composite 0-100 score: coverage 40%, test quality 30%, gaps 20%, trend 10%
 */
export function calculateOverallScore(
    metrics: Omit<CoverageQualityMetrics, 'overallScore'>
): number {
    const coverageScore = (metrics.lineCoveragePercent + metrics.branchCoveragePercent) / 2;
    const gapsScore = Math.max(0, 100 - (metrics.criticalGaps * 10 + metrics.highPriorityGaps * 5));
    const trendScore = 50 + metrics.trendPercentage;

    const score =
        coverageScore * 0.4 +
        metrics.testQualityScore * 0.3 +
        gapsScore * 0.2 +
        trendScore * 0.1;

    return Math.min(100, Math.max(0, score));
}

export function emptyMetrics(): CoverageQualityMetrics {
    return Object.freeze({
        lineCoveragePercent: 0,
        branchCoveragePercent: 0,
        functionCoveragePercent: 0,
        effectiveCoverageScore: 0,
        testQualityScore: 0,
        coverageDensity: 0,
        criticalGaps: 0,
        highPriorityGaps: 0,
        mediumPriorityGaps: 0,
        lowPriorityGaps: 0,
        totalGaps: 0,
        coverageTrend: 'stable' as const,
        trendPercentage: 0,
        wellCoveredFiles: 0,
        poorlyCoveredFiles: 0,
        uncoveredFiles: 0,
        overallScore: 0,
    });
}

/**
 * Summary block shared by the analyze command and the JSON report
 */
export interface CoverageSummary {
    timestamp: string;
    metrics: {
        line_coverage: number;
        branch_coverage: number;
        function_coverage: number;
        overall_score: number;
        effective_coverage: number;
        test_quality: number;
    };
    gaps: {
        total: number;
        critical: number;
        high: number;
        by_type: Partial<Record<GapType, number>>;
    };
    files: {
        well_covered: number;
        poorly_covered: number;
        uncovered: number;
    };
    trend: {
        direction: TrendDirection;
        percentage: number;
    };
}

export function countBy<T, K extends string>(items: T[], key: (item: T) => K): Partial<Record<K, number>> {
    const counts: Partial<Record<K, number>> = {};
    for (const item of items) {
        const k = key(item);
        counts[k] = (counts[k] ?? 0) + 1;
    }
    return counts;
}

import { CoverageQualityMetrics } from '../models/CoverageModels';

export type GateOperator = 'gte' | 'lte' | 'eq';
export type GateSeverity = 'error' | 'warning';

/** Tolerance of the `eq` operator */
const EQ_TOLERANCE = 0.01;

const METRIC_ACCESSORS = {
    line_coverage: m => m.lineCoveragePercent,
    branch_coverage: m => m.branchCoveragePercent,
    function_coverage: m => m.functionCoveragePercent,
    effective_coverage: m => m.effectiveCoverageScore,
    test_quality: m => m.testQualityScore,
    coverage_density: m => m.coverageDensity,
    overall_score: m => m.overallScore,
    critical_gaps: m => m.criticalGaps,
    high_priority_gaps: m => m.highPriorityGaps,
    medium_priority_gaps: m => m.mediumPriorityGaps,
    low_priority_gaps: m => m.lowPriorityGaps,
    total_gaps: m => m.totalGaps,
    trend_percentage: m => m.trendPercentage,
    well_covered_files: m => m.wellCoveredFiles,
    poorly_covered_files: m => m.poorlyCoveredFiles,
    uncovered_files: m => m.uncoveredFiles,
} satisfies Record<string, (metrics: CoverageQualityMetrics) => number>;

export type GateMetric = keyof typeof METRIC_ACCESSORS;

/** Field names accepted for backwards compatibility with older gate configs */
const METRIC_ALIASES: Record<string, GateMetric> = {
    line_coverage_percent: 'line_coverage',
    branch_coverage_percent: 'branch_coverage',
    function_coverage_percent: 'function_coverage',
    effective_coverage_score: 'effective_coverage',
    test_quality_score: 'test_quality',
};

export class UnknownMetricError extends Error {
    constructor(readonly metric: string) {
        super(`Unknown quality gate metric '${metric}'. Known metrics: ${Object.keys(METRIC_ACCESSORS).join(', ')}`);
        this.name = 'UnknownMetricError';
    }
}

function isGateMetric(name: string): name is GateMetric {
    return Object.prototype.hasOwnProperty.call(METRIC_ACCESSORS, name);
}

/**
 * Resolve a metric name or alias; throws UnknownMetricError otherwise
 */
export function parseGateMetric(name: string): GateMetric {
    if (isGateMetric(name)) {
        return name;
    }
    if (Object.prototype.hasOwnProperty.call(METRIC_ALIASES, name)) {
        return METRIC_ALIASES[name];
    }
    throw new UnknownMetricError(name);
}

export function readGateMetric(metrics: CoverageQualityMetrics, metric: GateMetric): number {
    return METRIC_ACCESSORS[metric](metrics);
}

export interface QualityGateDefinition {
    name: string;
    metric: string;
    threshold: number;
    operator?: GateOperator;
    enabled?: boolean;
    severity?: GateSeverity;
}

/**
 * A named threshold rule over one coverage metric
 */
export class QualityGate {
    readonly name: string;
    readonly metric: GateMetric;
    readonly threshold: number;
    readonly operator: GateOperator;
    readonly enabled: boolean;
    readonly severity: GateSeverity;

    constructor(definition: QualityGateDefinition) {
        this.name = definition.name;
        this.metric = parseGateMetric(definition.metric);
        this.threshold = definition.threshold;
        this.operator = definition.operator ?? 'gte';
        this.enabled = definition.enabled ?? true;
        this.severity = definition.severity ?? 'error';
        Object.freeze(this);
    }

    /**
     * Disabled gates always pass
     */
    evaluate(value: number): boolean {
        if (!this.enabled) {
            return true;
        }

        switch (this.operator) {
            case 'gte':
                return value >= this.threshold;
            case 'lte':
                return value <= this.threshold;
            case 'eq':
                return Math.abs(value - this.threshold) < EQ_TOLERANCE;
        }
    }

    check(metrics: CoverageQualityMetrics): QualityGateResult {
        const currentValue = readGateMetric(metrics, this.metric);
        const passed = this.evaluate(currentValue);
        const difference = currentValue - this.threshold;

        const message = passed
            ? `${this.name} passed: ${currentValue.toFixed(1)} ${this.operator} ${this.threshold}`
            : `${this.name} failed: ${currentValue.toFixed(1)} not ${this.operator} ${this.threshold} (diff: ${difference.toFixed(1)})`;

        return {
            gate: this,
            currentValue,
            passed,
            difference,
            message,
            status: passed ? 'PASS' : 'FAIL',
        };
    }
}

export interface QualityGateResult {
    gate: QualityGate;
    currentValue: number;
    passed: boolean;
    /** currentValue - threshold */
    difference: number;
    message: string;
    status: 'PASS' | 'FAIL';
}

export function serializeGateResult(result: QualityGateResult) {
    return {
        name: result.gate.name,
        metric: result.gate.metric,
        threshold: result.gate.threshold,
        current: result.currentValue,
        status: result.status,
        difference: result.difference,
        severity: result.gate.severity,
        message: result.message,
    };
}

export type SerializedGateResult = ReturnType<typeof serializeGateResult>;

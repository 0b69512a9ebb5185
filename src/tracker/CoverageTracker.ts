import path from 'path';
import { z } from 'zod';
import {
    CoverageStatistics,
    CoverageTrend,
    MetricStatistics,
    RegressionCheck,
    RegressionFinding,
    TREND_METRICS,
    TREND_METRIC_KEYS,
    TrendAnalysis,
    TrendMetric,
    deserializeTrend,
    serializeTrend,
    serializeTrendAnalysis,
} from '../models/TrendModels';
import { fileExists, readFile, writeFile } from '../utils/fileUtils';
import logger from '../utils/logger';
import { linearRegression, mean, median, standardDeviation } from '../utils/statistics';

export interface CoverageTrackerOptions {
    /** History cap; oldest entries are evicted first */
    maxEntries?: number;
    clock?: () => Date;
}

export interface RecordInput {
    lineCoverage: number;
    branchCoverage: number;
    functionCoverage: number;
    overallScore: number;
    testCount: number;
    commitId?: string;
    branchName?: string;
}

const DAY_MS = 24 * 60 * 60 * 1000;

/** Records before the latest that form the regression baseline */
const REGRESSION_BASELINE = 9;

/** Periods written to the trend-analysis file */
export const TREND_PERIODS = [7, 30, 90];

export const HISTORY_FILE = 'coverage_history.json';
export const TRENDS_FILE = 'coverage_trends.json';

const CSV_COLUMNS = [
    'timestamp',
    'line_coverage',
    'branch_coverage',
    'function_coverage',
    'overall_score',
    'test_count',
    'commit_hash',
    'branch_name',
] as const;

/**
 * File-backed coverage history with trend analysis and regression detection.
 * Assumes a single writer per data directory.
 */
export class CoverageTracker {
    readonly historyFile: string;
    readonly trendsFile: string;
    private maxEntries: number;
    private clock: () => Date;
    /** History that failed to persist; served in place of the file until a save succeeds */
    private unsavedHistory: CoverageTrend[] | null = null;

    constructor(readonly dataDir: string, options: CoverageTrackerOptions = {}) {
        this.historyFile = path.join(dataDir, HISTORY_FILE);
        this.trendsFile = path.join(dataDir, TRENDS_FILE);
        this.maxEntries = options.maxEntries ?? 100;
        this.clock = options.clock ?? (() => new Date());
    }

    /**
     * Append a measurement, cap the history, persist it and refresh the trend analysis.
     * A failed write is logged; the record is kept in memory for this tracker.
     */
    async record(input: RecordInput): Promise<CoverageTrend> {
        const trend: CoverageTrend = {
            timestamp: this.clock().toISOString(),
            lineCoverage: input.lineCoverage,
            branchCoverage: input.branchCoverage,
            functionCoverage: input.functionCoverage,
            overallScore: input.overallScore,
            testCount: input.testCount,
        };
        if (input.commitId) trend.commitId = input.commitId;
        if (input.branchName) trend.branchName = input.branchName;

        let history = await this.loadHistory();
        history.push(trend);
        if (history.length > this.maxEntries) {
            history = history.slice(-this.maxEntries);
        }

        await this.saveHistory(history);
        await this.updateTrendAnalysis(history);

        return trend;
    }

    /**
     * Stored history, oldest first. A missing or unreadable file yields an empty history.
     */
    async loadHistory(): Promise<CoverageTrend[]> {
        if (this.unsavedHistory) {
            return [...this.unsavedHistory];
        }
        if (!(await fileExists(this.historyFile))) {
            return [];
        }

        try {
            const raw: unknown = JSON.parse(await readFile(this.historyFile));
            const records = z.array(z.unknown()).parse(raw);
            const history: CoverageTrend[] = [];
            for (const record of records) {
                const trend = deserializeTrend(record);
                if (trend) {
                    history.push(trend);
                } else {
                    logger.warn(`Skipping invalid coverage history record in ${this.historyFile}`);
                }
            }
            return history;
        } catch (error) {
            logger.warn(`Error loading coverage history: ${error instanceof Error ? error.message : String(error)}`);
            return [];
        }
    }

    /**
     * Returns false when the file could not be written
     */
    async saveHistory(history: CoverageTrend[]): Promise<boolean> {
        try {
            await writeFile(this.historyFile, JSON.stringify(history.map(serializeTrend), null, 2));
            this.unsavedHistory = null;
            return true;
        } catch (error) {
            logger.error(`Error saving coverage history: ${error instanceof Error ? error.message : String(error)}`);
            this.unsavedHistory = [...history];
            return false;
        }
    }

    /**
     * Records no older than `days`, oldest first
     */
    async getRecentTrends(days: number = 30): Promise<CoverageTrend[]> {
        return this.filterByAge(await this.loadHistory(), days);
    }

    async analyzeTrendDirection(metric: TrendMetric = 'lineCoverage', periodDays: number = 7): Promise<TrendAnalysis> {
        return analyzeTrend(await this.getRecentTrends(periodDays), metric);
    }

    /**
     * Compare the latest record with the mean of the records before it
     */
    async detectRegression(thresholdPercent: number = 5): Promise<RegressionCheck> {
        const history = await this.loadHistory();

        if (history.length < 2) {
            return {
                hasRegression: false,
                regressions: [],
                message: 'Insufficient data for regression analysis',
            };
        }

        const current = history[history.length - 1];
        const baseline = history.slice(-(REGRESSION_BASELINE + 1), -1);
        const regressions: RegressionFinding[] = [];

        for (const metric of TREND_METRICS) {
            const recentAverage = mean(baseline.map(t => t[metric]));
            if (recentAverage <= 0) continue;

            const currentValue = current[metric];
            const percentageDrop = ((recentAverage - currentValue) / recentAverage) * 100;
            if (percentageDrop > thresholdPercent) {
                regressions.push({
                    metric,
                    currentValue,
                    recentAverage,
                    percentageDrop,
                    severity: percentageDrop > 10 ? 'high' : 'medium',
                });
            }
        }

        const check: RegressionCheck = {
            hasRegression: regressions.length > 0,
            regressions,
            message: regressions.length > 0
                ? `Found ${regressions.length} coverage regressions`
                : 'No regressions detected',
            timestamp: current.timestamp,
        };
        if (current.commitId) check.commitId = current.commitId;
        return check;
    }

    /**
     * Per-metric aggregates over a period; null when the period holds no records
     */
    async statistics(periodDays: number = 30): Promise<CoverageStatistics | null> {
        const trends = await this.getRecentTrends(periodDays);
        if (trends.length === 0) {
            return null;
        }

        const entries = TREND_METRICS.map((metric): [TrendMetric, MetricStatistics] => {
            const values = trends.map(t => t[metric]);
            return [metric, {
                current: values[values.length - 1],
                average: mean(values),
                median: median(values),
                min: Math.min(...values),
                max: Math.max(...values),
                stdDev: standardDeviation(values),
                trend: analyzeTrend(trends, metric),
            }];
        });

        return {
            periodDays,
            dataPoints: trends.length,
            firstTimestamp: trends[0].timestamp,
            lastTimestamp: trends[trends.length - 1].timestamp,
            statistics: {
                lineCoverage: entries[0][1],
                branchCoverage: entries[1][1],
                functionCoverage: entries[2][1],
                overallScore: entries[3][1],
            },
        };
    }

    /**
     * Drop records older than `keepDays`; returns the number removed
     */
    async cleanup(keepDays: number = 365): Promise<number> {
        const history = await this.loadHistory();
        const kept = this.filterByAge(history, keepDays);
        const removed = history.length - kept.length;

        if (removed > 0) {
            await this.saveHistory(kept);
            logger.info(`Cleaned up coverage history: ${removed} old entries removed`);
        }
        return removed;
    }

    /**
     * Write the history as CSV with a header row; returns the number of data rows
     */
    async exportCsv(outputFile: string): Promise<number> {
        const history = await this.loadHistory();
        const rows = history.map(trend => {
            const record = serializeTrend(trend);
            return CSV_COLUMNS.map(column => csvField(record[column])).join(',');
        });

        await writeFile(outputFile, [CSV_COLUMNS.join(','), ...rows].join('\n') + '\n');
        logger.info(`Exported ${rows.length} coverage records to ${outputFile}`);
        return rows.length;
    }

    private filterByAge(history: CoverageTrend[], days: number): CoverageTrend[] {
        const cutoff = this.clock().getTime() - days * DAY_MS;
        return history.filter(trend => {
            const time = Date.parse(trend.timestamp);
            return Number.isFinite(time) && time >= cutoff;
        });
    }

    private async updateTrendAnalysis(history: CoverageTrend[]): Promise<void> {
        if (history.length < 2) {
            return;
        }

        const periods: Record<string, Record<string, ReturnType<typeof serializeTrendAnalysis>>> = {};
        for (const period of TREND_PERIODS) {
            const trends = this.filterByAge(history, period);
            if (trends.length < 2) continue;

            const analysis: Record<string, ReturnType<typeof serializeTrendAnalysis>> = {};
            for (const metric of TREND_METRICS) {
                analysis[TREND_METRIC_KEYS[metric]] = serializeTrendAnalysis(analyzeTrend(trends, metric));
            }
            periods[`${period}_days`] = analysis;
        }

        try {
            await writeFile(this.trendsFile, JSON.stringify({
                last_updated: this.clock().toISOString(),
                total_data_points: history.length,
                periods,
            }, null, 2));
        } catch (error) {
            logger.warn(`Error saving trend analysis: ${error instanceof Error ? error.message : String(error)}`);
        }
    }
}

/**
 * Least-squares trend of one metric over an ordered series
 */
export function analyzeTrend(trends: CoverageTrend[], metric: TrendMetric): TrendAnalysis {
    const empty = { slope: 0, confidence: 0, currentValue: 0, changePercent: 0 };

    if (trends.length < 2) {
        return { direction: 'insufficient_data', ...empty, sampleCount: trends.length };
    }

    const values = trends.map(t => t[metric]).filter(v => Number.isFinite(v));
    if (values.length < 2) {
        return { direction: 'no_data', ...empty, sampleCount: values.length };
    }

    const fit = linearRegression(values);
    const first = values[0];
    const last = values[values.length - 1];

    return {
        direction: Math.abs(fit.slope) < 0.1 ? 'stable' : fit.slope > 0 ? 'improving' : 'declining',
        slope: fit.slope,
        confidence: fit.rSquared,
        currentValue: last,
        changePercent: first !== 0 ? ((last - first) / first) * 100 : 0,
        sampleCount: values.length,
    };
}

function csvField(value: string | number | null | undefined): string {
    if (value === null || value === undefined) return '';
    const text = String(value);
    return /[",\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

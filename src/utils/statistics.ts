/**
 * Small descriptive statistics helpers used by trend tracking.
 * All functions expect finite numbers; empty input yields 0.
 */

export function mean(values: number[]): number {
    if (values.length === 0) return 0;
    return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function median(values: number[]): number {
    if (values.length === 0) return 0;
    const sorted = [...values].sort((a, b) => a - b);
    const mid = Math.floor(sorted.length / 2);
    return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

/**
 * Sample standard deviation (n - 1 denominator); 0 for fewer than two values
 */
export function standardDeviation(values: number[]): number {
    if (values.length < 2) return 0;
    const m = mean(values);
    const variance = values.reduce((sum, v) => sum + (v - m) ** 2, 0) / (values.length - 1);
    return Math.sqrt(variance);
}

export interface LinearFit {
    slope: number;
    intercept: number;
    rSquared: number;
}

/**
 * Ordinary least squares fit of `values` against their position index (0..n-1)
 */
export function linearRegression(values: number[]): LinearFit {
    const n = values.length;
    if (n < 2) {
        return { slope: 0, intercept: n === 1 ? values[0] : 0, rSquared: 0 };
    }

    const xMean = (n - 1) / 2;
    const yMean = mean(values);

    let numerator = 0;
    let denominator = 0;
    for (let x = 0; x < n; x++) {
        numerator += (x - xMean) * (values[x] - yMean);
        denominator += (x - xMean) ** 2;
    }

    const slope = denominator !== 0 ? numerator / denominator : 0;
    const intercept = yMean - slope * xMean;

    let ssRes = 0;
    let ssTot = 0;
    for (let x = 0; x < n; x++) {
        const predicted = yMean + slope * (x - xMean);
        ssRes += (values[x] - predicted) ** 2;
        ssTot += (values[x] - yMean) ** 2;
    }

    return { slope, intercept, rSquared: ssTot !== 0 ? 1 - ssRes / ssTot : 0 };
}

export function clamp(value: number, min: number, max: number): number {
    if (Number.isNaN(value)) return min;
    return Math.min(max, Math.max(min, value));
}

/**
 * covered / total as a percentage; 0 when total is 0
 */
export function percentage(covered: number, total: number): number {
    return total > 0 ? (covered * 100) / total : 0;
}

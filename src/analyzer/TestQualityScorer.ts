/**
 * Coverage figures a test-quality scorer may draw on (all percentages)
 */
export interface TestQualityInput {
    lineCoverage: number;
    branchCoverage: number;
    functionCoverage: number;
    effectiveCoverage: number;
}

export interface TestQualityScorer {
    /**
     * Score in [0, 100]
     */
    score(input: TestQualityInput): number;
}

/**
 * Mean of branch, function and effective coverage
 */
export class BalancedTestQualityScorer implements TestQualityScorer {
    score(input: TestQualityInput): number {
        return (input.branchCoverage + input.functionCoverage + input.effectiveCoverage) / 3;
    }
}

/**
 * Always returns the same score
 */
export class FixedTestQualityScorer implements TestQualityScorer {
    constructor(private value: number) {}

    score(): number {
        return this.value;
    }
}

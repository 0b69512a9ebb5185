import path from 'path';
import { CoverageAnalyzer, SourceReader } from '../CoverageAnalyzer';
import { FixedTestQualityScorer } from '../TestQualityScorer';
import { CoverageDataSource, InMemoryCoverageSource } from '../../sources/CoverageDataSource';
import { CoverageData, FileCoverageData } from '../../models/CoverageModels';
import logger from '../../utils/logger';

jest.mock('../../utils/logger', () => ({
    __esModule: true,
    default: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

const PROJECT = path.resolve('/work/project');
const CALC = path.join(PROJECT, 'src', 'calc.py');

const CALC_SOURCE = [
    'import os',
    '',
    'def divide(a, b):',
    '    if b == 0:',
    '        raise ValueError("division by zero")',
    '    return a / b',
    '',
    'class Calculator:',
    '    def total(self, values):',
    '        result = 0',
    '        for v in values:',
    '            result += v',
    '        return result',
].join('\n');

class MapSourceReader implements SourceReader {
    constructor(private files: Record<string, string>) {}

    async read(filePath: string): Promise<string> {
        const content = this.files[filePath];
        if (content === undefined) {
            throw new Error(`ENOENT: ${filePath}`);
        }
        return content;
    }
}

class FailingSource implements CoverageDataSource {
    describe(): string {
        return 'broken.json';
    }

    async load(): Promise<CoverageData> {
        throw new Error('unexpected token');
    }
}

function calcCoverage(overrides: Partial<FileCoverageData> = {}): FileCoverageData {
    return {
        path: 'src/calc.py',
        executedLines: [1, 3, 4, 6, 8, 9, 10, 11],
        missingLines: [5, 12],
        executedBranches: [],
        missingBranches: [],
        ...overrides,
    };
}

function createAnalyzer(files: FileCoverageData[], sources: Record<string, string> = { [CALC]: CALC_SOURCE }) {
    return new CoverageAnalyzer({
        projectRoot: PROJECT,
        sourceDir: 'src',
        dataSource: new InMemoryCoverageSource(files),
        sourceReader: new MapSourceReader(sources),
        clock: () => new Date('2024-03-01T12:00:00.000Z'),
    });
}

describe('CoverageAnalyzer', () => {
    beforeEach(() => {
        jest.clearAllMocks();
    });

    describe('load', () => {
        it('should keep only non-test source files under the source root', async () => {
            const analyzer = createAnalyzer([
                calcCoverage(),
                { ...calcCoverage(), path: 'src/test_calc.py' },
                { ...calcCoverage(), path: 'tests/unit/test_other.py' },
                { ...calcCoverage(), path: 'src/notes.md' },
                { ...calcCoverage(), path: 'src/__tests__/calc.test.ts' },
            ]);

            await expect(analyzer.load()).resolves.toBe(true);
            expect(analyzer.isLoaded()).toBe(true);
            expect(analyzer.getFiles().map(f => f.path)).toEqual([CALC]);
        });

        it('should return false and log a warning when the data source fails', async () => {
            const analyzer = new CoverageAnalyzer({
                projectRoot: PROJECT,
                sourceDir: 'src',
                dataSource: new FailingSource(),
            });

            await expect(analyzer.load()).resolves.toBe(false);
            expect(analyzer.isLoaded()).toBe(false);
            expect(logger.warn).toHaveBeenCalledWith('Failed to load coverage data from broken.json: unexpected token');
        });
    });

    describe('before loading', () => {
        it('should report no gaps, zero metrics and no summary', async () => {
            const analyzer = createAnalyzer([calcCoverage()]);

            await expect(analyzer.analyzeGaps()).resolves.toEqual([]);
            await expect(analyzer.getCoverageSummary()).resolves.toBeNull();

            const metrics = await analyzer.calculateQualityMetrics();
            expect(metrics.lineCoveragePercent).toBe(0);
            expect(metrics.overallScore).toBe(0);
            expect(metrics.totalGaps).toBe(0);
            expect(metrics.coverageTrend).toBe('stable');
        });
    });

    describe('analyzeGaps', () => {
        it('should classify missing lines and sort by severity', async () => {
            const analyzer = createAnalyzer([calcCoverage()]);
            await analyzer.load();

            const gaps = await analyzer.analyzeGaps();

            expect(gaps).toEqual([
                {
                    filePath: CALC,
                    lineStart: 5,
                    lineEnd: 5,
                    gapType: 'error_path',
                    severity: 'critical',
                    functionName: 'divide',
                    complexityScore: 1,
                    suggestedTests: [
                        "Test function 'divide' with edge cases",
                        'Test error condition that triggers: raise ValueError("division by zero")',
                    ],
                },
                {
                    filePath: CALC,
                    lineStart: 12,
                    lineEnd: 12,
                    gapType: 'uncovered_lines',
                    severity: 'low',
                    functionName: 'total',
                    className: 'Calculator',
                    complexityScore: 1,
                    suggestedTests: ["Test function 'total' with edge cases"],
                },
            ]);
        });

        it('should skip blank lines, comments and lines past the end of the file', async () => {
            const analyzer = createAnalyzer([calcCoverage({ missingLines: [2, 7, 40] })]);
            await analyzer.load();

            await expect(analyzer.analyzeGaps()).resolves.toEqual([]);
        });

        it('should mark exception handlers as critical', async () => {
            const file = path.join(PROJECT, 'src', 'io.py');
            const source = ['def read(path):', '    try:', '        return open(path).read()', '    except OSError:', '        return None'].join('\n');
            const analyzer = createAnalyzer(
                [{ path: 'src/io.py', executedLines: [1, 2, 3], missingLines: [4, 5], executedBranches: [], missingBranches: [] }],
                { [file]: source }
            );
            await analyzer.load();

            const [handler, fallback] = await analyzer.analyzeGaps();

            expect(handler.lineStart).toBe(4);
            expect(handler.gapType).toBe('exception_handling');
            expect(handler.severity).toBe('critical');
            expect(handler.complexityScore).toBe(2);
            expect(fallback.lineStart).toBe(5);
            expect(fallback.severity).toBe('low');
        });

        it('should skip Python files that cannot be parsed', async () => {
            const broken = path.join(PROJECT, 'src', 'broken.py');
            const analyzer = createAnalyzer(
                [
                    calcCoverage(),
                    { path: 'src/broken.py', executedLines: [], missingLines: [1, 2, 3], executedBranches: [], missingBranches: [] },
                ],
                { [CALC]: CALC_SOURCE, [broken]: ['def broken(:', 'if x', 'raise ValueError(', 'class'].join('\n') }
            );
            await analyzer.load();

            const gaps = await analyzer.analyzeGaps();

            expect(gaps.map(g => [g.filePath, g.lineStart])).toEqual([[CALC, 5], [CALC, 12]]);
            expect(logger.warn).toHaveBeenCalledWith(`Error analyzing ${broken}: Cannot parse ${broken}:3: unclosed bracket`);
        });

        it('should skip TypeScript files with syntax errors', async () => {
            const broken = path.join(PROJECT, 'src', 'broken.ts');
            const analyzer = createAnalyzer(
                [{ path: 'src/broken.ts', executedLines: [1], missingLines: [2], executedBranches: [], missingBranches: [] }],
                { [broken]: ['export function broken( {', '    return 1;', '}'].join('\n') }
            );
            await analyzer.load();

            await expect(analyzer.analyzeGaps()).resolves.toEqual([]);
            expect(logger.warn).toHaveBeenCalledWith(expect.stringMatching(/^Error analyzing .*broken\.ts: Cannot parse .*broken\.ts:\d+: /));
        });

        it('should skip files whose source cannot be read', async () => {
            const analyzer = createAnalyzer([calcCoverage()], {});
            await analyzer.load();

            await expect(analyzer.analyzeGaps()).resolves.toEqual([]);
            expect(logger.warn).toHaveBeenCalledWith(`Error analyzing ${CALC}: ENOENT: ${CALC}`);
        });
    });

    describe('calculateQualityMetrics', () => {
        it('should compute 80% line coverage for 8 of 10 executable lines', async () => {
            const analyzer = createAnalyzer([calcCoverage()]);
            await analyzer.load();

            const metrics = await analyzer.calculateQualityMetrics();
            const effective = (10 * 100) / 13;
            const quality = (0 + 100 + effective) / 3;

            expect(metrics.lineCoveragePercent).toBe(80);
            expect(metrics.branchCoveragePercent).toBe(0);
            expect(metrics.functionCoveragePercent).toBe(100);
            expect(metrics.effectiveCoverageScore).toBeCloseTo(effective, 6);
            expect(metrics.testQualityScore).toBeCloseTo(quality, 6);
            expect(metrics.coverageDensity).toBeCloseTo(8 / 11, 6);
            expect(metrics.criticalGaps).toBe(1);
            expect(metrics.lowPriorityGaps).toBe(1);
            expect(metrics.totalGaps).toBe(2);
            expect(metrics.wellCoveredFiles).toBe(0);
            expect(metrics.poorlyCoveredFiles).toBe(0);
            expect(metrics.uncoveredFiles).toBe(0);
            // 40 * 0.4 + quality * 0.3 + 90 * 0.2 + 50 * 0.1
            expect(metrics.overallScore).toBeCloseTo(16 + quality * 0.3 + 18 + 5, 6);
        });

        it('should count branch arcs and bucket files by coverage', async () => {
            const other = path.join(PROJECT, 'src', 'empty.py');
            const analyzer = createAnalyzer(
                [
                    calcCoverage({ executedBranches: [[4, 5], [4, 6], [11, 12]], missingBranches: [[11, 13]] }),
                    { path: 'src/empty.py', executedLines: [], missingLines: [1], executedBranches: [], missingBranches: [] },
                ],
                { [CALC]: CALC_SOURCE, [other]: 'VALUE = 1' }
            );
            await analyzer.load();

            const metrics = await analyzer.calculateQualityMetrics();

            expect(metrics.branchCoveragePercent).toBe(75);
            expect(metrics.lineCoveragePercent).toBeCloseTo((8 * 100) / 11, 6);
            expect(metrics.uncoveredFiles).toBe(1);
        });

        it('should credit functions reported as hit by the coverage tool', async () => {
            const analyzer = createAnalyzer([
                calcCoverage({
                    executedLines: [1, 3, 4, 6],
                    missingLines: [8, 9, 10, 11, 12, 13],
                    functionHits: [{ name: 'total', line: 10, hits: 2 }],
                }),
            ]);
            await analyzer.load();

            const metrics = await analyzer.calculateQualityMetrics();

            expect(metrics.functionCoveragePercent).toBe(100);
        });

        it('should derive the trend from line coverage history', async () => {
            const analyzer = createAnalyzer([calcCoverage()]);
            await analyzer.load();

            const improving = await analyzer.calculateQualityMetrics([{ lineCoverage: 70 }, { lineCoverage: 80 }]);
            const stable = await analyzer.calculateQualityMetrics([{ lineCoverage: 80 }, { lineCoverage: 81 }]);
            const declining = await analyzer.calculateQualityMetrics([{ lineCoverage: 90 }, { lineCoverage: 80 }]);

            expect(improving.coverageTrend).toBe('improving');
            expect(improving.trendPercentage).toBe(5);
            expect(stable.coverageTrend).toBe('stable');
            expect(stable.trendPercentage).toBe(0.5);
            expect(declining.coverageTrend).toBe('declining');
            expect(declining.trendPercentage).toBe(-5);
        });

        it('should use a pluggable test quality scorer', async () => {
            const analyzer = new CoverageAnalyzer({
                projectRoot: PROJECT,
                sourceDir: 'src',
                dataSource: new InMemoryCoverageSource([calcCoverage()]),
                sourceReader: new MapSourceReader({ [CALC]: CALC_SOURCE }),
                testQualityScorer: new FixedTestQualityScorer(42),
            });
            await analyzer.load();

            const metrics = await analyzer.calculateQualityMetrics();

            expect(metrics.testQualityScore).toBe(42);
        });
    });

    describe('getCoverageSummary', () => {
        it('should summarize metrics, gap counts and file buckets', async () => {
            const analyzer = createAnalyzer([calcCoverage()]);
            await analyzer.load();

            const summary = await analyzer.getCoverageSummary();

            expect(summary?.timestamp).toBe('2024-03-01T12:00:00.000Z');
            expect(summary?.metrics.line_coverage).toBe(80);
            expect(summary?.gaps).toEqual({
                total: 2,
                critical: 1,
                high: 0,
                by_type: { error_path: 1, uncovered_lines: 1 },
            });
            expect(summary?.files).toEqual({ well_covered: 0, poorly_covered: 0, uncovered: 0 });
            expect(summary?.trend).toEqual({ direction: 'stable', percentage: 0 });
        });
    });
});

import path from 'path';
import { glob } from 'fast-glob';
import { AdapterRegistry } from '../adapters/AdapterRegistry';
import { LanguageAdapter } from '../adapters/LanguageAdapter';
import {
    CoverageData,
    CoverageGap,
    CoverageQualityMetrics,
    CoverageSummary,
    FileCoverageData,
    SEVERITY_RANK,
    TrendDirection,
    calculateOverallScore,
    countBy,
    emptyMetrics,
} from '../models/CoverageModels';
import { CoverageTrend } from '../models/TrendModels';
import { CoverageDataSource } from '../sources/CoverageDataSource';
import { readFile } from '../utils/fileUtils';
import logger from '../utils/logger';
import { clamp, percentage } from '../utils/statistics';
import { classifyGapType, determineSeverity, lineComplexity, suggestTestsForLine } from './GapClassifier';
import { ScopeIndex } from './ScopeIndex';
import { BalancedTestQualityScorer, TestQualityScorer } from './TestQualityScorer';

/**
 * Reads source files for scope parsing
 */
export interface SourceReader {
    read(filePath: string): Promise<string>;
}

export class FileSystemSourceReader implements SourceReader {
    async read(filePath: string): Promise<string> {
        return readFile(filePath);
    }
}

export interface CoverageAnalyzerOptions {
    projectRoot: string;
    /** Source root, absolute or relative to projectRoot */
    sourceDir: string;
    dataSource: CoverageDataSource;
    sourceReader?: SourceReader;
    adapters?: AdapterRegistry;
    testQualityScorer?: TestQualityScorer;
    /** fast-glob patterns, relative to the source root */
    excludePatterns?: string[];
    clock?: () => Date;
}

/**
 * One instrumented source file, parsed once per load
 */
export interface AnalyzedSource {
    /** Absolute path */
    path: string;
    /** Path relative to the source root */
    relativePath: string;
    adapter: LanguageAdapter;
    coverage: FileCoverageData;
    lines: string[];
    scopes: ScopeIndex;
}

const EXCLUDED_SEGMENTS = ['node_modules', '__pycache__', '.git', '__tests__'];

/** Trend window of the quality metrics */
const TREND_WINDOW = 5;

export class CoverageAnalyzer {
    readonly projectRoot: string;
    readonly sourceRoot: string;
    readonly adapters: AdapterRegistry;

    private dataSource: CoverageDataSource;
    private sourceReader: SourceReader;
    private scorer: TestQualityScorer;
    private excludePatterns: string[];
    private clock: () => Date;

    private data: CoverageData | null = null;
    private files: FileCoverageData[] = [];
    private sources: Promise<AnalyzedSource[]> | null = null;
    private gaps: CoverageGap[] | null = null;

    constructor(options: CoverageAnalyzerOptions) {
        this.projectRoot = path.resolve(options.projectRoot);
        this.sourceRoot = path.resolve(this.projectRoot, options.sourceDir);
        this.dataSource = options.dataSource;
        this.sourceReader = options.sourceReader ?? new FileSystemSourceReader();
        this.adapters = options.adapters ?? new AdapterRegistry();
        this.scorer = options.testQualityScorer ?? new BalancedTestQualityScorer();
        this.excludePatterns = options.excludePatterns ?? [];
        this.clock = options.clock ?? (() => new Date());
    }

    /**
     * Load coverage data. Never throws; returns false and logs the cause on failure.
     */
    async load(): Promise<boolean> {
        this.data = null;
        this.files = [];
        this.sources = null;
        this.gaps = null;

        try {
            const data = await this.dataSource.load();
            const excluded = await this.resolveExcludes();
            this.files = data.files
                .map(file => ({ ...file, path: path.resolve(this.projectRoot, file.path) }))
                .filter(file => this.isSourceFile(file.path, excluded));
            this.data = data;
            logger.info(
                `Loaded ${data.format} coverage from ${this.dataSource.describe()}: ` +
                `${this.files.length} of ${data.files.length} files under ${this.sourceRoot}`
            );
            return true;
        } catch (error) {
            logger.warn(`Failed to load coverage data from ${this.dataSource.describe()}: ${error instanceof Error ? error.message : String(error)}`);
            return false;
        }
    }

    isLoaded(): boolean {
        return this.data !== null;
    }

    /**
     * Instrumented files under the source root
     */
    getFiles(): FileCoverageData[] {
        return this.files;
    }

    /**
     * Coverage gaps sorted by (severity desc, complexity desc); cached until the next load
     */
    async analyzeGaps(): Promise<CoverageGap[]> {
        if (!this.data) {
            return [];
        }
        if (this.gaps) {
            return this.gaps;
        }

        const gaps: CoverageGap[] = [];
        for (const source of await this.getSources()) {
            for (const lineNumber of source.coverage.missingLines) {
                const gap = this.analyzeMissingLine(source, lineNumber);
                if (gap) gaps.push(gap);
            }
        }

        gaps.sort((a, b) =>
            SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity] || b.complexityScore - a.complexityScore
        );

        this.gaps = gaps;
        return gaps;
    }

    /**
     * Aggregate quality metrics; all zero when no data is loaded
     */
    async calculateQualityMetrics(history?: Array<Pick<CoverageTrend, 'lineCoverage'>>): Promise<CoverageQualityMetrics> {
        if (!this.data) {
            return emptyMetrics();
        }

        const sources = await this.getSources();
        const gaps = await this.analyzeGaps();

        const lineCoveragePercent = clamp(this.lineCoverage(), 0, 100);
        const branchCoveragePercent = clamp(this.branchCoverage(), 0, 100);
        const functionCoveragePercent = clamp(this.functionCoverage(sources), 0, 100);
        const effectiveCoverageScore = clamp(this.effectiveCoverage(sources), 0, 100);
        const testQualityScore = clamp(this.scorer.score({
            lineCoverage: lineCoveragePercent,
            branchCoverage: branchCoveragePercent,
            functionCoverage: functionCoveragePercent,
            effectiveCoverage: effectiveCoverageScore,
        }), 0, 100);
        const [coverageTrend, trendPercentage] = this.analyzeTrend(history ?? []);
        const buckets = this.fileBuckets();

        const severities = countBy(gaps, g => g.severity);
        const metrics = {
            lineCoveragePercent,
            branchCoveragePercent,
            functionCoveragePercent,
            effectiveCoverageScore,
            testQualityScore,
            coverageDensity: clamp(this.coverageDensity(sources), 0, 1),
            criticalGaps: severities.critical ?? 0,
            highPriorityGaps: severities.high ?? 0,
            mediumPriorityGaps: severities.medium ?? 0,
            lowPriorityGaps: severities.low ?? 0,
            totalGaps: gaps.length,
            coverageTrend,
            trendPercentage,
            ...buckets,
        };

        return Object.freeze({ ...metrics, overallScore: calculateOverallScore(metrics) });
    }

    /**
     * Headline summary; null when no data is loaded
     */
    async getCoverageSummary(history?: Array<Pick<CoverageTrend, 'lineCoverage'>>): Promise<CoverageSummary | null> {
        if (!this.data) {
            return null;
        }

        const metrics = await this.calculateQualityMetrics(history);
        const gaps = await this.analyzeGaps();

        return {
            timestamp: this.clock().toISOString(),
            metrics: {
                line_coverage: metrics.lineCoveragePercent,
                branch_coverage: metrics.branchCoveragePercent,
                function_coverage: metrics.functionCoveragePercent,
                overall_score: metrics.overallScore,
                effective_coverage: metrics.effectiveCoverageScore,
                test_quality: metrics.testQualityScore,
            },
            gaps: {
                total: gaps.length,
                critical: metrics.criticalGaps,
                high: metrics.highPriorityGaps,
                by_type: countBy(gaps, g => g.gapType),
            },
            files: {
                well_covered: metrics.wellCoveredFiles,
                poorly_covered: metrics.poorlyCoveredFiles,
                uncovered: metrics.uncoveredFiles,
            },
            trend: {
                direction: metrics.coverageTrend,
                percentage: metrics.trendPercentage,
            },
        };
    }

    /**
     * Parsed source for a file path (absolute or relative to the project root)
     */
    async getSource(filePath: string): Promise<AnalyzedSource | undefined> {
        const absolute = path.resolve(this.projectRoot, filePath);
        return (await this.getSources()).find(s => s.path === absolute);
    }

    private getSources(): Promise<AnalyzedSource[]> {
        if (!this.sources) {
            this.sources = this.parseSources();
        }
        return this.sources;
    }

    private async parseSources(): Promise<AnalyzedSource[]> {
        const sources: AnalyzedSource[] = [];
        for (const coverage of this.files) {
            const adapter = this.adapters.getAdapterForFile(coverage.path);
            if (!adapter) continue;

            try {
                const content = await this.sourceReader.read(coverage.path);
                sources.push({
                    path: coverage.path,
                    relativePath: path.relative(this.sourceRoot, coverage.path),
                    adapter,
                    coverage,
                    lines: content.split('\n'),
                    scopes: new ScopeIndex(adapter.parseScopes(content, coverage.path)),
                });
            } catch (error) {
                logger.warn(`Error analyzing ${coverage.path}: ${error instanceof Error ? error.message : String(error)}`);
            }
        }
        return sources;
    }

    private analyzeMissingLine(source: AnalyzedSource, lineNumber: number): CoverageGap | null {
        if (lineNumber < 1 || lineNumber > source.lines.length) {
            return null;
        }

        const text = source.lines[lineNumber - 1].trim();
        if (!text || source.adapter.isCommentLine(text)) {
            return null;
        }

        const scope = source.scopes.enclosing(lineNumber);
        const functionName = scope.function?.name;
        const className = scope.class?.name;

        const gap: CoverageGap = {
            filePath: source.path,
            lineStart: lineNumber,
            lineEnd: lineNumber,
            gapType: classifyGapType(text, source.adapter),
            severity: determineSeverity({ line: text, functionName, className }, source.adapter),
            complexityScore: lineComplexity(text, source.adapter),
            suggestedTests: suggestTestsForLine(text, source.adapter, functionName),
        };
        if (functionName) gap.functionName = functionName;
        if (className) gap.className = className;
        return gap;
    }

    private lineCoverage(): number {
        let executed = 0;
        let total = 0;
        for (const file of this.files) {
            executed += file.executedLines.length;
            total += file.executedLines.length + file.missingLines.length;
        }
        return percentage(executed, total);
    }

    private branchCoverage(): number {
        let covered = 0;
        let total = 0;
        for (const file of this.files) {
            covered += file.executedBranches.length;
            total += file.executedBranches.length + file.missingBranches.length;
        }
        return percentage(covered, total);
    }

    /**
     * A function is covered when its definition line executed, or when the coverage
     * tool reports a positive hit count for it
     */
    private functionCoverage(sources: AnalyzedSource[]): number {
        let covered = 0;
        let total = 0;
        for (const source of sources) {
            const executed = new Set(source.coverage.executedLines);
            const hits = (source.coverage.functionHits ?? []).filter(h => h.hits > 0);

            for (const scope of source.scopes.all()) {
                if (scope.kind !== 'function') continue;
                total++;
                const hit = hits.some(h =>
                    h.line === scope.startLine ||
                    (h.name === scope.name && h.line >= scope.startLine && h.line <= scope.endLine)
                );
                if (executed.has(scope.startLine) || hit) covered++;
            }
        }
        return percentage(covered, total);
    }

    private effectiveCoverage(sources: AnalyzedSource[]): number {
        let coveredWeight = 0;
        let totalWeight = 0;
        for (const source of sources) {
            const executed = new Set(source.coverage.executedLines);
            source.lines.forEach((line, index) => {
                const text = line.trim();
                if (!text || source.adapter.isCommentLine(text)) return;
                const weight = lineComplexity(line, source.adapter);
                totalWeight += weight;
                if (executed.has(index + 1)) coveredWeight += weight;
            });
        }
        return percentage(coveredWeight, totalWeight);
    }

    /**
     * Executed lines per non-comment line, 0..1
     */
    private coverageDensity(sources: AnalyzedSource[]): number {
        let executed = 0;
        let codeLines = 0;
        for (const source of sources) {
            codeLines += source.lines.filter(line => {
                const text = line.trim();
                return text.length > 0 && !source.adapter.isCommentLine(text);
            }).length;
            executed += source.coverage.executedLines.length;
        }
        return codeLines > 0 ? executed / codeLines : 0;
    }

    /**
     * Simple slope over the last few line-coverage points; |slope| < 1 is stable
     */
    private analyzeTrend(history: Array<Pick<CoverageTrend, 'lineCoverage'>>): [TrendDirection, number] {
        const recent = history.slice(-TREND_WINDOW).map(h => h.lineCoverage);
        if (recent.length < 2) {
            return ['stable', 0];
        }

        const slope = (recent[recent.length - 1] - recent[0]) / recent.length;
        if (slope > 1) return ['improving', slope];
        if (slope < -1) return ['declining', slope];
        return ['stable', slope];
    }

    private fileBuckets(): Pick<CoverageQualityMetrics, 'wellCoveredFiles' | 'poorlyCoveredFiles' | 'uncoveredFiles'> {
        let wellCoveredFiles = 0;
        let poorlyCoveredFiles = 0;
        let uncoveredFiles = 0;

        for (const file of this.files) {
            const total = file.executedLines.length + file.missingLines.length;
            if (total === 0) continue;

            const coverage = percentage(file.executedLines.length, total);
            if (coverage === 0) uncoveredFiles++;
            else if (coverage < 50) poorlyCoveredFiles++;
            else if (coverage >= 90) wellCoveredFiles++;
        }

        return { wellCoveredFiles, poorlyCoveredFiles, uncoveredFiles };
    }

    private isSourceFile(filePath: string, excluded: Set<string>): boolean {
        const relative = path.relative(this.sourceRoot, filePath);
        if (relative.startsWith('..') || path.isAbsolute(relative)) {
            return false;
        }

        const adapter = this.adapters.getAdapterForFile(filePath);
        if (!adapter || adapter.isTestFile(relative)) {
            return false;
        }

        const segments = relative.split(path.sep);
        if (segments.some(segment => EXCLUDED_SEGMENTS.includes(segment))) {
            return false;
        }

        return !excluded.has(segments.join('/'));
    }

    private async resolveExcludes(): Promise<Set<string>> {
        if (this.excludePatterns.length === 0) {
            return new Set();
        }
        const matches = await glob(this.excludePatterns, { cwd: this.sourceRoot, onlyFiles: true, dot: true });
        return new Set(matches);
    }
}

import path from 'path';
import { CoverageAnalyzer } from '../analyzer/CoverageAnalyzer';
import { ScopeIndex } from '../analyzer/ScopeIndex';
import { LanguageAdapter, TemplateContext } from '../adapters/LanguageAdapter';
import { CoverageGap, GapType } from '../models/CoverageModels';
import {
    ClassStructure,
    MissingTestFile,
    PRIORITY_RANK,
    SuggestionPriority,
    TestSuggestion,
    TestType,
} from '../models/SuggestionModels';
import { fileExists, findSourceFiles, readFile } from '../utils/fileUtils';
import logger from '../utils/logger';

export interface TestGeneratorOptions {
    /** Test root, absolute or relative to the analyzer's project root */
    testDir: string;
    excludePatterns?: string[];
}

interface SuggestionShape {
    testType: TestType;
    priority: (gaps: CoverageGap[]) => SuggestionPriority;
    nameSuffix: string;
    description: (target: string | undefined, gaps: CoverageGap[]) => string;
    template: (adapter: LanguageAdapter, context: TemplateContext) => string;
}

const BRANCH: SuggestionShape = {
    testType: 'unit',
    priority: gaps => (gaps.some(g => g.severity === 'critical' || g.severity === 'high') ? 'high' : 'medium'),
    nameSuffix: 'branch_coverage',
    description: (fn, gaps) =>
        `Test branch conditions in ${fn ?? 'code'}` + (gaps.length > 1 ? ` (${gaps.length} uncovered branches)` : ''),
    template: (adapter, context) => adapter.templates.branch(context),
};

const SHAPES: Partial<Record<GapType, SuggestionShape>> = {
    missing_branch: BRANCH,
    exception_handling: {
        testType: 'error_handling',
        priority: () => 'high',
        nameSuffix: 'exception_handling',
        description: fn => `Test exception handling in ${fn ?? 'code'}`,
        template: (adapter, context) => adapter.templates.exception(context),
    },
    uncovered_function: {
        testType: 'unit',
        priority: () => 'medium',
        nameSuffix: 'basic_functionality',
        description: fn => `Test basic functionality of ${fn ?? 'function'}`,
        template: (adapter, context) => adapter.templates.basic(context),
    },
    error_path: {
        testType: 'edge_case',
        priority: () => 'high',
        nameSuffix: 'error_conditions',
        description: fn => `Test error conditions and edge cases in ${fn ?? 'code'}`,
        template: (adapter, context) => adapter.templates.errorPath(context),
    },
};

const GENERIC: SuggestionShape = {
    testType: 'unit',
    priority: () => 'low',
    nameSuffix: 'coverage',
    description: fn => `Improve test coverage for ${fn ?? 'code'}`,
    template: (adapter, context) => adapter.templates.generic(context),
};

/**
 * Turns coverage gaps into prioritized, templated test suggestions
 */
export class TestGenerator {
    private testDir: string;
    private excludePatterns: string[];

    constructor(private analyzer: CoverageAnalyzer, options: TestGeneratorOptions) {
        this.testDir = path.resolve(analyzer.projectRoot, options.testDir);
        this.excludePatterns = options.excludePatterns ?? [];
    }

    /**
     * Suggestions sorted by (priority desc, complexity desc), at most `maxCount`
     */
    async generateSuggestions(maxCount: number = 50): Promise<TestSuggestion[]> {
        if (!this.analyzer.isLoaded() && !(await this.analyzer.load())) {
            return [];
        }

        const gaps = await this.analyzer.analyzeGaps();
        const suggestions: TestSuggestion[] = [];

        for (const [filePath, fileGaps] of groupBy(gaps, g => g.filePath)) {
            const source = await this.analyzer.getSource(filePath);
            if (!source) continue;

            for (const scopeGaps of groupBy(fileGaps, g => `${g.className ?? ''}::${g.functionName ?? ''}`).values()) {
                suggestions.push(...this.scopeSuggestions(source.adapter, source.scopes, scopeGaps));
            }
        }

        suggestions.sort((a, b) =>
            PRIORITY_RANK[b.priority] - PRIORITY_RANK[a.priority] || b.complexityScore - a.complexityScore
        );

        return suggestions.slice(0, Math.max(0, maxCount));
    }

    /**
     * Source files whose conventional test file does not exist
     */
    async findMissingTestFiles(): Promise<MissingTestFile[]> {
        const missing: MissingTestFile[] = [];
        const sourceRoot = this.analyzer.sourceRoot;

        for (const adapter of this.analyzer.adapters.getAllAdapters()) {
            const files = await findSourceFiles(sourceRoot, adapter.extensions, this.excludePatterns);

            for (const relativePath of files) {
                if (path.basename(relativePath).startsWith('__') || adapter.isTestFile(relativePath)) {
                    continue;
                }

                const testFile = adapter.getTestFilePath(relativePath, this.testDir);
                if (await fileExists(testFile)) {
                    continue;
                }

                const structure = await this.describeStructure(path.join(sourceRoot, relativePath), adapter);
                const complexity = structure.classes.length + structure.functions.length;

                missing.push({
                    sourceFile: path.join(sourceRoot, relativePath),
                    suggestedTestFile: testFile,
                    language: adapter.language,
                    ...structure,
                    complexity,
                    priority: complexity > 10 ? 'high' : complexity > 5 ? 'medium' : 'low',
                });
            }
        }

        return missing.sort((a, b) => PRIORITY_RANK[b.priority] - PRIORITY_RANK[a.priority]);
    }

    /**
     * Complete test file text for a suggestion
     */
    renderTemplate(suggestion: TestSuggestion): string {
        const adapter = this.analyzer.adapters.getAdapterForFile(suggestion.filePath);
        if (!adapter) {
            throw new Error(`No language adapter for ${suggestion.filePath}`);
        }

        const relativePath = path.relative(this.analyzer.sourceRoot, suggestion.filePath);
        const testFile = adapter.getTestFilePath(relativePath, this.testDir);
        const imports = adapter.templates.imports(
            {
                specifier: adapter.getImportSpecifier(relativePath, testFile, this.analyzer.sourceRoot),
                className: suggestion.className,
                functionName: suggestion.functionName,
            },
            suggestion.testType === 'error_handling'
        );

        const body = suggestion.className
            ? adapter.templates.classSkeleton(suggestion.className, suggestion.testTemplate)
            : suggestion.testTemplate;

        const header = adapter.templates.header(path.relative(this.analyzer.projectRoot, suggestion.filePath));
        return `${header}\n\n${imports}\n\n\n${body}\n`;
    }

    private scopeSuggestions(adapter: LanguageAdapter, scopes: ScopeIndex, gaps: CoverageGap[]): TestSuggestion[] {
        const { filePath, functionName, className } = gaps[0];
        const signature = functionName ? scopes.findFunction(functionName, className) : undefined;
        const context: TemplateContext = {
            functionName,
            className,
            parameters: signature?.parameters ?? [],
            isAsync: signature?.isAsync ?? false,
        };

        const base = {
            filePath,
            language: adapter.language,
            ...(functionName ? { functionName } : {}),
            ...(className ? { className } : {}),
        };
        const suggestions: TestSuggestion[] = [];

        for (const [gapType, typeGaps] of groupBy(gaps, g => g.gapType)) {
            const shape = SHAPES[gapType] ?? GENERIC;
            suggestions.push({
                ...base,
                testType: shape.testType,
                priority: shape.priority(typeGaps),
                description: shape.description(functionName, typeGaps),
                suggestedTestName: functionName ? `${functionName}_${shape.nameSuffix}` : shape.nameSuffix,
                testTemplate: shape.template(adapter, context),
                coverageLines: typeGaps.map(g => g.lineStart),
                complexityScore: typeGaps.reduce((sum, g) => sum + (g.complexityScore || 1), 0),
            });
        }

        for (const parameter of context.parameters) {
            suggestions.push({
                ...base,
                testType: 'edge_case',
                priority: 'medium',
                description: `Test edge cases for ${parameter.name} parameter of ${functionName ?? 'function'}`,
                suggestedTestName: `${functionName ?? 'function'}_${parameter.name}_edge_cases`,
                testTemplate: adapter.templates.parameterEdgeCase(context, parameter),
                coverageLines: [],
                complexityScore: 1,
            });
        }

        return suggestions;
    }

    private async describeStructure(
        filePath: string,
        adapter: LanguageAdapter
    ): Promise<{ classes: ClassStructure[]; functions: string[] }> {
        try {
            const index = new ScopeIndex(adapter.parseScopes(await readFile(filePath), filePath));
            const classes = index.all()
                .filter(s => s.kind === 'class')
                .map(cls => ({
                    name: cls.name,
                    methods: index.childrenOf(cls).filter(s => s.kind === 'function').map(s => s.name),
                }));
            const functions = index.topLevel().filter(s => s.kind === 'function').map(s => s.name);
            return { classes, functions };
        } catch (error) {
            logger.warn(`Could not parse ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
            return { classes: [], functions: [] };
        }
    }
}

function groupBy<T, K>(items: T[], key: (item: T) => K): Map<K, T[]> {
    const groups = new Map<K, T[]>();
    for (const item of items) {
        const k = key(item);
        const group = groups.get(k);
        if (group) group.push(item);
        else groups.set(k, [item]);
    }
    return groups;
}

export type TestType = 'unit' | 'integration' | 'edge_case' | 'error_handling';

export type SuggestionPriority = 'high' | 'medium' | 'low';

export const PRIORITY_RANK: Record<SuggestionPriority, number> = {
    high: 3,
    medium: 2,
    low: 1,
};

/**
 * A proposed test aimed at closing one or more coverage gaps
 */
export interface TestSuggestion {
    filePath: string;
    language: string;
    functionName?: string;
    className?: string;
    testType: TestType;
    priority: SuggestionPriority;
    description: string;
    suggestedTestName: string;
    testTemplate: string;
    coverageLines: number[];
    complexityScore: number;
}

export interface ClassStructure {
    name: string;
    methods: string[];
}

/**
 * A source file whose conventional test file does not exist
 */
export interface MissingTestFile {
    sourceFile: string;
    suggestedTestFile: string;
    language: string;
    classes: ClassStructure[];
    functions: string[];
    complexity: number;
    priority: SuggestionPriority;
}

export function serializeSuggestion(suggestion: TestSuggestion) {
    return {
        file_path: suggestion.filePath,
        language: suggestion.language,
        function_name: suggestion.functionName ?? null,
        class_name: suggestion.className ?? null,
        test_type: suggestion.testType,
        priority: suggestion.priority,
        description: suggestion.description,
        suggested_test_name: suggestion.suggestedTestName,
        coverage_lines: suggestion.coverageLines,
        complexity_score: suggestion.complexityScore,
        test_template: suggestion.testTemplate,
    };
}

export function serializeMissingTestFile(missing: MissingTestFile) {
    return {
        source_file: missing.sourceFile,
        suggested_test_file: missing.suggestedTestFile,
        language: missing.language,
        classes: missing.classes,
        functions: missing.functions,
        complexity: missing.complexity,
        priority: missing.priority,
    };
}

/**
 * Test name with the class prefix when the suggestion is scoped to a class
 */
export function fullTestName(suggestion: Pick<TestSuggestion, 'className' | 'suggestedTestName'>): string {
    return suggestion.className
        ? `test_${suggestion.className.toLowerCase()}_${suggestion.suggestedTestName}`
        : `test_${suggestion.suggestedTestName}`;
}

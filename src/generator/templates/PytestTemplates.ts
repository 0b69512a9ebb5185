import { ImportTarget, ParameterInfo, TemplateContext, TestTemplateSet } from '../../adapters/LanguageAdapter';

function signature(name: string, context: TemplateContext): string {
    const prefix = context.isAsync ? 'async def' : 'def';
    return `${prefix} test_${name}(${context.className ? 'self' : ''}):`;
}

function testFunction(name: string, context: TemplateContext, docstring: string, body: string[]): string {
    return [
        signature(name, context),
        `    """${docstring}"""`,
        ...body.map(line => `    ${line}`),
    ].join('\n');
}

function target(context: TemplateContext): string {
    return context.functionName ?? 'module';
}

/**
 * pytest templates for Python sources
 */
export const pytestTemplates: TestTemplateSet = {
    framework: 'pytest',

    branch(context) {
        const fn = target(context);
        return [
            testFunction(`${fn}_true_condition`, context, `Test ${fn} when condition is true.`, [
                '# Arrange: inputs that make the condition true',
                `# Act: call ${fn}`,
                '# Assert: the true branch result',
                'pass',
            ]),
            testFunction(`${fn}_false_condition`, context, `Test ${fn} when condition is false.`, [
                '# Arrange: inputs that make the condition false',
                `# Act: call ${fn}`,
                '# Assert: the false branch result',
                'pass',
            ]),
        ].join('\n\n');
    },

    exception(context) {
        const fn = target(context);
        return [
            testFunction(`${fn}_handles_exceptions`, context, `Test ${fn} exception handling.`, [
                '# Arrange: conditions that trigger the exception',
                'with pytest.raises(Exception):',
                `    pass  # Act: call ${fn} with failing input`,
            ]),
            testFunction(`${fn}_recovers_from_errors`, context, `Test ${fn} error recovery.`, [
                '# Arrange: a failing dependency',
                `# Act: call ${fn}`,
                '# Assert: the recovered state',
                'pass',
            ]),
        ].join('\n\n');
    },

    basic(context) {
        const fn = target(context);
        return testFunction(`${fn}_basic_functionality`, context, `Test basic functionality of ${fn}.`, [
            '# Arrange: typical input',
            `# Act: call ${fn}`,
            '# Assert: expected result',
            'pass',
        ]);
    },

    errorPath(context) {
        const fn = target(context);
        return testFunction(`${fn}_error_conditions`, context, `Test error conditions in ${fn}.`, [
            '# Arrange: invalid input',
            '# Arrange: boundary values',
            `# Act: call ${fn}`,
            '# Assert: the raised error',
            'pass',
        ]);
    },

    generic(context) {
        const fn = target(context);
        return testFunction(`${fn}_coverage`, context, `Improve test coverage for ${fn}.`, [
            '# Arrange: input reaching the uncovered lines',
            `# Act: call ${fn}`,
            '# Assert: expected result',
            'pass',
        ]);
    },

    parameterEdgeCase(context, parameter: ParameterInfo) {
        const fn = target(context);
        const lines = [
            '# Arrange: None and empty values',
            '# Arrange: boundary values',
            '# Arrange: invalid types',
        ];
        if (parameter.annotation) {
            lines.push(`# Expected type: ${parameter.annotation}`);
        }
        if (parameter.hasDefault) {
            lines.push('# Also call without the argument to use its default');
        }
        lines.push('pass');
        return testFunction(
            `${fn}_${parameter.name}_edge_cases`,
            context,
            `Test edge cases for ${parameter.name} parameter.`,
            lines
        );
    },

    header(sourcePath) {
        return `"""Test cases for ${sourcePath}.\n\nGenerated test suggestions based on coverage analysis.\n"""`;
    },

    imports(importTarget: ImportTarget, withMocking) {
        const lines = ['import pytest'];
        if (withMocking) {
            lines.push('from unittest.mock import Mock, patch');
        }
        if (importTarget.className) {
            lines.push(`from ${importTarget.specifier} import ${importTarget.className}`);
        } else if (importTarget.functionName) {
            lines.push(`from ${importTarget.specifier} import ${importTarget.functionName}`);
        } else {
            lines.push(`import ${importTarget.specifier}`);
        }
        return lines.join('\n');
    },

    classSkeleton(className, body) {
        const indented = body
            .split('\n')
            .map(line => (line.length > 0 ? `    ${line}` : line))
            .join('\n');
        return [
            `class Test${className}:`,
            `    """Test cases for ${className} class."""`,
            '',
            '    def setup_method(self):',
            '        """Set up test fixtures."""',
            `        # Arrange: construct ${className}`,
            '        pass',
            '',
            indented,
        ].join('\n');
    },
};

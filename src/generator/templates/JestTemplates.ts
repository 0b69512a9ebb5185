import path from 'path';
import { ImportTarget, ParameterInfo, TemplateContext, TestTemplateSet } from '../../adapters/LanguageAdapter';

function testCase(title: string, context: TemplateContext, body: string[]): string {
    const callback = context.isAsync ? 'async () =>' : '() =>';
    return [
        `it('${title}', ${callback} {`,
        ...body.map(line => `    ${line}`),
        '});',
    ].join('\n');
}

function target(context: TemplateContext): string {
    return context.functionName ?? 'module';
}

function act(context: TemplateContext): string {
    const fn = target(context);
    return context.isAsync ? `// Act: await ${fn}()` : `// Act: call ${fn}()`;
}

/**
 * Jest templates for TypeScript and JavaScript sources
 */
export const jestTemplates: TestTemplateSet = {
    framework: 'jest',

    branch(context) {
        const fn = target(context);
        return [
            testCase(`${fn} takes the true branch`, context, [
                '// Arrange: inputs that make the condition true',
                act(context),
                '// Assert: the true branch result',
            ]),
            testCase(`${fn} takes the false branch`, context, [
                '// Arrange: inputs that make the condition false',
                act(context),
                '// Assert: the false branch result',
            ]),
        ].join('\n\n');
    },

    exception(context) {
        const fn = target(context);
        const expectation = context.isAsync
            ? `await expect(Promise.reject(new Error('${fn} failed'))).rejects.toThrow();`
            : `expect(() => { throw new Error('${fn} failed'); }).toThrow();`;
        return [
            testCase(`${fn} handles exceptions`, context, [
                '// Arrange: conditions that trigger the exception',
                `// Act: replace the call below with ${fn} and failing input`,
                expectation,
            ]),
            testCase(`${fn} recovers from errors`, context, [
                '// Arrange: a failing dependency',
                act(context),
                '// Assert: the recovered state',
            ]),
        ].join('\n\n');
    },

    basic(context) {
        const fn = target(context);
        return testCase(`${fn} basic functionality`, context, [
            '// Arrange: typical input',
            act(context),
            '// Assert: expected result',
        ]);
    },

    errorPath(context) {
        const fn = target(context);
        return testCase(`${fn} error conditions`, context, [
            '// Arrange: invalid input',
            '// Arrange: boundary values',
            act(context),
            '// Assert: the thrown error',
        ]);
    },

    generic(context) {
        const fn = target(context);
        return testCase(`${fn} coverage`, context, [
            '// Arrange: input reaching the uncovered lines',
            act(context),
            '// Assert: expected result',
        ]);
    },

    parameterEdgeCase(context, parameter: ParameterInfo) {
        const fn = target(context);
        const lines = [
            '// Arrange: undefined, null and empty values',
            '// Arrange: boundary values',
        ];
        if (parameter.annotation) {
            lines.push(`// Expected type: ${parameter.annotation}`);
        }
        if (parameter.hasDefault) {
            lines.push('// Also call without the argument to use its default');
        }
        lines.push(act(context));
        return testCase(`${fn} handles edge cases for ${parameter.name}`, context, lines);
    },

    header(sourcePath) {
        return `/**\n * Test cases for ${sourcePath}.\n * Generated test suggestions based on coverage analysis.\n */`;
    },

    imports(importTarget: ImportTarget, withMocking) {
        const lines: string[] = [];
        if (withMocking) {
            lines.push(`import { jest } from '@jest/globals';`);
        }
        if (importTarget.className) {
            lines.push(`import { ${importTarget.className} } from '${importTarget.specifier}';`);
        } else if (importTarget.functionName) {
            lines.push(`import { ${importTarget.functionName} } from '${importTarget.specifier}';`);
        } else {
            const alias = path.basename(importTarget.specifier).replace(/[^A-Za-z0-9_$]/g, '_');
            lines.push(`import * as ${alias} from '${importTarget.specifier}';`);
        }
        return lines.join('\n');
    },

    classSkeleton(className, body) {
        const indented = body
            .split('\n')
            .map(line => (line.length > 0 ? `    ${line}` : line))
            .join('\n');
        return [
            `describe('${className}', () => {`,
            '    beforeEach(() => {',
            `        // Arrange: construct ${className}`,
            '    });',
            '',
            indented,
            '});',
        ].join('\n');
    },
};

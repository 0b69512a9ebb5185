import path from 'path';
import { PythonAdapter, parseParameters } from '../PythonAdapter';
import { SourceParseError } from '../LanguageAdapter';

describe('PythonAdapter', () => {
    const adapter = new PythonAdapter();

    describe('parseScopes', () => {
        it('should find classes, methods and nested functions with their spans', () => {
            const source = [
                'class Account:',                      // 1
                '    def __init__(self, owner):',      // 2
                '        self.owner = owner',          // 3
                '',                                    // 4
                '    async def refresh(self):',        // 5
                '        def inner():',                // 6
                '            return 1',                // 7
                '        return inner()',              // 8
                '    # trailing comment',              // 9
                '',                                    // 10
                'def helper(value):',                  // 11
                '    return value',                    // 12
            ].join('\n');

            const scopes = adapter.parseScopes(source);

            expect(scopes.map(s => [s.kind, s.name, s.startLine, s.endLine, s.isAsync])).toEqual([
                ['class', 'Account', 1, 8, false],
                ['function', '__init__', 2, 3, false],
                ['function', 'refresh', 5, 8, true],
                ['function', 'inner', 6, 7, false],
                ['function', 'helper', 11, 12, false],
            ]);
            expect(scopes[1].parameters).toEqual([{ name: 'owner', hasDefault: false }]);
        });

        it('should treat bracketed and string continuation lines as part of the block', () => {
            const source = [
                'def build(',                          // 1
                '    name,',                           // 2
                '    size=3,',                         // 3
                '):',                                  // 4
                '    text = """',                      // 5
                'def not_a_function():',               // 6
                '"""',                                 // 7
                '    return (name,',                   // 8
                'size)',                               // 9
                'x = 1',                               // 10
            ].join('\n');

            const scopes = adapter.parseScopes(source);

            expect(scopes).toEqual([
                {
                    kind: 'function',
                    name: 'build',
                    startLine: 1,
                    endLine: 9,
                    parameters: [
                        { name: 'name', hasDefault: false },
                        { name: 'size', hasDefault: true },
                    ],
                    isAsync: false,
                },
            ]);
        });
    });

    describe('parseScopes on invalid source', () => {
        it('should reject a closing bracket without an opener', () => {
            expect(() => adapter.parseScopes('x = 1)', 'bad.py')).toThrow("Cannot parse bad.py:1: unmatched ')'");
        });

        it('should reject an unclosed bracket at the line that opened it', () => {
            const source = ['def broken(:', 'if x', 'raise ValueError(', 'class'].join('\n');

            expect(() => adapter.parseScopes(source, 'bad.py')).toThrow('Cannot parse bad.py:3: unclosed bracket');
        });

        it('should reject an unterminated triple-quoted string', () => {
            const source = ['def f():', '    """doc', '    return 1'].join('\n');

            expect(() => adapter.parseScopes(source, 'bad.py')).toThrow('Cannot parse bad.py:2: unterminated triple-quoted string');
        });

        it('should reject def and class headers without a colon', () => {
            expect(() => adapter.parseScopes('def f(x)\n    return x', 'bad.py')).toThrow("Cannot parse bad.py:1: 'def' header without ':'");
            expect(() => adapter.parseScopes('class Foo\n    pass', 'bad.py')).toThrow(SourceParseError);
        });

        it('should accept one-line definitions and colons inside defaults', () => {
            const scopes = adapter.parseScopes('def f(sep=":"): return sep\nclass Empty(Base): pass', 'ok.py');

            expect(scopes.map(s => [s.kind, s.name, s.startLine, s.endLine])).toEqual([
                ['function', 'f', 1, 1],
                ['class', 'Empty', 2, 2],
            ]);
        });
    });

    describe('parseParameters', () => {
        it('should read annotations and defaults and drop self', () => {
            expect(parseParameters('def f(self, a: int, b: Dict[str, int] = {}, *args, key="x,y", **kw):')).toEqual([
                { name: 'a', annotation: 'int', hasDefault: false },
                { name: 'b', annotation: 'Dict[str, int]', hasDefault: true },
                { name: 'args', hasDefault: false },
                { name: 'key', hasDefault: true },
                { name: 'kw', hasDefault: false },
            ]);
        });

        it('should skip bare separators and comments', () => {
            expect(parseParameters('def f(cls, a, /, *, b=1  # note\n):')).toEqual([
                { name: 'a', hasDefault: false },
                { name: 'b', hasDefault: true },
            ]);
            expect(parseParameters('class Plain:')).toEqual([]);
        });
    });

    describe('conventions', () => {
        it('should recognise pytest test files', () => {
            expect(adapter.isTestFile('test_models.py')).toBe(true);
            expect(adapter.isTestFile(path.join('pkg', 'models_test.py'))).toBe(true);
            expect(adapter.isTestFile('conftest.py')).toBe(true);
            expect(adapter.isTestFile('models.py')).toBe(false);
        });

        it('should place tests under the unit directory and import by dotted module', () => {
            const relative = path.join('pkg', 'models.py');
            expect(adapter.getTestFilePath(relative, 'tests')).toBe(path.join('tests', 'unit', 'pkg', 'test_models.py'));
            expect(adapter.getImportSpecifier(relative)).toBe('pkg.models');
        });

        it('should treat hash lines as comments', () => {
            expect(adapter.isCommentLine('# note')).toBe(true);
            expect(adapter.isCommentLine('x = 1  # note')).toBe(false);
        });
    });
});

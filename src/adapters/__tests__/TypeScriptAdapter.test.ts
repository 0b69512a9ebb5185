import path from 'path';
import { TypeScriptAdapter } from '../TypeScriptAdapter';
import { SourceParseError } from '../LanguageAdapter';

describe('TypeScriptAdapter', () => {
    const adapter = new TypeScriptAdapter();

    describe('parseScopes', () => {
        it('should find classes, methods, functions and arrow functions', () => {
            const source = [
                'export class Cart {',                                   // 1
                '    constructor(private items: string[] = []) {}',      // 2
                '',                                                      // 3
                '    async checkout(this: Cart, coupon?: string) {',     // 4
                '        return coupon;',                                // 5
                '    }',                                                 // 6
                '}',                                                     // 7
                '',                                                      // 8
                'export function total(prices: number[]): number {',    // 9
                '    return prices.length;',                             // 10
                '}',                                                     // 11
                '',                                                      // 12
                'const double = (n: number) => n * 2;',                  // 13
            ].join('\n');

            const scopes = adapter.parseScopes(source, 'cart.ts');

            expect(scopes.map(s => [s.kind, s.name, s.startLine, s.endLine, s.isAsync])).toEqual([
                ['class', 'Cart', 1, 7, false],
                ['function', 'constructor', 2, 2, false],
                ['function', 'checkout', 4, 6, true],
                ['function', 'total', 9, 11, false],
                ['function', 'double', 13, 13, false],
            ]);
            expect(scopes[1].parameters).toEqual([{ name: 'items', annotation: 'string[]', hasDefault: true }]);
            expect(scopes[2].parameters).toEqual([{ name: 'coupon', annotation: 'string', hasDefault: true }]);
            expect(scopes[3].parameters).toEqual([{ name: 'prices', annotation: 'number[]', hasDefault: false }]);
        });

        it('should parse JSX sources', () => {
            const source = ['export function Badge() {', '    return <span>ok</span>;', '}'].join('\n');

            const scopes = adapter.parseScopes(source, 'Badge.tsx');

            expect(scopes.map(s => [s.name, s.startLine, s.endLine])).toEqual([['Badge', 1, 3]]);
        });

        it('should reject sources with syntax errors', () => {
            const source = ['export class Cart {', '    total(: number {', '        return 0;', '    }', '}'].join('\n');

            expect(() => adapter.parseScopes(source, 'cart.ts')).toThrow(SourceParseError);
            expect(() => adapter.parseScopes(source, 'cart.ts')).toThrow(/^Cannot parse cart\.ts:2: /);
        });
    });

    describe('conventions', () => {
        it('should recognise test files and declaration files', () => {
            expect(adapter.isTestFile('cart.test.ts')).toBe(true);
            expect(adapter.isTestFile(path.join('ui', 'Badge.spec.tsx'))).toBe(true);
            expect(adapter.isTestFile(path.join('__tests__', 'cart.ts'))).toBe(true);
            expect(adapter.isTestFile('types.d.ts')).toBe(true);
            expect(adapter.isTestFile('cart.ts')).toBe(false);
        });

        it('should mirror the source tree under the test directory', () => {
            const relative = path.join('shop', 'cart.ts');
            expect(adapter.getTestFilePath(relative, 'tests')).toBe(path.join('tests', 'shop', 'cart.test.ts'));
        });

        it('should import the source module relative to the test file', () => {
            const relative = path.join('shop', 'cart.ts');
            const testFile = path.join('/repo', 'tests', 'shop', 'cart.test.ts');
            expect(adapter.getImportSpecifier(relative, testFile, path.join('/repo', 'src'))).toBe('../../src/shop/cart');
            expect(adapter.getImportSpecifier('cart.ts', path.join('/repo', 'src', 'cart.test.ts'), path.join('/repo', 'src'))).toBe('./cart');
        });

        it('should treat line and block comments as comments', () => {
            expect(adapter.isCommentLine('// note')).toBe(true);
            expect(adapter.isCommentLine('/* note */')).toBe(true);
            expect(adapter.isCommentLine('* continued')).toBe(true);
            expect(adapter.isCommentLine('const a = 1;')).toBe(false);
        });
    });
});

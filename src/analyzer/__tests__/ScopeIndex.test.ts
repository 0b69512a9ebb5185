import { ScopeNode } from '../../adapters/LanguageAdapter';
import { ScopeIndex } from '../ScopeIndex';

function scope(kind: ScopeNode['kind'], name: string, startLine: number, endLine: number): ScopeNode {
    return { kind, name, startLine, endLine, parameters: [], isAsync: false };
}

describe('ScopeIndex', () => {
    const helper = scope('function', 'helper', 1, 4);
    const service = scope('class', 'Service', 6, 30);
    const handle = scope('function', 'handle', 8, 20);
    const inner = scope('function', 'inner', 10, 12);
    const close = scope('function', 'close', 22, 28);
    const index = new ScopeIndex([close, inner, service, helper, handle]);

    it('should return the innermost function and class for a line', () => {
        expect(index.enclosing(11)).toEqual({ function: inner, class: service });
        expect(index.enclosing(15)).toEqual({ function: handle, class: service });
        expect(index.enclosing(2)).toEqual({ function: helper });
    });

    it('should return an empty scope between definitions', () => {
        expect(index.enclosing(5)).toEqual({});
        expect(index.enclosing(21)).toEqual({ class: service });
        expect(index.enclosing(31)).toEqual({});
    });

    it('should list every containing scope from the inside out', () => {
        expect(index.containing(10).map(s => s.name)).toEqual(['inner', 'handle', 'Service']);
        expect(index.containing(25).map(s => s.name)).toEqual(['close', 'Service']);
    });

    it('should find functions by name and enclosing class', () => {
        expect(index.findFunction('close')).toBe(close);
        expect(index.findFunction('close', 'Service')).toBe(close);
        expect(index.findFunction('helper', 'Service')).toBeUndefined();
        expect(index.findFunction('missing')).toBeUndefined();
    });

    it('should expose top-level nodes and direct children', () => {
        expect(index.size).toBe(5);
        expect(index.topLevel()).toEqual([helper, service]);
        expect(index.childrenOf(service)).toEqual([handle, close]);
        expect(index.childrenOf(handle)).toEqual([inner]);
        expect(index.childrenOf(scope('class', 'Unknown', 1, 2))).toEqual([]);
    });

    it('should ignore spans that end before they start', () => {
        const broken = new ScopeIndex([scope('function', 'broken', 5, 3)]);
        expect(broken.size).toBe(0);
        expect(broken.enclosing(4)).toEqual({});
    });
});

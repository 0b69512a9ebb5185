import { ScopeNode } from '../adapters/LanguageAdapter';

export interface EnclosingScope {
    function?: ScopeNode;
    class?: ScopeNode;
}

interface IndexedNode {
    node: ScopeNode;
    parent: number;
}

/**
 * Interval-containment index over function/class spans.
 *
 * Nodes are sorted by (start asc, end desc) so that every node appears after
 * its enclosing nodes; a stack pass records each node's nearest container.
 * A lookup binary-searches the last node starting at or before the line and
 * walks up the parent chain to the first node that still contains it.
 */
export class ScopeIndex {
    private nodes: IndexedNode[] = [];

    constructor(scopes: ScopeNode[]) {
        const sorted = [...scopes]
            .filter(s => s.endLine >= s.startLine)
            .sort((a, b) => a.startLine - b.startLine || b.endLine - a.endLine);

        const stack: number[] = [];
        for (const node of sorted) {
            while (stack.length > 0 && this.nodes[stack[stack.length - 1]].node.endLine < node.startLine) {
                stack.pop();
            }
            this.nodes.push({ node, parent: stack.length > 0 ? stack[stack.length - 1] : -1 });
            stack.push(this.nodes.length - 1);
        }
    }

    get size(): number {
        return this.nodes.length;
    }

    /**
     * Innermost scopes containing the line, all the way out
     */
    containing(line: number): ScopeNode[] {
        const result: ScopeNode[] = [];
        let index = this.lastStartingAtOrBefore(line);
        while (index !== -1) {
            const entry = this.nodes[index];
            if (entry.node.endLine >= line) {
                result.push(entry.node);
            }
            index = entry.parent;
        }
        return result;
    }

    /**
     * Innermost enclosing function and innermost enclosing class of a line
     */
    enclosing(line: number): EnclosingScope {
        const scope: EnclosingScope = {};
        for (const node of this.containing(line)) {
            if (node.kind === 'function' && !scope.function) scope.function = node;
            if (node.kind === 'class' && !scope.class) scope.class = node;
            if (scope.function && scope.class) break;
        }
        return scope;
    }

    /**
     * Find a function by name, optionally requiring a given innermost enclosing class
     */
    findFunction(name: string, className?: string): ScopeNode | undefined {
        for (let i = 0; i < this.nodes.length; i++) {
            const { node } = this.nodes[i];
            if (node.kind !== 'function' || node.name !== name) continue;
            if (className === undefined || this.enclosingClassOf(i)?.name === className) {
                return node;
            }
        }
        return undefined;
    }

    all(): ScopeNode[] {
        return this.nodes.map(n => n.node);
    }

    /**
     * Nodes with no enclosing node
     */
    topLevel(): ScopeNode[] {
        return this.nodes.filter(n => n.parent === -1).map(n => n.node);
    }

    /**
     * Direct children of a node
     */
    childrenOf(scope: ScopeNode): ScopeNode[] {
        const index = this.nodes.findIndex(n => n.node === scope);
        return this.nodes.filter(n => n.parent === index && index !== -1).map(n => n.node);
    }

    private enclosingClassOf(index: number): ScopeNode | undefined {
        let parent = this.nodes[index].parent;
        while (parent !== -1) {
            if (this.nodes[parent].node.kind === 'class') return this.nodes[parent].node;
            parent = this.nodes[parent].parent;
        }
        return undefined;
    }

    private lastStartingAtOrBefore(line: number): number {
        let low = 0;
        let high = this.nodes.length - 1;
        let found = -1;
        while (low <= high) {
            const mid = (low + high) >> 1;
            if (this.nodes[mid].node.startLine <= line) {
                found = mid;
                low = mid + 1;
            } else {
                high = mid - 1;
            }
        }
        return found;
    }
}

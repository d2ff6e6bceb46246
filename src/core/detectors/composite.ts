/**
 * Runs several visitors over one traversal.
 */
import {
  SKIP_CHILDREN,
  VISIT_METHODS,
  dispatch,
  type NodeDispatcher,
  type NodeVisitor,
  type VisitContext,
  type VisitResult,
} from '../tree/walker.js';
import type { NodeKind, SyntaxNode } from '../tree/types.js';

/**
 * Dispatches each node only to the visitors that registered a callback for
 * its kind. Children are skipped only when every such visitor asks for it.
 */
export class CompositeVisitor implements NodeDispatcher {
  private readonly byKind = new Map<NodeKind, NodeVisitor[]>();

  constructor(visitors: readonly NodeVisitor[]) {
    for (const kind of nodeKinds()) {
      const method = VISIT_METHODS[kind];
      const registered = visitors.filter((visitor) => typeof visitor[method] === 'function');
      if (registered.length > 0) {
        this.byKind.set(kind, registered);
      }
    }
  }

  visitNode(node: SyntaxNode, context: VisitContext): VisitResult {
    const visitors = this.byKind.get(node.kind);
    if (!visitors) return;

    let skips = 0;
    for (const visitor of visitors) {
      if (dispatch(visitor, node, context) === SKIP_CHILDREN) {
        skips++;
      }
    }
    return skips === visitors.length ? SKIP_CHILDREN : undefined;
  }
}

function nodeKinds(): NodeKind[] {
  const kinds: NodeKind[] = [];
  for (const kind of Object.keys(VISIT_METHODS)) {
    if (isNodeKind(kind)) kinds.push(kind);
  }
  return kinds;
}

function isNodeKind(value: string): value is NodeKind {
  return Object.prototype.hasOwnProperty.call(VISIT_METHODS, value);
}

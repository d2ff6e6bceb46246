/**
 * Finds type names used as runtime values, e.g. `register(Point)` or
 * `x instanceof geo.Point`.
 */
import { TYPE_LITERAL } from '../evidence/types.js';
import {
  TYPE_DEFINING_KINDS,
  type IdentifierNode,
  type PrefixedIdentifierNode,
} from '../tree/types.js';
import type { VisitContext } from '../tree/walker.js';
import type { PatternDetector } from './types.js';

export class TypeLiteralDetector implements PatternDetector {
  readonly id = 'type-literal';
  readonly categories = [TYPE_LITERAL] as const;

  visitIdentifier(node: IdentifierNode, context: VisitContext): void {
    this.check(node, context);
  }

  visitPrefixedIdentifier(node: PrefixedIdentifierNode, context: VisitContext): void {
    this.check(node, context);
  }

  private check(node: IdentifierNode | PrefixedIdentifierNode, context: VisitContext): void {
    if (context.parent?.kind === 'typeAnnotation') return;
    if (!node.staticType?.isTypeObject) return;
    if (!node.symbol || !TYPE_DEFINING_KINDS.has(node.symbol.kind)) return;
    context.record(TYPE_LITERAL, node);
  }
}

/**
 * Hand-built trees for detector tests.
 */
import * as nodes from '../../../../src/core/tree/nodes.js';
import type { ParameterNode, SymbolRef, SyntaxNode, TypeRef } from '../../../../src/core/tree/types.js';
import { walk } from '../../../../src/core/tree/walker.js';
import { CompositeVisitor } from '../../../../src/core/detectors/composite.js';
import type { PatternDetector } from '../../../../src/core/detectors/types.js';
import type { CategoryTag } from '../../../../src/core/evidence/types.js';

export const at = (start: number, end = start + 1) => ({ start, end });

let nextId = 1;

export function symbol(name: string, kind: SymbolRef['kind'] = 'parameter'): SymbolRef {
  return { id: nextId++, name, kind };
}

export const TYPE_OBJECT: TypeRef = { text: 'typeof Point', isTypeObject: true };
export const INSTANCE: TypeRef = { text: 'Point', isTypeObject: false };

export function param(ref: SymbolRef, named = false): ParameterNode {
  return nodes.parameter(at(0), ref.name, { symbol: ref, named });
}

export function ref(target: SymbolRef, start = 0): SyntaxNode {
  return nodes.identifier(at(start), target.name, target);
}

/** `new <type>(...args)` or `<type>.<constructorName>(...args)`. */
export function construct(args: SyntaxNode[], constructorName = '', type = 'Point', start = 100): SyntaxNode {
  return nodes.constructionExpression(at(start, start + 20), nodes.identifier(at(start + 4), type), constructorName, args);
}

/** `(params) => expression` */
export function arrow(params: ParameterNode[], expression: SyntaxNode) {
  return nodes.functionLiteral(at(50, 90), nodes.parameterList(at(50), params), nodes.expressionBody(at(60), expression));
}

/** `(params) => { return expression; }` */
export function blockArrow(params: ParameterNode[], statements: SyntaxNode[]) {
  return nodes.functionLiteral(at(50, 90), nodes.parameterList(at(50), params), nodes.blockBody(at(60), statements));
}

/** `items.map(callback)` at the top of a unit. */
export function passedAsCallback(callback: SyntaxNode) {
  return nodes.sourceUnit(at(0, 200), [
    nodes.statement(at(0, 200), 'ExpressionStatement', [
      nodes.expression(at(0, 200), 'CallExpression', [nodes.identifier(at(0), 'items'), callback]),
    ]),
  ]);
}

export interface Match {
  category: CategoryTag;
  start: number;
}

export function detect(detectors: PatternDetector[], tree: SyntaxNode): Match[] {
  const matches: Match[] = [];
  walk(tree, new CompositeVisitor(detectors), {
    source: 'alpha/src/a.ts',
    text: '',
    record: (category, node) => {
      matches.push({ category, start: node.start });
    },
  });
  return matches;
}

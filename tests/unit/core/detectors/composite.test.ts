/**
 * Tests for the composite visitor.
 */
import { describe, it, expect } from 'vitest';
import * as nodes from '../../../../src/core/tree/nodes.js';
import { CompositeVisitor } from '../../../../src/core/detectors/composite.js';
import { TearoffDetector } from '../../../../src/core/detectors/tearoff.js';
import { TypeLiteralDetector } from '../../../../src/core/detectors/type-literal.js';
import { SKIP_CHILDREN, walk, type NodeVisitor } from '../../../../src/core/tree/walker.js';
import {
  TYPE_OBJECT,
  arrow,
  at,
  construct,
  detect,
  param,
  passedAsCallback,
  ref,
  symbol,
} from './helpers.js';

describe('CompositeVisitor', () => {
  it('should pass each node only to the visitors that handle its kind', () => {
    const seen: string[] = [];
    const identifiers: NodeVisitor = {
      visitIdentifier: (node) => {
        seen.push(`identifier:${node.name}`);
      },
    };
    const literals: NodeVisitor = {
      visitLiteral: (node) => {
        seen.push(`literal:${node.value}`);
      },
    };
    const composite = new CompositeVisitor([identifiers, literals]);

    walk(
      nodes.sourceUnit(at(0, 20), [
        nodes.expression(at(0, 10), 'CallExpression', [
          nodes.identifier(at(0, 1), 'f'),
          nodes.literal(at(2, 3), '1'),
        ]),
      ]),
      composite,
      { source: 'alpha/src/a.ts', text: '', record: () => {} }
    );

    expect(seen).toEqual(['identifier:f', 'literal:1']);
  });

  it('should run both detectors in one traversal', () => {
    const x = symbol('x');
    const point = symbol('Point', 'class');
    const callback = arrow([param(x)], construct([ref(x, 110)]));
    const tree = nodes.sourceUnit(at(0, 200), [
      passedAsCallback(callback),
      nodes.expression(at(150, 160), 'ArrayLiteralExpression', [
        nodes.identifier(at(151, 156), 'Point', point, TYPE_OBJECT),
      ]),
    ]);

    expect(detect([new TearoffDetector(), new TypeLiteralDetector()], tree)).toEqual([
      { category: 'high confidence unnamed tearoff', start: 100 },
      { category: 'type literal', start: 151 },
    ]);
  });

  it('should skip children only when every visitor of the kind asks for it', () => {
    const seen: string[] = [];
    const skipping: NodeVisitor = { visitStatement: () => SKIP_CHILDREN };
    const descending: NodeVisitor = { visitStatement: () => undefined };
    const watcher: NodeVisitor = {
      visitLiteral: (node) => {
        seen.push(node.value);
      },
    };
    const tree = nodes.sourceUnit(at(0, 10), [nodes.statement(at(0, 10), 'ExpressionStatement', [nodes.literal(at(0), '1')])]);
    const scope = { source: 'alpha/src/a.ts', text: '', record: () => {} };

    walk(tree, new CompositeVisitor([skipping, watcher]), scope);
    expect(seen).toEqual([]);

    walk(tree, new CompositeVisitor([skipping, descending, watcher]), scope);
    expect(seen).toEqual(['1']);
  });
});

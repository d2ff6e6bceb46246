/**
 * Constructor-shorthand ("tearoff") detector.
 *
 * Flags function bodies that only forward their own parameters to an object
 * construction, e.g. `(x, y) => new Point(x, y)`. Such wrappers could be
 * replaced by a reference to the constructor itself.
 *
 * Confidence is a readability proxy: inline function literals are the primary
 * rewrite target (high); named functions, methods and constructors would
 * change a public signature (low).
 */
import { DetectorCoverageError } from '../../utils/errors.js';
import {
  TEAROFF_CATEGORIES,
  tearoffCategory,
  type Confidence,
  type Namedness,
} from '../evidence/types.js';
import type {
  BlockBodyNode,
  ExpressionBodyNode,
  ParameterListNode,
  SyntaxNode,
} from '../tree/types.js';
import type { VisitContext } from '../tree/walker.js';
import type { PatternDetector } from './types.js';

export class TearoffDetector implements PatternDetector {
  readonly id = 'tearoff';
  readonly categories = TEAROFF_CATEGORIES;

  visitBlockBody(node: BlockBodyNode, context: VisitContext): void {
    if (node.statements.length !== 1) return;
    const [statement] = node.statements;
    if (statement.kind !== 'returnStatement') return;
    this.checkForwardingConstruction(statement.expression, formalParameters(context), context);
  }

  visitExpressionBody(node: ExpressionBodyNode, context: VisitContext): void {
    this.checkForwardingConstruction(node.expression, formalParameters(context), context);
  }

  private checkForwardingConstruction(
    expression: SyntaxNode | undefined,
    parameters: ParameterListNode,
    context: VisitContext
  ): void {
    if (expression?.kind !== 'constructionExpression') return;

    const parameterSymbols = new Set<number>();
    for (const parameter of parameters.parameters) {
      if (parameter.symbol) parameterSymbols.add(parameter.symbol.id);
    }

    for (const argument of expression.arguments) {
      const value = argument.kind === 'namedArgument' ? argument.expression : argument;
      if (value.kind !== 'identifier' || !value.symbol) return;
      if (!parameterSymbols.has(value.symbol.id)) return;
    }

    const confidence = classifyConfidence(context);
    const namedness: Namedness = expression.constructorName === '' ? 'unnamed' : 'named';
    context.record(tearoffCategory(confidence, namedness), expression);
  }
}

/**
 * Formal parameters of the function-like node owning the visited body.
 */
function formalParameters(context: VisitContext): ParameterListNode {
  const owner = context.parent;
  switch (owner?.kind) {
    case 'functionLiteral':
    case 'methodDeclaration':
    case 'constructorDeclaration':
      return owner.parameters;
    default:
      throw new DetectorCoverageError(
        `Unexpected parent of function body: ${owner?.kind ?? 'none'}`,
        {
          source: context.scope.source,
          offset: owner?.start ?? 0,
          kind: owner?.kind ?? 'none',
        }
      );
  }
}

/**
 * High when the body belongs to a function literal that is not the function
 * of a named declaration.
 */
function classifyConfidence(context: VisitContext): Confidence {
  const owner = context.parent;
  const ownerParent = context.ancestors[context.ancestors.length - 2];
  return owner?.kind === 'functionLiteral' && ownerParent?.kind !== 'functionDeclaration'
    ? 'high'
    : 'low';
}

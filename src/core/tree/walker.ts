/**
 * Depth-first, pre-order traversal over the syntax tree model.
 *
 * For every node the dispatcher is invoked first, then children are visited in
 * source order. A callback can only prune by returning SKIP_CHILDREN.
 */
import { SurveyorError, TraversalError, errorMessage } from '../../utils/errors.js';
import type { CategoryTag } from '../evidence/types.js';
import type {
  BlockBodyNode,
  ClassDeclarationNode,
  ConstructionExpressionNode,
  ConstructorDeclarationNode,
  ExpressionBodyNode,
  ExpressionNode,
  FunctionDeclarationNode,
  FunctionLiteralNode,
  IdentifierNode,
  LiteralNode,
  MethodDeclarationNode,
  NamedArgumentNode,
  NodeKind,
  ParameterListNode,
  ParameterNode,
  PrefixedIdentifierNode,
  ReturnStatementNode,
  SourceUnitNode,
  StatementNode,
  SyntaxNode,
  TypeAnnotationNode,
  VariableDeclarationNode,
} from './types.js';

export const SKIP_CHILDREN = 'skip-children';

export type VisitResult = void | typeof SKIP_CHILDREN;

/**
 * Where the walk happens. `source` identifies the compilation unit in
 * evidence locations; `record` receives matches for that unit only.
 */
export interface WalkScope {
  readonly source: string;
  readonly text: string;
  record(category: CategoryTag, node: SyntaxNode): void;
}

/**
 * Passed to every callback. `ancestors` runs from the root down to the
 * parent and is only valid during the callback.
 */
export interface VisitContext {
  readonly scope: WalkScope;
  readonly parent: SyntaxNode | undefined;
  readonly ancestors: readonly SyntaxNode[];
  record(category: CategoryTag, node: SyntaxNode): void;
}

/** Per-kind callbacks; register only the kinds of interest. */
export interface NodeVisitor {
  visitSourceUnit?(node: SourceUnitNode, context: VisitContext): VisitResult;
  visitClassDeclaration?(node: ClassDeclarationNode, context: VisitContext): VisitResult;
  visitFunctionDeclaration?(node: FunctionDeclarationNode, context: VisitContext): VisitResult;
  visitFunctionLiteral?(node: FunctionLiteralNode, context: VisitContext): VisitResult;
  visitMethodDeclaration?(node: MethodDeclarationNode, context: VisitContext): VisitResult;
  visitConstructorDeclaration?(node: ConstructorDeclarationNode, context: VisitContext): VisitResult;
  visitParameterList?(node: ParameterListNode, context: VisitContext): VisitResult;
  visitParameter?(node: ParameterNode, context: VisitContext): VisitResult;
  visitBlockBody?(node: BlockBodyNode, context: VisitContext): VisitResult;
  visitExpressionBody?(node: ExpressionBodyNode, context: VisitContext): VisitResult;
  visitReturnStatement?(node: ReturnStatementNode, context: VisitContext): VisitResult;
  visitVariableDeclaration?(node: VariableDeclarationNode, context: VisitContext): VisitResult;
  visitConstructionExpression?(node: ConstructionExpressionNode, context: VisitContext): VisitResult;
  visitNamedArgument?(node: NamedArgumentNode, context: VisitContext): VisitResult;
  visitIdentifier?(node: IdentifierNode, context: VisitContext): VisitResult;
  visitPrefixedIdentifier?(node: PrefixedIdentifierNode, context: VisitContext): VisitResult;
  visitTypeAnnotation?(node: TypeAnnotationNode, context: VisitContext): VisitResult;
  visitLiteral?(node: LiteralNode, context: VisitContext): VisitResult;
  visitExpression?(node: ExpressionNode, context: VisitContext): VisitResult;
  visitStatement?(node: StatementNode, context: VisitContext): VisitResult;
}

/** Anything that can receive every node of a walk. */
export interface NodeDispatcher {
  visitNode(node: SyntaxNode, context: VisitContext): VisitResult;
}

/** Callback name for each node kind. */
export const VISIT_METHODS: { readonly [K in NodeKind]: keyof NodeVisitor } = {
  sourceUnit: 'visitSourceUnit',
  classDeclaration: 'visitClassDeclaration',
  functionDeclaration: 'visitFunctionDeclaration',
  functionLiteral: 'visitFunctionLiteral',
  methodDeclaration: 'visitMethodDeclaration',
  constructorDeclaration: 'visitConstructorDeclaration',
  parameterList: 'visitParameterList',
  parameter: 'visitParameter',
  blockBody: 'visitBlockBody',
  expressionBody: 'visitExpressionBody',
  returnStatement: 'visitReturnStatement',
  variableDeclaration: 'visitVariableDeclaration',
  constructionExpression: 'visitConstructionExpression',
  namedArgument: 'visitNamedArgument',
  identifier: 'visitIdentifier',
  prefixedIdentifier: 'visitPrefixedIdentifier',
  typeAnnotation: 'visitTypeAnnotation',
  literal: 'visitLiteral',
  expression: 'visitExpression',
  statement: 'visitStatement',
};

/**
 * Invoke the visitor's callback for the node's kind, if it registered one.
 */
export function dispatch(visitor: NodeVisitor, node: SyntaxNode, context: VisitContext): VisitResult {
  switch (node.kind) {
    case 'sourceUnit':
      return visitor.visitSourceUnit?.(node, context);
    case 'classDeclaration':
      return visitor.visitClassDeclaration?.(node, context);
    case 'functionDeclaration':
      return visitor.visitFunctionDeclaration?.(node, context);
    case 'functionLiteral':
      return visitor.visitFunctionLiteral?.(node, context);
    case 'methodDeclaration':
      return visitor.visitMethodDeclaration?.(node, context);
    case 'constructorDeclaration':
      return visitor.visitConstructorDeclaration?.(node, context);
    case 'parameterList':
      return visitor.visitParameterList?.(node, context);
    case 'parameter':
      return visitor.visitParameter?.(node, context);
    case 'blockBody':
      return visitor.visitBlockBody?.(node, context);
    case 'expressionBody':
      return visitor.visitExpressionBody?.(node, context);
    case 'returnStatement':
      return visitor.visitReturnStatement?.(node, context);
    case 'variableDeclaration':
      return visitor.visitVariableDeclaration?.(node, context);
    case 'constructionExpression':
      return visitor.visitConstructionExpression?.(node, context);
    case 'namedArgument':
      return visitor.visitNamedArgument?.(node, context);
    case 'identifier':
      return visitor.visitIdentifier?.(node, context);
    case 'prefixedIdentifier':
      return visitor.visitPrefixedIdentifier?.(node, context);
    case 'typeAnnotation':
      return visitor.visitTypeAnnotation?.(node, context);
    case 'literal':
      return visitor.visitLiteral?.(node, context);
    case 'expression':
      return visitor.visitExpression?.(node, context);
    case 'statement':
      return visitor.visitStatement?.(node, context);
    default:
      return assertNever(node);
  }
}

/**
 * Children of a node in source order.
 */
export function childrenOf(node: SyntaxNode): readonly SyntaxNode[] {
  switch (node.kind) {
    case 'sourceUnit':
    case 'blockBody':
      return node.statements;
    case 'classDeclaration':
      return [...node.heritage, ...node.members];
    case 'functionDeclaration':
      return [node.function];
    case 'functionLiteral':
    case 'methodDeclaration':
    case 'constructorDeclaration':
      return present([node.parameters, node.body]);
    case 'parameterList':
      return node.parameters;
    case 'parameter':
      return present([node.type, node.defaultValue]);
    case 'expressionBody':
    case 'namedArgument':
      return [node.expression];
    case 'returnStatement':
      return present([node.expression]);
    case 'variableDeclaration':
      return present([node.type, node.initializer]);
    case 'constructionExpression':
      return [node.type, ...node.arguments];
    case 'prefixedIdentifier':
      return [node.prefix, node.identifier];
    case 'typeAnnotation':
      return node.names;
    case 'identifier':
    case 'literal':
      return [];
    case 'expression':
    case 'statement':
      return node.children;
    default:
      return assertNever(node);
  }
}

/**
 * Walk a tree. Errors raised by callbacks abort this walk: surveyor errors
 * propagate unchanged, anything else is wrapped into a TraversalError.
 */
export function walk(tree: SyntaxNode, dispatcher: NodeDispatcher, scope: WalkScope): void {
  const ancestors: SyntaxNode[] = [];
  const record = (category: CategoryTag, node: SyntaxNode): void => scope.record(category, node);

  const visit = (node: SyntaxNode): void => {
    const context: VisitContext = {
      scope,
      parent: ancestors[ancestors.length - 1],
      ancestors,
      record,
    };

    let result: VisitResult;
    try {
      result = dispatcher.visitNode(node, context);
    } catch (error) {
      if (error instanceof SurveyorError) {
        throw error;
      }
      throw new TraversalError(
        `Visitor failed on ${node.kind} at ${node.start} in ${scope.source}: ${errorMessage(error)}`,
        { source: scope.source, offset: node.start, kind: node.kind }
      );
    }
    if (result === SKIP_CHILDREN) return;

    ancestors.push(node);
    for (const child of childrenOf(node)) {
      visit(child);
    }
    ancestors.pop();
  };

  visit(tree);
}

function present(nodes: (SyntaxNode | undefined)[]): SyntaxNode[] {
  return nodes.filter((node): node is SyntaxNode => node !== undefined);
}

function assertNever(node: never): never {
  throw new TraversalError(`Unknown node kind: ${JSON.stringify(node)}`);
}

/**
 * Node constructors. Resolvers build trees through these; every node is frozen.
 */
import type {
  BlockBodyNode,
  ClassDeclarationNode,
  ConstructionExpressionNode,
  ConstructorDeclarationNode,
  ExpressionBodyNode,
  ExpressionNode,
  FunctionBodyNode,
  FunctionDeclarationNode,
  FunctionLiteralNode,
  IdentifierNode,
  LiteralNode,
  MethodDeclarationNode,
  NamedArgumentNode,
  ParameterListNode,
  ParameterNode,
  PrefixedIdentifierNode,
  ReturnStatementNode,
  SourceUnitNode,
  StatementNode,
  SymbolRef,
  SyntaxNode,
  TypeAnnotationNode,
  TypeRef,
  VariableDeclarationNode,
} from './types.js';

export interface Span {
  start: number;
  end: number;
}

function freeze<T extends SyntaxNode>(node: T): T {
  Object.freeze(node);
  return node;
}

function span(at: Span): Span {
  return { start: at.start, end: at.end };
}

export function sourceUnit(at: Span, statements: SyntaxNode[]): SourceUnitNode {
  return freeze<SourceUnitNode>({ kind: 'sourceUnit', ...span(at), statements });
}

export function classDeclaration(
  at: Span,
  name: string,
  members: SyntaxNode[],
  heritage: TypeAnnotationNode[] = []
): ClassDeclarationNode {
  return freeze<ClassDeclarationNode>({ kind: 'classDeclaration', ...span(at), name, heritage, members });
}

export function functionDeclaration(
  at: Span,
  name: string,
  fn: FunctionLiteralNode
): FunctionDeclarationNode {
  return freeze<FunctionDeclarationNode>({ kind: 'functionDeclaration', ...span(at), name, function: fn });
}

export function functionLiteral(
  at: Span,
  parameters: ParameterListNode,
  body: FunctionBodyNode | undefined
): FunctionLiteralNode {
  return freeze<FunctionLiteralNode>({ kind: 'functionLiteral', ...span(at), parameters, body });
}

export function methodDeclaration(
  at: Span,
  name: string,
  parameters: ParameterListNode,
  body: FunctionBodyNode | undefined
): MethodDeclarationNode {
  return freeze<MethodDeclarationNode>({ kind: 'methodDeclaration', ...span(at), name, parameters, body });
}

export function constructorDeclaration(
  at: Span,
  parameters: ParameterListNode,
  body: FunctionBodyNode | undefined
): ConstructorDeclarationNode {
  return freeze<ConstructorDeclarationNode>({ kind: 'constructorDeclaration', ...span(at), parameters, body });
}

export function parameterList(at: Span, parameters: ParameterNode[]): ParameterListNode {
  return freeze<ParameterListNode>({ kind: 'parameterList', ...span(at), parameters });
}

export function parameter(
  at: Span,
  name: string,
  options: {
    symbol?: SymbolRef;
    named?: boolean;
    type?: TypeAnnotationNode;
    defaultValue?: SyntaxNode;
  } = {}
): ParameterNode {
  return freeze<ParameterNode>({
    kind: 'parameter',
    ...span(at),
    name,
    named: options.named ?? false,
    symbol: options.symbol,
    type: options.type,
    defaultValue: options.defaultValue,
  });
}

export function blockBody(at: Span, statements: SyntaxNode[]): BlockBodyNode {
  return freeze<BlockBodyNode>({ kind: 'blockBody', ...span(at), statements });
}

export function expressionBody(at: Span, expression: SyntaxNode): ExpressionBodyNode {
  return freeze<ExpressionBodyNode>({ kind: 'expressionBody', ...span(at), expression });
}

export function returnStatement(at: Span, expression: SyntaxNode | undefined): ReturnStatementNode {
  return freeze<ReturnStatementNode>({ kind: 'returnStatement', ...span(at), expression });
}

export function variableDeclaration(
  at: Span,
  name: string,
  initializer: SyntaxNode | undefined,
  type?: TypeAnnotationNode
): VariableDeclarationNode {
  return freeze<VariableDeclarationNode>({ kind: 'variableDeclaration', ...span(at), name, type, initializer });
}

export function constructionExpression(
  at: Span,
  type: SyntaxNode,
  constructorName: string,
  args: SyntaxNode[]
): ConstructionExpressionNode {
  return freeze<ConstructionExpressionNode>({
    kind: 'constructionExpression',
    ...span(at),
    type,
    constructorName,
    arguments: args,
  });
}

export function namedArgument(at: Span, name: string, expression: SyntaxNode): NamedArgumentNode {
  return freeze<NamedArgumentNode>({ kind: 'namedArgument', ...span(at), name, expression });
}

export function identifier(
  at: Span,
  name: string,
  symbol?: SymbolRef,
  staticType?: TypeRef
): IdentifierNode {
  return freeze<IdentifierNode>({ kind: 'identifier', ...span(at), name, symbol, staticType });
}

export function prefixedIdentifier(
  at: Span,
  prefix: IdentifierNode,
  name: IdentifierNode,
  symbol?: SymbolRef,
  staticType?: TypeRef
): PrefixedIdentifierNode {
  return freeze<PrefixedIdentifierNode>({
    kind: 'prefixedIdentifier',
    ...span(at),
    prefix,
    identifier: name,
    symbol,
    staticType,
  });
}

export function typeAnnotation(
  at: Span,
  names: (IdentifierNode | PrefixedIdentifierNode)[]
): TypeAnnotationNode {
  return freeze<TypeAnnotationNode>({ kind: 'typeAnnotation', ...span(at), names });
}

export function literal(at: Span, value: string): LiteralNode {
  return freeze<LiteralNode>({ kind: 'literal', ...span(at), value });
}

export function expression(at: Span, form: string, children: SyntaxNode[]): ExpressionNode {
  return freeze<ExpressionNode>({ kind: 'expression', ...span(at), form, children });
}

export function statement(at: Span, form: string, children: SyntaxNode[]): StatementNode {
  return freeze<StatementNode>({ kind: 'statement', ...span(at), form, children });
}

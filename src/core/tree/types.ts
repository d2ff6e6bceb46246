/**
 * Language-neutral syntax tree model.
 *
 * A resolver normalizes its parser's output into this closed set of node
 * variants. Identifiers carry the resolver's symbol and type bindings so
 * detectors never need the compiler that produced them.
 */

/** What a resolved symbol denotes. */
export type SymbolKind =
  | 'class'
  | 'interface'
  | 'enum'
  | 'typeAlias'
  | 'typeParameter'
  | 'namespace'
  | 'function'
  | 'method'
  | 'property'
  | 'variable'
  | 'parameter'
  | 'enumMember'
  | 'other';

/**
 * A resolved symbol. `id` is unique within one resolved package: two
 * references to the same declaration share it.
 */
export interface SymbolRef {
  readonly id: number;
  readonly name: string;
  readonly kind: SymbolKind;
}

/** A resolved static type. */
export interface TypeRef {
  readonly text: string;
  /** The type of a runtime type object, e.g. `typeof Point`. */
  readonly isTypeObject: boolean;
}

interface NodeBase {
  /** Start offset in the unit's source text. */
  readonly start: number;
  /** End offset (exclusive). */
  readonly end: number;
}

export interface SourceUnitNode extends NodeBase {
  readonly kind: 'sourceUnit';
  readonly statements: readonly SyntaxNode[];
}

export interface ClassDeclarationNode extends NodeBase {
  readonly kind: 'classDeclaration';
  /** Empty for anonymous class expressions. */
  readonly name: string;
  readonly heritage: readonly TypeAnnotationNode[];
  readonly members: readonly SyntaxNode[];
}

/** A named function; its signature and body live on the wrapped literal. */
export interface FunctionDeclarationNode extends NodeBase {
  readonly kind: 'functionDeclaration';
  readonly name: string;
  readonly function: FunctionLiteralNode;
}

/** Arrow function or function expression, or the function of a declaration. */
export interface FunctionLiteralNode extends NodeBase {
  readonly kind: 'functionLiteral';
  readonly parameters: ParameterListNode;
  readonly body: FunctionBodyNode | undefined;
}

export interface MethodDeclarationNode extends NodeBase {
  readonly kind: 'methodDeclaration';
  readonly name: string;
  readonly parameters: ParameterListNode;
  readonly body: FunctionBodyNode | undefined;
}

export interface ConstructorDeclarationNode extends NodeBase {
  readonly kind: 'constructorDeclaration';
  readonly parameters: ParameterListNode;
  readonly body: FunctionBodyNode | undefined;
}

export interface ParameterListNode extends NodeBase {
  readonly kind: 'parameterList';
  readonly parameters: readonly ParameterNode[];
}

/**
 * One formal parameter. Named parameters come from destructured object
 * bindings; positional ones from plain or array-destructured bindings.
 */
export interface ParameterNode extends NodeBase {
  readonly kind: 'parameter';
  readonly name: string;
  readonly named: boolean;
  readonly symbol: SymbolRef | undefined;
  readonly type: TypeAnnotationNode | undefined;
  readonly defaultValue: SyntaxNode | undefined;
}

export interface BlockBodyNode extends NodeBase {
  readonly kind: 'blockBody';
  readonly statements: readonly SyntaxNode[];
}

export interface ExpressionBodyNode extends NodeBase {
  readonly kind: 'expressionBody';
  readonly expression: SyntaxNode;
}

export type FunctionBodyNode = BlockBodyNode | ExpressionBodyNode;

export interface ReturnStatementNode extends NodeBase {
  readonly kind: 'returnStatement';
  readonly expression: SyntaxNode | undefined;
}

/** Variable, field or property declaration. */
export interface VariableDeclarationNode extends NodeBase {
  readonly kind: 'variableDeclaration';
  readonly name: string;
  readonly type: TypeAnnotationNode | undefined;
  readonly initializer: SyntaxNode | undefined;
}

/**
 * Object construction: `new C(...)`, or `C.factory(...)` for a static
 * factory returning an instance of `C`.
 */
export interface ConstructionExpressionNode extends NodeBase {
  readonly kind: 'constructionExpression';
  /** The constructed type as written. */
  readonly type: SyntaxNode;
  /** Empty for the default constructor, the factory name otherwise. */
  readonly constructorName: string;
  readonly arguments: readonly SyntaxNode[];
}

/** One entry of an options-bag argument: `{ name: expression }`. */
export interface NamedArgumentNode extends NodeBase {
  readonly kind: 'namedArgument';
  readonly name: string;
  readonly expression: SyntaxNode;
}

export interface IdentifierNode extends NodeBase {
  readonly kind: 'identifier';
  readonly name: string;
  readonly symbol: SymbolRef | undefined;
  readonly staticType: TypeRef | undefined;
}

/** `prefix.identifier` where both sides are plain identifiers. */
export interface PrefixedIdentifierNode extends NodeBase {
  readonly kind: 'prefixedIdentifier';
  readonly prefix: IdentifierNode;
  readonly identifier: IdentifierNode;
  readonly symbol: SymbolRef | undefined;
  readonly staticType: TypeRef | undefined;
}

/** A type position; holds the type names it references. */
export interface TypeAnnotationNode extends NodeBase {
  readonly kind: 'typeAnnotation';
  readonly names: readonly (IdentifierNode | PrefixedIdentifierNode)[];
}

export interface LiteralNode extends NodeBase {
  readonly kind: 'literal';
  readonly value: string;
}

/** Any other expression; `form` names the parser's node kind. */
export interface ExpressionNode extends NodeBase {
  readonly kind: 'expression';
  readonly form: string;
  readonly children: readonly SyntaxNode[];
}

/** Any other statement or declaration. */
export interface StatementNode extends NodeBase {
  readonly kind: 'statement';
  readonly form: string;
  readonly children: readonly SyntaxNode[];
}

export type SyntaxNode =
  | SourceUnitNode
  | ClassDeclarationNode
  | FunctionDeclarationNode
  | FunctionLiteralNode
  | MethodDeclarationNode
  | ConstructorDeclarationNode
  | ParameterListNode
  | ParameterNode
  | BlockBodyNode
  | ExpressionBodyNode
  | ReturnStatementNode
  | VariableDeclarationNode
  | ConstructionExpressionNode
  | NamedArgumentNode
  | IdentifierNode
  | PrefixedIdentifierNode
  | TypeAnnotationNode
  | LiteralNode
  | ExpressionNode
  | StatementNode;

export type NodeKind = SyntaxNode['kind'];

export type NodeOfKind<K extends NodeKind> = Extract<SyntaxNode, { kind: K }>;

/** Symbol kinds that define a type. */
export const TYPE_DEFINING_KINDS: ReadonlySet<SymbolKind> = new Set<SymbolKind>([
  'class',
  'interface',
  'enum',
  'typeAlias',
]);

/**
 * Normalizes a ts-morph source file into the surveyor's syntax tree model.
 *
 * Two TypeScript idioms are mapped onto the model's construction shape:
 * - an options-bag object literal argument (plain and shorthand property
 *   assignments only) becomes a list of named arguments;
 * - `C.create(...)` where `create` is a static method of class `C` returning
 *   a `C` becomes a construction through the named constructor `create`.
 */
import {
  Node,
  ts,
  type CallExpression,
  type Identifier,
  type NewExpression,
  type ObjectLiteralExpression,
  type ParameterDeclaration,
  type BindingName,
  type PropertyAccessExpression,
  type ShorthandPropertyAssignment,
  type SourceFile,
} from 'ts-morph';
import * as nodes from '../tree/nodes.js';
import type {
  ConstructionExpressionNode,
  FunctionBodyNode,
  FunctionLiteralNode,
  IdentifierNode,
  ParameterListNode,
  ParameterNode,
  PrefixedIdentifierNode,
  SourceUnitNode,
  SyntaxNode,
  TypeAnnotationNode,
} from '../tree/types.js';
import { SymbolTable, typeRefOf } from './symbols.js';

type FunctionLike = Node & { getParameters(): ParameterDeclaration[] };

/** Child properties that hold names rather than expressions. */
const NAME_PROPERTIES = ['name', 'propertyName', 'label', 'tagName'] as const;

export class TreeBuilder {
  constructor(private readonly symbols: SymbolTable) {}

  build(sourceFile: SourceFile): SourceUnitNode {
    return nodes.sourceUnit(
      { start: 0, end: sourceFile.getEnd() },
      sourceFile.getStatements().map((statement) => this.convert(statement))
    );
  }

  private convert(node: Node): SyntaxNode {
    if (Node.isFunctionDeclaration(node)) {
      const fn = this.functionLiteral(node, node.getBody());
      return nodes.functionDeclaration(spanOf(node), node.getName() ?? 'default', fn);
    }
    if (Node.isArrowFunction(node) || Node.isFunctionExpression(node)) {
      return this.functionLiteral(node, node.getBody());
    }
    if (
      Node.isMethodDeclaration(node) ||
      Node.isGetAccessorDeclaration(node) ||
      Node.isSetAccessorDeclaration(node)
    ) {
      return nodes.methodDeclaration(
        spanOf(node),
        node.getName(),
        this.parameterList(node),
        this.functionBody(node.getBody())
      );
    }
    if (Node.isConstructorDeclaration(node)) {
      return nodes.constructorDeclaration(
        spanOf(node),
        this.parameterList(node),
        this.functionBody(node.getBody())
      );
    }
    if (Node.isClassDeclaration(node) || Node.isClassExpression(node)) {
      return nodes.classDeclaration(
        spanOf(node),
        node.getName() ?? '',
        [...node.getDecorators(), ...node.getMembers()].map((member) => this.convert(member)),
        node.getHeritageClauses().map((clause) => this.typeAnnotation(clause))
      );
    }
    if (Node.isReturnStatement(node)) {
      const expression = node.getExpression();
      return nodes.returnStatement(spanOf(node), expression ? this.convert(expression) : undefined);
    }
    if (Node.isVariableDeclaration(node) || Node.isPropertyDeclaration(node)) {
      const initializer = node.getInitializer();
      const typeNode = node.getTypeNode();
      return nodes.variableDeclaration(
        spanOf(node),
        node.getNameNode().getText(),
        initializer ? this.convert(initializer) : undefined,
        typeNode ? this.typeAnnotation(typeNode) : undefined
      );
    }
    if (Node.isNewExpression(node)) {
      return this.newExpression(node);
    }
    if (Node.isCallExpression(node)) {
      return this.staticFactoryCall(node) ?? this.generic(node);
    }
    if (Node.isPropertyAccessExpression(node)) {
      return this.prefixedIdentifier(node) ?? this.propertyAccess(node);
    }
    if (Node.isIdentifier(node)) {
      return this.valueIdentifier(node);
    }
    if (Node.isShorthandPropertyAssignment(node)) {
      return nodes.expression(spanOf(node), node.getKindName(), [this.shorthandValue(node)]);
    }
    if (
      Node.isLiteralExpression(node) ||
      Node.isTrueLiteral(node) ||
      Node.isFalseLiteral(node) ||
      Node.isNullLiteral(node)
    ) {
      return nodes.literal(spanOf(node), node.getText());
    }
    if (Node.isHeritageClause(node) || Node.isTypeNode(node)) {
      return this.typeAnnotation(node);
    }
    if (
      Node.isImportDeclaration(node) ||
      Node.isExportDeclaration(node) ||
      Node.isImportEqualsDeclaration(node)
    ) {
      return nodes.statement(spanOf(node), node.getKindName(), []);
    }
    return this.generic(node);
  }

  private generic(node: Node): SyntaxNode {
    const children = node
      .forEachChildAsArray()
      .filter((child) => !ts.isModifier(child.compilerNode) && !isNameOf(child, node))
      .map((child) => this.convert(child));
    const form = node.getKindName();
    return isStatementForm(form)
      ? nodes.statement(spanOf(node), form, children)
      : nodes.expression(spanOf(node), form, children);
  }

  private functionLiteral(node: FunctionLike, body: Node | undefined): FunctionLiteralNode {
    return nodes.functionLiteral(spanOf(node), this.parameterList(node), this.functionBody(body));
  }

  private functionBody(body: Node | undefined): FunctionBodyNode | undefined {
    if (!body) return undefined;
    if (Node.isBlock(body)) {
      return nodes.blockBody(
        spanOf(body),
        body.getStatements().map((statement) => this.convert(statement))
      );
    }
    return nodes.expressionBody(spanOf(body), this.convert(body));
  }

  private parameterList(owner: FunctionLike): ParameterListNode {
    const declarations = owner.getParameters();
    const parameters: ParameterNode[] = [];
    for (const declaration of declarations) {
      if (declaration.getName() === 'this') continue;
      const typeNode = declaration.getTypeNode();
      const initializer = declaration.getInitializer();
      this.bindingParameters(declaration.getNameNode(), false, parameters, {
        type: typeNode ? this.typeAnnotation(typeNode) : undefined,
        defaultValue: initializer ? this.convert(initializer) : undefined,
      });
    }

    const first = declarations[0];
    const last = declarations[declarations.length - 1];
    const at = first && last
      ? { start: first.getStart(), end: last.getEnd() }
      : { start: owner.getStart(), end: owner.getStart() };
    return nodes.parameterList(at, parameters);
  }

  /**
   * Flatten a binding name into parameters. Elements of an object binding
   * pattern are named parameters; everything else is positional.
   */
  private bindingParameters(
    name: BindingName,
    named: boolean,
    into: ParameterNode[],
    extras: { type?: TypeAnnotationNode; defaultValue?: SyntaxNode } = {}
  ): void {
    if (Node.isIdentifier(name)) {
      into.push(
        nodes.parameter(spanOf(name), name.getText(), {
          symbol: this.symbols.symbolAt(name),
          named,
          type: extras.type,
          defaultValue: extras.defaultValue,
        })
      );
      return;
    }

    const elementsNamed = Node.isObjectBindingPattern(name);
    for (const element of name.getElements()) {
      if (Node.isOmittedExpression(element)) continue;
      const initializer = element.getInitializer();
      this.bindingParameters(element.getNameNode(), elementsNamed, into, {
        defaultValue: initializer ? this.convert(initializer) : undefined,
      });
    }
  }

  private newExpression(node: NewExpression): ConstructionExpressionNode {
    return nodes.constructionExpression(
      spanOf(node),
      this.constructedType(node.getExpression()),
      '',
      this.constructionArguments(node.getArguments())
    );
  }

  /**
   * `C.name(...)` where `name` is a static method of class `C` whose result
   * is an instance of `C`.
   */
  private staticFactoryCall(node: CallExpression): ConstructionExpressionNode | undefined {
    const callee = node.getExpression();
    if (!Node.isPropertyAccessExpression(callee)) return undefined;

    const receiver = callee.getExpression();
    const receiverSymbol = receiver.getSymbol();
    const classSymbol = receiverSymbol?.isAlias() ? receiverSymbol.getAliasedSymbol() : receiverSymbol;
    if (!classSymbol || (classSymbol.getFlags() & ts.SymbolFlags.Class) === 0) return undefined;

    const method = callee.getNameNode().getSymbol();
    const isStaticMethod = method?.getDeclarations().some(
      (declaration) => Node.isMethodDeclaration(declaration) && declaration.isStatic()
    );
    if (!isStaticMethod) return undefined;

    const returnSymbol = node.getReturnType().getSymbol();
    if (returnSymbol?.compilerSymbol !== classSymbol.compilerSymbol) return undefined;

    return nodes.constructionExpression(
      spanOf(node),
      this.constructedType(receiver),
      callee.getName(),
      this.constructionArguments(node.getArguments())
    );
  }

  /** The class named by a construction; a type name, not a value use. */
  private constructedType(node: Node): SyntaxNode {
    return Node.isIdentifier(node) || Node.isPropertyAccessExpression(node)
      ? this.typeName(node)
      : this.convert(node);
  }

  private constructionArguments(args: Node[]): SyntaxNode[] {
    const converted: SyntaxNode[] = [];
    for (const arg of args) {
      if (Node.isObjectLiteralExpression(arg) && isOptionsBag(arg)) {
        converted.push(...this.namedArguments(arg));
      } else {
        converted.push(this.convert(arg));
      }
    }
    return converted;
  }

  private namedArguments(literal: ObjectLiteralExpression): SyntaxNode[] {
    const args: SyntaxNode[] = [];
    for (const property of literal.getProperties()) {
      if (Node.isPropertyAssignment(property)) {
        args.push(
          nodes.namedArgument(
            spanOf(property),
            property.getName(),
            this.convert(property.getInitializerOrThrow())
          )
        );
      } else if (Node.isShorthandPropertyAssignment(property)) {
        args.push(
          nodes.namedArgument(spanOf(property), property.getName(), this.shorthandValue(property))
        );
      }
    }
    return args;
  }

  /** The value reference hidden in `{ x }`. */
  private shorthandValue(property: ShorthandPropertyAssignment): IdentifierNode {
    const name = property.getNameNode();
    return nodes.identifier(
      spanOf(name),
      name.getText(),
      this.symbols.shorthandValueSymbol(property.compilerNode),
      typeRefOf(name)
    );
  }

  private prefixedIdentifier(node: PropertyAccessExpression): PrefixedIdentifierNode | undefined {
    const target = node.getExpression();
    const name = node.getNameNode();
    if (!Node.isIdentifier(target) || !Node.isIdentifier(name)) return undefined;

    const symbol = this.symbols.symbolAt(name);
    const prefix = nodes.identifier(spanOf(target), target.getText(), this.symbols.symbolAt(target));
    return nodes.prefixedIdentifier(
      spanOf(node),
      prefix,
      nodes.identifier(spanOf(name), name.getText(), symbol),
      symbol,
      typeRefOf(node)
    );
  }

  /**
   * `a.b.C` or `this.x.C`: the receiver converts on its own and the accessed
   * name stays a value identifier.
   */
  private propertyAccess(node: PropertyAccessExpression): SyntaxNode {
    const name = node.getNameNode();
    const children = [this.convert(node.getExpression())];
    if (Node.isIdentifier(name)) {
      children.push(this.valueIdentifier(name));
    }
    return nodes.expression(spanOf(node), node.getKindName(), children);
  }

  private valueIdentifier(node: Identifier): IdentifierNode {
    return nodes.identifier(spanOf(node), node.getText(), this.symbols.symbolAt(node), typeRefOf(node));
  }

  /**
   * A type position. Only the type names it references are kept; they carry
   * symbols but no static type.
   */
  private typeAnnotation(node: Node): TypeAnnotationNode {
    const names: (IdentifierNode | PrefixedIdentifierNode)[] = [];
    const collect = (current: Node): void => {
      if (Node.isTypeReference(current)) {
        names.push(this.typeName(current.getTypeName()));
      } else if (Node.isExpressionWithTypeArguments(current)) {
        names.push(this.typeName(current.getExpression()));
      } else if (Node.isTypeQuery(current)) {
        names.push(this.typeName(current.getExprName()));
      }
    };
    collect(node);
    node.forEachDescendant(collect);
    return nodes.typeAnnotation(spanOf(node), names);
  }

  private typeName(node: Node): IdentifierNode | PrefixedIdentifierNode {
    let left: Node | undefined;
    let right: Node = node;
    if (Node.isQualifiedName(node)) {
      left = node.getLeft();
      right = node.getRight();
    } else if (Node.isPropertyAccessExpression(node)) {
      left = node.getExpression();
      right = node.getNameNode();
    }

    const name = nodes.identifier(spanOf(right), right.getText(), this.symbols.symbolAt(right));
    if (left && Node.isIdentifier(left)) {
      const prefix = nodes.identifier(spanOf(left), left.getText(), this.symbols.symbolAt(left));
      return nodes.prefixedIdentifier(spanOf(node), prefix, name, name.symbol);
    }
    return name;
  }
}

function spanOf(node: Node): nodes.Span {
  return { start: node.getStart(), end: node.getEnd() };
}

function isOptionsBag(literal: ObjectLiteralExpression): boolean {
  const properties = literal.getProperties();
  return (
    properties.length > 0 &&
    properties.every(
      (property) =>
        Node.isShorthandPropertyAssignment(property) ||
        (Node.isPropertyAssignment(property) && !Node.isComputedPropertyName(property.getNameNode()))
    )
  );
}

/**
 * True when `child` is the declared name, label or tag of `parent`.
 */
function isNameOf(child: Node, parent: Node): boolean {
  const compiler = parent.compilerNode;
  return NAME_PROPERTIES.some(
    (property) => property in compiler && Reflect.get(compiler, property) === child.compilerNode
  );
}

function isStatementForm(form: string): boolean {
  return /(Statement|Declaration|Block|List|Clause)$/.test(form);
}

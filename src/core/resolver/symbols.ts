/**
 * Maps compiler symbols and types onto the tree model's SymbolRef/TypeRef.
 */
import { ts, type Node, type Type } from 'ts-morph';
import type { SymbolKind, SymbolRef, TypeRef } from '../tree/types.js';

/**
 * Assigns stable ids to compiler symbols for the lifetime of one package.
 * Aliases (imports, re-exports) resolve to the symbol they stand for, so an
 * imported class and its declaration share an id.
 */
export class SymbolTable {
  private readonly refs = new Map<ts.Symbol, SymbolRef>();
  private nextId = 1;

  constructor(private readonly checker: ts.TypeChecker) {}

  refOf(symbol: ts.Symbol): SymbolRef {
    const target = this.resolveAlias(symbol);
    const existing = this.refs.get(target);
    if (existing) return existing;

    const ref: SymbolRef = Object.freeze({
      id: this.nextId++,
      name: target.name,
      kind: symbolKind(target),
    });
    this.refs.set(target, ref);
    return ref;
  }

  /** Symbol bound at a node, if the checker knows one. */
  symbolAt(node: Node): SymbolRef | undefined {
    const symbol = node.getSymbol();
    return symbol ? this.refOf(symbol.compilerSymbol) : undefined;
  }

  /** Value symbol of a shorthand property assignment `{ x }`. */
  shorthandValueSymbol(node: ts.ShorthandPropertyAssignment): SymbolRef | undefined {
    const symbol = this.checker.getShorthandAssignmentValueSymbol(node);
    return symbol ? this.refOf(symbol) : undefined;
  }

  private resolveAlias(symbol: ts.Symbol): ts.Symbol {
    if ((symbol.flags & ts.SymbolFlags.Alias) === 0) return symbol;
    return this.checker.getAliasedSymbol(symbol);
  }
}

export function symbolKind(symbol: ts.Symbol): SymbolKind {
  const flags = symbol.flags;
  if (flags & ts.SymbolFlags.Class) return 'class';
  if (flags & ts.SymbolFlags.Interface) return 'interface';
  if (flags & ts.SymbolFlags.Enum) return 'enum';
  if (flags & ts.SymbolFlags.TypeAlias) return 'typeAlias';
  if (flags & ts.SymbolFlags.TypeParameter) return 'typeParameter';
  if (flags & ts.SymbolFlags.EnumMember) return 'enumMember';
  if (flags & ts.SymbolFlags.Function) return 'function';
  if (flags & ts.SymbolFlags.Method) return 'method';
  if (flags & (ts.SymbolFlags.Property | ts.SymbolFlags.Accessor)) return 'property';
  if (flags & ts.SymbolFlags.Variable) {
    return isParameterSymbol(symbol) ? 'parameter' : 'variable';
  }
  if (flags & (ts.SymbolFlags.ValueModule | ts.SymbolFlags.NamespaceModule)) return 'namespace';
  return 'other';
}

function isParameterSymbol(symbol: ts.Symbol): boolean {
  const declaration = symbol.declarations?.[0];
  if (!declaration) return false;
  let root: ts.Node = declaration;
  while (ts.isBindingElement(root) || ts.isObjectBindingPattern(root) || ts.isArrayBindingPattern(root)) {
    root = root.parent;
  }
  return ts.isParameter(root);
}

/**
 * Describe a node's static type.
 */
export function typeRefOf(node: Node): TypeRef {
  const type = node.getType();
  return Object.freeze({ text: type.getText(), isTypeObject: isTypeObject(type) });
}

/**
 * True for the type of a runtime type object: `typeof SomeClass` or
 * `typeof SomeEnum`. Instance types of the same class or enum are not.
 */
export function isTypeObject(type: Type): boolean {
  const symbol = type.getSymbol();
  if (!symbol || !type.isObject() || type.isClassOrInterface()) return false;
  const flags = symbol.getFlags();
  if (flags & ts.SymbolFlags.Class) {
    return type.getConstructSignatures().length > 0;
  }
  return (flags & ts.SymbolFlags.Enum) !== 0;
}

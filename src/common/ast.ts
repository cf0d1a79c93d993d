// Expression Abstract Syntax Tree
// Immutable tree of numeric literals and symbol-tagged nodes produced by the parser.

import { ExprSymbol, isQuoted } from "./symbol";
import { type VisitOrder, type Visitor, ExprVisitor } from "./visitor";

export type ExprKind = "literal" | "symbol";

export type Expr = LiteralExpr | SymbolExpr;

/**
 * Base class providing shared behavior for expressions.
 */
abstract class BaseExpr {
  abstract readonly kind: ExprKind;

  abstract accept(visitor: Visitor, order?: VisitOrder): void;
}

/**
 * Numeric literal expression.
 */
export class LiteralExpr extends BaseExpr {
  readonly kind: ExprKind = "literal";

  constructor(readonly value: number) {
    super();
  }

  override accept(visitor: Visitor, _order: VisitOrder = "pre"): void {
    visitor.visitExpr(this);
  }
}

/**
 * Symbol expression: a variable, operator, subscript or function call.
 *
 * String literals are variables whose name keeps its quotes, so `'foo'` is the
 * variable symbol named `'foo'`.
 */
export class SymbolExpr extends BaseExpr {
  readonly kind: ExprKind = "symbol";

  constructor(
    readonly symbol: ExprSymbol,
    readonly args: readonly Expr[] = []
  ) {
    super();
  }

  /** Whether this node is a string literal. */
  isStringLiteral(): boolean {
    return this.symbol.kind === "variable" && isQuoted(this.symbol.name);
  }

  override accept(visitor: Visitor, order: VisitOrder = "pre"): void {
    if (order === "pre") {
      visitor.visitExpr(this);
    }
    for (const arg of this.args) {
      arg.accept(visitor, order);
    }
    if (order === "post") {
      visitor.visitExpr(this);
    }
  }
}

/**
 * Convenience builders used by the parser and tests.
 */
export const Exprs = {
  number(value: number): LiteralExpr {
    return new LiteralExpr(value);
  },
  string(text: string, quote: "'" | '"' = "'"): SymbolExpr {
    return new SymbolExpr(ExprSymbol.variable(`${quote}${text}${quote}`));
  },
  call(symbol: ExprSymbol, ...args: Expr[]): SymbolExpr {
    return new SymbolExpr(symbol, args);
  },
};

/**
 * Collect every symbol referenced in a tree, in first-seen order.
 */
export function collectSymbols(root: Expr): Set<ExprSymbol> {
  const symbols = new Set<ExprSymbol>();
  root.accept(
    new ExprVisitor((expr) => {
      if (expr instanceof SymbolExpr) {
        symbols.add(expr.symbol);
      }
    })
  );
  return symbols;
}

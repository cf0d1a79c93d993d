// Expression Planner
// Converts parsed expression trees to Interpretable nodes

import { type Expr, LiteralExpr } from "../common/ast";
import { CallValue, ConstValue, type Interpretable } from "../interpreter/interpretable";
import type { SymbolResolver } from "../interpreter/resolver";

/**
 * Planner options for controlling interpretable generation.
 */
export interface PlannerOptions {
  /** Resolver supplying the evaluator of each symbol */
  resolver: SymbolResolver;
}

/**
 * Planner converts a parsed tree to interpretable nodes, resolving every symbol.
 */
export class Planner {
  private readonly resolver: SymbolResolver;

  constructor(options: PlannerOptions) {
    this.resolver = options.resolver;
  }

  /**
   * Plan an expression tree into an interpretable.
   */
  plan(expr: Expr): Interpretable {
    if (expr instanceof LiteralExpr) {
      return new ConstValue(expr.value);
    }
    const args = expr.args.map((arg) => this.plan(arg));
    return new CallValue(expr.symbol, args, this.resolver.resolve(expr.symbol));
  }
}

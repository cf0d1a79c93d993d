// Visitor utilities for traversing expression trees.

import type { Expr } from "./ast";

/** Order to visit nodes during traversal. */
export type VisitOrder = "pre" | "post";

/**
 * Visitor interface for traversing expression nodes.
 */
export interface Visitor {
  /** Visit an expression node. */
  visitExpr(expr: Expr): void;
}

/**
 * Visitor implementation backed by a single callback.
 */
export class ExprVisitor implements Visitor {
  constructor(private readonly onExpr: (expr: Expr) => void) {}

  visitExpr(expr: Expr): void {
    this.onExpr(expr);
  }
}

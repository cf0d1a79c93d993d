/**
 * dynexpr - dynamically typed expression evaluation for TypeScript
 *
 * Parses infix expression text once, folds what it can ahead of time, and
 * evaluates the result repeatedly against caller-supplied symbols.
 *
 * @example
 * ```ts
 * import { Expression, ExprSymbol, Types } from "dynexpr";
 *
 * const expr = new Expression("max(a, b) * 2", {
 *   constants: { b: 4 },
 *   symbols: new Map([[ExprSymbol.variable("a"), () => 10]]),
 * });
 * expr.evaluate(Types.number); // 20
 * ```
 */

export { Expression, build, type ExpressionInit, type ResolverInit } from "./expression";
export { ParsedExpression, parse, parseExpr, tokenize } from "./parser";
export { Precedence } from "./parser";
export { type Expr, Exprs, LiteralExpr, SymbolExpr } from "./common/ast";
export { Emitter } from "./common/emitter";
export { type Arity, ExprSymbol, type SymbolKind } from "./common/symbol";
export {
  type ErrorDetail,
  type ErrorKind,
  ExpressionError,
  ParseError,
  describeError,
} from "./common/errors";
export { logger } from "./common/logger";
export * from "./interpreter";

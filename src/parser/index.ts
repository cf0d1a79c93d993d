// Parser module
// Tokenizes and parses expression text into an immutable tree

import { type Expr, collectSymbols } from "../common/ast";
import { Emitter } from "../common/emitter";
import type { ExprSymbol } from "../common/symbol";
import { Parser } from "./parser";

/**
 * ParsedExpression is the reusable result of parsing expression text.
 */
export class ParsedExpression {
  /** Every symbol the tree references. */
  readonly symbols: ReadonlySet<ExprSymbol>;
  /** Canonical re-print of the tree. */
  readonly description: string;

  constructor(
    readonly root: Expr,
    readonly source: string = new Emitter().emit(root)
  ) {
    this.symbols = collectSymbols(root);
    this.description = new Emitter().emit(root);
  }

  toString(): string {
    return this.description;
  }
}

/**
 * Parse expression text.
 *
 * @throws ParseError when the text is malformed.
 */
export function parse(source: string): ParsedExpression {
  return new ParsedExpression(new Parser().parse(source), source);
}

export { Parser, parseExpr } from "./parser";
export { Lexer, tokenize } from "./lexer";
export type { Token, TokenKind } from "./lexer";
export { Precedence, infixOperator } from "./operators";
export type { InfixOperatorInfo } from "./operators";

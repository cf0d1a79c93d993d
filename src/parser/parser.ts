// Expression Parser
// Precedence-climbing parser from tokens to an expression tree.

import { type Expr, LiteralExpr, SymbolExpr } from "../common/ast";
import { ParseError } from "../common/errors";
import { ExprSymbol } from "../common/symbol";
import { type Token, tokenize } from "./lexer";
import { Precedence, infixOperator } from "./operators";

const closers = new Set([")", "]", ","]);

/**
 * Parser builds an expression tree from source text.
 *
 * Operator names are not checked here: any operator run is accepted in prefix,
 * infix or postfix position, and resolved to an evaluator later.
 */
export class Parser {
  private tokens: Token[] = [];
  private index = 0;

  /**
   * Parse source text into its root expression.
   */
  parse(source: string): Expr {
    this.tokens = tokenize(source);
    this.index = 0;
    const root = this.parseExpression(Precedence.Comma);
    this.expectEnd();
    return root;
  }

  private peek(ahead = 0): Token {
    const token = this.tokens[this.index + ahead] ?? this.tokens[this.tokens.length - 1];
    if (!token) {
      throw new ParseError("", 0);
    }
    return token;
  }

  private advance(): Token {
    const token = this.peek();
    if (token.kind !== "eof") {
      this.index++;
    }
    return token;
  }

  private unexpected(token: Token): ParseError {
    const text = token.kind === "string" ? `${token.quote}${token.text}${token.quote}` : token.text;
    return new ParseError(text, token.offset);
  }

  private isPunctuation(token: Token, text: string): boolean {
    return token.kind === "punctuation" && token.text === text;
  }

  private expectPunctuation(text: string): void {
    const token = this.peek();
    if (!this.isPunctuation(token, text)) {
      throw this.unexpected(token);
    }
    this.advance();
  }

  private expectEnd(): void {
    const token = this.peek();
    if (token.kind !== "eof") {
      throw this.unexpected(token);
    }
  }

  private parseExpression(minPrecedence: number): Expr {
    let left = this.parseUnary();
    for (;;) {
      const token = this.peek();
      if (this.isPunctuation(token, ",")) {
        if (minPrecedence > Precedence.Comma) {
          return left;
        }
        this.advance();
        const right = this.parseExpression(Precedence.Comma + 1);
        left = new SymbolExpr(ExprSymbol.infix(","), [left, right]);
        continue;
      }
      if (token.kind !== "operator" || token.text === ":") {
        return left;
      }
      if (token.text === "?") {
        if (minPrecedence > Precedence.Ternary) {
          return left;
        }
        left = this.parseTernary(left);
        continue;
      }
      const info = infixOperator(token.text);
      if (info.precedence < minPrecedence) {
        return left;
      }
      this.advance();
      const right = this.parseExpression(
        info.rightAssociative ? info.precedence : info.precedence + 1
      );
      left = new SymbolExpr(ExprSymbol.infix(token.text), [left, right]);
    }
  }

  private parseTernary(condition: Expr): Expr {
    this.advance();
    const whenTrue = this.parseExpression(Precedence.Assignment);
    const colon = this.peek();
    if (colon.kind !== "operator" || colon.text !== ":") {
      throw this.unexpected(colon);
    }
    this.advance();
    const whenFalse = this.parseExpression(Precedence.Ternary);
    return new SymbolExpr(ExprSymbol.infix("?:"), [condition, whenTrue, whenFalse]);
  }

  private parseUnary(): Expr {
    const token = this.peek();
    if (token.kind === "operator") {
      this.advance();
      const operand = this.parseUnary();
      return new SymbolExpr(ExprSymbol.prefix(token.text), [operand]);
    }
    return this.parsePostfix(this.parsePrimary());
  }

  private parsePrimary(): Expr {
    const token = this.advance();
    switch (token.kind) {
      case "number":
        return new LiteralExpr(token.value);
      case "string":
        return this.parseNamed(`${token.quote}${token.text}${token.quote}`, false);
      case "identifier":
        return this.parseNamed(token.text, true);
      case "punctuation":
        if (token.text === "(") {
          if (this.isPunctuation(this.peek(), ")")) {
            throw this.unexpected(this.peek());
          }
          const inner = this.parseExpression(Precedence.Comma);
          this.expectPunctuation(")");
          return inner;
        }
        if (token.text === "[") {
          const elements = this.parseArguments("]");
          return new SymbolExpr(ExprSymbol.function("[]", elements.length), elements);
        }
        throw this.unexpected(token);
      default:
        throw this.unexpected(token);
    }
  }

  /**
   * Parse what follows a name: a call, a subscript, or nothing.
   */
  private parseNamed(name: string, callable: boolean): Expr {
    const next = this.peek();
    if (callable && this.isPunctuation(next, "(")) {
      this.advance();
      const args = this.parseArguments(")");
      return new SymbolExpr(ExprSymbol.function(name, args.length), args);
    }
    if (this.isPunctuation(next, "[")) {
      this.advance();
      const index = this.parseExpression(Precedence.Comma);
      this.expectPunctuation("]");
      return new SymbolExpr(ExprSymbol.array(name), [index]);
    }
    return new SymbolExpr(ExprSymbol.variable(name));
  }

  /**
   * Parse a comma-separated list up to and including the closing bracket.
   */
  private parseArguments(closer: ")" | "]"): Expr[] {
    const args: Expr[] = [];
    if (this.isPunctuation(this.peek(), closer)) {
      this.advance();
      return args;
    }
    for (;;) {
      args.push(this.parseExpression(Precedence.Assignment));
      const token = this.advance();
      if (this.isPunctuation(token, closer)) {
        return args;
      }
      if (!this.isPunctuation(token, ",")) {
        throw this.unexpected(token);
      }
    }
  }

  private parsePostfix(operand: Expr): Expr {
    let expr = operand;
    for (;;) {
      const token = this.peek();
      if (this.isPunctuation(token, "[")) {
        this.advance();
        const index = this.parseExpression(Precedence.Comma);
        this.expectPunctuation("]");
        expr = new SymbolExpr(ExprSymbol.infix("[]"), [expr, index]);
        continue;
      }
      if (token.kind === "operator" && this.isPostfixPosition(token)) {
        this.advance();
        expr = new SymbolExpr(ExprSymbol.postfix(token.text), [expr]);
        continue;
      }
      return expr;
    }
  }

  /**
   * An operator touching its operand is postfix when nothing it could apply to follows.
   */
  private isPostfixPosition(token: Token): boolean {
    if (token.spaceBefore) {
      return false;
    }
    const next = this.peek(1);
    if (next.kind === "eof" || (next.kind === "punctuation" && closers.has(next.text))) {
      return true;
    }
    return token.spaceAfter && next.kind === "operator";
  }
}

/**
 * Parse source text into its root expression.
 */
export function parseExpr(source: string): Expr {
  return new Parser().parse(source);
}

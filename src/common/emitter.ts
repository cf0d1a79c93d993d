import { Precedence, infixOperator } from "../parser/operators";
import { type Expr, LiteralExpr, SymbolExpr } from "./ast";
import { escapeString, isQuoted, unquote } from "./symbol";

type OperatorSpec = {
  kind: "prefix" | "postfix" | "infix" | "ternary" | "index";
  symbol: string;
  precedence: number;
  rightAssociative: boolean;
};

/**
 * Emitter prints an expression tree back to canonical source text.
 *
 * Spacing is normalized and parentheses appear only where the tree shape needs
 * them, so `a+(b)` and `a + b` print the same.
 */
export class Emitter {
  emit(expr: Expr): string {
    if (expr instanceof LiteralExpr) {
      return this.emitLiteral(expr);
    }
    return this.emitSymbol(expr);
  }

  private emitLiteral(expr: LiteralExpr): string {
    return String(expr.value);
  }

  private emitName(name: string): string {
    if (isQuoted(name)) {
      const quote = name.charAt(0);
      return `${quote}${escapeString(unquote(name), quote)}${quote}`;
    }
    return name;
  }

  private emitSymbol(expr: SymbolExpr): string {
    const { symbol, args } = expr;
    const [first, second, third] = args;
    switch (symbol.kind) {
      case "variable":
        return this.emitName(symbol.name);
      case "array":
        return `${this.emitName(symbol.name)}[${this.emitList(args)}]`;
      case "function":
        if (symbol.name === "[]") {
          return `[${this.emitList(args)}]`;
        }
        return `${symbol.name}(${this.emitList(args)})`;
      default:
        break;
    }

    const op = this.operatorFor(expr);
    if (op?.kind === "prefix" && first) {
      return `${op.symbol}${this.maybeWrap(first, op)}`;
    }
    if (op?.kind === "postfix" && first) {
      return `${this.maybeWrap(first, op)}${op.symbol}`;
    }
    if (op?.kind === "index" && first && second) {
      return `${this.maybeWrap(first, op)}[${this.emit(second)}]`;
    }
    if (op?.kind === "ternary" && first && second && third) {
      const cond = this.maybeWrap(first, op);
      const whenTrue = this.maybeWrap(second, { ...op, precedence: Precedence.Assignment });
      return `${cond} ? ${whenTrue} : ${this.maybeWrap(third, op, "right")}`;
    }
    if (op?.kind === "infix" && first && second) {
      const left = this.maybeWrap(first, op);
      const right = this.maybeWrap(second, op, "right");
      return symbol.name === "," ? `${left}, ${right}` : `${left} ${op.symbol} ${right}`;
    }
    // Operator nodes with an unusual argument count print as calls
    return `${symbol.escapedName}(${this.emitList(args)})`;
  }

  /**
   * Print arguments of a call, array literal or subscript.
   */
  private emitList(args: readonly Expr[]): string {
    return args
      .map((arg) => {
        const text = this.emit(arg);
        return this.getPrecedence(arg) === Precedence.Comma ? `(${text})` : text;
      })
      .join(", ");
  }

  private operatorFor(expr: SymbolExpr): OperatorSpec | null {
    const { symbol, args } = expr;
    switch (symbol.kind) {
      case "prefix":
        return args.length === 1
          ? { kind: "prefix", symbol: symbol.name, precedence: Precedence.Prefix, rightAssociative: true }
          : null;
      case "postfix":
        return args.length === 1
          ? { kind: "postfix", symbol: symbol.name, precedence: Precedence.Postfix, rightAssociative: false }
          : null;
      case "infix": {
        if (symbol.name === "[]") {
          return args.length === 2
            ? { kind: "index", symbol: "[]", precedence: Precedence.Postfix, rightAssociative: false }
            : null;
        }
        if (symbol.name === "?:" && args.length === 3) {
          return { kind: "ternary", symbol: "?:", precedence: Precedence.Ternary, rightAssociative: true };
        }
        if (args.length !== 2) {
          return null;
        }
        return { kind: "infix", symbol: symbol.name, ...infixOperator(symbol.name) };
      }
      default:
        return null;
    }
  }

  private maybeWrap(
    expr: Expr,
    parent: { precedence: number; rightAssociative: boolean },
    side: "left" | "right" = "left"
  ): string {
    const text = this.emit(expr);
    const childPrecedence = this.getPrecedence(expr);
    if (childPrecedence < parent.precedence) {
      return `(${text})`;
    }
    if (childPrecedence === parent.precedence) {
      const wrapsLeft = side === "left" && parent.rightAssociative;
      const wrapsRight = side === "right" && !parent.rightAssociative;
      if (wrapsLeft || wrapsRight) {
        return `(${text})`;
      }
    }
    return text;
  }

  private getPrecedence(expr: Expr): number {
    if (expr instanceof LiteralExpr) {
      // -1 must print as (-1) where it is an operand of a tighter operator
      return expr.value < 0 ? Precedence.Prefix : Precedence.Primary;
    }
    return this.operatorFor(expr)?.precedence ?? Precedence.Primary;
  }
}

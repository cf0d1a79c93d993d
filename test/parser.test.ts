import { describe, expect, test } from "vitest";
import { Exprs, LiteralExpr, SymbolExpr } from "../src/common/ast";
import { Emitter } from "../src/common/emitter";
import { ExpressionError, ParseError } from "../src/common/errors";
import { ExprSymbol } from "../src/common/symbol";
import { parse, tokenize } from "../src/parser";
import { captureError } from "./utils";

describe("Lexer", () => {
  const kinds = (source: string) => tokenize(source).map((token) => token.kind);
  const texts = (source: string) => tokenize(source).map((token) => token.text);

  test("should split an operator run before an operand", () => {
    expect(texts("a*-b")).toEqual(["a", "*", "-", "b", ""]);
    expect(kinds("a*-b")).toEqual(["identifier", "operator", "operator", "identifier", "eof"]);
  });

  test("should read number forms", () => {
    const [hex] = tokenize("0x1F");
    const [exponent] = tokenize("1.5e3");
    const [binary] = tokenize("0b101");
    expect(hex?.value).toBe(31);
    expect(exponent?.value).toBe(1500);
    expect(binary?.value).toBe(5);
  });

  test("should not read a range operator as a fraction", () => {
    expect(texts("3...5")).toEqual(["3", "...", "5", ""]);
    expect(texts("1..<2")).toEqual(["1", "..<", "2", ""]);
  });

  test("should unescape string contents", () => {
    const [token] = tokenize("'a\\nb\\u{41}'");
    expect(token?.kind).toBe("string");
    expect(token?.text).toBe("a\nbA");
    expect(token?.quote).toBe("'");
  });

  test("should keep dotted names together", () => {
    expect(texts("user.name + 1")).toEqual(["user.name", "+", "1", ""]);
  });

  test("should record surrounding whitespace", () => {
    const [, op] = tokenize("a !b");
    expect(op?.spaceBefore).toBe(true);
    expect(op?.spaceAfter).toBe(false);
  });
});

describe("Parser", () => {
  const describeSource = (source: string) => parse(source).description;

  test("should respect precedence", () => {
    expect(describeSource("1+2*3")).toBe("1 + 2 * 3");
    expect(describeSource("(1+2)*3")).toBe("(1 + 2) * 3");
    expect(describeSource("1-(2-3)")).toBe("1 - (2 - 3)");
    expect(describeSource("(1-2)-3")).toBe("1 - 2 - 3");
  });

  test("should group right-associative operators to the right", () => {
    expect(describeSource("a ?? b ?? c")).toBe("a ?? b ?? c");
    expect(describeSource("(a ?? b) ?? c")).toBe("(a ?? b) ?? c");
    expect(describeSource("a = b = c")).toBe("a = b = c");
  });

  test("should parse a ternary as one three-argument node", () => {
    const { root } = parse("a ? b : c");
    expect(root).toBeInstanceOf(SymbolExpr);
    if (root instanceof SymbolExpr) {
      expect(root.symbol).toBe(ExprSymbol.infix("?:"));
      expect(root.args).toHaveLength(3);
    }
    expect(describeSource("a ? b : c ? d : e")).toBe("a ? b : c ? d : e");
  });

  test("should parse calls, array literals and subscripts", () => {
    expect(describeSource("foo( 1,2 )")).toBe("foo(1, 2)");
    expect(describeSource("[1,2]")).toBe("[1, 2]");
    expect(describeSource("a[1]")).toBe("a[1]");
    expect(describeSource("(a+b)[0]")).toBe("(a + b)[0]");
    expect(describeSource("f((a, b))")).toBe("f((a, b))");
  });

  test("should tell subscripted names from subscript operators", () => {
    const named = parse("list[0]").root;
    const operator = parse("[1, 2][0]").root;
    expect(named instanceof SymbolExpr && named.symbol).toBe(ExprSymbol.array("list"));
    expect(operator instanceof SymbolExpr && operator.symbol).toBe(ExprSymbol.infix("[]"));
  });

  test("should parse prefix and postfix operators", () => {
    expect(describeSource("-a")).toBe("-a");
    expect(describeSource("-(a+b)")).toBe("-(a + b)");
    expect(describeSource("x...")).toBe("x...");
    expect(describeSource("...3")).toBe("...3");
    expect(describeSource("5! + 1")).toBe("5! + 1");
    expect(describeSource("1...3")).toBe("1 ... 3");
  });

  test("should treat string literals as quoted variables", () => {
    const { root } = parse("'it\\'s'");
    expect(root instanceof SymbolExpr && root.isStringLiteral()).toBe(true);
    expect(describeSource("'it\\'s'")).toBe("'it\\'s'");
  });

  test("should parse number literals", () => {
    const { root } = parse("1e3");
    expect(root).toBeInstanceOf(LiteralExpr);
    expect(describeSource("0.5")).toBe("0.5");
  });

  test("should collect symbols in first-seen order", () => {
    const symbols = Array.from(parse("a + b(1) + a").symbols);
    expect(symbols).toEqual([
      ExprSymbol.infix("+"),
      ExprSymbol.variable("a"),
      ExprSymbol.function("b", 1),
    ]);
  });

  test("should keep the source text", () => {
    const parsed = parse("a+b");
    expect(parsed.source).toBe("a+b");
    expect(String(parsed)).toBe("a + b");
  });

  describe("errors", () => {
    test("should report the end of input", () => {
      const error = captureError(() => parse("1 +"));
      expect(error).toBeInstanceOf(ParseError);
      expect(error.message).toBe("Unexpected end of expression");
    });

    test("should report unclosed groups and ternaries", () => {
      expect(captureError(() => parse("(1")).message).toBe("Unexpected end of expression");
      expect(captureError(() => parse("a ? b")).message).toBe("Unexpected end of expression");
    });

    test("should report the offending token and offset", () => {
      const error = captureError(() => parse("1 2"));
      expect(error.message).toBe("Unexpected token `2`");
      expect(error instanceof ParseError && error.offset).toBe(2);
      expect(error.detail).toEqual({ kind: "unexpectedToken", token: "2" });
    });

    test("should reject empty parentheses", () => {
      expect(captureError(() => parse("()")).message).toBe("Unexpected token `)`");
    });

    test("should reject malformed literals", () => {
      expect(captureError(() => parse("12abc")).message).toBe("Unexpected token `12a`");
      expect(captureError(() => parse("'abc")).message).toBe("Unexpected token `'abc`");
    });

    test("should reject unknown characters", () => {
      const error = captureError(() => parse("a ; b"));
      expect(error).toBeInstanceOf(ExpressionError);
      expect(error.message).toBe("Unexpected token `;`");
    });
  });
});

describe("Emitter", () => {
  const emitter = new Emitter();

  test("should wrap negative literals under tighter operators", () => {
    expect(emitter.emit(Exprs.call(ExprSymbol.prefix("-"), Exprs.number(-1)))).toBe("-(-1)");
    expect(emitter.emit(Exprs.call(ExprSymbol.infix("[]"), Exprs.number(-1), Exprs.number(0)))).toBe(
      "(-1)[0]"
    );
    expect(emitter.emit(Exprs.call(ExprSymbol.infix("*"), Exprs.number(3), Exprs.number(-2)))).toBe(
      "3 * -2"
    );
  });

  test("should print operators with unusual argument counts as calls", () => {
    expect(emitter.emit(Exprs.call(ExprSymbol.infix("+"), Exprs.number(1)))).toBe("+(1)");
  });

  test("should print strings with their quotes", () => {
    expect(emitter.emit(Exprs.string("a\"b", '"'))).toBe('"a\\"b"');
  });
});

describe("ExprSymbol", () => {
  test("should intern symbols", () => {
    expect(ExprSymbol.variable("a")).toBe(ExprSymbol.variable("a"));
    expect(ExprSymbol.function("f", 1)).not.toBe(ExprSymbol.function("f", 2));
    expect(ExprSymbol.array("a").asVariable()).toBe(ExprSymbol.variable("a"));
  });

  test("should describe symbols", () => {
    expect(String(ExprSymbol.function("pow", 2))).toBe("function pow()");
    expect(String(ExprSymbol.infix("?:"))).toBe("ternary operator ?:");
    expect(String(ExprSymbol.infix("[]"))).toBe("subscript operator []");
    expect(String(ExprSymbol.array("foo"))).toBe("array foo[]");
    expect(String(ExprSymbol.variable("'foo'"))).toBe("variable 'foo'");
    expect(String(ExprSymbol.variable("foo bar"))).toBe("variable `foo bar`");
  });

  test("should reject negative arities", () => {
    expect(() => ExprSymbol.function("f", -1)).toThrow(RangeError);
  });
});

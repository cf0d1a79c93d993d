import { describe, expect, test } from "vitest";
import { ExpressionError, ParseError, describeError } from "../src/common/errors";
import { ExprSymbol } from "../src/common/symbol";
import { Expression } from "../src/expression";
import { captureError, evaluate } from "./utils";

class Opaque {}

describe("Evaluation errors", () => {
  test("should report undefined symbols when evaluated", () => {
    const expr = new Expression("foo + 1");
    const error = captureError(() => expr.evaluate());
    expect(error.message).toBe("Undefined variable foo");
    expect(error.detail).toEqual({ kind: "undefinedSymbol", symbol: ExprSymbol.variable("foo") });
  });

  test("should report the registered arity of a function", () => {
    expect(captureError(() => evaluate("pow(4)")).message).toBe(
      "Function pow() expects 2 arguments"
    );
    expect(captureError(() => evaluate("sqrt(1, 2)")).message).toBe(
      "Function sqrt() expects 1 argument"
    );
    expect(captureError(() => evaluate("max()")).message).toBe(
      "Function max() expects at least 1 argument"
    );
  });

  test("should report a stray comma", () => {
    const symbols = new Map([[ExprSymbol.array("foo"), () => 1]]);
    expect(captureError(() => evaluate("foo[(2, 3)]", { symbols })).message).toBe(
      "Unexpected token `,`"
    );
  });

  test("should report incompatible argument types", () => {
    expect(captureError(() => evaluate("'a' - 1")).message).toBe(
      "Arguments of type (String, Number) are not compatible with infix operator -"
    );
    expect(captureError(() => evaluate("-'a'")).message).toBe(
      "Argument of type String is not compatible with prefix operator -"
    );
  });

  test("should report values without structural equality", () => {
    const constants = { x: new Opaque(), y: new Opaque() };
    expect(captureError(() => evaluate("x == y", { constants })).message).toBe(
      "Arguments for infix operator == must be structurally comparable"
    );
  });

  test("should throw the memoized error on every evaluation", () => {
    const expr = new Expression("pow(4)");
    const first = captureError(() => expr.evaluate());
    const second = captureError(() => expr.evaluate());
    expect(second).toBe(first);
  });

  test("should pass caller errors through unchanged", () => {
    const failure = new TypeError("test failure");
    const symbols = new Map([
      [
        ExprSymbol.variable("broken"),
        () => {
          throw failure;
        },
      ],
    ]);
    expect(() => evaluate("broken * 2", { symbols })).toThrow(failure);
  });
});

describe("ExpressionError", () => {
  test("should expose its kind", () => {
    const error = ExpressionError.invalidRange(3, 1);
    expect(error.kind).toBe("invalidRange");
    expect(error.name).toBe("ExpressionError");
    expect(error).toBeInstanceOf(Error);
  });

  test("should describe custom messages", () => {
    expect(describeError({ kind: "message", message: "test message" })).toBe("test message");
    expect(ExpressionError.message("test message").message).toBe("test message");
  });

  test("should describe subscripts of named arrays", () => {
    const error = ExpressionError.typeMismatch(ExprSymbol.array("items"), [[1], "x"]);
    expect(error.message).toBe("Attempted to subscript items with incompatible index type String");
  });

  test("should make parse errors expression errors", () => {
    const error = new ParseError("+", 4);
    expect(error).toBeInstanceOf(ExpressionError);
    expect(error.name).toBe("ParseError");
    expect(error.kind).toBe("unexpectedToken");
    expect(error.offset).toBe(4);
  });
});

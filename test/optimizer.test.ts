import fc from "fast-check";
import { describe, expect, test } from "vitest";
import { ExprSymbol } from "../src/common/symbol";
import { Expression } from "../src/expression";
import type { SymbolEvaluator } from "../src/interpreter/resolver";
import { countingVariables } from "./utils";

function countingFunction(name: string, fn: (value: unknown) => unknown) {
  const calls: unknown[] = [];
  const evaluator: SymbolEvaluator = ([value]) => {
    calls.push(value);
    return fn(value);
  };
  return { symbols: new Map([[ExprSymbol.function(name, 1), evaluator]]), calls };
}

const double = (value: unknown) => (typeof value === "number" ? value * 2 : null);

describe("Constant folding", () => {
  test("should fold constant arithmetic", () => {
    const expr = new Expression("3 * 5");
    expect(expr.symbols.size).toBe(0);
    expect(expr.evaluate()).toBe(15);
  });

  test("should fold named constants", () => {
    const expr = new Expression("5 * foo", { constants: { foo: 5 } });
    expect(expr.symbols.size).toBe(0);
    expect(expr.evaluate()).toBe(25);
  });

  test("should keep symbols that depend on run-time values", () => {
    const { symbols, reads } = countingVariables({ foo: 5 });
    const expr = new Expression("5 * foo", { symbols });
    expect(expr.symbols).toEqual(new Set([ExprSymbol.infix("*"), ExprSymbol.variable("foo")]));
    expect(reads.get("foo")).toBeUndefined();
    expect(expr.evaluate()).toBe(25);
    expect(expr.evaluate()).toBe(25);
    expect(reads.get("foo")).toBe(2);
  });

  test("should run a pure function once per distinct argument list", () => {
    const { symbols, calls } = countingFunction("double", double);
    const expr = new Expression("double(2) + double(2) + double(3)", {
      symbols,
      options: ["boolSymbols", "pureSymbols"],
    });
    expect(calls).toEqual([2, 3]);
    expect(expr.symbols.size).toBe(0);
    expect(expr.evaluate()).toBe(14);
    expect(calls).toEqual([2, 3]);
  });

  test("should call caller functions on every evaluation by default", () => {
    const { symbols, calls } = countingFunction("double", double);
    const expr = new Expression("double(2)", { symbols });
    expect(calls).toEqual([]);
    expect(expr.symbols).toEqual(new Set([ExprSymbol.function("double", 1)]));
    expect(expr.evaluate()).toBe(4);
    expect(calls).toEqual([2]);
  });

  test("should keep caller variables impure under pureSymbols", () => {
    const { symbols } = countingVariables({ foo: 5 });
    const expr = new Expression("foo * 2", { symbols, options: ["pureSymbols"] });
    expect(expr.symbols.has(ExprSymbol.variable("foo"))).toBe(true);
  });

  test("should memoize failures of pure functions", () => {
    let calls = 0;
    const failure = new Error("test failure");
    const symbols = new Map<ExprSymbol, SymbolEvaluator>([
      [
        ExprSymbol.function("boom", 1),
        () => {
          calls++;
          throw failure;
        },
      ],
    ]);
    const expr = new Expression("boom(1) + boom(1)", { symbols, options: ["pureSymbols"] });
    expect(calls).toBe(1);
    expect(() => expr.evaluate()).toThrow(failure);
    expect(calls).toBe(1);
  });

  test("should read a pure container once", () => {
    let reads = 0;
    const list = ExprSymbol.variable("list");
    const expr = Expression.withResolvers(
      "list[0] + list[2]",
      () => undefined,
      (symbol) =>
        symbol === list
          ? () => {
              reads++;
              return [1, 2, 3];
            }
          : undefined
    );
    expect(reads).toBe(1);
    expect(expr.symbols.size).toBe(0);
    expect(expr.evaluate()).toBe(4);
  });
});

describe("Coalesce inlining", () => {
  test("should fold constant operands", () => {
    const expr = new Expression("nil ?? 'foo'");
    expect(expr.symbols.size).toBe(0);
    expect(expr.evaluate()).toBe("foo");
  });

  test("should inline the right operand after nil", () => {
    const { symbols } = countingVariables({ foo: 7 });
    const expr = new Expression("nil ?? foo", { symbols });
    expect(expr.symbols).toEqual(new Set([ExprSymbol.variable("foo")]));
    expect(expr.evaluate()).toBe(7);
  });

  test("should drop the right operand after a value", () => {
    const { symbols, reads } = countingVariables({ foo: 7 });
    const expr = new Expression("3 ?? foo", { symbols });
    expect(expr.symbols.size).toBe(0);
    expect(expr.evaluate()).toBe(3);
    expect(reads.get("foo")).toBeUndefined();
  });

  test("should fold parents of inlined operands", () => {
    const { symbols } = countingVariables({ foo: 7 });
    const expr = new Expression("(3 ?? foo) * 2", { symbols });
    expect(expr.symbols.size).toBe(0);
    expect(expr.evaluate()).toBe(6);
  });

  test("should keep run-time left operands", () => {
    const { symbols } = countingVariables({ foo: null });
    const expr = new Expression("foo ?? 5", { symbols });
    expect(expr.symbols).toEqual(new Set([ExprSymbol.infix("??"), ExprSymbol.variable("foo")]));
    expect(expr.evaluate()).toBe(5);
  });
});

describe("noOptimize", () => {
  test("should keep every symbol", () => {
    const expr = new Expression("3 * 5", { options: ["boolSymbols", "noOptimize"] });
    expect(expr.symbols).toEqual(new Set([ExprSymbol.infix("*")]));
    expect(expr.evaluate()).toBe(15);
  });

  test("should keep string literals", () => {
    const expr = new Expression("'a' + 'b'", { options: ["noOptimize"] });
    expect(expr.symbols).toEqual(
      new Set([ExprSymbol.infix("+"), ExprSymbol.variable("'a'"), ExprSymbol.variable("'b'")])
    );
    expect(expr.tableLength).toBe(2);
    expect(expr.evaluate()).toBe("ab");
    expect(expr.tableLength).toBe(2);
  });

  test("should not change results", () => {
    const sources = ["a + b * c", "max(a, b) - c", "a < b ? a : c", "[a, b, c][1] ?? a"];
    const values = fc.record({
      a: fc.integer({ min: -100, max: 100 }),
      b: fc.integer({ min: -100, max: 100 }),
      c: fc.integer({ min: -100, max: 100 }),
    });
    fc.assert(
      fc.property(values, fc.constantFrom(...sources), (constants, source) => {
        const optimized = new Expression(source, { constants });
        const plain = new Expression(source, {
          constants,
          options: ["boolSymbols", "noOptimize"],
        });
        expect(plain.evaluate()).toBe(optimized.evaluate());
      })
    );
  });
});

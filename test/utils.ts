import { ExprSymbol } from "../src/common/symbol";
import { ExpressionError } from "../src/common/errors";
import { Expression, type ExpressionInit } from "../src/expression";
import type { SymbolEvaluator } from "../src/interpreter/resolver";

/**
 * Build and evaluate an expression in one step.
 */
export function evaluate(source: string, init?: ExpressionInit): unknown {
  return new Expression(source, init).evaluate();
}

/**
 * Run a function that is expected to throw an ExpressionError and return it.
 */
export function captureError(fn: () => unknown): ExpressionError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ExpressionError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected an ExpressionError to be thrown");
}

/**
 * Symbol table of variables, each read through a counting evaluator.
 */
export function countingVariables(values: Record<string, unknown>): {
  symbols: Map<ExprSymbol, SymbolEvaluator>;
  reads: Map<string, number>;
} {
  const symbols = new Map<ExprSymbol, SymbolEvaluator>();
  const reads = new Map<string, number>();
  for (const [name, value] of Object.entries(values)) {
    symbols.set(ExprSymbol.variable(name), () => {
      reads.set(name, (reads.get(name) ?? 0) + 1);
      return value;
    });
  }
  return { symbols, reads };
}

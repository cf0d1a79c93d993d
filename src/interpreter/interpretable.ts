// Interpretable Types
// Planned expression nodes evaluated against a value table

import type { ExprSymbol } from "../common/symbol";
import type { ChannelValue, ValueTable } from "./channel";
import type { InlineHint } from "./dispatcher";

/**
 * Whether an evaluator may be folded at construction time.
 */
export type Purity = "pure" | "impure";

/**
 * Evaluator over channel values.
 */
export type ChannelEvaluator = (args: readonly ChannelValue[], table: ValueTable) => ChannelValue;

/**
 * Evaluator chosen for a symbol, with the facts the optimizer needs about it.
 */
export interface ResolvedEvaluator {
  purity: Purity;
  evaluate: ChannelEvaluator;
  inline?: InlineHint | undefined;
}

export type InterpretableKind = "const" | "call" | "error";

export type Interpretable = ConstValue | CallValue | ErrorValue;

/**
 * Constant interpretable: a literal or a folded result.
 */
export class ConstValue {
  readonly kind: InterpretableKind = "const";

  constructor(readonly value: ChannelValue) {}

  eval(_table: ValueTable): ChannelValue {
    return this.value;
  }
}

/**
 * Symbol call interpretable. Arguments are evaluated first, left to right.
 */
export class CallValue {
  readonly kind: InterpretableKind = "call";

  constructor(
    readonly symbol: ExprSymbol,
    readonly args: readonly Interpretable[],
    readonly evaluator: ResolvedEvaluator
  ) {}

  get isPure(): boolean {
    return this.evaluator.purity === "pure";
  }

  eval(table: ValueTable): ChannelValue {
    const values = this.args.map((arg) => arg.eval(table));
    return this.evaluator.evaluate(values, table);
  }

  /** Copy of this call with new arguments. */
  withArgs(args: readonly Interpretable[]): CallValue {
    return new CallValue(this.symbol, args, this.evaluator);
  }
}

/**
 * Interpretable that rethrows an error memoized while folding.
 */
export class ErrorValue {
  readonly kind: InterpretableKind = "error";

  constructor(
    readonly symbol: ExprSymbol,
    readonly error: unknown
  ) {}

  eval(_table: ValueTable): ChannelValue {
    throw this.error;
  }
}

// Symbol Dispatcher
// Overload registry mapping symbols to channel evaluators

import { ExpressionError } from "../common/errors";
import { ExprSymbol } from "../common/symbol";
import type { ChannelValue, ValueTable } from "./channel";

/**
 * Dispatcher overload variants for unary, binary, n-ary or raw channel functions.
 */
export type Overload =
  | UnaryDispatcherOverload
  | BinaryDispatcherOverload
  | NaryDispatcherOverload
  | ChannelDispatcherOverload;

/**
 * Unary operation type.
 */
export type UnaryOp = (value: unknown) => unknown;

/**
 * Binary operation type.
 */
export type BinaryOp = (lhs: unknown, rhs: unknown) => unknown;

/**
 * Function operation type (variable arguments).
 */
export type FunctionOp = (values: unknown[]) => unknown;

/**
 * Operation over undecoded channel values.
 */
export type ChannelOp = (args: readonly ChannelValue[], table: ValueTable) => ChannelValue;

/**
 * Optimizer hint attached to an overload.
 */
export type InlineHint = "coalesce";

/**
 * Represents a unary dispatcher overload.
 */
export class UnaryDispatcherOverload {
  readonly kind = "unary";

  constructor(
    readonly symbol: ExprSymbol,
    readonly unary: UnaryOp
  ) {}

  invoke(args: readonly ChannelValue[], table: ValueTable): ChannelValue {
    const [arg] = args;
    if (args.length !== 1 || arg === undefined) {
      throw ExpressionError.undefinedSymbol(this.symbol);
    }
    return table.store(this.unary(table.load(arg)));
  }
}

/**
 * Represents a binary dispatcher overload.
 */
export class BinaryDispatcherOverload {
  readonly kind = "binary";

  constructor(
    readonly symbol: ExprSymbol,
    readonly binary: BinaryOp
  ) {}

  invoke(args: readonly ChannelValue[], table: ValueTable): ChannelValue {
    const [left, right] = args;
    if (args.length !== 2 || left === undefined || right === undefined) {
      throw ExpressionError.undefinedSymbol(this.symbol);
    }
    return table.store(this.binary(table.load(left), table.load(right)));
  }
}

/**
 * Represents a variadic dispatcher overload.
 */
export class NaryDispatcherOverload {
  readonly kind = "nary";
  readonly minArgs: number;

  constructor(
    readonly symbol: ExprSymbol,
    readonly nary: FunctionOp,
    options: { minArgs?: number } = {}
  ) {
    this.minArgs = options.minArgs ?? 0;
  }

  invoke(args: readonly ChannelValue[], table: ValueTable): ChannelValue {
    if (args.length < this.minArgs) {
      throw ExpressionError.arityMismatch(this.symbol);
    }
    return table.store(this.nary(args.map((arg) => table.load(arg))));
  }
}

/**
 * Represents an overload that passes channel values through without decoding them.
 */
export class ChannelDispatcherOverload {
  readonly kind = "channel";
  readonly arity: number;
  readonly inline?: InlineHint;

  constructor(
    readonly symbol: ExprSymbol,
    readonly channel: ChannelOp,
    options: { arity: number; inline?: InlineHint }
  ) {
    this.arity = options.arity;
    this.inline = options.inline;
  }

  invoke(args: readonly ChannelValue[], table: ValueTable): ChannelValue {
    if (args.length !== this.arity) {
      throw ExpressionError.undefinedSymbol(this.symbol);
    }
    return this.channel(args, table);
  }
}

/**
 * Symbol dispatcher: finds the overload registered for a symbol.
 */
export class Dispatcher {
  private readonly overloads: Map<ExprSymbol, Overload> = new Map();

  add(...overloads: Overload[]): void {
    for (const overload of overloads) {
      this.overloads.set(overload.symbol, overload);
    }
  }

  /**
   * Find the overload for a symbol. Functions fall back to a variadic
   * registration under the same name.
   */
  find(symbol: ExprSymbol): Overload | undefined {
    const exact = this.overloads.get(symbol);
    if (exact || symbol.kind !== "function" || symbol.arity === "any") {
      return exact;
    }
    return this.overloads.get(ExprSymbol.function(symbol.name, "any"));
  }

  has(symbol: ExprSymbol): boolean {
    return this.find(symbol) !== undefined;
  }
}

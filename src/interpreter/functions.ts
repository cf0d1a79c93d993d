// Standard Functions
// Built-in symbol library: constants, math, boolean logic, subscripts and ranges

import { ExpressionError } from "../common/errors";
import { ExprSymbol } from "../common/symbol";
import { ChannelRef } from "./channel";
import {
  BinaryDispatcherOverload,
  ChannelDispatcherOverload,
  NaryDispatcherOverload,
  type Overload,
  UnaryDispatcherOverload,
} from "./dispatcher";
import { closedRange, halfOpenRange, rangeFrom, rangeThrough, rangeUpTo } from "./ranges";
import { subscript } from "./subscript";
import {
  ArraySlice,
  elementsOf,
  isArrayLike,
  isNil,
  stringify,
  toNumber,
  valuesEqual,
} from "./values";

function numeric(symbol: ExprSymbol, ...values: unknown[]): number[] {
  const numbers: number[] = [];
  for (const value of values) {
    const number = toNumber(value);
    if (number === undefined) {
      throw ExpressionError.typeMismatch(symbol, values);
    }
    numbers.push(number);
  }
  return numbers;
}

function unaryMath(name: string, fn: (value: number) => number): Overload {
  const symbol = ExprSymbol.function(name, 1);
  return new UnaryDispatcherOverload(symbol, (value) => {
    const [x = Number.NaN] = numeric(symbol, value);
    return fn(x);
  });
}

function binaryMath(symbol: ExprSymbol, fn: (lhs: number, rhs: number) => number): Overload {
  return new BinaryDispatcherOverload(symbol, (lhs, rhs) => {
    const [x = Number.NaN, y = Number.NaN] = numeric(symbol, lhs, rhs);
    return fn(x, y);
  });
}

function compare(symbol: ExprSymbol, fn: (lhs: number, rhs: number) => boolean): Overload {
  return new BinaryDispatcherOverload(symbol, (lhs, rhs) => {
    const [x = Number.NaN, y = Number.NaN] = numeric(symbol, lhs, rhs);
    return fn(x, y);
  });
}

function equals(symbol: ExprSymbol, lhs: unknown, rhs: unknown): boolean {
  const equal = valuesEqual(lhs, rhs);
  if (equal === undefined) {
    throw ExpressionError.typeMismatch(symbol, [lhs, rhs]);
  }
  return equal;
}

/** Rounds half away from zero. */
function round(value: number): number {
  return Math.sign(value) * Math.round(Math.abs(value));
}

const addSymbol = ExprSymbol.infix("+");

/**
 * Evaluate `lhs + rhs`: numeric sum, string concatenation or array concatenation.
 */
export function add(lhs: unknown, rhs: unknown): unknown {
  if (typeof lhs === "number" && typeof rhs === "number") {
    return lhs + rhs;
  }
  if (typeof lhs === "string" || typeof rhs === "string") {
    // Absent values are not stringified
    if (isNil(lhs) || isNil(rhs)) {
      throw ExpressionError.typeMismatch(addSymbol, [lhs, rhs]);
    }
    return stringify(lhs) + stringify(rhs);
  }
  if (isArrayLike(lhs) && isArrayLike(rhs)) {
    const joined = [...elementsOf(lhs), ...elementsOf(rhs)];
    return lhs instanceof ArraySlice || rhs instanceof ArraySlice ? new ArraySlice(joined) : joined;
  }
  const x = toNumber(lhs);
  const y = toNumber(rhs);
  if (x === undefined || y === undefined) {
    throw ExpressionError.typeMismatch(addSymbol, [lhs, rhs]);
  }
  return x + y;
}

export const constantFunctions: Overload[] = [
  new NaryDispatcherOverload(ExprSymbol.variable("pi"), () => Math.PI),
  new NaryDispatcherOverload(ExprSymbol.variable("true"), () => true),
  new NaryDispatcherOverload(ExprSymbol.variable("false"), () => false),
  new NaryDispatcherOverload(ExprSymbol.variable("nil"), () => null),
];

export const arithmeticFunctions: Overload[] = [
  new BinaryDispatcherOverload(addSymbol, add),
  binaryMath(ExprSymbol.infix("-"), (x, y) => x - y),
  binaryMath(ExprSymbol.infix("*"), (x, y) => x * y),
  binaryMath(ExprSymbol.infix("/"), (x, y) => x / y),
  binaryMath(ExprSymbol.infix("%"), (x, y) => x % y),
  new UnaryDispatcherOverload(ExprSymbol.prefix("-"), (value) => {
    const [x = Number.NaN] = numeric(ExprSymbol.prefix("-"), value);
    return -x;
  }),
];

export const mathFunctions: Overload[] = [
  unaryMath("sqrt", Math.sqrt),
  unaryMath("floor", Math.floor),
  unaryMath("ceil", Math.ceil),
  unaryMath("round", round),
  unaryMath("cos", Math.cos),
  unaryMath("acos", Math.acos),
  unaryMath("sin", Math.sin),
  unaryMath("asin", Math.asin),
  unaryMath("tan", Math.tan),
  unaryMath("atan", Math.atan),
  unaryMath("abs", Math.abs),
  binaryMath(ExprSymbol.function("pow", 2), Math.pow),
  binaryMath(ExprSymbol.function("atan2", 2), Math.atan2),
  binaryMath(ExprSymbol.function("mod", 2), (x, y) => x % y),
  // max(x, ...) -> number
  new NaryDispatcherOverload(
    ExprSymbol.function("max", "any"),
    (values) => Math.max(...numeric(ExprSymbol.function("max", "any"), ...values)),
    { minArgs: 1 }
  ),
  // min(x, ...) -> number
  new NaryDispatcherOverload(
    ExprSymbol.function("min", "any"),
    (values) => Math.min(...numeric(ExprSymbol.function("min", "any"), ...values)),
    { minArgs: 1 }
  ),
];

const ternarySymbol = ExprSymbol.infix("?:");

export const logicalFunctions: Overload[] = [
  new BinaryDispatcherOverload(ExprSymbol.infix("=="), (lhs, rhs) =>
    equals(ExprSymbol.infix("=="), lhs, rhs)
  ),
  new BinaryDispatcherOverload(
    ExprSymbol.infix("!="),
    (lhs, rhs) => !equals(ExprSymbol.infix("!="), lhs, rhs)
  ),
  compare(ExprSymbol.infix("<"), (x, y) => x < y),
  compare(ExprSymbol.infix("<="), (x, y) => x <= y),
  compare(ExprSymbol.infix(">"), (x, y) => x > y),
  compare(ExprSymbol.infix(">="), (x, y) => x >= y),
  compare(ExprSymbol.infix("&&"), (x, y) => x !== 0 && y !== 0),
  compare(ExprSymbol.infix("||"), (x, y) => x !== 0 || y !== 0),
  new UnaryDispatcherOverload(ExprSymbol.prefix("!"), (value) => {
    const [x = Number.NaN] = numeric(ExprSymbol.prefix("!"), value);
    return x === 0;
  }),
  // cond ? a : b passes the chosen branch through undecoded
  new ChannelDispatcherOverload(
    ternarySymbol,
    ([condition, whenTrue, whenFalse], table) => {
      if (condition === undefined || whenTrue === undefined || whenFalse === undefined) {
        throw ExpressionError.undefinedSymbol(ternarySymbol);
      }
      const decoded = table.load(condition);
      const flag = toNumber(decoded);
      if (flag === undefined) {
        throw ExpressionError.typeMismatch(ternarySymbol, [
          decoded,
          table.load(whenTrue),
          table.load(whenFalse),
        ]);
      }
      return flag !== 0 ? whenTrue : whenFalse;
    },
    { arity: 3 }
  ),
];

const subscriptSymbol = ExprSymbol.infix("[]");

export const collectionFunctions: Overload[] = [
  // a ?? b
  new ChannelDispatcherOverload(
    ExprSymbol.infix("??"),
    ([lhs, rhs]) => {
      if (lhs === undefined || rhs === undefined) {
        throw ExpressionError.undefinedSymbol(ExprSymbol.infix("??"));
      }
      return lhs === ChannelRef.NIL ? rhs : lhs;
    },
    { arity: 2, inline: "coalesce" }
  ),
  // container[index]
  new BinaryDispatcherOverload(subscriptSymbol, (container, index) =>
    subscript(subscriptSymbol, container, index)
  ),
  // [a, b, ...]
  new NaryDispatcherOverload(ExprSymbol.function("[]", "any"), (values) => values),
  new BinaryDispatcherOverload(ExprSymbol.infix("..."), (lhs, rhs) =>
    closedRange(ExprSymbol.infix("..."), lhs, rhs)
  ),
  new BinaryDispatcherOverload(ExprSymbol.infix("..<"), (lhs, rhs) =>
    halfOpenRange(ExprSymbol.infix("..<"), lhs, rhs)
  ),
  new UnaryDispatcherOverload(ExprSymbol.prefix("..."), (value) =>
    rangeThrough(ExprSymbol.prefix("..."), value)
  ),
  new UnaryDispatcherOverload(ExprSymbol.prefix("..<"), (value) =>
    rangeUpTo(ExprSymbol.prefix("..<"), value)
  ),
  new UnaryDispatcherOverload(ExprSymbol.postfix("..."), (value) =>
    rangeFrom(ExprSymbol.postfix("..."), value)
  ),
];

/**
 * Symbols available to every expression.
 */
export const standardFunctions: Overload[] = [
  ...constantFunctions,
  ...arithmeticFunctions,
  ...mathFunctions,
  ...collectionFunctions,
];

// Subscripts
// `container[index]` for arrays, dictionaries and strings, including range slicing.

import { ExpressionError } from "../common/errors";
import type { ExprSymbol } from "../common/symbol";
import { isPositionRange, isRange, resolveRange } from "./ranges";
import {
  ArraySlice,
  type Dictionary,
  StringIndex,
  characters,
  elementsOf,
  isArrayLike,
  isDictionary,
  isHashable,
  isMap,
  valuesEqual,
} from "./values";

function toOffset(index: unknown): number | undefined {
  if (typeof index === "number" && Number.isFinite(index)) {
    return Math.trunc(index);
  }
  if (typeof index === "bigint") {
    return Number(index);
  }
  return undefined;
}

function subscriptArray(
  symbol: ExprSymbol,
  container: readonly unknown[] | ArraySlice,
  index: unknown
): unknown {
  const elements = elementsOf(container);
  if (isRange(index)) {
    if (isPositionRange(index)) {
      throw ExpressionError.typeMismatch(symbol, [container, index]);
    }
    const [lower, upper] = resolveRange(index, elements.length, (offset) =>
      ExpressionError.arrayBounds(symbol, offset)
    );
    return new ArraySlice(elements.slice(lower, upper + 1));
  }
  const offset = toOffset(index);
  if (offset === undefined) {
    throw ExpressionError.typeMismatch(symbol, [container, index]);
  }
  if (offset < 0 || offset >= elements.length) {
    throw ExpressionError.arrayBounds(symbol, offset);
  }
  return elements[offset];
}

function subscriptString(symbol: ExprSymbol, text: string, index: unknown): string {
  const chars = characters(text);
  if (isRange(index)) {
    const [lower, upper] = resolveRange(index, chars.length, (offset) =>
      ExpressionError.stringBounds(text, offset)
    );
    return chars.slice(lower, upper + 1).join("");
  }
  const offset = index instanceof StringIndex ? index.offset : toOffset(index);
  if (offset === undefined) {
    throw ExpressionError.typeMismatch(symbol, [text, index]);
  }
  const char = chars[offset];
  if (offset < 0 || char === undefined) {
    throw ExpressionError.stringBounds(text, offset);
  }
  return char;
}

function subscriptDictionary(symbol: ExprSymbol, container: Dictionary, key: unknown): unknown {
  if (isMap(container)) {
    if (!isHashable(key)) {
      throw ExpressionError.typeMismatch(symbol, [container, key]);
    }
    if (container.has(key)) {
      return container.get(key);
    }
    // Structural keys such as tuples and arrays are stored by identity
    for (const [existing, value] of container) {
      if (valuesEqual(existing, key) === true) {
        return value;
      }
    }
    return null;
  }
  if (typeof key !== "string") {
    throw ExpressionError.typeMismatch(symbol, [container, key]);
  }
  return Object.hasOwn(container, key) ? container[key] : null;
}

/**
 * Evaluate `container[index]`.
 *
 * Missing dictionary keys read as nil. Everything else out of range throws, with
 * the offending bound in the error.
 */
export function subscript(symbol: ExprSymbol, container: unknown, index: unknown): unknown {
  if (isArrayLike(container)) {
    return subscriptArray(symbol, container, index);
  }
  if (typeof container === "string") {
    return subscriptString(symbol, container, index);
  }
  if (isDictionary(container)) {
    return subscriptDictionary(symbol, container, index);
  }
  throw ExpressionError.illegalSubscript(symbol, container);
}


// Ranges
// Closed, half-open and partial ranges over integer offsets or string positions.

import { ExpressionError } from "../common/errors";
import type { ExprSymbol } from "../common/symbol";
import { StringIndex, type StructuralEq } from "./values";

/** Range bound: an integer offset or a string position. */
export type Bound = number | StringIndex;

function boundsEqual(lhs: Bound, rhs: Bound): boolean {
  if (typeof lhs === "number" || typeof rhs === "number") {
    return lhs === rhs;
  }
  return lhs.equals(rhs);
}

function boundOffset(bound: Bound): number {
  return typeof bound === "number" ? bound : bound.offset;
}

function formatBound(bound: Bound): string {
  return typeof bound === "number" ? String(bound) : bound.toString();
}

/** `lower...upper` */
export class ClosedRange<B extends Bound = number> implements StructuralEq {
  constructor(
    readonly lower: B,
    readonly upper: B
  ) {}

  equals(other: unknown): boolean {
    return (
      other instanceof ClosedRange &&
      boundsEqual(this.lower, other.lower) &&
      boundsEqual(this.upper, other.upper)
    );
  }

  toString(): string {
    return `${formatBound(this.lower)}...${formatBound(this.upper)}`;
  }
}

/** `lower..<upper` */
export class HalfOpenRange<B extends Bound = number> implements StructuralEq {
  constructor(
    readonly lower: B,
    readonly upper: B
  ) {}

  equals(other: unknown): boolean {
    return (
      other instanceof HalfOpenRange &&
      boundsEqual(this.lower, other.lower) &&
      boundsEqual(this.upper, other.upper)
    );
  }

  toString(): string {
    return `${formatBound(this.lower)}..<${formatBound(this.upper)}`;
  }
}

/** `lower...` */
export class RangeFrom<B extends Bound = number> implements StructuralEq {
  constructor(readonly lower: B) {}

  equals(other: unknown): boolean {
    return other instanceof RangeFrom && boundsEqual(this.lower, other.lower);
  }

  toString(): string {
    return `${formatBound(this.lower)}...`;
  }
}

/** `..<upper` */
export class RangeUpTo<B extends Bound = number> implements StructuralEq {
  constructor(readonly upper: B) {}

  equals(other: unknown): boolean {
    return other instanceof RangeUpTo && boundsEqual(this.upper, other.upper);
  }

  toString(): string {
    return `..<${formatBound(this.upper)}`;
  }
}

/** `...upper` */
export class RangeThrough<B extends Bound = number> implements StructuralEq {
  constructor(readonly upper: B) {}

  equals(other: unknown): boolean {
    return other instanceof RangeThrough && boundsEqual(this.upper, other.upper);
  }

  toString(): string {
    return `...${formatBound(this.upper)}`;
  }
}

export type AnyRange =
  | ClosedRange<Bound>
  | HalfOpenRange<Bound>
  | RangeFrom<Bound>
  | RangeUpTo<Bound>
  | RangeThrough<Bound>;

export function isRange(value: unknown): value is AnyRange {
  return (
    value instanceof ClosedRange ||
    value instanceof HalfOpenRange ||
    value instanceof RangeFrom ||
    value instanceof RangeUpTo ||
    value instanceof RangeThrough
  );
}

/**
 * Whether any bound of a range is a string position.
 */
export function isPositionRange(range: AnyRange): boolean {
  if (range instanceof ClosedRange || range instanceof HalfOpenRange) {
    return range.lower instanceof StringIndex || range.upper instanceof StringIndex;
  }
  if (range instanceof RangeFrom) {
    return range.lower instanceof StringIndex;
  }
  return range.upper instanceof StringIndex;
}

/**
 * Read a range operand as an integer offset or a string position.
 */
function toBound(value: unknown): Bound | undefined {
  if (value instanceof StringIndex) {
    return value;
  }
  if (typeof value === "number" && !Number.isNaN(value)) {
    return Math.trunc(value);
  }
  if (typeof value === "bigint") {
    return Number(value);
  }
  return undefined;
}

function toBounds(symbol: ExprSymbol, lhs: unknown, rhs: unknown): [Bound, Bound] {
  const lower = toBound(lhs);
  const upper = toBound(rhs);
  if (lower === undefined || upper === undefined || typeof lower !== typeof upper) {
    throw ExpressionError.typeMismatch(symbol, [lhs, rhs]);
  }
  return [lower, upper];
}

function toSingleBound(symbol: ExprSymbol, value: unknown): Bound {
  const bound = toBound(value);
  if (bound === undefined) {
    throw ExpressionError.typeMismatch(symbol, [value]);
  }
  return bound;
}

/**
 * Build `lhs...rhs`.
 */
export function closedRange(symbol: ExprSymbol, lhs: unknown, rhs: unknown): ClosedRange<Bound> {
  const [lower, upper] = toBounds(symbol, lhs, rhs);
  if (boundOffset(lower) > boundOffset(upper)) {
    throw ExpressionError.invalidRange(boundOffset(lower), boundOffset(upper));
  }
  return new ClosedRange(lower, upper);
}

/**
 * Build `lhs..<rhs`.
 */
export function halfOpenRange(symbol: ExprSymbol, lhs: unknown, rhs: unknown): HalfOpenRange<Bound> {
  const [lower, upper] = toBounds(symbol, lhs, rhs);
  if (boundOffset(lower) >= boundOffset(upper)) {
    throw ExpressionError.invalidRange(boundOffset(lower), boundOffset(upper));
  }
  return new HalfOpenRange(lower, upper);
}

export function rangeFrom(symbol: ExprSymbol, value: unknown): RangeFrom<Bound> {
  return new RangeFrom(toSingleBound(symbol, value));
}

export function rangeUpTo(symbol: ExprSymbol, value: unknown): RangeUpTo<Bound> {
  return new RangeUpTo(toSingleBound(symbol, value));
}

export function rangeThrough(symbol: ExprSymbol, value: unknown): RangeThrough<Bound> {
  return new RangeThrough(toSingleBound(symbol, value));
}

/**
 * Resolve a range against a collection of `count` elements to an inclusive
 * `[lower, upper]` pair, reporting the first bound that falls outside it.
 */
export function resolveRange(
  range: AnyRange,
  count: number,
  outOfBounds: (offset: number) => ExpressionError
): [number, number] {
  const closed = (lower: number, upper: number): [number, number] => {
    if (lower < 0 || lower >= count) {
      throw outOfBounds(lower);
    }
    if (upper >= count) {
      throw outOfBounds(upper);
    }
    return [lower, upper];
  };
  const halfOpen = (lower: number, upper: number) => closed(lower, upper - 1);

  if (range instanceof ClosedRange) {
    return closed(boundOffset(range.lower), boundOffset(range.upper));
  }
  if (range instanceof HalfOpenRange) {
    return halfOpen(boundOffset(range.lower), boundOffset(range.upper));
  }
  if (range instanceof RangeThrough) {
    const upper = boundOffset(range.upper);
    if (upper < 0) {
      throw outOfBounds(upper);
    }
    return halfOpen(0, upper + 1);
  }
  if (range instanceof RangeUpTo) {
    const upper = boundOffset(range.upper);
    if (upper <= 0) {
      throw outOfBounds(upper);
    }
    return halfOpen(0, upper);
  }
  const lower = boundOffset(range.lower);
  if (lower >= count) {
    throw outOfBounds(lower);
  }
  return halfOpen(lower, count);
}

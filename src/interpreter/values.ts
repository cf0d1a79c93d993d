// Host Values
// Runtime value model carried through expressions: nil, numbers, strings, arrays,
// slices, dictionaries, tuples, string positions and opaque host objects.

/**
 * Opt-in structural equality for host objects.
 *
 * Values without this capability cannot be compared with `==` unless they are
 * numbers, strings, booleans, arrays, dictionaries or tuples.
 */
export interface StructuralEq {
  equals(other: unknown): boolean;
}

/**
 * Dictionary values: a Map, or a plain object keyed by strings.
 */
export type Dictionary = ReadonlyMap<unknown, unknown> | Readonly<Record<string, unknown>>;

/**
 * A contiguous view over another array's elements, indexed from zero.
 */
export class ArraySlice<T = unknown> implements Iterable<T> {
  readonly elements: readonly T[];

  constructor(elements: Iterable<T>) {
    this.elements = Array.from(elements);
  }

  get count(): number {
    return this.elements.length;
  }

  [Symbol.iterator](): Iterator<T> {
    return this.elements[Symbol.iterator]();
  }

  toString(): string {
    return stringify(this);
  }
}

/**
 * Fixed-size heterogeneous group of values.
 */
export class Tuple {
  readonly elements: readonly unknown[];

  constructor(...elements: unknown[]) {
    this.elements = elements;
  }

  toString(): string {
    return stringify(this);
  }
}

/**
 * Ordered position within a string, counted in characters.
 *
 * Positions are distinct from integer offsets: a range of positions slices a
 * string, but is rejected when applied to an array.
 */
export class StringIndex implements StructuralEq {
  constructor(readonly offset: number) {}

  /** Position of the given character offset in a string. */
  static at(offset: number): StringIndex {
    return new StringIndex(Math.trunc(offset));
  }

  equals(other: unknown): boolean {
    return other instanceof StringIndex && other.offset === this.offset;
  }

  toString(): string {
    return `StringIndex(${this.offset})`;
  }
}

const segmenter = new Intl.Segmenter(undefined, { granularity: "grapheme" });

/**
 * Split a string into user-perceived characters.
 */
export function characters(text: string): string[] {
  return Array.from(segmenter.segment(text), (segment) => segment.segment);
}

/**
 * Check if a value is absent.
 */
export function isNil(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

/**
 * Check if a value exposes structural equality.
 */
export function isStructuralEq(value: unknown): value is StructuralEq {
  return (
    typeof value === "object" &&
    value !== null &&
    "equals" in value &&
    typeof value.equals === "function"
  );
}

/**
 * Check if a value is a plain object used as a dictionary.
 */
export function isPlainObject(value: unknown): value is Readonly<Record<string, unknown>> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function isMap(value: unknown): value is ReadonlyMap<unknown, unknown> {
  return value instanceof Map;
}

export function isDictionary(value: unknown): value is Dictionary {
  return isMap(value) || isPlainObject(value);
}

/**
 * Check if a value is an array or an array slice.
 */
export function isArrayLike(value: unknown): value is readonly unknown[] | ArraySlice {
  return Array.isArray(value) || value instanceof ArraySlice;
}

/**
 * Elements of an array or array slice.
 */
export function elementsOf(value: readonly unknown[] | ArraySlice): readonly unknown[] {
  return value instanceof ArraySlice ? value.elements : value;
}

/**
 * Entries of a dictionary as key/value pairs.
 */
export function entriesOf(value: Dictionary): Array<[unknown, unknown]> {
  if (isMap(value)) {
    return Array.from(value.entries());
  }
  return Object.entries(value);
}

/**
 * Coerce a number-like value (number, bigint or boolean) to a double.
 */
export function toNumber(value: unknown): number | undefined {
  switch (typeof value) {
    case "number":
      return value;
    case "bigint":
      return Number(value);
    case "boolean":
      return value ? 1 : 0;
    default:
      return undefined;
  }
}

/**
 * Runtime type name used in error messages.
 */
export function typeName(value: unknown): string {
  if (isNil(value)) {
    return "nil";
  }
  switch (typeof value) {
    case "number":
      return "Number";
    case "bigint":
      return "BigInt";
    case "boolean":
      return "Boolean";
    case "string":
      return "String";
    case "symbol":
      return "Symbol";
    case "function":
      return "Function";
    default:
      break;
  }
  if (Array.isArray(value)) {
    return "Array";
  }
  const proto: unknown = Object.getPrototypeOf(value);
  if (
    typeof proto === "object" &&
    proto !== null &&
    "constructor" in proto &&
    typeof proto.constructor === "function" &&
    proto.constructor.name !== ""
  ) {
    return proto.constructor.name;
  }
  return "Object";
}

/**
 * Convert any value to its printable form.
 */
export function stringify(value: unknown): string {
  return stringifyValue(value, false);
}

function stringifyValue(value: unknown, nested: boolean): string {
  if (isNil(value)) {
    return "nil";
  }
  switch (typeof value) {
    case "string":
      return nested ? JSON.stringify(value) : value;
    case "boolean":
      return value ? "true" : "false";
    case "number":
    case "bigint":
      return String(value);
    case "symbol":
      return value.toString();
    case "function":
      return typeName(value);
    default:
      break;
  }
  if (isArrayLike(value)) {
    return `[${elementsOf(value)
      .map((element) => stringifyValue(element, true))
      .join(", ")}]`;
  }
  if (value instanceof Tuple) {
    return `(${value.elements.map((element) => stringifyValue(element, true)).join(", ")})`;
  }
  if (isDictionary(value)) {
    const entries = entriesOf(value).map(
      ([key, entry]) => `${stringifyValue(key, true)}: ${stringifyValue(entry, true)}`
    );
    return `{${entries.join(", ")}}`;
  }
  if (
    typeof value === "object" &&
    value !== null &&
    "toString" in value &&
    typeof value.toString === "function" &&
    value.toString !== Object.prototype.toString
  ) {
    return String(value);
  }
  return typeName(value);
}

/**
 * Copy the containers of a value, nested ones included, so that the copy shares
 * no mutable state with the original. Other values are returned as they are.
 */
export function detach(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(detach);
  }
  if (value instanceof ArraySlice) {
    return new ArraySlice(value.elements.map(detach));
  }
  if (value instanceof Tuple) {
    return new Tuple(...value.elements.map(detach));
  }
  if (isMap(value)) {
    const entries = Array.from(value, ([key, entry]): [unknown, unknown] => [key, detach(entry)]);
    return new Map(entries);
  }
  if (isPlainObject(value)) {
    const entries = Object.entries(value).map(([key, entry]): [string, unknown] => [
      key,
      detach(entry),
    ]);
    return Object.fromEntries(entries);
  }
  return value;
}

function isScalar(value: unknown): value is number | bigint | boolean | string {
  const type = typeof value;
  return type === "number" || type === "bigint" || type === "boolean" || type === "string";
}

/**
 * Whether a value can take part in structural equality.
 */
export function isHashable(value: unknown): boolean {
  if (isNil(value) || isScalar(value) || isStructuralEq(value)) {
    return true;
  }
  if (isArrayLike(value)) {
    return elementsOf(value).every(isHashable);
  }
  if (isDictionary(value)) {
    return entriesOf(value).every(([key, entry]) => isScalar(key) && isHashable(entry));
  }
  if (value instanceof Tuple) {
    const count = value.elements.length;
    return count >= 2 && count <= 6 && value.elements.every(isHashable);
  }
  return false;
}

function numbersEqual(lhs: number | bigint, rhs: number | bigint): boolean {
  if (typeof lhs === "number" && typeof rhs === "number") {
    return lhs === rhs;
  }
  if (typeof lhs === "bigint" && typeof rhs === "bigint") {
    return lhs === rhs;
  }
  const [big, num] = typeof lhs === "bigint" ? [lhs, rhs] : [rhs, lhs];
  return Number.isInteger(num) && BigInt(num) === big;
}

/**
 * Compare two values structurally.
 *
 * Returns undefined when the values cannot be compared, which callers report
 * as a type mismatch.
 */
export function valuesEqual(lhs: unknown, rhs: unknown): boolean | undefined {
  if (isNil(lhs) || isNil(rhs)) {
    return isNil(lhs) && isNil(rhs);
  }
  if (
    (typeof lhs === "number" || typeof lhs === "bigint") &&
    (typeof rhs === "number" || typeof rhs === "bigint")
  ) {
    return numbersEqual(lhs, rhs);
  }
  if (isScalar(lhs) && isScalar(rhs)) {
    return lhs === rhs;
  }
  if (!isHashable(lhs) || !isHashable(rhs)) {
    return undefined;
  }
  if (isStructuralEq(lhs)) {
    return lhs.equals(rhs);
  }
  if (isStructuralEq(rhs)) {
    return rhs.equals(lhs);
  }
  if (isArrayLike(lhs) && isArrayLike(rhs)) {
    const left = elementsOf(lhs);
    const right = elementsOf(rhs);
    return left.length === right.length && left.every((e, i) => valuesEqual(e, right[i]) === true);
  }
  if (isDictionary(lhs) && isDictionary(rhs)) {
    const left = entriesOf(lhs);
    const right = entriesOf(rhs);
    return (
      left.length === right.length &&
      left.every(([key, entry]) =>
        right.some(([otherKey, other]) => key === otherKey && valuesEqual(entry, other) === true)
      )
    );
  }
  if (lhs instanceof Tuple && rhs instanceof Tuple) {
    return (
      lhs.elements.length === rhs.elements.length &&
      lhs.elements.every((e, i) => valuesEqual(e, rhs.elements[i]) === true)
    );
  }
  return false;
}

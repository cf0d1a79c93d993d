// Result Types
// Static result types an evaluation can be projected to

import { ExpressionError } from "../common/errors";
import { ArraySlice, elementsOf, isArrayLike, isNil, stringify } from "./values";

export type ResultKind =
  | "any"
  | "number"
  | "int"
  | "bigint"
  | "string"
  | "boolean"
  | "array"
  | "slice"
  | "instance";

export type CastResult<T> = { ok: true; value: T } | { ok: false };

/**
 * Runtime description of a result type.
 */
export interface ResultType<T> {
  readonly name: string;
  readonly kind: ResultKind;
  /** Whether nil projects to an absent value. */
  readonly nullable: boolean;
  /** Exact or numeric-conversion cast, without the coercion ladder. */
  cast(value: unknown): CastResult<T>;
}

const failed = { ok: false } as const;

function ok<T>(value: T): CastResult<T> {
  return { ok: true, value };
}

function castElements<T>(type: ResultType<T>, elements: readonly unknown[]): T[] | undefined {
  const out: T[] = [];
  for (const element of elements) {
    const cast = type.cast(element);
    if (!cast.ok) {
      return undefined;
    }
    out.push(cast.value);
  }
  return out;
}

/**
 * TypeBuilder provides a fluent API for creating result types.
 */
export class TypeBuilder {
  /** Any value, passed through unchanged. */
  readonly any: ResultType<unknown> = {
    name: "Any",
    kind: "any",
    nullable: true,
    cast: (value) => ok(value),
  };

  /** Double-precision number. */
  readonly number: ResultType<number> = {
    name: "Number",
    kind: "number",
    nullable: false,
    cast: (value) => {
      if (typeof value === "number") {
        return ok(value);
      }
      return typeof value === "bigint" ? ok(Number(value)) : failed;
    },
  };

  /** Integer number, truncating any fraction. */
  readonly int: ResultType<number> = {
    name: "Int",
    kind: "int",
    nullable: false,
    cast: (value) => {
      if (typeof value === "number" && Number.isFinite(value)) {
        return ok(Math.trunc(value) || 0);
      }
      if (typeof value === "bigint" && Number.isSafeInteger(Number(value))) {
        return ok(Number(value));
      }
      return failed;
    },
  };

  readonly bigint: ResultType<bigint> = {
    name: "BigInt",
    kind: "bigint",
    nullable: false,
    cast: (value) => {
      if (typeof value === "bigint") {
        return ok(value);
      }
      if (typeof value === "number" && Number.isFinite(value)) {
        return ok(BigInt(Math.trunc(value)));
      }
      return failed;
    },
  };

  readonly string: ResultType<string> = {
    name: "String",
    kind: "string",
    nullable: false,
    cast: (value) => (typeof value === "string" ? ok(value) : failed),
  };

  readonly boolean: ResultType<boolean> = {
    name: "Boolean",
    kind: "boolean",
    nullable: false,
    cast: (value) => (typeof value === "boolean" ? ok(value) : failed),
  };

  /**
   * Create an owned array type. Slices are copied into arrays.
   */
  array<T>(element: ResultType<T>): ResultType<T[]> {
    return {
      name: `Array<${element.name}>`,
      kind: "array",
      nullable: false,
      cast: (value) => {
        if (!isArrayLike(value)) {
          return failed;
        }
        const elements = castElements(element, elementsOf(value));
        return elements ? ok(elements) : failed;
      },
    };
  }

  /**
   * Create an array slice type. Arrays are wrapped in slices.
   */
  slice<T>(element: ResultType<T>): ResultType<ArraySlice<T>> {
    return {
      name: `ArraySlice<${element.name}>`,
      kind: "slice",
      nullable: false,
      cast: (value) => {
        if (!isArrayLike(value)) {
          return failed;
        }
        const elements = castElements(element, elementsOf(value));
        return elements ? ok(new ArraySlice(elements)) : failed;
      },
    };
  }

  /**
   * Create a nullable type: nil projects to null.
   */
  optional<T>(inner: ResultType<T>): ResultType<T | null> {
    return {
      name: `Optional<${inner.name}>`,
      kind: inner.kind,
      nullable: true,
      cast: (value) => (isNil(value) ? ok(null) : inner.cast(value)),
    };
  }

  /**
   * Create a type matching instances of a class.
   */
  instance<T>(ctor: abstract new (...args: never[]) => T): ResultType<T> {
    return {
      name: ctor.name,
      kind: "instance",
      nullable: false,
      cast: (value) => (value instanceof ctor ? ok(value) : failed),
    };
  }
}

/**
 * Singleton TypeBuilder instance for convenience.
 */
export const Types = new TypeBuilder();

/**
 * Coerce a non-nil value towards a kind of result, if a rule applies.
 */
function coerce(kind: ResultKind, value: unknown): CastResult<unknown> {
  switch (kind) {
    case "string":
      return ok(stringify(value));
    case "boolean":
      if (typeof value === "number") {
        return ok(value !== 0);
      }
      return typeof value === "bigint" ? ok(value !== 0n) : failed;
    case "number":
    case "int":
    case "bigint":
      return typeof value === "boolean" ? ok(value ? 1 : 0) : failed;
    default:
      return failed;
  }
}

/**
 * Project an evaluated value to a result type.
 *
 * Tries an exact or numeric cast first, then nil for nullable types, then
 * stringification, number-to-boolean and boolean-to-number coercions.
 */
export function project<T>(type: ResultType<T>, value: unknown): T {
  const direct = type.cast(value);
  if (direct.ok) {
    return direct.value;
  }
  if (!isNil(value)) {
    const coerced = coerce(type.kind, value);
    if (coerced.ok) {
      const cast = type.cast(coerced.value);
      if (cast.ok) {
        return cast.value;
      }
    }
  }
  throw ExpressionError.resultTypeMismatch(type.name, value);
}

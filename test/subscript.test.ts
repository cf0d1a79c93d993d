import { describe, expect, test } from "vitest";
import { ArraySlice, StringIndex, Tuple } from "../src/interpreter/values";
import { captureError, evaluate } from "./utils";

class Opaque {}

function sliceElements(value: unknown): readonly unknown[] {
  if (!(value instanceof ArraySlice)) {
    throw new Error(`expected an ArraySlice, got ${String(value)}`);
  }
  return value.elements;
}

describe("Array subscripts", () => {
  test("should index arrays", () => {
    expect(evaluate("[10, 20, 30][1]")).toBe(20);
    expect(evaluate("[1, 2, 3][1.9]")).toBe(2);
  });

  test("should slice arrays with ranges", () => {
    expect(sliceElements(evaluate("[10, 20, 30][1...2]"))).toEqual([20, 30]);
    expect(sliceElements(evaluate("[1,2,3,4][1..<3]"))).toEqual([2, 3]);
    expect(sliceElements(evaluate("[1, 2, 3][1...]"))).toEqual([2, 3]);
    expect(sliceElements(evaluate("[1, 2, 3][...1]"))).toEqual([1, 2]);
    expect(sliceElements(evaluate("[1, 2, 3][..<2]"))).toEqual([1, 2]);
  });

  test("should index slices from zero", () => {
    expect(evaluate("[1, 2, 3, 4][1...3][0]")).toBe(2);
  });

  test("should report out of bounds indices", () => {
    expect(captureError(() => evaluate("[1, 2, 3][5]")).message).toBe(
      "Index 5 out of bounds for subscript operator []"
    );
    expect(captureError(() => evaluate("[1, 2, 3][-1]")).message).toBe(
      "Index -1 out of bounds for subscript operator []"
    );
  });

  test("should report the range bound that is out of bounds", () => {
    const error = captureError(() => evaluate("[1, 2, 3, 4][3..<5]"));
    expect(error.detail).toMatchObject({ kind: "arrayBounds", index: 4 });
    expect(captureError(() => evaluate("[1, 2][2...]")).detail).toMatchObject({ index: 2 });
  });

  test("should reject string positions", () => {
    const constants = { start: StringIndex.at(1), end: StringIndex.at(3) };
    expect(captureError(() => evaluate("[1, 2, 3][start..<end]", { constants })).message).toBe(
      "Attempted to subscript Array with incompatible index type HalfOpenRange"
    );
  });
});

describe("Ranges", () => {
  test("should reject inverted ranges", () => {
    expect(captureError(() => evaluate("3...1")).message).toBe(
      "Cannot form range with upperBound < lowerBound"
    );
    expect(captureError(() => evaluate("2..<2")).message).toBe(
      "Cannot form range with upperBound <= lowerBound"
    );
  });

  test("should reject mixed bound types", () => {
    const constants = { i: StringIndex.at(1) };
    expect(captureError(() => evaluate("i...3", { constants })).message).toBe(
      "Arguments of type (StringIndex, Number) are not compatible with infix operator ..."
    );
  });

  test("should print ranges", () => {
    expect(String(evaluate("1...3"))).toBe("1...3");
    expect(String(evaluate("..<2"))).toBe("..<2");
  });
});

describe("String subscripts", () => {
  test("should index characters", () => {
    expect(evaluate("'hello'[1]")).toBe("e");
    expect(evaluate("'héllo'[1]")).toBe("é");
    expect(evaluate("'a👍🏽b'[1]")).toBe("👍🏽");
  });

  test("should slice strings", () => {
    expect(evaluate("'hello'[1...3]")).toBe("ell");
    expect(evaluate("'hello'[3...]")).toBe("lo");
  });

  test("should accept string positions", () => {
    const constants = { s: "hello", i: StringIndex.at(1), j: StringIndex.at(3) };
    expect(evaluate("s[i]", { constants })).toBe("e");
    expect(evaluate("s[i..<j]", { constants })).toBe("el");
  });

  test("should report out of bounds characters", () => {
    expect(captureError(() => evaluate("'foo'[5]")).message).toBe(
      "Character index 5 out of bounds for string 'foo'"
    );
    expect(captureError(() => evaluate("'foo'[..<0]")).message).toBe(
      "Character index 0 out of bounds for string 'foo'"
    );
    expect(captureError(() => evaluate("'it\\'s'[9]")).message).toBe(
      "Character index 9 out of bounds for string 'it\\'s'"
    );
  });
});

describe("Dictionary subscripts", () => {
  test("should read plain object keys", () => {
    const constants = { user: { name: "test-user" } };
    expect(evaluate("user['name']", { constants })).toBe("test-user");
    expect(evaluate("user['missing']", { constants })).toBeNull();
  });

  test("should read map keys", () => {
    const constants = { scores: new Map([[1, "one"]]) };
    expect(evaluate("scores[1]", { constants })).toBe("one");
    expect(evaluate("scores[2]", { constants })).toBeNull();
    expect(evaluate("scores['x']", { constants })).toBeNull();
  });

  test("should read maps with mixed key types", () => {
    const constants = {
      m: new Map<unknown, string>([
        [1, "one"],
        ["x", "ex"],
      ]),
    };
    expect(evaluate("m['x']", { constants })).toBe("ex");
    expect(evaluate("m[1]", { constants })).toBe("one");
  });

  test("should match structural keys by value", () => {
    const tuples = { m: new Map([[new Tuple(1, 2), "pair"]]), k: new Tuple(1, 2) };
    expect(evaluate("m[k]", { constants: tuples })).toBe("pair");

    const arrays = { m: new Map([[[1, 2], "list"]]) };
    expect(evaluate("m[[1, 2]]", { constants: arrays })).toBe("list");
    expect(evaluate("m[[2, 1]]", { constants: arrays })).toBeNull();

    const positions = { m: new Map([[StringIndex.at(2), "two"]]), i: StringIndex.at(2) };
    expect(evaluate("m[i]", { constants: positions })).toBe("two");
  });

  test("should reject keys without structural equality", () => {
    const constants = { scores: new Map([[1, "one"]]), key: new Opaque() };
    expect(captureError(() => evaluate("scores[key]", { constants })).message).toBe(
      "Attempted to subscript scores with incompatible index type Opaque"
    );
  });
});

describe("Illegal subscripts", () => {
  test("should reject subscripting scalars", () => {
    expect(captureError(() => evaluate("5[1]")).message).toBe(
      "Attempted to subscript Number value 5"
    );
    expect(captureError(() => evaluate("n[0]", { constants: { n: 5 } })).message).toBe(
      "Attempted to subscript Number value n"
    );
  });
});

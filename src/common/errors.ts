// Expression Errors
// Error taxonomy shared by the parser, the evaluator and result projection.

import { stringify, typeName } from "../interpreter/values";
import { ExprSymbol, escapeString } from "./symbol";

/**
 * Error kinds raised while parsing or evaluating an expression.
 */
export type ErrorKind =
  | "unexpectedToken"
  | "undefinedSymbol"
  | "arityMismatch"
  | "typeMismatch"
  | "arrayBounds"
  | "stringBounds"
  | "invalidRange"
  | "illegalSubscript"
  | "resultTypeMismatch"
  | "message";

export type ErrorDetail =
  | { kind: "unexpectedToken"; token: string }
  | { kind: "undefinedSymbol"; symbol: ExprSymbol }
  | { kind: "arityMismatch"; symbol: ExprSymbol }
  | { kind: "typeMismatch"; symbol: ExprSymbol; args: readonly unknown[] }
  | { kind: "arrayBounds"; symbol: ExprSymbol; index: number }
  | { kind: "stringBounds"; string: string; index: number }
  | { kind: "invalidRange"; lower: number; upper: number }
  | { kind: "illegalSubscript"; symbol: ExprSymbol; value: unknown }
  | { kind: "resultTypeMismatch"; type: string; value: unknown }
  | { kind: "message"; message: string };

const subscriptOperator = ExprSymbol.infix("[]");
const equalsOperator = ExprSymbol.infix("==");

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

function describeArity(symbol: ExprSymbol): string {
  if (symbol.arity === "any") {
    return "at least 1 argument";
  }
  return symbol.arity === 1 ? "1 argument" : `${symbol.arity} arguments`;
}

function describeTypeMismatch(symbol: ExprSymbol, args: readonly unknown[]): string {
  const types = args.map(typeName);
  const [first, second] = types;
  const last = types[types.length - 1];
  if (symbol === subscriptOperator && types.length === 2) {
    return `Attempted to subscript ${first} with incompatible index type ${second}`;
  }
  if (symbol.kind === "array" && last !== undefined) {
    return `Attempted to subscript ${symbol.escapedName} with incompatible index type ${last}`;
  }
  if (symbol === equalsOperator && types.length === 2 && first === second) {
    return `Arguments for ${symbol} must be structurally comparable`;
  }
  if (types.length === 1) {
    return `Argument of type ${first} is not compatible with ${symbol}`;
  }
  return `Arguments of type (${types.join(", ")}) are not compatible with ${symbol}`;
}

/**
 * Render an error detail as a human-readable message.
 */
export function describeError(detail: ErrorDetail): string {
  switch (detail.kind) {
    case "unexpectedToken":
      return detail.token === ""
        ? "Unexpected end of expression"
        : `Unexpected token \`${detail.token}\``;
    case "undefinedSymbol":
      return `Undefined ${detail.symbol}`;
    case "arityMismatch":
      return `${capitalize(String(detail.symbol))} expects ${describeArity(detail.symbol)}`;
    case "typeMismatch":
      return describeTypeMismatch(detail.symbol, detail.args);
    case "arrayBounds":
      return `Index ${detail.index} out of bounds for ${detail.symbol}`;
    case "stringBounds":
      return `Character index ${detail.index} out of bounds for string '${escapeString(detail.string, "'")}'`;
    case "invalidRange":
      return `Cannot form range with upperBound ${detail.lower > detail.upper ? "<" : "<="} lowerBound`;
    case "illegalSubscript": {
      const shown =
        detail.symbol === subscriptOperator ? stringify(detail.value) : detail.symbol.escapedName;
      return `Attempted to subscript ${typeName(detail.value)} value ${shown}`;
    }
    case "resultTypeMismatch":
      return `Result type ${typeName(detail.value)} is not compatible with expected type ${detail.type}`;
    case "message":
      return detail.message;
  }
}

/**
 * ExpressionError is thrown when parsing or evaluating an expression fails.
 */
export class ExpressionError extends Error {
  readonly detail: ErrorDetail;

  constructor(detail: ErrorDetail) {
    super(describeError(detail));
    this.name = "ExpressionError";
    this.detail = detail;
  }

  get kind(): ErrorKind {
    return this.detail.kind;
  }

  static unexpectedToken(token: string): ExpressionError {
    return new ExpressionError({ kind: "unexpectedToken", token });
  }

  static undefinedSymbol(symbol: ExprSymbol): ExpressionError {
    return new ExpressionError({ kind: "undefinedSymbol", symbol });
  }

  static arityMismatch(symbol: ExprSymbol): ExpressionError {
    return new ExpressionError({ kind: "arityMismatch", symbol });
  }

  static typeMismatch(symbol: ExprSymbol, args: readonly unknown[]): ExpressionError {
    return new ExpressionError({ kind: "typeMismatch", symbol, args });
  }

  static arrayBounds(symbol: ExprSymbol, index: number): ExpressionError {
    return new ExpressionError({ kind: "arrayBounds", symbol, index });
  }

  static stringBounds(string: string, index: number): ExpressionError {
    return new ExpressionError({ kind: "stringBounds", string, index });
  }

  static invalidRange(lower: number, upper: number): ExpressionError {
    return new ExpressionError({ kind: "invalidRange", lower, upper });
  }

  static illegalSubscript(symbol: ExprSymbol, value: unknown): ExpressionError {
    return new ExpressionError({ kind: "illegalSubscript", symbol, value });
  }

  static resultTypeMismatch(type: string, value: unknown): ExpressionError {
    return new ExpressionError({ kind: "resultTypeMismatch", type, value });
  }

  static message(message: string): ExpressionError {
    return new ExpressionError({ kind: "message", message });
  }
}

/**
 * ParseError is thrown when expression text is malformed.
 */
export class ParseError extends ExpressionError {
  constructor(
    token: string,
    readonly offset: number
  ) {
    super({ kind: "unexpectedToken", token });
    this.name = "ParseError";
  }
}

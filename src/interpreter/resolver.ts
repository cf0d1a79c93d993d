// Symbol Resolution
// Chooses the evaluator for each symbol from caller lookups and the built-in library

import { ExpressionError } from "../common/errors";
import { scopedLogger } from "../common/logger";
import { ExprSymbol, isQuoted, unquote } from "../common/symbol";
import type { ChannelValue, ValueTable } from "./channel";
import { Dispatcher } from "./dispatcher";
import { logicalFunctions, standardFunctions } from "./functions";
import type { ChannelEvaluator, Purity, ResolvedEvaluator } from "./interpretable";
import { subscript } from "./subscript";

const log = scopedLogger("resolver");

/**
 * Caller-supplied evaluator over decoded host values.
 */
export type SymbolEvaluator = (args: unknown[]) => unknown;

/**
 * Lookup from a symbol to its evaluator, if the caller defines one.
 */
export type SymbolLookup = (symbol: ExprSymbol) => SymbolEvaluator | undefined;

/**
 * Construction options.
 *
 * - `boolSymbols`: register comparison, logical and ternary operators
 * - `pureSymbols`: allow caller operators and functions to be folded
 * - `noOptimize`: evaluate every node on every call
 */
export type Option = "boolSymbols" | "pureSymbols" | "noOptimize";

export const DefaultOptions: readonly Option[] = ["boolSymbols"];

/** Highest function arity probed when reporting arity mismatches. */
const MaxProbedArity = 10;

function noLookup(_symbol: ExprSymbol): SymbolEvaluator | undefined {
  return undefined;
}

/**
 * Adapt a caller evaluator to the value channel.
 */
function wrap(fn: SymbolEvaluator): ChannelEvaluator {
  return (args, table) => table.store(fn(args.map((arg) => table.load(arg))));
}

function failing(error: ExpressionError): ResolvedEvaluator {
  return {
    purity: "impure",
    evaluate: () => {
      throw error;
    },
  };
}

/**
 * Create the built-in dispatcher for a set of options.
 */
export function createDispatcher(options: ReadonlySet<Option>): Dispatcher {
  const dispatcher = new Dispatcher();
  dispatcher.add(...standardFunctions);
  if (options.has("boolSymbols")) {
    dispatcher.add(...logicalFunctions);
  }
  return dispatcher;
}

/**
 * SymbolResolver finds the evaluator for each symbol of an expression.
 *
 * Caller lookups win over built-ins, impure over pure. A subscripted name with
 * no evaluator of its own reads the variable of the same name and subscripts it.
 */
export class SymbolResolver {
  private readonly dispatcher: Dispatcher;
  private readonly cache = new Map<ExprSymbol, ResolvedEvaluator>();
  private readonly optimize: boolean;

  constructor(
    private readonly constants: ValueTable,
    private readonly impure: SymbolLookup,
    private readonly pure: SymbolLookup = noLookup,
    options: ReadonlySet<Option> = new Set(DefaultOptions)
  ) {
    this.dispatcher = createDispatcher(options);
    this.optimize = !options.has("noOptimize");
  }

  /**
   * Resolve a symbol. Unresolvable symbols get an evaluator that throws when run.
   */
  resolve(symbol: ExprSymbol): ResolvedEvaluator {
    const cached = this.cache.get(symbol);
    if (cached) {
      return cached;
    }
    const resolved =
      this.fromCaller(symbol) ??
      this.fromDispatcher(symbol) ??
      this.fromLiteral(symbol) ??
      this.unresolved(symbol);
    this.cache.set(symbol, resolved);
    return resolved;
  }

  private lookup(fn: SymbolLookup, symbol: ExprSymbol): SymbolEvaluator | undefined {
    const exact = fn(symbol);
    if (exact || symbol.kind !== "function" || symbol.arity === "any") {
      return exact;
    }
    return fn(ExprSymbol.function(symbol.name, "any"));
  }

  private fromCaller(symbol: ExprSymbol): ResolvedEvaluator | undefined {
    const variable = symbol.asVariable();

    const impure = this.lookup(this.impure, symbol);
    if (impure) {
      return { purity: "impure", evaluate: wrap(impure) };
    }
    const impureContainer = variable && this.impure(variable);
    if (impureContainer) {
      return {
        purity: "impure",
        evaluate: wrap(([index]) => subscript(symbol, impureContainer([]), index)),
      };
    }

    const pure = this.lookup(this.pure, symbol);
    if (pure) {
      return { purity: this.purity(), evaluate: wrap(pure) };
    }
    const pureContainer = variable && this.pure(variable);
    if (pureContainer) {
      return { purity: this.purity(), evaluate: wrap(this.subscriptOf(symbol, pureContainer)) };
    }
    return undefined;
  }

  private purity(): Purity {
    return this.optimize ? "pure" : "impure";
  }

  /**
   * Subscript evaluator over a pure container. With optimization on, the
   * container is read once, and a failure to read it is replayed on every call.
   */
  private subscriptOf(symbol: ExprSymbol, container: SymbolEvaluator): SymbolEvaluator {
    if (!this.optimize) {
      return ([index]) => subscript(symbol, container([]), index);
    }
    let read: { ok: true; value: unknown } | { ok: false; error: unknown };
    try {
      read = { ok: true, value: container([]) };
    } catch (error) {
      log.debug(`memoized failure reading ${symbol}`);
      read = { ok: false, error };
    }
    return ([index]) => {
      if (!read.ok) {
        throw read.error;
      }
      return subscript(symbol, read.value, index);
    };
  }

  private fromDispatcher(symbol: ExprSymbol): ResolvedEvaluator | undefined {
    const overload = this.dispatcher.find(symbol);
    if (!overload) {
      return undefined;
    }
    return {
      purity: "pure",
      evaluate: (args, table) => overload.invoke(args, table),
      inline: overload.kind === "channel" ? overload.inline : undefined,
    };
  }

  /**
   * String literals, and subscripts of string literals.
   */
  private fromLiteral(symbol: ExprSymbol): ResolvedEvaluator | undefined {
    if (!isQuoted(symbol.name)) {
      return undefined;
    }
    const text = unquote(symbol.name);
    if (symbol.kind === "variable") {
      const stored: ChannelValue = this.constants.store(text);
      return { purity: "pure", evaluate: () => stored };
    }
    if (symbol.kind === "array") {
      return {
        purity: "pure",
        evaluate: wrap(([index]) => subscript(symbol, text, index)),
      };
    }
    return undefined;
  }

  private isRegistered(symbol: ExprSymbol): boolean {
    return (
      this.impure(symbol) !== undefined ||
      this.pure(symbol) !== undefined ||
      this.dispatcher.has(symbol)
    );
  }

  private unresolved(symbol: ExprSymbol): ResolvedEvaluator {
    if (symbol.kind === "function") {
      for (let arity = 0; arity <= MaxProbedArity; arity++) {
        const candidate = ExprSymbol.function(symbol.name, arity);
        if (candidate !== symbol && this.isRegistered(candidate)) {
          log.debug(`${symbol} called with ${symbol.arity} arguments, registered with ${arity}`);
          return failing(ExpressionError.arityMismatch(candidate));
        }
      }
    }
    if (symbol.kind === "infix" && symbol.name === ",") {
      return failing(ExpressionError.unexpectedToken(","));
    }
    return failing(ExpressionError.undefinedSymbol(symbol));
  }
}

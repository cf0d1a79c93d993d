// Expression API
// Builds an optimized, reusable expression and evaluates it

import { scopedLogger } from "./common/logger";
import type { ExprSymbol } from "./common/symbol";
import { ValueTable } from "./interpreter/channel";
import { CallValue, ErrorValue, type Interpretable } from "./interpreter/interpretable";
import {
  DefaultOptions,
  type Option,
  type SymbolEvaluator,
  type SymbolLookup,
  SymbolResolver,
} from "./interpreter/resolver";
import { subscript } from "./interpreter/subscript";
import { type ResultType, project } from "./interpreter/types";
import { detach } from "./interpreter/values";
import { type ParsedExpression, parse } from "./parser";
import { Planner, PostOptimizer, defaultPostPasses } from "./planner";

const log = scopedLogger("expression");

/**
 * Construction from named constants and a symbol table.
 */
export interface ExpressionInit {
  options?: readonly Option[];
  /** Values bound by name. Constants shadow symbols of the same name. */
  constants?: Readonly<Record<string, unknown>>;
  symbols?: ReadonlyMap<ExprSymbol, SymbolEvaluator>;
}

/**
 * Construction from raw lookup functions.
 */
export interface ResolverInit {
  options?: readonly Option[];
  impure: SymbolLookup;
  pure?: SymbolLookup;
}

/**
 * Lookups over constants and a symbol table.
 *
 * Variables and subscripted names come from the constants first. Other symbols
 * are impure, unless `pureSymbols` makes them fold-eligible.
 */
function tableLookups(
  constants: Readonly<Record<string, unknown>>,
  symbols: ReadonlyMap<ExprSymbol, SymbolEvaluator>,
  options: ReadonlySet<Option>
): { impure: SymbolLookup; pure: SymbolLookup } {
  const pureSymbols = options.has("pureSymbols");
  const hasConstant = (name: string) => Object.hasOwn(constants, name);

  const impure: SymbolLookup = (symbol) => {
    switch (symbol.kind) {
      case "variable":
      case "array":
        return hasConstant(symbol.name) ? undefined : symbols.get(symbol);
      default:
        return pureSymbols ? undefined : symbols.get(symbol);
    }
  };
  const pure: SymbolLookup = (symbol) => {
    switch (symbol.kind) {
      case "variable": {
        if (!hasConstant(symbol.name)) {
          return undefined;
        }
        const value = constants[symbol.name];
        return () => value;
      }
      case "array": {
        if (!hasConstant(symbol.name)) {
          return undefined;
        }
        const value = constants[symbol.name];
        return ([index]) => subscript(symbol, value, index);
      }
      default:
        return pureSymbols ? symbols.get(symbol) : undefined;
    }
  };
  return { impure, pure };
}

function isResolverInit(init: ExpressionInit | ResolverInit): init is ResolverInit {
  return "impure" in init;
}

/**
 * Expression is a parsed, resolved and optimized formula, evaluated on demand.
 *
 * @example
 * ```ts
 * const expr = new Expression("price * (1 + tax)", {
 *   constants: { tax: 0.2 },
 *   symbols: new Map([[ExprSymbol.variable("price"), () => 10]]),
 * });
 * expr.evaluate(Types.number); // 12
 * ```
 */
export class Expression {
  /** The tree as parsed, before optimization. */
  readonly parsed: ParsedExpression;
  /** Symbols still evaluated at run time after optimization. */
  readonly symbols: ReadonlySet<ExprSymbol>;

  private readonly root: Interpretable;
  private readonly constants = new ValueTable();

  constructor(source: string | ParsedExpression, init: ExpressionInit | ResolverInit = {}) {
    this.parsed = typeof source === "string" ? parse(source) : source;
    const options = new Set(init.options ?? DefaultOptions);
    const lookups = isResolverInit(init)
      ? init
      : tableLookups(
          init.constants ?? {},
          init.symbols ?? new Map<ExprSymbol, SymbolEvaluator>(),
          options
        );

    const resolver = new SymbolResolver(this.constants, lookups.impure, lookups.pure, options);
    const planned = new Planner({ resolver }).plan(this.parsed.root);
    if (options.has("noOptimize")) {
      log.debug(`optimizer disabled for ${this.parsed.description}`);
      this.root = planned;
    } else {
      this.root = new PostOptimizer(defaultPostPasses(this.constants)).optimize(planned);
    }
    this.constants.seal();
    this.symbols = remainingSymbols(this.root);
  }

  /**
   * Build an expression from raw lookups.
   */
  static withResolvers(
    source: string | ParsedExpression,
    impure: SymbolLookup,
    pure?: SymbolLookup,
    options?: readonly Option[]
  ): Expression {
    return new Expression(source, { impure, pure, options });
  }

  /** Canonical print of the expression as parsed. */
  get description(): string {
    return this.parsed.description;
  }

  /** Number of values held for the life of the expression. */
  get tableLength(): number {
    return this.constants.length;
  }

  /**
   * Evaluate the expression, optionally projecting the result to a type.
   *
   * Arrays, slices, tuples and dictionaries in the result are fresh copies, so
   * mutating them cannot reach folded constants or a later evaluation.
   *
   * @throws ExpressionError when evaluation or projection fails.
   */
  evaluate(): unknown;
  evaluate<T>(type: ResultType<T>): T;
  evaluate<T>(type?: ResultType<T>): unknown {
    const scratch = this.constants.scratch();
    const value = detach(scratch.load(this.root.eval(scratch)));
    return type ? project(type, value) : value;
  }

  toString(): string {
    return this.description;
  }
}

function remainingSymbols(root: Interpretable): Set<ExprSymbol> {
  const symbols = new Set<ExprSymbol>();
  const visit = (node: Interpretable): void => {
    if (node instanceof CallValue) {
      symbols.add(node.symbol);
      node.args.forEach(visit);
    } else if (node instanceof ErrorValue) {
      symbols.add(node.symbol);
    }
  };
  visit(root);
  return symbols;
}

/**
 * Build an expression.
 */
export function build(
  source: string | ParsedExpression,
  init?: ExpressionInit | ResolverInit
): Expression {
  return new Expression(source, init);
}

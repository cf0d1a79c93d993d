// Expression Symbols
// Interned identifiers for the dispatch slots of an expression

export type SymbolKind = "variable" | "array" | "infix" | "prefix" | "postfix" | "function";

/**
 * Function arity: an exact argument count, or "any" for variadic registrations.
 */
export type Arity = number | "any";

const identifierHead = /^[\p{L}_$#@]/u;
const identifierBody = /^[\p{L}\p{N}_$#@]+(?:\.[\p{L}\p{N}_$#@]+)*$/u;
const operatorChars = /^[/=\-+!*%<>&|^~?:.\p{Sm}]+$/u;

/**
 * Escape the body of a quoted literal so it reads back as the same text.
 */
export function escapeString(text: string, quote: string): string {
  let out = "";
  for (const char of text) {
    switch (char) {
      case "\\":
        out += "\\\\";
        break;
      case "\n":
        out += "\\n";
        break;
      case "\r":
        out += "\\r";
        break;
      case "\t":
        out += "\\t";
        break;
      case "\0":
        out += "\\0";
        break;
      default:
        out += char === quote ? `\\${char}` : char;
    }
  }
  return out;
}

/**
 * Whether a name is a quoted string literal disguised as a variable.
 */
export function isQuoted(name: string): boolean {
  const first = name[0];
  return name.length >= 2 && (first === "'" || first === '"') && name.endsWith(first);
}

/**
 * Strip the quotes from a quoted literal name.
 */
export function unquote(name: string): string {
  return name.slice(1, -1);
}

/**
 * ExprSymbol identifies a callable position in an expression.
 *
 * Instances are interned, so two symbols with the same kind, name and arity are
 * the same object and can key a Map or Set directly.
 */
export class ExprSymbol {
  private static readonly interned = new Map<string, ExprSymbol>();

  private constructor(
    readonly kind: SymbolKind,
    readonly name: string,
    readonly arity: Arity,
    readonly key: string
  ) {}

  private static intern(kind: SymbolKind, name: string, arity: Arity): ExprSymbol {
    const key = `${kind}/${arity}/${name}`;
    const existing = ExprSymbol.interned.get(key);
    if (existing) {
      return existing;
    }
    const symbol = new ExprSymbol(kind, name, arity, key);
    ExprSymbol.interned.set(key, symbol);
    return symbol;
  }

  static variable(name: string): ExprSymbol {
    return ExprSymbol.intern("variable", name, 0);
  }

  /** A variable that is immediately subscripted, as in `name[index]`. */
  static array(name: string): ExprSymbol {
    return ExprSymbol.intern("array", name, 1);
  }

  static infix(name: string): ExprSymbol {
    return ExprSymbol.intern("infix", name, name === "?:" ? 3 : 2);
  }

  static prefix(name: string): ExprSymbol {
    return ExprSymbol.intern("prefix", name, 1);
  }

  static postfix(name: string): ExprSymbol {
    return ExprSymbol.intern("postfix", name, 1);
  }

  static function(name: string, arity: Arity): ExprSymbol {
    if (arity !== "any" && (!Number.isInteger(arity) || arity < 0)) {
      throw new RangeError(`invalid function arity: ${arity}`);
    }
    return ExprSymbol.intern("function", name, arity);
  }

  /**
   * The variable symbol sharing this symbol's name, for `array` symbols.
   */
  asVariable(): ExprSymbol | undefined {
    return this.kind === "array" ? ExprSymbol.variable(this.name) : undefined;
  }

  /**
   * The name as it would be written in source text.
   */
  get escapedName(): string {
    if (isQuoted(this.name)) {
      const quote = this.name.charAt(0);
      return `${quote}${escapeString(unquote(this.name), quote)}${quote}`;
    }
    if (identifierHead.test(this.name) && identifierBody.test(this.name)) {
      return this.name;
    }
    if (this.kind !== "variable" && this.kind !== "array" && operatorChars.test(this.name)) {
      return this.name;
    }
    if (this.name === "[]" || this.name === ",") {
      return this.name;
    }
    return `\`${this.name}\``;
  }

  toString(): string {
    switch (this.kind) {
      case "variable":
        return `variable ${this.escapedName}`;
      case "array":
        return `array ${this.escapedName}[]`;
      case "infix":
        if (this.name === "?:") {
          return `ternary operator ${this.escapedName}`;
        }
        if (this.name === "[]") {
          return `subscript operator ${this.escapedName}`;
        }
        return `infix operator ${this.escapedName}`;
      case "prefix":
        return `prefix operator ${this.escapedName}`;
      case "postfix":
        return `postfix operator ${this.escapedName}`;
      case "function":
        return `function ${this.escapedName}()`;
    }
  }
}

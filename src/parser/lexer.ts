// Expression Lexer
// Splits source text into number, string, identifier, operator and punctuation tokens.

import { ParseError } from "../common/errors";

export type TokenKind = "number" | "string" | "identifier" | "operator" | "punctuation" | "eof";

export interface Token {
  kind: TokenKind;
  /** Source spelling, or the unescaped contents for string tokens. */
  text: string;
  /** Numeric value for number tokens. */
  value: number;
  /** Quote character for string tokens. */
  quote: "'" | '"' | undefined;
  offset: number;
  spaceBefore: boolean;
  spaceAfter: boolean;
}

const identifierHead = /[\p{L}_$#@]/u;
const identifierBody = /[\p{L}\p{N}_$#@]/u;
const operatorChar = /[/=\-+!*%<>&|^~?:.\p{Sm}]/u;
const digit = /[0-9]/;
const whitespace = /\s/u;
const punctuation = new Set(["(", ")", "[", "]", ","]);
const splittable = new Set(["-", "+", "!", "~"]);

const radixDigits: Record<string, RegExp> = {
  x: /[0-9a-fA-F]/,
  o: /[0-7]/,
  b: /[01]/,
};

/**
 * Lexer turns expression text into a token list ending in an `eof` token.
 */
export class Lexer {
  private readonly chars: string[];
  private position = 0;

  constructor(source: string) {
    this.chars = Array.from(source);
  }

  /**
   * Tokenize the whole source.
   */
  tokenize(): Token[] {
    const tokens: Token[] = [];
    for (;;) {
      const spaceBefore = this.skipWhitespace();
      const previous = tokens[tokens.length - 1];
      if (previous) {
        previous.spaceAfter = spaceBefore;
      }
      const token = this.next(spaceBefore);
      tokens.push(token);
      if (token.kind === "eof") {
        return tokens;
      }
    }
  }

  private peek(ahead = 0): string {
    return this.chars[this.position + ahead] ?? "";
  }

  private skipWhitespace(): boolean {
    const start = this.position;
    while (this.peek() !== "" && whitespace.test(this.peek())) {
      this.position++;
    }
    return this.position > start;
  }

  private token(
    kind: TokenKind,
    text: string,
    offset: number,
    spaceBefore: boolean,
    value = 0,
    quote?: "'" | '"'
  ): Token {
    return { kind, text, value, quote, offset, spaceBefore, spaceAfter: false };
  }

  private next(spaceBefore: boolean): Token {
    const offset = this.position;
    const char = this.peek();
    if (char === "") {
      return this.token("eof", "", offset, spaceBefore);
    }
    if (punctuation.has(char)) {
      this.position++;
      return this.token("punctuation", char, offset, spaceBefore);
    }
    if (digit.test(char)) {
      return this.readNumber(offset, spaceBefore);
    }
    if (char === "'" || char === '"') {
      return this.readString(char, offset, spaceBefore);
    }
    if (identifierHead.test(char)) {
      return this.readIdentifier(offset, spaceBefore);
    }
    if (operatorChar.test(char)) {
      return this.readOperator(offset, spaceBefore);
    }
    throw new ParseError(char, offset);
  }

  private readNumber(offset: number, spaceBefore: boolean): Token {
    const radix = radixDigits[this.peek(1)];
    if (this.peek() === "0" && radix) {
      const prefix = this.peek(1);
      this.position += 2;
      let body = "";
      while (radix.test(this.peek())) {
        body += this.peek();
        this.position++;
      }
      if (body === "") {
        throw new ParseError(`0${prefix}`, offset);
      }
      return this.token("number", `0${prefix}${body}`, offset, spaceBefore, Number(`0${prefix}${body}`));
    }

    let text = this.readDigits();
    if (this.peek() === "." && digit.test(this.peek(1))) {
      this.position++;
      text += `.${this.readDigits()}`;
    }
    if (this.peek() === "e" || this.peek() === "E") {
      const sign = this.peek(1) === "+" || this.peek(1) === "-" ? this.peek(1) : "";
      if (digit.test(this.peek(sign === "" ? 1 : 2))) {
        this.position += sign === "" ? 1 : 2;
        text += `e${sign}${this.readDigits()}`;
      }
    }
    if (identifierHead.test(this.peek())) {
      throw new ParseError(`${text}${this.peek()}`, offset);
    }
    return this.token("number", text, offset, spaceBefore, Number(text));
  }

  private readDigits(): string {
    let text = "";
    while (digit.test(this.peek())) {
      text += this.peek();
      this.position++;
    }
    return text;
  }

  private readString(quote: "'" | '"', offset: number, spaceBefore: boolean): Token {
    this.position++;
    let text = "";
    for (;;) {
      const char = this.peek();
      if (char === "") {
        throw new ParseError(`${quote}${text}`, offset);
      }
      this.position++;
      if (char === quote) {
        return this.token("string", text, offset, spaceBefore, 0, quote);
      }
      if (char !== "\\") {
        text += char;
        continue;
      }
      text += this.readEscape(offset);
    }
  }

  private readEscape(offset: number): string {
    const char = this.peek();
    this.position++;
    switch (char) {
      case "n":
        return "\n";
      case "r":
        return "\r";
      case "t":
        return "\t";
      case "0":
        return "\0";
      case "\\":
      case "'":
      case '"':
        return char;
      case "u": {
        if (this.peek() !== "{") {
          throw new ParseError("\\u", offset);
        }
        this.position++;
        let hex = "";
        while (/[0-9a-fA-F]/.test(this.peek())) {
          hex += this.peek();
          this.position++;
        }
        const code = Number.parseInt(hex, 16);
        if (this.peek() !== "}" || hex === "" || code > 0x10ffff) {
          throw new ParseError(`\\u{${hex}`, offset);
        }
        this.position++;
        return String.fromCodePoint(code);
      }
      default:
        throw new ParseError(`\\${char}`, offset);
    }
  }

  private readIdentifier(offset: number, spaceBefore: boolean): Token {
    let text = "";
    for (;;) {
      const char = this.peek();
      if (char !== "" && identifierBody.test(char)) {
        text += char;
        this.position++;
        continue;
      }
      // `user.name` is one identifier, `a...b` is not
      const following = this.peek(1);
      if (char === "." && following !== "" && identifierBody.test(following)) {
        text += char;
        this.position++;
        continue;
      }
      return this.token("identifier", text, offset, spaceBefore);
    }
  }

  private readOperator(offset: number, spaceBefore: boolean): Token {
    let text = "";
    while (this.peek() !== "" && operatorChar.test(this.peek())) {
      text += this.peek();
      this.position++;
    }
    // `a*-b` reads as `a * -b`
    const last = text.charAt(text.length - 1);
    if (text.length > 1 && splittable.has(last) && this.startsOperand(this.peek())) {
      text = text.slice(0, -1);
      this.position--;
    }
    return this.token("operator", text, offset, spaceBefore);
  }

  private startsOperand(char: string): boolean {
    return (
      char !== "" &&
      (digit.test(char) ||
        identifierHead.test(char) ||
        char === "'" ||
        char === '"' ||
        char === "(" ||
        char === "[")
    );
  }
}

/**
 * Tokenize expression text.
 */
export function tokenize(source: string): Token[] {
  return new Lexer(source).tokenize();
}

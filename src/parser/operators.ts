// Operator precedence table shared by the parser and the emitter.
// Operators are not a closed set: anything the lexer reads as an operator run is
// accepted, and names that are not listed here parse at additive precedence.

/** Binding strength of each operator group, higher binds tighter. */
export const Precedence = {
  Comma: 0,
  Assignment: 1,
  Ternary: 2,
  LogicalOr: 3,
  LogicalAnd: 4,
  Comparison: 5,
  Coalescing: 6,
  Range: 7,
  Additive: 8,
  Multiplicative: 9,
  Shift: 10,
  Prefix: 11,
  Postfix: 12,
  Primary: 13,
} as const;

export interface InfixOperatorInfo {
  precedence: number;
  rightAssociative: boolean;
}

const comparisonOperators = new Set(["==", "!=", "===", "!==", "<", "<=", ">", ">="]);

const infixTable: Record<string, InfixOperatorInfo> = {
  ",": { precedence: Precedence.Comma, rightAssociative: false },
  "?:": { precedence: Precedence.Ternary, rightAssociative: true },
  "||": { precedence: Precedence.LogicalOr, rightAssociative: false },
  "&&": { precedence: Precedence.LogicalAnd, rightAssociative: false },
  "??": { precedence: Precedence.Coalescing, rightAssociative: true },
  "...": { precedence: Precedence.Range, rightAssociative: false },
  "..<": { precedence: Precedence.Range, rightAssociative: false },
  "+": { precedence: Precedence.Additive, rightAssociative: false },
  "-": { precedence: Precedence.Additive, rightAssociative: false },
  "|": { precedence: Precedence.Additive, rightAssociative: false },
  "^": { precedence: Precedence.Additive, rightAssociative: false },
  "*": { precedence: Precedence.Multiplicative, rightAssociative: false },
  "/": { precedence: Precedence.Multiplicative, rightAssociative: false },
  "%": { precedence: Precedence.Multiplicative, rightAssociative: false },
  "&": { precedence: Precedence.Multiplicative, rightAssociative: false },
  "<<": { precedence: Precedence.Shift, rightAssociative: false },
  ">>": { precedence: Precedence.Shift, rightAssociative: false },
  "[]": { precedence: Precedence.Postfix, rightAssociative: false },
};

/**
 * Look up the precedence and associativity of an infix operator.
 */
export function infixOperator(name: string): InfixOperatorInfo {
  const known = infixTable[name];
  if (known) {
    return known;
  }
  if (comparisonOperators.has(name)) {
    return { precedence: Precedence.Comparison, rightAssociative: false };
  }
  if (name.endsWith("=")) {
    return { precedence: Precedence.Assignment, rightAssociative: true };
  }
  return { precedence: Precedence.Additive, rightAssociative: false };
}

import { Expression, ExpressionError, ParseError } from "../src";

try {
  new Expression("x +");
} catch (err) {
  if (err instanceof ParseError) {
    console.info("Parse error:", err.message, "at offset", err.offset);
  }
}

const expr = new Expression("[1, 2, 3][index]", { constants: { index: 5 } });
try {
  expr.evaluate();
} catch (err) {
  if (err instanceof ExpressionError) {
    console.info(`${err.kind}:`, err.message);
  }
}

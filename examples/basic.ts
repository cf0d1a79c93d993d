import { ExprSymbol, Expression, Types } from "../src";

let count = 0;
const expr = new Expression("'Hello ' + name + '! (' + (count + 1) + ')'", {
  constants: { name: "world" },
  symbols: new Map([[ExprSymbol.variable("count"), () => count]]),
});

count = 41;
console.info(expr.evaluate(Types.string));
console.info("Run-time symbols:", Array.from(expr.symbols, String).join(", "));

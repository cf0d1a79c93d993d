// Optimizer Pass
// Constant folding for pure calls with constant arguments.

import { scopedLogger } from "../../common/logger";
import { Rewriter } from "../../common/rewriter";
import { type ChannelValue, type ValueTable, channelKey } from "../../interpreter/channel";
import {
  CallValue,
  ConstValue,
  ErrorValue,
  type Interpretable,
} from "../../interpreter/interpretable";
import type { PostOptimizerPass } from "../optimizer";

const log = scopedLogger("optimizer");

/**
 * Pass that evaluates pure calls whose arguments are all constants.
 *
 * Results, failures included, are memoized by symbol and argument values, so
 * a pure evaluator runs at most once per distinct constant argument list.
 */
export class ConstantCallFoldPass implements PostOptimizerPass {
  private readonly rewriter = new Rewriter();
  private readonly memo = new Map<string, Interpretable>();

  constructor(private readonly table: ValueTable) {}

  /**
   * Fold constant calls within the tree.
   *
   * @example
   * ```ts
   * // 3 * 5 -> 15
   * // 'foo' + 'bar' -> 'foobar'
   * // pow(4) -> error node, thrown on every evaluation
   * ```
   */
  run(root: Interpretable): Interpretable {
    return this.rewriter.rewrite(root, (node) => this.tryFoldCall(node));
  }

  private tryFoldCall(node: Interpretable): Interpretable {
    if (!(node instanceof CallValue) || !node.isPure) {
      return node;
    }
    const values: ChannelValue[] = [];
    for (const arg of node.args) {
      if (!(arg instanceof ConstValue)) {
        return node;
      }
      values.push(arg.value);
    }
    const key = [node.symbol.key, ...values.map(channelKey)].join("\u0000");
    const memoized = this.memo.get(key);
    if (memoized) {
      return memoized;
    }
    let folded: Interpretable;
    try {
      folded = new ConstValue(node.evaluator.evaluate(values, this.table));
      log.debug(`folded ${node.symbol}`);
    } catch (error) {
      log.debug(`memoized failure of ${node.symbol}`);
      folded = new ErrorValue(node.symbol, error);
    }
    this.memo.set(key, folded);
    return folded;
  }
}

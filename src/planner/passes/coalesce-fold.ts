// Optimizer Pass
// Inlines `??` when its left operand is already known.

import { Rewriter } from "../../common/rewriter";
import { ChannelRef } from "../../interpreter/channel";
import { CallValue, ConstValue, type Interpretable } from "../../interpreter/interpretable";
import type { PostOptimizerPass } from "../optimizer";

/**
 * Pass that replaces `lhs ?? rhs` by one of its operands when `lhs` is constant.
 */
export class CoalesceFoldPass implements PostOptimizerPass {
  private readonly rewriter = new Rewriter();

  /**
   * @example
   * ```ts
   * // nil ?? foo -> foo
   * // 5 ?? foo -> 5
   * ```
   */
  run(root: Interpretable): Interpretable {
    return this.rewriter.rewrite(root, (node) => this.tryInline(node));
  }

  private tryInline(node: Interpretable): Interpretable {
    if (!(node instanceof CallValue) || node.evaluator.inline !== "coalesce") {
      return node;
    }
    const [lhs, rhs] = node.args;
    if (!(lhs instanceof ConstValue) || rhs === undefined || node.args.length !== 2) {
      return node;
    }
    return lhs.value === ChannelRef.NIL ? rhs : lhs;
  }
}

import type { ValueTable } from "../interpreter/channel";
import type { Interpretable } from "../interpreter/interpretable";
import { CoalesceFoldPass } from "./passes/coalesce-fold";
import { ConstantCallFoldPass } from "./passes/constant-call-fold";

/**
 * Post-plan optimizer pass that rewrites interpretable nodes.
 */
export interface PostOptimizerPass {
  /**
   * Apply this pass to the Interpretable tree.
   */
  run(root: Interpretable): Interpretable;
}

/**
 * PostOptimizer applies a sequence of optimization passes to an Interpretable.
 *
 * The pipeline repeats until a full round leaves the tree unchanged, since
 * inlining a `??` can make its parent foldable.
 */
export class PostOptimizer {
  private readonly passes: PostOptimizerPass[];

  constructor(passes: PostOptimizerPass[]) {
    this.passes = passes;
  }

  /**
   * Run the configured passes in order.
   */
  optimize(root: Interpretable): Interpretable {
    let current = root;
    for (;;) {
      const next = this.passes.reduce((tree, pass) => pass.run(tree), current);
      if (next === current) {
        return next;
      }
      current = next;
    }
  }
}

/**
 * Default post-plan optimizer pass pipeline. Folded values are stored in `table`.
 */
export function defaultPostPasses(table: ValueTable): PostOptimizerPass[] {
  return [new ConstantCallFoldPass(table), new CoalesceFoldPass()];
}

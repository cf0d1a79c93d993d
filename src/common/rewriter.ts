// Interpretable Rewriter
// Walks planned nodes bottom-up and rebuilds modified subtrees.

import { CallValue, type Interpretable } from "../interpreter/interpretable";

/**
 * Rewriter walks an interpretable tree and rebuilds any nodes that change.
 *
 * Children are rewritten before their parent, so a rule sees arguments that
 * are already in their final form. Unchanged subtrees keep their identity.
 */
export class Rewriter {
  rewrite(
    node: Interpretable,
    rewriteNode: (node: Interpretable) => Interpretable
  ): Interpretable {
    if (!(node instanceof CallValue)) {
      return rewriteNode(node);
    }
    let changed = false;
    const args = node.args.map((arg) => {
      const next = this.rewrite(arg, rewriteNode);
      if (next !== arg) {
        changed = true;
      }
      return next;
    });
    return rewriteNode(changed ? node.withArgs(args) : node);
  }
}

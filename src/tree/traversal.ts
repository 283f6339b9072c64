/**
 * traversal.ts — Read-only walks over a built lineage tree.
 *
 * Walks use an explicit stack so arbitrarily deep taxonomies cannot overflow
 * the call stack.
 */

import type { LineageNode, LineageTree } from '../types.js'

/** Pre-order walk (node, then its children in order). */
export function walkTree(start: LineageNode): LineageNode[] {
  const out: LineageNode[] = []
  const stack: LineageNode[] = [start]
  while (stack.length > 0) {
    const node = stack.pop()
    if (node === undefined) break
    out.push(node)
    for (let i = node.children.length - 1; i >= 0; i--) {
      const child = node.children[i]
      if (child) stack.push(child)
    }
  }
  return out
}

/** All strict descendants of `node`, pre-order. */
export function descendantsOf(node: LineageNode): LineageNode[] {
  return walkTree(node).slice(1)
}

/** Parent node, or null for the root. */
export function parentOf(tree: LineageTree, node: LineageNode): LineageNode | null {
  if (node.parent === node.name) return null
  return tree.index.get(node.parent) ?? null
}

/** Strict ancestors of `node`, nearest first, ending with the root. */
export function ancestorsOf(tree: LineageTree, node: LineageNode): LineageNode[] {
  const out: LineageNode[] = []
  let current = parentOf(tree, node)
  while (current !== null) {
    out.push(current)
    current = parentOf(tree, current)
  }
  return out
}

/** True if `ancestor` lies strictly above `node`. */
export function isStrictAncestor(tree: LineageTree, ancestor: LineageNode, node: LineageNode): boolean {
  return ancestorsOf(tree, node).some((a) => a.lindex === ancestor.lindex)
}

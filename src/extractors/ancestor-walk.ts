/**
 * Minimal view of a markup tree node: a parent link and its rendered text.
 * Keeps the ancestor walk independent of the HTML library that built the tree.
 */
export interface TreeNode {
  readonly parent: TreeNode | null;
  textContent(): string;
}

export const DEFAULT_MAX_ANCESTOR_LEVELS = 5;

/**
 * Climb from the node's parent, at most `maxLevels` levels, and return the first
 * match of `pattern` in the nearest ancestor whose text contains one.
 */
export function findInAncestors(
  node: TreeNode,
  pattern: RegExp,
  maxLevels: number = DEFAULT_MAX_ANCESTOR_LEVELS
): string | null {
  let current = node.parent;

  for (let level = 0; level < maxLevels && current; level++) {
    const match = current.textContent().match(pattern);
    if (match) {
      return match[0];
    }
    current = current.parent;
  }

  return null;
}

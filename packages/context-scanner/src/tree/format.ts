/**
 * Tree rendering
 */

import type { TreeNode } from '../types/index.js';

export const TREE_INDENT = '│   ';
export const TREE_CONNECTOR = '├── ';
export const DIRECTORY_MARKER = '/';

/**
 * One line per node, indented by depth; directories end with `/`
 */
export function formatTree(tree: TreeNode): string[] {
  const lines: string[] = [];

  const render = (node: TreeNode, depth: number): void => {
    for (const [name, child] of node) {
      const marker = child === null ? '' : DIRECTORY_MARKER;
      lines.push(`${TREE_INDENT.repeat(depth)}${TREE_CONNECTOR}${name}${marker}`);
      if (child !== null) {
        render(child, depth + 1);
      }
    }
  };

  render(tree, 0);
  return lines;
}

import type { ChangeType, DiffPayload, SortColumn, SortOptions } from '@changetree/shared';
import type { PathTree, PathTreeNode } from '../tree/pathTree';
import { joinPath, type PathLike } from '../tree/paths';

/**
 * Rank of each change type when sorting by change.
 * Unchanged directories sort together with modified entries.
 */
export const CHANGE_ORDER: Readonly<Record<ChangeType, number>> = {
  added: 1,
  none: 2,
  modified: 2,
  removed: 3,
};

export type SortKey = string | number;

type DiffNode = PathTreeNode<DiffPayload>;

export function sortKey(tree: PathTree<DiffPayload>, node: DiffNode, column: SortColumn): SortKey {
  switch (column) {
    case 'name':
      return nameKey(tree, node);
    case 'change':
      return CHANGE_ORDER[node.payload?.change ?? 'none'];
    case 'size':
      return node.payload?.sizeDelta ?? 0;
  }
}

function nameKey(tree: PathTree<DiffPayload>, node: DiffNode): string {
  switch (tree.getMode()) {
    case 'flat':
      return joinPath(node.path);
    case 'simplified': {
      // first segment below the displayed parent
      const parent = tree.parentOf(node.path);
      return node.path[parent ? parent.path.length : 0] ?? node.segment;
    }
    case 'tree':
      return node.segment;
  }
}

function compareKeys(a: SortKey, b: SortKey): number {
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  return String(a).localeCompare(String(b));
}

/**
 * Compare two rows under the tree's current mode. With `foldersOnTop`,
 * rows that have children come first in either order.
 */
export function compareNodes(
  tree: PathTree<DiffPayload>,
  a: DiffNode,
  b: DiffNode,
  options: SortOptions
): number {
  if (options.foldersOnTop) {
    const aHasChildren = a.children.length > 0;
    const bHasChildren = b.children.length > 0;
    if (aHasChildren !== bHasChildren) {
      return aHasChildren ? -1 : 1;
    }
  }

  const result =
    compareKeys(sortKey(tree, a, options.column), sortKey(tree, b, options.column)) ||
    joinPath(a.path).localeCompare(joinPath(b.path));

  return options.order === 'asc' ? result : -result;
}

/**
 * Rows displayed under `parentPath`, sorted
 */
export function sortedChildren(
  tree: PathTree<DiffPayload>,
  parentPath: PathLike,
  options: SortOptions
): DiffNode[] {
  const rows: DiffNode[] = [];
  const count = tree.rowCount(parentPath);

  for (let row = 0; row < count; row++) {
    const node = tree.childAt(parentPath, row);
    if (node) rows.push(node);
  }

  return rows.sort((a, b) => compareNodes(tree, a, b, options));
}

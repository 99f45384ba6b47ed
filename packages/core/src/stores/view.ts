import { createStore } from 'zustand/vanilla';
import type { DiffPayload, DisplayMode, SortColumn, SortOrder } from '@changetree/shared';
import type { DiffTree } from '../diff/diffTree';
import type { PathTreeNode } from '../tree/pathTree';
import { joinPath } from '../tree/paths';
import { sortedChildren } from '../sort/sortPolicy';

export interface ViewPreferences {
  mode: DisplayMode;
  sortColumn: SortColumn;
  sortOrder: SortOrder;
  foldersOnTop: boolean;
}

export interface ViewState extends ViewPreferences {
  expandedDirs: Set<string>;

  // Actions
  setMode: (mode: DisplayMode) => void;
  setSort: (column: SortColumn, order?: SortOrder) => void;
  toggleSortOrder: () => void;
  setFoldersOnTop: (value: boolean) => void;
  toggleDir: (path: string) => void;
  expandDir: (path: string) => void;
  collapseDir: (path: string) => void;
  expandAll: () => void;
  collapseAll: () => void;
}

export interface ViewRow {
  node: PathTreeNode<DiffPayload>;
  depth: number;
  name: string;
  expandable: boolean;
  expanded: boolean;
}

const DEFAULT_PREFERENCES: ViewPreferences = {
  mode: 'tree',
  sortColumn: 'name',
  sortOrder: 'asc',
  foldersOnTop: false,
};

/**
 * Presentation state for one diff tree. Changing the mode here switches
 * the tree's projection as well.
 */
export function createViewStore(tree: DiffTree, initial: Partial<ViewPreferences> = {}) {
  const preferences = { ...DEFAULT_PREFERENCES, ...initial };
  tree.setMode(preferences.mode);

  return createStore<ViewState>()((set) => ({
    ...preferences,
    expandedDirs: new Set<string>(),

    setMode: (mode: DisplayMode) => {
      tree.setMode(mode);
      set({ mode });
    },

    setSort: (column: SortColumn, order?: SortOrder) => {
      set((state) => ({ sortColumn: column, sortOrder: order ?? state.sortOrder }));
    },

    toggleSortOrder: () => {
      set((state) => ({ sortOrder: state.sortOrder === 'asc' ? 'desc' : 'asc' }));
    },

    setFoldersOnTop: (value: boolean) => {
      set({ foldersOnTop: value });
    },

    toggleDir: (path: string) => {
      set((state) => {
        const next = new Set(state.expandedDirs);
        if (next.has(path)) {
          next.delete(path);
        } else {
          next.add(path);
        }
        return { expandedDirs: next };
      });
    },

    expandDir: (path: string) => {
      set((state) => {
        const next = new Set(state.expandedDirs);
        next.add(path);
        return { expandedDirs: next };
      });
    },

    collapseDir: (path: string) => {
      set((state) => {
        const next = new Set(state.expandedDirs);
        next.delete(path);
        return { expandedDirs: next };
      });
    },

    expandAll: () => {
      const dirs = new Set<string>();
      for (const node of tree.entries()) {
        if (node.children.length > 0) {
          dirs.add(joinPath(node.path));
        }
      }
      set({ expandedDirs: dirs });
    },

    collapseAll: () => {
      set({ expandedDirs: new Set() });
    },
  }));
}

export type ViewStore = ReturnType<typeof createViewStore>;

/**
 * Rows to render for the current view state, depth first. Children of
 * collapsed rows are skipped; flat mode has no children at all.
 */
export function visibleRows(
  tree: DiffTree,
  state: Pick<ViewState, 'sortColumn' | 'sortOrder' | 'foldersOnTop' | 'expandedDirs'>
): ViewRow[] {
  const options = {
    column: state.sortColumn,
    order: state.sortOrder,
    foldersOnTop: state.foldersOnTop,
  };
  const rows: ViewRow[] = [];

  const walk = (parentPath: readonly string[], depth: number) => {
    for (const node of sortedChildren(tree, parentPath, options)) {
      const expandable = tree.rowCount(node.path) > 0;
      const expanded = expandable && state.expandedDirs.has(joinPath(node.path));
      rows.push({ node, depth, name: tree.displayName(node), expandable, expanded });
      if (expanded) {
        walk(node.path, depth + 1);
      }
    }
  };

  walk([], 0);
  return rows;
}

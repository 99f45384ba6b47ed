export { ParseError, TreeInvariantError } from './errors';

// Tree
export { PathTree } from './tree/pathTree';
export type {
  NodeId,
  PathTreeNode,
  PathTreeOptions,
  RowPosition,
  TreeEvent,
  TreeListener,
  TreeLogger,
} from './tree/pathTree';
export { toSegments, joinPath } from './tree/paths';
export type { PathLike } from './tree/paths';

// Diff parsing
export { changeFactSchema, diffRecordSchema, parseChangeFact, CHANGE_FACT_TYPES } from './diff/facts';
export type { ChangeFact, ChangeFactType } from './diff/facts';
export { payloadFromFacts } from './diff/payload';
export { sizeToBytes } from './diff/units';
export { parseDiffLines, parseDiffLine } from './diff/parseLines';
export { parseDiffJsonLines, parseDiffRecord } from './diff/parseJsonLines';
export type { DiffJsonInput } from './diff/parseJsonLines';
export { DiffTree, isPlaceholder, placeholderPayload } from './diff/diffTree';
export type { DiffTreeOptions } from './diff/diffTree';

// Sorting
export { CHANGE_ORDER, compareNodes, sortKey, sortedChildren } from './sort/sortPolicy';
export type { SortKey } from './sort/sortPolicy';

// View state
export { createViewStore, visibleRows } from './stores/view';
export type { ViewPreferences, ViewRow, ViewState, ViewStore } from './stores/view';

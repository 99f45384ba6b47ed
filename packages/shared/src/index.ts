// Diff types
export type {
  DiffPayload,
  DiffEntry,
  FileKind,
  ChangeType,
  ModeChange,
  OwnerChange,
  ContentDelta,
} from './diff';

// View types
export type { DisplayMode, SortColumn, SortOrder, SortOptions } from './view';
export { DISPLAY_MODES, SORT_COLUMNS, SORT_ORDERS } from './view';

// Config types
export type { ChangetreeConfig } from './config';
export { DEFAULT_CONFIG } from './config';

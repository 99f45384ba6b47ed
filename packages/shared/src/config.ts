import type { DisplayMode, SortColumn, SortOrder } from './view';

/**
 * User configuration, read from a JSON file by the CLI
 */
export interface ChangetreeConfig {
  defaultMode?: DisplayMode;
  sortColumn?: SortColumn;
  sortOrder?: SortOrder;
  foldersOnTop?: boolean;
  jsonLines?: boolean;
}

export const DEFAULT_CONFIG: Required<ChangetreeConfig> = {
  defaultMode: 'tree',
  sortColumn: 'name',
  sortOrder: 'asc',
  foldersOnTop: true,
  jsonLines: false,
};

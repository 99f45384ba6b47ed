export const DISPLAY_MODES = ['tree', 'simplified', 'flat'] as const;

/**
 * How the change tree is projected into rows
 */
export type DisplayMode = (typeof DISPLAY_MODES)[number];

export const SORT_COLUMNS = ['name', 'change', 'size'] as const;

export type SortColumn = (typeof SORT_COLUMNS)[number];

export const SORT_ORDERS = ['asc', 'desc'] as const;

export type SortOrder = (typeof SORT_ORDERS)[number];

export interface SortOptions {
  column: SortColumn;
  order: SortOrder;
  foldersOnTop: boolean;
}

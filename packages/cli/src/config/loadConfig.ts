import fs from 'fs/promises';
import { z } from 'zod';
import { DEFAULT_CONFIG, DISPLAY_MODES, SORT_COLUMNS, SORT_ORDERS } from '@changetree/shared';
import type { ChangetreeConfig, DisplayMode, SortColumn, SortOrder } from '@changetree/shared';

export const displayModeSchema = z.enum(DISPLAY_MODES);
export const sortColumnSchema = z.enum(SORT_COLUMNS);
export const sortOrderSchema = z.enum(SORT_ORDERS);

const configSchema = z
  .object({
    defaultMode: displayModeSchema.optional(),
    sortColumn: sortColumnSchema.optional(),
    sortOrder: sortOrderSchema.optional(),
    foldersOnTop: z.boolean().optional(),
    jsonLines: z.boolean().optional(),
  })
  .strict();

/**
 * Settings for one rendering, after merging flags over the config file
 */
export interface ShowSettings {
  mode: DisplayMode;
  sortColumn: SortColumn;
  sortOrder: SortOrder;
  foldersOnTop: boolean;
  jsonLines: boolean;
}

export interface SettingFlags {
  mode?: DisplayMode;
  sort?: SortColumn;
  desc?: boolean;
  foldersOnTop?: boolean;
  jsonLines?: boolean;
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join(', ');
}

/**
 * Load the config file. A missing file means defaults unless the file was
 * asked for explicitly.
 */
export async function loadConfig(configPath: string, required = false): Promise<ChangetreeConfig> {
  let content: string;
  try {
    content = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    if (!required && (error as NodeJS.ErrnoException).code === 'ENOENT') {
      return {};
    }
    throw error;
  }

  return parseConfig(content, configPath);
}

export function parseConfig(content: string, source: string): ChangetreeConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new Error(`Invalid JSON in config file ${source}`);
  }

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid config file ${source}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export function resolveSettings(config: ChangetreeConfig, flags: SettingFlags): ShowSettings {
  return {
    mode: flags.mode ?? config.defaultMode ?? DEFAULT_CONFIG.defaultMode,
    sortColumn: flags.sort ?? config.sortColumn ?? DEFAULT_CONFIG.sortColumn,
    sortOrder: flags.desc ? 'desc' : config.sortOrder ?? DEFAULT_CONFIG.sortOrder,
    foldersOnTop: flags.foldersOnTop ?? config.foldersOnTop ?? DEFAULT_CONFIG.foldersOnTop,
    jsonLines: flags.jsonLines ?? config.jsonLines ?? DEFAULT_CONFIG.jsonLines,
  };
}

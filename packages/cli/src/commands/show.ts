import pc from 'picocolors';
import { z } from 'zod';
import { DiffTree, createViewStore, visibleRows, type TreeLogger } from '@changetree/core';
import {
  displayModeSchema,
  formatIssues,
  loadConfig,
  resolveSettings,
  sortColumnSchema,
  type ShowSettings,
} from '../config/loadConfig';
import { readInput } from '../input/readInput';
import { renderRow, renderSummary, type Palette } from '../render/rows';
import { createLogger } from '../utils/logger';
import { getConfigPath } from '../utils/paths';

const showOptionsSchema = z.object({
  jsonLines: z.boolean().optional(),
  mode: displayModeSchema.optional(),
  sort: sortColumnSchema.optional(),
  desc: z.boolean().optional(),
  foldersOnTop: z.boolean().optional(),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
});

export type ShowOptions = z.infer<typeof showOptionsSchema>;

export function parseShowOptions(raw: unknown): ShowOptions {
  const result = showOptionsSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid options: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export async function show(file: string, rawOptions: unknown): Promise<void> {
  const options = parseShowOptions(rawOptions);
  const logger = createLogger(options.verbose ?? false);

  const configPath = options.config ?? getConfigPath(process.cwd());
  const config = await loadConfig(configPath, options.config !== undefined);
  const settings = resolveSettings(config, options);
  logger.debug(`Settings: ${JSON.stringify(settings)}`);

  const input = await readInput(file);
  for (const line of renderDiff(input, settings, logger)) {
    console.log(line);
  }
}

/**
 * Parse diff output and render every row of the fully expanded tree,
 * followed by a summary line
 */
export function renderDiff(
  input: string,
  settings: ShowSettings,
  logger: TreeLogger,
  colors: Palette = pc
): string[] {
  const tree = new DiffTree({ logger });
  if (settings.jsonLines) {
    tree.loadJsonLines(input);
  } else {
    tree.loadLines(input);
  }

  if (tree.size === 0) {
    return [colors.yellow('No changes between these archives.')];
  }

  const store = createViewStore(tree, {
    mode: settings.mode,
    sortColumn: settings.sortColumn,
    sortOrder: settings.sortOrder,
    foldersOnTop: settings.foldersOnTop,
  });
  store.getState().expandAll();

  const rows = visibleRows(tree, store.getState());
  return [...rows.map((row) => renderRow(row, colors)), '', renderSummary(tree, colors)];
}

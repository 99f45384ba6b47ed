import pc from 'picocolors';
import type { ChangeType, DiffPayload } from '@changetree/shared';
import type { DiffTree, ViewRow } from '@changetree/core';
import { formatBytes } from '../utils/format';

export type Palette = Pick<typeof pc, 'green' | 'yellow' | 'red' | 'dim' | 'bold'>;

const CHANGE_LETTERS: Record<ChangeType, string> = {
  added: 'A',
  modified: 'M',
  removed: 'D',
  none: ' ',
};

function colorChange(change: ChangeType, colors: Palette): string {
  const letter = CHANGE_LETTERS[change];
  switch (change) {
    case 'added':
      return colors.green(letter);
    case 'modified':
      return colors.yellow(letter);
    case 'removed':
      return colors.red(letter);
    case 'none':
      return letter;
  }
}

/**
 * Mode and owner changes, printed after the size
 */
export function renderDetails(payload: Readonly<DiffPayload>): string {
  const details: string[] = [];

  if (payload.modeChange) {
    details.push(`${payload.modeChange.oldMode} -> ${payload.modeChange.newMode}`);
  }
  if (payload.ownerChange) {
    const { oldUser, oldGroup, newUser, newGroup } = payload.ownerChange;
    details.push(`${oldUser}:${oldGroup} -> ${newUser}:${newGroup}`);
  }
  if (payload.linkChanged) {
    details.push('link target changed');
  }

  return details.length > 0 ? `[${details.join('; ')}]` : '';
}

export function renderRow(row: ViewRow, colors: Palette = pc): string {
  const payload = row.node.payload;
  const indent = '  '.repeat(row.depth);
  const chevron = row.expandable ? (row.expanded ? '▼' : '▶') : ' ';
  const name = row.expandable ? colors.bold(row.name) : row.name;
  const size = colors.dim(formatBytes(payload?.sizeDelta ?? 0));
  const details = payload ? renderDetails(payload) : '';

  const line = `${indent}${chevron} ${colorChange(payload?.change ?? 'none', colors)} ${name} ${size}`;
  return details ? `${line} ${colors.dim(details)}` : line;
}

export function renderSummary(tree: DiffTree, colors: Palette = pc): string {
  const counts = { added: 0, modified: 0, removed: 0 };
  for (const node of tree.entries()) {
    const change = node.payload?.change;
    if (change && change !== 'none') {
      counts[change]++;
    }
  }

  const total = tree
    .childrenOf(tree.root)
    .reduce((sum, node) => sum + (node.payload?.sizeDelta ?? 0), 0);

  return [
    colors.green(`${counts.added} added`),
    colors.yellow(`${counts.modified} modified`),
    colors.red(`${counts.removed} removed`),
  ].join(', ') + colors.dim(` (${formatBytes(total)})`);
}

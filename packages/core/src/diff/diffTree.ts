import type { DiffEntry, DiffPayload, DisplayMode } from '@changetree/shared';
import { TreeInvariantError } from '../errors';
import { PathTree, type PathTreeNode, type TreeLogger } from '../tree/pathTree';
import { joinPath, type PathLike } from '../tree/paths';
import { parseDiffJsonLines, type DiffJsonInput } from './parseJsonLines';
import { parseDiffLines } from './parseLines';

export interface DiffTreeOptions {
  mode?: DisplayMode;
  logger?: TreeLogger;
}

/**
 * Payload of directories that only exist because a deeper path changed
 */
export function placeholderPayload(): DiffPayload {
  return { kind: 'directory', change: 'none', sizeDelta: 0 };
}

export function isPlaceholder(payload: Readonly<DiffPayload> | undefined): boolean {
  return payload === undefined || payload.change === 'none';
}

/**
 * Path tree of archive diff results. Directories roll up the size delta of
 * everything below them; flat mode lists changed paths only.
 */
export class DiffTree extends PathTree<DiffPayload> {
  constructor(options: DiffTreeOptions = {}) {
    super({
      mode: options.mode,
      logger: options.logger,
      defaultPayload: placeholderPayload,
      flatFilter: (node) => !isPlaceholder(node.payload),
      // collapse only unchanged directories, otherwise the change is hidden
      simplifyFilter: (node) => isPlaceholder(node.payload),
    });
  }

  override insert(path: PathLike, payload?: DiffPayload): PathTreeNode<DiffPayload> {
    return super.insert(path, payload && { ...payload });
  }

  override insertChild(parentPath: PathLike, segment: string, payload?: DiffPayload): PathTreeNode<DiffPayload> {
    return super.insertChild(parentPath, segment, payload && { ...payload });
  }

  insertEntries(entries: readonly DiffEntry[]): void {
    for (const entry of entries) {
      this.insert(entry.path, entry.payload);
    }
  }

  /**
   * Parse plain text diff output and add it to the tree.
   * Nothing is inserted when any line fails to parse.
   */
  loadLines(input: string | readonly string[]): DiffEntry[] {
    const entries = parseDiffLines(input);
    this.insertEntries(entries);
    return entries;
  }

  /**
   * Parse JSON lines diff output and add it to the tree.
   * Nothing is inserted when any record fails to parse.
   */
  loadJsonLines(input: DiffJsonInput): DiffEntry[] {
    const entries = parseDiffJsonLines(input);
    this.insertEntries(entries);
    return entries;
  }

  protected override mergePayload(
    node: PathTreeNode<DiffPayload>,
    incoming: DiffPayload,
  ): Readonly<DiffPayload> | undefined {
    const current = node.payload;
    if (current && !isPlaceholder(current)) {
      return super.mergePayload(node, incoming);
    }

    // the placeholder already holds the sizes rolled up from descendants
    this.addSizeToAncestors(node, incoming.sizeDelta);
    return { ...incoming, sizeDelta: incoming.sizeDelta + (current?.sizeDelta ?? 0) };
  }

  protected override nodeCreated(node: PathTreeNode<DiffPayload>): void {
    this.addSizeToAncestors(node, node.payload?.sizeDelta ?? 0);
  }

  protected override nodeRemoved(node: PathTreeNode<DiffPayload>): void {
    this.addSizeToAncestors(node, -(node.payload?.sizeDelta ?? 0));
  }

  private addSizeToAncestors(node: PathTreeNode<DiffPayload>, delta: number): void {
    if (delta === 0) {
      return;
    }

    let ancestor = this.parentNode(node);
    while (ancestor && ancestor.id !== this.root.id) {
      const payload = ancestor.payload;
      if (!payload) {
        throw new TreeInvariantError(`Item ${joinPath(ancestor.path)} without data`);
      }

      this.replacePayload(ancestor, { ...payload, sizeDelta: payload.sizeDelta + delta });
      ancestor = this.parentNode(ancestor);
    }
  }
}

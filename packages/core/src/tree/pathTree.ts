import type { DisplayMode } from '@changetree/shared';
import { TreeInvariantError } from '../errors';
import { joinPath, toSegments, type PathLike } from './paths';

export type NodeId = number;

/**
 * A node of the path tree. The tree owns every node; a node only refers to
 * its children and parent by id.
 */
export interface PathTreeNode<T> {
  readonly id: NodeId;
  readonly path: readonly string[];
  readonly segment: string;
  readonly payload: Readonly<T> | undefined;
  readonly children: readonly NodeId[];
  readonly parent: NodeId | null;
}

interface NodeRecord<T> {
  id: NodeId;
  path: readonly string[];
  segment: string;
  payload: Readonly<T> | undefined;
  children: NodeId[];
  childBySegment: Map<string, NodeId>;
  parent: NodeId | null;
}

/**
 * Position of the row displaying a node under the active mode.
 * `parent` is undefined for top-level rows.
 */
export interface RowPosition<T> {
  parent: PathTreeNode<T> | undefined;
  row: number;
  node: PathTreeNode<T>;
}

export type TreeEvent =
  | { type: 'inserted'; parent: readonly string[]; first: number; last: number }
  | { type: 'removed'; parent: readonly string[]; first: number; last: number }
  | { type: 'dataChanged'; path: readonly string[] }
  | { type: 'layoutChanged'; parent: readonly string[] }
  | { type: 'reset' };

export type TreeListener = (event: TreeEvent) => void;

export interface TreeLogger {
  debug: (message: string) => void;
}

export interface PathTreeOptions<T> {
  mode?: DisplayMode;
  /** Payload given to nodes created without one */
  defaultPayload?: (path: readonly string[]) => T | undefined;
  /** Whether a node appears in flat mode. Defaults to every node. */
  flatFilter?: (node: PathTreeNode<T>) => boolean;
  /** Whether a single-child node may be collapsed in simplified mode. Defaults to every node. */
  simplifyFilter?: (node: PathTreeNode<T>) => boolean;
  /** Payload to keep when an existing node is inserted again. Defaults to first-write-wins. */
  mergePayload?: (node: PathTreeNode<T>, incoming: T, tree: PathTree<T>) => Readonly<T> | undefined;
  onNodeCreated?: (node: PathTreeNode<T>, tree: PathTree<T>) => void;
  /** Called while the node is still attached, before its subtree is dropped */
  onNodeRemoved?: (node: PathTreeNode<T>, tree: PathTree<T>) => void;
  logger?: TreeLogger;
}

/**
 * Ordered tree of filesystem paths with per-node payloads, projected into
 * rows as a full tree, a simplified tree or a flat list.
 */
export class PathTree<T> {
  private readonly nodes = new Map<NodeId, NodeRecord<T>>();
  private readonly rootNode: NodeRecord<T>;
  private readonly listeners = new Set<TreeListener>();
  private readonly options: PathTreeOptions<T>;
  private readonly logger: TreeLogger;
  private nextId: NodeId = 0;
  private mode: DisplayMode;

  // Flat representation in insertion order
  private readonly flat: NodeId[] = [];
  private readonly flatMembers = new Set<NodeId>();

  constructor(options: PathTreeOptions<T> = {}) {
    this.options = options;
    this.logger = options.logger ?? console;
    this.mode = options.mode ?? 'tree';
    this.rootNode = this.register([], '', undefined, null);
  }

  get root(): PathTreeNode<T> {
    return this.rootNode;
  }

  /** Number of nodes, not counting the root */
  get size(): number {
    return this.nodes.size - 1;
  }

  getMode(): DisplayMode {
    return this.mode;
  }

  setMode(mode: DisplayMode): void {
    if (mode === this.mode) {
      return;
    }

    this.mode = mode;
    this.emit({ type: 'reset' });
  }

  subscribe(listener: TreeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Insert `payload` at `path`, creating every missing ancestor on the way.
   * An existing node keeps its payload unless `mergePayload` decides otherwise.
   */
  insert(path: PathLike, payload?: T): PathTreeNode<T> {
    const segments = toSegments(path);
    if (segments.length === 0) {
      throw new TreeInvariantError('Cannot insert at the root path');
    }

    let node = this.rootNode;
    segments.forEach((segment, i) => {
      const isLast = i === segments.length - 1;
      const childId = node.childBySegment.get(segment);

      if (childId === undefined) {
        node = this.createChild(node, segment, isLast ? payload : undefined);
        return;
      }

      node = this.record(childId);
      if (isLast) {
        this.merge(node, payload);
      }
    });

    return node;
  }

  /**
   * Create a direct child without looking it up first.
   * A segment already present under the parent is an invariant violation.
   */
  insertChild(parentPath: PathLike, segment: string, payload?: T): PathTreeNode<T> {
    const parent = this.find(toSegments(parentPath));
    if (!parent) {
      throw new TreeInvariantError(`No node at ${joinPath(toSegments(parentPath))}`);
    }
    if (segment === '' || segment.includes('/')) {
      throw new TreeInvariantError(`Invalid path segment "${segment}"`);
    }

    return this.createChild(parent, segment, payload);
  }

  /**
   * Remove the node at `path` with its subtree.
   * Returns false when there is nothing to remove.
   */
  remove(path: PathLike): boolean {
    const node = this.find(toSegments(path));
    if (!node || node === this.rootNode) {
      return false;
    }

    const parent = this.requireParent(node);
    this.nodeRemoved(node);

    // Descendants leave the derived indices first, deepest first
    const subtree = this.collectSubtree(node);
    for (const item of subtree) {
      this.removeFromFlat(item.id);
    }

    const wasElided = this.isElided(parent);
    const row = parent.children.indexOf(node.id);
    parent.children.splice(row, 1);
    parent.childBySegment.delete(node.segment);

    for (const item of subtree) {
      this.nodes.delete(item.id);
    }

    if (this.mode === 'tree') {
      this.emit({ type: 'removed', parent: parent.path, first: row, last: row });
    } else if (this.mode === 'simplified') {
      if (wasElided !== this.isElided(parent)) {
        this.emit({ type: 'layoutChanged', parent: parent.path });
      } else {
        this.emit({ type: 'removed', parent: parent.path, first: row, last: row });
      }
    }

    return true;
  }

  lookup(path: PathLike): PathTreeNode<T> | undefined {
    return this.find(toSegments(path));
  }

  payloadAt(path: PathLike): Readonly<T> | undefined {
    return this.lookup(path)?.payload;
  }

  childrenOf(node: PathTreeNode<T>): PathTreeNode<T>[] {
    return node.children.map((id) => this.record(id));
  }

  parentNode(node: PathTreeNode<T>): PathTreeNode<T> | undefined {
    return node.parent === null ? undefined : this.record(node.parent);
  }

  /**
   * Depth-first walk over every node except the root
   */
  *entries(): Generator<PathTreeNode<T>> {
    const stack = [...this.rootNode.children].reverse();
    while (stack.length > 0) {
      const id = stack.pop();
      if (id === undefined) break;
      const node = this.record(id);
      yield node;
      for (let i = node.children.length - 1; i >= 0; i--) {
        stack.push(node.children[i]);
      }
    }
  }

  // ---- Row projection ------------------------------------------------------

  rowCount(parentPath: PathLike = []): number {
    const parent = this.find(toSegments(parentPath));
    if (!parent) {
      return 0;
    }

    switch (this.mode) {
      case 'flat':
        return parent === this.rootNode ? this.flat.length : 0;
      case 'tree':
        return parent.children.length;
      case 'simplified':
        return this.isElided(parent) ? 0 : parent.children.length;
    }
  }

  childAt(parentPath: PathLike, row: number): PathTreeNode<T> | undefined {
    const parent = this.find(toSegments(parentPath));
    if (!parent || !Number.isInteger(row) || row < 0) {
      return undefined;
    }

    if (this.mode === 'flat') {
      if (parent !== this.rootNode) return undefined;
      const id = this.flat[row];
      return id === undefined ? undefined : this.record(id);
    }

    if (this.mode === 'simplified' && this.isElided(parent)) {
      return undefined;
    }

    const id = parent.children[row];
    if (id === undefined) {
      return undefined;
    }

    const child = this.record(id);
    return this.mode === 'simplified' ? this.collapse(child) : child;
  }

  parentOf(path: PathLike): PathTreeNode<T> | undefined {
    const node = this.find(toSegments(path));
    if (!node || node === this.rootNode || this.mode === 'flat') {
      return undefined;
    }

    let parent = this.requireParent(node);
    if (this.mode === 'simplified') {
      while (this.isElided(parent)) {
        parent = this.requireParent(parent);
      }
    }

    return parent === this.rootNode ? undefined : parent;
  }

  /**
   * Find the row displaying `path`. In simplified mode a collapsed node
   * resolves to the row of the chain it is merged into.
   */
  resolve(path: PathLike): RowPosition<T> | undefined {
    const node = this.find(toSegments(path));
    if (!node || node === this.rootNode) {
      return undefined;
    }

    if (this.mode === 'flat') {
      const row = this.flat.indexOf(node.id);
      return row === -1 ? undefined : { parent: undefined, row, node };
    }

    let head = node;
    let parent = this.requireParent(head);
    if (this.mode === 'simplified') {
      while (this.isElided(parent)) {
        head = parent;
        parent = this.requireParent(parent);
      }
    }

    return {
      parent: parent === this.rootNode ? undefined : parent,
      row: parent.children.indexOf(head.id),
      node: this.mode === 'simplified' ? this.collapse(node) : node,
    };
  }

  /**
   * Label of a row: the full path in flat mode, the path relative to the
   * displayed parent otherwise
   */
  displayName(node: PathTreeNode<T>): string {
    if (this.mode === 'flat') {
      return joinPath(node.path);
    }
    if (this.mode === 'tree') {
      return node.segment;
    }

    const parent = this.parentOf(node.path);
    return joinPath(node.path.slice(parent ? parent.path.length : 0));
  }

  /**
   * Whether the node is hidden in simplified mode because it is merged
   * with its single child
   */
  isElided(node: PathTreeNode<T>): boolean {
    if (node.id === this.rootNode.id || node.children.length !== 1) {
      return false;
    }
    return this.options.simplifyFilter?.(node) ?? true;
  }

  // ---- Extension points ----------------------------------------------------

  /**
   * Payload kept when `incoming` is inserted at an existing node.
   * Returning the current payload or undefined leaves the node unchanged.
   */
  protected mergePayload(node: PathTreeNode<T>, incoming: T): Readonly<T> | undefined {
    if (this.options.mergePayload) {
      return this.options.mergePayload(node, incoming, this);
    }
    if (node.payload === undefined) {
      return incoming;
    }
    this.logger.debug(`Keeping existing data for ${joinPath(node.path)}`);
    return node.payload;
  }

  protected nodeCreated(node: PathTreeNode<T>): void {
    this.options.onNodeCreated?.(node, this);
  }

  protected nodeRemoved(node: PathTreeNode<T>): void {
    this.options.onNodeRemoved?.(node, this);
  }

  /**
   * Replace the payload of a node without touching the tree structure
   */
  protected replacePayload(node: PathTreeNode<T>, payload: Readonly<T>): void {
    const record = this.record(node.id);
    record.payload = payload;
    this.emit({ type: 'dataChanged', path: record.path });
  }

  // ---- Internals -----------------------------------------------------------

  private register(
    path: readonly string[],
    segment: string,
    payload: T | undefined,
    parent: NodeId | null,
  ): NodeRecord<T> {
    const node: NodeRecord<T> = {
      id: this.nextId++,
      path,
      segment,
      payload,
      children: [],
      childBySegment: new Map(),
      parent,
    };
    this.nodes.set(node.id, node);
    return node;
  }

  private createChild(parent: NodeRecord<T>, segment: string, payload: T | undefined): NodeRecord<T> {
    if (parent.childBySegment.has(segment)) {
      throw new TreeInvariantError(
        `The segment "${segment}" must be unique among the children of "${joinPath(parent.path)}"`
      );
    }

    const path = [...parent.path, segment];
    const child = this.register(path, segment, payload ?? this.options.defaultPayload?.(path), parent.id);

    const wasElided = this.isElided(parent);
    const row = parent.children.length;
    parent.children.push(child.id);
    parent.childBySegment.set(segment, child.id);

    // different behavior in flat and tree modes
    if (this.mode === 'tree') {
      this.emit({ type: 'inserted', parent: parent.path, first: row, last: row });
    } else if (this.mode === 'simplified') {
      if (wasElided !== this.isElided(parent)) {
        this.emit({ type: 'layoutChanged', parent: parent.path });
      } else {
        this.emit({ type: 'inserted', parent: parent.path, first: row, last: row });
      }
    }
    this.addToFlat(child);

    this.nodeCreated(child);
    return child;
  }

  private merge(node: NodeRecord<T>, payload: T | undefined): void {
    if (payload === undefined) {
      return;
    }

    const wasElided = this.isElided(node);
    const next = this.mergePayload(node, payload);

    if (next === undefined || next === node.payload) {
      return;
    }

    node.payload = next;
    this.emit({ type: 'dataChanged', path: node.path });
    if (this.mode === 'simplified' && wasElided !== this.isElided(node)) {
      this.emit({ type: 'layoutChanged', parent: node.path });
    }
    this.addToFlat(node);
  }

  private addToFlat(node: NodeRecord<T>): void {
    if (this.flatMembers.has(node.id) || !(this.options.flatFilter?.(node) ?? true)) {
      return;
    }

    const row = this.flat.length;
    this.flat.push(node.id);
    this.flatMembers.add(node.id);
    if (this.mode === 'flat') {
      this.emit({ type: 'inserted', parent: [], first: row, last: row });
    }
  }

  private removeFromFlat(id: NodeId): void {
    if (!this.flatMembers.has(id)) {
      return;
    }

    const row = this.flat.indexOf(id);
    this.flat.splice(row, 1);
    this.flatMembers.delete(id);
    if (this.mode === 'flat') {
      this.emit({ type: 'removed', parent: [], first: row, last: row });
    }
  }

  private collectSubtree(node: NodeRecord<T>, out: NodeRecord<T>[] = []): NodeRecord<T>[] {
    for (const id of node.children) {
      this.collectSubtree(this.record(id), out);
    }
    out.push(node);
    return out;
  }

  private collapse(node: NodeRecord<T>): NodeRecord<T> {
    let current = node;
    while (this.isElided(current)) {
      current = this.record(current.children[0]);
    }
    return current;
  }

  private find(segments: readonly string[]): NodeRecord<T> | undefined {
    let node = this.rootNode;
    for (const segment of segments) {
      const id = node.childBySegment.get(segment);
      if (id === undefined) {
        return undefined;
      }
      node = this.record(id);
    }
    return node;
  }

  private record(id: NodeId): NodeRecord<T> {
    const node = this.nodes.get(id);
    if (!node) {
      throw new TreeInvariantError(`Unknown node id ${id}`);
    }
    return node;
  }

  private requireParent(node: NodeRecord<T>): NodeRecord<T> {
    if (node.parent === null) {
      throw new TreeInvariantError('The root has no parent');
    }
    return this.record(node.parent);
  }

  private emit(event: TreeEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }
}

import { describe, it, expect, vi } from 'vitest';
import { TreeInvariantError } from '../errors';
import { PathTree, type PathTreeNode, type TreeEvent } from './pathTree';
import { joinPath } from './paths';

function record(tree: PathTree<string>): TreeEvent[] {
  const events: TreeEvent[] = [];
  tree.subscribe((event) => events.push(event));
  return events;
}

/**
 * Every node reachable through the row API, including the nodes a
 * simplified row stands for
 */
function projected(tree: PathTree<string>): string[] {
  const paths: string[] = [];
  const walk = (parentPath: readonly string[]) => {
    const count = tree.rowCount(parentPath);
    for (let row = 0; row < count; row++) {
      const node = tree.childAt(parentPath, row);
      if (!node) continue;
      const parent = tree.parentOf(node.path);
      const start = tree.getMode() === 'flat' ? node.path.length : (parent?.path.length ?? 0) + 1;
      for (let end = start; end <= node.path.length; end++) {
        paths.push(joinPath(node.path.slice(0, end)));
      }
      walk(node.path);
    }
  };
  walk([]);
  return paths.sort();
}

function segments(nodes: Array<PathTreeNode<string> | undefined>): Array<string | undefined> {
  return nodes.map((node) => node?.segment);
}

// ============================================================================
// Insertion
// ============================================================================

describe('PathTree - insert', () => {
  it('creates every ancestor and attaches the payload to the last node only', () => {
    const tree = new PathTree<string>();
    tree.insert('a/b/c', 'leaf');

    expect(tree.size).toBe(3);
    expect(tree.payloadAt('a/b/c')).toBe('leaf');
    expect(tree.payloadAt('a/b')).toBeUndefined();
    expect(tree.lookup('a/b')?.path).toEqual(['a', 'b']);
    expect(tree.lookup('a/b')?.segment).toBe('b');
  });

  it('accepts segment arrays and ignores empty segments', () => {
    const tree = new PathTree<string>();
    tree.insert(['x', 'y'], 'one');

    expect(tree.payloadAt('/x//y/')).toBe('one');
    expect(tree.lookup(['x'])?.children).toHaveLength(1);
  });

  it('keeps the first payload and logs the skipped one', () => {
    const logger = { debug: vi.fn() };
    const tree = new PathTree<string>({ logger });

    tree.insert('a', 'first');
    tree.insert('a', 'second');

    expect(tree.payloadAt('a')).toBe('first');
    expect(logger.debug).toHaveBeenCalledWith('Keeping existing data for a');
  });

  it('lets the merge hook pick the payload of an existing node', () => {
    const tree = new PathTree<string>({ mergePayload: (node, incoming) => `${node.payload ?? ''}+${incoming}` });
    tree.insert('a', 'first');
    const events = record(tree);

    tree.insert('a', 'second');

    expect(tree.payloadAt('a')).toBe('first+second');
    expect(events).toEqual([{ type: 'dataChanged', path: ['a'] }]);
  });

  it('fills in the payload of a node created as an ancestor', () => {
    const tree = new PathTree<string>();
    tree.insert('a/b', 'file');
    tree.insert('a', 'dir');

    expect(tree.payloadAt('a')).toBe('dir');
    expect(tree.size).toBe(2);
  });

  it('treats a repeated insert without payload as a no-op', () => {
    const tree = new PathTree<string>();
    const first = tree.insert('a/b');
    const events = record(tree);

    const second = tree.insert('a/b');

    expect(second.id).toBe(first.id);
    expect(tree.size).toBe(2);
    expect(events).toEqual([]);
  });

  it('rejects the root path', () => {
    const tree = new PathTree<string>();
    expect(() => tree.insert('')).toThrow(TreeInvariantError);
  });

  it('uses the default payload for nodes created without one', () => {
    const tree = new PathTree<string>({ defaultPayload: (path) => `dir:${joinPath(path)}` });
    tree.insert('a/b', 'file');

    expect(tree.payloadAt('a')).toBe('dir:a');
    expect(tree.payloadAt('a/b')).toBe('file');
  });

  it('runs the creation hook once per new node', () => {
    const onNodeCreated = vi.fn();
    const tree = new PathTree<string>({ onNodeCreated });

    tree.insert('a/b');
    tree.insert('a/b/c');

    expect(onNodeCreated.mock.calls.map(([node]) => joinPath(node.path))).toEqual(['a', 'a/b', 'a/b/c']);
  });
});

describe('PathTree - insertChild', () => {
  it('adds a direct child', () => {
    const tree = new PathTree<string>();
    tree.insert('a');
    tree.insertChild('a', 'b', 'child');

    expect(tree.payloadAt('a/b')).toBe('child');
  });

  it('fails on a duplicate segment', () => {
    const tree = new PathTree<string>();
    tree.insert('a/b');

    expect(() => tree.insertChild('a', 'b')).toThrow(TreeInvariantError);
    expect(() => tree.insertChild('a', 'b')).toThrow('The segment "b" must be unique among the children of "a"');
  });

  it('fails on a missing parent', () => {
    const tree = new PathTree<string>();
    expect(() => tree.insertChild('missing', 'b')).toThrow('No node at missing');
  });
});

// ============================================================================
// Removal
// ============================================================================

describe('PathTree - remove', () => {
  it('removes the node with its subtree', () => {
    const tree = new PathTree<string>();
    tree.insert('a/b/c');
    tree.insert('a/d');

    expect(tree.remove('a/b')).toBe(true);
    expect(tree.lookup('a/b')).toBeUndefined();
    expect(tree.lookup('a/b/c')).toBeUndefined();
    expect(tree.size).toBe(2);
    expect(segments(tree.childrenOf(tree.root))).toEqual(['a']);
  });

  it('is a silent no-op for a missing path', () => {
    const tree = new PathTree<string>();
    tree.insert('a');
    const events = record(tree);

    expect(tree.remove('b')).toBe(false);
    expect(tree.remove('')).toBe(false);
    expect(tree.size).toBe(1);
    expect(events).toEqual([]);
  });

  it('calls the removal hook while the node is still attached', () => {
    const seen: Array<string | undefined> = [];
    const tree = new PathTree<string>({
      onNodeRemoved: (node, current) => seen.push(current.parentNode(node)?.segment),
    });
    tree.insert('a/b');

    tree.remove('a/b');

    expect(seen).toEqual(['a']);
  });

  it('drops descendants from the flat list before the node itself', () => {
    const tree = new PathTree<string>({ mode: 'flat' });
    tree.insert('a/b');
    tree.insert('c');
    const events = record(tree);

    tree.remove('a');

    expect(events).toEqual([
      { type: 'removed', parent: [], first: 1, last: 1 },
      { type: 'removed', parent: [], first: 0, last: 0 },
    ]);
    expect(tree.rowCount()).toBe(1);
    expect(tree.childAt([], 0)?.segment).toBe('c');
  });

  it('keeps the flat list in sync in tree mode', () => {
    const tree = new PathTree<string>();
    tree.insert('a/b');
    tree.insert('c');
    tree.remove('a');

    tree.setMode('flat');
    expect(tree.rowCount()).toBe(1);
  });

  it('reports the removed row in tree mode', () => {
    const tree = new PathTree<string>();
    tree.insert('a/x');
    tree.insert('a/y');
    const events = record(tree);

    tree.remove('a/x');

    expect(events).toEqual([{ type: 'removed', parent: ['a'], first: 0, last: 0 }]);
  });
});

// ============================================================================
// Tree mode
// ============================================================================

describe('PathTree - tree mode', () => {
  const build = () => {
    const tree = new PathTree<string>();
    tree.insert('a/x');
    tree.insert('a/y');
    tree.insert('b');
    return tree;
  };

  it('shows every node at its natural depth', () => {
    const tree = build();

    expect(tree.rowCount()).toBe(2);
    expect(segments([tree.childAt([], 0), tree.childAt([], 1)])).toEqual(['a', 'b']);
    expect(tree.rowCount('a')).toBe(2);
    expect(tree.childAt('a', 1)?.path).toEqual(['a', 'y']);
    expect(tree.rowCount('b')).toBe(0);
  });

  it('returns nothing for rows out of range or missing parents', () => {
    const tree = build();

    expect(tree.childAt('a', 2)).toBeUndefined();
    expect(tree.childAt('a', -1)).toBeUndefined();
    expect(tree.childAt('missing', 0)).toBeUndefined();
    expect(tree.rowCount('missing')).toBe(0);
  });

  it('resolves parents and rows', () => {
    const tree = build();

    expect(tree.parentOf('a/y')?.path).toEqual(['a']);
    expect(tree.parentOf('a')).toBeUndefined();
    expect(tree.parentOf('missing')).toBeUndefined();

    const position = tree.resolve('a/y');
    expect(position?.parent?.segment).toBe('a');
    expect(position?.row).toBe(1);
    expect(position?.node.segment).toBe('y');
    expect(tree.resolve('b')?.parent).toBeUndefined();
    expect(tree.resolve('missing')).toBeUndefined();
  });

  it('labels rows with their segment', () => {
    const tree = build();
    const node = tree.lookup('a/y');
    expect(node && tree.displayName(node)).toBe('y');
  });

  it('emits an insert for every created node', () => {
    const tree = new PathTree<string>();
    const events = record(tree);

    tree.insert('a/b');

    expect(events).toEqual([
      { type: 'inserted', parent: [], first: 0, last: 0 },
      { type: 'inserted', parent: ['a'], first: 0, last: 0 },
    ]);
  });
});

// ============================================================================
// Simplified mode
// ============================================================================

describe('PathTree - simplified mode', () => {
  const build = () => {
    const tree = new PathTree<string>({ mode: 'simplified' });
    tree.insert('a/b/c/d');
    tree.insert('a/b/e');
    return tree;
  };

  it('collapses single-child chains', () => {
    const tree = build();

    expect(tree.rowCount()).toBe(1);
    expect(tree.childAt([], 0)?.path).toEqual(['a', 'b']);
    expect(tree.rowCount('a/b')).toBe(2);
    expect(tree.childAt('a/b', 0)?.path).toEqual(['a', 'b', 'c', 'd']);
    expect(tree.childAt('a/b', 1)?.path).toEqual(['a', 'b', 'e']);
  });

  it('hides the rows of collapsed nodes', () => {
    const tree = build();

    expect(tree.rowCount('a')).toBe(0);
    expect(tree.childAt('a', 0)).toBeUndefined();
  });

  it('skips collapsed ancestors when resolving parents', () => {
    const tree = build();

    expect(tree.parentOf('a/b/c/d')?.path).toEqual(['a', 'b']);
    expect(tree.parentOf('a/b')).toBeUndefined();
  });

  it('labels rows relative to the displayed parent', () => {
    const tree = build();
    const top = tree.childAt([], 0);
    const nested = tree.childAt('a/b', 0);

    expect(top && tree.displayName(top)).toBe('a/b');
    expect(nested && tree.displayName(nested)).toBe('c/d');
  });

  it('resolves a collapsed node to the row it is merged into', () => {
    const tree = build();

    const inner = tree.resolve('a/b/c');
    expect(inner?.parent?.path).toEqual(['a', 'b']);
    expect(inner?.row).toBe(0);
    expect(inner?.node.path).toEqual(['a', 'b', 'c', 'd']);

    const top = tree.resolve('a');
    expect(top?.parent).toBeUndefined();
    expect(top?.row).toBe(0);
    expect(top?.node.path).toEqual(['a', 'b']);
  });

  it('only collapses nodes accepted by the simplify filter', () => {
    const tree = new PathTree<string>({
      mode: 'simplified',
      simplifyFilter: (node) => node.payload === undefined,
    });
    tree.insert('a', 'dir');
    tree.insert('a/b', 'file');

    expect(tree.childAt([], 0)?.path).toEqual(['a']);
    expect(tree.rowCount('a')).toBe(1);
  });

  it('reports layout changes when a node starts or stops collapsing', () => {
    const tree = new PathTree<string>({ mode: 'simplified' });
    const events = record(tree);

    tree.insert('a');
    tree.insert('a/b');
    tree.insert('a/c');
    tree.insert('a/d');

    expect(events).toEqual([
      { type: 'inserted', parent: [], first: 0, last: 0 },
      { type: 'layoutChanged', parent: ['a'] },
      { type: 'layoutChanged', parent: ['a'] },
      { type: 'inserted', parent: ['a'], first: 2, last: 2 },
    ]);
  });
});

// ============================================================================
// Flat mode
// ============================================================================

describe('PathTree - flat mode', () => {
  it('lists nodes in insertion order without parents', () => {
    const tree = new PathTree<string>({ mode: 'flat' });
    tree.insert('a/b');
    tree.insert('c');

    expect(tree.rowCount()).toBe(3);
    expect(tree.childAt([], 1)?.path).toEqual(['a', 'b']);
    expect(tree.childAt([], 3)).toBeUndefined();
    expect(tree.rowCount('a')).toBe(0);
    expect(tree.childAt('a', 0)).toBeUndefined();
    expect(tree.parentOf('a/b')).toBeUndefined();
  });

  it('resolves rows by scanning the flat list', () => {
    const tree = new PathTree<string>({ mode: 'flat' });
    tree.insert('a/b');
    tree.insert('c');

    const position = tree.resolve('c');
    expect(position?.parent).toBeUndefined();
    expect(position?.row).toBe(2);
    expect(position?.node.segment).toBe('c');
  });

  it('labels rows with the full path', () => {
    const tree = new PathTree<string>({ mode: 'flat' });
    const node = tree.insert('a/b');
    expect(tree.displayName(node)).toBe('a/b');
  });

  it('adds a node once a merge makes it pass the flat filter', () => {
    const tree = new PathTree<string>({
      mode: 'flat',
      flatFilter: (node) => node.payload !== undefined,
    });
    tree.insert('a/b', 'file');
    expect(tree.rowCount()).toBe(1);
    expect(tree.resolve('a')).toBeUndefined();

    const events = record(tree);
    tree.insert('a', 'dir');

    expect(tree.rowCount()).toBe(2);
    expect(tree.childAt([], 1)?.path).toEqual(['a']);
    expect(events).toEqual([
      { type: 'dataChanged', path: ['a'] },
      { type: 'inserted', parent: [], first: 1, last: 1 },
    ]);
  });
});

// ============================================================================
// Mode switching
// ============================================================================

describe('PathTree - setMode', () => {
  it('signals a reset when the mode changes', () => {
    const tree = new PathTree<string>();
    const events = record(tree);

    tree.setMode('flat');
    tree.setMode('flat');

    expect(tree.getMode()).toBe('flat');
    expect(events).toEqual([{ type: 'reset' }]);
  });

  it('stops notifying after unsubscribe', () => {
    const tree = new PathTree<string>();
    const listener = vi.fn();
    const unsubscribe = tree.subscribe(listener);

    unsubscribe();
    tree.setMode('simplified');

    expect(listener).not.toHaveBeenCalled();
  });

  it('projects the same nodes in every mode', () => {
    const tree = new PathTree<string>();
    tree.insert('a/b/c/d', 'd');
    tree.insert('a/b/e', 'e');
    tree.insert('f', 'f');
    tree.insert('g/h/i', 'i');

    const all = Array.from(tree.entries(), (node) => joinPath(node.path)).sort();
    expect(all).toHaveLength(9);

    for (const mode of ['tree', 'simplified', 'flat'] as const) {
      tree.setMode(mode);
      expect(projected(tree)).toEqual(all);
    }
  });

  it('walks entries depth first', () => {
    const tree = new PathTree<string>();
    tree.insert('a/b');
    tree.insert('c');
    tree.insert('a/d');

    expect(Array.from(tree.entries(), (node) => joinPath(node.path))).toEqual(['a', 'a/b', 'a/d', 'c']);
  });
});

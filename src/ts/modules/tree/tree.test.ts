import { describe, expect, it } from 'vitest';
import { DockError } from '../../errors';
import { leafNode } from './node';
import { Tree, firstChild, parentOf, secondChild } from './tree';

function leafTabs<Tab>(tree: Tree<Tab>, ix: number): Tab[] | null {
  const node = tree.node(ix);
  return node.type === 'leaf' ? node.tabs : null;
}

describe('Tree indexing', () => {
  it('computes child and parent indices', () => {
    expect(firstChild(0)).toBe(1);
    expect(secondChild(0)).toBe(2);
    expect(firstChild(2)).toBe(5);
    expect(parentOf(0)).toBeNull();
    expect(parentOf(5)).toBe(2);
    expect(parentOf(6)).toBe(2);
  });
});

describe('Tree tabs', () => {
  it('normalizes a leaf emptied by removeTab to empty', () => {
    const tree = Tree.fromTabs(['a', 'b']);
    expect(tree.removeTab(0, 0)).toBe('a');
    expect(tree.removeTab(0, 0)).toBe('b');
    expect(tree.root().type).toBe('empty');
  });

  it('treats an empty tab list as an empty root', () => {
    expect(Tree.fromTabs<string>([]).root().type).toBe('empty');
  });

  it('shifts the active tab when an earlier tab is removed', () => {
    const tree = Tree.fromTabs(['a', 'b', 'c'], 2);
    tree.removeTab(0, 0);
    const root = tree.root();
    expect(root.type === 'leaf' && root.active).toBe(1);
    expect(leafTabs(tree, 0)).toEqual(['b', 'c']);
  });

  it('resets the active tab to 0 when the active tab is removed', () => {
    const tree = Tree.fromTabs(['a', 'b', 'c'], 1);
    tree.removeTab(0, 1);
    const root = tree.root();
    expect(root.type === 'leaf' && root.active).toBe(0);
  });

  it('makes appended and inserted tabs active', () => {
    const tree = Tree.fromTabs(['a']);
    tree.appendTab(0, 'b');
    let root = tree.root();
    expect(root.type === 'leaf' && root.active).toBe(1);
    tree.insertTab(0, 0, 'c');
    root = tree.root();
    expect(root.type === 'leaf' && root.active).toBe(0);
    expect(leafTabs(tree, 0)).toEqual(['c', 'a', 'b']);
  });

  it('rejects tab operations on non-leaf nodes', () => {
    const tree = Tree.fromTabs(['a']);
    tree.splitRight(0, 0.5, ['b']);
    expect(() => tree.appendTab(0, 'c')).toThrow(DockError);
    expect(() => tree.insertTab(0, 0, 'c')).toThrow(/requires a leaf node/);
  });
});

describe('Tree split', () => {
  it('puts the previous content first for right splits', () => {
    const tree = Tree.fromTabs(['a']);
    const [previous, added] = tree.split(0, 'right', 0.3, leafNode(['b']));
    expect([previous, added]).toEqual([1, 2]);
    expect(tree.root()).toMatchObject({ type: 'horizontal', fraction: 0.3 });
    expect(leafTabs(tree, 1)).toEqual(['a']);
    expect(leafTabs(tree, 2)).toEqual(['b']);
  });

  it('puts the new node first for left and top splits', () => {
    const tree = Tree.fromTabs(['a']);
    expect(tree.splitLeft(0, 0.4, ['b'])).toEqual([2, 1]);
    expect(leafTabs(tree, 1)).toEqual(['b']);
    expect(leafTabs(tree, 2)).toEqual(['a']);

    const vertical = Tree.fromTabs(['a']);
    vertical.splitAbove(0, 0.5, ['b']);
    expect(vertical.root().type).toBe('vertical');
    expect(leafTabs(vertical, 1)).toEqual(['b']);
  });

  it('relocates the whole previous subtree', () => {
    const tree = Tree.fromTabs(['a']);
    tree.splitRight(0, 0.5, ['b']);
    tree.splitBelow(0, 0.6, ['c']);

    expect(tree.root()).toMatchObject({ type: 'vertical', fraction: 0.6 });
    expect(tree.node(1)).toMatchObject({ type: 'horizontal', fraction: 0.5 });
    expect(leafTabs(tree, 3)).toEqual(['a']);
    expect(leafTabs(tree, 4)).toEqual(['b']);
    expect(leafTabs(tree, 2)).toEqual(['c']);
  });

  it('rejects fractions outside [0, 1]', () => {
    const tree = Tree.fromTabs(['a']);
    expect(() => tree.split(0, 'right', 1.5)).toThrow(DockError);
    expect(() => tree.split(0, 'right', -0.1)).toThrow(/fraction/);
    expect(leafTabs(tree, 0)).toEqual(['a']);
  });

  it('leaves an empty sibling when no node is given', () => {
    const tree = Tree.fromTabs(['a']);
    tree.split(0, 'bottom', 0.5);
    expect(tree.node(2).type).toBe('empty');
  });
});

describe('Tree mapping', () => {
  it('maps tabs while keeping structure', () => {
    const tree = Tree.fromTabs([1, 2]);
    tree.splitRight(0, 0.25, [3]);
    const mapped = tree.mapTabs((n) => `tab-${n}`);
    expect(mapped.root()).toMatchObject({ type: 'horizontal', fraction: 0.25 });
    expect(leafTabs(mapped, 1)).toEqual(['tab-1', 'tab-2']);
    expect(leafTabs(mapped, 2)).toEqual(['tab-3']);
  });

  it('empties leaves whose tabs are all filtered out', () => {
    const tree = Tree.fromTabs([1]);
    tree.splitRight(0, 0.5, [2, 3]);
    const odd = tree.filterTabs((n) => n % 2 === 1);
    expect(odd.node(1).type).toBe('leaf');
    expect(leafTabs(odd, 2)).toEqual([3]);

    const none = tree.filterMapTabs(() => undefined);
    expect(none.node(1).type).toBe('empty');
    expect(none.node(2).type).toBe('empty');
  });

  it('keeps the active tab selected when it survives filtering', () => {
    const tree = Tree.fromTabs(['a', 'b', 'c'], 2);
    const filtered = tree.filterTabs((tab) => tab !== 'a');
    const root = filtered.root();
    expect(root.type === 'leaf' && root.tabs[root.active]).toBe('c');
  });

  it('retains tabs in place', () => {
    const tree = Tree.fromTabs(['a', 'b']);
    tree.retainTabs((tab) => tab === 'b');
    expect(leafTabs(tree, 0)).toEqual(['b']);
    tree.retainTabs(() => false);
    expect(tree.root().type).toBe('empty');
  });

  it('finds and counts tabs across leaves', () => {
    const tree = Tree.fromTabs(['a']);
    tree.splitRight(0, 0.5, ['b', 'c']);
    expect(tree.findTab((tab) => tab === 'c')).toEqual([2, 1]);
    expect(tree.findTab((tab) => tab === 'z')).toBeNull();
    expect(tree.tabsCount()).toBe(3);
    expect([...tree.leaves()].map(([ix]) => ix)).toEqual([1, 2]);
  });

  it('tracks bounds and focus', () => {
    const tree = Tree.fromTabs(['a']);
    tree.setBounds(0, { x: 0, y: 0, width: 50, height: 40 });
    expect(tree.bounds(0)).toEqual({ x: 0, y: 0, width: 50, height: 40 });
    expect(tree.focusedNode()).toBeNull();
    tree.setFocusedNode(0);
    expect(tree.focusedNode()).toBe(0);
  });
});

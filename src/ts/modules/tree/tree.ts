/**
 * Binary split tree stored in a flat array.
 *
 * The root is at index 0. For a node at index n, the first child (left for
 * horizontal splits, top for vertical ones) is at 2n + 1 and the second
 * child at 2n + 2. Every split node has both children present, possibly empty.
 */

import type { Bounds, Placement } from '../../types';
import { assertDock } from '../../errors';
import type { LeafNode, Node } from './node';
import {
  appendTab,
  emptyNode,
  filterMapNode,
  insertTab,
  isLeaf,
  isSplit,
  leafNode,
  nodeBounds,
  removeTabFromLeaf,
  splitNode,
} from './node';

interface Subtree<Tab> {
  node: Node<Tab>;
  first: Subtree<Tab> | null;
  second: Subtree<Tab> | null;
}

export function firstChild(ix: number): number {
  return ix * 2 + 1;
}

export function secondChild(ix: number): number {
  return ix * 2 + 2;
}

export function parentOf(ix: number): number | null {
  return ix === 0 ? null : Math.floor((ix - 1) / 2);
}

export class Tree<Tab> {
  private nodes: Node<Tab>[];
  private focused: number | null = null;

  constructor(root: Node<Tab> = emptyNode()) {
    this.nodes = [emptyNode()];
    this.setNode(0, root);
  }

  static fromTabs<Tab>(tabs: Tab[], active = 0): Tree<Tab> {
    return new Tree<Tab>(leafNode(tabs, active));
  }

  /** Number of slots in the backing array, empty ones included */
  get length(): number {
    return this.nodes.length;
  }

  root(): Node<Tab> {
    return this.node(0);
  }

  /** Node at `ix`; slots past the end read as empty */
  node(ix: number): Node<Tab> {
    return this.nodes[ix] ?? emptyNode();
  }

  /**
   * Replace the node at `ix`. A previous split's subtree is cleared, and a
   * split placed here gets empty children.
   */
  setNode(ix: number, node: Node<Tab>): void {
    this.clearSubtree(ix);
    this.ensureCapacity(ix);
    this.nodes[ix] = isLeaf(node) && node.tabs.length === 0 ? emptyNode() : node;
    if (isSplit(node)) {
      this.ensureCapacity(secondChild(ix));
    }
  }

  /**
   * Split the node at `ix` towards `direction`, putting `node` on that side.
   *
   * For right/bottom the previous content becomes the first child; for
   * left/top the new node is first. `fraction` is the first child's share.
   * Returns [previousContentIndex, newNodeIndex].
   */
  split(
    ix: number,
    direction: Placement,
    fraction: number,
    node: Node<Tab> = emptyNode(),
  ): [number, number] {
    const parent = splitNode(direction, fraction);
    const previous = this.takeSubtree(ix);

    this.ensureCapacity(secondChild(ix));
    this.nodes[ix] = parent;

    const newFirst = direction === 'left' || direction === 'top';
    const previousIx = newFirst ? secondChild(ix) : firstChild(ix);
    const newIx = newFirst ? firstChild(ix) : secondChild(ix);

    this.writeSubtree(previousIx, previous);
    this.setNode(newIx, node);
    return [previousIx, newIx];
  }

  splitLeft(ix: number, fraction: number, tabs: Tab[]): [number, number] {
    return this.split(ix, 'left', fraction, leafNode(tabs));
  }

  splitRight(ix: number, fraction: number, tabs: Tab[]): [number, number] {
    return this.split(ix, 'right', fraction, leafNode(tabs));
  }

  splitAbove(ix: number, fraction: number, tabs: Tab[]): [number, number] {
    return this.split(ix, 'top', fraction, leafNode(tabs));
  }

  splitBelow(ix: number, fraction: number, tabs: Tab[]): [number, number] {
    return this.split(ix, 'bottom', fraction, leafNode(tabs));
  }

  /** Append a tab to the leaf at `ix` and make it active */
  appendTab(ix: number, tab: Tab): void {
    appendTab(this.node(ix), tab);
  }

  /** Insert a tab into the leaf at `ix` and make it active */
  insertTab(ix: number, tabIx: number, tab: Tab): void {
    insertTab(this.node(ix), tabIx, tab);
  }

  /**
   * Remove a tab from the leaf at `ix`. A leaf left without tabs becomes empty.
   */
  removeTab(ix: number, tabIx: number): Tab | undefined {
    const node = this.node(ix);
    if (!isLeaf(node)) return undefined;
    const removed = removeTabFromLeaf(node, tabIx);
    if (node.tabs.length === 0) {
      this.nodes[ix] = emptyNode();
    }
    return removed;
  }

  setActiveTab(ix: number, tabIx: number): void {
    const node = this.node(ix);
    assertDock(isLeaf(node), 'not_a_leaf', `setActiveTab requires a leaf node, got ${node.type}`);
    node.active = Math.min(Math.max(tabIx, 0), node.tabs.length - 1);
  }

  /** New tree with every tab mapped; structure and fractions are preserved */
  mapTabs<NewTab>(fn: (tab: Tab) => NewTab): Tree<NewTab> {
    return this.filterMapTabs((tab) => fn(tab));
  }

  /** New tree with tabs mapped and filtered; emptied leaves become empty nodes */
  filterMapTabs<NewTab>(fn: (tab: Tab) => NewTab | undefined): Tree<NewTab> {
    const tree = new Tree<NewTab>();
    tree.nodes = this.nodes.map((node) => filterMapNode(node, fn));
    tree.focused = this.focused;
    return tree;
  }

  filterTabs(predicate: (tab: Tab) => boolean): Tree<Tab> {
    return this.filterMapTabs((tab) => (predicate(tab) ? tab : undefined));
  }

  /** Remove, in place, every tab `predicate` rejects */
  retainTabs(predicate: (tab: Tab) => boolean): void {
    this.nodes = this.nodes.map((node) =>
      isLeaf(node) ? filterMapNode(node, (tab) => (predicate(tab) ? tab : undefined)) : node,
    );
  }

  bounds(ix: number): Bounds {
    return nodeBounds(this.node(ix));
  }

  /** Record last-rendered bounds; informational only */
  setBounds(ix: number, bounds: Bounds): void {
    const node = this.node(ix);
    if (node.type !== 'empty') {
      node.bounds = { ...bounds };
    }
  }

  focusedNode(): number | null {
    return this.focused;
  }

  setFocusedNode(ix: number | null): void {
    this.focused = ix;
  }

  *leaves(): Generator<[number, LeafNode<Tab>]> {
    for (let ix = 0; ix < this.nodes.length; ix++) {
      const node = this.nodes[ix];
      if (node && isLeaf(node)) yield [ix, node];
    }
  }

  /** Locate the first tab matching `predicate` as [nodeIndex, tabIndex] */
  findTab(predicate: (tab: Tab) => boolean): [number, number] | null {
    for (const [ix, leaf] of this.leaves()) {
      const tabIx = leaf.tabs.findIndex(predicate);
      if (tabIx !== -1) return [ix, tabIx];
    }
    return null;
  }

  tabsCount(): number {
    let count = 0;
    for (const [, leaf] of this.leaves()) count += leaf.tabs.length;
    return count;
  }

  private ensureCapacity(ix: number): void {
    while (this.nodes.length <= ix) {
      this.nodes.push(emptyNode());
    }
  }

  private clearSubtree(ix: number): void {
    const node = this.nodes[ix];
    if (!node) return;
    if (isSplit(node)) {
      this.clearSubtree(firstChild(ix));
      this.clearSubtree(secondChild(ix));
    }
    this.nodes[ix] = emptyNode();
  }

  private takeSubtree(ix: number): Subtree<Tab> {
    const node = this.node(ix);
    const subtree: Subtree<Tab> = isSplit(node)
      ? { node, first: this.takeSubtree(firstChild(ix)), second: this.takeSubtree(secondChild(ix)) }
      : { node, first: null, second: null };
    if (ix < this.nodes.length) this.nodes[ix] = emptyNode();
    return subtree;
  }

  private writeSubtree(ix: number, subtree: Subtree<Tab>): void {
    this.ensureCapacity(ix);
    this.nodes[ix] = subtree.node;
    if (subtree.first && subtree.second) {
      this.writeSubtree(firstChild(ix), subtree.first);
      this.writeSubtree(secondChild(ix), subtree.second);
    }
  }
}

/**
 * Tree Nodes
 *
 * One slot of the binary split tree: empty, a leaf holding tabs, or a
 * horizontal/vertical split carrying the fraction taken by its first child.
 */

import type { Bounds, Placement } from '../../types';
import { EMPTY_BOUNDS } from '../../types';
import { assertDock } from '../../errors';

export interface EmptyNode {
  type: 'empty';
}

export interface LeafNode<Tab> {
  type: 'leaf';
  /** Tab bar + content bounds */
  bounds: Bounds;
  /** Content view bounds */
  contentBounds: Bounds;
  tabs: Tab[];
  active: number;
}

/** Left/right split; fraction is the left child's share */
export interface HorizontalNode {
  type: 'horizontal';
  bounds: Bounds;
  fraction: number;
}

/** Top/bottom split; fraction is the top child's share */
export interface VerticalNode {
  type: 'vertical';
  bounds: Bounds;
  fraction: number;
}

export type SplitNode = HorizontalNode | VerticalNode;

export type Node<Tab> = EmptyNode | LeafNode<Tab> | SplitNode;

export function emptyNode(): EmptyNode {
  return { type: 'empty' };
}

/**
 * Create a leaf holding the given tabs. No tabs means an empty node.
 */
export function leafNode<Tab>(tabs: Tab[], active = 0): LeafNode<Tab> | EmptyNode {
  if (tabs.length === 0) return emptyNode();
  return {
    type: 'leaf',
    bounds: { ...EMPTY_BOUNDS },
    contentBounds: { ...EMPTY_BOUNDS },
    tabs: [...tabs],
    active: Math.min(Math.max(active, 0), tabs.length - 1),
  };
}

/**
 * Create the split node that replaces a node split towards `direction`.
 * Throws if `fraction` isn't in 0..=1.
 */
export function splitNode(direction: Placement, fraction: number): SplitNode {
  assertDock(
    Number.isFinite(fraction) && fraction >= 0 && fraction <= 1,
    'invalid_fraction',
    `Split fraction must be within [0, 1], got ${fraction}`,
  );
  const bounds = { ...EMPTY_BOUNDS };
  return direction === 'left' || direction === 'right'
    ? { type: 'horizontal', bounds, fraction }
    : { type: 'vertical', bounds, fraction };
}

export function isLeaf<Tab>(node: Node<Tab>): node is LeafNode<Tab> {
  return node.type === 'leaf';
}

export function isSplit<Tab>(node: Node<Tab>): node is SplitNode {
  return node.type === 'horizontal' || node.type === 'vertical';
}

export function nodeBounds<Tab>(node: Node<Tab>): Bounds {
  return node.type === 'empty' ? { ...EMPTY_BOUNDS } : node.bounds;
}

export function tabsCount<Tab>(node: Node<Tab>): number {
  return node.type === 'leaf' ? node.tabs.length : 0;
}

function expectLeaf<Tab>(node: Node<Tab>, operation: string): LeafNode<Tab> {
  assertDock(node.type === 'leaf', 'not_a_leaf', `${operation} requires a leaf node, got ${node.type}`);
  return node;
}

/**
 * Append a tab to a leaf and make it active.
 */
export function appendTab<Tab>(node: Node<Tab>, tab: Tab): void {
  const leaf = expectLeaf(node, 'appendTab');
  leaf.active = leaf.tabs.length;
  leaf.tabs.push(tab);
}

/**
 * Insert a tab into a leaf at `ix` (clamped) and make it active.
 */
export function insertTab<Tab>(node: Node<Tab>, ix: number, tab: Tab): void {
  const leaf = expectLeaf(node, 'insertTab');
  const at = Math.min(Math.max(ix, 0), leaf.tabs.length);
  leaf.tabs.splice(at, 0, tab);
  leaf.active = at;
}

/**
 * Remove the tab at `ix` from a leaf.
 * The leaf may be left without tabs; callers normalize it to empty.
 */
export function removeTabFromLeaf<Tab>(leaf: LeafNode<Tab>, ix: number): Tab | undefined {
  if (ix < 0 || ix >= leaf.tabs.length) return undefined;
  const [removed] = leaf.tabs.splice(ix, 1);
  if (ix === leaf.active) {
    leaf.active = 0;
  } else if (ix < leaf.active) {
    leaf.active -= 1;
  }
  return removed;
}

/**
 * Map and filter a node's tabs into a new node.
 * A leaf left without tabs becomes empty; the active tab stays selected when it survives.
 */
export function filterMapNode<Tab, NewTab>(
  node: Node<Tab>,
  fn: (tab: Tab, index: number) => NewTab | undefined,
): Node<NewTab> {
  switch (node.type) {
    case 'empty':
      return emptyNode();
    case 'horizontal':
    case 'vertical':
      return { type: node.type, bounds: { ...node.bounds }, fraction: node.fraction };
    case 'leaf': {
      const tabs: NewTab[] = [];
      let activeAt = 0;
      node.tabs.forEach((tab, i) => {
        if (i === node.active) activeAt = tabs.length;
        const mapped = fn(tab, i);
        if (mapped !== undefined) tabs.push(mapped);
      });
      if (tabs.length === 0) return emptyNode();
      return {
        type: 'leaf',
        bounds: { ...node.bounds },
        contentBounds: { ...node.contentBounds },
        tabs,
        active: Math.min(activeAt, tabs.length - 1),
      };
    }
  }
}

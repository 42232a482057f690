/**
 * Live layout <-> Tree
 *
 * Containers serialize through a Tree: a stack of n children becomes a
 * right-nested chain of binary splits, a tab panel becomes a leaf. A child
 * stack on its parent's axis is spliced into the parent's chain. Loading
 * reverses this, flattening same-axis chains back into one stack, so a
 * dump taken after a load matches the dump it was loaded from.
 */

import type { Axis } from '../../types';
import { DockError } from '../../errors';
import type { PanelView } from '../panel';
import { StackPanel } from '../stack/stackPanel';
import { TabPanel } from '../tabs/tabPanel';
import { Tree, firstChild, secondChild } from '../tree/tree';
import type { SplitNode } from '../tree/node';
import { emptyNode, leafNode, splitNode } from '../tree/node';
import type { DockItemState, PanelItemState } from './state';
import { treeFromState, treeToState } from './state';

function axisSplit(axis: Axis, fraction: number): SplitNode {
  return splitNode(axis === 'horizontal' ? 'right' : 'bottom', Math.min(Math.max(fraction, 0), 1));
}

// =============================================================================
// Dump
// =============================================================================

/** Tree of the content panels under `container` */
export function containerToTree(container: PanelView): Tree<PanelView> {
  const tree = new Tree<PanelView>();
  writePanel(tree, 0, container);
  return tree;
}

function writePanel(tree: Tree<PanelView>, ix: number, panel: PanelView): void {
  if (panel instanceof StackPanel) {
    const { panels, weights } = flattenStack(panel);
    writeSequence(tree, ix, panel.axis, panels, weights);
  } else if (panel instanceof TabPanel) {
    tree.setNode(ix, leafNode(panel.panels, panel.activeIndex));
  } else {
    tree.setNode(ix, leafNode([panel]));
  }
}

/** Children of `stack` with their weights, child stacks on the same axis spliced in */
function flattenStack(stack: StackPanel): { panels: PanelView[]; weights: number[] } {
  const panels: PanelView[] = [];
  const weights: number[] = [];
  const own = stack.group.weights();

  stack.panels.forEach((panel, i) => {
    const weight = own[i] ?? 0;
    if (!(panel instanceof StackPanel) || panel.axis !== stack.axis) {
      panels.push(panel);
      weights.push(weight);
      return;
    }
    const inner = flattenStack(panel);
    const total = inner.weights.reduce((sum, w) => sum + w, 0);
    inner.panels.forEach((child, j) => {
      panels.push(child);
      weights.push(total > 0 ? weight * ((inner.weights[j] ?? 0) / total) : weight / inner.panels.length);
    });
  });

  return { panels, weights };
}

function writeSequence(
  tree: Tree<PanelView>,
  ix: number,
  axis: Axis,
  panels: PanelView[],
  weights: number[],
): void {
  const [head, ...rest] = panels;
  if (!head) {
    tree.setNode(ix, emptyNode());
    return;
  }
  if (rest.length === 0) {
    writePanel(tree, ix, head);
    return;
  }

  const [headWeight = 0, ...restWeights] = weights;
  const total = headWeight + restWeights.reduce((sum, weight) => sum + weight, 0);
  const fraction = total > 0 ? headWeight / total : 1 / panels.length;

  tree.setNode(ix, axisSplit(axis, fraction));
  writePanel(tree, firstChild(ix), head);
  writeSequence(tree, secondChild(ix), axis, rest, restWeights);
}

function dumpTab(panel: PanelView): PanelItemState {
  const item = panel.dump();
  if (item.type !== 'panel') {
    throw new DockError('invalid_node', `${panel.panelName} cannot be saved as a tab`, item);
  }
  return item;
}

/** Nested item state for a stack, tab panel or plain panel */
export function dumpContainer(container: PanelView): DockItemState {
  return treeToState(containerToTree(container).mapTabs(dumpTab));
}

// =============================================================================
// Load
// =============================================================================

interface Share {
  panel: PanelView;
  share: number;
}

function buildNode(tree: Tree<PanelView>, ix: number): PanelView | null {
  const node = tree.node(ix);
  switch (node.type) {
    case 'empty':
      return null;
    case 'leaf':
      return new TabPanel(node.tabs, { active: node.active });
    case 'horizontal':
    case 'vertical': {
      const shares = collectShares(tree, ix, node.type, 1);
      const [only] = shares;
      if (shares.length <= 1) return only?.panel ?? null;

      const stack = new StackPanel(node.type);
      shares.forEach(({ panel }) => stack.addPanel(panel));
      const total = shares.reduce((sum, { share }) => sum + share, 0);
      stack.group.setPendingFractions(
        shares.map(({ share }) => (total > 0 ? share / total : 1 / shares.length)),
      );
      return stack;
    }
  }
}

function collectShares(tree: Tree<PanelView>, ix: number, axis: Axis, share: number): Share[] {
  const node = tree.node(ix);
  if (node.type === axis) {
    return [
      ...collectShares(tree, firstChild(ix), axis, share * node.fraction),
      ...collectShares(tree, secondChild(ix), axis, share * (1 - node.fraction)),
    ];
  }
  const panel = buildNode(tree, ix);
  return panel ? [{ panel, share }] : [];
}

/**
 * Build a root stack from a tree of panels. A tree that is not itself a
 * split gets a stack along `axis` around it.
 */
export function containerFromTree(tree: Tree<PanelView>, axis: Axis): StackPanel {
  const built = buildNode(tree, 0);
  if (built instanceof StackPanel) return built;
  const stack = new StackPanel(axis);
  if (built) stack.addPanel(built);
  return stack;
}

/** Rebuild a root stack from item state, creating content panels with `buildPanel` */
export function loadContainer(
  item: DockItemState,
  buildPanel: (item: PanelItemState) => PanelView,
  axis: Axis,
): StackPanel {
  return containerFromTree(treeFromState(item).mapTabs(buildPanel), axis);
}

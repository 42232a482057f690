/**
 * Layout State
 *
 * Serializable snapshot of a dock area, its zod schemas, and conversion
 * between nested item state and the array-backed Tree.
 */

import { z } from 'zod';
import type { Axis, JsonValue, Placement } from '../../types';
import { DockError, assertDock } from '../../errors';
import { Tree, firstChild, secondChild } from '../tree/tree';
import { leafNode, splitNode } from '../tree/node';

// =============================================================================
// Types
// =============================================================================

export interface PanelItemState {
  type: 'panel';
  panelName: string;
  state: JsonValue;
}

export interface TabsItemState {
  type: 'tabs';
  tabs: PanelItemState[];
  active: number;
}

export interface SplitItemState {
  type: 'split';
  axis: Axis;
  /** Share of the first (left/top) child */
  fraction: number;
  first: DockItemState;
  second: DockItemState;
}

export type DockItemState = PanelItemState | TabsItemState | SplitItemState;

export interface DockState {
  placement: Placement;
  size: number;
  open: boolean;
  item: DockItemState;
}

export interface DockAreaState {
  version: number | null;
  root: DockItemState;
  docks?: Partial<Record<Placement, DockState>>;
}

/** State of a layout with no panels */
export function emptyItemState(): TabsItemState {
  return { type: 'tabs', tabs: [], active: 0 };
}

// =============================================================================
// Schemas
// =============================================================================

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

export const panelItemStateSchema: z.ZodType<PanelItemState> = z.object({
  type: z.literal('panel'),
  panelName: z.string().min(1),
  state: jsonValueSchema,
});

const tabsItemStateSchema: z.ZodType<TabsItemState> = z.object({
  type: z.literal('tabs'),
  tabs: z.array(panelItemStateSchema),
  active: z.number().int().min(0),
});

export const dockItemStateSchema: z.ZodType<DockItemState> = z.lazy(() =>
  z.union([
    panelItemStateSchema,
    tabsItemStateSchema,
    z.object({
      type: z.literal('split'),
      axis: z.enum(['horizontal', 'vertical']),
      fraction: z.number().min(0).max(1),
      first: dockItemStateSchema,
      second: dockItemStateSchema,
    }),
  ]),
);

const placementSchema = z.enum(['left', 'right', 'top', 'bottom']);

export const dockStateSchema: z.ZodType<DockState> = z.object({
  placement: placementSchema,
  size: z.number().nonnegative(),
  open: z.boolean(),
  item: dockItemStateSchema,
});

export const dockAreaStateSchema: z.ZodType<DockAreaState> = z.object({
  version: z.number().int().nullable(),
  root: dockItemStateSchema,
  docks: z
    .object({
      left: dockStateSchema.optional(),
      right: dockStateSchema.optional(),
      top: dockStateSchema.optional(),
      bottom: dockStateSchema.optional(),
    })
    .optional(),
});

/** Validate an already-decoded value as a dock area state */
export function parseDockAreaState(value: unknown): DockAreaState {
  const result = dockAreaStateSchema.safeParse(value);
  if (!result.success) {
    throw new DockError('invalid_state', `Invalid layout state: ${result.error.message}`, result.error.issues);
  }
  return result.data;
}

/** Decode and validate a saved layout string */
export function parseDockAreaJson(text: string): DockAreaState {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (e) {
    throw new DockError('invalid_state', `Layout is not valid JSON: ${String(e)}`);
  }
  return parseDockAreaState(value);
}

// =============================================================================
// Tree conversion
// =============================================================================

/** Lay nested item state out as a tree of panel items */
export function treeFromState(item: DockItemState): Tree<PanelItemState> {
  const tree = new Tree<PanelItemState>();
  writeItem(tree, 0, item);
  return tree;
}

function writeItem(tree: Tree<PanelItemState>, ix: number, item: DockItemState): void {
  switch (item.type) {
    case 'panel':
      tree.setNode(ix, leafNode([item]));
      return;
    case 'tabs':
      assertDock(
        item.tabs.length === 0 ? item.active === 0 : item.active < item.tabs.length,
        'invalid_tab_state',
        `Active tab ${item.active} is out of range for ${item.tabs.length} tabs`,
      );
      tree.setNode(ix, leafNode(item.tabs, item.active));
      return;
    case 'split':
      tree.setNode(ix, splitNode(item.axis === 'horizontal' ? 'right' : 'bottom', item.fraction));
      writeItem(tree, firstChild(ix), item.first);
      writeItem(tree, secondChild(ix), item.second);
      return;
  }
}

/**
 * Nested item state for the subtree at `ix`. A split with an empty side
 * collapses to the other side; an empty tree is an empty tab set.
 */
export function treeToState(tree: Tree<PanelItemState>, ix = 0): DockItemState {
  const node = tree.node(ix);
  switch (node.type) {
    case 'empty':
      return emptyItemState();
    case 'leaf':
      return { type: 'tabs', tabs: [...node.tabs], active: node.active };
    case 'horizontal':
    case 'vertical': {
      const first = firstChild(ix);
      const second = secondChild(ix);
      if (tree.node(first).type === 'empty') return treeToState(tree, second);
      if (tree.node(second).type === 'empty') return treeToState(tree, first);
      return {
        type: 'split',
        axis: node.type,
        fraction: node.fraction,
        first: treeToState(tree, first),
        second: treeToState(tree, second),
      };
    }
  }
}

/**
 * Tile Panel
 *
 * Free-form canvas of panels, each at its own bounds. Tiles move and resize
 * by dragging; positions and sizes snap to TILE_GRID and a tile never
 * shrinks below TILE_MIN_SIZE. Higher zIndex paints on top, then later items.
 */

import { z } from 'zod';
import type { Bounds, JsonValue, Point } from '../../types';
import { TILE_GRID, TILE_HANDLE_SIZE, TILE_MIN_SIZE, TILES_PANEL_NAME } from '../../constants';
import { DockError } from '../../errors';
import { createLogger } from '../logging';
import type { DockArea } from '../dock/dockArea';
import type { PanelItemState } from '../dock/state';
import { panelItemStateSchema } from '../dock/state';
import { BasePanel } from '../panel';
import type { LayoutHost, PanelView } from '../panel';
import type { PanelRegistry } from '../panel/registry';
import { getPanelRegistry } from '../panel/registry';

const log = createLogger('tiles');

export interface TileItem {
  readonly panel: PanelView;
  bounds: Bounds;
  zIndex: number;
}

export interface TileSize {
  width: number;
  height: number;
}

export type TileResizeAxis = 'horizontal' | 'vertical' | 'both';

type TileDrag =
  | { kind: 'move'; item: TileItem; start: Point; initial: Bounds }
  | { kind: 'resize'; item: TileItem; start: Point; initial: Bounds; axis: TileResizeAxis };

export interface TilePanelOptions {
  host?: LayoutHost | null;
}

function snap(value: number): number {
  return Math.round(value / TILE_GRID) * TILE_GRID;
}

function snapSize(value: number): number {
  return snap(Math.max(value, TILE_MIN_SIZE));
}

export class TilePanel extends BasePanel {
  readonly panelName = TILES_PANEL_NAME;

  private readonly tiles: TileItem[] = [];
  private host: LayoutHost | null;
  private drag: TileDrag | null = null;
  private dragChanged = false;

  constructor(options: TilePanelOptions = {}) {
    super();
    this.host = options.host ?? null;
  }

  override title(): string {
    return TILES_PANEL_NAME;
  }

  get items(): readonly TileItem[] {
    return this.tiles;
  }

  get panels(): PanelView[] {
    return this.tiles.map((tile) => tile.panel);
  }

  setHost(host: LayoutHost | null): void {
    this.host = host;
  }

  addItem(panel: PanelView, bounds: Bounds, zIndex = 0): boolean {
    if (this.tileOf(panel)) {
      log.verbose(() => `${panel.panelName} ${panel.panelId} is already a tile`);
      return false;
    }
    this.tiles.push({ panel, bounds: { ...bounds }, zIndex });
    this.host?.notifyLayoutChanged();
    return true;
  }

  removePanel(panel: PanelView): boolean {
    const ix = this.indexOfPanel(panel);
    if (ix === null) {
      log.warn(() => `removePanel: ${panel.panelName} is not a tile here`);
      return false;
    }
    this.tiles.splice(ix, 1);
    if (this.drag?.item.panel === panel) this.drag = null;
    panel.focusHandle().blur();
    this.host?.notifyLayoutChanged();
    return true;
  }

  indexOfPanel(panel: PanelView): number | null {
    const ix = this.tiles.findIndex((tile) => tile.panel === panel);
    return ix === -1 ? null : ix;
  }

  tileOf(panel: PanelView): TileItem | null {
    return this.tiles.find((tile) => tile.panel === panel) ?? null;
  }

  /** Items in paint order */
  sortedItems(): TileItem[] {
    return [...this.tiles].sort((a, b) => a.zIndex - b.zIndex);
  }

  /** Topmost item under `point`, counting the resize handles past its right and bottom edges */
  itemAt(point: Point): TileItem | null {
    const x = point.x - this.bounds.x;
    const y = point.y - this.bounds.y;
    const reach = TILE_HANDLE_SIZE / 2;
    const painted = this.sortedItems();
    for (let i = painted.length - 1; i >= 0; i--) {
      const tile = painted[i];
      if (!tile) continue;
      const { bounds } = tile;
      const insideX = x >= bounds.x && x < bounds.x + bounds.width + reach;
      const insideY = y >= bounds.y && y < bounds.y + bounds.height + reach;
      if (insideX && insideY) return tile;
    }
    return null;
  }

  bringToFront(panel: PanelView): boolean {
    const ix = this.indexOfPanel(panel);
    const tile = ix === null ? undefined : this.tiles[ix];
    if (ix === null || !tile) return false;

    const top = Math.max(...this.tiles.map((other) => other.zIndex));
    this.tiles.splice(ix, 1);
    this.tiles.push(tile);
    const moved = tile.zIndex !== top || ix !== this.tiles.length - 1;
    tile.zIndex = top;
    if (moved) this.host?.notifyLayoutChanged();
    return true;
  }

  /** Move `panel`'s tile to `origin`, clamped to the canvas and snapped */
  moveItem(panel: PanelView, origin: Point): boolean {
    const tile = this.tileOf(panel);
    if (!tile) return false;
    if (this.applyOrigin(tile, origin)) this.host?.notifyLayoutChanged();
    return true;
  }

  resizeItem(panel: PanelView, size: TileSize): boolean {
    const tile = this.tileOf(panel);
    if (!tile) return false;
    if (this.applySize(tile, size.width, size.height)) this.host?.notifyLayoutChanged();
    return true;
  }

  // ===========================================================================
  // Drag
  // ===========================================================================

  /** Start moving the tile under `point`; returns false when there is none */
  beginMove(point: Point): boolean {
    return this.beginDrag(point, null);
  }

  beginResize(point: Point, axis: TileResizeAxis): boolean {
    return this.beginDrag(point, axis);
  }

  /** Apply the pointer position of an ongoing drag */
  dragTo(point: Point): boolean {
    const drag = this.drag;
    if (!drag) return false;

    const dx = point.x - drag.start.x;
    const dy = point.y - drag.start.y;
    const { initial } = drag;

    let changed: boolean;
    if (drag.kind === 'move') {
      changed = this.applyOrigin(drag.item, { x: initial.x + dx, y: initial.y + dy });
    } else {
      const width = drag.axis === 'vertical' ? drag.item.bounds.width : initial.width + dx;
      const height = drag.axis === 'horizontal' ? drag.item.bounds.height : initial.height + dy;
      changed = this.applySize(drag.item, width, height);
    }
    this.dragChanged ||= changed;
    return true;
  }

  /** Finish the drag; notifies a layout change when the tile moved or resized */
  endDrag(): boolean {
    const drag = this.drag;
    if (!drag) return false;
    this.drag = null;
    if (this.dragChanged) {
      log.verbose(() => `Tile ${drag.item.panel.panelName} ${drag.kind} ended at ${JSON.stringify(drag.item.bounds)}`);
      this.host?.notifyLayoutChanged();
    }
    this.dragChanged = false;
    return true;
  }

  isDragging(): boolean {
    return this.drag !== null;
  }

  // ===========================================================================
  // Layout
  // ===========================================================================

  /** Extent of the canvas: the furthest right and bottom tile edges */
  contentSize(): TileSize {
    let width = 0;
    let height = 0;
    for (const { bounds } of this.tiles) {
      width = Math.max(width, bounds.x + bounds.width);
      height = Math.max(height, bounds.y + bounds.height);
    }
    return { width, height };
  }

  override render(bounds: Bounds): void {
    super.render(bounds);
    for (const tile of this.sortedItems()) {
      tile.panel.view().render({
        x: bounds.x + tile.bounds.x,
        y: bounds.y + tile.bounds.y,
        width: tile.bounds.width,
        height: tile.bounds.height,
      });
    }
  }

  override dumpState(): JsonValue {
    return {
      tiles: this.tiles.map((tile) => {
        const item = tile.panel.dump();
        if (item.type !== 'panel') {
          throw new DockError('invalid_node', `${tile.panel.panelName} cannot be saved as a tile`, item);
        }
        const { x, y, width, height } = tile.bounds;
        return {
          bounds: { x, y, width, height },
          zIndex: tile.zIndex,
          item: { type: item.type, panelName: item.panelName, state: item.state },
        };
      }),
    };
  }

  private beginDrag(point: Point, axis: TileResizeAxis | null): boolean {
    const tile = this.itemAt(point);
    if (!tile) return false;

    this.bringToFront(tile.panel);
    const initial = { ...tile.bounds };
    this.drag =
      axis === null
        ? { kind: 'move', item: tile, start: point, initial }
        : { kind: 'resize', item: tile, start: point, initial, axis };
    this.dragChanged = false;
    return true;
  }

  private applyOrigin(tile: TileItem, origin: Point): boolean {
    const x = snap(Math.max(origin.x, 0));
    const y = snap(Math.max(origin.y, 0));
    if (x === tile.bounds.x && y === tile.bounds.y) return false;
    tile.bounds = { ...tile.bounds, x, y };
    return true;
  }

  private applySize(tile: TileItem, width: number, height: number): boolean {
    const w = snapSize(width);
    const h = snapSize(height);
    if (w === tile.bounds.width && h === tile.bounds.height) return false;
    tile.bounds = { ...tile.bounds, width: w, height: h };
    return true;
  }
}

// =============================================================================
// Saved state
// =============================================================================

const tilesStateSchema = z.object({
  tiles: z.array(
    z.object({
      bounds: z.object({
        x: z.number(),
        y: z.number(),
        width: z.number().nonnegative(),
        height: z.number().nonnegative(),
      }),
      zIndex: z.number().int(),
      item: panelItemStateSchema,
    }),
  ),
});

/** Registry factory rebuilding a TilePanel and its tiles from saved state */
export function createTilePanel(dockArea: DockArea, _item: PanelItemState, info: JsonValue): TilePanel {
  const parsed = tilesStateSchema.safeParse(info);
  if (!parsed.success) {
    throw new DockError('invalid_state', `Invalid tiles state: ${parsed.error.message}`, info);
  }

  const panel = new TilePanel();
  for (const tile of parsed.data.tiles) {
    panel.addItem(dockArea.registry.build(dockArea, tile.item), tile.bounds, tile.zIndex);
  }
  panel.setHost(dockArea);
  return panel;
}

export function registerTilePanel(registry: PanelRegistry = getPanelRegistry()): void {
  registry.register(TILES_PANEL_NAME, createTilePanel);
}

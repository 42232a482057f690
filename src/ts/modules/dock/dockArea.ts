/**
 * Dock Area
 *
 * Root of a dockable layout: a center stack, optional edge docks, and at
 * most one zoomed panel shown over everything else.
 *
 * Every structural change bumps $layoutRevision; LayoutPersistence listens to
 * it for autosave.
 */

import { atom } from 'nanostores';
import type { Bounds, DockPlacement, Placement } from '../../types';
import { EMPTY_BOUNDS, PLACEMENTS, placementAxis } from '../../types';
import { createLogger } from '../logging';
import type { LayoutHost, PanelId, PanelView } from '../panel';
import type { PanelRegistry } from '../panel/registry';
import { getPanelRegistry } from '../panel/registry';
import { StackPanel } from '../stack/stackPanel';
import { TabPanel } from '../tabs/tabPanel';
import { TilePanel } from '../tiles/tilePanel';
import { Dock, dockAxis } from './dock';
import type { DockOptions } from './dock';
import { loadContainer } from './layoutTree';
import type { DockAreaState, DockState, PanelItemState } from './state';

const log = createLogger('dock');

export type ReadStateHook = (key: string) => Promise<string | null>;
export type WriteStateHook = (key: string, value: string) => Promise<void>;

export interface DockAreaOptions {
  id?: string;
  /** Layout version written with every dump */
  version?: number | null;
  /** Defaults to the process-wide registry */
  registry?: PanelRegistry;
  readState?: ReadStateHook;
  writeState?: WriteStateHook;
}

/** Tab panels the dock toggle buttons sit on */
export interface ToggleButtonPanels {
  left: PanelId | null;
  right: PanelId | null;
  bottom: PanelId | null;
}

type PanelClass<T extends PanelView> = abstract new (...args: never[]) => T;

export class DockArea implements LayoutHost {
  readonly id: string;
  version: number | null;
  readonly registry: PanelRegistry;

  /** Zoomed panel, held weakly so the area never keeps a closed panel alive */
  readonly $zoomed = atom<WeakRef<PanelView> | null>(null);
  readonly $layoutRevision = atom(0);

  root: StackPanel;
  bounds: Bounds = { ...EMPTY_BOUNDS };

  private readonly docks = new Map<Placement, Dock>();
  private locked = false;
  private readHook: ReadStateHook;
  private writeHook: WriteStateHook;

  constructor(options: DockAreaOptions = {}) {
    this.id = options.id ?? 'dock-area';
    this.version = options.version ?? null;
    this.registry = options.registry ?? getPanelRegistry();
    this.readHook = options.readState ?? (async () => null);
    this.writeHook = options.writeState ?? (async () => undefined);
    this.root = new StackPanel('horizontal');
    this.root.setHost(this);
  }

  // ===========================================================================
  // Host hooks
  // ===========================================================================

  readState(key: string): Promise<string | null> {
    return this.readHook(key);
  }

  writeState(key: string, value: string): Promise<void> {
    return this.writeHook(key, value);
  }

  setStateHooks(hooks: { readState?: ReadStateHook; writeState?: WriteStateHook }): void {
    if (hooks.readState) this.readHook = hooks.readState;
    if (hooks.writeState) this.writeHook = hooks.writeState;
  }

  notifyLayoutChanged(): void {
    this.$layoutRevision.set(this.$layoutRevision.get() + 1);
  }

  /** A locked area still resizes but refuses splits and tab moves */
  setLocked(locked: boolean): void {
    this.locked = locked;
  }

  isLocked(): boolean {
    return this.locked;
  }

  // ===========================================================================
  // Structure
  // ===========================================================================

  /** Replace the center content */
  setCenter(item: PanelView): void {
    const root = item instanceof StackPanel ? item : new StackPanel('horizontal', [item]);
    this.replaceRoot(root);
    this.notifyLayoutChanged();
  }

  setDock(placement: Placement, item: PanelView, options: DockOptions = {}): Dock {
    const stack = item instanceof StackPanel ? item : new StackPanel(dockAxis(placement), [item]);
    const dock = new Dock(placement, stack, options);
    this.docks.get(placement)?.setHost(null);
    dock.setHost(this);
    this.docks.set(placement, dock);
    this.notifyLayoutChanged();
    return dock;
  }

  dock(placement: Placement): Dock | null {
    return this.docks.get(placement) ?? null;
  }

  /** Open or close a dock; returns the new open state, false when there is no dock */
  toggleDock(placement: Placement): boolean {
    const dock = this.docks.get(placement);
    if (!dock) {
      log.warn(() => `No ${placement} dock to toggle`);
      return false;
    }
    return dock.toggleOpen();
  }

  /**
   * Add a panel as a tab. Center content goes to the first tab panel of the
   * root stack, creating one if needed; edge placements go to that dock.
   */
  addPanel(panel: PanelView, placement: DockPlacement = 'center'): void {
    if (placement === 'center') {
      let tabs = this.root.panels.find((child): child is TabPanel => child instanceof TabPanel);
      if (!tabs) {
        tabs = new TabPanel();
        this.root.addPanel(tabs);
      }
      tabs.addPanel(panel);
      return;
    }

    const dock = this.docks.get(placement);
    if (dock) {
      dock.addPanel(panel);
    } else {
      this.setDock(placement, new TabPanel([panel]));
    }
  }

  /**
   * Add a panel in a new tab panel on one side of the center content. When
   * the root runs along the other axis it is wrapped in a new root first.
   */
  addPanelAt(panel: PanelView, placement: Placement, size?: number): TabPanel {
    const axis = placementAxis(placement);
    if (this.root.axis !== axis) {
      if (this.root.panels.length <= 1) {
        this.root.setAxis(axis);
      } else {
        const previous = this.root;
        this.replaceRoot(new StackPanel(axis));
        this.root.addPanel(previous);
      }
    }

    const tabs = new TabPanel([panel]);
    this.root.addPanelAt(tabs, placement, size);
    return tabs;
  }

  // ===========================================================================
  // Zoom
  // ===========================================================================

  /** Zoom `panel`, or unzoom when it is already the zoomed panel */
  toggleZoom(panel: PanelView): void {
    if (this.zoomedPanel() === panel) {
      this.$zoomed.set(null);
      log.verbose(() => `Unzoomed ${panel.panelName}`);
      return;
    }
    this.$zoomed.set(new WeakRef(panel));
    log.verbose(() => `Zoomed ${panel.panelName}`);
  }

  zoomedPanel(): PanelView | null {
    return this.$zoomed.get()?.deref() ?? null;
  }

  // ===========================================================================
  // Lookup
  // ===========================================================================

  /** First panel, depth first through the center then the docks, matching `predicate` */
  findPanel(predicate: (panel: PanelView) => boolean): PanelView | null {
    const roots: PanelView[] = [this.root];
    for (const placement of PLACEMENTS) {
      const dock = this.docks.get(placement);
      if (dock) roots.push(dock.item);
    }
    for (const root of roots) {
      const found = findIn(root, predicate);
      if (found) return found;
    }
    return null;
  }

  /** First panel that is an instance of `ctor` */
  panel<T extends PanelView>(ctor: PanelClass<T>): T | null {
    const found = this.findPanel((panel) => panel instanceof ctor);
    return found instanceof ctor ? found : null;
  }

  toggleButtonPanels(): ToggleButtonPanels {
    return {
      left: this.root.leftTopTabPanel()?.panelId ?? null,
      right: this.root.rightTopTabPanel()?.panelId ?? null,
      bottom: this.docks.get('bottom')?.item.leftTopTabPanel()?.panelId ?? null,
    };
  }

  // ===========================================================================
  // State
  // ===========================================================================

  dump(): DockAreaState {
    const state: DockAreaState = { version: this.version, root: this.root.dump() };
    if (this.docks.size > 0) {
      const docks: Partial<Record<Placement, DockState>> = {};
      for (const [placement, dock] of this.docks) {
        docks[placement] = dock.dump();
      }
      state.docks = docks;
    }
    return state;
  }

  /**
   * Replace the whole layout; unknown panels load as InvalidPanel. Everything
   * is built before the area changes, so a state that fails to build leaves
   * the current layout in place.
   */
  load(state: DockAreaState): void {
    const build = (item: PanelItemState): PanelView => this.registry.build(this, item);

    const root = loadContainer(state.root, build, 'horizontal');
    const docks = new Map<Placement, Dock>();
    for (const placement of PLACEMENTS) {
      const saved = state.docks?.[placement];
      if (!saved) continue;
      docks.set(
        placement,
        new Dock(placement, loadContainer(saved.item, build, dockAxis(placement)), {
          size: saved.size,
          open: saved.open,
        }),
      );
    }

    this.version = state.version;
    this.replaceRoot(root);
    for (const dock of this.docks.values()) dock.setHost(null);
    this.docks.clear();
    for (const [placement, dock] of docks) {
      dock.setHost(this);
      this.docks.set(placement, dock);
    }

    this.$zoomed.set(null);
    log.info(() => `Loaded layout version ${String(state.version)}`);
    this.notifyLayoutChanged();
  }

  // ===========================================================================
  // Render
  // ===========================================================================

  /**
   * Hand out bounds: the zoomed panel takes everything while it is still in
   * the layout; otherwise left and right docks take full height, top and bottom docks the width between
   * them, and the center the rest.
   */
  render(bounds: Bounds): void {
    this.bounds = { ...bounds };

    const zoomed = this.zoomedPanel();
    if (zoomed && this.findPanel((panel) => panel === zoomed)) {
      zoomed.view().render(bounds);
      return;
    }
    if (zoomed) {
      log.verbose(() => `Zoomed ${zoomed.panelName} left the layout, unzooming`);
      this.$zoomed.set(null);
    }

    let { x, y, width, height } = bounds;
    const left = this.openDock('left');
    if (left) {
      left.render({ x, y, width: left.size, height });
      x += left.size;
      width -= left.size;
    }
    const right = this.openDock('right');
    if (right) {
      right.render({ x: x + width - right.size, y, width: right.size, height });
      width -= right.size;
    }
    const top = this.openDock('top');
    if (top) {
      top.render({ x, y, width, height: top.size });
      y += top.size;
      height -= top.size;
    }
    const bottom = this.openDock('bottom');
    if (bottom) {
      bottom.render({ x, y: y + height - bottom.size, width, height: bottom.size });
      height -= bottom.size;
    }

    this.root.render({ x, y, width: Math.max(width, 0), height: Math.max(height, 0) });
  }

  private openDock(placement: Placement): Dock | null {
    const dock = this.docks.get(placement);
    return dock?.open ? dock : null;
  }

  private replaceRoot(root: StackPanel): void {
    this.root.setHost(null);
    root.setParent(null);
    root.setHost(this);
    this.root = root;
  }
}

function findIn(panel: PanelView, predicate: (panel: PanelView) => boolean): PanelView | null {
  if (predicate(panel)) return panel;
  const children =
    panel instanceof StackPanel || panel instanceof TabPanel || panel instanceof TilePanel ? panel.panels : [];
  for (const child of children) {
    const found = findIn(child, predicate);
    if (found) return found;
  }
  return null;
}

/**
 * Tab Panel
 *
 * Ordered tabs with one active tab shown below a tab bar. Handles tab
 * drag/drop: moving a tab to another tab panel, or splitting beside this one.
 */

import type { Bounds, Placement, Point } from '../../types';
import { isPlacementBefore, placementAxis } from '../../types';
import { DROP_ZONE_FRACTION, TAB_BAR_HEIGHT, TAB_PANEL_NAME } from '../../constants';
import { createLogger } from '../logging';
import type { DockItemState } from '../dock/state';
import { dumpContainer } from '../dock/layoutTree';
import { BasePanel } from '../panel';
import type { LayoutHost, PanelView } from '../panel';
import { StackPanel } from '../stack/stackPanel';

const log = createLogger('tabs');

export interface TabPanelOptions {
  active?: number;
  /** Whether the tab panel itself may be closed from its parent */
  closeable?: boolean;
}

/**
 * Which edge a drop at `point` splits towards: the outer quarter of each
 * side, horizontal edges first. Null means the centre (join as a tab).
 */
export function dropPlacement(point: Point, bounds: Bounds): Placement | null {
  if (point.x < bounds.x + bounds.width * DROP_ZONE_FRACTION) return 'left';
  if (point.x > bounds.x + bounds.width * (1 - DROP_ZONE_FRACTION)) return 'right';
  if (point.y < bounds.y + bounds.height * DROP_ZONE_FRACTION) return 'top';
  if (point.y > bounds.y + bounds.height * (1 - DROP_ZONE_FRACTION)) return 'bottom';
  return null;
}

export class TabPanel extends BasePanel {
  readonly panelName = TAB_PANEL_NAME;
  readonly panels: PanelView[] = [];

  private activeIx = 0;
  private parentRef: WeakRef<StackPanel> | null = null;
  private host: LayoutHost | null = null;
  private readonly isCloseable: boolean;

  constructor(panels: PanelView[] = [], options: TabPanelOptions = {}) {
    super();
    this.panels.push(...panels);
    this.activeIx = clampIndex(options.active ?? 0, this.panels.length);
    this.isCloseable = options.closeable ?? true;
  }

  get parent(): StackPanel | null {
    return this.parentRef?.deref() ?? null;
  }

  setParent(parent: StackPanel | null): void {
    this.parentRef = parent ? new WeakRef(parent) : null;
  }

  setHost(host: LayoutHost | null): void {
    this.host = host;
  }

  get activeIndex(): number {
    return this.activeIx;
  }

  override title(): string {
    return this.activePanel()?.title() ?? super.title();
  }

  override closeable(): boolean {
    return this.isCloseable;
  }

  activePanel(): PanelView | null {
    return this.panels[this.activeIx] ?? null;
  }

  indexOf(panel: PanelView): number | null {
    const ix = this.panels.indexOf(panel);
    return ix === -1 ? null : ix;
  }

  setActiveIndex(ix: number): void {
    if (ix < 0 || ix >= this.panels.length || ix === this.activeIx) return;
    this.activeIx = ix;
    this.host?.notifyLayoutChanged();
  }

  /** Append a tab and make it active; a panel already here is just activated */
  addPanel(panel: PanelView): void {
    this.insertPanel(panel, this.panels.length);
  }

  insertPanel(panel: PanelView, ix: number): void {
    const existing = this.indexOf(panel);
    if (existing !== null) {
      this.setActiveIndex(existing);
      return;
    }
    const at = Math.min(Math.max(ix, 0), this.panels.length);
    this.panels.splice(at, 0, panel);
    this.activeIx = at;
    this.host?.notifyLayoutChanged();
  }

  /**
   * Remove a tab. Removing the active tab selects the first one. An emptied
   * tab panel removes itself from its parent stack.
   */
  removePanel(panel: PanelView): boolean {
    const ix = this.indexOf(panel);
    if (ix === null) {
      log.warn(() => `removePanel: ${panel.panelName} is not a tab here`);
      return false;
    }

    this.panels.splice(ix, 1);
    if (ix === this.activeIx) {
      this.activeIx = 0;
    } else if (ix < this.activeIx) {
      this.activeIx -= 1;
    }
    panel.focusHandle().blur();

    const host = this.host;
    if (this.panels.length === 0) {
      this.parent?.removePanel(this);
    }
    host?.notifyLayoutChanged();
    return true;
  }

  /** Close the active tab if it allows closing */
  closeActive(): boolean {
    const panel = this.activePanel();
    if (!panel || !panel.closeable()) return false;
    return this.removePanel(panel);
  }

  /** Ask the dock area to zoom this tab panel when its active tab is zoomable */
  toggleZoom(): void {
    const panel = this.activePanel();
    if (!panel?.zoomable()) return;
    this.host?.toggleZoom(this);
  }

  /** Move one of this panel's tabs onto `target` as its active tab */
  moveTabTo(panel: PanelView, target: TabPanel): boolean {
    if (target === this || this.isLocked()) return false;
    if (this.indexOf(panel) === null) {
      log.warn(() => `moveTabTo: ${panel.panelName} is not a tab here`);
      return false;
    }
    // Add first: removing the last tab may detach this panel from the tree.
    target.addPanel(panel);
    this.removePanel(panel);
    return true;
  }

  /**
   * Put `panel` in a new tab panel beside this one. Along the parent's axis
   * the new tab panel becomes a sibling; across it, this tab panel is
   * replaced by a stack holding both.
   */
  splitPanel(panel: PanelView, placement: Placement): TabPanel | null {
    const parent = this.parent;
    if (!parent || this.isLocked()) return null;

    const source = this.indexOf(panel) === null ? null : this;
    if (source && source.panels.length === 1) {
      log.verbose(() => 'Refusing to split a tab panel with its only tab');
      return null;
    }
    source?.removePanel(panel);

    const created = new TabPanel([panel]);
    const axis = placementAxis(placement);
    if (parent.axis === axis) {
      if (isPlacementBefore(placement)) {
        parent.insertPanelBefore(created, this);
      } else {
        parent.insertPanelAfter(created, this);
      }
    } else {
      const stack = new StackPanel(axis);
      parent.replacePanel(this, stack);
      const ordered = isPlacementBefore(placement) ? [created, this] : [this, created];
      ordered.forEach((child) => stack.addPanel(child));
    }

    log.verbose(() => `Split ${panel.panelName} to the ${placement}`);
    return created;
  }

  /** Render the active tab below the tab bar */
  override render(bounds: Bounds): void {
    super.render(bounds);
    const content: Bounds = {
      x: bounds.x,
      y: bounds.y + TAB_BAR_HEIGHT,
      width: bounds.width,
      height: Math.max(bounds.height - TAB_BAR_HEIGHT, 0),
    };
    this.activePanel()?.view().render(content);
  }

  override dump(): DockItemState {
    return dumpContainer(this);
  }

  private isLocked(): boolean {
    return this.host?.isLocked() ?? false;
  }
}

function clampIndex(ix: number, length: number): number {
  return length === 0 ? 0 : Math.min(Math.max(ix, 0), length - 1);
}

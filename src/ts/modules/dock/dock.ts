/**
 * Edge Dock
 *
 * A collapsible region on one edge of a dock area holding its own stack.
 */

import type { Axis, Bounds, Placement, Point } from '../../types';
import { DEFAULT_DOCK_SIZE, PANEL_MIN_SIZE } from '../../constants';
import { createLogger } from '../logging';
import type { LayoutHost, PanelView } from '../panel';
import { StackPanel } from '../stack/stackPanel';
import { TabPanel } from '../tabs/tabPanel';
import type { DockState } from './state';

const log = createLogger('dock');

export interface DockOptions {
  size?: number;
  open?: boolean;
  /** A dock that is not collapsible is always open */
  collapsible?: boolean;
}

/** Left/right docks stack their panels top to bottom, top/bottom docks left to right */
export function dockAxis(placement: Placement): Axis {
  return placement === 'left' || placement === 'right' ? 'vertical' : 'horizontal';
}

/** Distance from the dock's edge to `pointer`, and the area's length on that axis */
function pointerExtent(placement: Placement, pointer: Point, area: Bounds): [number, number] {
  switch (placement) {
    case 'left':
      return [pointer.x - area.x, area.width];
    case 'right':
      return [area.x + area.width - pointer.x, area.width];
    case 'top':
      return [pointer.y - area.y, area.height];
    case 'bottom':
      return [area.y + area.height - pointer.y, area.height];
  }
}

export class Dock {
  readonly placement: Placement;
  readonly collapsible: boolean;
  item: StackPanel;

  private currentSize: number;
  private isOpen: boolean;
  private host: LayoutHost | null = null;

  constructor(placement: Placement, item: StackPanel, options: DockOptions = {}) {
    this.placement = placement;
    this.item = item;
    this.collapsible = options.collapsible ?? true;
    this.currentSize = Math.max(options.size ?? DEFAULT_DOCK_SIZE, PANEL_MIN_SIZE);
    this.isOpen = options.open ?? true;
  }

  get size(): number {
    return this.currentSize;
  }

  get open(): boolean {
    return !this.collapsible || this.isOpen;
  }

  setHost(host: LayoutHost | null): void {
    this.host = host;
    this.item.setHost(host);
  }

  setItem(item: StackPanel): void {
    this.item.setHost(null);
    this.item = item;
    this.item.setHost(this.host);
    this.host?.notifyLayoutChanged();
  }

  setSize(size: number): void {
    this.currentSize = Math.max(size, PANEL_MIN_SIZE);
    this.host?.notifyLayoutChanged();
  }

  setOpen(open: boolean): void {
    if (!this.collapsible && !open) {
      log.verbose(() => `${this.placement} dock is not collapsible`);
      return;
    }
    if (this.isOpen === open) return;
    this.isOpen = open;
    this.host?.notifyLayoutChanged();
  }

  /** Returns the new open state */
  toggleOpen(): boolean {
    this.setOpen(!this.isOpen);
    return this.open;
  }

  /** Add as a tab of the dock's first tab panel, or in a new one */
  addPanel(panel: PanelView): void {
    const tabs = this.item.leftTopTabPanel();
    if (tabs) {
      tabs.addPanel(panel);
    } else {
      this.item.addPanel(new TabPanel([panel]));
    }
  }

  /**
   * Resize so the dock's inner edge follows `pointer`. The size is kept
   * between PANEL_MIN_SIZE and what leaves PANEL_MIN_SIZE for the centre
   * after the opposite dock.
   */
  resizeTo(pointer: Point, area: Bounds, oppositeSize = 0): number {
    const [raw, length] = pointerExtent(this.placement, pointer, area);
    const max = length - PANEL_MIN_SIZE - oppositeSize;
    this.setSize(Math.max(Math.min(raw, max), PANEL_MIN_SIZE));
    return this.currentSize;
  }

  render(bounds: Bounds): void {
    this.item.render(bounds);
  }

  dump(): DockState {
    return {
      placement: this.placement,
      size: this.currentSize,
      open: this.open,
      item: this.item.dump(),
    };
  }
}

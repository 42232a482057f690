/**
 * Stack Panel
 *
 * Container laying out child panels along one axis through a
 * ResizablePanelGroup. Children and group slots stay in the same order.
 * A stack that loses its last child removes itself from its parent.
 */

import type { Axis, Bounds, Placement } from '../../types';
import { isPlacementBefore } from '../../types';
import { PANEL_MIN_SIZE, STACK_PANEL_NAME } from '../../constants';
import { createLogger } from '../logging';
import type { DockItemState } from '../dock/state';
import { dumpContainer } from '../dock/layoutTree';
import { BasePanel } from '../panel';
import type { LayoutHost, PanelView } from '../panel';
import { ResizablePanel, ResizablePanelGroup } from '../resizable';
import { TabPanel } from '../tabs/tabPanel';

const log = createLogger('stack');

export class StackPanel extends BasePanel {
  readonly panelName = STACK_PANEL_NAME;
  readonly panels: PanelView[] = [];
  readonly group: ResizablePanelGroup<PanelView>;

  private parentRef: WeakRef<StackPanel> | null = null;
  private host: LayoutHost | null = null;

  constructor(axis: Axis = 'horizontal', panels: PanelView[] = []) {
    super();
    this.group = new ResizablePanelGroup<PanelView>({
      axis,
      onResize: () => this.host?.notifyLayoutChanged(),
    });
    panels.forEach((panel) => this.addPanel(panel));
  }

  get axis(): Axis {
    return this.group.axis;
  }

  /** Parent stack, or null for a root or a stack whose parent is gone */
  get parent(): StackPanel | null {
    return this.parentRef?.deref() ?? null;
  }

  setParent(parent: StackPanel | null): void {
    this.parentRef = parent ? new WeakRef(parent) : null;
  }

  layoutHost(): LayoutHost | null {
    return this.host;
  }

  /** Set the host on this stack and every container below it */
  setHost(host: LayoutHost | null): void {
    this.host = host;
    for (const panel of this.panels) {
      if (panel instanceof StackPanel || panel instanceof TabPanel) {
        panel.setHost(host);
      }
    }
  }

  isRoot(): boolean {
    return this.parent === null;
  }

  /** True when this stack and every ancestor hold at most one panel */
  isLastPanel(): boolean {
    if (this.panels.length > 1) return false;
    return this.parent?.isLastPanel() ?? true;
  }

  addPanel(panel: PanelView, size?: number): boolean {
    return this.insertAt(panel, this.panels.length, size);
  }

  /** Add at the start for left/top, at the end for right/bottom */
  addPanelAt(panel: PanelView, placement: Placement, size?: number): boolean {
    return this.insertAt(panel, isPlacementBefore(placement) ? 0 : this.panels.length, size);
  }

  /** Insert before `ix` for left/top, after it for right/bottom */
  insertPanelAt(panel: PanelView, ix: number, placement: Placement, size?: number): boolean {
    return this.insertAt(panel, isPlacementBefore(placement) ? ix : ix + 1, size);
  }

  insertPanelBefore(panel: PanelView, target: PanelView, size?: number): boolean {
    const ix = this.indexOfPanel(target);
    if (ix === null) {
      log.warn(() => `insertPanelBefore: ${target.panelName} is not in this stack`);
      return false;
    }
    return this.insertAt(panel, ix, size);
  }

  insertPanelAfter(panel: PanelView, target: PanelView, size?: number): boolean {
    const ix = this.indexOfPanel(target);
    if (ix === null) {
      log.warn(() => `insertPanelAfter: ${target.panelName} is not in this stack`);
      return false;
    }
    return this.insertAt(panel, ix + 1, size);
  }

  /**
   * Remove `panel` by identity. An emptied non-root stack removes itself
   * from its parent, which may cascade further up.
   */
  removePanel(panel: PanelView): boolean {
    const ix = this.indexOfPanel(panel);
    if (ix === null) {
      log.warn(() => `removePanel: ${panel.panelName} ${panel.panelId} is not in this stack`);
      return false;
    }

    this.panels.splice(ix, 1);
    this.group.removeChild(ix);
    this.release(panel);
    log.verbose(() => `Removed ${panel.panelName} from stack, ${this.panels.length} left`);

    const host = this.host;
    this.removeSelfIfEmpty();
    host?.notifyLayoutChanged();
    return true;
  }

  /** Swap `old` for `replacement`, keeping the slot's size */
  replacePanel(old: PanelView, replacement: PanelView): boolean {
    const ix = this.indexOfPanel(old);
    const slot = ix === null ? undefined : this.group.children[ix];
    if (ix === null || !slot) {
      log.warn(() => `replacePanel: ${old.panelName} is not in this stack`);
      return false;
    }

    this.panels[ix] = replacement;
    this.group.replaceChild(
      new ResizablePanel(replacement, {
        size: slot.size,
        grow: slot.grow,
        minSize: slot.minSize,
        maxSize: slot.maxSize,
      }),
      ix,
    );
    this.release(old);
    this.adopt(replacement);
    this.host?.notifyLayoutChanged();
    return true;
  }

  indexOfPanel(panel: PanelView): number | null {
    const ix = this.panels.indexOf(panel);
    return ix === -1 ? null : ix;
  }

  /** First tab panel at the top-left, starting from the outermost stack when `checkParent` is set */
  leftTopTabPanel(checkParent = false): TabPanel | null {
    if (checkParent) {
      const found = this.parent?.leftTopTabPanel(true);
      if (found) return found;
    }
    return firstTabPanel(this.panels[0], (stack) => stack.leftTopTabPanel());
  }

  /** First tab panel at the top-right, starting from the outermost stack when `checkParent` is set */
  rightTopTabPanel(checkParent = false): TabPanel | null {
    if (checkParent) {
      const found = this.parent?.rightTopTabPanel(true);
      if (found) return found;
    }
    const panel = this.axis === 'vertical' ? this.panels[0] : this.panels[this.panels.length - 1];
    return firstTabPanel(panel, (stack) => stack.rightTopTabPanel());
  }

  removeAllPanels(): void {
    this.panels.forEach((panel) => this.release(panel));
    this.panels.length = 0;
    this.group.removeAllChildren();
    this.host?.notifyLayoutChanged();
  }

  setAxis(axis: Axis): void {
    if (this.axis === axis) return;
    this.group.setAxis(axis);
    this.host?.notifyLayoutChanged();
  }

  /** Lay out the group along the axis and render each child in its slot */
  override render(bounds: Bounds): void {
    super.render(bounds);
    const horizontal = this.axis === 'horizontal';
    const sizes = this.group.layout(horizontal ? bounds.width : bounds.height);

    let offset = horizontal ? bounds.x : bounds.y;
    this.panels.forEach((panel, i) => {
      const size = sizes[i] ?? 0;
      panel.view().render(
        horizontal
          ? { x: offset, y: bounds.y, width: size, height: bounds.height }
          : { x: bounds.x, y: offset, width: bounds.width, height: size },
      );
      offset += size;
    });
  }

  override dump(): DockItemState {
    return dumpContainer(this);
  }

  private insertAt(panel: PanelView, ix: number, size?: number): boolean {
    if (this.panels.includes(panel)) {
      log.verbose(() => `${panel.panelName} ${panel.panelId} is already in this stack`);
      return false;
    }

    const at = this.group.insertChild(
      new ResizablePanel(panel, { size: size ?? null, minSize: PANEL_MIN_SIZE }),
      ix,
    );
    this.panels.splice(at, 0, panel);
    this.adopt(panel);
    this.host?.notifyLayoutChanged();
    return true;
  }

  private adopt(panel: PanelView): void {
    if (panel instanceof StackPanel || panel instanceof TabPanel) {
      panel.setParent(this);
      panel.setHost(this.host);
    }
  }

  private release(panel: PanelView): void {
    if ((panel instanceof StackPanel || panel instanceof TabPanel) && panel.parent === this) {
      panel.setParent(null);
    }
  }

  private removeSelfIfEmpty(): void {
    if (this.panels.length > 0) return;
    const parent = this.parent;
    if (!parent) return;
    log.verbose(() => 'Stack emptied, removing it from its parent');
    parent.removePanel(this);
  }
}

function firstTabPanel(
  panel: PanelView | undefined,
  descend: (stack: StackPanel) => TabPanel | null,
): TabPanel | null {
  if (panel instanceof TabPanel) return panel;
  if (panel instanceof StackPanel) return descend(panel);
  return null;
}

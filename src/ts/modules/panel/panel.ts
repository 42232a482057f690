/**
 * Panel Abstraction
 *
 * Capability interface every dockable panel implements, plus BasePanel with
 * the defaults most panels keep.
 */

import type { Bounds, JsonValue } from '../../types';
import { EMPTY_BOUNDS } from '../../types';
import { UNNAMED_PANEL_TITLE } from '../../constants';
import type { DockItemState } from '../dock/state';
import { FocusHandle } from './focus';
import type { PanelId } from './panelId';
import { newPanelId } from './panelId';

/** Something the host can hand bounds to */
export interface Renderable {
  render(bounds: Bounds): void;
}

export interface PopupMenuItem {
  id: string;
  label: string;
  action?: () => void;
}

export interface ToolbarButton {
  id: string;
  icon: string;
  tooltip?: string;
  onClick: () => void;
}

/**
 * The dock area as seen from the containers it owns.
 */
export interface LayoutHost {
  notifyLayoutChanged(): void;
  toggleZoom(panel: PanelView): void;
  isLocked(): boolean;
}

export interface Panel {
  /** Registry key used to rebuild the panel from saved state */
  readonly panelName: string;
  readonly panelId: PanelId;
  title(): string;
  closeable(): boolean;
  zoomable(): boolean;
  collapsible(): boolean;
  /** Return the context menu with this panel's entries added */
  popupMenu(menu: PopupMenuItem[]): PopupMenuItem[];
  toolbarButtons(): ToolbarButton[];
  dump(): DockItemState;
}

/** Type-erased handle the layout engine stores and renders */
export interface PanelView extends Panel {
  view(): Renderable;
  focusHandle(): FocusHandle;
}

export abstract class BasePanel implements PanelView, Renderable {
  abstract readonly panelName: string;
  readonly panelId: PanelId = newPanelId();

  /** Bounds from the last render */
  bounds: Bounds = { ...EMPTY_BOUNDS };

  private focus: FocusHandle | null = null;

  title(): string {
    return UNNAMED_PANEL_TITLE;
  }

  closeable(): boolean {
    return true;
  }

  zoomable(): boolean {
    return true;
  }

  collapsible(): boolean {
    return false;
  }

  popupMenu(menu: PopupMenuItem[]): PopupMenuItem[] {
    return menu;
  }

  toolbarButtons(): ToolbarButton[] {
    return [];
  }

  view(): Renderable {
    return this;
  }

  render(bounds: Bounds): void {
    this.bounds = { ...bounds };
  }

  focusHandle(): FocusHandle {
    this.focus ??= new FocusHandle(this.panelId);
    return this.focus;
  }

  /** Panel-specific state written under `state` in the saved layout */
  dumpState(): JsonValue {
    return null;
  }

  dump(): DockItemState {
    return { type: 'panel', panelName: this.panelName, state: this.dumpState() };
  }
}

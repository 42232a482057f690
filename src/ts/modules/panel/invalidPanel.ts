/**
 * Invalid Panel
 *
 * Placeholder for a saved panel no factory could rebuild. It shows the
 * missing name and saves the original item back unchanged.
 */

import { INVALID_PANEL_NAME } from '../../constants';
import type { PanelItemState } from '../dock/state';
import { BasePanel } from './panel';

export class InvalidPanel extends BasePanel {
  readonly panelName = INVALID_PANEL_NAME;
  readonly item: PanelItemState;
  readonly reason: string;

  constructor(item: PanelItemState, reason = 'not registered') {
    super();
    this.item = item;
    this.reason = reason;
  }

  get missingName(): string {
    return this.item.panelName;
  }

  override title(): string {
    return `Invalid panel: ${this.item.panelName}`;
  }

  override zoomable(): boolean {
    return false;
  }

  override dump(): PanelItemState {
    return this.item;
  }
}

/**
 * Focus Handle
 *
 * Keyboard focus token for one panel. At most one panel holds focus; the
 * current holder is published through $focusedPanelId.
 */

import { $focusedPanelId } from '../../stores';
import type { PanelId } from './panelId';

export class FocusHandle {
  readonly panelId: PanelId;

  constructor(panelId: PanelId) {
    this.panelId = panelId;
  }

  focus(): void {
    $focusedPanelId.set(this.panelId);
  }

  blur(): void {
    if ($focusedPanelId.get() === this.panelId) {
      $focusedPanelId.set(null);
    }
  }

  isFocused(): boolean {
    return $focusedPanelId.get() === this.panelId;
  }
}

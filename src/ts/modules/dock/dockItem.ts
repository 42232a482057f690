/**
 * Container builders for assembling a layout in code.
 */

import type { Axis } from '../../types';
import type { PanelView } from '../panel';
import { StackPanel } from '../stack/stackPanel';
import { TabPanel } from '../tabs/tabPanel';

/**
 * Stack `items` along `axis`. `sizes[i]` gives item i an explicit size;
 * missing or null entries grow.
 */
export function dockSplit(axis: Axis, items: PanelView[], sizes: (number | null)[] = []): StackPanel {
  const stack = new StackPanel(axis);
  items.forEach((item, i) => stack.addPanel(item, sizes[i] ?? undefined));
  return stack;
}

export function dockTabs(panels: PanelView[], active = 0): TabPanel {
  return new TabPanel(panels, { active });
}

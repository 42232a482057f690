export { BasePanel } from './panel';
export type {
  LayoutHost,
  Panel,
  PanelView,
  PopupMenuItem,
  Renderable,
  ToolbarButton,
} from './panel';
export { FocusHandle } from './focus';
export { InvalidPanel } from './invalidPanel';
export { PanelRegistry, getPanelRegistry, registerPanel } from './registry';
export type { PanelFactory } from './registry';
export { newPanelId } from './panelId';
export type { PanelId } from './panelId';

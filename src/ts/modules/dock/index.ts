export { DockArea } from './dockArea';
export type {
  DockAreaOptions,
  ReadStateHook,
  ToggleButtonPanels,
  WriteStateHook,
} from './dockArea';
export { Dock, dockAxis } from './dock';
export type { DockOptions } from './dock';
export { dockSplit, dockTabs } from './dockItem';
export { containerFromTree, containerToTree, dumpContainer, loadContainer } from './layoutTree';
export {
  dockAreaStateSchema,
  dockItemStateSchema,
  dockStateSchema,
  emptyItemState,
  panelItemStateSchema,
  parseDockAreaJson,
  parseDockAreaState,
  treeFromState,
  treeToState,
} from './state';
export type {
  DockAreaState,
  DockItemState,
  DockState,
  PanelItemState,
  SplitItemState,
  TabsItemState,
} from './state';

export { ResizablePanel, clampToSlot } from './resizablePanel';
export type { ResizablePanelOptions, SlotConstraint } from './resizablePanel';
export { ResizablePanelGroup } from './resizablePanelGroup';
export type { ResizablePanelGroupOptions } from './resizablePanelGroup';
export { distribute } from './distribute';

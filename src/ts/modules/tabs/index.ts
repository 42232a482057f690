export { TabPanel, dropPlacement } from './tabPanel';
export type { TabPanelOptions } from './tabPanel';

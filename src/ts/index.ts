/**
 * Dockframe
 *
 * Dockable panel layout engine: resizable, splittable, tabbed regions with
 * edge docks, zoom, and layout persistence.
 */

export * from './types';
export * from './constants';
export { DockError, assertDock, isDockError, toError } from './errors';
export type { DockErrorCode } from './errors';
export { $focusedPanelId } from './stores';

export * from './modules/tree';
export * from './modules/panel';
export * from './modules/resizable';
export * from './modules/stack';
export * from './modules/tabs';
export * from './modules/tiles';
export * from './modules/dock';
export * from './modules/persistence';
export * from './modules/logging';

export { LayoutPersistence } from './layoutPersistence';
export type { LayoutPersistenceOptions, RestoreOutcome } from './layoutPersistence';

export { TilePanel, createTilePanel, registerTilePanel } from './tilePanel';
export type { TileItem, TilePanelOptions, TileResizeAxis, TileSize } from './tilePanel';

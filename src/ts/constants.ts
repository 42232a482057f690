/**
 * Dock engine constants
 *
 * Defaults for sizing and persistence. Instances override them through
 * DockAreaOptions and LayoutPersistenceOptions.
 */

/** Smallest size a resizable slot or dock may shrink to, in pixels */
export const PANEL_MIN_SIZE = 100;

/** Initial width (left/right) or height (top/bottom) of an edge dock */
export const DEFAULT_DOCK_SIZE = 200;

/** Length used to estimate slot fractions for a group that has never been laid out */
export const NOMINAL_GROUP_LENGTH = 1000;

/** Height of a tab bar above a tab panel's content */
export const TAB_BAR_HEIGHT = 30;

/** Delay between the last layout change and the autosave write */
export const AUTOSAVE_DELAY_MS = 1000;

/** Key the layout is read from and written to through the dock area's state hooks */
export const LAYOUT_STORAGE_KEY = 'dock-layout';

/** Title shown for panels that do not provide one */
export const UNNAMED_PANEL_TITLE = 'Unnamed';

/** Drop zones cover this fraction of a tab panel's width or height on each edge */
export const DROP_ZONE_FRACTION = 0.25;

/** Registry names of the built-in containers */
export const STACK_PANEL_NAME = 'StackPanel';
export const TAB_PANEL_NAME = 'TabPanel';
export const INVALID_PANEL_NAME = 'InvalidPanel';
export const TILES_PANEL_NAME = 'Tiles';

/** Smallest width and height of a tile */
export const TILE_MIN_SIZE = 100;

/** Tile positions and sizes snap to multiples of this */
export const TILE_GRID = 10;

/** Resize handles reach half this far past a tile's right and bottom edges */
export const TILE_HANDLE_SIZE = 20;

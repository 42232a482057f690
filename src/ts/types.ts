/**
 * Shared types for the dock engine.
 */

// =============================================================================
// Geometry
// =============================================================================

/** Split axis: horizontal lays children left-to-right, vertical top-to-bottom */
export type Axis = 'horizontal' | 'vertical';

/** Edge a panel or dock attaches to */
export type Placement = 'top' | 'bottom' | 'left' | 'right';

/** Where a panel is added in a dock area; center is the main (non-dock) content */
export type DockPlacement = Placement | 'center';

export interface Point {
  x: number;
  y: number;
}

/** Pixel rectangle in host coordinates */
export interface Bounds {
  x: number;
  y: number;
  width: number;
  height: number;
}

export const EMPTY_BOUNDS: Readonly<Bounds> = Object.freeze({ x: 0, y: 0, width: 0, height: 0 });

export const PLACEMENTS: readonly Placement[] = ['left', 'right', 'top', 'bottom'];

/**
 * Map placement to split axis
 */
export function placementAxis(placement: Placement): Axis {
  return placement === 'left' || placement === 'right' ? 'horizontal' : 'vertical';
}

/**
 * Check if placement means "before" in the split order
 */
export function isPlacementBefore(placement: Placement): boolean {
  return placement === 'left' || placement === 'top';
}

/** Length of bounds along an axis */
export function boundsLength(bounds: Bounds, axis: Axis): number {
  return axis === 'horizontal' ? bounds.width : bounds.height;
}

// =============================================================================
// JSON
// =============================================================================

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Nanostores State Management
 *
 * Process-wide reactive state shared by every dock area.
 * Per-area state ($zoomed, $layoutRevision) lives on the DockArea instance.
 *
 * Naming convention: $storeName (dollar prefix for stores)
 */

import { atom } from 'nanostores';
import type { PanelId } from '../modules/panel/panelId';

// =============================================================================
// Focus
// =============================================================================

/** Panel whose focus handle currently holds keyboard focus */
export const $focusedPanelId = atom<PanelId | null>(null);

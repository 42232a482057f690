/**
 * Resizable Panel
 *
 * One slot of a ResizablePanelGroup. A slot either has an explicit size or
 * grows to share the space explicit slots leave over; never both.
 */

import { PANEL_MIN_SIZE } from '../../constants';

export interface SlotConstraint {
  readonly size: number | null;
  readonly grow: boolean;
  readonly minSize: number;
  readonly maxSize: number;
}

export interface ResizablePanelOptions {
  /** Explicit size in pixels; ignored when grow is set */
  size?: number | null;
  grow?: boolean;
  minSize?: number;
  /** Infinity means unbounded */
  maxSize?: number;
}

export function clampToSlot(value: number, slot: SlotConstraint): number {
  return Math.min(Math.max(value, slot.minSize), slot.maxSize);
}

export class ResizablePanel<T> implements SlotConstraint {
  readonly content: T;
  size: number | null;
  grow: boolean;
  minSize: number;
  maxSize: number;

  constructor(content: T, options: ResizablePanelOptions = {}) {
    this.content = content;
    this.grow = options.grow === true || options.size == null;
    this.size = this.grow ? null : (options.size ?? null);
    this.minSize = options.minSize ?? PANEL_MIN_SIZE;
    this.maxSize = Math.max(options.maxSize ?? Infinity, this.minSize);
  }

  setSize(size: number): void {
    this.size = size;
    this.grow = false;
  }

  setGrow(): void {
    this.size = null;
    this.grow = true;
  }

  clamp(value: number): number {
    return clampToSlot(value, this);
  }
}

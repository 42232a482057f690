/**
 * Resizable Panel Group
 *
 * Ordered slots laid out along one axis. Sizes are computed by `layout`;
 * `resize` moves the handle between two neighbouring slots.
 */

import type { Axis } from '../../types';
import { NOMINAL_GROUP_LENGTH } from '../../constants';
import { createLogger } from '../logging';
import { distribute } from './distribute';
import type { ResizablePanel } from './resizablePanel';

const log = createLogger('resizable');

export interface ResizablePanelGroupOptions {
  axis?: Axis;
  /** Called with the new sizes after a handle drag */
  onResize?: (sizes: number[]) => void;
}

export class ResizablePanelGroup<T> {
  axis: Axis;
  readonly children: ResizablePanel<T>[] = [];

  private sizes: number[] = [];
  private available: number | null = null;
  private pendingFractions: number[] | null = null;
  private readonly onResize: ((sizes: number[]) => void) | undefined;

  constructor(options: ResizablePanelGroupOptions = {}) {
    this.axis = options.axis ?? 'horizontal';
    this.onResize = options.onResize;
  }

  get length(): number {
    return this.children.length;
  }

  /** Insert at `ix` (clamped to the end); returns the index used */
  insertChild(panel: ResizablePanel<T>, ix: number = this.children.length): number {
    const at = Math.min(Math.max(ix, 0), this.children.length);
    this.children.splice(at, 0, panel);
    this.invalidate();
    return at;
  }

  removeChild(ix: number): ResizablePanel<T> | undefined {
    if (ix < 0 || ix >= this.children.length) return undefined;
    const [removed] = this.children.splice(ix, 1);
    this.invalidate();
    return removed;
  }

  replaceChild(panel: ResizablePanel<T>, ix: number): ResizablePanel<T> | undefined {
    if (ix < 0 || ix >= this.children.length) return undefined;
    const [replaced] = this.children.splice(ix, 1, panel);
    return replaced;
  }

  removeAllChildren(): void {
    this.children.length = 0;
    this.invalidate();
  }

  setAxis(axis: Axis): void {
    if (this.axis === axis) return;
    this.axis = axis;
    this.sizes = [];
  }

  /**
   * Restore slot shares from a saved layout. They are turned into sizes on
   * the first layout, once the available length is known.
   */
  setPendingFractions(fractions: number[]): void {
    if (fractions.length !== this.children.length) {
      log.warn(() => `Ignoring ${fractions.length} fractions for ${this.children.length} slots`);
      return;
    }
    this.pendingFractions = [...fractions];
  }

  /** Compute and record slot sizes for `available` pixels along the axis */
  layout(available: number): number[] {
    if (this.pendingFractions) {
      this.applyFractions(this.pendingFractions, available);
      this.pendingFractions = null;
    }
    this.available = available;
    this.sizes = distribute(this.children, available);
    return [...this.sizes];
  }

  /** Sizes from the last layout; empty before the first one */
  lastSizes(): readonly number[] {
    return this.sizes;
  }

  /**
   * Relative slot weights: pending fractions, else the last layout's sizes,
   * else sizes estimated at the last (or nominal) length.
   */
  weights(): number[] {
    if (this.pendingFractions) return [...this.pendingFractions];
    if (this.sizes.length === this.children.length) return [...this.sizes];
    return distribute(this.children, this.available ?? NOMINAL_GROUP_LENGTH);
  }

  /** Each slot's share of the group's length */
  fractions(): number[] {
    const weights = this.weights();
    const total = weights.reduce((sum, weight) => sum + weight, 0);
    if (total <= 0) return weights.map(() => 1 / weights.length);
    return weights.map((weight) => weight / total);
  }

  /**
   * Drag the handle after slot `handleIx` by `delta` pixels. Only the two
   * slots beside the handle change, each clamped to its own bounds.
   */
  resize(handleIx: number, delta: number): boolean {
    const before = this.children[handleIx];
    const after = this.children[handleIx + 1];
    if (!before || !after) {
      log.warn(() => `No resize handle at ${handleIx} in a group of ${this.children.length}`);
      return false;
    }

    if (this.pendingFractions || this.sizes.length !== this.children.length) {
      this.layout(this.available ?? NOMINAL_GROUP_LENGTH);
    }
    const beforeSize = before.clamp((this.sizes[handleIx] ?? 0) + delta);
    const afterSize = after.clamp((this.sizes[handleIx + 1] ?? 0) - delta);

    before.setSize(beforeSize);
    after.setSize(afterSize);
    this.sizes[handleIx] = beforeSize;
    this.sizes[handleIx + 1] = afterSize;

    log.verbose(() => `Resized handle ${handleIx}: ${beforeSize} | ${afterSize}`);
    this.onResize?.([...this.sizes]);
    return true;
  }

  private applyFractions(fractions: number[], available: number): void {
    const last = this.children.length - 1;
    this.children.forEach((child, i) => {
      if (i === last) {
        child.setGrow();
      } else {
        child.setSize((fractions[i] ?? 0) * available);
      }
    });
  }

  private invalidate(): void {
    this.sizes = [];
    this.pendingFractions = null;
  }
}

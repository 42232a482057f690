import type { SlotConstraint } from './resizablePanel';
import { clampToSlot } from './resizablePanel';

/**
 * Distribute `available` pixels among slots.
 *
 * Explicit slots take their size clamped to their bounds. The remainder is
 * split evenly among grow slots; a grow slot whose share falls outside its
 * bounds is frozen at the bound and the rest is shared again among the others
 * until no slot clamps. When nothing can absorb the difference the result
 * over- or underflows `available`.
 */
export function distribute(slots: readonly SlotConstraint[], available: number): number[] {
  const sizes = slots.map(() => 0);
  let remaining = available;
  let open: number[] = [];

  slots.forEach((slot, i) => {
    if (slot.grow || slot.size === null) {
      open.push(i);
      return;
    }
    const size = clampToSlot(slot.size, slot);
    sizes[i] = size;
    remaining -= size;
  });

  while (open.length > 0) {
    const share = remaining / open.length;
    const stillOpen: number[] = [];

    for (const i of open) {
      const slot = slots[i];
      if (!slot) continue;
      const clamped = clampToSlot(share, slot);
      if (clamped === share) {
        stillOpen.push(i);
      } else {
        sizes[i] = clamped;
        remaining -= clamped;
      }
    }

    if (stillOpen.length === open.length) {
      for (const i of open) sizes[i] = share;
      break;
    }
    open = stillOpen;
  }

  return sizes;
}

/**
 * Panel Registry
 *
 * Maps a panel name to the factory that rebuilds it from saved state.
 * Factories for unknown names, or that throw, yield an InvalidPanel so the
 * rest of a saved layout still loads.
 */

import type { JsonValue } from '../../types';
import { toError } from '../../errors';
import { createLogger } from '../logging';
import type { DockArea } from '../dock/dockArea';
import type { PanelItemState } from '../dock/state';
import { InvalidPanel } from './invalidPanel';
import type { PanelView } from './panel';

const log = createLogger('registry');

export type PanelFactory = (dockArea: DockArea, item: PanelItemState, info: JsonValue) => PanelView;

export class PanelRegistry {
  private readonly factories = new Map<string, PanelFactory>();

  /** Register `factory` under `name`; a second registration replaces the first */
  register(name: string, factory: PanelFactory): void {
    if (this.factories.has(name)) {
      log.info(() => `Replacing factory for ${name}`);
    }
    this.factories.set(name, factory);
  }

  unregister(name: string): boolean {
    return this.factories.delete(name);
  }

  has(name: string): boolean {
    return this.factories.has(name);
  }

  names(): string[] {
    return [...this.factories.keys()];
  }

  build(dockArea: DockArea, item: PanelItemState): PanelView {
    const factory = this.factories.get(item.panelName);
    if (!factory) {
      log.warn(() => `No factory registered for ${item.panelName}`);
      return new InvalidPanel(item);
    }

    try {
      return factory(dockArea, item, item.state);
    } catch (e) {
      const error = toError(e);
      log.exception(error, `Factory for ${item.panelName} failed`);
      return new InvalidPanel(item, error.message);
    }
  }
}

let globalRegistry: PanelRegistry | null = null;

/** Process-wide registry, created on first use */
export function getPanelRegistry(): PanelRegistry {
  globalRegistry ??= new PanelRegistry();
  return globalRegistry;
}

export function registerPanel(name: string, factory: PanelFactory): void {
  getPanelRegistry().register(name, factory);
}

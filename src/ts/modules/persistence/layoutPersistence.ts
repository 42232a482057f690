/**
 * Layout Persistence
 *
 * Restores a dock area's layout through its readState hook and saves it
 * back through writeState, debounced after every layout change.
 *
 * A saved layout with another version than the expected one is loaded
 * first; the host is then asked whether to reset to the default layout.
 */

import { AUTOSAVE_DELAY_MS, LAYOUT_STORAGE_KEY } from '../../constants';
import { toError } from '../../errors';
import { createLogger } from '../logging';
import type { DockArea } from '../dock/dockArea';
import type { DockAreaState } from '../dock/state';
import { emptyItemState, parseDockAreaJson } from '../dock/state';

const log = createLogger('persistence');

export interface LayoutPersistenceOptions {
  dockArea: DockArea;
  key?: string;
  delayMs?: number;
  /** Expected layout version; defaults to the dock area's version */
  version?: number | null;
  /** Populate an empty dock area with the default layout */
  defaultLayout: (dockArea: DockArea) => void;
  /** Resolve true to replace a saved layout of another version with the default */
  confirmReset?: (savedVersion: number | null, expectedVersion: number | null) => Promise<boolean>;
}

/**
 * - restored: the saved layout was loaded
 * - default: nothing usable was saved, the default layout was applied
 * - reset: the saved layout had another version and the host chose the default
 * - kept: the saved layout had another version and the host kept it
 */
export type RestoreOutcome = 'restored' | 'default' | 'reset' | 'kept';

export class LayoutPersistence {
  readonly dockArea: DockArea;
  readonly key: string;
  readonly delayMs: number;
  readonly version: number | null;

  private readonly defaultLayout: (dockArea: DockArea) => void;
  private readonly confirmReset: LayoutPersistenceOptions['confirmReset'];
  private timer: ReturnType<typeof setTimeout> | null = null;
  private lastSaved: string | null = null;
  private unlisten: (() => void) | null = null;

  constructor(options: LayoutPersistenceOptions) {
    this.dockArea = options.dockArea;
    this.key = options.key ?? LAYOUT_STORAGE_KEY;
    this.delayMs = options.delayMs ?? AUTOSAVE_DELAY_MS;
    this.version = options.version !== undefined ? options.version : options.dockArea.version;
    this.defaultLayout = options.defaultLayout;
    this.confirmReset = options.confirmReset;
  }

  /** Load the saved layout, falling back to the default when there is none or it is unreadable */
  async restore(): Promise<RestoreOutcome> {
    const text = await this.readSaved();
    if (text === null) {
      log.info(() => `No saved layout under ${this.key}, using default`);
      await this.applyDefault();
      return 'default';
    }

    let state: DockAreaState;
    try {
      state = parseDockAreaJson(text);
    } catch (e) {
      log.warn(() => `Saved layout under ${this.key} is unusable, using default`, toError(e).message);
      await this.applyDefault();
      return 'default';
    }

    try {
      this.dockArea.load(state);
    } catch (e) {
      log.warn(() => `Saved layout under ${this.key} does not load, using default`, toError(e).message);
      await this.applyDefault();
      return 'default';
    }
    this.lastSaved = text;

    if (state.version === this.version) {
      log.info(() => `Restored layout from ${this.key}`);
      return 'restored';
    }

    log.info(() => `Saved layout version ${String(state.version)} differs from ${String(this.version)}`);
    const reset = this.confirmReset ? await this.confirmReset(state.version, this.version) : false;
    if (!reset) return 'kept';

    await this.applyDefault();
    return 'reset';
  }

  /** Clear the dock area and build the default layout at the expected version */
  resetToDefault(): void {
    this.dockArea.load({ version: this.version, root: emptyItemState() });
    this.defaultLayout(this.dockArea);
    this.dockArea.version = this.version;
  }

  /** Save after every layout change, once changes stop for `delayMs` */
  start(): void {
    if (this.unlisten) return;
    this.unlisten = this.dockArea.$layoutRevision.listen(() => this.schedule());
  }

  stop(): void {
    this.unlisten?.();
    this.unlisten = null;
    this.cancelTimer();
  }

  /**
   * Write the current layout now unless it matches the last one written.
   * Failures are logged; returns whether anything was written.
   */
  async flush(): Promise<boolean> {
    this.cancelTimer();

    let text: string;
    try {
      text = JSON.stringify(this.dockArea.dump());
    } catch (e) {
      log.exception(toError(e), 'Failed to serialize layout');
      return false;
    }

    if (text === this.lastSaved) {
      log.verbose(() => 'Layout unchanged, skipping save');
      return false;
    }

    try {
      await this.dockArea.writeState(this.key, text);
      this.lastSaved = text;
      log.verbose(() => `Saved layout to ${this.key}`);
      return true;
    } catch (e) {
      log.exception(toError(e), `Failed to save layout to ${this.key}`);
      return false;
    }
  }

  private schedule(): void {
    this.cancelTimer();
    this.timer = setTimeout(() => {
      this.timer = null;
      this.flush().catch((e: unknown) => log.exception(toError(e), 'Autosave failed'));
    }, this.delayMs);
  }

  private cancelTimer(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private async readSaved(): Promise<string | null> {
    try {
      return await this.dockArea.readState(this.key);
    } catch (e) {
      log.exception(toError(e), `Failed to read layout from ${this.key}`);
      return null;
    }
  }

  private async applyDefault(): Promise<void> {
    this.resetToDefault();
    await this.flush();
  }
}

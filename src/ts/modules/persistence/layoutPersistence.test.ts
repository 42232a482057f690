import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { JsonValue } from '../../types';
import { BasePanel, PanelRegistry } from '../panel';
import { TabPanel } from '../tabs/tabPanel';
import { DockArea } from '../dock/dockArea';
import type { DockAreaState } from '../dock/state';
import { LayoutPersistence } from './layoutPersistence';

class NotePanel extends BasePanel {
  readonly panelName = 'NotePanel';

  constructor(readonly label: string) {
    super();
  }

  override title(): string {
    return this.label;
  }

  override dumpState(): JsonValue {
    return { label: this.label };
  }
}

function readLabel(info: JsonValue): string {
  if (info !== null && typeof info === 'object' && !Array.isArray(info) && typeof info.label === 'string') {
    return info.label;
  }
  return '';
}

/** In-memory stand-in for the host's storage */
function memoryStore(initial: Record<string, string> = {}) {
  const data = new Map(Object.entries(initial));
  const writes: Array<[string, string]> = [];
  return {
    data,
    writes,
    readState: async (key: string): Promise<string | null> => data.get(key) ?? null,
    writeState: async (key: string, value: string): Promise<void> => {
      writes.push([key, value]);
      data.set(key, value);
    },
  };
}

function createArea(store: ReturnType<typeof memoryStore>, version: number | null = 2): DockArea {
  const registry = new PanelRegistry();
  registry.register('NotePanel', (_area, _item, info) => new NotePanel(readLabel(info)));
  return new DockArea({ registry, version, readState: store.readState, writeState: store.writeState });
}

function defaultLayout(area: DockArea): void {
  area.addPanel(new NotePanel('welcome'));
}

function savedLayout(version: number | null, label: string): string {
  const state: DockAreaState = {
    version,
    root: { type: 'tabs', tabs: [{ type: 'panel', panelName: 'NotePanel', state: { label } }], active: 0 },
  };
  return JSON.stringify(state);
}

function centerLabels(area: DockArea): string[] {
  const tabs = area.panel(TabPanel);
  return tabs ? tabs.panels.map((panel) => panel.title()) : [];
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('LayoutPersistence restore', () => {
  it('applies and saves the default layout when nothing is stored', async () => {
    const store = memoryStore();
    const area = createArea(store);
    const persistence = new LayoutPersistence({ dockArea: area, defaultLayout });

    expect(await persistence.restore()).toBe('default');

    expect(centerLabels(area)).toEqual(['welcome']);
    expect(store.writes).toHaveLength(1);
    expect(store.writes[0]?.[0]).toBe('dock-layout');
    expect(store.data.get('dock-layout')).toBe(savedLayout(2, 'welcome'));
  });

  it('falls back to the default layout when the saved text is unreadable', async () => {
    const store = memoryStore({ 'dock-layout': '{"version":' });
    const area = createArea(store);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const persistence = new LayoutPersistence({ dockArea: area, defaultLayout });

    expect(await persistence.restore()).toBe('default');
    expect(store.data.get('dock-layout')).toBe(savedLayout(2, 'welcome'));
  });

  it('falls back to the default layout when the saved layout parses but does not load', async () => {
    const state: DockAreaState = {
      version: 9,
      root: { type: 'tabs', tabs: [{ type: 'panel', panelName: 'NotePanel', state: { label: 'notes' } }], active: 5 },
    };
    const store = memoryStore({ 'dock-layout': JSON.stringify(state) });
    const area = createArea(store);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const persistence = new LayoutPersistence({ dockArea: area, defaultLayout });

    expect(await persistence.restore()).toBe('default');

    expect(centerLabels(area)).toEqual(['welcome']);
    expect(area.version).toBe(2);
    expect(store.data.get('dock-layout')).toBe(savedLayout(2, 'welcome'));
  });

  it('loads a saved layout of the expected version without writing', async () => {
    const store = memoryStore({ 'dock-layout': savedLayout(2, 'notes') });
    const area = createArea(store);
    const confirmReset = vi.fn(async () => true);
    const persistence = new LayoutPersistence({ dockArea: area, defaultLayout, confirmReset });

    expect(await persistence.restore()).toBe('restored');

    expect(centerLabels(area)).toEqual(['notes']);
    expect(confirmReset).not.toHaveBeenCalled();
    expect(store.writes).toHaveLength(0);
  });

  it('resets to the default when the host accepts a version mismatch', async () => {
    const store = memoryStore({ 'dock-layout': savedLayout(1, 'old') });
    const area = createArea(store);
    const confirmReset = vi.fn(async () => true);
    const persistence = new LayoutPersistence({ dockArea: area, defaultLayout, confirmReset });

    expect(await persistence.restore()).toBe('reset');

    expect(confirmReset).toHaveBeenCalledWith(1, 2);
    expect(centerLabels(area)).toEqual(['welcome']);
    expect(area.version).toBe(2);
    expect(store.data.get('dock-layout')).toBe(savedLayout(2, 'welcome'));
  });

  it('keeps the loaded layout when the host declines', async () => {
    const store = memoryStore({ 'dock-layout': savedLayout(1, 'old') });
    const area = createArea(store);
    const persistence = new LayoutPersistence({
      dockArea: area,
      defaultLayout,
      confirmReset: async () => false,
    });

    expect(await persistence.restore()).toBe('kept');

    expect(centerLabels(area)).toEqual(['old']);
    expect(area.version).toBe(1);
    expect(store.writes).toHaveLength(0);
  });

  it('uses the default layout when reading fails', async () => {
    const store = memoryStore();
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const area = new DockArea({
      registry: new PanelRegistry(),
      version: 2,
      readState: async () => {
        throw new Error('storage offline');
      },
      writeState: store.writeState,
    });
    const persistence = new LayoutPersistence({ dockArea: area, defaultLayout });

    expect(await persistence.restore()).toBe('default');
    expect(store.writes).toHaveLength(1);
  });
});

describe('LayoutPersistence autosave', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('writes once with the latest layout after changes settle', async () => {
    const store = memoryStore();
    const area = createArea(store);
    const persistence = new LayoutPersistence({ dockArea: area, defaultLayout, delayMs: 500 });
    persistence.start();

    area.addPanel(new NotePanel('a'));
    await vi.advanceTimersByTimeAsync(300);
    area.addPanel(new NotePanel('b'));
    await vi.advanceTimersByTimeAsync(300);
    area.addPanel(new NotePanel('c'));

    expect(store.writes).toHaveLength(0);
    await vi.advanceTimersByTimeAsync(500);

    expect(store.writes).toHaveLength(1);
    const written = store.writes[0]?.[1] ?? '';
    expect(JSON.parse(written)).toEqual(area.dump());
    persistence.stop();
  });

  it('skips writing a layout identical to the last one saved', async () => {
    const store = memoryStore();
    const area = createArea(store);
    const persistence = new LayoutPersistence({ dockArea: area, defaultLayout });
    area.addPanel(new NotePanel('a'));

    expect(await persistence.flush()).toBe(true);
    expect(await persistence.flush()).toBe(false);
    expect(store.writes).toHaveLength(1);
  });

  it('stops saving after stop', async () => {
    const store = memoryStore();
    const area = createArea(store);
    const persistence = new LayoutPersistence({ dockArea: area, defaultLayout });
    persistence.start();
    area.addPanel(new NotePanel('a'));
    persistence.stop();

    await vi.advanceTimersByTimeAsync(5000);
    expect(store.writes).toHaveLength(0);
  });

  it('logs a failed write without throwing', async () => {
    const errors = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const area = new DockArea({
      registry: new PanelRegistry(),
      writeState: async () => {
        throw new Error('disk full');
      },
    });
    const persistence = new LayoutPersistence({ dockArea: area, defaultLayout });
    persistence.start();

    area.addPanel(new NotePanel('a'));
    await vi.advanceTimersByTimeAsync(1000);

    expect(errors).toHaveBeenCalledTimes(1);
    expect(String(errors.mock.calls[0]?.[0])).toContain('Failed to save layout to dock-layout: disk full');
    expect(await persistence.flush()).toBe(false);
    persistence.stop();
  });
});

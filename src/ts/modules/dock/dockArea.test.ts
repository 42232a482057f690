import { describe, expect, it } from 'vitest';
import type { JsonValue } from '../../types';
import { DockError } from '../../errors';
import { BasePanel, InvalidPanel, PanelRegistry } from '../panel';
import { StackPanel } from '../stack/stackPanel';
import { TabPanel } from '../tabs/tabPanel';
import { DockArea } from './dockArea';
import { dockSplit, dockTabs } from './dockItem';
import type { DockAreaState, PanelItemState } from './state';

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

function note(label: string): PanelItemState {
  return { type: 'panel', panelName: 'NotePanel', state: { label } };
}

function createArea(): DockArea {
  const registry = new PanelRegistry();
  registry.register('NotePanel', (_area, _item, info) => new NotePanel(readLabel(info)));
  return new DockArea({ registry, version: 1 });
}

function tabLabels(panel: unknown): string[] {
  if (!(panel instanceof TabPanel)) return [];
  return panel.panels.map((tab) => tab.title());
}

describe('DockArea dump and load', () => {
  it('dumps a horizontal split and loads it back into two tab panels', () => {
    const area = createArea();
    area.setCenter(dockSplit('horizontal', [dockTabs([new NotePanel('X')]), dockTabs([new NotePanel('Y')])], [300, 700]));

    const state = area.dump();

    expect(state).toEqual({
      version: 1,
      root: {
        type: 'split',
        axis: 'horizontal',
        fraction: 0.3,
        first: { type: 'tabs', tabs: [note('X')], active: 0 },
        second: { type: 'tabs', tabs: [note('Y')], active: 0 },
      },
    });

    const restored = createArea();
    restored.load(state);

    expect(restored.root.axis).toBe('horizontal');
    expect(restored.root.panels.map(tabLabels)).toEqual([['X'], ['Y']]);
    expect(restored.root.group.fractions()).toEqual([0.3, 0.7]);
    expect(restored.dump()).toEqual(state);
  });

  it('round-trips nested splits, tabs and docks', () => {
    const state: DockAreaState = {
      version: 4,
      root: {
        type: 'split',
        axis: 'vertical',
        fraction: 0.6,
        first: { type: 'tabs', tabs: [note('a'), note('b')], active: 1 },
        second: {
          type: 'split',
          axis: 'horizontal',
          fraction: 0.25,
          first: { type: 'tabs', tabs: [note('c')], active: 0 },
          second: { type: 'tabs', tabs: [note('d')], active: 0 },
        },
      },
      docks: {
        left: { placement: 'left', size: 250, open: false, item: { type: 'tabs', tabs: [note('e')], active: 0 } },
      },
    };

    const area = createArea();
    area.load(state);

    expect(area.version).toBe(4);
    expect(area.dock('left')?.open).toBe(false);
    expect(area.dump()).toEqual(state);
  });

  it('flattens same-axis splits into one stack and writes them back right-nested', () => {
    const area = createArea();
    area.setCenter(
      dockSplit(
        'horizontal',
        [dockTabs([new NotePanel('a')]), dockTabs([new NotePanel('b')]), dockTabs([new NotePanel('c')])],
        [200, 300, 500],
      ),
    );
    const state = area.dump();
    expect(state.root).toEqual({
      type: 'split',
      axis: 'horizontal',
      fraction: 0.2,
      first: { type: 'tabs', tabs: [note('a')], active: 0 },
      second: {
        type: 'split',
        axis: 'horizontal',
        fraction: 0.375,
        first: { type: 'tabs', tabs: [note('b')], active: 0 },
        second: { type: 'tabs', tabs: [note('c')], active: 0 },
      },
    });

    const restored = createArea();
    restored.load(state);
    expect(restored.root.panels.map(tabLabels)).toEqual([['a'], ['b'], ['c']]);
    const [first, second, third] = restored.root.group.fractions();
    expect(first).toBeCloseTo(0.2);
    expect(second).toBeCloseTo(0.3);
    expect(third).toBeCloseTo(0.5);
  });

  it('writes a nested same-axis stack the same way before and after a reload', () => {
    const area = createArea();
    area.setCenter(
      dockSplit('horizontal', [
        dockSplit('horizontal', [dockTabs([new NotePanel('a')]), dockTabs([new NotePanel('b')])]),
        dockTabs([new NotePanel('c')]),
      ]),
    );

    const first = area.dump();
    expect(first.root).toEqual({
      type: 'split',
      axis: 'horizontal',
      fraction: 0.25,
      first: { type: 'tabs', tabs: [note('a')], active: 0 },
      second: {
        type: 'split',
        axis: 'horizontal',
        fraction: 1 / 3,
        first: { type: 'tabs', tabs: [note('b')], active: 0 },
        second: { type: 'tabs', tabs: [note('c')], active: 0 },
      },
    });

    const restored = createArea();
    restored.load(first);
    expect(restored.root.panels.map(tabLabels)).toEqual([['a'], ['b'], ['c']]);
    expect(restored.dump()).toEqual(first);
  });

  it('leaves the current layout in place when a state fails to build', () => {
    const area = createArea();
    area.addPanel(new NotePanel('keep'));
    area.setDock('left', dockTabs([new NotePanel('files')]));
    const root = area.root;
    const before = area.dump();

    expect(() =>
      area.load({ version: 9, root: { type: 'tabs', tabs: [note('lost')], active: 5 } }),
    ).toThrow(DockError);

    expect(area.version).toBe(1);
    expect(area.root).toBe(root);
    expect(area.dump()).toEqual(before);
  });

  it('keeps loading when a panel is not registered', () => {
    const state: DockAreaState = {
      version: 1,
      root: {
        type: 'split',
        axis: 'horizontal',
        fraction: 0.5,
        first: { type: 'tabs', tabs: [note('known')], active: 0 },
        second: { type: 'tabs', tabs: [{ type: 'panel', panelName: 'Retired', state: { x: 1 } }], active: 0 },
      },
    };

    const area = createArea();
    area.load(state);

    const [known, retired] = area.root.panels;
    expect(tabLabels(known)).toEqual(['known']);
    expect(retired instanceof TabPanel && retired.activePanel()).toBeInstanceOf(InvalidPanel);
    expect(area.dump()).toEqual(state);
  });

  it('dumps an empty area as an empty tab set and loads it back', () => {
    const area = createArea();
    const state = area.dump();
    expect(state).toEqual({ version: 1, root: { type: 'tabs', tabs: [], active: 0 } });

    const restored = createArea();
    restored.load(state);
    expect(restored.root.panels).toHaveLength(0);
  });

  it('drops the zoom when a layout is loaded', () => {
    const area = createArea();
    const panel = new NotePanel('a');
    area.addPanel(panel);
    area.toggleZoom(panel);
    area.load(area.dump());
    expect(area.zoomedPanel()).toBeNull();
  });
});

describe('DockArea zoom', () => {
  it('keeps only the last zoomed panel', () => {
    const area = createArea();
    const a = new NotePanel('a');
    const b = new NotePanel('b');
    area.toggleZoom(a);
    area.toggleZoom(b);
    expect(area.zoomedPanel()).toBe(b);
  });

  it('unzooms when the zoomed panel is toggled again', () => {
    const area = createArea();
    const a = new NotePanel('a');
    area.toggleZoom(a);
    area.toggleZoom(a);
    expect(area.zoomedPanel()).toBeNull();
    expect(area.$zoomed.get()).toBeNull();
  });

  it('zooms a tab panel through its toggle', () => {
    const area = createArea();
    const a = new NotePanel('a');
    area.addPanel(a);
    const tabs = area.panel(TabPanel);
    tabs?.toggleZoom();
    expect(area.zoomedPanel()).toBe(tabs);
  });
});

describe('DockArea structure', () => {
  it('adds center panels to the first tab panel', () => {
    const area = createArea();
    const a = new NotePanel('a');
    const b = new NotePanel('b');
    area.addPanel(a);
    area.addPanel(b);
    expect(area.root.panels.map(tabLabels)).toEqual([['a', 'b']]);
  });

  it('turns or wraps the root when adding across its axis', () => {
    const area = createArea();
    area.addPanel(new NotePanel('a'));
    area.addPanelAt(new NotePanel('b'), 'bottom');

    expect(area.root.axis).toBe('vertical');
    expect(area.root.panels.map(tabLabels)).toEqual([['a'], ['b']]);

    const previous = area.root;
    area.addPanelAt(new NotePanel('c'), 'left', 180);

    expect(area.root.axis).toBe('horizontal');
    expect(area.root.panels[1]).toBe(previous);
    expect(tabLabels(area.root.panels[0])).toEqual(['c']);
    expect(area.root.group.children[0]?.size).toBe(180);
    expect(previous.parent).toBe(area.root);
  });

  it('creates a dock for edge placements', () => {
    const area = createArea();
    area.addPanel(new NotePanel('tool'), 'right');
    area.addPanel(new NotePanel('more'), 'right');

    const dock = area.dock('right');
    expect(dock?.item.axis).toBe('vertical');
    expect(dock?.item.panels.map(tabLabels)).toEqual([['tool', 'more']]);
  });

  it('toggles collapsible docks only', () => {
    const area = createArea();
    area.setDock('bottom', dockTabs([new NotePanel('log')]));
    area.setDock('top', dockTabs([new NotePanel('bar')]), { collapsible: false });

    expect(area.toggleDock('bottom')).toBe(false);
    expect(area.toggleDock('bottom')).toBe(true);
    expect(area.toggleDock('top')).toBe(true);
    expect(area.toggleDock('left')).toBe(false);
  });

  it('clamps dock resizing to leave room for the center', () => {
    const area = createArea();
    const dock = area.setDock('left', dockTabs([new NotePanel('tree')]));
    const bounds = { x: 0, y: 0, width: 1000, height: 600 };

    expect(dock.resizeTo({ x: 950, y: 10 }, bounds, 200)).toBe(700);
    expect(dock.resizeTo({ x: 20, y: 10 }, bounds)).toBe(100);
    expect(dock.resizeTo({ x: 320, y: 10 }, bounds)).toBe(320);
  });

  it('finds panels by class, center first', () => {
    const area = createArea();
    const a = new NotePanel('a');
    area.addPanel(new NotePanel('dock'), 'left');
    area.addPanel(a);
    expect(area.panel(NotePanel)).toBe(a);
    expect(area.panel(InvalidPanel)).toBeNull();
    expect(area.findPanel((panel) => panel.title() === 'dock')?.title()).toBe('dock');
  });

  it('reports the tab panels toggle buttons attach to', () => {
    const area = createArea();
    area.addPanel(new NotePanel('a'));
    area.setDock('bottom', dockTabs([new NotePanel('log')]));
    const center = area.panel(TabPanel);
    const bottom = area.dock('bottom')?.item.leftTopTabPanel();

    expect(area.toggleButtonPanels()).toEqual({
      left: center?.panelId,
      right: center?.panelId,
      bottom: bottom?.panelId,
    });
  });

  it('bumps the layout revision on structural changes', () => {
    const area = createArea();
    const before = area.$layoutRevision.get();
    area.addPanel(new NotePanel('a'));
    expect(area.$layoutRevision.get()).toBeGreaterThan(before);
  });
});

describe('DockArea render', () => {
  it('gives docks their size and the center the rest', () => {
    const area = createArea();
    const a = new NotePanel('a');
    const tree = new NotePanel('tree');
    area.addPanel(a);
    area.setDock('left', dockTabs([tree]));

    area.render({ x: 0, y: 0, width: 1000, height: 600 });

    expect(tree.bounds).toEqual({ x: 0, y: 30, width: 200, height: 570 });
    expect(a.bounds).toEqual({ x: 200, y: 30, width: 800, height: 570 });
  });

  it('skips closed docks', () => {
    const area = createArea();
    const a = new NotePanel('a');
    area.addPanel(a);
    area.setDock('bottom', dockTabs([new NotePanel('log')]), { open: false });

    area.render({ x: 0, y: 0, width: 800, height: 600 });

    expect(a.bounds).toEqual({ x: 0, y: 30, width: 800, height: 570 });
  });

  it('renders only the zoomed panel over the full area', () => {
    const area = createArea();
    const a = new NotePanel('a');
    const b = new NotePanel('b');
    area.addPanel(a);
    area.addPanelAt(b, 'right');
    area.toggleZoom(b);

    area.render({ x: 0, y: 0, width: 640, height: 480 });

    expect(b.bounds).toEqual({ x: 0, y: 0, width: 640, height: 480 });
    expect(a.bounds).toEqual({ x: 0, y: 0, width: 0, height: 0 });
  });

  it('unzooms a panel that was removed from the layout', () => {
    const area = createArea();
    const a = new NotePanel('a');
    const b = new NotePanel('b');
    area.addPanel(a);
    const tabs = area.addPanelAt(b, 'right');
    area.toggleZoom(b);
    tabs.removePanel(b);

    area.render({ x: 0, y: 0, width: 640, height: 480 });

    expect(area.zoomedPanel()).toBeNull();
    expect(a.bounds).toEqual({ x: 0, y: 30, width: 640, height: 450 });
    expect(b.bounds).toEqual({ x: 0, y: 0, width: 0, height: 0 });
  });

  it('accepts a plain stack as the center', () => {
    const area = createArea();
    const stack = new StackPanel('vertical');
    area.setCenter(stack);
    expect(area.root).toBe(stack);
    expect(stack.layoutHost()).toBe(area);
  });
});

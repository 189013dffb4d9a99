import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Window } from './Window';
import { WindowConstructionError } from '@/lib/errors';
import type { WindowEvent } from '@/events/types';
import type { WindowType } from '@/types';

function track(window: Window): WindowEvent[] {
  const events: WindowEvent[] = [];
  window.setEventCallback((e) => events.push(e));
  return events;
}

describe('Window', () => {
  let window: Window;
  let events: WindowEvent[];

  beforeEach(() => {
    window = new Window(1, 'Editor', 800, 600);
    events = track(window);
  });

  describe('construction', () => {
    it('starts normal, visible and unfocused at the origin', () => {
      expect(window.getGeometry()).toEqual({
        x: 0, y: 0, width: 800, height: 600,
        minWidth: 100, minHeight: 100, maxWidth: 4096, maxHeight: 4096,
      });
      expect(window.getState()).toBe('normal');
      expect(window.isVisible()).toBe(true);
      expect(window.hasFocus()).toBe(false);
      expect(window.getOpacity()).toBe(1);
    });

    it('refuses invalid sizes and empty titles', () => {
      expect(() => new Window(1, 'A', 0, 100)).toThrow(WindowConstructionError);
      expect(() => new Window(1, 'A', 100, -5)).toThrow(WindowConstructionError);
      expect(() => new Window(1, 'A', 10.5, 100)).toThrow(WindowConstructionError);
      expect(() => new Window(1, '', 100, 100)).toThrow('Window title must not be empty');
    });

    it('lowers the minimum size for windows created below it', () => {
      const tiny = new Window(2, 'Tiny', 50, 40);
      const g = tiny.getGeometry();
      expect(g.minWidth).toBe(50);
      expect(g.minHeight).toBe(40);
      expect(g.width).toBe(50);
    });

    it.each<[WindowType, boolean, boolean, boolean]>([
      ['normal', true, true, false],
      ['dialog', false, true, true],
      ['tooltip', false, false, true],
      ['popup', true, true, true],
      ['utility', false, true, false],
    ])('applies %s capability defaults', (type, resizable, movable, alwaysOnTop) => {
      const w = new Window(3, 'Typed', 200, 200, type);
      expect(w.getType()).toBe(type);
      expect(w.isResizable()).toBe(resizable);
      expect(w.isMovable()).toBe(movable);
      expect(w.isAlwaysOnTop()).toBe(alwaysOnTop);
    });

    it('keeps capability flags settable after creation', () => {
      const tooltip = new Window(4, 'Tip', 120, 100, 'tooltip');
      expect(tooltip.setMovable(true)).toBe(true);
      expect(tooltip.setResizable(true)).toBe(true);
      expect(tooltip.setAlwaysOnTop(false)).toBe(true);
      expect(tooltip.isMovable()).toBe(true);
      expect(tooltip.isResizable()).toBe(true);
      expect(tooltip.isAlwaysOnTop()).toBe(false);
    });
  });

  describe('setTitle', () => {
    it('rejects an empty title without emitting', () => {
      expect(window.setTitle('')).toBe(false);
      expect(window.getTitle()).toBe('Editor');
      expect(events).toEqual([]);
    });

    it('replaces the title and emits a state change', () => {
      expect(window.setTitle('Editor - notes.txt')).toBe(true);
      expect(window.getTitle()).toBe('Editor - notes.txt');
      expect(events).toHaveLength(1);
      expect(events[0]).toMatchObject({
        type: 'window:state_changed',
        windowId: 1,
        payload: { previous: null },
      });
    });
  });

  describe('move and resize', () => {
    it('moves anywhere and reports old and new coordinates', () => {
      expect(window.move(-40, 25)).toBe(true);
      expect(window.getGeometry().x).toBe(-40);
      expect(events[0]).toMatchObject({
        type: 'window:moved',
        payload: { x: -40, y: 25, width: 800, height: 600, oldX: 0, oldY: 0, oldWidth: 800, oldHeight: 600 },
      });
    });

    it('refuses fractional or non-finite coordinates', () => {
      expect(window.move(1.5, 0)).toBe(false);
      expect(window.move(0, Number.POSITIVE_INFINITY)).toBe(false);
      expect(events).toEqual([]);
    });

    it('resizes within limits', () => {
      window.move(5, 6);
      events.length = 0;

      expect(window.resize(1024, 768)).toBe(true);
      expect(events[0]).toMatchObject({
        type: 'window:resized',
        payload: { x: 5, y: 6, width: 1024, height: 768, oldX: 5, oldY: 6, oldWidth: 800, oldHeight: 600 },
      });
    });

    it('rejects sizes outside the limits with no change and no event', () => {
      expect(window.resize(50, 50)).toBe(false);
      expect(window.resize(800, 5000)).toBe(false);
      expect(window.getGeometry()).toMatchObject({ width: 800, height: 600 });
      expect(events).toEqual([]);
    });
  });

  describe('state machine', () => {
    it('minimizes once and hides the window', () => {
      expect(window.minimize()).toBe(true);
      expect(window.minimize()).toBe(true);
      expect(window.getState()).toBe('minimized');
      expect(window.isVisible()).toBe(false);
      expect(events).toHaveLength(1);
      expect(events[0]).toMatchObject({ type: 'window:state_changed', payload: { previous: 'normal' } });
    });

    it('maximizes to the display and restores the previous bounds', () => {
      window.move(10, 20);
      window.maximize();

      expect(window.getState()).toBe('maximized');
      expect(window.getGeometry()).toMatchObject({ x: 0, y: 0, width: 1920, height: 1080 });
      expect(window.getNormalGeometry()).toMatchObject({ x: 10, y: 20, width: 800, height: 600 });

      expect(window.restore()).toBe(true);
      expect(window.getState()).toBe('normal');
      expect(window.getGeometry()).toMatchObject({ x: 10, y: 20, width: 800, height: 600 });
    });

    it('is idempotent on maximize and restore', () => {
      expect(window.restore()).toBe(true);
      window.maximize();
      events.length = 0;
      expect(window.maximize()).toBe(true);
      expect(events).toEqual([]);
    });

    it('returns to the pre-minimize geometry after minimize, maximize, restore', () => {
      window.move(30, 40);
      window.resize(640, 480);
      const before = window.getGeometry();

      window.minimize();
      window.maximize();
      window.restore();

      expect(window.getGeometry()).toEqual(before);
      expect(window.isVisible()).toBe(true);
    });

    it('reports each previous state in order', () => {
      window.minimize();
      window.maximize();
      window.restore();
      expect(events.map((e) => (e.type === 'window:state_changed' ? e.payload.previous : undefined)))
        .toEqual(['normal', 'minimized', 'maximized']);
    });

    it('restores normal bounds when leaving a minimized maximized window', () => {
      window.move(12, 34);
      window.maximize();
      window.minimize();
      window.restore();
      expect(window.getGeometry()).toMatchObject({ x: 12, y: 34, width: 800, height: 600 });
    });

    it('tracks whether the display extent is in place', () => {
      expect(window.hasDisplayGeometry()).toBe(false);
      window.maximize();
      expect(window.hasDisplayGeometry()).toBe(true);
      window.minimize();
      expect(window.hasDisplayGeometry()).toBe(true);
      window.restore();
      expect(window.hasDisplayGeometry()).toBe(false);
    });

    it('reports every transition as state_changed', () => {
      window.minimize();
      window.maximize();
      window.setFullscreen(true);
      window.restore();
      expect(events.map((e) => e.type)).toEqual([
        'window:state_changed',
        'window:state_changed',
        'window:state_changed',
        'window:state_changed',
      ]);
    });

    it('enters and leaves fullscreen', () => {
      window.move(7, 8);
      expect(window.setFullscreen(false)).toBe(true);
      expect(events).toHaveLength(1); // only the move

      window.setFullscreen(true);
      expect(window.getState()).toBe('fullscreen');
      expect(window.getGeometry()).toMatchObject({ x: 0, y: 0, width: 1920, height: 1080 });
      expect(window.setFullscreen(true)).toBe(true);
      expect(events).toHaveLength(2);

      window.setFullscreen(false);
      expect(window.getState()).toBe('normal');
      expect(window.getGeometry()).toMatchObject({ x: 7, y: 8, width: 800, height: 600 });
      expect(events[2]).toMatchObject({ payload: { previous: 'fullscreen' } });
    });

    it('uses the configured display extent', () => {
      const w = new Window(9, 'Docked', 400, 300, 'normal', {
        display: { x: 0, y: 40, width: 1280, height: 680 },
      });
      w.maximize();
      expect(w.getGeometry()).toMatchObject({ x: 0, y: 40, width: 1280, height: 680 });
    });

    it('clamps the display extent into the size limits', () => {
      window.setMaximumSize(1000, 900);
      window.maximize();
      expect(window.getGeometry()).toMatchObject({ width: 1000, height: 900 });
    });
  });

  describe('visibility', () => {
    it('toggles visibility once per change', () => {
      expect(window.show()).toBe(true);
      expect(events).toEqual([]);

      expect(window.hide()).toBe(true);
      expect(window.hide()).toBe(true);
      expect(window.isVisible()).toBe(false);
      expect(window.getState()).toBe('normal');

      expect(window.show()).toBe(true);
      expect(events.map((e) => e.type)).toEqual(['window:state_changed', 'window:state_changed']);
    });
  });

  describe('close and focus', () => {
    it('only requests closing', () => {
      expect(window.close()).toBe(true);
      expect(events).toHaveLength(1);
      expect(events[0]).toMatchObject({ type: 'window:close_request', windowId: 1, payload: null });
      expect(window.getState()).toBe('normal');
    });

    it('requests focus without taking it', () => {
      expect(window.setFocus()).toBe(true);
      expect(window.hasFocus()).toBe(false);
      expect(events[0].type).toBe('window:focus_gained');
    });

    it('takes focus from handled events and re-emits them unchanged', () => {
      const gained: WindowEvent = { type: 'window:focus_gained', windowId: 1, timestamp: 99, payload: null };
      window.handleEvent(gained);
      expect(window.hasFocus()).toBe(true);
      expect(events[0]).toBe(gained);

      expect(window.setFocus()).toBe(true);
      expect(events).toHaveLength(1);

      window.handleEvent({ type: 'window:focus_lost', windowId: 1, timestamp: 100, payload: null });
      expect(window.hasFocus()).toBe(false);
    });

    it('passes input events through without touching focus', () => {
      const press: WindowEvent = {
        type: 'key:press',
        windowId: 1,
        timestamp: 5,
        payload: { keyCode: 65, keyText: 'a', modifiers: 0, isAutoRepeat: false },
      };
      window.handleEvent(press);
      expect(window.hasFocus()).toBe(false);
      expect(events).toEqual([press]);
    });
  });

  describe('size limits', () => {
    it('rejects non-positive limits', () => {
      expect(window.setMinimumSize(0, 10)).toBe(false);
      expect(window.setMaximumSize(100, -1)).toBe(false);
    });

    it('grows the window to a larger minimum without a resize event', () => {
      expect(window.setMinimumSize(900, 700)).toBe(true);
      expect(window.getGeometry()).toMatchObject({ width: 900, height: 700, minWidth: 900, minHeight: 700 });
      expect(events).toEqual([]);
    });

    it('shrinks the window to a smaller maximum', () => {
      expect(window.setMaximumSize(300, 200)).toBe(true);
      expect(window.getGeometry()).toMatchObject({ width: 300, height: 200, maxWidth: 300, maxHeight: 200 });
    });

    it('refuses limits that cross each other', () => {
      expect(window.setMinimumSize(5000, 100)).toBe(false);
      expect(window.setMaximumSize(50, 50)).toBe(false);
      expect(window.getGeometry()).toMatchObject({ minWidth: 100, maxWidth: 4096 });
    });

    it('keeps the size within limits through every mutation', () => {
      const steps: Array<() => boolean> = [
        () => window.resize(150, 150),
        () => window.setMinimumSize(400, 400),
        () => window.resize(300, 300),
        () => window.setMaximumSize(500, 450),
        () => window.resize(600, 600),
        () => window.setMinimumSize(120, 120),
        () => window.resize(120, 130),
      ];
      for (const step of steps) {
        step();
        const g = window.getGeometry();
        expect(g.width).toBeGreaterThanOrEqual(g.minWidth);
        expect(g.width).toBeLessThanOrEqual(g.maxWidth);
        expect(g.height).toBeGreaterThanOrEqual(g.minHeight);
        expect(g.height).toBeLessThanOrEqual(g.maxHeight);
      }
      expect(window.getGeometry()).toMatchObject({ width: 120, height: 130 });
    });
  });

  describe('opacity', () => {
    it('accepts values in [0, 1] only', () => {
      expect(window.setOpacity(-0.1)).toBe(false);
      expect(window.setOpacity(1.5)).toBe(false);
      expect(window.setOpacity(Number.NaN)).toBe(false);
      expect(window.setOpacity(0)).toBe(true);
      expect(window.setOpacity(0.5)).toBe(true);
      expect(window.getOpacity()).toBe(0.5);
    });
  });

  describe('render surface', () => {
    it('succeeds without a surface', () => {
      expect(window.update()).toBe(true);
      expect(window.repaint()).toBe(true);
    });

    it('forwards to the surface and reports its result', () => {
      const surface = { update: vi.fn(() => true), repaint: vi.fn(() => false) };
      const w = new Window(6, 'Canvas', 300, 300, 'normal', { surface });
      expect(w.update()).toBe(true);
      expect(w.repaint()).toBe(false);
      expect(surface.update).toHaveBeenCalledWith(6);
      expect(surface.repaint).toHaveBeenCalledWith(6);
    });
  });

  it('stamps events from its clock', () => {
    let tick = 100;
    const w = new Window(7, 'Clocked', 300, 300, 'normal', { clock: () => tick++ });
    const seen = track(w);
    w.move(1, 1);
    w.move(2, 2);
    expect(seen.map((e) => e.timestamp)).toEqual([100, 101]);
  });

  it('snapshots a copy of its state', () => {
    const snapshot = window.toSnapshot();
    expect(snapshot).toMatchObject({
      id: 1,
      title: 'Editor',
      type: 'normal',
      state: 'normal',
      visible: true,
      focused: false,
      opacity: 1,
      resizable: true,
      movable: true,
      alwaysOnTop: false,
    });
    snapshot.geometry.width = 1;
    expect(window.getGeometry().width).toBe(800);
  });
});

import type {
  DisplayBounds,
  RenderSurface,
  SizeLimits,
  WindowGeometry,
  WindowSnapshot,
  WindowState,
  WindowType,
} from '@/types';
import type { Clock, WindowEvent, WindowEventCallback } from '@/events/types';
import { createClock, createCounterClock, lifecycleEvent } from '@/events/emitter';
import {
  createWindowStore,
  insertId,
  removeId,
  type WindowManagerState,
  type WindowStore,
} from '@/stores/windowStore';
import {
  ordinalToState,
  parseLayout,
  readLayoutFile,
  stateToOrdinal,
  writeLayoutFile,
  type SavedWindow,
  type WindowLayout,
} from '@/services/layout';
import type { Config } from '@/config';
import { DEFAULT_DISPLAY, DEFAULT_LAYOUT_PATH, INVALID_WINDOW_ID } from '@/lib/constants';
import { WindowConstructionError, getErrorMessage } from '@/lib/errors';
import { DEFAULT_LIMITS, Window, isValidWindowSpec, type WindowOptions } from './Window';

export interface WindowManagerOptions {
  display: DisplayBounds;
  limits: SizeLimits;
  clock: Clock;
  // Default file for saveWindowState / restoreWindowState
  layoutPath: string;
  surface?: RenderSurface;
}

export function managerOptionsFromConfig(config: Config): WindowManagerOptions {
  return {
    display: config.display,
    limits: config.limits,
    clock: createClock(config.clock),
    layoutPath: config.layoutPath,
  };
}

const EMPTY_GEOMETRY: WindowGeometry = {
  x: 0,
  y: 0,
  width: 0,
  height: 0,
  minWidth: 0,
  minHeight: 0,
  maxWidth: 0,
  maxHeight: 0,
};

function replayState(window: Window, state: WindowState): void {
  switch (state) {
    case 'minimized':
      window.minimize();
      break;
    case 'maximized':
      window.maximize();
      break;
    case 'fullscreen':
      window.setFullscreen(true);
      break;
    case 'hidden':
      window.hide();
      break;
    default:
      break;
  }
}

/**
 * Owns every window of the shell: assigns identities, arbitrates focus,
 * funnels all window events into one sink and persists the layout.
 *
 * Nothing outside the manager holds a Window; callers address windows by
 * identity and read them through snapshots. Failures are reported as
 * `false` / `INVALID_WINDOW_ID`, never thrown.
 */
export class WindowManager {
  private windows = new Map<number, Window>();
  private readonly store: WindowStore = createWindowStore();
  private readonly windowOptions: WindowOptions;
  private readonly layoutPath: string;
  private eventCallback: WindowEventCallback | null = null;

  constructor(options: Partial<WindowManagerOptions> = {}) {
    this.windowOptions = {
      clock: options.clock ?? createCounterClock(),
      display: options.display ?? DEFAULT_DISPLAY,
      limits: options.limits ?? DEFAULT_LIMITS,
      surface: options.surface,
    };
    this.layoutPath = options.layoutPath ?? DEFAULT_LAYOUT_PATH;
  }

  createWindow(title: string, width: number, height: number, type: WindowType = 'normal'): number {
    if (!isValidWindowSpec(title, width, height)) {
      return INVALID_WINDOW_ID;
    }

    const { nextWindowId: id, windowIds } = this.store.getState();
    const window = new Window(id, title, width, height, type, this.windowOptions);
    window.setEventCallback((event) => this.onWindowEvent(event));

    this.windows.set(id, window);
    this.store.setState({ windowIds: insertId(windowIds, id), nextWindowId: id + 1 });

    this.setFocus(id);
    this.emit(lifecycleEvent('window:created', id, this.windowOptions.clock));
    return id;
  }

  closeWindow(id: number): boolean {
    const window = this.windows.get(id);
    if (!window) return false;

    const { clock } = this.windowOptions;
    this.emit(lifecycleEvent('window:closing', id, clock));

    window.setEventCallback(null);
    this.windows.delete(id);

    const { windowIds, focusedWindowId } = this.store.getState();
    const wasFocused = focusedWindowId === id;
    this.store.setState({
      windowIds: removeId(windowIds, id),
      focusedWindowId: wasFocused ? null : focusedWindowId,
    });

    if (wasFocused) {
      this.focusFallback();
    }

    this.emit(lifecycleEvent('window:destroyed', id, clock));
    return true;
  }

  /**
   * Move focus to `id`. focus_lost for the previous holder is delivered
   * before focus_gained for the new one, and manager state is updated
   * around them so no listener ever sees two focused windows.
   */
  setFocus(id: number): boolean {
    const window = this.windows.get(id);
    if (!window) return false;

    const { focusedWindowId } = this.store.getState();
    if (focusedWindowId === id) return true;

    const { clock } = this.windowOptions;
    const previous = focusedWindowId === null ? undefined : this.windows.get(focusedWindowId);
    if (previous) {
      this.store.setState({ focusedWindowId: null });
      previous.handleEvent(lifecycleEvent('window:focus_lost', previous.getId(), clock));
    }

    this.store.setState({ focusedWindowId: id });
    window.handleEvent(lifecycleEvent('window:focus_gained', id, clock));
    return true;
  }

  // Window-initiated focus: the request comes back through onWindowEvent
  requestFocus(id: number): boolean {
    return this.withWindow(id, (w) => w.setFocus());
  }

  getFocusedWindow(): number {
    return this.store.getState().focusedWindowId ?? INVALID_WINDOW_ID;
  }

  /**
   * Focus the next window in identity order, wrapping around.
   */
  cycleFocus(reverse = false): boolean {
    const { windowIds, focusedWindowId } = this.store.getState();
    if (windowIds.length === 0) return false;

    const current = focusedWindowId === null ? -1 : windowIds.indexOf(focusedWindowId);
    let next: number;
    if (current === -1) {
      next = 0;
    } else if (reverse) {
      next = (current - 1 + windowIds.length) % windowIds.length;
    } else {
      next = (current + 1) % windowIds.length;
    }
    return this.setFocus(windowIds[next]);
  }

  minimizeWindow(id: number): boolean {
    return this.withWindow(id, (w) => w.minimize());
  }

  maximizeWindow(id: number): boolean {
    return this.withWindow(id, (w) => w.maximize());
  }

  restoreWindow(id: number): boolean {
    return this.withWindow(id, (w) => w.restore());
  }

  moveWindow(id: number, x: number, y: number): boolean {
    return this.withWindow(id, (w) => w.move(x, y));
  }

  resizeWindow(id: number, width: number, height: number): boolean {
    return this.withWindow(id, (w) => w.resize(width, height));
  }

  setWindowFullscreen(id: number, fullscreen: boolean): boolean {
    return this.withWindow(id, (w) => w.setFullscreen(fullscreen));
  }

  setWindowTitle(id: number, title: string): boolean {
    return this.withWindow(id, (w) => w.setTitle(title));
  }

  showWindow(id: number): boolean {
    return this.withWindow(id, (w) => w.show());
  }

  hideWindow(id: number): boolean {
    return this.withWindow(id, (w) => w.hide());
  }

  // Emits close_request; the sink decides whether to call closeWindow
  requestClose(id: number): boolean {
    return this.withWindow(id, (w) => w.close());
  }

  setWindowOpacity(id: number, opacity: number): boolean {
    return this.withWindow(id, (w) => w.setOpacity(opacity));
  }

  setWindowMinimumSize(id: number, minWidth: number, minHeight: number): boolean {
    return this.withWindow(id, (w) => w.setMinimumSize(minWidth, minHeight));
  }

  setWindowMaximumSize(id: number, maxWidth: number, maxHeight: number): boolean {
    return this.withWindow(id, (w) => w.setMaximumSize(maxWidth, maxHeight));
  }

  setWindowResizable(id: number, resizable: boolean): boolean {
    return this.withWindow(id, (w) => w.setResizable(resizable));
  }

  setWindowMovable(id: number, movable: boolean): boolean {
    return this.withWindow(id, (w) => w.setMovable(movable));
  }

  setWindowAlwaysOnTop(id: number, alwaysOnTop: boolean): boolean {
    return this.withWindow(id, (w) => w.setAlwaysOnTop(alwaysOnTop));
  }

  updateWindow(id: number): boolean {
    return this.withWindow(id, (w) => w.update());
  }

  repaintWindow(id: number): boolean {
    return this.withWindow(id, (w) => w.repaint());
  }

  closeAll(): void {
    for (const id of this.store.getState().windowIds) {
      this.closeWindow(id);
    }
  }

  getWindowCount(): number {
    return this.windows.size;
  }

  getWindowIds(): number[] {
    return [...this.store.getState().windowIds];
  }

  // Unknown ids read as a zeroed geometry rather than failing
  getWindowGeometry(id: number): WindowGeometry {
    return this.windows.get(id)?.getGeometry() ?? { ...EMPTY_GEOMETRY };
  }

  getWindowInfo(id: number): WindowSnapshot | undefined {
    return this.windows.get(id)?.toSnapshot();
  }

  getState(): WindowManagerState {
    return this.store.getState();
  }

  subscribe<T>(
    selector: (state: WindowManagerState) => T,
    listener: (selected: T, previous: T) => void,
  ): () => void {
    return this.store.subscribe(selector, listener);
  }

  setEventCallback(callback: WindowEventCallback | null): void {
    this.eventCallback = callback;
  }

  /**
   * Route an externally sourced event to the window it addresses. Events
   * for windows that have since closed are dropped. Focus events go through
   * focus arbitration so the manager's record and the window flags agree.
   */
  handleEvent(event: WindowEvent): void {
    const window = this.windows.get(event.windowId);
    if (!window) return;

    if (event.type === 'window:focus_gained') {
      this.setFocus(event.windowId);
      return;
    }
    if (event.type === 'window:focus_lost' && this.store.getState().focusedWindowId === event.windowId) {
      this.store.setState({ focusedWindowId: null });
    }
    window.handleEvent(event);
  }

  toLayout(): WindowLayout {
    const windows = this.getWindowIds().flatMap((id) => {
      const window = this.windows.get(id);
      return window ? [this.saveWindow(window)] : [];
    });
    return { windows, focused_window: this.getFocusedWindow() };
  }

  saveWindowState(filename: string = this.layoutPath): boolean {
    try {
      writeLayoutFile(filename, this.toLayout());
      return true;
    } catch (error) {
      console.error('[WindowManager] Failed to save window state:', getErrorMessage(error));
      return false;
    }
  }

  /**
   * Replace every window with the ones described by a layout document.
   * The document is validated and the new collection built in full before
   * anything live changes; on failure the manager is left as it was.
   */
  loadLayout(document: unknown): boolean {
    const parsed = parseLayout(document);
    if (!parsed.ok) {
      console.error('[WindowManager] Invalid window layout:', parsed.error);
      return false;
    }
    return this.applyLayout(parsed.layout);
  }

  restoreWindowState(filename: string = this.layoutPath): boolean {
    const parsed = readLayoutFile(filename);
    if (!parsed.ok) {
      console.error(`[WindowManager] Failed to restore window state from ${filename}:`, parsed.error);
      return false;
    }
    return this.applyLayout(parsed.layout);
  }

  private applyLayout(layout: WindowLayout): boolean {
    const restored = new Map<number, Window>();
    let focusedWindowId: number | null = null;

    try {
      for (const saved of layout.windows) {
        restored.set(saved.id, this.rebuildWindow(saved));
      }
      const focused = restored.get(layout.focused_window);
      if (focused) {
        // No callback attached yet, so this flips the flag silently
        focused.handleEvent(lifecycleEvent('window:focus_gained', focused.getId(), this.windowOptions.clock));
        focusedWindowId = focused.getId();
      }
    } catch (error) {
      console.error('[WindowManager] Failed to rebuild window layout:', getErrorMessage(error));
      return false;
    }

    for (const window of this.windows.values()) {
      window.setEventCallback(null);
    }
    for (const window of restored.values()) {
      window.setEventCallback((event) => this.onWindowEvent(event));
    }

    const windowIds = [...restored.keys()].sort((a, b) => a - b);
    const highest = windowIds.length > 0 ? windowIds[windowIds.length - 1] : 0;

    this.windows = restored;
    this.store.setState((state) => ({
      windowIds,
      focusedWindowId,
      nextWindowId: Math.max(state.nextWindowId, highest + 1),
    }));
    return true;
  }

  // Category is not persisted; restored windows are always 'normal'
  private rebuildWindow(saved: SavedWindow): Window {
    const state = ordinalToState(saved.state);
    const bounds = saved.normal ?? saved;

    const window = new Window(saved.id, saved.title, bounds.width, bounds.height, 'normal', this.windowOptions);
    if (!window.move(bounds.x, bounds.y)) {
      throw new WindowConstructionError(`Window ${saved.id} cannot be placed at ${bounds.x},${bounds.y}`);
    }
    // Minimized or hidden on top of maximize: take the display extent first
    if (saved.normal && (state === 'minimized' || state === 'hidden')) {
      window.maximize();
    }
    replayState(window, state);
    return window;
  }

  private saveWindow(window: Window): SavedWindow {
    const { x, y, width, height } = window.getGeometry();
    const current = window.getState();
    // Hidden is not a state of its own on a live window; any invisible,
    // non-minimized window is written as hidden
    const state = !window.isVisible() && current !== 'minimized' ? 'hidden' : current;
    const saved: SavedWindow = {
      id: window.getId(),
      title: window.getTitle(),
      x,
      y,
      width,
      height,
      state: stateToOrdinal(state),
    };
    if (window.hasDisplayGeometry()) {
      const normal = window.getNormalGeometry();
      saved.normal = { x: normal.x, y: normal.y, width: normal.width, height: normal.height };
    }
    return saved;
  }

  private focusFallback(): void {
    const [lowest] = this.store.getState().windowIds;
    if (lowest !== undefined) {
      this.setFocus(lowest);
    }
  }

  private withWindow(id: number, action: (window: Window) => boolean): boolean {
    const window = this.windows.get(id);
    return window ? action(window) : false;
  }

  // A focus_gained the manager did not grant is a request from Window.setFocus()
  private onWindowEvent(event: WindowEvent): void {
    if (event.type === 'window:focus_gained') {
      const window = this.windows.get(event.windowId);
      if (window && !window.hasFocus()) {
        this.setFocus(event.windowId);
        return;
      }
    }
    this.emit(event);
  }

  private emit(event: WindowEvent): void {
    this.eventCallback?.(event);
  }
}

import type {
  DisplayBounds,
  RenderSurface,
  SizeLimits,
  WindowBounds,
  WindowGeometry,
  WindowSnapshot,
  WindowState,
  WindowType,
  WindowCapabilities,
} from '@/types';
import type { Clock, WindowEvent, WindowEventCallback } from '@/events/types';
import { createCounterClock, geometryEvent, lifecycleEvent, stateEvent } from '@/events/emitter';
import { clamp, isPixel, isPositivePixel } from '@/lib/utils';
import { WindowConstructionError } from '@/lib/errors';
import {
  DEFAULT_DISPLAY,
  MAX_WINDOW_HEIGHT,
  MAX_WINDOW_WIDTH,
  MIN_WINDOW_HEIGHT,
  MIN_WINDOW_WIDTH,
} from '@/lib/constants';

export interface WindowOptions {
  clock: Clock;
  // Extent taken by maximize() and setFullscreen(true)
  display: DisplayBounds;
  limits: SizeLimits;
  surface?: RenderSurface;
}

export const DEFAULT_LIMITS: SizeLimits = {
  minWidth: MIN_WINDOW_WIDTH,
  minHeight: MIN_WINDOW_HEIGHT,
  maxWidth: MAX_WINDOW_WIDTH,
  maxHeight: MAX_WINDOW_HEIGHT,
};

// Capability flags each window type starts with
const typeDefaults: Record<WindowType, WindowCapabilities> = {
  normal: { resizable: true, movable: true, alwaysOnTop: false },
  dialog: { resizable: false, movable: true, alwaysOnTop: true },
  tooltip: { resizable: false, movable: false, alwaysOnTop: true },
  popup: { resizable: true, movable: true, alwaysOnTop: true },
  utility: { resizable: false, movable: true, alwaysOnTop: false },
};

/**
 * Checks the arguments a window is created from. Shared by the constructor
 * and the manager so a bad request is refused before anything is allocated.
 */
export function isValidWindowSpec(title: string, width: number, height: number): boolean {
  return title.length > 0 && isPositivePixel(width) && isPositivePixel(height);
}

/**
 * One on-screen window: its geometry, state machine and event emission.
 *
 * Every observable mutation emits exactly one event to the registered
 * callback. Focus is the exception to direct mutation: `setFocus()` only
 * requests it, and `hasFocus` changes when the manager routes a
 * focus_gained / focus_lost event back through `handleEvent()`.
 */
export class Window {
  private readonly id: number;
  private readonly type: WindowType;
  private readonly clock: Clock;
  private readonly display: DisplayBounds;
  private readonly surface: RenderSurface | undefined;

  private title: string;
  private geometry: WindowGeometry;
  private normalGeometry: WindowGeometry;
  // False while the geometry is the display extent of maximize/fullscreen
  private ownsGeometry = true;
  private state: WindowState = 'normal';
  private visible = true;
  private focused = false;
  private capabilities: WindowCapabilities;
  private opacity = 1;
  private eventCallback: WindowEventCallback | null = null;

  constructor(
    id: number,
    title: string,
    width: number,
    height: number,
    type: WindowType = 'normal',
    options: Partial<WindowOptions> = {},
  ) {
    if (!isPositivePixel(width) || !isPositivePixel(height)) {
      throw new WindowConstructionError(`Window size must be positive, got ${width}x${height}`);
    }
    if (title.length === 0) {
      throw new WindowConstructionError('Window title must not be empty');
    }

    const limits = options.limits ?? DEFAULT_LIMITS;

    this.id = id;
    this.title = title;
    this.type = type;
    this.clock = options.clock ?? createCounterClock();
    this.display = options.display ?? DEFAULT_DISPLAY;
    this.surface = options.surface;
    this.capabilities = { ...typeDefaults[type] };

    // A window created outside the default limits widens them to fit
    this.geometry = {
      x: 0,
      y: 0,
      width,
      height,
      minWidth: Math.min(limits.minWidth, width),
      minHeight: Math.min(limits.minHeight, height),
      maxWidth: Math.max(limits.maxWidth, width),
      maxHeight: Math.max(limits.maxHeight, height),
    };
    this.normalGeometry = { ...this.geometry };
  }

  getId(): number {
    return this.id;
  }

  getTitle(): string {
    return this.title;
  }

  getType(): WindowType {
    return this.type;
  }

  getState(): WindowState {
    return this.state;
  }

  getGeometry(): WindowGeometry {
    return { ...this.geometry };
  }

  getNormalGeometry(): WindowGeometry {
    return { ...this.normalGeometry };
  }

  // True while maximize/fullscreen geometry is in place, minimized or not
  hasDisplayGeometry(): boolean {
    return !this.ownsGeometry;
  }

  isVisible(): boolean {
    return this.visible;
  }

  hasFocus(): boolean {
    return this.focused;
  }

  isResizable(): boolean {
    return this.capabilities.resizable;
  }

  isMovable(): boolean {
    return this.capabilities.movable;
  }

  isAlwaysOnTop(): boolean {
    return this.capabilities.alwaysOnTop;
  }

  getOpacity(): number {
    return this.opacity;
  }

  toSnapshot(): WindowSnapshot {
    return {
      id: this.id,
      title: this.title,
      type: this.type,
      state: this.state,
      geometry: this.getGeometry(),
      normalGeometry: this.getNormalGeometry(),
      visible: this.visible,
      focused: this.focused,
      opacity: this.opacity,
      ...this.capabilities,
    };
  }

  setEventCallback(callback: WindowEventCallback | null): void {
    this.eventCallback = callback;
  }

  setTitle(title: string): boolean {
    if (title.length === 0) return false;

    this.title = title;
    this.emit(stateEvent('window:state_changed', this.id, null, this.clock));
    return true;
  }

  move(x: number, y: number): boolean {
    if (!isPixel(x) || !isPixel(y)) return false;

    const { x: oldX, y: oldY, width, height } = this.geometry;
    this.geometry.x = x;
    this.geometry.y = y;

    this.emit(geometryEvent('window:moved', this.id, {
      x, y, width, height,
      oldX, oldY, oldWidth: width, oldHeight: height,
    }, this.clock));
    return true;
  }

  resize(width: number, height: number): boolean {
    const g = this.geometry;
    if (!isPixel(width) || !isPixel(height)) return false;
    if (width < g.minWidth || height < g.minHeight) return false;
    if (width > g.maxWidth || height > g.maxHeight) return false;

    const { width: oldWidth, height: oldHeight, x, y } = g;
    g.width = width;
    g.height = height;

    this.emit(geometryEvent('window:resized', this.id, {
      x, y, width, height,
      oldX: x, oldY: y, oldWidth, oldHeight,
    }, this.clock));
    return true;
  }

  minimize(): boolean {
    if (this.state === 'minimized') return true;

    const previous = this.state;
    this.state = 'minimized';
    this.visible = false;
    this.emitStateChange(previous);
    return true;
  }

  maximize(): boolean {
    if (this.state === 'maximized') return true;

    const previous = this.state;
    this.takeDisplayExtent();
    this.state = 'maximized';
    this.emitStateChange(previous);
    return true;
  }

  restore(): boolean {
    if (this.state === 'normal') return true;

    const previous = this.state;
    this.state = 'normal';
    this.visible = true;
    this.reclaimGeometry();
    this.emitStateChange(previous);
    return true;
  }

  setFullscreen(fullscreen: boolean): boolean {
    if (fullscreen === (this.state === 'fullscreen')) return true;

    const previous = this.state;
    if (fullscreen) {
      this.takeDisplayExtent();
      this.state = 'fullscreen';
    } else {
      this.state = 'normal';
      this.reclaimGeometry();
    }
    this.emitStateChange(previous);
    return true;
  }

  show(): boolean {
    if (this.visible) return true;

    this.visible = true;
    this.emit(stateEvent('window:state_changed', this.id, null, this.clock));
    return true;
  }

  hide(): boolean {
    if (!this.visible) return true;

    this.visible = false;
    this.emit(stateEvent('window:state_changed', this.id, null, this.clock));
    return true;
  }

  /**
   * Asks the owner to close this window. Nothing changes locally; whoever
   * receives the close_request decides whether the window is destroyed.
   */
  close(): boolean {
    this.emit(lifecycleEvent('window:close_request', this.id, this.clock));
    return true;
  }

  setFocus(): boolean {
    if (this.focused) return true;

    this.emit(lifecycleEvent('window:focus_gained', this.id, this.clock));
    return true;
  }

  handleEvent(event: WindowEvent): void {
    switch (event.type) {
      case 'window:focus_gained':
        this.focused = true;
        break;
      case 'window:focus_lost':
        this.focused = false;
        break;
      default:
        break;
    }
    this.emit(event);
  }

  setResizable(resizable: boolean): boolean {
    this.capabilities.resizable = resizable;
    return true;
  }

  setMovable(movable: boolean): boolean {
    this.capabilities.movable = movable;
    return true;
  }

  setAlwaysOnTop(alwaysOnTop: boolean): boolean {
    this.capabilities.alwaysOnTop = alwaysOnTop;
    return true;
  }

  // Constraint updates clamp the current size without a resize event
  setMinimumSize(minWidth: number, minHeight: number): boolean {
    const g = this.geometry;
    if (!isPositivePixel(minWidth) || !isPositivePixel(minHeight)) return false;
    if (minWidth > g.maxWidth || minHeight > g.maxHeight) return false;

    g.minWidth = minWidth;
    g.minHeight = minHeight;
    g.width = Math.max(g.width, minWidth);
    g.height = Math.max(g.height, minHeight);
    return true;
  }

  setMaximumSize(maxWidth: number, maxHeight: number): boolean {
    const g = this.geometry;
    if (!isPositivePixel(maxWidth) || !isPositivePixel(maxHeight)) return false;
    if (maxWidth < g.minWidth || maxHeight < g.minHeight) return false;

    g.maxWidth = maxWidth;
    g.maxHeight = maxHeight;
    g.width = Math.min(g.width, maxWidth);
    g.height = Math.min(g.height, maxHeight);
    return true;
  }

  setOpacity(opacity: number): boolean {
    if (!(opacity >= 0 && opacity <= 1)) return false;

    this.opacity = opacity;
    return true;
  }

  update(): boolean {
    return this.surface ? this.surface.update(this.id) : true;
  }

  repaint(): boolean {
    return this.surface ? this.surface.repaint(this.id) : true;
  }

  private takeDisplayExtent(): void {
    const g = this.geometry;
    if (this.ownsGeometry) {
      this.normalGeometry = { ...g };
    }
    this.applyBounds(this.display);
    this.ownsGeometry = false;
  }

  private reclaimGeometry(): void {
    if (this.ownsGeometry) return;

    this.applyBounds(this.normalGeometry);
    this.ownsGeometry = true;
  }

  // Size limits may have changed since the bounds were recorded
  private applyBounds(bounds: WindowBounds): void {
    const g = this.geometry;
    g.x = bounds.x;
    g.y = bounds.y;
    g.width = clamp(bounds.width, g.minWidth, g.maxWidth);
    g.height = clamp(bounds.height, g.minHeight, g.maxHeight);
  }

  private emitStateChange(previous: WindowState): void {
    this.emit(stateEvent('window:state_changed', this.id, previous, this.clock));
  }

  private emit(event: WindowEvent): void {
    this.eventCallback?.(event);
  }
}

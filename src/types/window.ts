export type WindowType =
  | 'normal'
  | 'dialog'
  | 'tooltip'
  | 'popup'
  | 'utility';

export type WindowState =
  | 'normal'
  | 'minimized'
  | 'maximized'
  | 'fullscreen'
  | 'hidden';

// Persisted layouts store the state as its ordinal
export const WINDOW_STATES: readonly WindowState[] = [
  'normal',
  'minimized',
  'maximized',
  'fullscreen',
  'hidden',
];

export interface WindowPosition {
  x: number;
  y: number;
}

export interface WindowSize {
  width: number;
  height: number;
}

export interface WindowBounds extends WindowPosition, WindowSize {}

export interface SizeLimits {
  minWidth: number;
  minHeight: number;
  maxWidth: number;
  maxHeight: number;
}

export interface WindowGeometry extends WindowBounds, SizeLimits {}

// Extent a window takes when maximized or fullscreen
export type DisplayBounds = WindowBounds;

export interface WindowCapabilities {
  resizable: boolean;
  movable: boolean;
  alwaysOnTop: boolean;
}

/**
 * Read-only copy of a window's public properties. Handed out instead of the
 * Window itself so nothing outside the manager holds a live reference.
 */
export interface WindowSnapshot extends WindowCapabilities {
  id: number;
  title: string;
  type: WindowType;
  state: WindowState;
  geometry: WindowGeometry;
  normalGeometry: WindowGeometry;
  visible: boolean;
  focused: boolean;
  opacity: number;
}

/**
 * Drawing backend a window forwards update/repaint requests to.
 * Rasterization is up to the host.
 */
export interface RenderSurface {
  update(windowId: number): boolean;
  repaint(windowId: number): boolean;
}

export type {
  WindowType,
  WindowState,
  WindowPosition,
  WindowSize,
  WindowBounds,
  SizeLimits,
  WindowGeometry,
  DisplayBounds,
  WindowCapabilities,
  WindowSnapshot,
  RenderSurface,
} from './window';
export { WINDOW_STATES } from './window';

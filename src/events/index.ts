export type {
  MouseButton,
  KeyModifierFlag,
  MousePayload,
  KeyboardPayload,
  GeometryPayload,
  DragPayload,
  StatePayload,
  LifecycleEventType,
  GeometryEventType,
  StateEventType,
  MouseEventType,
  KeyboardEventType,
  DragEventType,
  LifecycleEvent,
  GeometryEvent,
  StateEvent,
  WindowMouseEvent,
  WindowKeyboardEvent,
  WindowDragEvent,
  WindowEvent,
  WindowEventType,
  WindowEventCallback,
  Clock,
  ClockKind,
} from './types';
export { KeyModifier } from './types';
export {
  createCounterClock,
  wallClock,
  createClock,
  hasModifier,
  lifecycleEvent,
  geometryEvent,
  stateEvent,
  mouseEvent,
  keyboardEvent,
  dragEvent,
} from './emitter';

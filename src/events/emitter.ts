import type {
  Clock,
  ClockKind,
  DragEventType,
  DragPayload,
  GeometryEventType,
  GeometryPayload,
  KeyboardEventType,
  KeyboardPayload,
  LifecycleEvent,
  LifecycleEventType,
  GeometryEvent,
  MouseEventType,
  MousePayload,
  StateEvent,
  StateEventType,
  WindowDragEvent,
  WindowKeyboardEvent,
  WindowMouseEvent,
} from './types';
import type { WindowState } from '@/types';

/**
 * Strictly increasing counter starting at 1. Gives events an ordering
 * without tying them to real time.
 */
export function createCounterClock(): Clock {
  let counter = 0;
  return () => ++counter;
}

export const wallClock: Clock = () => Date.now();

export function createClock(kind: ClockKind): Clock {
  return kind === 'wall' ? wallClock : createCounterClock();
}

export function hasModifier(modifiers: number, modifier: number): boolean {
  return (modifiers & modifier) !== 0;
}

/**
 * Event factories. Each stamps the event with the next timestamp of the
 * given clock.
 */
export function lifecycleEvent(type: LifecycleEventType, windowId: number, clock: Clock): LifecycleEvent {
  return { type, windowId, timestamp: clock(), payload: null };
}

export function geometryEvent(
  type: GeometryEventType,
  windowId: number,
  payload: GeometryPayload,
  clock: Clock,
): GeometryEvent {
  return { type, windowId, timestamp: clock(), payload };
}

export function stateEvent(
  type: StateEventType,
  windowId: number,
  previous: WindowState | null,
  clock: Clock,
): StateEvent {
  return { type, windowId, timestamp: clock(), payload: { previous } };
}

export function mouseEvent(
  type: MouseEventType,
  windowId: number,
  payload: Partial<MousePayload> & Pick<MousePayload, 'x' | 'y'>,
  clock: Clock,
): WindowMouseEvent {
  return {
    type,
    windowId,
    timestamp: clock(),
    payload: {
      globalX: payload.x,
      globalY: payload.y,
      button: 'none',
      buttons: 0,
      modifiers: 0,
      deltaX: 0,
      deltaY: 0,
      wheelDelta: 0,
      ...payload,
    },
  };
}

export function keyboardEvent(
  type: KeyboardEventType,
  windowId: number,
  payload: Partial<KeyboardPayload> & Pick<KeyboardPayload, 'keyCode'>,
  clock: Clock,
): WindowKeyboardEvent {
  return {
    type,
    windowId,
    timestamp: clock(),
    payload: {
      keyText: '',
      modifiers: 0,
      isAutoRepeat: false,
      ...payload,
    },
  };
}

export function dragEvent(
  type: DragEventType,
  windowId: number,
  payload: Partial<DragPayload> & Pick<DragPayload, 'startX' | 'startY'>,
  clock: Clock,
): WindowDragEvent {
  return {
    type,
    windowId,
    timestamp: clock(),
    payload: {
      currentX: payload.startX,
      currentY: payload.startY,
      data: null,
      ...payload,
    },
  };
}

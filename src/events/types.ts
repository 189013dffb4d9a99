// Events emitted by windows and the window manager.
// The host shell receives every one of them through the manager's single sink.

import type { WindowState } from '@/types';

export type MouseButton = 'none' | 'left' | 'right' | 'middle' | 'extra1' | 'extra2';

// Keyboard modifier bit flags
export const KeyModifier = {
  None: 0,
  Shift: 1 << 0,
  Control: 1 << 1,
  Alt: 1 << 2,
  Meta: 1 << 3,
  CapsLock: 1 << 4,
  NumLock: 1 << 5,
} as const;

export type KeyModifierFlag = (typeof KeyModifier)[keyof typeof KeyModifier];

export interface MousePayload {
  x: number;          // relative to the window
  y: number;
  globalX: number;
  globalY: number;
  button: MouseButton;
  buttons: number;    // mask of buttons currently held
  modifiers: number;
  deltaX: number;
  deltaY: number;
  wheelDelta: number;
}

export interface KeyboardPayload {
  keyCode: number;
  keyText: string;
  modifiers: number;
  isAutoRepeat: boolean;
}

export interface GeometryPayload {
  x: number;
  y: number;
  width: number;
  height: number;
  oldX: number;
  oldY: number;
  oldWidth: number;
  oldHeight: number;
}

export interface DragPayload {
  startX: number;
  startY: number;
  currentX: number;
  currentY: number;
  data: Uint8Array | null;
}

// null when the change was to the title or visibility rather than the state
export interface StatePayload {
  previous: WindowState | null;
}

export type LifecycleEventType =
  | 'window:created'
  | 'window:closing'
  | 'window:destroyed'
  | 'window:focus_gained'
  | 'window:focus_lost'
  | 'window:close_request'
  | 'mouse:enter'
  | 'mouse:leave';

export type GeometryEventType = 'window:moved' | 'window:resized';

// minimized/maximized/restored are for hosts that relay transitions in their
// own terms; Window itself reports every transition as window:state_changed
export type StateEventType =
  | 'window:minimized'
  | 'window:maximized'
  | 'window:restored'
  | 'window:state_changed';

export type MouseEventType = 'mouse:move' | 'mouse:press' | 'mouse:release' | 'mouse:wheel';

export type KeyboardEventType = 'key:press' | 'key:release';

export type DragEventType = 'drag:begin' | 'drag:move' | 'drag:end';

interface EventHeader {
  windowId: number;
  timestamp: number;
}

export interface LifecycleEvent extends EventHeader {
  type: LifecycleEventType;
  payload: null;
}

export interface GeometryEvent extends EventHeader {
  type: GeometryEventType;
  payload: GeometryPayload;
}

export interface StateEvent extends EventHeader {
  type: StateEventType;
  payload: StatePayload;
}

export interface WindowMouseEvent extends EventHeader {
  type: MouseEventType;
  payload: MousePayload;
}

export interface WindowKeyboardEvent extends EventHeader {
  type: KeyboardEventType;
  payload: KeyboardPayload;
}

export interface WindowDragEvent extends EventHeader {
  type: DragEventType;
  payload: DragPayload;
}

export type WindowEvent =
  | LifecycleEvent
  | GeometryEvent
  | StateEvent
  | WindowMouseEvent
  | WindowKeyboardEvent
  | WindowDragEvent;

export type WindowEventType = WindowEvent['type'];

export type WindowEventCallback = (event: WindowEvent) => void;

// Timestamp source. Ordinal (counter) or wall-clock milliseconds.
export type Clock = () => number;

export type ClockKind = 'counter' | 'wall';

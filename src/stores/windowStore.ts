import { createStore } from 'zustand/vanilla';
import { subscribeWithSelector } from 'zustand/middleware';
import { FIRST_WINDOW_ID } from '@/lib/constants';

/**
 * Manager-level state observed by passive shell components (taskbar,
 * switchers). Window instances themselves stay private to the manager;
 * this store only carries identities.
 */
export interface WindowManagerState {
  // Live identities in ascending order
  windowIds: readonly number[];
  focusedWindowId: number | null;
  nextWindowId: number;
}

export const initialWindowManagerState: WindowManagerState = {
  windowIds: [],
  focusedWindowId: null,
  nextWindowId: FIRST_WINDOW_ID,
};

export function createWindowStore(initial: WindowManagerState = initialWindowManagerState) {
  return createStore<WindowManagerState>()(
    subscribeWithSelector(() => ({ ...initial })),
  );
}

export type WindowStore = ReturnType<typeof createWindowStore>;

export function insertId(ids: readonly number[], id: number): number[] {
  return [...ids, id].sort((a, b) => a - b);
}

export function removeId(ids: readonly number[], id: number): number[] {
  return ids.filter((w) => w !== id);
}

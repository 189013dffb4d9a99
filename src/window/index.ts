export { Window, DEFAULT_LIMITS, isValidWindowSpec } from './Window';
export type { WindowOptions } from './Window';
export { WindowManager, managerOptionsFromConfig } from './WindowManager';
export type { WindowManagerOptions } from './WindowManager';

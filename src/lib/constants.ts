// Identity sentinel returned by createWindow on failure and by getFocusedWindow when nothing is focused
export const INVALID_WINDOW_ID = -1;

// First identity handed out by a fresh manager
export const FIRST_WINDOW_ID = 1;

// Window size limits
export const MIN_WINDOW_WIDTH = 100;
export const MIN_WINDOW_HEIGHT = 100;
export const MAX_WINDOW_WIDTH = 4096;
export const MAX_WINDOW_HEIGHT = 4096;

// Extent used for maximize/fullscreen when the host supplies no display bounds
export const DEFAULT_DISPLAY = {
  x: 0,
  y: 0,
  width: 1920,
  height: 1080,
} as const;

// Config lookup
export const CONFIG_DIR = '.shell';
export const CONFIG_FILE = 'config.json';
export const DEFAULT_LAYOUT_PATH = './.shell/layout.json';

export const ENV_KEYS = {
  config: 'SHELL_CONFIG',
  displayWidth: 'SHELL_DISPLAY_WIDTH',
  displayHeight: 'SHELL_DISPLAY_HEIGHT',
  clock: 'SHELL_CLOCK',
  layoutPath: 'SHELL_LAYOUT_PATH',
} as const;

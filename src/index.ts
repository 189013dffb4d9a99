export * from './types';
export * from './events';
export * from './window';
export { createWindowStore } from './stores/windowStore';
export type { WindowManagerState, WindowStore } from './stores/windowStore';
export { parseLayout, readLayoutFile, writeLayoutFile, stateToOrdinal, ordinalToState } from './services/layout';
export type { SavedWindow, WindowLayout, LayoutParseResult } from './services/layout';
export { loadConfig, getConfigSummary } from './config';
export type { Config } from './config';
export { WindowConstructionError, ConfigError } from './lib/errors';
export { INVALID_WINDOW_ID } from './lib/constants';

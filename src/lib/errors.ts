/**
 * Thrown by the Window constructor when asked to build a window that could
 * never satisfy its own invariants. The manager validates first, so this only
 * surfaces when a Window is constructed directly.
 */
export class WindowConstructionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WindowConstructionError';
  }
}

export class ConfigError extends Error {
  readonly path: string;

  constructor(path: string, message: string) {
    super(`${path}: ${message}`);
    this.name = 'ConfigError';
    this.path = path;
  }
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

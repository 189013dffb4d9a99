import { z } from 'zod';
import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import {
  CONFIG_DIR,
  CONFIG_FILE,
  DEFAULT_DISPLAY,
  DEFAULT_LAYOUT_PATH,
  ENV_KEYS,
  MAX_WINDOW_HEIGHT,
  MAX_WINDOW_WIDTH,
  MIN_WINDOW_HEIGHT,
  MIN_WINDOW_WIDTH,
} from '@/lib/constants';
import { ConfigError, getErrorMessage } from '@/lib/errors';

const DisplaySchema = z.object({
  x: z.number().int().default(DEFAULT_DISPLAY.x),
  y: z.number().int().default(DEFAULT_DISPLAY.y),
  width: z.number().int().positive().default(DEFAULT_DISPLAY.width),
  height: z.number().int().positive().default(DEFAULT_DISPLAY.height),
});

const LimitsSchema = z
  .object({
    minWidth: z.number().int().positive().default(MIN_WINDOW_WIDTH),
    minHeight: z.number().int().positive().default(MIN_WINDOW_HEIGHT),
    maxWidth: z.number().int().positive().default(MAX_WINDOW_WIDTH),
    maxHeight: z.number().int().positive().default(MAX_WINDOW_HEIGHT),
  })
  .refine((l) => l.minWidth <= l.maxWidth && l.minHeight <= l.maxHeight, {
    message: 'minimum size must not exceed maximum size',
  });

const ConfigSchema = z.object({
  display: DisplaySchema.default({}),
  limits: LimitsSchema.default({}),
  clock: z.enum(['counter', 'wall']).default('counter'),
  layoutPath: z.string().min(1).default(DEFAULT_LAYOUT_PATH),
});

export type Config = z.infer<typeof ConfigSchema>;

function validate(input: unknown, source: string): Config {
  const result = ConfigSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new ConfigError(source, `${where}${issue.message}`);
  }
  return result.data;
}

function readConfigFile(path: string): Config {
  let decoded: unknown;
  try {
    decoded = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(path, getErrorMessage(error));
  }
  return validate(decoded, path);
}

function envInt(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return undefined;
  return Number(raw);
}

/**
 * Load config from file or environment.
 *
 * The first existing file among the explicit path, $SHELL_CONFIG,
 * ./.shell/config.json and ~/.shell/config.json is read; environment
 * variables then override individual fields.
 */
export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): Config {
  let config = validate({}, 'defaults');

  const paths = [
    configPath,
    env[ENV_KEYS.config],
    join(process.cwd(), CONFIG_DIR, CONFIG_FILE),
    join(env.HOME || '', CONFIG_DIR, CONFIG_FILE),
  ].filter((p): p is string => Boolean(p));

  for (const p of paths) {
    if (existsSync(p)) {
      config = readConfigFile(p);
      break;
    }
  }

  // Override with environment variables
  const display = { ...config.display };
  display.width = envInt(env, ENV_KEYS.displayWidth) ?? display.width;
  display.height = envInt(env, ENV_KEYS.displayHeight) ?? display.height;

  const clock = env[ENV_KEYS.clock];

  return validate({
    ...config,
    display,
    clock: clock === 'counter' || clock === 'wall' ? clock : config.clock,
    layoutPath: env[ENV_KEYS.layoutPath] || config.layoutPath,
  }, 'environment');
}

/**
 * Config summary for log lines
 */
export function getConfigSummary(config: Config): Record<string, unknown> {
  return {
    display: `${config.display.width}x${config.display.height}`,
    limits: `${config.limits.minWidth}x${config.limits.minHeight}..${config.limits.maxWidth}x${config.limits.maxHeight}`,
    clock: config.clock,
    layoutPath: config.layoutPath,
  };
}

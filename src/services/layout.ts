import { z } from 'zod';
import { mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { WINDOW_STATES, type WindowState } from '@/types';
import { getErrorMessage } from '@/lib/errors';

// Layout document written by saveWindowState and read by restoreWindowState

const BoundsSchema = z.object({
  x: z.number().int().safe(),
  y: z.number().int().safe(),
  width: z.number().int().positive().safe(),
  height: z.number().int().positive().safe(),
});

const SavedWindowSchema = BoundsSchema.extend({
  id: z.number().int().positive(),
  title: z.string().min(1),
  state: z.number().int().min(0).max(WINDOW_STATES.length - 1),
  // Bounds to return to while the geometry is the display extent
  normal: BoundsSchema.optional(),
});

const WindowLayoutSchema = z
  .object({
    windows: z.array(SavedWindowSchema),
    focused_window: z.number().int(),
  })
  .superRefine((layout, ctx) => {
    const seen = new Set<number>();
    layout.windows.forEach((w, index) => {
      if (seen.has(w.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate window id ${w.id}`,
          path: ['windows', index, 'id'],
        });
      }
      seen.add(w.id);
    });
  });

export type SavedWindow = z.infer<typeof SavedWindowSchema>;
export type WindowLayout = z.infer<typeof WindowLayoutSchema>;

export type LayoutParseResult =
  | { ok: true; layout: WindowLayout }
  | { ok: false; error: string };

export function stateToOrdinal(state: WindowState): number {
  return WINDOW_STATES.indexOf(state);
}

export function ordinalToState(ordinal: number): WindowState {
  return WINDOW_STATES[ordinal] ?? 'normal';
}

/**
 * Validate an already-decoded document. Never throws.
 */
export function parseLayout(input: unknown): LayoutParseResult {
  const result = WindowLayoutSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return { ok: false, error: `${where}${issue.message}` };
  }
  return { ok: true, layout: result.data };
}

/**
 * Read and validate a layout file. Missing files and malformed JSON are
 * reported the same way as schema violations.
 */
export function readLayoutFile(path: string): LayoutParseResult {
  let decoded: unknown;
  try {
    decoded = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    return { ok: false, error: getErrorMessage(error) };
  }
  return parseLayout(decoded);
}

export function writeLayoutFile(path: string, layout: WindowLayout): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, JSON.stringify(layout, null, 2) + '\n', 'utf-8');
}

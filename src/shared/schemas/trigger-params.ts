/**
 * Zod schemas for inbound trigger parameters.
 *
 * Hotkey handlers and the UI call into the clipboard service with loosely typed
 * values; these schemas validate them at that boundary.
 *
 * @module shared/schemas/trigger-params
 */

import { z } from 'zod';
import type { TransformOp } from '../types/clip';

// ─── Reusable primitives ───

const itemId = z.number().int().positive();
const optionalLimit = z.number().int().positive().max(10_000).optional();
const optionalOffset = z.number().int().min(0).optional();
const transformOp: z.ZodType<TransformOp> = z.enum(['upper', 'lower', 'title_case', 'trim']);

// ─── Per-operation tuples ───

const GetHistoryParams = z.tuple([optionalLimit, optionalOffset, z.string().max(1000).optional()]);
const PasteParams = z.tuple([itemId, z.boolean().optional()]);
const QuickPasteParams = z.tuple([z.boolean().optional()]);
const ItemIdParams = z.tuple([itemId]);
const TransformParams = z.tuple([itemId, transformOp]);
const MergeParams = z.tuple([z.array(itemId).min(1).max(1000)]);
const ClearParams = z.tuple([z.boolean().optional()]);

/** Trigger name → parameter tuple schema */
export const TriggerParamSchemas = {
  getHistory: GetHistoryParams,
  paste: PasteParams,
  quickPaste: QuickPasteParams,
  pin: ItemIdParams,
  unpin: ItemIdParams,
  togglePin: ItemIdParams,
  delete: ItemIdParams,
  transform: TransformParams,
  merge: MergeParams,
  clear: ClearParams,
} as const;

// ─── Validation helper ───

export type TriggerValidationResult<O> =
  | { success: true; params: O }
  | { success: false; issues: Array<{ message: string; path: Array<string | number> }> };

/**
 * Validate an argument tuple against a trigger schema.
 * Callers pass every positional argument, `undefined` included, so the tuple length always matches.
 *
 * @example
 * validateTriggerParams(TriggerParamSchemas.paste, [id, plainTextOnly]);
 */
export function validateTriggerParams<O>(
  schema: z.ZodType<O, z.ZodTypeDef, unknown>,
  args: unknown[],
): TriggerValidationResult<O> {
  const result = schema.safeParse(args);
  if (result.success) return { success: true, params: result.data };

  return {
    success: false,
    issues: result.error.issues.map((issue) => ({ message: issue.message, path: issue.path })),
  };
}

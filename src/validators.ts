// Runtime validators for data crossing a boundary (uploads, config files, CLI input).
// Upload checks are warn-only; issues are logged but don't block imports.

import { z } from 'zod';
import { CATEGORY_LAYOUTS } from './category-layouts';
import { type Category, FIELD } from './constants';

interface ValidationResult {
  valid: boolean;
  issues: string[];
}

function fromZodResult(result: {
  success: boolean;
  error?: { issues: Array<{ path: PropertyKey[]; message: string }> };
}): ValidationResult {
  if (result.success) return { valid: true, issues: [] };
  const issues = (result.error?.issues ?? []).map((i) => (i.path.length > 0 ? `${i.path.map(String).join('.')}: ${i.message}` : i.message));
  return { valid: false, issues };
}

// ============================================================================
// Upload headers
// ============================================================================

/** Check that an upload (after header rename) carries the columns a category cannot do without */
export function validateCategoryColumns(category: Category, columns: string[]): ValidationResult {
  const layout = CATEGORY_LAYOUTS[category];
  const required = [FIELD.PRODUCT, layout.costField];
  const schema = z
    .array(z.string())
    .superRefine((cols, ctx) => {
      for (const field of required) {
        if (!cols.includes(field)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing expected column "${field}"` });
        }
      }
    });
  return fromZodResult(schema.safeParse(columns));
}

// ============================================================================
// Config
// ============================================================================

export const appConfigSchema = z
  .object({
    restaurantName: z.string().max(256),
    locations: z.array(z.string().min(1).max(64)).max(12),
    distributors: z.array(z.string().max(256)),
    exportDir: z.string().min(1),
    logLevel: z.enum(['debug', 'info', 'warn', 'error'])
  })
  .strict();

const configPatchSchema = appConfigSchema.partial().strict();

/** Validate a config patch before it is merged and saved */
export function validateConfigPatch(data: unknown): ValidationResult {
  return fromZodResult(configPatchSchema.safeParse(data));
}

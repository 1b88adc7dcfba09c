import { z } from 'zod';
import { ValidationIssue } from '../errors';

export const MAX_LABEL_LENGTH = 64;
export const MIN_FONT_SIZE = 6;
export const MAX_FONT_SIZE = 128;

export const colorSchema = z
  .string()
  .regex(/^#[0-9a-fA-F]{6}$/, 'Expected a color like #1a2b3c')
  .transform(value => value.toLowerCase());

const configValueSchema = z.union([z.string(), z.number(), z.boolean()]);

export const actionSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('none') }),
  z.object({
    type: z.literal('plugin'),
    pluginId: z.string().min(1),
    config: z.record(configValueSchema).default({})
  })
]);

// Button config as submitted by an editor; omitted fields take defaults
export const buttonInputSchema = z
  .object({
    label: z.string().max(MAX_LABEL_LENGTH).default(''),
    icon: z.string().min(1).nullish(),
    fontSize: z.number().int().min(MIN_FONT_SIZE).max(MAX_FONT_SIZE).default(14),
    backgroundColor: colorSchema.nullish(),
    textColor: colorSchema.nullish(),
    enabled: z.boolean().default(true),
    action: actionSchema.default({ type: 'none' })
  })
  .strict();

export type ButtonInput = z.input<typeof buttonInputSchema>;

export const pageInputSchema = z
  .object({
    title: z.string().trim().min(1).max(64),
    backgroundColor: colorSchema.optional(),
    textColor: colorSchema.optional()
  })
  .strict();

export type PageInput = z.input<typeof pageInputSchema>;

export const pagePatchSchema = pageInputSchema.partial();

export type PagePatch = z.input<typeof pagePatchSchema>;

const storedButtonSchema = z.object({
  slot: z.number().int().min(0),
  label: z.string(),
  icon: z.string().optional(),
  fontSize: z.number().int().min(MIN_FONT_SIZE).max(MAX_FONT_SIZE),
  backgroundColor: colorSchema.optional(),
  textColor: colorSchema.optional(),
  enabled: z.boolean(),
  action: actionSchema
});

const storedPageSchema = z
  .object({
    id: z.string().min(1),
    title: z.string(),
    order: z.number().int(),
    backgroundColor: colorSchema,
    textColor: colorSchema,
    buttons: z.array(storedButtonSchema)
  })
  .refine(page => new Set(page.buttons.map(b => b.slot)).size === page.buttons.length, {
    message: 'Two buttons share a slot'
  });

// Shape of pages.json
export const configSnapshotSchema = z.object({
  version: z.literal(1),
  pages: z
    .array(storedPageSchema)
    .min(1)
    .refine(pages => new Set(pages.map(p => p.id)).size === pages.length, {
      message: 'Duplicate page id'
    })
});

// Flatten zod issues into the shape carried by ValidationError
export function validationIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map(issue => ({
    path: issue.path.join('.'),
    message: issue.message
  }));
}

export function describeIssues(issues: ValidationIssue[]): string {
  return issues.map(issue => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)).join('; ');
}

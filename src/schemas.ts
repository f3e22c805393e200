import { z } from 'zod';

const templateVariableSchema = z
  .object({
    name: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, {
      message: 'Variable names must be valid identifiers.',
    }),
    description: z.string().optional(),
    default: z.string().optional(),
  })
  .strict();

/**
 * Schema for one manifest entry. Variables are only allowed on templates.
 */
export const templateDefinitionSchema = z
  .object({
    defaultTarget: z.string().trim().min(1, { message: 'Default target cannot be empty.' }),
    description: z.string().trim().max(500).optional(),
    file: z.string().trim().min(1, { message: 'Template file cannot be empty.' }),
    id: z.string().regex(/^[a-z0-9]+(-[a-z0-9]+)*$/, { message: 'Template ids must be kebab-case.' }),
    isTemplate: z.boolean().optional().default(false),
    name: z.string().trim().min(1, { message: 'Name cannot be empty or just whitespace.' }).max(100),
    variables: z.array(templateVariableSchema).optional(),
  })
  .strict()
  .refine(t => t.isTemplate || !t.variables || t.variables.length === 0, {
    message: 'Variables can only be defined for templates.',
    path: ['variables'],
  });

export const manifestSchema = z.object({
  templates: z.array(templateDefinitionSchema),
});

export type TemplateVariable = z.infer<typeof templateVariableSchema>;
export type TemplateDefinition = z.infer<typeof templateDefinitionSchema>;

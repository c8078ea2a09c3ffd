/**
 * Validation Module - Input Validation with Zod Schemas
 *
 * Every tool call is parsed here into a typed `ToolCall` before any handler
 * or network code runs.
 */

import { z } from 'zod';
import { InvalidArgumentError, UnknownToolError } from './errors.js';
import { logger } from './logger.js';

const RequiredText = (field: string) => z.string({
  required_error: `${field} is required`,
  invalid_type_error: `${field} must be a string`
}).min(1, `${field} cannot be empty`);

const Identifier = (field: string) => RequiredText(field)
  .max(200, `${field} too long (max 200 characters)`);

const OutputTypeEnum = z.enum(['text', 'json']);

/**
 * Schema for add_content tool.
 * Values are forwarded verbatim, so nothing here trims or rewrites them.
 */
export const AddContentSchema = z.object({
  title: RequiredText('title'),
  summary: z.string().optional(),
  text: RequiredText('text')
});

/**
 * Schema for search_content tool. `limit` has no default: when omitted the
 * request carries no result-count parameter at all.
 */
export const SearchContentSchema = z.object({
  query: RequiredText('query')
    .max(1000, 'Query too long (max 1000 characters)'),
  limit: z.number()
    .int()
    .min(1, 'Limit must be at least 1')
    .max(50, 'Limit cannot exceed 50')
    .optional()
});

export const GenerateContentSchema = z.object({
  topic: RequiredText('topic'),
  instructions: z.string().min(1, 'instructions cannot be empty').optional(),
  save: z.boolean().optional().default(false),
  max_results: z.number()
    .int()
    .min(1, 'max_results must be at least 1')
    .max(50, 'max_results cannot exceed 50')
    .optional()
});

export const CreatePromptSchema = z.object({
  name: Identifier('name'),
  text: RequiredText('text')
});

export const MAX_PAGE_SIZE = 100;

/**
 * Pagination for the list tools. A limit above MAX_PAGE_SIZE is capped
 * rather than rejected.
 */
const PageSchema = z.object({
  limit: z.number()
    .int()
    .min(1, 'Limit must be at least 1')
    .transform((limit) => Math.min(limit, MAX_PAGE_SIZE))
    .optional()
    .default(10),
  offset: z.number()
    .int()
    .min(0, 'Offset cannot be negative')
    .optional()
    .default(0)
});

export const ListPromptsSchema = PageSchema;

export const UpdatePromptSchema = z.object({
  prompt_id: Identifier('prompt_id'),
  name: Identifier('name'),
  text: RequiredText('text')
});

export const CreateTemplateSchema = z.object({
  name: Identifier('name'),
  text: RequiredText('text'),
  output_type: OutputTypeEnum.optional().default('text')
});

export const ListTemplatesSchema = PageSchema;

export const UpdateTemplateSchema = z.object({
  template_id: Identifier('template_id'),
  name: Identifier('name'),
  text: RequiredText('text'),
  output_type: OutputTypeEnum.optional().default('text')
});

export const GenerateWithPromptSchema = z.object({
  prompt_id: Identifier('prompt_id'),
  content_type: RequiredText('content_type'),
  template_id: Identifier('template_id').optional(),
  save: z.boolean().optional().default(false),
  max_results: z.number()
    .int()
    .min(1, 'max_results must be at least 1')
    .max(100, 'max_results cannot exceed 100')
    .optional()
    .default(25)
});

export type AddContentArgs = z.infer<typeof AddContentSchema>;
export type SearchContentArgs = z.infer<typeof SearchContentSchema>;
export type GenerateContentArgs = z.infer<typeof GenerateContentSchema>;
export type CreatePromptArgs = z.infer<typeof CreatePromptSchema>;
export type PageArgs = z.infer<typeof PageSchema>;
export type UpdatePromptArgs = z.infer<typeof UpdatePromptSchema>;
export type CreateTemplateArgs = z.infer<typeof CreateTemplateSchema>;
export type UpdateTemplateArgs = z.infer<typeof UpdateTemplateSchema>;
export type GenerateWithPromptArgs = z.infer<typeof GenerateWithPromptSchema>;

/**
 * A validated tool invocation, tagged by tool name
 */
export type ToolCall =
  | { tool: 'add_content'; args: AddContentArgs }
  | { tool: 'search_content'; args: SearchContentArgs }
  | { tool: 'generate_content'; args: GenerateContentArgs }
  | { tool: 'create_prompt'; args: CreatePromptArgs }
  | { tool: 'list_prompts'; args: PageArgs }
  | { tool: 'update_prompt'; args: UpdatePromptArgs }
  | { tool: 'create_template'; args: CreateTemplateArgs }
  | { tool: 'list_templates'; args: PageArgs }
  | { tool: 'update_template'; args: UpdateTemplateArgs }
  | { tool: 'generate_with_prompt'; args: GenerateWithPromptArgs };

export type ToolName = ToolCall['tool'];

/**
 * Validation result type
 */
export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: InvalidArgumentError; details: z.ZodIssue[] };

/**
 * Validate input against a schema
 */
export function validateInput<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  toolName: string
): ValidationResult<z.output<S>> {
  const parsed = schema.safeParse(input ?? {});
  if (parsed.success) {
    return { success: true, data: parsed.data };
  }

  const error = new InvalidArgumentError(toolName, parsed.error.issues);
  logger.warn({
    action: 'validation_failed',
    tool: toolName,
    errors: parsed.error.issues
  }, error.message);

  return { success: false, error, details: parsed.error.issues };
}

function parseArgs<S extends z.ZodTypeAny>(schema: S, input: unknown, toolName: string): z.output<S> {
  const result = validateInput(schema, input, toolName);
  if (!result.success) {
    throw result.error;
  }
  return result.data;
}

/**
 * Resolve a tool name and raw arguments into a typed call.
 * The name is checked first, so an unknown tool never reaches validation.
 */
export function parseToolCall(name: string, input: unknown): ToolCall {
  switch (name) {
    case 'add_content':
      return { tool: 'add_content', args: parseArgs(AddContentSchema, input, name) };
    case 'search_content':
      return { tool: 'search_content', args: parseArgs(SearchContentSchema, input, name) };
    case 'generate_content':
      return { tool: 'generate_content', args: parseArgs(GenerateContentSchema, input, name) };
    case 'create_prompt':
      return { tool: 'create_prompt', args: parseArgs(CreatePromptSchema, input, name) };
    case 'list_prompts':
      return { tool: 'list_prompts', args: parseArgs(ListPromptsSchema, input, name) };
    case 'update_prompt':
      return { tool: 'update_prompt', args: parseArgs(UpdatePromptSchema, input, name) };
    case 'create_template':
      return { tool: 'create_template', args: parseArgs(CreateTemplateSchema, input, name) };
    case 'list_templates':
      return { tool: 'list_templates', args: parseArgs(ListTemplatesSchema, input, name) };
    case 'update_template':
      return { tool: 'update_template', args: parseArgs(UpdateTemplateSchema, input, name) };
    case 'generate_with_prompt':
      return { tool: 'generate_with_prompt', args: parseArgs(GenerateWithPromptSchema, input, name) };
    default:
      throw new UnknownToolError(name);
  }
}

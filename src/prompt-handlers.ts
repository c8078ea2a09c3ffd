/**
 * Handlers for saved prompts and output templates
 */

import type { SensoClient } from './senso-client.js';
import type { Prompt, Template } from './types.js';
import type {
  CreatePromptArgs,
  CreateTemplateArgs,
  GenerateWithPromptArgs,
  PageArgs,
  UpdatePromptArgs,
  UpdateTemplateArgs
} from './validation.js';

const PREVIEW_LENGTH = 100;
const MAX_LISTED_SOURCES = 5;

export function preview(text: string | undefined, length: number = PREVIEW_LENGTH): string {
  const value = text ?? '';
  return value.length > length ? `${value.substring(0, length)}...` : value;
}

// List bodies are not checked on the way in; null or an object counts as empty
function listBody<T>(body: T[]): T[] {
  return Array.isArray(body) ? body : [];
}

function describePrompt(prompt: Prompt): string {
  return `ID: ${prompt.prompt_id ?? 'unknown'}\n` +
    `Name: ${prompt.name ?? 'Unnamed'}\n` +
    `Text: ${preview(prompt.text)}\n` +
    `Created: ${prompt.created_at ?? 'Unknown'}\n`;
}

function describeTemplate(template: Template): string {
  return `ID: ${template.template_id ?? 'unknown'}\n` +
    `Name: ${template.name ?? 'Unnamed'}\n` +
    `Output Type: ${template.output_type ?? 'text'}\n` +
    `Text: ${preview(template.text)}\n` +
    `Created: ${template.created_at ?? 'Unknown'}\n`;
}

export async function createPrompt(client: SensoClient, args: CreatePromptArgs): Promise<string> {
  const prompt = await client.createPrompt({ name: args.name, text: args.text });
  return `Prompt created.\nID: ${prompt.prompt_id ?? 'unknown'}\nName: ${prompt.name ?? args.name}`;
}

export async function listPrompts(client: SensoClient, args: PageArgs): Promise<string> {
  const prompts = listBody(await client.listPrompts({ limit: args.limit, offset: args.offset }));
  if (prompts.length === 0) {
    return 'No prompts found.';
  }
  return `Prompts (showing ${prompts.length}):\n\n` + prompts.map(describePrompt).join('\n');
}

export async function updatePrompt(client: SensoClient, args: UpdatePromptArgs): Promise<string> {
  const prompt = await client.updatePrompt(args.prompt_id, { name: args.name, text: args.text });
  return `Prompt updated.\nID: ${prompt.prompt_id ?? args.prompt_id}\nName: ${prompt.name ?? args.name}`;
}

export async function createTemplate(client: SensoClient, args: CreateTemplateArgs): Promise<string> {
  const template = await client.createTemplate({
    name: args.name,
    text: args.text,
    output_type: args.output_type
  });
  return `Template created.\nID: ${template.template_id ?? 'unknown'}\n` +
    `Name: ${template.name ?? args.name}\nOutput Type: ${template.output_type ?? args.output_type}`;
}

export async function listTemplates(client: SensoClient, args: PageArgs): Promise<string> {
  const templates = listBody(await client.listTemplates({ limit: args.limit, offset: args.offset }));
  if (templates.length === 0) {
    return 'No templates found.';
  }
  return `Templates (showing ${templates.length}):\n\n` + templates.map(describeTemplate).join('\n');
}

export async function updateTemplate(client: SensoClient, args: UpdateTemplateArgs): Promise<string> {
  const template = await client.updateTemplate(args.template_id, {
    name: args.name,
    text: args.text,
    output_type: args.output_type
  });
  return `Template updated.\nID: ${template.template_id ?? args.template_id}\nName: ${template.name ?? args.name}`;
}

export async function generateWithPrompt(client: SensoClient, args: GenerateWithPromptArgs): Promise<string> {
  const response = await client.generateWithPrompt({
    prompt_id: args.prompt_id,
    content_type: args.content_type,
    ...(args.template_id !== undefined ? { template_id: args.template_id } : {}),
    save: args.save,
    max_results: args.max_results
  });

  let text = `Generated content using prompt '${response.prompt?.name ?? args.prompt_id}':\n\n`;
  text += `${response.generated_text || 'No content generated.'}\n`;

  if (response.template) {
    text += `\nFormatted with template: ${response.template.name ?? 'unknown'} (${response.template.output_type ?? 'text'})\n`;
  }

  if (args.save && response.content_id) {
    text += `\nSaved with ID: ${response.content_id}\n`;
  }

  const sources = response.sources ?? [];
  if (sources.length > 0) {
    text += `\nSources (${sources.length} total):\n`;
    for (const source of sources.slice(0, MAX_LISTED_SOURCES)) {
      text += `- ${source.title ?? 'Untitled'}\n`;
    }
    if (sources.length > MAX_LISTED_SOURCES) {
      text += `... and ${sources.length - MAX_LISTED_SOURCES} more\n`;
    }
  }

  return text;
}

/**
 * Tool Dispatcher
 *
 * Turns a tools/call request into one handler invocation and converts every
 * failure into error content, so a bad call never takes the process down.
 * Nothing is kept between calls.
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { addContent, formatGenerated, formatSearchResults, generateContent, searchContent } from './content-handlers.js';
import { logger, logToolCall } from './logger.js';
import {
  createPrompt,
  createTemplate,
  generateWithPrompt,
  listPrompts,
  listTemplates,
  updatePrompt,
  updateTemplate
} from './prompt-handlers.js';
import type { SensoClient } from './senso-client.js';
import { parseToolCall, type ToolCall } from './validation.js';

export interface DispatchContext {
  client: SensoClient;
}

function textResult(text: string): CallToolResult {
  return { content: [{ type: 'text', text }] };
}

export function errorResult(message: string): CallToolResult {
  return {
    content: [{ type: 'text', text: `Error: ${message}` }],
    isError: true
  };
}

/**
 * Run a validated call and render its text output
 */
export async function executeToolCall(call: ToolCall, context: DispatchContext): Promise<string> {
  const { client } = context;

  switch (call.tool) {
    case 'add_content':
      return addContent(client, call.args);
    case 'search_content':
      return formatSearchResults(call.args.query, await searchContent(client, call.args));
    case 'generate_content':
      return formatGenerated(call.args.topic, await generateContent(client, call.args));
    case 'create_prompt':
      return createPrompt(client, call.args);
    case 'list_prompts':
      return listPrompts(client, call.args);
    case 'update_prompt':
      return updatePrompt(client, call.args);
    case 'create_template':
      return createTemplate(client, call.args);
    case 'list_templates':
      return listTemplates(client, call.args);
    case 'update_template':
      return updateTemplate(client, call.args);
    case 'generate_with_prompt':
      return generateWithPrompt(client, call.args);
  }
}

export async function handleToolCall(
  name: string,
  args: Record<string, unknown> | undefined,
  context: DispatchContext
): Promise<CallToolResult> {
  const startTime = Date.now();

  logger.info({
    action: 'tool_execute_start',
    tool: name,
    args_keys: Object.keys(args || {})
  }, `Executing tool: ${name}`);

  try {
    const call = parseToolCall(name, args);
    const text = await executeToolCall(call, context);

    const duration = Date.now() - startTime;
    logToolCall({ tool: name, duration_ms: duration, success: true });

    return textResult(text);
  } catch (error) {
    const duration = Date.now() - startTime;
    const errorMessage = error instanceof Error ? error.message : String(error);

    logToolCall({ tool: name, duration_ms: duration, success: false, error: errorMessage });

    return errorResult(errorMessage);
  }
}

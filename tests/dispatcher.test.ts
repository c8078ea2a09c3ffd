/**
 * Tool dispatcher tests
 *
 * Every failure, whether from validation, an unknown tool name or the remote
 * API, must come back as error content rather than a thrown error.
 */

import { describe, it, expect } from 'vitest';
import { handleToolCall } from '../src/dispatcher.js';
import { createFakeApi, createUnreachableApi, ok } from './helpers.js';

const CALLS: Array<[string, Record<string, unknown>]> = [
  ['add_content', { title: 'T', summary: 'S', text: 'B' }],
  ['search_content', { query: 'MCP' }],
  ['generate_content', { topic: 'faq', save: true }],
  ['create_prompt', { name: 'p', text: 't' }],
  ['list_prompts', {}],
  ['update_prompt', { prompt_id: 'p1', name: 'p', text: 't' }],
  ['create_template', { name: 'tpl', text: 't' }],
  ['list_templates', {}],
  ['update_template', { template_id: 't1', name: 'tpl', text: 't' }],
  ['generate_with_prompt', { prompt_id: 'p1', content_type: 'faq' }]
];

describe('handleToolCall', () => {
  it('wraps handler output as text content', async () => {
    const { client } = createFakeApi(() => ok({ id: 'c-1', title: 'T' }));

    const result = await handleToolCall('add_content', { title: 'T', text: 'B' }, { client });

    expect(result).toEqual({
      content: [{ type: 'text', text: 'Content added with ID: c-1\nTitle: T' }]
    });
  });

  it.each(CALLS)('returns error content with the status when %s gets HTTP 500', async (name, args) => {
    const { client, requests } = createFakeApi(() => ({ status: 500, data: { error: 'upstream down' } }));

    const result = await handleToolCall(name, args, { client });

    expect(requests).toHaveLength(1);
    expect(result.isError).toBe(true);
    expect(result.content).toHaveLength(1);
    const [item] = result.content;
    expect(item.type).toBe('text');
    expect(item.type === 'text' ? item.text : '').toContain('HTTP 500');
  });

  it('rejects an unregistered tool without contacting the API', async () => {
    const { client, requests } = createFakeApi(() => ok({}));

    const result = await handleToolCall('delete_content', { id: 'c-1' }, { client });

    expect(requests).toHaveLength(0);
    expect(result).toEqual({
      content: [{ type: 'text', text: 'Error: Unknown tool: delete_content' }],
      isError: true
    });
  });

  it('rejects invalid arguments without contacting the API', async () => {
    const { client, requests } = createFakeApi(() => ok({}));

    const result = await handleToolCall('add_content', { text: 'B' }, { client });

    expect(requests).toHaveLength(0);
    expect(result).toEqual({
      content: [{ type: 'text', text: 'Error: Invalid arguments for add_content: title: title is required' }],
      isError: true
    });
  });

  it('reports network failures as error content', async () => {
    const client = createUnreachableApi();

    const result = await handleToolCall('search_content', { query: 'MCP' }, { client });

    expect(result).toEqual({
      content: [{
        type: 'text',
        text: 'Error: Senso API request failed on GET /search: connect ECONNREFUSED 127.0.0.1:443'
      }],
      isError: true
    });
  });

  it('answers every unregistered name the same way, whatever came before', async () => {
    const { client, requests } = createFakeApi(() => ok({}));

    for (let i = 0; i < 50; i++) {
      const name = `missing_tool_${i}`;
      const result = await handleToolCall(name, undefined, { client });
      expect(result).toEqual({
        content: [{ type: 'text', text: `Error: Unknown tool: ${name}` }],
        isError: true
      });
    }
    expect(requests).toHaveLength(0);
  });

  it('has no metrics tool', async () => {
    const { client, requests } = createFakeApi(() => ok({}));

    const result = await handleToolCall('get_mcp_metrics', undefined, { client });

    expect(requests).toHaveLength(0);
    expect(result).toEqual({
      content: [{ type: 'text', text: 'Error: Unknown tool: get_mcp_metrics' }],
      isError: true
    });
  });
});

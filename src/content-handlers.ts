/**
 * Handlers for the knowledge-base tools: add, search and generate.
 *
 * Each handler makes one client call and turns the response into text.
 * Errors from the client propagate to the dispatcher.
 */

import type { SensoClient } from './senso-client.js';
import type { GenerateRequest, SearchParams, SourceRef } from './types.js';
import type { AddContentArgs, GenerateContentArgs, SearchContentArgs } from './validation.js';

export interface SearchHit {
  id: string;
  title: string;
  snippet: string;
}

export interface SearchOutcome {
  answer: string;
  results: SearchHit[];
}

export interface GenerateOutcome {
  text: string;
  savedId?: string;
  sources: string[];
}

export async function addContent(client: SensoClient, args: AddContentArgs): Promise<string> {
  const response = await client.addRawContent({
    title: args.title,
    ...(args.summary !== undefined ? { summary: args.summary } : {}),
    text: args.text
  });

  return `Content added with ID: ${response.id ?? 'unknown'}\nTitle: ${response.title ?? args.title}`;
}

export async function searchContent(client: SensoClient, args: SearchContentArgs): Promise<SearchOutcome> {
  const params: SearchParams = { query: args.query };
  if (args.limit !== undefined) {
    params.max_results = args.limit;
  }

  const response = await client.search(params);
  const results = (response.results ?? []).map((item) => ({
    id: item.content_id ?? 'unknown',
    title: item.title ?? 'Untitled',
    snippet: item.chunk_text ?? ''
  }));

  return {
    answer: response.answer ?? '',
    results
  };
}

export function formatSearchResults(query: string, outcome: SearchOutcome): string {
  if (outcome.results.length === 0) {
    return `No results found for "${query}".`;
  }

  let text = '';
  if (outcome.answer) {
    text += `Answer: ${outcome.answer}\n\n`;
  }
  text += `Found ${outcome.results.length} result${outcome.results.length === 1 ? '' : 's'} for "${query}":\n`;

  outcome.results.forEach((hit, index) => {
    text += `\n${index + 1}. ${hit.title}\n`;
    text += `   ID: ${hit.id}\n`;
    if (hit.snippet) {
      text += `   ${hit.snippet}\n`;
    }
  });

  return text;
}

function sourceTitles(sources: SourceRef[] | undefined): string[] {
  return (sources ?? []).map((source) => source.title ?? 'Untitled');
}

export async function generateContent(client: SensoClient, args: GenerateContentArgs): Promise<GenerateOutcome> {
  const body: GenerateRequest = {
    content_type: args.topic,
    instructions: args.instructions ?? args.topic,
    save: args.save
  };
  if (args.max_results !== undefined) {
    body.max_results = args.max_results;
  }

  const response = await client.generate(body);

  return {
    text: response.generated_text ?? '',
    // Only report an identifier when storage was requested
    savedId: args.save ? response.content_id : undefined,
    sources: sourceTitles(response.sources)
  };
}

export function formatGenerated(topic: string, outcome: GenerateOutcome): string {
  let text = `Generated content about ${topic}:\n\n${outcome.text || 'No content generated.'}\n`;

  if (outcome.savedId) {
    text += `\nSaved with ID: ${outcome.savedId}\n`;
  }

  if (outcome.sources.length > 0) {
    text += `\nSources:\n`;
    for (const title of outcome.sources) {
      text += `- ${title}\n`;
    }
  }

  return text;
}

/**
 * Request and response shapes of the Senso API.
 *
 * Responses are treated as opaque JSON; only the fields the formatters read
 * are declared, and all of them are optional.
 */

export type HttpMethod = 'get' | 'post' | 'put';

export type OutputType = 'text' | 'json';

export interface RawContentRequest {
  title: string;
  summary?: string;
  text: string;
}

export interface RawContentResponse {
  id?: string;
  title?: string;
}

export interface SearchParams {
  query: string;
  max_results?: number;
}

export interface SearchResultItem {
  content_id?: string;
  title?: string;
  chunk_text?: string;
}

export interface SearchResponse {
  answer?: string;
  results?: SearchResultItem[];
}

export interface GenerateRequest {
  content_type: string;
  instructions: string;
  save: boolean;
  max_results?: number;
}

export interface SourceRef {
  title?: string;
  content_id?: string;
}

export interface GenerateResponse {
  generated_text?: string;
  content_id?: string;
  sources?: SourceRef[];
}

export interface PromptRequest {
  name: string;
  text: string;
}

export interface Prompt {
  prompt_id?: string;
  name?: string;
  text?: string;
  created_at?: string;
}

export interface TemplateRequest {
  name: string;
  text: string;
  output_type: OutputType;
}

export interface Template {
  template_id?: string;
  name?: string;
  text?: string;
  output_type?: OutputType;
  created_at?: string;
}

export interface PageParams {
  limit: number;
  offset: number;
}

export interface GenerateWithPromptRequest {
  prompt_id: string;
  content_type: string;
  template_id?: string;
  save: boolean;
  max_results: number;
}

export interface GenerateWithPromptResponse extends GenerateResponse {
  prompt?: { name?: string };
  template?: { name?: string; output_type?: OutputType } | null;
}

/**
 * Senso API Client
 *
 * A single axios instance carrying the base URL, API key header and timeout.
 * Every tool issues exactly one call through it; there are no retries.
 */

import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import type { SensoConfig } from './config.js';
import { RemoteApiError } from './errors.js';
import { logApiCall } from './logger.js';
import type {
  GenerateRequest,
  GenerateResponse,
  GenerateWithPromptRequest,
  GenerateWithPromptResponse,
  HttpMethod,
  PageParams,
  Prompt,
  PromptRequest,
  RawContentRequest,
  RawContentResponse,
  SearchParams,
  SearchResponse,
  Template,
  TemplateRequest
} from './types.js';

export interface RequestOptions {
  params?: object;
  data?: object;
}

/**
 * Create the HTTP client. `adapter` replaces axios' transport, which lets
 * tests answer requests in process.
 */
export function createHttpClient(config: SensoConfig, adapter?: AxiosAdapter): AxiosInstance {
  return axios.create({
    baseURL: config.apiBase,
    timeout: config.timeoutMs,
    headers: {
      'X-API-Key': config.apiKey,
      'Accept': 'application/json',
      'Content-Type': 'application/json'
    },
    ...(adapter ? { adapter } : {})
  });
}

/**
 * Pull a readable message out of a failed response body
 */
function errorDetail(data: unknown, fallback: string): string {
  if (typeof data === 'object' && data !== null && 'error' in data) {
    const { error } = data;
    if (typeof error === 'string' && error) return error;
  }
  if (typeof data === 'string' && data.trim()) {
    return data.trim();
  }
  return fallback;
}

export class SensoClient {
  private http: AxiosInstance;

  constructor(config: SensoConfig, http?: AxiosInstance) {
    this.http = http ?? createHttpClient(config);
  }

  async request<T>(method: HttpMethod, endpoint: string, options: RequestOptions = {}): Promise<T> {
    const verb = method.toUpperCase();
    const startTime = Date.now();

    try {
      const response = await this.http.request<T>({
        method,
        url: endpoint,
        params: options.params,
        data: options.data
      });

      const duration = Date.now() - startTime;
      logApiCall({ endpoint, method: verb, duration_ms: duration, status: response.status, success: true });

      return response.data;
    } catch (error) {
      const duration = Date.now() - startTime;

      let apiError: RemoteApiError;
      if (axios.isAxiosError(error)) {
        apiError = error.response
          ? new RemoteApiError(verb, endpoint, errorDetail(error.response.data, error.message), error.response.status)
          : new RemoteApiError(verb, endpoint, error.message);
      } else {
        apiError = new RemoteApiError(verb, endpoint, error instanceof Error ? error.message : String(error));
      }

      logApiCall({
        endpoint,
        method: verb,
        duration_ms: duration,
        status: apiError.status,
        success: false,
        error: apiError.detail
      });

      throw apiError;
    }
  }

  addRawContent(body: RawContentRequest): Promise<RawContentResponse> {
    return this.request<RawContentResponse>('post', '/content/raw', { data: body });
  }

  search(params: SearchParams): Promise<SearchResponse> {
    return this.request<SearchResponse>('get', '/search', { params });
  }

  generate(body: GenerateRequest): Promise<GenerateResponse> {
    return this.request<GenerateResponse>('post', '/generate', { data: body });
  }

  createPrompt(body: PromptRequest): Promise<Prompt> {
    return this.request<Prompt>('post', '/prompts', { data: body });
  }

  listPrompts(params: PageParams): Promise<Prompt[]> {
    return this.request<Prompt[]>('get', '/prompts', { params });
  }

  updatePrompt(promptId: string, body: PromptRequest): Promise<Prompt> {
    return this.request<Prompt>('put', `/prompts/${encodeURIComponent(promptId)}`, { data: body });
  }

  createTemplate(body: TemplateRequest): Promise<Template> {
    return this.request<Template>('post', '/templates', { data: body });
  }

  listTemplates(params: PageParams): Promise<Template[]> {
    return this.request<Template[]>('get', '/templates', { params });
  }

  updateTemplate(templateId: string, body: TemplateRequest): Promise<Template> {
    return this.request<Template>('put', `/templates/${encodeURIComponent(templateId)}`, { data: body });
  }

  generateWithPrompt(body: GenerateWithPromptRequest): Promise<GenerateWithPromptResponse> {
    return this.request<GenerateWithPromptResponse>('post', '/generate/prompt', { data: body });
  }
}

export default SensoClient;

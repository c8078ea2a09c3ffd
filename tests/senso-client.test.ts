/**
 * Senso API client tests
 *
 * Covers request shaping (base URL, API key header, path encoding) and the
 * mapping of failed responses onto RemoteApiError.
 */

import { describe, it, expect } from 'vitest';
import { RemoteApiError } from '../src/errors.js';
import { createFakeApi, createUnreachableApi, ok } from './helpers.js';

describe('SensoClient requests', () => {
  it('sends the API key and base URL with every call', async () => {
    const { client, requests } = createFakeApi(() => ok({ id: 'c-1' }));

    await client.addRawContent({ title: 'Title', text: 'Body' });

    expect(requests).toHaveLength(1);
    expect(requests[0].baseURL).toBe('https://senso.test/api/v1');
    expect(requests[0].url).toBe('/content/raw');
    expect(requests[0].method).toBe('post');
    expect(requests[0].apiKey).toBe('test-key');
  });

  it('returns the parsed response body', async () => {
    const { client } = createFakeApi(() => ok({ answer: 'yes', results: [] }));

    const response = await client.search({ query: 'anything' });

    expect(response).toEqual({ answer: 'yes', results: [] });
  });

  it('encodes identifiers placed in the path', async () => {
    const { client, requests } = createFakeApi(() => ok({ prompt_id: 'a/b' }));

    await client.updatePrompt('a/b', { name: 'n', text: 't' });

    expect(requests[0].method).toBe('put');
    expect(requests[0].url).toBe('/prompts/a%2Fb');
    expect(requests[0].body).toEqual({ name: 'n', text: 't' });
  });

  it('passes list pagination as query parameters', async () => {
    const { client, requests } = createFakeApi(() => ok([]));

    await client.listTemplates({ limit: 20, offset: 40 });

    expect(requests[0].method).toBe('get');
    expect(requests[0].url).toBe('/templates');
    expect(requests[0].params).toEqual({ limit: 20, offset: 40 });
    expect(requests[0].body).toBeUndefined();
  });

});

describe('SensoClient errors', () => {
  it('uses the error field of the response body as the detail', async () => {
    const { client } = createFakeApi(() => ({ status: 500, data: { error: 'internal failure' } }));

    const error = await client.addRawContent({ title: 'T', text: 'B' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RemoteApiError);
    expect(error).toMatchObject({
      status: 500,
      method: 'POST',
      endpoint: '/content/raw',
      detail: 'internal failure',
      message: 'Senso API error (HTTP 500) on POST /content/raw: internal failure'
    });
  });

  it('falls back to a text body', async () => {
    const { client } = createFakeApi(() => ({ status: 404, data: 'Prompt not found' }));

    const error = await client.updatePrompt('missing', { name: 'n', text: 't' }).catch((e: unknown) => e);

    expect(error).toMatchObject({
      status: 404,
      detail: 'Prompt not found'
    });
  });

  it('falls back to the transport message when the body says nothing', async () => {
    const { client } = createFakeApi(() => ({ status: 502, data: {} }));

    const error = await client.search({ query: 'q' }).catch((e: unknown) => e);

    expect(error).toMatchObject({
      status: 502,
      detail: 'Request failed with status code 502'
    });
  });

  it('reports network failures without a status', async () => {
    const client = createUnreachableApi();

    const error = await client.listPrompts({ limit: 10, offset: 0 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RemoteApiError);
    expect(error).toMatchObject({
      status: undefined,
      message: 'Senso API request failed on GET /prompts: connect ECONNREFUSED 127.0.0.1:443'
    });
  });
});

/**
 * Test helpers: an in-process stand-in for the Senso API.
 *
 * The fake is installed as the axios adapter, so requests go through the
 * real client configuration (base URL, headers, body serialization) and are
 * answered without touching the network.
 */

import { AxiosError, type AxiosAdapter, type AxiosResponse } from 'axios';
import type { SensoConfig } from '../src/config.js';
import { SensoClient, createHttpClient } from '../src/senso-client.js';

export const TEST_CONFIG: SensoConfig = Object.freeze({
  apiKey: 'test-key',
  apiBase: 'https://senso.test/api/v1',
  timeoutMs: 1000,
  serverName: 'senso-test',
  serverVersion: '0.0.0-test'
});

export interface RecordedRequest {
  method: string;
  url: string;
  baseURL: string;
  params: unknown;
  body: unknown;
  apiKey: unknown;
}

export interface FakeReply {
  status: number;
  data: unknown;
}

export type Responder = (request: RecordedRequest) => FakeReply;

export function ok(data: unknown): FakeReply {
  return { status: 200, data };
}

export function createFakeApi(responder: Responder) {
  const requests: RecordedRequest[] = [];

  const adapter: AxiosAdapter = async (config) => {
    const request: RecordedRequest = {
      method: config.method ?? '',
      url: config.url ?? '',
      baseURL: config.baseURL ?? '',
      params: config.params,
      body: typeof config.data === 'string' ? JSON.parse(config.data) : config.data,
      apiKey: config.headers.get('X-API-Key')
    };
    requests.push(request);

    const reply = responder(request);
    const response: AxiosResponse = {
      data: reply.data,
      status: reply.status,
      statusText: String(reply.status),
      headers: {},
      config
    };

    if (reply.status < 200 || reply.status >= 300) {
      throw new AxiosError(
        `Request failed with status code ${reply.status}`,
        reply.status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
        config,
        undefined,
        response
      );
    }
    return response;
  };

  const client = new SensoClient(TEST_CONFIG, createHttpClient(TEST_CONFIG, adapter));
  return { client, requests };
}

/**
 * A fake whose every request fails before a response arrives
 */
export function createUnreachableApi() {
  const adapter: AxiosAdapter = async (config) => {
    throw new AxiosError('connect ECONNREFUSED 127.0.0.1:443', 'ECONNREFUSED', config);
  };
  return new SensoClient(TEST_CONFIG, createHttpClient(TEST_CONFIG, adapter));
}

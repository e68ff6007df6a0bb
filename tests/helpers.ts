/**
 * Test fixtures: programmatic JSON builders and an in-process HTTP stub
 */

import axios, { AxiosError } from 'axios';
import type { AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { SurgeError } from '../src/errors.js';
import type { ProgrammaticValue } from '../src/utils/programmatic.js';

export const sbor = {
  string: (value: string): ProgrammaticValue => ({ kind: 'String', value }),
  reference: (value: string): ProgrammaticValue => ({ kind: 'Reference', value }),
  decimal: (value: string): ProgrammaticValue => ({ kind: 'Decimal', value }),
  u64: (value: string): ProgrammaticValue => ({ kind: 'U64', value }),
  bool: (value: boolean): ProgrammaticValue => ({ kind: 'Bool', value }),
  tuple: (...fields: ProgrammaticValue[]): ProgrammaticValue => ({ kind: 'Tuple', fields }),
  array: (...elements: ProgrammaticValue[]): ProgrammaticValue => ({ kind: 'Array', elements }),
  enumeration: (variant: number, ...fields: ProgrammaticValue[]): ProgrammaticValue => ({
    kind: 'Enum',
    variant_id: String(variant),
    fields,
  }),
  map: (...entries: Array<[ProgrammaticValue, ProgrammaticValue]>): ProgrammaticValue => ({
    kind: 'Map',
    entries: entries.map(([key, value]) => ({ key, value })),
  }),
};

export interface StubRequest {
  method: string;
  url: string;
  body: unknown;
}

export interface StubResponse {
  status?: number;
  data: unknown;
}

export type StubHandler = (request: StubRequest) => StubResponse | 'network-error';

export interface HttpStub {
  http: AxiosInstance;
  requests: StubRequest[];
}

/**
 * Axios instance answering every request from a handler, without sockets
 */
export function stubHttp(handler: StubHandler): HttpStub {
  const requests: StubRequest[] = [];

  const http = axios.create({
    adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      const body: unknown = typeof config.data === 'string' ? JSON.parse(config.data) : config.data;
      const request: StubRequest = {
        method: (config.method ?? 'get').toUpperCase(),
        url: config.url ?? '',
        body,
      };
      requests.push(request);

      const result = handler(request);
      if (result === 'network-error') {
        throw new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED', config);
      }

      const status = result.status ?? 200;
      const response: AxiosResponse = {
        data: result.data,
        status,
        statusText: String(status),
        headers: {},
        config,
      };
      if (status >= 400) {
        throw new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, null, response);
      }
      return response;
    },
  });

  return { http, requests };
}

/**
 * Manifest text of a preview request body
 */
export function manifestOf(request: StubRequest): string {
  const body = request.body;
  if (typeof body === 'object' && body !== null && 'manifest' in body && typeof body.manifest === 'string') {
    return body.manifest;
  }
  return '';
}

/**
 * Gateway preview response returning a single output
 */
export function previewResponse(output: ProgrammaticValue): StubResponse {
  return {
    data: {
      receipt: {
        status: 'Succeeded',
        output: [{ hex: '', programmatic_json: output }],
      },
    },
  };
}

export const NOT_FOUND: StubResponse = { status: 404, data: { message: 'not found' } };

export const NETWORK_CONFIGURATION = {
  network_id: 2,
  network_name: 'stokenet',
  well_known_addresses: {
    xrd: 'resource_xrd',
    faucet: 'component_faucet',
    ed25519_signature_virtual_badge: 'resource_badge',
    secp256k1_signature_virtual_badge: 'resource_badge_secp',
  },
};

/**
 * Resolve with the SurgeError a promise rejects with
 */
export async function rejection(promise: Promise<unknown>): Promise<SurgeError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof SurgeError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a rejection');
}

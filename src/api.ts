/**
 * JSON-over-HTTP base client shared by the Gateway and Oracle clients
 */

import axios from 'axios';
import type { AxiosInstance } from 'axios';
import type { Logger } from 'pino';
import type { z } from 'zod';
import { SurgeError } from './errors.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

export class Api {
  protected readonly http: AxiosInstance;
  readonly baseUrl: string;
  protected readonly logger: Logger;

  constructor(http: AxiosInstance, baseUrl: string, logger: Logger) {
    this.http = http;
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.logger = logger;
  }

  /**
   * GET an endpoint; resolves null on 404
   */
  async get(endpoint: string, headers: Record<string, string> = JSON_HEADERS): Promise<unknown> {
    const url = this.url(endpoint);
    try {
      const response = await this.http.get<unknown>(url, { headers });
      return this.json(response.data, 'GET', url);
    } catch (error) {
      return this.handleError(error, 'GET', url);
    }
  }

  /**
   * POST a JSON body to an endpoint; resolves null on 404
   */
  async post(endpoint: string, body: object = {}, headers: Record<string, string> = JSON_HEADERS): Promise<unknown> {
    const url = this.url(endpoint);
    try {
      const response = await this.http.post<unknown>(url, body, { headers });
      return this.json(response.data, 'POST', url);
    } catch (error) {
      return this.handleError(error, 'POST', url);
    }
  }

  /**
   * Validate a payload against a schema
   */
  protected parse<S extends z.ZodTypeAny>(schema: S, data: unknown, context: string): z.output<S> {
    const result = schema.safeParse(data);
    if (!result.success) {
      const issue = result.error.issues[0];
      const reason = issue ? `${issue.path.join('.') || '<root>'}: ${issue.message}` : 'schema mismatch';
      throw SurgeError.invalidResponse(context, reason);
    }
    return result.data;
  }

  /**
   * POST and validate; 404 becomes null
   */
  protected async postParsed<S extends z.ZodTypeAny>(
    schema: S,
    endpoint: string,
    body: object = {}
  ): Promise<z.output<S> | null> {
    const data = await this.post(endpoint, body);
    return data === null ? null : this.parse(schema, data, endpoint);
  }

  /**
   * POST and validate; 404 is an error
   */
  protected async postRequired<S extends z.ZodTypeAny>(
    schema: S,
    endpoint: string,
    body: object = {}
  ): Promise<z.output<S>> {
    const data = await this.post(endpoint, body);
    if (data === null) {
      throw SurgeError.apiRequestFailed('POST', this.url(endpoint), 404, null);
    }
    return this.parse(schema, data, endpoint);
  }

  /**
   * GET and validate; 404 is an error
   */
  protected async getRequired<S extends z.ZodTypeAny>(schema: S, endpoint: string): Promise<z.output<S>> {
    const data = await this.get(endpoint);
    if (data === null) {
      throw SurgeError.apiRequestFailed('GET', this.url(endpoint), 404, null);
    }
    return this.parse(schema, data, endpoint);
  }

  private url(endpoint: string): string {
    return `${this.baseUrl}/${endpoint}`;
  }

  private json(data: unknown, method: string, url: string): unknown {
    // axios hands back the raw text when the body is not JSON
    if (typeof data === 'string') {
      try {
        return JSON.parse(data);
      } catch {
        throw SurgeError.invalidResponse(`${method} ${url}`, 'body is not JSON');
      }
    }
    return data;
  }

  private handleError(error: unknown, method: string, url: string): null {
    if (error instanceof SurgeError) {
      throw error;
    }
    if (axios.isAxiosError(error)) {
      const status = error.response?.status;
      if (status === 404) {
        this.logger.debug({ method, url }, 'Not found');
        return null;
      }
      if (status !== undefined) {
        this.logger.error({ method, url, status }, 'API request failed');
        throw SurgeError.apiRequestFailed(method, url, status, error.response?.data);
      }
      this.logger.error({ method, url, message: error.message }, 'No response from API');
      throw SurgeError.networkError(method, url, error.message);
    }
    throw error;
  }
}

/**
 * HTTP endpoint client on the global fetch
 *
 * Connections are reused through fetch's shared keep-alive pool. The client
 * owns the per-request timeout; failover code above it applies none.
 *
 * @module rpc/FetchEndpointClient
 */

import { HttpRequestError, TimeoutError } from 'viem';
import type { EndpointClient } from './EndpointClient.js';
import type { CallOptions, EndpointRequest, EndpointResponse } from './types.js';
import { DEFAULT_REQUEST_TIMEOUT_MS } from './types.js';
import { parseEndpoint } from '../utils/endpoint.js';
import { ErrorUtils } from '../utils/errors.js';

export interface FetchEndpointClientOptions {
  /** Per-request timeout in ms @default 10000 */
  timeoutMs?: number;
  /** Headers sent with every request (e.g. an authorization header) */
  headers?: Record<string, string>;
}

export class FetchEndpointClient implements EndpointClient {
  readonly url: string;
  readonly provider: string;
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;

  constructor(address: string, options: FetchEndpointClientOptions = {}) {
    const endpoint = parseEndpoint(address);
    this.url = endpoint.url;
    this.provider = endpoint.provider;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.headers = { ...options.headers };
  }

  async send(request: EndpointRequest, options: CallOptions = {}): Promise<EndpointResponse> {
    options.signal?.throwIfAborted();

    const target = this.buildUrl(request);
    const controller = new AbortController();
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);

    const onCallerAbort = () => controller.abort();
    options.signal?.addEventListener('abort', onCallerAbort, { once: true });

    try {
      const headers: Record<string, string> = { accept: 'application/json', ...this.headers, ...request.headers };
      if (request.body !== undefined) {
        headers['content-type'] = 'application/json';
      }

      const response = await fetch(target, {
        method: request.method,
        headers,
        body: request.body,
        signal: controller.signal,
      });
      const body = await response.text();

      const responseHeaders: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        responseHeaders[key.toLowerCase()] = value;
      });

      return { status: response.status, headers: responseHeaders, body };
    } catch (err) {
      if (options.signal?.aborted) {
        throw options.signal.reason;
      }
      if (timedOut) {
        throw new TimeoutError({ body: { method: request.method, path: request.path }, url: target });
      }
      const cause = ErrorUtils.toError(err);
      throw new HttpRequestError({
        url: target,
        cause,
        details: cause.message,
      });
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onCallerAbort);
    }
  }

  private buildUrl(request: EndpointRequest): string {
    const query = request.query && Object.keys(request.query).length > 0
      ? `?${new URLSearchParams(request.query).toString()}`
      : '';
    return `${this.url}${request.path}${query}`;
  }
}

/**
 * Test utilities: in-process endpoints and fixtures
 */

import type { EndpointClient } from '../rpc/EndpointClient.js';
import type { CallOptions, EndpointRequest, EndpointResponse } from '../rpc/types.js';
import { parseEndpoint } from '../utils/endpoint.js';

/**
 * One scripted reaction: a response, an error to throw, or a function
 * computing either from the request
 */
export type StubReply =
  | EndpointResponse
  | Error
  | ((request: EndpointRequest) => EndpointResponse | Error);

/**
 * EndpointClient that answers from a script instead of the network.
 * Replies are consumed in order; the last one repeats once the script runs
 * out. Every request is recorded.
 */
export class StubEndpointClient implements EndpointClient {
  readonly url: string;
  readonly provider: string;
  readonly requests: EndpointRequest[] = [];
  private readonly replies: StubReply[];

  constructor(address: string, ...replies: StubReply[]) {
    const endpoint = parseEndpoint(address);
    this.url = endpoint.url;
    this.provider = endpoint.provider;
    this.replies = replies;
  }

  get callCount(): number {
    return this.requests.length;
  }

  reply(...replies: StubReply[]): this {
    this.replies.push(...replies);
    return this;
  }

  async send(request: EndpointRequest, options: CallOptions = {}): Promise<EndpointResponse> {
    options.signal?.throwIfAborted();
    this.requests.push(request);

    const next = this.replies.length > 1 ? this.replies.shift() : this.replies[0];
    if (next === undefined) {
      throw new Error(`No reply scripted for ${this.provider}`);
    }
    const outcome = typeof next === 'function' ? next(request) : next;
    if (outcome instanceof Error) {
      throw outcome;
    }
    return outcome;
  }

  /**
   * Decoded JSON bodies of every request sent so far
   */
  sentBodies(): unknown[] {
    return this.requests.map((request) => (request.body === undefined ? undefined : JSON.parse(request.body)));
  }
}

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): EndpointResponse {
  return { status, headers, body: JSON.stringify(body) };
}

export function textResponse(body: string, status = 200, headers: Record<string, string> = {}): EndpointResponse {
  return { status, headers, body };
}

/**
 * Answers each JSON-RPC request (single or batch) with the given result,
 * echoing the request id
 */
export function rpcResult(result: unknown): (request: EndpointRequest) => EndpointResponse {
  return (request) => {
    const payload: unknown = JSON.parse(request.body ?? 'null');
    const answer = (item: unknown) => ({ jsonrpc: '2.0', id: idOf(item), result });
    return jsonResponse(Array.isArray(payload) ? payload.map(answer) : answer(payload));
  };
}

/**
 * Answers a single JSON-RPC request with an error object
 */
export function rpcError(code: number, message: string): (request: EndpointRequest) => EndpointResponse {
  return (request) => {
    const payload: unknown = JSON.parse(request.body ?? 'null');
    return jsonResponse({ jsonrpc: '2.0', id: idOf(payload), error: { code, message } });
  };
}

function idOf(item: unknown): unknown {
  return typeof item === 'object' && item !== null && 'id' in item ? item.id : null;
}

/**
 * Deterministic millisecond clock advancing by a fixed step per reading
 */
export function steppingClock(stepMs: number): () => number {
  let now = 0;
  return () => {
    const current = now;
    now += stepMs;
    return current;
  };
}

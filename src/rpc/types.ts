/**
 * RPC infrastructure types
 *
 * Shared request, response and policy types for the execution-layer
 * JSON-RPC pool and the Beacon API pool.
 *
 * @module rpc/types
 */

/**
 * Candidate selection policy for a pool
 * - rotating: starting position persists across logical calls
 * - fallback: every call starts from the first endpoint
 */
export type FailoverPolicy = 'rotating' | 'fallback';

/**
 * Which side of the node the pool talks to
 */
export type NodeLayer = 'el' | 'cl';

/**
 * Identity tags attached to every metric of a pool member
 */
export interface EndpointIdentity {
  /** Human readable network name ('ethereum', 'sepolia', ..., 'unknown') */
  network: string;
  /** Decimal chain id, or 'unknown' before the probe */
  chainId: string;
  layer: NodeLayer;
}

/**
 * JSON-RPC 2.0 request object
 */
export interface JsonRpcRequest {
  jsonrpc: '2.0';
  id: number;
  method: string;
  params: unknown[] | Record<string, unknown>;
}

/**
 * JSON-RPC 2.0 error object
 */
export interface JsonRpcError {
  code: number;
  message: string;
  data?: unknown;
}

/**
 * JSON-RPC 2.0 response object. Exactly one of result/error is present.
 */
export interface JsonRpcResponse<TResult = unknown> {
  jsonrpc: '2.0';
  id: number | string | null;
  result?: TResult;
  error?: JsonRpcError;
}

/**
 * Method name plus parameters, as handed to a pool
 */
export interface JsonRpcCall {
  method: string;
  params?: unknown[] | Record<string, unknown>;
}

export type HttpMethod = 'GET' | 'POST';

/**
 * Transport-level request against one endpoint.
 * `path` is appended to the endpoint's base URL.
 */
export interface EndpointRequest {
  method: HttpMethod;
  path: string;
  query?: Record<string, string>;
  body?: string;
  headers?: Record<string, string>;
}

/**
 * Transport-level response: any HTTP status is a response, only
 * connectivity failures throw.
 */
export interface EndpointResponse {
  status: number;
  /** Header names are lower-cased */
  headers: Record<string, string>;
  body: string;
}

/**
 * Per-call options accepted by every pool operation
 */
export interface CallOptions {
  /** Aborts the logical call; remaining candidates are not tried */
  signal?: AbortSignal;
}

/**
 * Default per-request timeout applied by the fetch client
 */
export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

/**
 * Schemes accepted in endpoint addresses
 */
export const SUPPORTED_SCHEMES = ['http', 'https'] as const;

/**
 * Value used for identity labels before the chain id is known
 */
export const UNKNOWN_LABEL = 'unknown';

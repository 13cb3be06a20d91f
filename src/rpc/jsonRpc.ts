/**
 * JSON-RPC 2.0 encoding helpers
 *
 * @module rpc/jsonRpc
 */

import type { JsonRpcCall, JsonRpcError, JsonRpcRequest, JsonRpcResponse } from './types.js';
import { DataError, ErrorUtils, MalformedRequestError } from '../utils/errors.js';

let nextId = 0;

/**
 * Builds a request object with a process-wide increasing id
 */
export function buildRequest(call: JsonRpcCall): JsonRpcRequest {
  if (typeof call.method !== 'string' || call.method.trim() === '') {
    throw MalformedRequestError.emptyMethod();
  }
  nextId = (nextId + 1) % Number.MAX_SAFE_INTEGER;
  return {
    jsonrpc: '2.0',
    id: nextId,
    method: call.method,
    params: call.params ?? [],
  };
}

/**
 * Serializes a request or batch. Values JSON cannot carry (bigint, cycles)
 * are the caller's mistake.
 */
export function encodePayload(payload: JsonRpcRequest | JsonRpcRequest[]): string {
  try {
    return JSON.stringify(payload);
  } catch (err) {
    throw MalformedRequestError.unserializable('params', ErrorUtils.toError(err));
  }
}

/**
 * Method names carried by an encoded payload, one entry per request of a
 * batch. Returns [] when the payload is not JSON-RPC.
 */
export function extractMethods(payload: unknown): string[] {
  const items = Array.isArray(payload) ? payload : [payload];
  const methods: string[] = [];
  for (const item of items) {
    if (isRecord(item) && typeof item.method === 'string') {
      methods.push(item.method);
    }
  }
  return methods;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isJsonRpcError(value: unknown): value is JsonRpcError {
  return isRecord(value) && typeof value.code === 'number' && typeof value.message === 'string';
}

/**
 * Error code of a single response object, '' when there is none
 */
export function errorCodeOf(response: unknown): string {
  if (!isRecord(response)) return '';
  const error = response.error;
  if (isRecord(error) && (typeof error.code === 'number' || typeof error.code === 'string')) {
    return String(error.code);
  }
  return '';
}

function toResponse(value: unknown): JsonRpcResponse {
  if (!isRecord(value) || (!('result' in value) && !('error' in value))) {
    throw DataError.schemaViolation('JSON_RPC_RESPONSE', 'JSON-RPC 2.0 response object');
  }
  const id = value.id;
  const response: JsonRpcResponse = {
    jsonrpc: '2.0',
    id: typeof id === 'number' || typeof id === 'string' ? id : null,
  };
  if ('result' in value) {
    response.result = value.result;
  }
  if (value.error !== undefined) {
    if (!isJsonRpcError(value.error)) {
      throw DataError.schemaViolation('JSON_RPC_RESPONSE', 'JSON-RPC 2.0 error object');
    }
    response.error = value.error;
  }
  return response;
}

/**
 * Validates a decoded body as a single response
 */
export function toSingleResponse(decoded: unknown): JsonRpcResponse {
  return toResponse(decoded);
}

/**
 * Validates a decoded body as a batch response. A node that rejects the
 * whole batch answers with one error object; that is returned as a
 * one-element array so callers see the error.
 */
export function toBatchResponse(decoded: unknown): JsonRpcResponse[] {
  if (Array.isArray(decoded)) {
    return decoded.map(toResponse);
  }
  return [toResponse(decoded)];
}

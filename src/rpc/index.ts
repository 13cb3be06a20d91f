/**
 * RPC Infrastructure
 *
 * Endpoint transport, failover engine, path classification and the EL/CL
 * pool facades.
 *
 * @module rpc
 */

// Types
export type {
  FailoverPolicy,
  NodeLayer,
  EndpointIdentity,
  JsonRpcRequest,
  JsonRpcError,
  JsonRpcResponse,
  JsonRpcCall,
  HttpMethod,
  EndpointRequest,
  EndpointResponse,
  CallOptions,
} from './types.js';

export { DEFAULT_REQUEST_TIMEOUT_MS, SUPPORTED_SCHEMES, UNKNOWN_LABEL } from './types.js';

// Transport
export type { EndpointClient } from './EndpointClient.js';
export { FetchEndpointClient } from './FetchEndpointClient.js';
export type { FetchEndpointClientOptions } from './FetchEndpointClient.js';

// JSON-RPC helpers
export { buildRequest, encodePayload, extractMethods, errorCodeOf, toSingleResponse, toBatchResponse } from './jsonRpc.js';

// Failover
export { RotatingPolicy, FallbackPolicy, createPolicy } from './CandidateSequence.js';
export type { CandidatePolicy } from './CandidateSequence.js';
export { FailoverEngine } from './FailoverEngine.js';
export type {
  PoolMember,
  FailoverEngineOptions,
  ExecuteOptions,
  AsyncAttempt,
  SyncAttempt,
} from './FailoverEngine.js';

// Path classification
export { PathClassifier, PATH_RULES, GENERIC_RULES, classifyPath, isNumeric, isRootHex } from './PathClassifier.js';
export type { PathRule, SegmentContext } from './PathClassifier.js';

// Response normalization
export { PoaResponseNormalizer, noopResponseNormalizer, MAX_EXTRA_DATA_BYTES } from './ResponseNormalizer.js';
export type { ResponseNormalizer } from './ResponseNormalizer.js';

// Pools
export { ExecutionRpcPool } from './ExecutionRpcPool.js';
export type { ExecutionRpcPoolOptions, Eip1193Provider } from './ExecutionRpcPool.js';
export { BeaconApiPool, DEPOSIT_CONTRACT_PATH } from './BeaconApiPool.js';
export type { BeaconApiPoolOptions } from './BeaconApiPool.js';

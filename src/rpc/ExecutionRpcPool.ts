/**
 * Execution-layer JSON-RPC pool
 *
 * Routes JSON-RPC calls and batches over equivalent nodes through the
 * failover engine. Members are probed for their chain id before the pool is
 * published, so identity labels never change while calls are in flight.
 *
 * @module rpc/ExecutionRpcPool
 */

import type { Logger } from 'pino';
import { RpcRequestError, hexToNumber, isHex } from 'viem';
import { ConfigurationService } from '../config/ConfigurationService.js';
import { InstrumentedClient } from '../observability/InstrumentedClient.js';
import type { IMetricsSink } from '../observability/interfaces.js';
import { createChildLogger } from '../utils/logger.js';
import { DataError, ErrorUtils, MalformedRequestError, ProviderInitializationError } from '../utils/errors.js';
import { parseEndpoints } from '../utils/endpoint.js';
import type { EndpointClient } from './EndpointClient.js';
import { FailoverEngine } from './FailoverEngine.js';
import { FetchEndpointClient } from './FetchEndpointClient.js';
import { buildRequest, toBatchResponse, toSingleResponse } from './jsonRpc.js';
import type { ResponseNormalizer } from './ResponseNormalizer.js';
import { PoaResponseNormalizer } from './ResponseNormalizer.js';
import type {
  CallOptions,
  EndpointIdentity,
  FailoverPolicy,
  JsonRpcCall,
  JsonRpcResponse,
} from './types.js';

export interface ExecutionRpcPoolOptions {
  /** Defaults to the configured policy */
  policy?: FailoverPolicy;
  sink?: IMetricsSink;
  logger?: Logger;
  /** Per-request timeout of the default fetch client */
  timeoutMs?: number;
  headers?: Record<string, string>;
  /** Known chain id; skips the eth_chainId probe */
  chainId?: number;
  config?: ConfigurationService;
  normalizer?: ResponseNormalizer<JsonRpcResponse>;
  /** Builds the transport for one validated address */
  clientFactory?: (address: string) => EndpointClient;
  /** Millisecond clock for latency metrics */
  clock?: () => number;
}

/**
 * Minimal EIP-1193 surface, enough for viem's custom() transport
 */
export interface Eip1193Provider {
  request(args: { method: string; params?: unknown }): Promise<unknown>;
}

function toParams(params: unknown): unknown[] | Record<string, unknown> | undefined {
  if (params === undefined) return undefined;
  if (Array.isArray(params)) return params;
  if (typeof params === 'object' && params !== null) return Object.fromEntries(Object.entries(params));
  throw new MalformedRequestError('JSON-RPC params must be an array or an object', 'params', 'array | object', typeof params);
}

export class ExecutionRpcPool {
  private readonly engine: FailoverEngine<InstrumentedClient>;
  private readonly normalizer: ResponseNormalizer<JsonRpcResponse>;

  constructor(
    members: readonly InstrumentedClient[],
    options: Pick<ExecutionRpcPoolOptions, 'policy' | 'logger' | 'normalizer'> = {},
  ) {
    const logger = options.logger ?? createChildLogger('execution-pool');
    this.engine = new FailoverEngine(members, { policy: options.policy, logger });
    this.normalizer = options.normalizer ?? new PoaResponseNormalizer(logger);
  }

  /**
   * Validates every address, probes every member's chain id, then publishes
   * the pool. Any invalid address or failed probe rejects the whole pool.
   */
  static async create(addresses: readonly string[], options: ExecutionRpcPoolOptions = {}): Promise<ExecutionRpcPool> {
    const endpoints = parseEndpoints(addresses);
    const config = options.config ?? ConfigurationService.getInstance();
    const logger = options.logger ?? createChildLogger('execution-pool');
    const timeoutMs = options.timeoutMs ?? config.getRequestTimeout();
    const factory = options.clientFactory
      ?? ((address: string) => new FetchEndpointClient(address, { timeoutMs, headers: options.headers }));

    const policy = options.policy ?? config.getPolicy();

    const unprobed = endpoints.map((endpoint) => new InstrumentedClient(factory(endpoint.url), {
      sink: options.sink,
      logger,
      clock: options.clock,
    }));

    const members = await Promise.all(unprobed.map(async (member) => {
      const chainId = options.chainId ?? await ExecutionRpcPool.probeChainId(member);
      const identity: EndpointIdentity = {
        network: config.getNetworkName(String(chainId)),
        chainId: String(chainId),
        layer: 'el',
      };
      return member.withIdentity(identity);
    }));

    logger.debug({ members: members.length, policy }, 'Initialize ExecutionRpcPool');
    return new ExecutionRpcPool(members, { ...options, policy });
  }

  /**
   * Builds a pool over the configured EL_RPC_URLS endpoints
   */
  static async fromConfig(options: ExecutionRpcPoolOptions = {}): Promise<ExecutionRpcPool> {
    const config = options.config ?? ConfigurationService.getInstance();
    return ExecutionRpcPool.create(config.getExecutionEndpoints(), { ...options, config });
  }

  private static async probeChainId(member: InstrumentedClient): Promise<number> {
    try {
      const response = await member.callJsonRpc(buildRequest({ method: 'eth_chainId' }), toSingleResponse);
      if (response.error) {
        throw new Error(`eth_chainId returned error ${response.error.code}: ${response.error.message}`);
      }
      if (typeof response.result !== 'string' || !isHex(response.result)) {
        throw DataError.schemaViolation('JSON_RPC_RESPONSE', 'hex chain id');
      }
      return hexToNumber(response.result);
    } catch (err) {
      throw new ProviderInitializationError(member.provider, ErrorUtils.toError(err));
    }
  }

  get size(): number {
    return this.engine.size;
  }

  get policy(): FailoverPolicy {
    return this.engine.policyName;
  }

  getMembers(): readonly InstrumentedClient[] {
    return this.engine.getMembers();
  }

  /**
   * Sends one JSON-RPC call. A response carrying a JSON-RPC error is
   * returned, not retried elsewhere, and counted as a failed call.
   */
  async request(
    method: string,
    params?: unknown[] | Record<string, unknown>,
    options: CallOptions = {},
  ): Promise<JsonRpcResponse> {
    const payload = buildRequest({ method, params });
    return this.engine.execute(
      method,
      (member, callOptions) => member.callJsonRpc(payload, toSingleResponse, callOptions),
      { normalizer: this.normalizer, signal: options.signal, params },
    );
  }

  /**
   * Sends calls as one HTTP batch. Only a failure of the whole batch moves
   * on to the next endpoint; per-item errors are returned as they are.
   */
  async batch(calls: readonly JsonRpcCall[], options: CallOptions = {}): Promise<JsonRpcResponse[]> {
    if (calls.length === 0) {
      throw MalformedRequestError.emptyBatch();
    }
    const payload = calls.map(buildRequest);
    const methodById = new Map(payload.map((request) => [request.id, request.method]));
    const itemNormalizer = this.normalizer;

    const batchNormalizer: ResponseNormalizer<JsonRpcResponse[]> = {
      normalize: (_target, responses) => {
        for (const response of responses) {
          const method = typeof response.id === 'number' ? methodById.get(response.id) : undefined;
          if (method !== undefined) itemNormalizer.normalize(method, response);
        }
      },
    };

    return this.engine.execute(
      'batch',
      (member, callOptions) => member.callJsonRpc(payload, toBatchResponse, callOptions),
      { normalizer: batchNormalizer, signal: options.signal, params: payload.map((r) => r.method) },
    );
  }

  /**
   * EIP-1193 view of the pool: results are unwrapped and JSON-RPC errors are
   * raised as viem RpcRequestError
   *
   * @example
   * const client = createPublicClient({ transport: custom(pool.toEip1193Provider()) });
   */
  toEip1193Provider(): Eip1193Provider {
    return {
      request: async ({ method, params }) => {
        const rpcParams = toParams(params);
        const response = await this.request(method, rpcParams);
        if (response.error) {
          throw new RpcRequestError({
            body: { method, params: rpcParams },
            error: response.error,
            url: 'execution-rpc-pool',
          });
        }
        return response.result;
      },
    };
  }
}

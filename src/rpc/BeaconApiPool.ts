/**
 * Consensus-layer Beacon REST pool
 *
 * @module rpc/BeaconApiPool
 */

import type { Logger } from 'pino';
import { ConfigurationService } from '../config/ConfigurationService.js';
import { InstrumentedClient } from '../observability/InstrumentedClient.js';
import type { IMetricsSink } from '../observability/interfaces.js';
import { createChildLogger } from '../utils/logger.js';
import { DataError, ErrorUtils, MalformedRequestError, ProviderInitializationError } from '../utils/errors.js';
import { parseEndpoints } from '../utils/endpoint.js';
import type { EndpointClient } from './EndpointClient.js';
import { FailoverEngine } from './FailoverEngine.js';
import { FetchEndpointClient } from './FetchEndpointClient.js';
import type { ResponseNormalizer } from './ResponseNormalizer.js';
import { noopResponseNormalizer } from './ResponseNormalizer.js';
import type { CallOptions, EndpointIdentity, EndpointRequest, FailoverPolicy } from './types.js';

/**
 * Beacon endpoint whose payload carries the chain id
 */
export const DEPOSIT_CONTRACT_PATH = '/eth/v1/config/deposit_contract';

export interface BeaconApiPoolOptions {
  /** Defaults to the configured policy */
  policy?: FailoverPolicy;
  sink?: IMetricsSink;
  logger?: Logger;
  timeoutMs?: number;
  headers?: Record<string, string>;
  /** Known chain id; skips the deposit contract probe */
  chainId?: number;
  config?: ConfigurationService;
  normalizer?: ResponseNormalizer<unknown>;
  clientFactory?: (address: string) => EndpointClient;
  clock?: () => number;
}

function readChainId(body: unknown): string {
  if (typeof body === 'object' && body !== null && 'data' in body) {
    const data = body.data;
    if (typeof data === 'object' && data !== null && 'chain_id' in data) {
      const chainId = data.chain_id;
      if (typeof chainId === 'string' && /^\d+$/.test(chainId)) return chainId;
      if (typeof chainId === 'number' && Number.isInteger(chainId)) return String(chainId);
    }
  }
  throw DataError.schemaViolation('BEACON_RESPONSE', 'deposit contract with data.chain_id');
}

export class BeaconApiPool {
  private readonly engine: FailoverEngine<InstrumentedClient>;
  private readonly normalizer: ResponseNormalizer<unknown>;

  constructor(
    members: readonly InstrumentedClient[],
    options: Pick<BeaconApiPoolOptions, 'policy' | 'logger' | 'normalizer'> = {},
  ) {
    const logger = options.logger ?? createChildLogger('beacon-pool');
    this.engine = new FailoverEngine(members, { policy: options.policy, logger });
    this.normalizer = options.normalizer ?? noopResponseNormalizer;
  }

  static async create(addresses: readonly string[], options: BeaconApiPoolOptions = {}): Promise<BeaconApiPool> {
    const endpoints = parseEndpoints(addresses);
    const config = options.config ?? ConfigurationService.getInstance();
    const logger = options.logger ?? createChildLogger('beacon-pool');
    const timeoutMs = options.timeoutMs ?? config.getRequestTimeout();
    const factory = options.clientFactory
      ?? ((address: string) => new FetchEndpointClient(address, { timeoutMs, headers: options.headers }));

    const policy = options.policy ?? config.getPolicy();

    const members = await Promise.all(endpoints.map(async (endpoint) => {
      const member = new InstrumentedClient(factory(endpoint.url), {
        sink: options.sink,
        logger,
        clock: options.clock,
        identity: { network: 'unknown', chainId: 'unknown', layer: 'cl' },
      });
      const chainId = options.chainId !== undefined
        ? String(options.chainId)
        : await BeaconApiPool.probeChainId(member);
      const identity: EndpointIdentity = {
        network: config.getNetworkName(chainId),
        chainId,
        layer: 'cl',
      };
      return member.withIdentity(identity);
    }));

    logger.debug({ members: members.length, policy }, 'Initialize BeaconApiPool');
    return new BeaconApiPool(members, { ...options, policy });
  }

  /**
   * Builds a pool over the configured CL_API_URLS endpoints
   */
  static async fromConfig(options: BeaconApiPoolOptions = {}): Promise<BeaconApiPool> {
    const config = options.config ?? ConfigurationService.getInstance();
    return BeaconApiPool.create(config.getConsensusEndpoints(), { ...options, config });
  }

  private static async probeChainId(member: InstrumentedClient): Promise<string> {
    try {
      return await member.callRest({ method: 'GET', path: DEPOSIT_CONTRACT_PATH }, readChainId);
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
   * GET a Beacon API path, e.g. `/eth/v1/beacon/headers/head`
   */
  async get(path: string, query?: Record<string, string>, options: CallOptions = {}): Promise<unknown> {
    return this.send({ method: 'GET', path, query }, options);
  }

  /**
   * POST a JSON body to a Beacon API path
   */
  async post(path: string, body: unknown, options: CallOptions = {}): Promise<unknown> {
    let encoded: string | undefined;
    try {
      encoded = JSON.stringify(body);
    } catch (err) {
      throw MalformedRequestError.unserializable('body', ErrorUtils.toError(err));
    }
    // undefined, functions and symbols have no JSON form
    if (encoded === undefined) {
      throw MalformedRequestError.unserializable('body', new TypeError(`Cannot encode ${typeof body} as JSON`));
    }
    return this.send({ method: 'POST', path, body: encoded }, options);
  }

  private async send(request: EndpointRequest, options: CallOptions): Promise<unknown> {
    if (!request.path.startsWith('/')) {
      throw MalformedRequestError.invalidPath(request.path);
    }
    return this.engine.execute(
      request.path,
      (member, callOptions) => member.callRest(request, callOptions),
      { normalizer: this.normalizer, signal: options.signal, params: request.query },
    );
  }
}

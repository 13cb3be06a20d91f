import type { FailoverPolicy } from '../rpc/types.js';
import { DEFAULT_REQUEST_TIMEOUT_MS } from '../rpc/types.js';
import { ValidationError } from '../utils/errors.js';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface MultiProviderConfig {
  /** Execution-layer JSON-RPC endpoint URLs, in pool order */
  executionEndpoints: string[];
  /** Consensus-layer Beacon API endpoint URLs, in pool order */
  consensusEndpoints: string[];
  policy: FailoverPolicy;
  requestTimeout: number;
  /** Prefix for every metric name, joined with '_' */
  metricsNamespace: string;
  chainIdToNetwork: Record<string, string>;
  logLevel: LogLevel;
}

/**
 * Chain ids with a well-known network label
 */
export const DEFAULT_CHAIN_ID_TO_NETWORK: Readonly<Record<string, string>> = {
  '1': 'ethereum',
  '10': 'optimism',
  '137': 'polygon',
  '42161': 'arbitrum',
  '100': 'gnosis',
  '10200': 'chiado',
  '11155111': 'sepolia',
  '560048': 'hoodi',
  '17000': 'holesky',
};

const POLICIES: readonly FailoverPolicy[] = ['rotating', 'fallback'];
const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isPolicy(value: string): value is FailoverPolicy {
  return POLICIES.some((p) => p === value);
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((l) => l === value);
}

function splitUrls(value: string): string[] {
  return value
    .split(',')
    .map((url) => url.trim())
    .filter((url) => url.length > 0);
}

/**
 * Configuration service for the provider pools
 * Merges defaults, environment variables and explicit overrides
 */
export class ConfigurationService {
  private static instance: ConfigurationService | undefined;
  private config: MultiProviderConfig;

  constructor(overrides?: Partial<MultiProviderConfig>, env: NodeJS.ProcessEnv = process.env) {
    this.config = this.loadConfiguration(overrides, env);
  }

  /**
   * Gets the singleton instance
   */
  static getInstance(overrides?: Partial<MultiProviderConfig>): ConfigurationService {
    if (!ConfigurationService.instance) {
      ConfigurationService.instance = new ConfigurationService(overrides);
    }
    return ConfigurationService.instance;
  }

  /**
   * Drops the singleton (for testing purposes)
   */
  static resetInstance(): void {
    ConfigurationService.instance = undefined;
  }

  private loadConfiguration(
    overrides: Partial<MultiProviderConfig> | undefined,
    env: NodeJS.ProcessEnv,
  ): MultiProviderConfig {
    const defaultConfig: MultiProviderConfig = {
      executionEndpoints: [],
      consensusEndpoints: [],
      policy: 'rotating',
      requestTimeout: DEFAULT_REQUEST_TIMEOUT_MS,
      metricsNamespace: '',
      chainIdToNetwork: { ...DEFAULT_CHAIN_ID_TO_NETWORK },
      logLevel: 'info',
    };

    const envConfig = this.loadFromEnvironment(env);

    return {
      ...defaultConfig,
      ...envConfig,
      ...overrides,
    };
  }

  private loadFromEnvironment(env: NodeJS.ProcessEnv): Partial<MultiProviderConfig> {
    const config: Partial<MultiProviderConfig> = {};

    if (env.EL_RPC_URLS) {
      config.executionEndpoints = splitUrls(env.EL_RPC_URLS);
    }

    if (env.CL_API_URLS) {
      config.consensusEndpoints = splitUrls(env.CL_API_URLS);
    }

    if (env.RPC_FAILOVER_POLICY) {
      const policy = env.RPC_FAILOVER_POLICY.trim().toLowerCase();
      if (!isPolicy(policy)) {
        throw ValidationError.invalidParameter('RPC_FAILOVER_POLICY', POLICIES.join(' | '), policy);
      }
      config.policy = policy;
    }

    if (env.RPC_REQUEST_TIMEOUT_MS) {
      const timeout = parseInt(env.RPC_REQUEST_TIMEOUT_MS, 10);
      if (!Number.isFinite(timeout) || timeout <= 0) {
        throw ValidationError.invalidParameter('RPC_REQUEST_TIMEOUT_MS', 'positive integer', env.RPC_REQUEST_TIMEOUT_MS);
      }
      config.requestTimeout = timeout;
    }

    if (env.METRICS_NAMESPACE !== undefined) {
      config.metricsNamespace = env.METRICS_NAMESPACE.trim();
    }

    if (env.LOG_LEVEL) {
      const level = env.LOG_LEVEL.trim().toLowerCase();
      if (isLogLevel(level)) {
        config.logLevel = level;
      }
    }

    return config;
  }

  getConfig(): Readonly<MultiProviderConfig> {
    return this.config;
  }

  getExecutionEndpoints(): string[] {
    return [...this.config.executionEndpoints];
  }

  getConsensusEndpoints(): string[] {
    return [...this.config.consensusEndpoints];
  }

  getPolicy(): FailoverPolicy {
    return this.config.policy;
  }

  /**
   * Gets request timeout in milliseconds
   */
  getRequestTimeout(): number {
    return this.config.requestTimeout;
  }

  getMetricsNamespace(): string {
    return this.config.metricsNamespace;
  }

  getLogLevel(): LogLevel {
    return this.config.logLevel;
  }

  /**
   * Maps a decimal chain id to its network label, 'unknown' when unmapped
   */
  getNetworkName(chainId: string): string {
    return this.config.chainIdToNetwork[chainId] ?? 'unknown';
  }

  /**
   * Updates configuration (for testing purposes)
   */
  updateConfig(updates: Partial<MultiProviderConfig>): void {
    this.config = { ...this.config, ...updates };
  }
}

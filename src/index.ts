// RPC pools, failover and transport
export * from './rpc/index.js';

// Metrics and the instrumented session layer
export * from './observability/index.js';

// Configuration
export { ConfigurationService, DEFAULT_CHAIN_ID_TO_NETWORK } from './config/ConfigurationService.js';
export type { MultiProviderConfig, LogLevel } from './config/ConfigurationService.js';

// Endpoint address handling
export { normalizeProvider, parseEndpoint, parseEndpoints, assertSupportedScheme } from './utils/endpoint.js';
export type { ParsedEndpoint } from './utils/endpoint.js';

// Logging
export { logger, createChildLogger } from './utils/logger.js';
export type { Logger } from './utils/logger.js';

// Errors
export {
  IntegrationError,
  EndpointRequestError,
  ValidationError,
  MalformedRequestError,
  DataError,
  UnsupportedSchemeError,
  InvalidEndpointError,
  ProviderInitializationError,
  NoActiveProviderError,
  NoProvidersConfiguredError,
  ErrorUtils,
} from './utils/errors.js';

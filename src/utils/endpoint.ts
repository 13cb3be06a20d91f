import { SUPPORTED_SCHEMES } from '../rpc/types.js';
import { ErrorUtils, InvalidEndpointError, UnsupportedSchemeError } from './errors.js';

const IPV4_HOST = /^(\d{1,3}\.){3}\d{1,3}$/;

/**
 * A validated endpoint address
 */
export interface ParsedEndpoint {
  /** Address as supplied, trailing slash removed */
  url: string;
  /** Low-cardinality label safe to export (no path, no credentials) */
  provider: string;
}

function schemeOf(address: string): string {
  const idx = address.indexOf('://');
  if (idx <= 0) return '';
  return address.slice(0, idx).toLowerCase();
}

/**
 * Validates the scheme of an endpoint address.
 * Throws before any network activity.
 */
export function assertSupportedScheme(address: string): void {
  const scheme = schemeOf(address);
  if (!SUPPORTED_SCHEMES.some((s) => s === scheme)) {
    throw new UnsupportedSchemeError(scheme || address.split(':')[0] || address, SUPPORTED_SCHEMES);
  }
}

/**
 * Collapses a host into a metric label.
 * IP literals (optionally with port) are kept, DNS names become their
 * two highest labels, e.g. eth-mainnet.alchemy.com -> alchemy.com.
 */
export function normalizeProvider(address: string): string {
  const withScheme = schemeOf(address) ? address : `http://${address}`;

  let parsed: URL;
  try {
    parsed = new URL(withScheme);
  } catch (err) {
    throw new InvalidEndpointError('address cannot be parsed', ErrorUtils.toError(err));
  }

  const hostname = parsed.hostname.toLowerCase();
  if (IPV4_HOST.test(hostname) || hostname.startsWith('[')) {
    return parsed.host.toLowerCase();
  }

  const parts = hostname.split('.').filter((p) => p.length > 0);
  if (parts.length >= 2) {
    return parts.slice(-2).join('.');
  }

  throw InvalidEndpointError.unhandledHostname(hostname);
}

/**
 * Validates and normalizes one endpoint address
 */
export function parseEndpoint(address: string): ParsedEndpoint {
  const trimmed = address.trim();
  assertSupportedScheme(trimmed);
  return {
    url: trimmed.replace(/\/+$/, ''),
    provider: normalizeProvider(trimmed),
  };
}

/**
 * Validates every address of a pool. A single bad address fails the whole
 * pool, and nothing is returned until all of them pass.
 */
export function parseEndpoints(addresses: readonly string[]): ParsedEndpoint[] {
  return addresses.map(parseEndpoint);
}

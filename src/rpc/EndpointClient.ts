/**
 * Endpoint client contract
 *
 * One request/response cycle against one address. Implementations throw on
 * connectivity failure and return every HTTP response, whatever its status.
 * They hold no failover state.
 *
 * @module rpc/EndpointClient
 */

import type { CallOptions, EndpointRequest, EndpointResponse } from './types.js';

export interface EndpointClient {
  /** Address as configured. May embed credentials: never log or export it. */
  readonly url: string;
  /** Normalized, exportable identity of the address */
  readonly provider: string;

  send(request: EndpointRequest, options?: CallOptions): Promise<EndpointResponse>;
}

/**
 * Post-success response rewriting
 *
 * @module rpc/ResponseNormalizer
 */

import { isHex, size } from 'viem';
import type { Logger } from 'pino';
import type { JsonRpcResponse } from './types.js';

/**
 * Hook run exactly once on every successful response, whichever endpoint
 * produced it. Implementations mutate the response in place.
 */
export interface ResponseNormalizer<TResponse> {
  normalize(target: string, response: TResponse): void;
}

export const noopResponseNormalizer: ResponseNormalizer<unknown> = {
  normalize: () => undefined,
};

/**
 * Standard extraData is at most 32 bytes
 */
export const MAX_EXTRA_DATA_BYTES = 32;

const BLOCK_METHODS = new Set(['eth_getBlockByHash', 'eth_getBlockByNumber']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Proof-of-authority chains pack signer data into block extraData, which
 * makes it longer than the 32 bytes clients expect. Moves the field to
 * proofOfAuthorityData.
 */
export class PoaResponseNormalizer implements ResponseNormalizer<JsonRpcResponse> {
  constructor(private readonly logger?: Logger) {}

  normalize(method: string, response: JsonRpcResponse): void {
    if (!BLOCK_METHODS.has(method)) return;

    const block = response.result;
    if (!isRecord(block)) return;
    if (!('extraData' in block) || 'proofOfAuthorityData' in block) return;

    const extraData = block.extraData;
    if (typeof extraData !== 'string' || !isHex(extraData)) return;
    if (size(extraData) <= MAX_EXTRA_DATA_BYTES) return;

    this.logger?.debug('PoA blockchain cleanup response.');
    block.proofOfAuthorityData = extraData;
    delete block.extraData;
  }
}
